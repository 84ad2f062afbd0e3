export type ConnectionErrorCode = "NOT_READY" | "ALREADY_CONNECTED" | "DISPOSED";

/**
 * Thrown when a Connection is used outside its lifecycle: reading props
 * before the first state arrived, connecting twice, or connecting after dispose.
 */
export class ConnectionError extends Error {
  readonly code: ConnectionErrorCode;

  constructor(code: ConnectionErrorCode, message: string) {
    super(message);
    this.name = "ConnectionError";
    this.code = code;
  }
}
