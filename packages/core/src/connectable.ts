import { Subscription } from "rxjs";
import { Connection } from "./connection";

/**
 * Capability a controller adopts to be driven by a Connection instead of
 * reading the store directly.
 */
export interface Connectable<S, P, A, Action = unknown> {
  readonly connection: Connection<S, P, A, Action>;
}

export function isConnectable(value: unknown): value is Connectable<unknown, unknown, unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    "connection" in value &&
    value.connection instanceof Connection
  );
}

/**
 * Connect a controller and hand back its lifetime. Unsubscribing the
 * returned subscription disposes the connection: the store subscription
 * and every binding made through it are released.
 *
 * @example
 * ```ts
 * class EditorController implements Connectable<EditorState, EditorProps, EditorActions> {
 *   readonly connection = new Connection(store, toProps, toActions);
 *   private lifetime?: Subscription;
 *
 *   mount(label: HTMLElement) {
 *     this.lifetime = attach(this);
 *     this.connection.bind((props) => props.text, (text) => (label.textContent = text));
 *   }
 *
 *   unmount() {
 *     this.lifetime?.unsubscribe();
 *   }
 * }
 * ```
 */
export function attach<S, P, A, Action>(controller: Connectable<S, P, A, Action>): Subscription {
  const { connection } = controller;
  connection.connect();
  return new Subscription(() => connection.dispose());
}
