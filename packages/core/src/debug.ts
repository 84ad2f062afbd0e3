export type LogSink = (line: string) => void;

interface DebugContext {
  connectionName?: string;
  sink?: LogSink;
}

export function formatValue(v: unknown): string {
  if (v === undefined) return 'undefined';
  if (v === null) return 'null';
  if (typeof v === 'object') {
    try {
      const str = JSON.stringify(v);
      return str.length > 50 ? str.slice(0, 50) + '...' : str;
    } catch {
      return '[circular]';
    }
  }
  return String(v);
}

export function createDebugLog(ctx: DebugContext) {
  const sink: LogSink = ctx.sink ?? ((line) => console.log(line));
  const prefix = ctx.connectionName
    ? `[rx-connect:${ctx.connectionName}]`
    : '[rx-connect]';

  return (event: string, detail?: unknown) => {
    sink(detail === undefined ? `${prefix} ${event}` : `${prefix} ${event}: ${formatValue(detail)}`);
  };
}

export type DebugLogFn = ReturnType<typeof createDebugLog>;
