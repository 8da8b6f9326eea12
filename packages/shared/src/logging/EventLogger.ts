/**
 * Synchronous structured logger. Producers record events; whoever owns the
 * sink (a trace buffer, a JSONL file) decides where they end up.
 */
export interface EventLogger {
  log(type: string, data: Record<string, unknown>): void;
}

export const noopLogger: EventLogger = {
  log: () => undefined,
};
