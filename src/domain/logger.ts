/** Structured logger the core writes to. `meta` is merged into the log record. */
export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;
  /** Logger that adds `bindings` (e.g. `{ symbol }`) to every record. */
  child(bindings: Record<string, unknown>): Logger;
}
