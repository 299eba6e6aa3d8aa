export enum FeedErrorCode {
  DECODE_FAILED = "DECODE_FAILED",
  CONNECT_FAILED = "CONNECT_FAILED",
  SNAPSHOT_FAILED = "SNAPSHOT_FAILED",
  FEED_STOPPED = "FEED_STOPPED",
}

/** Base class of every error the feed surfaces. `symbol` is null when unknown. */
export class FeedError extends Error {
  constructor(
    public readonly code: FeedErrorCode,
    public readonly symbol: string | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FeedError";
  }

  toString(): string {
    return `${this.name}[${this.code}]: ${this.message}`;
  }
}

/** Malformed wire payload. The message is dropped and counted. */
export class DecodeError extends FeedError {
  constructor(symbol: string | null, message: string, options?: { cause?: unknown }) {
    super(FeedErrorCode.DECODE_FAILED, symbol, message, options);
    this.name = "DecodeError";
  }
}

/** The stream could not be opened within the configured attempts. */
export class ConnectError extends FeedError {
  constructor(
    symbol: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      FeedErrorCode.CONNECT_FAILED,
      symbol,
      `Failed to open stream for ${symbol} after ${attempts} attempt(s)`,
      options
    );
    this.name = "ConnectError";
  }
}

/** No usable snapshot could be fetched within the configured attempts. */
export class SnapshotError extends FeedError {
  constructor(
    symbol: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      FeedErrorCode.SNAPSHOT_FAILED,
      symbol,
      `Failed to synchronize snapshot for ${symbol} after ${attempts} attempt(s)`,
      options
    );
    this.name = "SnapshotError";
  }
}

/** The symbol was torn down before it delivered a first book. */
export class FeedStoppedError extends FeedError {
  constructor(symbol: string) {
    super(FeedErrorCode.FEED_STOPPED, symbol, `Feed for ${symbol} was stopped`);
    this.name = "FeedStoppedError";
  }
}

/** REST clients may reject with a plain `{ code, message, ... }` body; its message is kept. */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return new Error(err.message, { cause: err });
  }
  return new Error(String(err));
}
