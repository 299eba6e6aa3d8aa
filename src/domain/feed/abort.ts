import { setTimeout as delay } from "node:timers/promises";

export class AbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

/** Resolves after `ms`, or rejects with `AbortedError` once `signal` aborts. */
export async function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) throw new AbortedError();
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) throw new AbortedError();
    throw err;
  }
}

/**
 * Settles like `promise` unless `signal` aborts first, in which case it rejects
 * with `AbortedError` and the late result is discarded.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep a late rejection of the abandoned promise from going unhandled.
    promise.catch(() => undefined);
    return Promise.reject(new AbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError());
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
