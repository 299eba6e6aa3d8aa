export type BackoffOptions = {
  /** Default: 1000 */
  initialMs?: number;
  /** Default: 30000 */
  maxMs?: number;
  /** Default: 2 */
  factor?: number;
};

/** Capped exponential delays: initial, initial*factor, ... up to max. */
export class Backoff {
  private readonly initialMs: number;
  private readonly maxMs: number;
  private readonly factor: number;
  private attemptValue = 0;

  constructor(options?: BackoffOptions) {
    this.initialMs = Math.max(0, options?.initialMs ?? 1000);
    this.maxMs = Math.max(this.initialMs, options?.maxMs ?? 30_000);
    this.factor = Math.max(1, options?.factor ?? 2);
  }

  get attempt(): number {
    return this.attemptValue;
  }

  nextDelay(): number {
    const delay = Math.min(this.maxMs, Math.trunc(this.initialMs * this.factor ** this.attemptValue));
    this.attemptValue += 1;
    return delay;
  }

  reset(): void {
    this.attemptValue = 0;
  }
}
