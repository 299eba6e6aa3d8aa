export enum FeedState {
  DISCONNECTED = "DISCONNECTED",
  CONNECTING = "CONNECTING",
  SYNCING = "SYNCING",
  LIVE = "LIVE",
  RESYNCING = "RESYNCING",
}

/**
 * Every transition a symbol's feed may take.
 *
 * - `SYNCING -> CONNECTING`: the stream dropped before the first book landed.
 * - `RESYNCING` covers both reopening the stream and re-fetching the snapshot.
 * - Any state may fall back to `DISCONNECTED` on teardown or exhausted retries.
 */
export const FEED_TRANSITIONS: Readonly<Record<FeedState, readonly FeedState[]>> = {
  [FeedState.DISCONNECTED]: [FeedState.CONNECTING],
  [FeedState.CONNECTING]: [FeedState.SYNCING, FeedState.DISCONNECTED],
  [FeedState.SYNCING]: [FeedState.LIVE, FeedState.CONNECTING, FeedState.DISCONNECTED],
  [FeedState.LIVE]: [FeedState.RESYNCING, FeedState.DISCONNECTED],
  [FeedState.RESYNCING]: [FeedState.LIVE, FeedState.DISCONNECTED],
};

export function canTransition(from: FeedState, to: FeedState): boolean {
  return FEED_TRANSITIONS[from].includes(to);
}

export type FeedTransitionListener = (from: FeedState, to: FeedState) => void;

export class FeedStateMachine {
  private stateValue: FeedState = FeedState.DISCONNECTED;
  private readonly onTransition: FeedTransitionListener | null;

  constructor(onTransition?: FeedTransitionListener) {
    this.onTransition = onTransition ?? null;
  }

  get state(): FeedState {
    return this.stateValue;
  }

  is(...states: FeedState[]): boolean {
    return states.includes(this.stateValue);
  }

  /** Throws on a transition `FEED_TRANSITIONS` does not declare. */
  transition(to: FeedState): void {
    const from = this.stateValue;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal feed transition ${from} -> ${to}`);
    }
    this.stateValue = to;
    this.onTransition?.(from, to);
  }
}
