export type Side = "bid" | "ask";

export type PriceLevel = {
  price: number;
  quantity: number;
};

/** Mutable per-symbol book. Only the synchronizer ever holds one of these. */
export type OrderbookState = {
  symbol: string;
  lastUpdateId: number;
  bids: Map<number, number>; // price -> quantity
  asks: Map<number, number>; // price -> quantity
  /** Epoch ms of the last accepted snapshot or diff. */
  lastSyncedAt: number;
};

/** Immutable copy of a book handed to consumers. Bids descend, asks ascend. */
export type OrderBookView = {
  readonly symbol: string;
  readonly lastUpdateId: number;
  readonly bids: readonly Readonly<PriceLevel>[];
  readonly asks: readonly Readonly<PriceLevel>[];
  readonly lastSyncedAt: number;
};

/** Levels changed by one accepted diff. Quantity 0 means the level was removed. */
export type OrderBookDelta = {
  readonly symbol: string;
  readonly firstUpdateId: number;
  readonly lastUpdateId: number;
  readonly bids: readonly Readonly<PriceLevel>[];
  readonly asks: readonly Readonly<PriceLevel>[];
  readonly bestBid: Readonly<PriceLevel> | null;
  readonly bestAsk: Readonly<PriceLevel> | null;
};

/**
 * Normalized decode result.
 *
 * For snapshots `firstUpdateId` and `lastUpdateId` both carry the snapshot's
 * sequence number. Diffs cover the inclusive range `[firstUpdateId, lastUpdateId]`.
 */
export type LevelUpdate = {
  kind: "snapshot" | "diff";
  symbol: string;
  firstUpdateId: number;
  lastUpdateId: number;
  /** Exchange event time in epoch ms, or receive time when the payload has none. */
  eventTime: number;
  bids: PriceLevel[];
  asks: PriceLevel[];
};

export type ReconcileOutcome =
  | { status: "applied"; kind: "snapshot"; book: OrderBookView }
  | { status: "applied"; kind: "diff"; delta: OrderBookDelta }
  | { status: "stale" }
  | { status: "gap"; expectedFirstUpdateId: number | null; firstUpdateId: number }
  | { status: "invalid"; reason: string };

/** One row of a paired top-of-book table. */
export type TopLevel = {
  bid: Readonly<PriceLevel> | null;
  ask: Readonly<PriceLevel> | null;
};
