import type {
  OrderBookView,
  OrderbookState,
  PriceLevel,
  Side,
  TopLevel,
} from "./types";

export function createBook(symbol: string): OrderbookState {
  return {
    symbol,
    lastUpdateId: 0,
    bids: new Map(),
    asks: new Map(),
    lastSyncedAt: 0,
  };
}

export function applyLevel(
  side: Map<number, number>,
  price: number,
  quantity: number
): void {
  if (quantity === 0) side.delete(price);
  else side.set(price, quantity);
}

export function rebuildFromSnapshot(args: {
  book: OrderbookState;
  bids: readonly PriceLevel[];
  asks: readonly PriceLevel[];
  lastUpdateId: number;
  syncedAt: number;
}): void {
  const { book } = args;

  book.bids.clear();
  book.asks.clear();

  for (const level of args.bids) applyLevel(book.bids, level.price, level.quantity);
  for (const level of args.asks) applyLevel(book.asks, level.price, level.quantity);

  book.lastUpdateId = args.lastUpdateId;
  book.lastSyncedAt = args.syncedAt;
}

export function bestPrice(levels: Map<number, number>, side: Side): number | null {
  let best: number | null = null;
  for (const price of levels.keys()) {
    if (best == null) best = price;
    else if (side === "bid" ? price > best : price < best) best = price;
  }
  return best;
}

export function bestLevel(
  levels: Map<number, number>,
  side: Side
): Readonly<PriceLevel> | null {
  const price = bestPrice(levels, side);
  if (price == null) return null;
  const quantity = levels.get(price);
  return quantity == null ? null : Object.freeze({ price, quantity });
}

/** A book is crossed when both sides are non-empty and best bid >= best ask. */
export function isCrossed(book: OrderbookState): boolean {
  const bid = bestPrice(book.bids, "bid");
  const ask = bestPrice(book.asks, "ask");
  if (bid == null || ask == null) return false;
  return bid >= ask;
}

export function isValidLevel(level: PriceLevel): boolean {
  return (
    Number.isFinite(level.price) &&
    Number.isFinite(level.quantity) &&
    level.price >= 0 &&
    level.quantity >= 0
  );
}

export function sortedLevels(
  levels: Map<number, number>,
  side: Side
): Readonly<PriceLevel>[] {
  const arr = Array.from(levels.entries());
  arr.sort((a, b) => (side === "bid" ? b[0] - a[0] : a[0] - b[0]));
  return arr.map(([price, quantity]) => Object.freeze({ price, quantity }));
}

export function toView(book: OrderbookState): OrderBookView {
  return Object.freeze({
    symbol: book.symbol,
    lastUpdateId: book.lastUpdateId,
    bids: Object.freeze(sortedLevels(book.bids, "bid")),
    asks: Object.freeze(sortedLevels(book.asks, "ask")),
    lastSyncedAt: book.lastSyncedAt,
  });
}

/**
 * Pairs the best `depth` bids and asks row by row. Rows run as deep as the
 * deeper side; the shallower side is padded with nulls.
 */
export function topLevels(view: OrderBookView, depth: number): TopLevel[] {
  const n = Math.min(Math.max(0, Math.floor(depth)), Math.max(view.bids.length, view.asks.length));
  const rows: TopLevel[] = [];
  for (let i = 0; i < n; i++) {
    rows.push({ bid: view.bids[i] ?? null, ask: view.asks[i] ?? null });
  }
  return rows;
}

export function spread(view: OrderBookView): number | null {
  const bid = view.bids[0];
  const ask = view.asks[0];
  if (!bid || !ask) return null;
  return ask.price - bid.price;
}
