import {
  applyLevel,
  bestLevel,
  createBook,
  isCrossed,
  isValidLevel,
  rebuildFromSnapshot,
  toView,
} from "./book";
import type {
  LevelUpdate,
  OrderBookView,
  OrderbookState,
  PriceLevel,
  ReconcileOutcome,
} from "./types";

export type BookSynchronizerOptions = {
  /** Clock used for `lastSyncedAt`. Defaults to `Date.now`. */
  now?: () => number;
};

function firstInvalidLevel(levels: readonly PriceLevel[]): PriceLevel | null {
  for (const level of levels) {
    if (!isValidLevel(level)) return level;
  }
  return null;
}

function frozenLevels(levels: readonly PriceLevel[]): Readonly<PriceLevel>[] {
  return levels.map((l) => Object.freeze({ price: l.price, quantity: l.quantity }));
}

/**
 * Owns one book per symbol and merges snapshots and diffs into it.
 *
 * Every call to `reconcile` runs to completion synchronously, so a book is never
 * observed half-updated. Books only leave this class as frozen views or deltas.
 */
export class BookSynchronizer {
  readonly #books: Map<string, OrderbookState> = new Map();
  readonly #now: () => number;

  constructor(options?: BookSynchronizerOptions) {
    this.#now = options?.now ?? Date.now;
  }

  reconcile(symbol: string, update: LevelUpdate): ReconcileOutcome {
    if (update.kind === "snapshot") return this.#applySnapshot(symbol, update);
    return this.#applyDiff(symbol, update);
  }

  getBook(symbol: string): OrderBookView | undefined {
    const book = this.#books.get(symbol);
    return book ? toView(book) : undefined;
  }

  hasBook(symbol: string): boolean {
    return this.#books.has(symbol);
  }

  lastUpdateId(symbol: string): number | null {
    return this.#books.get(symbol)?.lastUpdateId ?? null;
  }

  /** Drops the symbol's book. Returns whether one existed. */
  discard(symbol: string): boolean {
    return this.#books.delete(symbol);
  }

  symbols(): string[] {
    return Array.from(this.#books.keys());
  }

  #applySnapshot(symbol: string, update: LevelUpdate): ReconcileOutcome {
    if (!Number.isSafeInteger(update.lastUpdateId) || update.lastUpdateId < 0) {
      this.#books.delete(symbol);
      return {
        status: "invalid",
        reason: `snapshot sequence ${update.lastUpdateId} is not a non-negative integer`,
      };
    }

    const bad = firstInvalidLevel(update.bids) ?? firstInvalidLevel(update.asks);
    if (bad) {
      this.#books.delete(symbol);
      return {
        status: "invalid",
        reason: `snapshot level ${bad.price}@${bad.quantity} is negative or not finite`,
      };
    }

    const book = createBook(symbol);
    rebuildFromSnapshot({
      book,
      bids: update.bids,
      asks: update.asks,
      lastUpdateId: update.lastUpdateId,
      syncedAt: this.#now(),
    });

    if (isCrossed(book)) {
      this.#books.delete(symbol);
      return { status: "invalid", reason: "snapshot produced a crossed book" };
    }

    this.#books.set(symbol, book);
    return { status: "applied", kind: "snapshot", book: toView(book) };
  }

  #applyDiff(symbol: string, update: LevelUpdate): ReconcileOutcome {
    const book = this.#books.get(symbol);
    if (!book) {
      return { status: "gap", expectedFirstUpdateId: null, firstUpdateId: update.firstUpdateId };
    }

    // Already applied, or a late duplicate.
    if (update.lastUpdateId <= book.lastUpdateId) return { status: "stale" };

    const expected = book.lastUpdateId + 1;
    if (update.firstUpdateId > expected) {
      this.#books.delete(symbol);
      return { status: "gap", expectedFirstUpdateId: expected, firstUpdateId: update.firstUpdateId };
    }

    const bad = firstInvalidLevel(update.bids) ?? firstInvalidLevel(update.asks);
    if (bad) {
      this.#books.delete(symbol);
      return {
        status: "invalid",
        reason: `diff level ${bad.price}@${bad.quantity} is negative or not finite`,
      };
    }

    for (const level of update.bids) applyLevel(book.bids, level.price, level.quantity);
    for (const level of update.asks) applyLevel(book.asks, level.price, level.quantity);
    book.lastUpdateId = update.lastUpdateId;
    book.lastSyncedAt = this.#now();

    if (isCrossed(book)) {
      this.#books.delete(symbol);
      return {
        status: "invalid",
        reason: `diff ${update.firstUpdateId}-${update.lastUpdateId} produced a crossed book`,
      };
    }

    return {
      status: "applied",
      kind: "diff",
      delta: Object.freeze({
        symbol,
        firstUpdateId: update.firstUpdateId,
        lastUpdateId: update.lastUpdateId,
        bids: Object.freeze(frozenLevels(update.bids)),
        asks: Object.freeze(frozenLevels(update.asks)),
        bestBid: bestLevel(book.bids, "bid"),
        bestAsk: bestLevel(book.asks, "ask"),
      }),
    };
  }
}
