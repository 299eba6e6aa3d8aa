import { topLevels } from "../orderbook/book";
import { FeedStoppedError, type FeedError } from "../orderbook/errors";
import { BookSynchronizer } from "../orderbook/synchronizer";
import type { OrderBookView, TopLevel } from "../orderbook/types";
import type { Logger } from "../logger";
import { BoundedEventQueue } from "../../storage/shared/eventQueue";
import type { BookEvent, ExchangeFeed } from "./feed.types";
import { FeedSupervisor, type FeedStats, type FeedSupervisorOptions } from "./supervisor";

export type SubscriptionRegistryOptions = {
  /** Events held per subscriber before the oldest are evicted. Default: 1024 */
  queueCapacity?: number;
  supervisor?: FeedSupervisorOptions;
  now?: () => number;
};

/** Leaving a `for await` over `events` early unsubscribes. */
export type Subscription = {
  readonly id: string;
  readonly symbol: string;
  readonly events: BoundedEventQueue<BookEvent>;
  readonly createdAt: number;
};

export type SymbolStats = FeedStats & {
  subscribers: number;
  droppedEvents: number;
};

type SymbolEntry = {
  symbol: string;
  supervisor: FeedSupervisor;
  subscribers: Map<string, Subscription>;
  /** Settles when the first book lands or the first start fails. */
  ready: Promise<void>;
  live: boolean;
};

/**
 * Maps symbols to subscriber queues and runs one supervisor per subscribed symbol.
 *
 * All bookkeeping is synchronous, so calls for one symbol are linearized and
 * calls for different symbols never wait on each other. Fan-out never blocks:
 * a full subscriber queue loses its oldest event.
 */
export class SubscriptionRegistry {
  readonly #feed: ExchangeFeed;
  readonly #logger: Logger;
  readonly #queueCapacity: number;
  readonly #supervisorOptions: FeedSupervisorOptions | undefined;
  readonly #now: () => number;

  readonly #synchronizer: BookSynchronizer;
  readonly #entries: Map<string, SymbolEntry> = new Map();
  readonly #symbolBySubscription: Map<string, string> = new Map();

  #nextId = 1;
  #closed = false;

  constructor(feed: ExchangeFeed, logger: Logger, options?: SubscriptionRegistryOptions) {
    this.#feed = feed;
    this.#logger = logger.child({ exchange: feed.exchange });
    this.#queueCapacity = options?.queueCapacity ?? 1024;
    this.#supervisorOptions = options?.supervisor;
    this.#now = options?.now ?? Date.now;
    this.#synchronizer = new BookSynchronizer({ now: this.#now });
  }

  /**
   * Adds a subscriber. The first subscriber of a symbol starts its feed and
   * waits for the initial book; later subscribers share that start, and those
   * joining a live symbol get the current book as their first event.
   */
  async subscribe(symbol: string): Promise<Subscription> {
    if (this.#closed) throw new Error("SubscriptionRegistry is closed");

    const key = this.#feed.normalizeSymbol(symbol);
    const existing = this.#entries.get(key);
    const entry = existing ?? this.#startEntry(key);
    const subscription = this.#createSubscription(key);

    if (entry.live) {
      const book = this.#synchronizer.getBook(key);
      if (book) {
        subscription.events.push({
          type: "FULL_BOOK",
          symbol: key,
          timestamp: this.#now(),
          reason: "join",
          payload: book,
        });
      }
    }

    entry.subscribers.set(subscription.id, subscription);
    this.#symbolBySubscription.set(subscription.id, key);
    this.#logger.debug("Subscribed", { symbol: key, subscriptionId: subscription.id });

    try {
      await entry.ready;
    } catch (err) {
      this.#symbolBySubscription.delete(subscription.id);
      entry.subscribers.delete(subscription.id);
      subscription.events.close();
      throw err;
    }

    return subscription;
  }

  /** Removes a subscriber and tears the symbol down when it was the last one. */
  unsubscribe(subscriptionId: string): boolean {
    const key = this.#symbolBySubscription.get(subscriptionId);
    if (key === undefined) return false;
    this.#symbolBySubscription.delete(subscriptionId);

    const entry = this.#entries.get(key);
    const subscription = entry?.subscribers.get(subscriptionId);
    if (!entry || !subscription) return false;

    entry.subscribers.delete(subscriptionId);
    subscription.events.close();
    this.#logger.debug("Unsubscribed", { symbol: key, subscriptionId });

    if (entry.subscribers.size === 0) {
      this.#entries.delete(key);
      entry.supervisor.stop();
      this.#logger.info("Last subscriber left; feed stopped", { symbol: key });
    }
    return true;
  }

  getOrderBook(symbol: string): OrderBookView | undefined {
    return this.#synchronizer.getBook(this.#feed.normalizeSymbol(symbol));
  }

  /** Paired best `depth` bid/ask rows, or an empty list when there is no book. */
  topLevels(symbol: string, depth: number): TopLevel[] {
    const view = this.getOrderBook(symbol);
    return view ? topLevels(view, depth) : [];
  }

  symbols(): string[] {
    return Array.from(this.#entries.keys());
  }

  stats(): SymbolStats[] {
    return Array.from(this.#entries.values()).map((entry) => {
      let droppedEvents = 0;
      for (const sub of entry.subscribers.values()) droppedEvents += sub.events.dropped;
      return {
        ...entry.supervisor.stats(),
        subscribers: entry.subscribers.size,
        droppedEvents,
      };
    });
  }

  /** Stops every feed and closes every queue. Pending `subscribe` calls reject. */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    for (const entry of this.#entries.values()) {
      entry.supervisor.stop();
      for (const sub of entry.subscribers.values()) sub.events.close();
    }
    this.#entries.clear();
    this.#symbolBySubscription.clear();
  }

  #startEntry(symbol: string): SymbolEntry {
    const supervisor = new FeedSupervisor({
      symbol,
      feed: this.#feed,
      synchronizer: this.#synchronizer,
      logger: this.#logger,
      options: this.#supervisorOptions,
      handlers: {
        onEvent: (event) => this.#fanOut(entry, event),
        onTerminated: (error) => this.#terminate(entry, error),
      },
    });

    const entry: SymbolEntry = {
      symbol,
      supervisor,
      subscribers: new Map(),
      ready: Promise.resolve(),
      live: false,
    };

    entry.ready = supervisor.start().then(
      () => {
        entry.live = true;
      },
      (err: unknown) => {
        this.#forget(entry);
        throw err instanceof Error ? err : new FeedStoppedError(symbol);
      }
    );

    this.#entries.set(symbol, entry);
    return entry;
  }

  #createSubscription(symbol: string): Subscription {
    const id = `sub-${this.#nextId++}`;
    const events = new BoundedEventQueue<BookEvent>(this.#queueCapacity, {
      onOverflow: (_evicted, dropped) => {
        if (dropped === 1) {
          this.#logger.warn("Subscriber is falling behind; dropping oldest events", {
            symbol,
            subscriptionId: id,
            capacity: this.#queueCapacity,
          });
        }
      },
      onReturn: () => {
        this.unsubscribe(id);
      },
    });
    return { id, symbol, events, createdAt: this.#now() };
  }

  #fanOut(entry: SymbolEntry, event: BookEvent): void {
    for (const sub of entry.subscribers.values()) sub.events.push(event);
  }

  #terminate(entry: SymbolEntry, error: FeedError): void {
    const event: BookEvent = {
      type: "TERMINATED",
      symbol: entry.symbol,
      timestamp: this.#now(),
      payload: { error },
    };
    for (const sub of entry.subscribers.values()) {
      sub.events.push(event);
      sub.events.close();
    }
    this.#forget(entry);
  }

  /** Drops the entry and its subscription ids, if it is still the registered one. */
  #forget(entry: SymbolEntry): void {
    if (this.#entries.get(entry.symbol) === entry) this.#entries.delete(entry.symbol);
    for (const id of entry.subscribers.keys()) this.#symbolBySubscription.delete(id);
    entry.subscribers.clear();
  }
}
