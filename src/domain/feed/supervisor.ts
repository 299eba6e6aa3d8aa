import {
  ConnectError,
  DecodeError,
  FeedError,
  FeedStoppedError,
  SnapshotError,
  toError,
} from "../orderbook/errors";
import type { BookSynchronizer } from "../orderbook/synchronizer";
import type { LevelUpdate } from "../orderbook/types";
import type { Logger } from "../logger";
import { RingBuffer } from "../../storage/shared/ringBuffer";
import { abortable, sleep } from "./abort";
import { Backoff, type BackoffOptions } from "./backoff";
import type {
  BookEvent,
  ExchangeFeed,
  FullBookReason,
  MarketStream,
  RawMessage,
} from "./feed.types";
import { FeedState, FeedStateMachine } from "./lifecycle.machine";

export type FeedSupervisorOptions = {
  /** REST snapshot depth. Default: 1000 */
  depthLimit?: number;
  /** Diffs buffered while a snapshot is loading; the oldest are dropped on overflow. Default: 4096 */
  syncBufferCapacity?: number;
  /** How long to wait for the first diff before fetching a snapshot. Default: 1000 */
  firstEventTimeoutMs?: number;
  /** Default: 8 */
  maxConnectAttempts?: number;
  /** Default: 8 */
  maxSnapshotAttempts?: number;
  /** Consecutive undecodable messages tolerated before the stream is replaced. Default: 10 */
  maxConsecutiveDecodeErrors?: number;
  /** Applies to both stream reconnects and snapshot retries. */
  backoff?: BackoffOptions;
  now?: () => number;
};

export type FeedSupervisorHandlers = {
  /** Receives every `FULL_BOOK` and `DELTA` event, in order. */
  onEvent: (event: BookEvent) => void;
  /** Called once when retries are exhausted after the first book was delivered. */
  onTerminated: (error: FeedError) => void;
};

export type FeedStats = {
  symbol: string;
  state: FeedState;
  lastUpdateId: number | null;
  appliedDiffs: number;
  staleDiffs: number;
  decodeErrors: number;
  resyncs: number;
  bufferedDrops: number;
};

type ReplayResult = { ok: true } | { ok: false; reopenStream: boolean; reason: string };

/**
 * Drives one symbol through CONNECTING -> SYNCING -> LIVE and back through
 * RESYNCING whenever a gap, an invalid book or a lost stream is detected.
 */
export class FeedSupervisor {
  readonly symbol: string;

  private readonly feed: ExchangeFeed;
  private readonly synchronizer: BookSynchronizer;
  private readonly logger: Logger;
  private readonly handlers: FeedSupervisorHandlers;

  private readonly depthLimit: number;
  private readonly firstEventTimeoutMs: number;
  private readonly maxConnectAttempts: number;
  private readonly maxSnapshotAttempts: number;
  private readonly maxConsecutiveDecodeErrors: number;
  private readonly backoffOptions: BackoffOptions | undefined;
  private readonly now: () => number;

  private readonly machine: FeedStateMachine;
  private readonly controller = new AbortController();
  private readonly buffered: RingBuffer<LevelUpdate>;

  private stream: MarketStream | null = null;
  /** Bumped whenever the stream is replaced so old reader tasks stand down. */
  private streamGeneration = 0;
  private consecutiveDecodeErrors = 0;
  private startPromise: Promise<void> | null = null;
  private stopped = false;

  private appliedDiffs = 0;
  private staleDiffs = 0;
  private decodeErrors = 0;
  private resyncs = 0;
  private bufferedDrops = 0;

  constructor(args: {
    symbol: string;
    feed: ExchangeFeed;
    synchronizer: BookSynchronizer;
    logger: Logger;
    handlers: FeedSupervisorHandlers;
    options?: FeedSupervisorOptions;
  }) {
    const options = args.options;

    this.symbol = args.symbol;
    this.feed = args.feed;
    this.synchronizer = args.synchronizer;
    this.logger = args.logger.child({ symbol: args.symbol });
    this.handlers = args.handlers;

    this.depthLimit = options?.depthLimit ?? 1000;
    this.firstEventTimeoutMs = Math.max(0, options?.firstEventTimeoutMs ?? 1000);
    this.maxConnectAttempts = Math.max(1, options?.maxConnectAttempts ?? 8);
    this.maxSnapshotAttempts = Math.max(1, options?.maxSnapshotAttempts ?? 8);
    this.maxConsecutiveDecodeErrors = Math.max(1, options?.maxConsecutiveDecodeErrors ?? 10);
    this.backoffOptions = options?.backoff;
    this.now = options?.now ?? Date.now;

    this.buffered = new RingBuffer<LevelUpdate>(options?.syncBufferCapacity ?? 4096);
    this.machine = new FeedStateMachine((from, to) => {
      this.logger.debug("Feed state changed", { from, to });
    });
  }

  get state(): FeedState {
    return this.machine.state;
  }

  /**
   * Opens the stream and loads the first book. Resolves once a `FULL_BOOK`
   * event was emitted; rejects with `ConnectError`, `SnapshotError` or
   * `FeedStoppedError`. Repeated calls share the first call's promise.
   */
  start(): Promise<void> {
    if (!this.startPromise) this.startPromise = this.bootstrap();
    return this.startPromise;
  }

  /** Cancels the reader, pending sleeps and in-flight snapshot fetches, and drops the book. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.controller.abort();
    this.closeStream();
    this.buffered.clear();
    this.synchronizer.discard(this.symbol);
    if (!this.machine.is(FeedState.DISCONNECTED)) {
      this.machine.transition(FeedState.DISCONNECTED);
    }
  }

  stats(): FeedStats {
    return {
      symbol: this.symbol,
      state: this.machine.state,
      lastUpdateId: this.synchronizer.lastUpdateId(this.symbol),
      appliedDiffs: this.appliedDiffs,
      staleDiffs: this.staleDiffs,
      decodeErrors: this.decodeErrors,
      resyncs: this.resyncs,
      bufferedDrops: this.bufferedDrops,
    };
  }

  // ---- bootstrap & resync

  private async bootstrap(): Promise<void> {
    this.machine.transition(FeedState.CONNECTING);
    try {
      await this.synchronize("initial", true);
    } catch (err) {
      const error = this.stopped ? new FeedStoppedError(this.symbol) : this.asFeedError(err);
      if (!this.stopped) {
        this.logger.error("Initial synchronization failed", { err: error });
        this.stop();
      }
      throw error;
    }
  }

  private requestResync(reason: string, reopenStream: boolean): void {
    // Outside LIVE a sync is already running and will notice a lost stream itself.
    if (this.stopped || !this.machine.is(FeedState.LIVE)) return;

    this.logger.warn("Resynchronizing order book", { reason, reopenStream });
    this.synchronizer.discard(this.symbol);
    this.machine.transition(FeedState.RESYNCING);
    this.resyncs++;
    void this.runResync(reopenStream);
  }

  private async runResync(reopenStream: boolean): Promise<void> {
    try {
      await this.synchronize("resync", reopenStream);
    } catch (err) {
      if (this.stopped) return;
      const error = this.asFeedError(err);
      this.logger.error("Resynchronization failed; feed terminated", { err: error });
      this.stop();
      this.handlers.onTerminated(error);
    }
  }

  /**
   * Snapshot-then-replay: (re)open the stream if needed, let it buffer, load a
   * snapshot, replay the buffer on top of it and go LIVE.
   */
  private async synchronize(reason: FullBookReason, reopenStream: boolean): Promise<void> {
    const signal = this.controller.signal;
    const backoff = new Backoff(this.backoffOptions);

    let reopen = reopenStream;
    let snapshotAttempts = 0;
    let lastFailure: unknown = null;

    for (;;) {
      if (reopen || this.stream === null) {
        if (this.machine.is(FeedState.SYNCING)) this.machine.transition(FeedState.CONNECTING);
        await this.connect(signal);
        if (this.machine.is(FeedState.CONNECTING)) this.machine.transition(FeedState.SYNCING);
        reopen = false;
      }

      if (snapshotAttempts >= this.maxSnapshotAttempts) {
        throw new SnapshotError(this.symbol, snapshotAttempts, { cause: lastFailure });
      }

      await this.waitForFirstBufferedDiff(signal);
      snapshotAttempts++;

      let snapshot: LevelUpdate;
      try {
        const raw = await abortable(
          this.feed.transport.fetchSnapshot(this.symbol, this.depthLimit, signal),
          signal
        );
        snapshot = this.feed.decoder.decodeSnapshot(this.symbol, raw);
      } catch (err) {
        if (signal.aborted) throw err;
        lastFailure = err;
        this.logger.warn("Snapshot fetch failed", { attempt: snapshotAttempts, err: toError(err) });
        await sleep(backoff.nextDelay(), signal);
        continue;
      }

      // The stream died while the snapshot was in flight; its buffer is incomplete.
      if (this.stream === null) {
        reopen = true;
        continue;
      }

      const outcome = this.synchronizer.reconcile(this.symbol, snapshot);
      if (outcome.status !== "applied") {
        lastFailure = new Error(`snapshot rejected: ${outcome.status === "invalid" ? outcome.reason : outcome.status}`);
        this.logger.warn("Snapshot rejected", { attempt: snapshotAttempts, outcome: outcome.status });
        await sleep(backoff.nextDelay(), signal);
        continue;
      }

      const replay = this.replayBuffered();
      if (!replay.ok) {
        this.synchronizer.discard(this.symbol);
        lastFailure = new Error(replay.reason);
        reopen = replay.reopenStream;
        this.logger.warn("Buffered diffs do not continue the snapshot", {
          attempt: snapshotAttempts,
          snapshotLastUpdateId: snapshot.lastUpdateId,
          reason: replay.reason,
        });
        await sleep(backoff.nextDelay(), signal);
        continue;
      }

      const book = this.synchronizer.getBook(this.symbol);
      if (!book) throw new Error(`Book for ${this.symbol} vanished after replay`);

      this.machine.transition(FeedState.LIVE);
      this.logger.info("Order book synchronized", { reason, lastUpdateId: book.lastUpdateId });
      this.handlers.onEvent({
        type: "FULL_BOOK",
        symbol: this.symbol,
        timestamp: this.now(),
        reason,
        payload: book,
      });
      return;
    }
  }

  /** Applies buffered diffs to the fresh snapshot in sequence order. */
  private replayBuffered(): ReplayResult {
    const pending = this.buffered.toArray();
    this.buffered.clear();
    pending.sort((a, b) => a.firstUpdateId - b.firstUpdateId);

    for (let i = 0; i < pending.length; i++) {
      const diff = pending[i];
      if (!diff) continue;

      const outcome = this.synchronizer.reconcile(this.symbol, diff);
      switch (outcome.status) {
        case "applied":
          this.appliedDiffs++;
          break;
        case "stale":
          this.staleDiffs++;
          break;
        case "gap":
          // Keep the unapplied tail; a newer snapshot may bridge it.
          for (const rest of pending.slice(i)) this.bufferDiff(rest);
          return {
            ok: false,
            reopenStream: false,
            reason: `expected update ${outcome.expectedFirstUpdateId ?? "?"}, buffered diff starts at ${outcome.firstUpdateId}`,
          };
        case "invalid":
          return { ok: false, reopenStream: true, reason: outcome.reason };
      }
    }

    return { ok: true };
  }

  private async waitForFirstBufferedDiff(signal: AbortSignal): Promise<void> {
    const start = Date.now();
    while (
      this.buffered.isEmpty &&
      this.stream !== null &&
      Date.now() - start < this.firstEventTimeoutMs
    ) {
      await sleep(10, signal);
    }
  }

  // ---- stream

  private async connect(signal: AbortSignal): Promise<void> {
    this.closeStream();

    const topic = this.feed.diffTopic(this.symbol);
    const backoff = new Backoff(this.backoffOptions);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxConnectAttempts; attempt++) {
      try {
        const stream = await this.feed.transport.openStream(topic, signal);
        if (signal.aborted) {
          stream.close();
          throw new FeedStoppedError(this.symbol);
        }
        this.attachStream(stream);
        this.logger.debug("Stream opened", { topic, attempt });
        return;
      } catch (err) {
        if (signal.aborted) throw err;
        lastError = err;
        this.logger.warn("Stream open failed", { topic, attempt, err: toError(err) });
        if (attempt < this.maxConnectAttempts) await sleep(backoff.nextDelay(), signal);
      }
    }

    throw new ConnectError(this.symbol, this.maxConnectAttempts, { cause: lastError });
  }

  private attachStream(stream: MarketStream): void {
    this.streamGeneration++;
    this.stream = stream;
    this.buffered.clear();
    this.consecutiveDecodeErrors = 0;
    void this.readStream(stream, this.streamGeneration);
  }

  private closeStream(): void {
    if (!this.stream) return;
    this.streamGeneration++;
    const stream = this.stream;
    this.stream = null;
    stream.close();
  }

  private async readStream(stream: MarketStream, generation: number): Promise<void> {
    let failure: Error | null = null;
    try {
      for await (const raw of stream) {
        if (generation !== this.streamGeneration) return;
        this.onRawMessage(raw);
      }
    } catch (err) {
      failure = toError(err);
    }

    if (generation !== this.streamGeneration || this.stopped) return;
    this.onStreamLost(failure);
  }

  private onStreamLost(failure: Error | null): void {
    this.logger.warn("Stream lost", { err: failure ?? undefined, state: this.machine.state });
    this.closeStream();
    this.requestResync("stream lost", true);
  }

  private onRawMessage(raw: RawMessage): void {
    let update: LevelUpdate;
    try {
      update = this.feed.decoder.decodeDiff(raw);
    } catch (err) {
      this.onDecodeError(err);
      return;
    }
    this.consecutiveDecodeErrors = 0;

    if (update.symbol !== this.symbol) {
      this.logger.debug("Ignoring diff for another symbol", { received: update.symbol });
      return;
    }

    if (this.machine.is(FeedState.LIVE)) this.applyLive(update);
    else this.bufferDiff(update);
  }

  private onDecodeError(err: unknown): void {
    this.decodeErrors++;
    this.consecutiveDecodeErrors++;

    const error = err instanceof DecodeError ? err : new DecodeError(this.symbol, toError(err).message, { cause: err });
    this.logger.debug("Dropped undecodable message", { err: error, consecutive: this.consecutiveDecodeErrors });

    if (this.consecutiveDecodeErrors < this.maxConsecutiveDecodeErrors) return;

    this.logger.warn("Too many consecutive decode errors; replacing stream", {
      consecutive: this.consecutiveDecodeErrors,
    });
    this.consecutiveDecodeErrors = 0;
    this.closeStream();
    this.requestResync("decode errors", true);
  }

  private applyLive(update: LevelUpdate): void {
    const outcome = this.synchronizer.reconcile(this.symbol, update);
    switch (outcome.status) {
      case "applied":
        if (outcome.kind !== "diff") return;
        this.appliedDiffs++;
        this.handlers.onEvent({
          type: "DELTA",
          symbol: this.symbol,
          timestamp: this.now(),
          payload: outcome.delta,
        });
        return;
      case "stale":
        this.staleDiffs++;
        return;
      case "gap":
        // The diff is still newer than anything applied; replay it on the next snapshot.
        this.bufferDiff(update);
        this.requestResync(
          `sequence gap: expected ${outcome.expectedFirstUpdateId ?? "?"}, got ${outcome.firstUpdateId}`,
          false
        );
        return;
      case "invalid":
        this.logger.error("Diff produced an invalid book", { reason: outcome.reason });
        this.requestResync(outcome.reason, false);
        return;
    }
  }

  private bufferDiff(update: LevelUpdate): void {
    if (this.buffered.pushEvicting(update)) this.bufferedDrops++;
  }

  private asFeedError(err: unknown): FeedError {
    if (err instanceof FeedError) return err;
    return new SnapshotError(this.symbol, 0, { cause: err });
  }
}
