import { afterEach, describe, expect, test } from "@jest/globals";
import { createBinanceSpotFeed } from "../../infra/exchanges/binance/spot.feed";
import {
  FakeTransport,
  createMockLogger,
  depthSnapshot,
  depthUpdate,
  flush,
  waitFor,
} from "../../testing/fake.transport";
import {
  ConnectError,
  FeedStoppedError,
  SnapshotError,
  type FeedError,
} from "../orderbook/errors";
import { BookSynchronizer } from "../orderbook/synchronizer";
import type { BookEvent } from "./feed.types";
import { FeedState } from "./lifecycle.machine";
import { FeedSupervisor, type FeedSupervisorOptions } from "./supervisor";

const SYMBOL = "BTCUSDT";

const running: FeedSupervisor[] = [];

function setup(options?: FeedSupervisorOptions) {
  const transport = new FakeTransport();
  const synchronizer = new BookSynchronizer();
  const logger = createMockLogger();
  const events: BookEvent[] = [];
  const terminated: FeedError[] = [];

  const supervisor = new FeedSupervisor({
    symbol: SYMBOL,
    feed: createBinanceSpotFeed({ transport }),
    synchronizer,
    logger,
    handlers: {
      onEvent: (event) => events.push(event),
      onTerminated: (error) => terminated.push(error),
    },
    options: { firstEventTimeoutMs: 0, backoff: { initialMs: 1, maxMs: 2 }, ...options },
  });
  running.push(supervisor);

  return { transport, synchronizer, logger, events, terminated, supervisor };
}

function stream(transport: FakeTransport) {
  const s = transport.lastStream;
  if (!s) throw new Error("no stream was opened");
  return s;
}

afterEach(() => {
  for (const supervisor of running.splice(0)) supervisor.stop();
});

describe("FeedSupervisor initial sync", () => {
  test("buffers diffs during the snapshot fetch and replays them", async () => {
    const { transport, events, supervisor } = setup();
    const started = supervisor.start();

    await waitFor(() => transport.pendingSnapshots === 1);
    expect(supervisor.state).toBe(FeedState.SYNCING);
    expect(stream(transport).topic).toBe("btcusdt@depth@100ms");

    stream(transport).emit(depthUpdate({ U: 99, u: 101, bids: [["100", "2"]] }));
    stream(transport).emit(depthUpdate({ U: 102, u: 102, asks: [["101", "3"]] }));
    await flush();

    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await started;

    expect(supervisor.state).toBe(FeedState.LIVE);
    expect(events).toHaveLength(1);
    const [first] = events;
    expect(first?.type).toBe("FULL_BOOK");
    if (first?.type !== "FULL_BOOK") return;
    expect(first.reason).toBe("initial");
    expect(first.payload.lastUpdateId).toBe(102);
    expect(first.payload.bids).toEqual([{ price: 100, quantity: 2 }]);
    expect(first.payload.asks).toEqual([{ price: 101, quantity: 3 }]);
    expect(transport.snapshotRequests).toEqual([{ symbol: SYMBOL, depthLimit: 1000 }]);
    expect(supervisor.stats().appliedDiffs).toBe(2);
  });

  test("emits a DELTA for each live diff", async () => {
    const { transport, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await supervisor.start();

    stream(transport).emit(depthUpdate({ U: 101, u: 101, bids: [["100", "0"]] }));
    await waitFor(() => events.length === 2);

    const delta = events[1];
    expect(delta?.type).toBe("DELTA");
    if (delta?.type !== "DELTA") return;
    expect(delta.payload).toEqual({
      symbol: SYMBOL,
      firstUpdateId: 101,
      lastUpdateId: 101,
      bids: [{ price: 100, quantity: 0 }],
      asks: [],
      bestBid: null,
      bestAsk: { price: 101, quantity: 2 },
    });
  });

  test("re-fetches the snapshot when it is older than the buffered diffs", async () => {
    const { transport, events, supervisor } = setup();
    const started = supervisor.start();

    await waitFor(() => transport.pendingSnapshots === 1);
    stream(transport).emit(depthUpdate({ U: 110, u: 112, bids: [["99", "4"]] }));
    await flush();

    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await waitFor(() => transport.snapshotRequests.length === 2 && transport.pendingSnapshots === 1);
    expect(events).toHaveLength(0);

    transport.pushSnapshot(depthSnapshot(111, [["100", "1"]], [["101", "2"]]));
    await started;

    const first = events[0];
    if (first?.type !== "FULL_BOOK") throw new Error("expected FULL_BOOK");
    expect(first.payload.lastUpdateId).toBe(112);
    expect(first.payload.bids).toEqual([
      { price: 100, quantity: 1 },
      { price: 99, quantity: 4 },
    ]);
  });

  test("counts stale diffs and ignores other symbols", async () => {
    const { transport, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await supervisor.start();

    stream(transport).emit(depthUpdate({ U: 95, u: 100 }));
    stream(transport).emit(depthUpdate({ symbol: "ETHUSDT", U: 101, u: 101 }));
    stream(transport).emit(depthUpdate({ U: 101, u: 101 }));
    await waitFor(() => events.length === 2);

    expect(events.map((e) => e.type)).toEqual(["FULL_BOOK", "DELTA"]);
    expect(supervisor.stats()).toMatchObject({
      state: FeedState.LIVE,
      lastUpdateId: 101,
      staleDiffs: 1,
      appliedDiffs: 1,
    });
  });
});

describe("FeedSupervisor sync buffer", () => {
  test("drops the oldest buffered diffs and still goes live on a newer snapshot", async () => {
    const { transport, events, supervisor } = setup({ syncBufferCapacity: 3 });
    const started = supervisor.start();

    await waitFor(() => transport.pendingSnapshots === 1);
    for (let id = 101; id <= 108; id++) {
      stream(transport).emit(depthUpdate({ U: id, u: id, bids: [[String(id - 10), "1"]] }));
    }
    await waitFor(() => supervisor.stats().bufferedDrops === 5);

    transport.pushSnapshot(depthSnapshot(105, [], [["200", "1"]]));
    await started;

    expect(supervisor.state).toBe(FeedState.LIVE);
    expect(supervisor.stats()).toMatchObject({ bufferedDrops: 5, lastUpdateId: 108, appliedDiffs: 3 });
    const first = events[0];
    if (first?.type !== "FULL_BOOK") throw new Error("expected FULL_BOOK");
    expect(first.payload.bids.map((level) => level.price)).toEqual([98, 97, 96]);
  });
});

describe("FeedSupervisor resync", () => {
  test("a sequence gap resynchronizes on the same stream", async () => {
    const { transport, synchronizer, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await supervisor.start();

    stream(transport).emit(depthUpdate({ U: 105, u: 106, asks: [["102", "1"]] }));
    await waitFor(() => transport.pendingSnapshots === 1);

    expect(supervisor.state).toBe(FeedState.RESYNCING);
    expect(synchronizer.hasBook(SYMBOL)).toBe(false);

    transport.pushSnapshot(depthSnapshot(104, [["99", "1"]], [["103", "1"]]));
    await waitFor(() => events.length === 2);

    const resync = events[1];
    if (resync?.type !== "FULL_BOOK") throw new Error("expected FULL_BOOK");
    expect(resync.reason).toBe("resync");
    expect(resync.payload.lastUpdateId).toBe(106);
    expect(resync.payload.asks).toEqual([
      { price: 102, quantity: 1 },
      { price: 103, quantity: 1 },
    ]);
    expect(transport.streams).toHaveLength(1);
    expect(supervisor.stats().resyncs).toBe(1);
    expect(supervisor.state).toBe(FeedState.LIVE);
  });

  test("a lost stream is replaced and the book reloaded", async () => {
    const { transport, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100));
    await supervisor.start();

    const first = stream(transport);
    first.fail();
    await waitFor(() => transport.streams.length === 2 && transport.pendingSnapshots === 1);
    expect(first.closed).toBe(true);

    transport.pushSnapshot(depthSnapshot(200));
    await waitFor(() => events.length === 2);

    const resync = events[1];
    if (resync?.type !== "FULL_BOOK") throw new Error("expected FULL_BOOK");
    expect(resync.reason).toBe("resync");
    expect(resync.payload.lastUpdateId).toBe(200);
  });

  test("too many undecodable messages replace the stream", async () => {
    const { transport, supervisor } = setup({ maxConsecutiveDecodeErrors: 2 });
    transport.pushSnapshot(depthSnapshot(100));
    await supervisor.start();

    stream(transport).emit("not json");
    await flush();
    expect(transport.streams).toHaveLength(1);

    stream(transport).emit("{}");
    await waitFor(() => transport.streams.length === 2);

    expect(supervisor.stats().decodeErrors).toBe(2);
    expect(supervisor.state).toBe(FeedState.RESYNCING);
  });

  test("a diff that crosses the book resynchronizes like a gap", async () => {
    const { transport, synchronizer, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100, [["100", "1"]], [["101", "2"]]));
    await supervisor.start();

    stream(transport).emit(depthUpdate({ U: 101, u: 101, bids: [["102", "1"]] }));
    await waitFor(() => transport.pendingSnapshots === 1);

    expect(supervisor.state).toBe(FeedState.RESYNCING);
    expect(supervisor.stats().resyncs).toBe(1);
    expect(synchronizer.hasBook(SYMBOL)).toBe(false);

    transport.pushSnapshot(depthSnapshot(101, [["100", "1"]], [["101", "2"]]));
    await waitFor(() => events.length === 2);

    expect(events.map((e) => (e.type === "FULL_BOOK" ? `FULL_BOOK:${e.reason}` : e.type))).toEqual([
      "FULL_BOOK:initial",
      "FULL_BOOK:resync",
    ]);
    expect(transport.streams).toHaveLength(1);
    expect(supervisor.state).toBe(FeedState.LIVE);
  });

  test("exhausted retries during a resync terminate the feed", async () => {
    const { transport, terminated, supervisor } = setup({ maxSnapshotAttempts: 1 });
    transport.pushSnapshot(depthSnapshot(100));
    await supervisor.start();

    transport.failSnapshot(new Error("HTTP 503"));
    stream(transport).emit(depthUpdate({ U: 150, u: 151 }));
    await waitFor(() => terminated.length === 1);

    const [error] = terminated;
    expect(error).toBeInstanceOf(SnapshotError);
    expect(error?.message).toBe("Failed to synchronize snapshot for BTCUSDT after 1 attempt(s)");
    expect(supervisor.state).toBe(FeedState.DISCONNECTED);
    expect(stream(transport).closed).toBe(true);
  });
});

describe("FeedSupervisor failures", () => {
  test("keeps the message of a non-Error snapshot rejection", async () => {
    const { transport, logger, supervisor } = setup();
    const started = supervisor.start();

    await waitFor(() => transport.pendingSnapshots === 1);
    transport.failSnapshot({ code: -1121, message: "Invalid symbol." });
    transport.pushSnapshot(depthSnapshot(100));
    await started;

    const call = logger.warn.mock.calls.find(([msg]) => msg === "Snapshot fetch failed");
    expect(call?.[1]).toMatchObject({
      attempt: 1,
      err: expect.objectContaining({ message: "Invalid symbol." }),
    });
  });

  test("retries opening the stream", async () => {
    const { transport, logger, supervisor } = setup({ maxConnectAttempts: 3 });
    transport.openFailures = 2;
    transport.pushSnapshot(depthSnapshot(100));

    await supervisor.start();

    expect(transport.streams).toHaveLength(1);
    expect(logger.warn.mock.calls.filter(([msg]) => msg === "Stream open failed")).toHaveLength(2);
  });

  test("rejects with ConnectError once connect attempts run out", async () => {
    const { transport, supervisor } = setup({ maxConnectAttempts: 3 });
    transport.openFailures = 3;

    const started = supervisor.start();
    await expect(started).rejects.toBeInstanceOf(ConnectError);
    await expect(started).rejects.toThrow("Failed to open stream for BTCUSDT after 3 attempt(s)");
    expect(supervisor.state).toBe(FeedState.DISCONNECTED);
  });

  test("rejects with SnapshotError once snapshot attempts run out", async () => {
    const { transport, supervisor } = setup({ maxSnapshotAttempts: 2 });
    transport.failSnapshot(new Error("HTTP 500"));
    transport.failSnapshot(new Error("HTTP 500"));

    const started = supervisor.start();
    await expect(started).rejects.toBeInstanceOf(SnapshotError);
    await expect(started).rejects.toThrow("Failed to synchronize snapshot for BTCUSDT after 2 attempt(s)");
    expect(transport.snapshotRequests).toHaveLength(2);
  });

  test("a rejected snapshot is retried", async () => {
    const { transport, events, supervisor } = setup();
    transport.pushSnapshot(depthSnapshot(100, [["105", "1"]], [["101", "1"]]));
    transport.pushSnapshot(depthSnapshot(101, [["100", "1"]], [["101", "1"]]));

    await supervisor.start();

    expect(transport.snapshotRequests).toHaveLength(2);
    const first = events[0];
    if (first?.type !== "FULL_BOOK") throw new Error("expected FULL_BOOK");
    expect(first.payload.lastUpdateId).toBe(101);
  });

  test("stop during the initial sync rejects with FeedStoppedError", async () => {
    const { transport, events, supervisor } = setup();
    const started = supervisor.start();
    await waitFor(() => transport.pendingSnapshots === 1);

    supervisor.stop();
    await expect(started).rejects.toBeInstanceOf(FeedStoppedError);

    transport.pushSnapshot(depthSnapshot(100));
    await flush();
    expect(events).toHaveLength(0);
    expect(supervisor.state).toBe(FeedState.DISCONNECTED);
    expect(stream(transport).closed).toBe(true);
  });

  test("start is idempotent", () => {
    const { supervisor } = setup();
    const a = supervisor.start();
    expect(supervisor.start()).toBe(a);
    supervisor.stop();
    return expect(a).rejects.toBeInstanceOf(FeedStoppedError);
  });
});
