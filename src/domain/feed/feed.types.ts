import type { FeedError } from "../orderbook/errors";
import type {
  LevelUpdate,
  OrderBookDelta,
  OrderBookView,
} from "../orderbook/types";

/** One undecoded message as it came off the wire. */
export type RawMessage = string | Buffer | ArrayBuffer | Buffer[];

/**
 * Messages of one open stream, in arrival order.
 *
 * Iteration ends when the stream closes and throws when it fails.
 */
export interface MarketStream extends AsyncIterable<RawMessage> {
  close(): void;
}

export interface MarketTransport {
  /** Resolves once the stream is open. Rejects when it cannot be opened. */
  openStream(topic: string, signal: AbortSignal): Promise<MarketStream>;
  /** Resolves to the undecoded REST depth payload. */
  fetchSnapshot(symbol: string, depthLimit: number, signal: AbortSignal): Promise<unknown>;
}

export interface WireDecoder {
  /** Throws `DecodeError` on malformed input. */
  decodeSnapshot(symbol: string, raw: unknown): LevelUpdate;
  /** Throws `DecodeError` on malformed input. */
  decodeDiff(raw: unknown): LevelUpdate;
}

/**
 * One exchange: a transport and a decoder that understand each other, plus the
 * exchange's naming rules. Add an exchange by providing another value of this type.
 */
export interface ExchangeFeed {
  readonly exchange: string;
  readonly transport: MarketTransport;
  readonly decoder: WireDecoder;
  /** Canonical symbol used as the registry key, e.g. `"btc/usdt"` -> `"BTCUSDT"`. */
  normalizeSymbol(symbol: string): string;
  /** Stream topic carrying the symbol's depth diffs. */
  diffTopic(symbol: string): string;
}

export type FullBookReason = "initial" | "resync" | "join";

export type BookEvent =
  | {
      type: "FULL_BOOK";
      symbol: string;
      timestamp: number;
      reason: FullBookReason;
      payload: OrderBookView;
    }
  | {
      type: "DELTA";
      symbol: string;
      timestamp: number;
      payload: OrderBookDelta;
    }
  | {
      type: "TERMINATED";
      symbol: string;
      timestamp: number;
      payload: { error: FeedError };
    };
