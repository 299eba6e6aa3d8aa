import type { ExchangeFeed, MarketTransport, WireDecoder } from "../../../domain/feed/feed.types";
import type { Logger } from "../../../domain/logger";
import { BinanceSpotDecoder } from "./spot.decoder";
import { BinanceSpotTransport, type BinanceSpotTransportOptions } from "./spot.transport";
import type { BinanceDepthUpdateMs } from "./spot.types";

export type BinanceSpotFeedOptions = {
  /** Default: 100 */
  updateMs?: BinanceDepthUpdateMs;
  transport?: MarketTransport;
  decoder?: WireDecoder;
  transportOptions?: Omit<BinanceSpotTransportOptions, "logger">;
  logger?: Logger;
};

/** `"btc/usdt"`, `"BTC-USDT"` and `" btcusdt "` all become `"BTCUSDT"`. */
export function normalizeBinanceSymbol(symbol: string): string {
  const key = symbol.replace(/[\s/_-]+/g, "").toUpperCase();
  if (!/^[A-Z0-9]+$/.test(key)) {
    throw new Error(`Invalid Binance symbol: "${symbol}"`);
  }
  return key;
}

/** Diff-depth stream name, e.g. `btcusdt@depth@100ms`. */
export function binanceDiffTopic(symbol: string, updateMs: BinanceDepthUpdateMs): string {
  const stream = `${symbol.toLowerCase()}@depth`;
  return updateMs === 100 ? `${stream}@100ms` : stream;
}

export function createBinanceSpotFeed(options?: BinanceSpotFeedOptions): ExchangeFeed {
  const updateMs = options?.updateMs ?? 100;
  const transport =
    options?.transport ??
    new BinanceSpotTransport({ ...options?.transportOptions, logger: options?.logger });

  return {
    exchange: "binance-spot",
    transport,
    decoder: options?.decoder ?? new BinanceSpotDecoder(),
    normalizeSymbol: normalizeBinanceSymbol,
    diffTopic: (symbol) => binanceDiffTopic(symbol, updateMs),
  };
}
