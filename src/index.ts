export * from "./domain/orderbook/types";
export * from "./domain/orderbook/errors";
export { topLevels, spread } from "./domain/orderbook/book";
export { BookSynchronizer, type BookSynchronizerOptions } from "./domain/orderbook/synchronizer";

export type * from "./domain/feed/feed.types";
export type { Logger } from "./domain/logger";
export { Backoff, type BackoffOptions } from "./domain/feed/backoff";
export { FeedState, FEED_TRANSITIONS, canTransition } from "./domain/feed/lifecycle.machine";
export {
  FeedSupervisor,
  type FeedStats,
  type FeedSupervisorHandlers,
  type FeedSupervisorOptions,
} from "./domain/feed/supervisor";
export {
  SubscriptionRegistry,
  type Subscription,
  type SubscriptionRegistryOptions,
  type SymbolStats,
} from "./domain/feed/registry";
export { BoundedEventQueue } from "./storage/shared/eventQueue";

export {
  createBinanceSpotFeed,
  normalizeBinanceSymbol,
  binanceDiffTopic,
  type BinanceSpotFeedOptions,
} from "./infra/exchanges/binance/spot.feed";
export { BinanceSpotDecoder } from "./infra/exchanges/binance/spot.decoder";
export { BinanceSpotTransport, type BinanceSpotTransportOptions } from "./infra/exchanges/binance/spot.transport";
export { toBinanceSnapshotLimit, type BinanceDepthUpdateMs } from "./infra/exchanges/binance/spot.types";
export { PinoLogger, type PinoLoggerOptions } from "./infra/logger/pino.logger";
