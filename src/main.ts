import { format } from "date-fns";
import { parseEnv, loadFeedConfig } from "./env";
import { spread } from "./domain/orderbook/book";
import { FeedError } from "./domain/orderbook/errors";
import { SubscriptionRegistry, type Subscription } from "./domain/feed/registry";
import { createBinanceSpotFeed } from "./infra/exchanges/binance/spot.feed";
import { PinoLogger } from "./infra/logger/pino.logger";
import type { TopLevel } from "./domain/orderbook/types";

const appEnv = parseEnv(process.env);
const config = loadFeedConfig(appEnv);

const logger = new PinoLogger({
  name: "book-replica",
  level: appEnv.LOG_LEVEL,
  pretty: appEnv.NODE_ENV !== "production",
});

const registry = new SubscriptionRegistry(
  createBinanceSpotFeed({ updateMs: config.updateMs, logger }),
  logger,
  config.registry
);

const eventCounts = new Map<string, number>();

function fmtRow(row: TopLevel): string {
  const bid = row.bid ? `${row.bid.quantity} @ ${row.bid.price}` : "-";
  const ask = row.ask ? `${row.ask.price} x ${row.ask.quantity}` : "-";
  return `${bid.padStart(28)} | ${ask}`;
}

async function consume(sub: Subscription): Promise<void> {
  for await (const event of sub.events) {
    eventCounts.set(sub.symbol, (eventCounts.get(sub.symbol) ?? 0) + 1);
    if (event.type === "FULL_BOOK") {
      logger.info("Full book", {
        symbol: event.symbol,
        reason: event.reason,
        lastUpdateId: event.payload.lastUpdateId,
      });
    } else if (event.type === "TERMINATED") {
      logger.error("Feed terminated", { symbol: event.symbol, err: event.payload.error });
    }
  }
}

function report(): void {
  for (const symbol of registry.symbols()) {
    const view = registry.getOrderBook(symbol);
    if (!view) continue;

    const rows = registry.topLevels(symbol, config.displayDepth);
    logger.info("Top of book", {
      symbol,
      at: format(view.lastSyncedAt, "HH:mm:ss.SSS"),
      lastUpdateId: view.lastUpdateId,
      bestBid: rows[0]?.bid?.price ?? null,
      bestAsk: rows[0]?.ask?.price ?? null,
      spread: spread(view),
      events: eventCounts.get(symbol) ?? 0,
      levels: rows.map(fmtRow),
    });
  }
}

async function main(): Promise<void> {
  const results = await Promise.allSettled(
    config.symbols.map(async (symbol) => {
      const sub = await registry.subscribe(symbol);
      consume(sub).catch((err: unknown) => {
        logger.error("Subscriber loop failed", { symbol: sub.symbol, err });
      });
      return sub;
    })
  );

  for (const [i, result] of results.entries()) {
    if (result.status === "rejected") {
      const err = result.reason instanceof FeedError ? result.reason.toString() : String(result.reason);
      logger.error("Subscribe failed", { symbol: config.symbols[i], err });
    }
  }

  if (registry.symbols().length === 0) {
    logger.error("No symbol could be synchronized; exiting");
    registry.close();
    process.exitCode = 1;
    return;
  }

  const timer = setInterval(report, config.reportIntervalMs);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("Shutting down", { signal });
    clearInterval(timer);
    registry.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logger.error("Fatal error", { err });
  registry.close();
  process.exitCode = 1;
});
