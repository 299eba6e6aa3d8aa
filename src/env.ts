import { z } from "zod";
import type { SubscriptionRegistryOptions } from "./domain/feed/registry";
import type { BinanceDepthUpdateMs } from "./infra/exchanges/binance/spot.types";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const envSchema = z.object({
  LOB_SYMBOLS: z
    .string()
    .default("BTCUSDT")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "at least one symbol is required")),
  LOB_DISPLAY_DEPTH: positiveInt(10),
  LOB_SNAPSHOT_DEPTH: positiveInt(1000),
  LOB_STREAM_UPDATE_MS: z
    .enum(["100", "1000"])
    .default("100")
    .transform((v): BinanceDepthUpdateMs => (v === "1000" ? 1000 : 100)),
  LOB_RECONNECT_INITIAL_MS: positiveInt(1000),
  LOB_RECONNECT_MAX_MS: positiveInt(30_000),
  LOB_CONNECT_MAX_ATTEMPTS: positiveInt(8),
  LOB_QUEUE_CAPACITY: positiveInt(1024),
  LOB_SYNC_BUFFER_CAPACITY: positiveInt(4096),
  LOB_REPORT_INTERVAL_MS: positiveInt(1000),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
});

export type AppEnv = z.infer<typeof envSchema>;

export class InvalidEnvError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid environment variables: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "InvalidEnvError";
  }
}

/** Validates `runtimeEnv`. Empty strings count as unset. */
export function parseEnv(runtimeEnv: Record<string, string | undefined>): AppEnv {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(runtimeEnv)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) throw new InvalidEnvError(result.error.issues);
  return result.data;
}

export type FeedConfig = {
  symbols: string[];
  displayDepth: number;
  reportIntervalMs: number;
  updateMs: BinanceDepthUpdateMs;
  registry: SubscriptionRegistryOptions;
};

export function loadFeedConfig(appEnv: AppEnv): FeedConfig {
  return {
    symbols: appEnv.LOB_SYMBOLS,
    displayDepth: appEnv.LOB_DISPLAY_DEPTH,
    reportIntervalMs: appEnv.LOB_REPORT_INTERVAL_MS,
    updateMs: appEnv.LOB_STREAM_UPDATE_MS,
    registry: {
      queueCapacity: appEnv.LOB_QUEUE_CAPACITY,
      supervisor: {
        depthLimit: appEnv.LOB_SNAPSHOT_DEPTH,
        syncBufferCapacity: appEnv.LOB_SYNC_BUFFER_CAPACITY,
        maxConnectAttempts: appEnv.LOB_CONNECT_MAX_ATTEMPTS,
        maxSnapshotAttempts: appEnv.LOB_CONNECT_MAX_ATTEMPTS,
        backoff: {
          initialMs: appEnv.LOB_RECONNECT_INITIAL_MS,
          maxMs: appEnv.LOB_RECONNECT_MAX_MS,
        },
      },
    },
  };
}
