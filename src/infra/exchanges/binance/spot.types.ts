/** Depths the spot REST `/api/v3/depth` endpoint accepts. */
export const BINANCE_SNAPSHOT_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000] as const;

export type BinanceSnapshotLimit = (typeof BINANCE_SNAPSHOT_LIMITS)[number];

/** Diff-depth stream cadence. */
export type BinanceDepthUpdateMs = 100 | 1000;

export const BINANCE_SPOT_WS_BASE_URL = "wss://stream.binance.com:9443/ws";

/** Smallest accepted depth that covers `depth`, capped at the largest one. */
export function toBinanceSnapshotLimit(depth: number): BinanceSnapshotLimit {
  for (const limit of BINANCE_SNAPSHOT_LIMITS) {
    if (limit >= depth) return limit;
  }
  return 5000;
}
