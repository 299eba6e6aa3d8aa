import { z } from "zod";
import { DecodeError } from "../../../domain/orderbook/errors";
import type { WireDecoder } from "../../../domain/feed/feed.types";
import type { LevelUpdate, PriceLevel } from "../../../domain/orderbook/types";

// Binance sends decimals as strings; the REST client may already hand us numbers.
const decimal = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((v, ctx) => {
    const n = typeof v === "number" ? v : Number(v);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a finite number: ${String(v)}` });
      return z.NEVER;
    }
    return n;
  });

const level = z.tuple([decimal, decimal]).rest(z.unknown());

const sequence = z.number().int().nonnegative();

export const depthSnapshotSchema = z.object({
  lastUpdateId: sequence,
  bids: z.array(level),
  asks: z.array(level),
});

export const depthUpdateSchema = z
  .object({
    e: z.literal("depthUpdate"),
    E: z.number().int().nonnegative(),
    s: z.string().min(1),
    U: sequence,
    u: sequence,
    b: z.array(level),
    a: z.array(level),
  })
  .refine((m) => m.U <= m.u, { message: "first update id is greater than last", path: ["U"] });

export type DepthSnapshotMessage = z.infer<typeof depthSnapshotSchema>;
export type DepthUpdateMessage = z.infer<typeof depthUpdateSchema>;

export type BinanceSpotDecoderOptions = {
  /** Stamps snapshots, which carry no event time. Defaults to `Date.now`. */
  now?: () => number;
};

function toLevels(rows: readonly (readonly [number, number, ...unknown[]])[]): PriceLevel[] {
  return rows.map(([price, quantity]) => ({ price, quantity }));
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function textOf(raw: unknown): string | null {
  if (typeof raw === "string") return raw;
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  if (Array.isArray(raw) && raw.length > 0 && raw.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(raw).toString("utf8");
  }
  return null;
}

/** Accepts wire frames as well as payloads a client already parsed. */
function parsePayload(raw: unknown, symbol: string | null): unknown {
  const text = textOf(raw);
  if (text === null) return raw;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new DecodeError(symbol, "Payload is not valid JSON", { cause: err });
  }
}

/**
 * Turns Binance spot depth payloads into `LevelUpdate`s.
 *
 * Numbers are only checked for being numbers here. Whether a level makes sense
 * for the book (negative, crossed) is for the synchronizer to decide.
 */
export class BinanceSpotDecoder implements WireDecoder {
  private readonly now: () => number;

  constructor(options?: BinanceSpotDecoderOptions) {
    this.now = options?.now ?? Date.now;
  }

  decodeSnapshot(symbol: string, raw: unknown): LevelUpdate {
    const key = symbol.toUpperCase();
    const result = depthSnapshotSchema.safeParse(parsePayload(raw, key));
    if (!result.success) {
      throw new DecodeError(key, `Malformed depth snapshot: ${describeIssues(result.error)}`, {
        cause: result.error,
      });
    }

    const snapshot = result.data;
    return {
      kind: "snapshot",
      symbol: key,
      firstUpdateId: snapshot.lastUpdateId,
      lastUpdateId: snapshot.lastUpdateId,
      eventTime: this.now(),
      bids: toLevels(snapshot.bids),
      asks: toLevels(snapshot.asks),
    };
  }

  decodeDiff(raw: unknown): LevelUpdate {
    const result = depthUpdateSchema.safeParse(parsePayload(raw, null));
    if (!result.success) {
      throw new DecodeError(null, `Malformed depth update: ${describeIssues(result.error)}`, {
        cause: result.error,
      });
    }

    const m = result.data;
    return {
      kind: "diff",
      symbol: m.s.toUpperCase(),
      firstUpdateId: m.U,
      lastUpdateId: m.u,
      eventTime: m.E,
      bids: toLevels(m.b),
      asks: toLevels(m.a),
    };
  }
}
