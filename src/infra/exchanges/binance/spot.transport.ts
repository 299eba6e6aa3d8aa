import { MainClient } from "binance";
import WebSocket from "ws";
import { AbortedError, abortable } from "../../../domain/feed/abort";
import type {
  MarketStream,
  MarketTransport,
  RawMessage,
} from "../../../domain/feed/feed.types";
import type { Logger } from "../../../domain/logger";
import { BoundedEventQueue } from "../../../storage/shared/eventQueue";
import {
  BINANCE_SPOT_WS_BASE_URL,
  toBinanceSnapshotLimit,
  type BinanceSnapshotLimit,
} from "./spot.types";

/** The part of the REST client the transport needs. `MainClient` satisfies it. */
export interface DepthSnapshotClient {
  getOrderBook(params: { symbol: string; limit: BinanceSnapshotLimit }): Promise<unknown>;
}

export type BinanceSpotTransportOptions = {
  /** Default: `wss://stream.binance.com:9443/ws` */
  wsBaseUrl?: string;
  /** Default: 10_000 */
  handshakeTimeoutMs?: number;
  /** Frames held per stream before the oldest are dropped. Default: 4096 */
  streamQueueCapacity?: number;
  /** How often an idle stream is pinged. Default: 20_000 */
  pingIntervalMs?: number;
  /** How long a ping may go without a pong or any frame before the stream fails. Default: 10_000 */
  pongTimeoutMs?: number;
  /** REST client; one is created when omitted. */
  rest?: DepthSnapshotClient;
  logger?: Logger;
};

type Heartbeat = {
  pingIntervalMs: number;
  pongTimeoutMs: number;
};

/**
 * One raw websocket connection exposed as an async iterable of frames.
 *
 * A half-open connection delivers neither frames nor a close, so the stream
 * pings the peer and fails once a ping goes unanswered.
 */
class WsMarketStream implements MarketStream {
  private readonly queue: BoundedEventQueue<RawMessage>;
  private closing = false;
  private pingTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly socket: WebSocket,
    capacity: number,
    private readonly heartbeat: Heartbeat,
    private readonly logger: Logger | undefined
  ) {
    this.queue = new BoundedEventQueue<RawMessage>(capacity, {
      onOverflow: (_evicted, dropped) => {
        if (dropped === 1) logger?.warn("Stream reader is falling behind; dropping frames", { capacity });
      },
    });

    socket.on("message", this.onMessage);
    socket.on("pong", this.onPong);
    socket.on("error", this.onError);
    socket.on("close", this.onClose);
    socket.once("open", this.startPing);
  }

  close(): void {
    if (this.closing) return;
    this.closing = true;
    this.stopPing();
    this.queue.close();
    this.socket.terminate();
  }

  [Symbol.asyncIterator](): AsyncIterator<RawMessage, undefined> {
    return this.queue[Symbol.asyncIterator]();
  }

  private startPing = () => {
    if (this.closing) return;
    this.stopPing();
    this.pingTimer = setInterval(() => {
      if (this.socket.readyState !== WebSocket.OPEN || this.pongTimer) return;
      this.socket.ping();
      this.pongTimer = setTimeout(this.onIdle, this.heartbeat.pongTimeoutMs);
    }, this.heartbeat.pingIntervalMs);
  };

  private stopPing() {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.clearPongTimer();
  }

  private clearPongTimer() {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private onIdle = () => {
    this.pongTimer = null;
    if (this.closing) return;
    const { pongTimeoutMs } = this.heartbeat;
    this.logger?.warn("Websocket went silent; dropping connection", { pongTimeoutMs });
    this.closing = true;
    this.stopPing();
    this.queue.close(new Error(`Stream idle: no pong within ${pongTimeoutMs} ms`));
    this.socket.terminate();
  };

  private onMessage = (data: WebSocket.RawData, isBinary: boolean) => {
    this.clearPongTimer();
    this.queue.push(isBinary ? data : data.toString());
  };

  private onPong = () => {
    this.clearPongTimer();
  };

  private onError = (err: Error) => {
    if (this.closing) return;
    this.stopPing();
    this.queue.close(err);
  };

  private onClose = (code: number, reason: Buffer) => {
    this.stopPing();
    if (this.closing) return;
    const detail = reason.length > 0 ? `: ${reason.toString()}` : "";
    this.queue.close(new Error(`Stream closed by peer with code ${code}${detail}`));
  };
}

/**
 * Raw Binance spot transport: one websocket per topic and REST depth snapshots.
 *
 * Nothing here parses payloads or retries; the supervisor owns both.
 */
export class BinanceSpotTransport implements MarketTransport {
  private readonly wsBaseUrl: string;
  private readonly handshakeTimeoutMs: number;
  private readonly streamQueueCapacity: number;
  private readonly heartbeat: Heartbeat;
  private readonly rest: DepthSnapshotClient;
  private readonly logger: Logger | undefined;

  constructor(options?: BinanceSpotTransportOptions) {
    this.wsBaseUrl = (options?.wsBaseUrl ?? BINANCE_SPOT_WS_BASE_URL).replace(/\/+$/, "");
    this.handshakeTimeoutMs = options?.handshakeTimeoutMs ?? 10_000;
    this.streamQueueCapacity = options?.streamQueueCapacity ?? 4096;
    this.heartbeat = {
      pingIntervalMs: options?.pingIntervalMs ?? 20_000,
      pongTimeoutMs: options?.pongTimeoutMs ?? 10_000,
    };
    this.rest = options?.rest ?? new MainClient({ disableTimeSync: true });
    this.logger = options?.logger;
  }

  openStream(topic: string, signal: AbortSignal): Promise<MarketStream> {
    return new Promise<MarketStream>((resolve, reject) => {
      if (signal.aborted) {
        reject(new AbortedError());
        return;
      }

      const url = `${this.wsBaseUrl}/${topic}`;
      const socket = new WebSocket(url, {
        perMessageDeflate: false,
        handshakeTimeout: this.handshakeTimeoutMs,
      });
      // Listeners go on before the handshake finishes so no frame is missed.
      const stream = new WsMarketStream(socket, this.streamQueueCapacity, this.heartbeat, this.logger);

      const cleanup = () => {
        socket.off("open", onOpen);
        socket.off("error", onError);
        signal.removeEventListener("abort", onAbort);
      };
      const onOpen = () => {
        cleanup();
        this.logger?.debug("Websocket open", { url });
        resolve(stream);
      };
      const onError = (err: Error) => {
        cleanup();
        stream.close();
        reject(err);
      };
      const onAbort = () => {
        cleanup();
        stream.close();
        reject(new AbortedError());
      };

      socket.once("open", onOpen);
      socket.once("error", onError);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  fetchSnapshot(symbol: string, depthLimit: number, signal: AbortSignal): Promise<unknown> {
    return abortable(
      this.rest.getOrderBook({
        symbol: symbol.toUpperCase(),
        limit: toBinanceSnapshotLimit(depthLimit),
      }),
      signal
    );
  }
}
