import pino, { type Logger as PinoInstance } from "pino";
import type { Logger } from "../../domain/logger";

export type PinoLoggerOptions = {
  level?: string;
  /** Human-readable output through pino-pretty. Defaults to `NODE_ENV !== "production"`. */
  pretty?: boolean;
  name?: string;
};

export class PinoLogger implements Logger {
  private readonly pinoLogger: PinoInstance;

  constructor(options?: PinoLoggerOptions | PinoInstance) {
    if (isPinoInstance(options)) {
      this.pinoLogger = options;
      return;
    }

    const level = options?.level ?? process.env.LOG_LEVEL ?? "info";
    const pretty = options?.pretty ?? process.env.NODE_ENV !== "production";

    this.pinoLogger = pretty
      ? pino({
          name: options?.name,
          level,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "pid,hostname",
            },
          },
        })
      : pino({ name: options?.name, level });
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoInstance(x: PinoLoggerOptions | PinoInstance | undefined): x is PinoInstance {
  return x != null && "child" in x;
}
