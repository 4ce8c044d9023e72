import pino from "pino";
import { ClientConfig } from "./config";

/** Where the client writes its diagnostics. */
export interface LogSink {
  info(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export class Logger implements LogSink {
  private logger: pino.Logger;

  constructor(config: Pick<ClientConfig, "logLevel" | "isProduction">) {
    this.logger = pino({
      name: "file-store-client",
      level: config.logLevel,
      ...(!config.isProduction && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
          },
        },
      }),
    });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(data, message);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(data, message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(data, message);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(data, message);
  }
}
