import "reflect-metadata";
import dotenv from "dotenv";
import { ClientConfig, loadConfig } from "./config";
import { Logger } from "./logger";
import { FileClient } from "./services/file-client.service";
import { AxiosTransport } from "./transport/axios-transport";
import { ExtensionMimeLookup } from "./utils/mime-lookup";

export { ClientConfig, FileClientOptions, loadConfig } from "./config";
export { Logger, LogSink } from "./logger";
export { FileClient } from "./services/file-client.service";
export {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "./transport/http-transport";
export { AxiosTransport, AxiosTransportOptions } from "./transport/axios-transport";
export { ExtensionMimeLookup, MimeLookup } from "./utils/mime-lookup";
export * from "./errors/file-client-error";

/**
 * Composition root: wires the pino logger, the axios transport and the
 * extension-based MIME lookup around a FileClient.
 */
export function createFileClient(config: ClientConfig = loadConfig()): FileClient {
  const logger = new Logger(config);
  const transport = new AxiosTransport(logger, {
    timeoutMs: config.requestTimeoutMs,
  });
  return new FileClient(logger, config, transport, new ExtensionMimeLookup());
}

/** Loads `.env` (if present) into process.env before reading the config. */
export function createFileClientFromEnv(envPath?: string): FileClient {
  dotenv.config(envPath ? { path: envPath } : undefined);
  return createFileClient(loadConfig(process.env));
}
