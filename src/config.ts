import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUrl,
  Min,
  validateSync,
} from "class-validator";
import { plainToInstance } from "class-transformer";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/** Settings the file client itself needs; everything else is ambient. */
export interface FileClientOptions {
  baseUrl: string;
  filePath: string;
  debugResponses: boolean;
}

export class ClientConfig implements FileClientOptions {
  @IsUrl({ require_tld: false, protocols: ["http", "https"] })
  baseUrl: string = "http://localhost:3000";

  /** Path segment of the file endpoint, appended to `baseUrl`. */
  @IsString()
  @IsNotEmpty()
  filePath: string = "file";

  @IsString()
  nodeEnv: string = "development";

  @IsIn(LOG_LEVELS)
  logLevel: string = "info";

  /** Pretty-print every response body at debug level. */
  @IsBoolean()
  debugResponses: boolean = false;

  /** Per-request timeout in milliseconds (0 keeps the transport default). */
  @IsInt()
  @Min(0)
  requestTimeoutMs: number = 0;

  get isProduction(): boolean {
    return this.nodeEnv === "production";
  }
}

function parseFlag(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const raw = {
    baseUrl: env.FILE_API_BASE_URL || "http://localhost:3000",
    filePath: env.FILE_API_PATH || "file",
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    debugResponses: parseFlag(env.FILE_API_DEBUG_RESPONSES),
    requestTimeoutMs: env.FILE_API_TIMEOUT_MS
      ? Number(env.FILE_API_TIMEOUT_MS)
      : 0,
  };

  const config = plainToInstance(ClientConfig, raw);
  const errors = validateSync(config);

  if (errors.length > 0) {
    const messages = errors.map((e) =>
      Object.values(e.constraints || {}).join(", "),
    );
    throw new Error(`Invalid configuration:\n  ${messages.join("\n  ")}`);
  }

  return config;
}
