import { extname } from "path";
import { LogSink } from "../logger";
import { FileClientOptions } from "../config";
import {
  BadServerResponseError,
  FileClientError,
  HttpStatusError,
  InvalidRequestError,
} from "../errors/file-client-error";
import {
  HttpMethod,
  HttpResponse,
  HttpTransport,
} from "../transport/http-transport";
import { FileUrlResponseDto } from "../dtos/file-url-response.dto";
import { FileKeyResponseDto } from "../dtos/file-key-response.dto";
import { ExtensionMimeLookup, MimeLookup } from "../utils/mime-lookup";
import { buildMultipartBody } from "../utils/multipart-builder";
import { assertSuccessStatus } from "../utils/http-status";
import { formatBodyForLog, parseJsonObject } from "../utils/json-response";
import { validateResponse } from "../utils/validate";
import { buildEndpoint, ensureValidUrl } from "../utils/url";
import { readLocalFile } from "../utils/local-file";

export class FileClient {
  private logger: LogSink;
  private transport: HttpTransport;
  private mimeLookup: MimeLookup;
  private endpoint: string;
  private debugResponses: boolean;

  constructor(
    logger: LogSink,
    options: FileClientOptions,
    transport: HttpTransport,
    mimeLookup: MimeLookup = new ExtensionMimeLookup(),
  ) {
    this.logger = logger;
    this.transport = transport;
    this.mimeLookup = mimeLookup;
    this.endpoint = buildEndpoint(options.baseUrl, options.filePath);
    this.debugResponses = options.debugResponses;
  }

  /** Resolves the public URL of the file stored under `key`. */
  public async getFile(key: string): Promise<string> {
    return this.run("get", key, async () => {
      assertKey(key);
      const url = ensureValidUrl(`${this.endpoint}/${encodeURIComponent(key)}`);

      this.logger.info(`Fetching file URL: ${key}`, { url });
      const response = await this.send("GET", url, {});
      const dto = await validateResponse(
        FileUrlResponseDto,
        parseJsonObject(response.body),
      );
      this.logger.info(`Resolved file URL: ${key}`);

      return dto.url;
    });
  }

  /**
   * Uploads the local file at `filePath` under `key`. The file is read in
   * full before anything is sent; returns the key the server stored.
   */
  public async putFile(key: string, filePath: string): Promise<string> {
    return this.run("upload", key, async () => {
      assertKey(key);
      const url = ensureValidUrl(this.endpoint);
      const data = await readLocalFile(filePath);
      const contentType = this.mimeLookup.lookup(extname(filePath)) ?? "";

      const multipart = buildMultipartBody(
        [{ name: "key", value: key }],
        [{ name: "file", filename: key, contentType, data }],
      );

      this.logger.info(`Uploading file: ${key}`, {
        url,
        contentType,
        size: data.length,
      });
      const response = await this.send(
        "POST",
        url,
        { "Content-Type": multipart.contentType },
        multipart.body,
      );
      const dto = await validateResponse(
        FileKeyResponseDto,
        parseJsonObject(response.body),
      );
      this.logger.info(`Upload complete: ${dto.key}`);

      return dto.key;
    });
  }

  /** Deletes the file stored under `key`; returns the key the server removed. */
  public async deleteFile(key: string): Promise<string> {
    return this.run("delete", key, async () => {
      assertKey(key);
      const url = ensureValidUrl(this.endpoint);

      this.logger.info(`Deleting file: ${key}`, { url });
      const response = await this.send(
        "DELETE",
        url,
        { "Content-Type": "application/json" },
        Buffer.from(JSON.stringify({ key })),
      );
      const dto = await validateResponse(
        FileKeyResponseDto,
        parseJsonObject(response.body),
      );
      this.logger.info(`Deleted file: ${dto.key}`);

      return dto.key;
    });
  }

  public getEndpoint(): string {
    return this.endpoint;
  }

  // ─── internals ──────────────────────────────────────────────────────

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: Buffer,
  ): Promise<HttpResponse> {
    const response = await this.transport.send({ method, url, headers, body });

    if (!Buffer.isBuffer(response.body)) {
      throw new BadServerResponseError(
        `${method} ${url} returned a response without a binary body`,
      );
    }

    if (this.debugResponses) {
      this.logger.debug(`${method} ${url} → ${response.status}`, {
        body: formatBodyForLog(response.body),
      });
    }

    assertSuccessStatus(response.status);
    return response;
  }

  /** Logs a single error line for any failure, then rethrows it unchanged. */
  private async run<T>(
    operation: string,
    key: string,
    task: () => Promise<T>,
  ): Promise<T> {
    try {
      return await task();
    } catch (err) {
      this.logger.error(`File ${operation} failed for key "${key}"`, {
        error: err instanceof Error ? err.name : String(err),
        code: err instanceof FileClientError ? err.code : undefined,
        statusCode: err instanceof HttpStatusError ? err.statusCode : undefined,
        message: err instanceof Error ? err.message : undefined,
      });
      throw err;
    }
  }
}

function assertKey(key: string): void {
  if (key.trim().length === 0) {
    throw new InvalidRequestError("File key must not be empty");
  }
}
