import axios, { AxiosInstance } from "axios";
import { types } from "util";
import { LogSink } from "../logger";
import {
  BadServerResponseError,
  TransportError,
} from "../errors/file-client-error";
import { HttpRequest, HttpResponse, HttpTransport } from "./http-transport";

export interface AxiosTransportOptions {
  /** Milliseconds; 0 leaves axios' default (no timeout). */
  timeoutMs?: number;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;
  private logger: LogSink;

  constructor(logger: LogSink, options: AxiosTransportOptions = {}) {
    this.logger = logger;
    this.client = axios.create({
      timeout: options.timeoutMs ?? 0,
      responseType: "arraybuffer",
      // Status classification belongs to the caller
      validateStatus: () => true,
      transformResponse: (data: unknown) => data,
    });
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    let response;
    try {
      response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`${request.method} ${request.url} failed: ${message}`, {
        code: axios.isAxiosError(err) ? err.code : undefined,
      });
      throw new TransportError(
        `${request.method} ${request.url} failed: ${message}`,
        err,
      );
    }

    return { status: response.status, body: toBuffer(response.data) };
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (types.isArrayBuffer(data)) return Buffer.from(data);
  if (data === undefined || data === null || data === "") return Buffer.alloc(0);
  throw new BadServerResponseError(
    `Expected a binary response body, got ${typeof data}`,
  );
}
