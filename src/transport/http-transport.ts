export type HttpMethod = "GET" | "POST" | "DELETE";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

/**
 * Minimal capability the file client needs from an HTTP stack.
 * Implementations must resolve for every status code the server sends and
 * reject only when no response was received.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}
