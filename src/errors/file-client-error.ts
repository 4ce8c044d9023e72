/**
 * Base error for every failure surfaced by the file client.
 * Callers can branch on `instanceof` or on the stable `code` string.
 */
export class FileClientError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = "FileClientError";
    this.code = code;
    this.details = details;
    // Restore prototype chain (required when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Request / local failures ──────────────────────────────────────────

export class InvalidRequestError extends FileClientError {
  constructor(message: string, details?: unknown) {
    super("INVALID_REQUEST", message, details);
    this.name = "InvalidRequestError";
  }
}

export class BoundaryCollisionError extends FileClientError {
  constructor(attempts: number) {
    super(
      "BOUNDARY_COLLISION",
      `Could not generate a multipart boundary absent from the payload after ${attempts} attempts`,
      { attempts },
    );
    this.name = "BoundaryCollisionError";
  }
}

export class FileReadError extends FileClientError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      "FILE_READ_ERROR",
      `Could not read file "${path}"${
        cause instanceof Error ? `: ${cause.message}` : ""
      }`,
      { cause },
    );
    this.name = "FileReadError";
    this.path = path;
  }
}

// ── HTTP status buckets ───────────────────────────────────────────────

export abstract class HttpStatusError extends FileClientError {
  public readonly statusCode: number;

  protected constructor(code: string, statusCode: number, message: string) {
    super(code, message);
    this.statusCode = statusCode;
  }
}

export class RedirectionError extends HttpStatusError {
  constructor(statusCode: number) {
    super("REDIRECTION", statusCode, `Unexpected redirection (${statusCode})`);
    this.name = "RedirectionError";
  }
}

export class ClientError extends HttpStatusError {
  constructor(statusCode: number) {
    super("CLIENT_ERROR", statusCode, `Request rejected by server (${statusCode})`);
    this.name = "ClientError";
  }
}

export class ServerError extends HttpStatusError {
  constructor(statusCode: number) {
    super("SERVER_ERROR", statusCode, `Server failed to handle request (${statusCode})`);
    this.name = "ServerError";
  }
}

export class UnknownError extends HttpStatusError {
  constructor(statusCode: number) {
    super("UNKNOWN_STATUS", statusCode, `Unrecognised status code ${statusCode}`);
    this.name = "UnknownError";
  }
}

// ── Response / transport failures ─────────────────────────────────────

export class BadServerResponseError extends FileClientError {
  constructor(message = "Server returned a malformed response") {
    super("BAD_SERVER_RESPONSE", message);
    this.name = "BadServerResponseError";
  }
}

export class ParseError extends FileClientError {
  constructor(message: string, details?: unknown) {
    super("PARSE_ERROR", message, details);
    this.name = "ParseError";
  }
}

export class TransportError extends FileClientError {
  constructor(message: string, cause?: unknown) {
    super("TRANSPORT_ERROR", message, { cause });
    this.name = "TransportError";
  }
}
