import {
  BadServerResponseError,
  ClientError,
  RedirectionError,
  ServerError,
  UnknownError,
} from "../errors/file-client-error";

/**
 * Maps a status code onto the client's error taxonomy.
 * Returns normally for 2xx; throws for everything else.
 */
export function assertSuccessStatus(status: unknown): void {
  if (typeof status !== "number" || !Number.isInteger(status)) {
    throw new BadServerResponseError(
      `Response has no valid status code (${String(status)})`,
    );
  }

  if (status >= 200 && status < 300) return;
  if (status >= 300 && status < 400) throw new RedirectionError(status);
  if (status >= 400 && status < 500) throw new ClientError(status);
  if (status >= 500 && status < 600) throw new ServerError(status);
  throw new UnknownError(status);
}
