import { InvalidRequestError } from "../errors/file-client-error";

/** Joins the base URL and the file endpoint path with exactly one slash. */
export function buildEndpoint(baseUrl: string, filePath: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  const path = filePath.replace(/^\/+/, "");
  return path ? `${base}/${path}` : base;
}

export function ensureValidUrl(candidate: string): string {
  try {
    new URL(candidate);
  } catch {
    throw new InvalidRequestError(`"${candidate}" is not a valid URL`, {
      url: candidate,
    });
  }
  return candidate;
}
