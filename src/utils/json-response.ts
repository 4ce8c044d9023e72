import { ParseError } from "../errors/file-client-error";

/**
 * Parses a response body as a JSON object. Arrays, primitives and invalid
 * JSON are all rejected with a ParseError.
 */
export function parseJsonObject(body: Buffer): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new ParseError("Response body is not valid JSON");
  }

  if (!isRecord(parsed)) {
    throw new ParseError("Response body is not a JSON object");
  }
  return parsed;
}

/** Pretty-printed JSON when possible, raw UTF-8 otherwise. */
export function formatBodyForLog(body: Buffer): string {
  const text = body.toString("utf-8");
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
