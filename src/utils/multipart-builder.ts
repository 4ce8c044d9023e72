import { v4 as uuidv4 } from "uuid";
import { BoundaryCollisionError } from "../errors/file-client-error";

export interface MultipartField {
  name: string;
  value: string;
}

export interface MultipartFile {
  name: string;
  filename: string;
  /** Written verbatim; may be empty when the type is unknown. */
  contentType: string;
  data: Buffer;
}

export interface MultipartBody {
  boundary: string;
  contentType: string;
  body: Buffer;
}

const CRLF = "\r\n";
const MAX_BOUNDARY_ATTEMPTS = 5;

export function createBoundary(): string {
  return `Boundary-${uuidv4()}`;
}

/**
 * Assembles a multipart/form-data payload. Text fields come first, then
 * files, each opened by `--boundary` and the whole body closed by
 * `--boundary--`.
 *
 * A boundary that occurs inside any part is replaced with a fresh one, since
 * the format has no escaping for it.
 */
export function buildMultipartBody(
  fields: MultipartField[],
  files: MultipartFile[],
  generateBoundary: () => string = createBoundary,
): MultipartBody {
  const boundary = pickBoundary(fields, files, generateBoundary);
  const chunks: Buffer[] = [];

  for (const field of fields) {
    chunks.push(
      Buffer.from(
        `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${quote(field.name)}"${CRLF}${CRLF}` +
          `${field.value}${CRLF}`,
      ),
    );
  }

  for (const file of files) {
    chunks.push(
      Buffer.from(
        `--${boundary}${CRLF}` +
          `Content-Disposition: form-data; name="${quote(file.name)}"; filename="${quote(file.filename)}"${CRLF}` +
          `Content-Type: ${file.contentType}${CRLF}${CRLF}`,
      ),
      file.data,
      Buffer.from(CRLF),
    );
  }

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`));

  return {
    boundary,
    contentType: `multipart/form-data; boundary=${boundary}`,
    body: Buffer.concat(chunks),
  };
}

function pickBoundary(
  fields: MultipartField[],
  files: MultipartFile[],
  generateBoundary: () => string,
): string {
  for (let attempt = 0; attempt < MAX_BOUNDARY_ATTEMPTS; attempt++) {
    const boundary = generateBoundary();
    const collides =
      fields.some((f) => f.value.includes(boundary)) ||
      files.some((f) => f.data.includes(boundary));
    if (!collides) return boundary;
  }
  throw new BoundaryCollisionError(MAX_BOUNDARY_ATTEMPTS);
}

/** Percent-encodes the characters that would break a quoted header value. */
function quote(value: string): string {
  return value
    .replace(/"/g, "%22")
    .replace(/\r/g, "%0D")
    .replace(/\n/g, "%0A");
}
