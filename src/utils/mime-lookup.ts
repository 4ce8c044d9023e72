/** Best-effort MIME type resolution from a file extension. */
export interface MimeLookup {
  lookup(extension: string): string | undefined;
}

const EXTENSION_TO_MIME: Record<string, string> = {
  ".txt": "text/plain",
  ".csv": "text/csv",
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".md": "text/markdown",
  ".xml": "application/xml",
  ".json": "application/json",
  ".js": "text/javascript",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".gz": "application/gzip",
  ".tar": "application/x-tar",
  ".doc": "application/msword",
  ".docx":
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".heic": "image/heic",
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".m4a": "audio/mp4",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
};

export class ExtensionMimeLookup implements MimeLookup {
  private table: Record<string, string>;

  /** `extra` entries take precedence over the built-in table. */
  constructor(extra: Record<string, string> = {}) {
    this.table = { ...EXTENSION_TO_MIME };
    for (const [ext, mimeType] of Object.entries(extra)) {
      this.table[normalizeExtension(ext)] = mimeType;
    }
  }

  public lookup(extension: string): string | undefined {
    if (!extension) return undefined;
    return this.table[normalizeExtension(extension)];
  }
}

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}
