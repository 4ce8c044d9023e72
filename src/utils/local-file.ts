import { open, FileHandle } from "fs/promises";
import { FileReadError } from "../errors/file-client-error";

/**
 * Reads a whole local file. The handle is closed on every path, including
 * read failures; any failure surfaces as a FileReadError.
 *
 * When both the read and the close fail, the read failure is the one
 * reported.
 */
export async function readLocalFile(path: string): Promise<Buffer> {
  let handle: FileHandle | undefined;
  let readFailure: unknown;
  try {
    handle = await open(path, "r");
    return await handle.readFile();
  } catch (err) {
    readFailure = err;
    throw new FileReadError(path, err);
  } finally {
    if (handle) {
      try {
        await handle.close();
      } catch (closeFailure) {
        throw new FileReadError(path, readFailure ?? closeFailure);
      }
    }
  }
}
