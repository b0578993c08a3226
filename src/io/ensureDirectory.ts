import fs from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { FileSystemError } from "../errors/FileSystemError.ts";

/**
 * Creates a directory and any missing parents. Does nothing if it already exists.
 */
export async function ensureDirectory(path: string): Promise<Result<void, FileSystemError>> {
  try {
    await fs.mkdir(path, { recursive: true });
    return ok(undefined);
  } catch (error) {
    return err(new FileSystemError(path, "mkdir", error));
  }
}
