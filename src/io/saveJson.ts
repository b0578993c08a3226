import fs from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { config } from "../config.ts";
import { FileSystemError } from "../errors/FileSystemError.ts";
import type { JsonValue } from "../types/JsonValue.ts";

/**
 * Writes `data` to `path` as UTF-8 JSON indented with four spaces.
 * An existing file is overwritten.
 */
export async function saveJson(data: JsonValue, path: string): Promise<Result<void, FileSystemError>> {
  try {
    await fs.writeFile(path, JSON.stringify(data, null, config.jsonIndent), "utf-8");
    return ok(undefined);
  } catch (error) {
    return err(new FileSystemError(path, "write", error));
  }
}
