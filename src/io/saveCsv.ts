import fs from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { FileSystemError } from "../errors/FileSystemError.ts";
import { formatCsv } from "../pure/formatCsv.ts";
import type { CsvTable } from "../types/CsvTable.ts";

/**
 * Writes a table to `path` as CSV, header row first when one is given.
 */
export async function saveCsv(path: string, table: CsvTable): Promise<Result<void, FileSystemError>> {
  try {
    await fs.writeFile(path, formatCsv(table), "utf-8");
    return ok(undefined);
  } catch (error) {
    return err(new FileSystemError(path, "write", error));
  }
}
