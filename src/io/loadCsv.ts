import fs from "node:fs/promises";
import { err, type Result } from "neverthrow";
import { FileSystemError } from "../errors/FileSystemError.ts";
import { ParseError } from "../errors/ParseError.ts";
import { parseCsv } from "../pure/parseCsv.ts";

/**
 * Reads every row of a CSV file. Cells stay strings; a header row, if any, is the first row.
 * A file that ends inside a quoted field is a `ParseError`; lenient readers would
 * return the partial field instead.
 */
export async function loadCsv(path: string): Promise<Result<string[][], FileSystemError | ParseError>> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (error) {
    return err(new FileSystemError(path, "read", error));
  }
  return parseCsv(text).mapErr((error) => new ParseError(path, error.reason));
}
