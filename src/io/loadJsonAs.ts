import fs from "node:fs/promises";
import { err, type Result } from "neverthrow";
import type { ZodType, ZodTypeDef } from "zod";
import { FileSystemError } from "../errors/FileSystemError.ts";
import { ParseError } from "../errors/ParseError.ts";
import { parseJson } from "../pure/parseJson.ts";

/**
 * Reads a JSON file and validates its content against `schema`.
 * @returns The parsed value, or the read, syntax or validation failure.
 */
export async function loadJsonAs<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Result<T, FileSystemError | ParseError>> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (error) {
    return err(new FileSystemError(path, "read", error));
  }
  return parseJson(text, schema).mapErr((error) => new ParseError(path, error.reason, error.issues));
}
