import type { Result } from "neverthrow";
import type { FileSystemError } from "../errors/FileSystemError.ts";
import type { ParseError } from "../errors/ParseError.ts";
import { jsonValueSchema } from "../schemas/jsonValueSchema.ts";
import type { JsonValue } from "../types/JsonValue.ts";
import { loadJsonAs } from "./loadJsonAs.ts";

/**
 * Reads a JSON file without constraining its shape.
 */
export async function loadJson(path: string): Promise<Result<JsonValue, FileSystemError | ParseError>> {
  return loadJsonAs(path, jsonValueSchema);
}
