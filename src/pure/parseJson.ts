import { err, ok, Result } from "neverthrow";
import type { ZodType, ZodTypeDef } from "zod";
import { ParseError } from "../errors/ParseError.ts";

const decode = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => new ParseError("JSON", error instanceof Error ? error.message : String(error))
);

/**
 * Parses JSON text and validates the result against `schema`.
 */
export function parseJson<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Result<T, ParseError> {
  return decode(text).andThen((value): Result<T, ParseError> => {
    const parsed = schema.safeParse(value);
    return parsed.success
      ? ok(parsed.data)
      : err(new ParseError("JSON", "value does not match schema", parsed.error.issues));
  });
}
