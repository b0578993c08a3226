import type { ZodIssue } from "zod";

/**
 * Error returned when text cannot be decoded into the expected shape
 */
export class ParseError extends Error {
  constructor(
    public readonly source: string,
    public readonly reason: string,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(`Failed to parse ${source}: ${reason}`);
    this.name = "ParseError";
  }
}
