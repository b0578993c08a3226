import { err, ok, type Result } from "neverthrow";
import { config } from "../config.ts";
import { ParseError } from "../errors/ParseError.ts";

/**
 * Parses CSV text into rows of strings. Accepts `\r\n`, `\n` or `\r` line
 * endings; a blank line becomes an empty row.
 */
export function parseCsv(text: string): Result<string[][], ParseError> {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let atFieldStart = true;
  let inRow = false;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (quoted) {
      if (char !== config.csvQuote) {
        field += char;
      } else if (text.charAt(i + 1) === config.csvQuote) {
        field += char;
        i++;
      } else {
        quoted = false;
      }
      continue;
    }
    if (char === config.csvQuote && atFieldStart) {
      quoted = true;
      atFieldStart = false;
      inRow = true;
    } else if (char === config.csvDelimiter) {
      row.push(field);
      field = "";
      atFieldStart = true;
      inRow = true;
    } else if (char === "\r" || char === "\n") {
      if (char === "\r" && text.charAt(i + 1) === "\n") {
        i++;
      }
      if (inRow) {
        row.push(field);
      }
      rows.push(row);
      row = [];
      field = "";
      atFieldStart = true;
      inRow = false;
    } else {
      field += char;
      atFieldStart = false;
      inRow = true;
    }
  }

  if (quoted) {
    return err(new ParseError("CSV", "unexpected end of data inside a quoted field"));
  }
  if (inRow) {
    row.push(field);
    rows.push(row);
  }
  return ok(rows);
}
