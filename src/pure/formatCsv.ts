import { config } from "../config.ts";
import type { CsvCell, CsvRow, CsvTable } from "../types/CsvTable.ts";

const needsQuoting = /[,"\r\n]/;

/**
 * Serializes a table as CSV: comma separated, `\r\n` after every row,
 * fields quoted only when they contain a delimiter, quote or line break.
 * The header row is written only when it has at least one entry.
 */
export function formatCsv(table: CsvTable): string {
  const headers = table.headers ?? [];
  const rows: readonly CsvRow[] = headers.length > 0 ? [headers, ...table.rows] : table.rows;
  return rows.map((row) => formatRow(row) + config.csvLineTerminator).join("");
}

function formatRow(row: CsvRow): string {
  // A lone empty field is quoted so the row does not read back as a blank line.
  if (row.length === 1 && cellText(row[0]) === "") {
    return config.csvQuote + config.csvQuote;
  }
  return row.map((cell) => quote(cellText(cell))).join(config.csvDelimiter);
}

function cellText(cell: CsvCell): string {
  return cell === null || cell === undefined ? "" : String(cell);
}

function quote(text: string): string {
  if (!needsQuoting.test(text)) {
    return text;
  }
  const q = config.csvQuote;
  return q + text.replaceAll(q, q + q) + q;
}
