/**
 * A single CSV field before it is written. `null` and `undefined` become empty fields.
 */
export type CsvCell = string | number | bigint | boolean | null | undefined;

export type CsvRow = readonly CsvCell[];

/**
 * Rows to write, optionally preceded by a header row.
 */
export type CsvTable = {
  readonly headers?: readonly string[];
  readonly rows: readonly CsvRow[];
};
