/**
 * In-memory tables loaded from CSV files.
 *
 * Cells stay as text. Empty cells become null so "missing" can be told
 * apart from a literal value.
 */

import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";

export type CellValue = string | null;
export type Row = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export const TABLE_EXTENSION = ".csv";

/** Parse CSV text with a header line into a Table. */
export function parseCsvTable(text: string): Table {
  const records = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  }) as Record<string, string | undefined>[];

  const columns = readHeader(text);
  const rows = records.map((record) => {
    const row: Row = {};
    for (const col of columns) {
      const v = record[col];
      row[col] = v === undefined || v === "" ? null : v;
    }
    return row;
  });
  return { columns, rows };
}

/**
 * Header names in file order. Taken from the first parsed line so that a
 * table with no data rows still reports its columns.
 */
function readHeader(text: string): string[] {
  const lines = parse(text, {
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    to_line: 1,
  }) as string[][];
  return lines[0] ?? [];
}

/** Read a CSV file from disk. */
export function readCsvTable(filePath: string): Table {
  return parseCsvTable(readFileSync(filePath, "utf-8"));
}

export function missingColumns(table: Table, required: readonly string[]): string[] {
  return required.filter((col) => !table.columns.includes(col));
}

/** Blank means null or an empty string. */
export function isBlank(value: CellValue | undefined): value is null | undefined | "" {
  return value === null || value === undefined || value === "";
}
