/**
 * Record Filter — drops merged rows that cannot be published.
 *
 * Rules run in a fixed order; later rules assume earlier ones have already
 * removed rows without a slide path.
 */

import { isBlank } from "../tables/csv_table.js";
import type { Row, Table } from "../tables/csv_table.js";

export const SDPC_EXTENSION = ".sdpc";

/** Keep the row when the predicate returns true. */
export type RecordPredicate = (row: Row) => boolean;

export interface FilterOptions {
  ignoreSdpc: boolean;
  extraFilters?: readonly RecordPredicate[];
}

export function isSdpcSlide(row: Row): boolean {
  const slide = row.slide_path;
  return !isBlank(slide) && slide.endsWith(SDPC_EXTENSION);
}

export function dropMissingSlides(table: Table): Table {
  return { ...table, rows: table.rows.filter((row) => !isBlank(row.slide_path)) };
}

/**
 * SDPC slides are unusable without a thumbnail. With ignoreSdpc every SDPC
 * row goes; otherwise only those lacking a thumbnail.
 */
export function applySdpcRule(table: Table, ignoreSdpc: boolean): Table {
  const rows = table.rows.filter((row) => {
    if (!isSdpcSlide(row)) return true;
    if (ignoreSdpc) return false;
    return !isBlank(row.thumbnail_path);
  });
  return { ...table, rows };
}

export function applyExtraFilters(
  table: Table,
  predicates: readonly RecordPredicate[] = [],
): Table {
  if (predicates.length === 0) return table;
  const rows = table.rows.filter((row) => predicates.every((keep) => keep(row)));
  return { ...table, rows };
}

export function filterRecords(table: Table, options: FilterOptions): Table {
  const withSlides = dropMissingSlides(table);
  const usable = applySdpcRule(withSlides, options.ignoreSdpc);
  return applyExtraFilters(usable, options.extraFilters);
}
