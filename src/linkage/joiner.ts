/**
 * Joiner — loads the diagnosis table and its sibling slide table, then
 * inner-joins them on the case number.
 *
 * Malformed tables are not errors: the caller gets a "skipped" outcome and
 * hands the sample back untouched.
 */

import { readdirSync, statSync } from "fs";
import path from "path";
import { AmbiguousSiblingError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import {
  TABLE_EXTENSION,
  isBlank,
  missingColumns,
  readCsvTable,
} from "../tables/csv_table.js";
import type { Row, Table } from "../tables/csv_table.js";

export const CASE_KEY = "case_no";
export const DIAGNOSIS_COLUMNS = [CASE_KEY, "diagnosis"] as const;
export const SLIDE_COLUMNS = [CASE_KEY, "slide_path"] as const;
export const THUMBNAIL_COLUMN = "thumbnail_path";

export type LoadOutcome =
  | { status: "loaded"; diagnosis: Table; slides: Table; ignoreSdpc: boolean }
  | { status: "skipped"; reason: string };

/**
 * Locate the slide table beside the diagnosis file. Only files with the
 * tabular extension count; symlinks are followed, dangling ones skipped. Returns null when there is none and throws
 * when there is more than one.
 */
export function findSiblingTable(diagnosisPath: string): string | null {
  const dir = path.dirname(diagnosisPath);
  const own = path.basename(diagnosisPath);

  const candidates = readdirSync(dir)
    .filter((name) => name !== own && name.endsWith(TABLE_EXTENSION))
    .filter((name) => statSync(path.join(dir, name), { throwIfNoEntry: false })?.isFile() ?? false)
    .sort();

  if (candidates.length === 0) return null;
  if (candidates.length > 1) throw new AmbiguousSiblingError(dir, candidates);
  return path.join(dir, candidates[0]);
}

export function loadCaseTables(
  diagnosisPath: string,
  ignoreSdpc: boolean,
  logger: Logger,
): LoadOutcome {
  const diagnosis = readCsvTable(diagnosisPath);
  const diagMissing = missingColumns(diagnosis, DIAGNOSIS_COLUMNS);
  if (diagMissing.length > 0) {
    return { status: "skipped", reason: `Diagnosis table missing columns: ${diagMissing.join(", ")}` };
  }

  const slidePath = findSiblingTable(diagnosisPath);
  if (!slidePath) {
    logger.error(`No slide table found in ${path.dirname(diagnosisPath)}`);
    return { status: "skipped", reason: "No slide table found beside the diagnosis file" };
  }

  const slides = readCsvTable(slidePath);
  const slideMissing = missingColumns(slides, SLIDE_COLUMNS);
  if (slideMissing.length > 0) {
    return { status: "skipped", reason: `Slide table missing columns: ${slideMissing.join(", ")}` };
  }

  let runIgnoreSdpc = ignoreSdpc;
  if (!slides.columns.includes(THUMBNAIL_COLUMN)) {
    logger.warn(`No '${THUMBNAIL_COLUMN}' column in ${path.basename(slidePath)}; all SDPC slides will be ignored`);
    runIgnoreSdpc = true;
  }

  logger.info(`File read: diagnosis table ${shape(diagnosis)}`);
  logger.info(`File read: slide table     ${shape(slides)}`);

  return { status: "loaded", diagnosis, slides, ignoreSdpc: runIgnoreSdpc };
}

/**
 * Inner join. Output columns are the left columns followed by the right
 * columns minus the key; overlapping non-key names get _x / _y suffixes.
 * Rows pair up in left order, then right order.
 */
export function innerJoin(left: Table, right: Table, key: string): Table {
  const rightExtra = right.columns.filter((c) => c !== key);
  const overlap = new Set(left.columns.filter((c) => c !== key && rightExtra.includes(c)));

  const leftName = (c: string) => (overlap.has(c) ? `${c}_x` : c);
  const rightName = (c: string) => (overlap.has(c) ? `${c}_y` : c);
  const columns = [...left.columns.map(leftName), ...rightExtra.map(rightName)];

  const index = new Map<string, Row[]>();
  for (const row of right.rows) {
    const k = row[key];
    if (isBlank(k)) continue;
    const bucket = index.get(k);
    if (bucket) bucket.push(row);
    else index.set(k, [row]);
  }

  const rows: Row[] = [];
  for (const l of left.rows) {
    const k = l[key];
    if (isBlank(k)) continue;
    for (const r of index.get(k) ?? []) {
      const merged: Row = {};
      for (const c of left.columns) merged[leftName(c)] = l[c] ?? null;
      for (const c of rightExtra) merged[rightName(c)] = r[c] ?? null;
      rows.push(merged);
    }
  }

  return { columns, rows };
}

/**
 * Path columns the processing step needs after the join. A column that both
 * tables carry comes out suffixed, so the plain name is gone.
 */
export function missingMergedColumns(merged: Table, slides: Table): string[] {
  const needed: string[] = [...SLIDE_COLUMNS];
  if (slides.columns.includes(THUMBNAIL_COLUMN)) needed.push(THUMBNAIL_COLUMN);
  return missingColumns(merged, needed);
}

export function shape(table: Table): string {
  return `(${table.rows.length}, ${table.columns.length})`;
}
