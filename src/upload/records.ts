/**
 * Upload records derived from merged rows.
 */

import type { CellValue, Row } from "../tables/csv_table.js";

export type UploadKind = "slide" | "thumbnail";
export const UPLOAD_KINDS: readonly UploadKind[] = ["slide", "thumbnail"];

export interface SlideFileRecord {
  filePath: CellValue;
  metadata: Record<string, CellValue>;
}

export interface ThumbnailFileRecord {
  filePath: CellValue;
}

export type FileRecord = SlideFileRecord | ThumbnailFileRecord;

export interface BatchRecords {
  slide: SlideFileRecord[];
  thumbnail: ThumbnailFileRecord[];
}

/** Contiguous slices of at most `size` rows. */
export function partitionRows<T>(rows: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    batches.push(rows.slice(start, start + size));
  }
  return batches;
}

/** Slide record carries every other column as metadata, thumbnail path included. */
export function toSlideRecord(row: Row): SlideFileRecord {
  const { slide_path: slidePath = null, ...metadata } = row;
  return { filePath: slidePath, metadata };
}

export function toThumbnailRecord(row: Row): ThumbnailFileRecord {
  return { filePath: row.thumbnail_path ?? "" };
}

export function buildBatchRecords(batch: readonly Row[]): BatchRecords {
  return {
    slide: batch.map(toSlideRecord),
    thumbnail: batch.map(toThumbnailRecord),
  };
}
