/**
 * Batch Uploader — publishes the processed table to a dataset.
 *
 * Each batch is posted twice, once per record kind. A failed post is logged
 * with enough detail to replay it by hand and the run moves on; nothing
 * here throws and nothing is retried.
 */

import { UploadFailedError, describeError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { Table } from "../tables/csv_table.js";
import type { DatasetSink } from "./dataset_client.js";
import { UPLOAD_KINDS, buildBatchRecords, partitionRows } from "./records.js";
import type { FileRecord, UploadKind } from "./records.js";

export interface UploadAttempt {
  kind: UploadKind;
  /** Row range [start, end) within the table. */
  start: number;
  end: number;
  count: number;
  ok: boolean;
  status?: number | null;
  error?: string;
}

export interface UploadReport {
  endpoint: string;
  batchCount: number;
  attempts: UploadAttempt[];
  failed: number;
}

/** Shell command that replays a request, for failure logs. */
export function toCurlCommand(endpoint: string, body: unknown): string {
  const json = JSON.stringify(body).replace(/'/g, `'\\''`);
  return `curl -X POST "${endpoint}" -H "Content-Type: application/json" -d '${json}'`;
}

export class BatchUploader {
  private sink: DatasetSink;
  private batchSize: number;
  private logger: Logger;

  constructor(opts: { sink: DatasetSink; batchSize: number; logger: Logger }) {
    this.sink = opts.sink;
    this.batchSize = opts.batchSize;
    this.logger = opts.logger;
  }

  async publish(table: Table, exportPath: string): Promise<UploadReport> {
    const endpoint = this.sink.endpointFor(exportPath);
    const batches = partitionRows(table.rows, this.batchSize);
    const attempts: UploadAttempt[] = [];

    this.logger.info(`Dataset API: ${endpoint} | batch size ${this.batchSize} | ${batches.length} batches`);

    let start = 0;
    for (const batch of batches) {
      const end = start + batch.length;
      const records = buildBatchRecords(batch);

      for (const kind of UPLOAD_KINDS) {
        const files: FileRecord[] = records[kind];
        attempts.push(await this.post(endpoint, exportPath, kind, files, start, end));
      }
      start = end;
    }

    const failed = attempts.filter((a) => !a.ok).length;
    if (failed > 0) {
      this.logger.warn(`${failed} of ${attempts.length} upload requests failed`);
    }
    return { endpoint, batchCount: batches.length, attempts, failed };
  }

  private async post(
    endpoint: string,
    exportPath: string,
    kind: UploadKind,
    files: FileRecord[],
    start: number,
    end: number,
  ): Promise<UploadAttempt> {
    const range = `${start}-${end}`;
    const base = { kind, start, end, count: files.length };
    this.logger.info(`Uploading batch ${range}: ${files.length} ${kind} records`);

    let replay = "";
    try {
      replay = toCurlCommand(endpoint, { files });
      this.logger.debug(`Replay ${kind} batch ${range}: ${replay}`);
      const response = await this.sink.addFiles(exportPath, files);
      this.logger.info(`Uploaded ${kind} records for batch ${range}`);
      return { ...base, ok: true, status: response.status };
    } catch (err) {
      this.logger.error(`Failed to upload ${kind} records (batch ${range}) to ${endpoint}: ${describeError(err)}`);
      if (replay) this.logger.error(`Replay with: ${replay}`);
      if (err instanceof UploadFailedError) {
        if (err.responseBody !== null) this.logger.error(`Response body: ${err.responseBody}`);
        return { ...base, ok: false, status: err.status, error: err.message };
      }
      return { ...base, ok: false, error: describeError(err) };
    }
  }
}
