/**
 * CaseLinkageOperator — merge → filter → path-transform → upload.
 *
 * Walks start → loaded → merged → processed → published → done. Any stage
 * may abort; an aborted run hands back the caller's sample untouched. Only
 * a malformed sample (bad filePath) or an ambiguous directory throws.
 */

import { existsSync, statSync } from "fs";
import { v4 as uuidv4 } from "uuid";
import { parseOperatorOptions } from "../shared/config.js";
import type { OperatorConfig, OperatorOptionsInput } from "../shared/config.js";
import { InputContractError, describeError } from "../shared/errors.js";
import { ConsoleLogger } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";
import { TABLE_EXTENSION } from "../tables/csv_table.js";
import type { Table } from "../tables/csv_table.js";
import { processMergedTable } from "../linkage/data_processing.js";
import {
  CASE_KEY,
  innerJoin,
  loadCaseTables,
  missingMergedColumns,
  shape,
} from "../linkage/joiner.js";
import { parsePathRule } from "../linkage/path_mapper.js";
import type { PathRule } from "../linkage/path_mapper.js";
import type { RecordPredicate } from "../linkage/record_filter.js";
import { BatchUploader } from "../upload/batch_uploader.js";
import type { UploadReport } from "../upload/batch_uploader.js";
import { DatasetApiClient } from "../upload/dataset_client.js";
import type { DatasetSink } from "../upload/dataset_client.js";
import { RunTrace } from "./trace.js";
import type {
  Operator,
  PipelineRunResult,
  PipelineStage,
  SampleDescriptor,
} from "./types.js";

export const OUTPUT_FILE_NAME = "case_diagnosis_slides.json";
export const OUTPUT_FILE_TYPE = "json";

export interface OperatorDependencies {
  logger?: Logger;
  /** Replaces the HTTP client built from apiBaseUrl. */
  sink?: DatasetSink;
  /** Extra keep-predicates run after path rewriting. */
  extraFilters?: RecordPredicate[];
}

/** Returns the validated diagnosis file path or throws. */
export function validateSample(sample: SampleDescriptor): string {
  const filePath = sample.filePath;
  if (filePath === undefined || filePath === null || filePath === "") {
    throw new InputContractError("value", "Sample must contain a non-empty 'filePath'.");
  }
  if (typeof filePath !== "string") {
    throw new InputContractError("type", "'filePath' must be a string.");
  }
  if (!filePath.endsWith(TABLE_EXTENSION)) {
    throw new InputContractError("value", `'filePath' must point to a ${TABLE_EXTENSION} file.`);
  }
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new InputContractError("value", `'filePath' does not reference an existing file: ${filePath}`);
  }
  return filePath;
}

export class CaseLinkageOperator
  implements Operator<OperatorOptionsInput, SampleDescriptor, SampleDescriptor>
{
  private config: OperatorConfig;
  private pathRule: PathRule;
  private sink: DatasetSink;
  private logger: Logger;
  private extraFilters: RecordPredicate[];
  private injectedSink: boolean;

  constructor(options: OperatorOptionsInput = {}, deps: OperatorDependencies = {}) {
    this.logger = deps.logger ?? new ConsoleLogger("case-linkage");
    this.extraFilters = deps.extraFilters ?? [];
    this.injectedSink = deps.sink !== undefined;
    this.config = parseOperatorOptions(options);
    this.pathRule = parsePathRule(this.config.pathTransformer);
    this.sink = deps.sink ?? this.buildSink();
  }

  /** Replace the policy; later runs use the new options. */
  configure(options: OperatorOptionsInput): void {
    this.config = parseOperatorOptions(options);
    this.pathRule = parsePathRule(this.config.pathTransformer);
    if (!this.injectedSink) this.sink = this.buildSink();
  }

  get options(): Readonly<OperatorConfig> {
    return { ...this.config };
  }

  async run(sample: SampleDescriptor): Promise<SampleDescriptor> {
    const result = await this.execute(sample);
    return result.sample;
  }

  async execute(sample: SampleDescriptor): Promise<PipelineRunResult> {
    const runId = uuidv4();
    const trace = new RunTrace();

    const abort = (stage: PipelineStage, reason: string): PipelineRunResult => {
      trace.record("aborted", reason);
      return {
        runId,
        sample,
        state: { status: "aborted", stage, reason },
        trace: trace.getEntries(),
        upload: null,
      };
    };

    // ── start → loaded ──────────────────────────────────────────────
    const filePath = validateSample(sample);
    this.logger.info(`Processing file: ${filePath}`);

    const loaded = loadCaseTables(filePath, this.config.ignoreSdpc, this.logger);
    if (loaded.status === "skipped") {
      this.logger.info(`Skipping sample: ${loaded.reason}`);
      return abort("start", loaded.reason);
    }
    trace.record("loaded", `diagnosis ${shape(loaded.diagnosis)}, slides ${shape(loaded.slides)}`);

    // ── loaded → merged ─────────────────────────────────────────────
    const merged = innerJoin(loaded.diagnosis, loaded.slides, CASE_KEY);
    this.logger.info(`Data merged: ${shape(merged)}`);
    trace.record("merged", `merged ${shape(merged)}`);

    const unresolved = missingMergedColumns(merged, loaded.slides);
    if (unresolved.length > 0) {
      const reason = `Data processing failed: merged table has no ${unresolved.join(", ")} column (name clash between tables)`;
      this.logger.error(reason);
      return abort("merged", reason);
    }

    // ── merged → processed ──────────────────────────────────────────
    let processed: Table;
    try {
      processed = processMergedTable(
        merged,
        {
          pathRule: this.pathRule,
          ignoreSdpc: loaded.ignoreSdpc,
          extraFilters: this.extraFilters,
        },
        this.logger,
      );
    } catch (err) {
      const reason = `Data processing failed: ${describeError(err)}`;
      this.logger.error(reason);
      return abort("merged", reason);
    }
    this.logger.info(`Data processed: ${shape(processed)}`);
    trace.record("processed", `processed ${shape(processed)}`);

    // ── processed → published ───────────────────────────────────────
    const exportPath = sample.export_path;
    if (typeof exportPath !== "string" || exportPath.trim() === "") {
      const reason = "Sample missing 'export_path' key or value.";
      this.logger.error(reason);
      return abort("processed", reason);
    }

    let upload: UploadReport;
    try {
      const uploader = new BatchUploader({
        sink: this.sink,
        batchSize: this.config.batchSize,
        logger: this.logger,
      });
      upload = await uploader.publish(processed, exportPath);
    } catch (err) {
      const reason = `Failed to insert records into dataset: ${describeError(err)}`;
      this.logger.error(reason);
      return abort("processed", reason);
    }
    this.logger.info(`Data inserted into dataset: ${shape(processed)}`);
    trace.record(
      "published",
      `${upload.attempts.length - upload.failed}/${upload.attempts.length} requests accepted`,
    );

    // ── published → done ────────────────────────────────────────────
    const output: SampleDescriptor = {
      ...sample,
      text: serializeRows(processed),
      fileName: OUTPUT_FILE_NAME,
      fileType: OUTPUT_FILE_TYPE,
    };
    this.logger.info("Sample updated with processed data.");
    trace.record("done", `${processed.rows.length} records serialized`);

    return {
      runId,
      sample: output,
      state: { status: "done" },
      trace: trace.getEntries(),
      upload,
    };
  }

  private buildSink(): DatasetSink {
    return new DatasetApiClient({
      baseUrl: this.config.apiBaseUrl,
      timeoutMs: this.config.requestTimeoutMs,
    });
  }
}

/** JSON array of row objects, 2-space indent, non-ASCII kept as is. */
export function serializeRows(table: Table): string {
  return JSON.stringify(table.rows, null, 2);
}
