/**
 * Pipeline Types
 *
 * Sample descriptors flow in and out of the operator; the run result adds
 * the terminal state, the stage trace and the upload report.
 */

import type { UploadReport } from "../upload/batch_uploader.js";

/** Host-provided sample. Fields beyond the ones read here pass through. */
export interface SampleDescriptor {
  filePath?: unknown;
  export_path?: unknown;
  fileName?: unknown;
  fileType?: unknown;
  text?: unknown;
  [key: string]: unknown;
}

export type PipelineStage = "start" | "loaded" | "merged" | "processed" | "published" | "done";

export type PipelineState =
  | { status: "done" }
  | { status: "aborted"; stage: PipelineStage; reason: string };

export interface TraceEntry {
  stage: PipelineStage | "aborted";
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  detail: string;
}

export interface PipelineRunResult {
  runId: string;
  sample: SampleDescriptor;
  state: PipelineState;
  trace: TraceEntry[];
  upload: UploadReport | null;
}

/** Minimal contract a host registry expects from a pluggable operator. */
export interface Operator<TOptions, TInput, TOutput> {
  configure(options: TOptions): void;
  run(input: TInput): Promise<TOutput>;
}
