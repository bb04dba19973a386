import type { PipelineStage, TraceEntry } from "./types.js";

/**
 * Run trace: one entry per state transition, scoped to a single run.
 */
export class RunTrace {
  private entries: TraceEntry[] = [];
  private mark = new Date();

  /** Close the current step and start timing the next one. */
  record(stage: PipelineStage | "aborted", detail: string): TraceEntry {
    const completedAt = new Date();
    const entry: TraceEntry = {
      stage,
      startedAt: this.mark,
      completedAt,
      durationMs: completedAt.getTime() - this.mark.getTime(),
      detail,
    };
    this.entries.push(entry);
    this.mark = completedAt;
    return entry;
  }

  getEntries(): TraceEntry[] {
    return [...this.entries];
  }
}
