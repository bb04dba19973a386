/**
 * Shared test fixtures: temp case directories, a recording logger and an
 * in-process dataset sink.
 */
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";

import type { Logger } from "../src/shared/logger.js";
import type { AddFilesResponse, DatasetSink } from "../src/upload/dataset_client.js";
import type { FileRecord } from "../src/upload/records.js";

export function makeTmpDir(): string {
  return mkdtempSync(path.join(tmpdir(), "case-linkage-"));
}

/** Write each entry as a file in a fresh directory; returns the directory. */
export function writeCaseDir(files: Record<string, string>): string {
  const dir = makeTmpDir();
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(dir, name), content, "utf-8");
  }
  return dir;
}

export function csv(lines: string[]): string {
  return lines.join("\n") + "\n";
}

export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: string; message: string }> = [];

  debug(message: string): void {
    this.lines.push({ level: "debug", message });
  }
  info(message: string): void {
    this.lines.push({ level: "info", message });
  }
  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }
  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  messages(level: string): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export interface SinkCall {
  exportPath: string;
  files: FileRecord[];
}

/**
 * Records every request. `failOn` returns an error to throw for a given
 * call index (0-based), or null to accept it.
 */
export class FakeSink implements DatasetSink {
  readonly calls: SinkCall[] = [];
  private failOn: (index: number, call: SinkCall) => Error | null;

  constructor(failOn: (index: number, call: SinkCall) => Error | null = () => null) {
    this.failOn = failOn;
  }

  endpointFor(exportPath: string): string {
    return `http://datasets.test/api/datasets/${path.posix.basename(exportPath)}/files/upload/add`;
  }

  async addFiles(exportPath: string, files: readonly FileRecord[]): Promise<AddFilesResponse> {
    const call: SinkCall = { exportPath, files: [...files] };
    const index = this.calls.length;
    this.calls.push(call);
    const err = this.failOn(index, call);
    if (err) throw err;
    return { status: 200, body: { ok: true } };
  }
}
