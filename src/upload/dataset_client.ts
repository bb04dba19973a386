/**
 * Dataset management API client.
 *
 * Registers existing files with a dataset:
 *   POST {baseUrl}/datasets/{datasetName}/files/upload/add
 *   body: { files: [{ filePath, metadata? }, ...] }
 * Any non-2xx status rejects.
 */

import axios, { type AxiosInstance } from "axios";
import path from "path";
import { UploadFailedError, describeError } from "../shared/errors.js";
import type { FileRecord } from "./records.js";

export interface AddFilesResponse {
  status: number;
  body: unknown;
}

/** Anything that can register file records with a dataset. */
export interface DatasetSink {
  endpointFor(exportPath: string): string;
  addFiles(exportPath: string, files: readonly FileRecord[]): Promise<AddFilesResponse>;
}

export interface DatasetApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Pre-built axios instance; tests pass one with a stub adapter. */
  http?: AxiosInstance;
}

/** The dataset is addressed by the last segment of the export path. */
export function datasetNameFor(exportPath: string): string {
  return path.posix.basename(exportPath.replace(/\/+$/, ""));
}

export class DatasetApiClient implements DatasetSink {
  private baseUrl: string;
  private http: AxiosInstance;

  constructor(opts: DatasetApiClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.http =
      opts.http ??
      axios.create({
        timeout: opts.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
  }

  endpointFor(exportPath: string): string {
    const name = encodeURIComponent(datasetNameFor(exportPath));
    return `${this.baseUrl}/datasets/${name}/files/upload/add`;
  }

  async addFiles(exportPath: string, files: readonly FileRecord[]): Promise<AddFilesResponse> {
    const endpoint = this.endpointFor(exportPath);
    try {
      const response = await this.http.post<unknown>(endpoint, { files });
      return { status: response.status, body: response.data };
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status ?? null;
        const data: unknown = err.response?.data;
        throw new UploadFailedError({
          endpoint,
          message: status !== null ? `HTTP ${status} from ${endpoint}` : `${err.message} (${endpoint})`,
          status,
          responseBody: data === undefined ? null : typeof data === "string" ? data : JSON.stringify(data),
        });
      }
      throw new UploadFailedError({ endpoint, message: describeError(err) });
    }
  }
}
