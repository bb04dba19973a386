/**
 * Operator Configuration
 *
 * Construction-time options for the case-linkage operator:
 * - pathTransformer: path-rewrite rule ("<>" keeps paths, "old:new" swaps a
 *   prefix, anything else is a mount point to prepend).
 * - ignoreSdpc:      drop every .sdpc slide regardless of thumbnails.
 * - apiBaseUrl:      dataset management API root.
 * - batchSize:       rows per upload request.
 */

import { z } from "zod";

export const DEFAULT_PATH_TRANSFORMER = "/mnt/ruipath/hospital_data/";
export const DEFAULT_API_BASE_URL = "http://datamate-backend:8080/api/data-management";
export const DEFAULT_BATCH_SIZE = 1000;

export const OperatorOptionsSchema = z.object({
  pathTransformer: z.string().default(DEFAULT_PATH_TRANSFORMER),
  ignoreSdpc: z.boolean().default(false),
  apiBaseUrl: z.string().url().optional(),
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  requestTimeoutMs: z.number().int().positive().optional(),
});

export type OperatorOptionsInput = z.input<typeof OperatorOptionsSchema>;

export interface OperatorConfig {
  pathTransformer: string;
  ignoreSdpc: boolean;
  apiBaseUrl: string;
  batchSize: number;
  requestTimeoutMs?: number;
}

/**
 * Resolve the API root. Explicit option takes priority over the
 * environment variable; both fall back to the in-cluster default.
 */
export function resolveApiBaseUrl(option?: string, envVar?: string): string {
  const raw = option?.trim() || envVar?.trim() || DEFAULT_API_BASE_URL;
  return raw.replace(/\/+$/, "");
}

/** Validate raw options (throws a ZodError on bad input). */
export function parseOperatorOptions(
  raw: OperatorOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env,
): OperatorConfig {
  const parsed = OperatorOptionsSchema.parse(raw);
  return {
    pathTransformer: parsed.pathTransformer,
    ignoreSdpc: parsed.ignoreSdpc,
    apiBaseUrl: resolveApiBaseUrl(parsed.apiBaseUrl, env.DATASET_API_BASE_URL),
    batchSize: parsed.batchSize,
    requestTimeoutMs: parsed.requestTimeoutMs,
  };
}
