/**
 * Error types raised by the case-linkage pipeline.
 *
 * Only input-contract violations and ambiguous directory layouts escape to
 * the caller; everything else is logged and turned into an aborted run or a
 * failed upload attempt.
 */

export type InputContractKind = "type" | "value";

export class InputContractError extends Error {
  readonly kind: InputContractKind;

  constructor(kind: InputContractKind, message: string) {
    super(message);
    this.name = "InputContractError";
    this.kind = kind;
  }
}

export class AmbiguousSiblingError extends Error {
  readonly directory: string;
  readonly candidates: string[];

  constructor(directory: string, candidates: string[]) {
    super(
      `Expected exactly one slide table next to the diagnosis file in ${directory}, found ${candidates.length}: ${candidates.join(", ")}`,
    );
    this.name = "AmbiguousSiblingError";
    this.directory = directory;
    this.candidates = candidates;
  }
}

export class UploadFailedError extends Error {
  readonly endpoint: string;
  readonly status: number | null;
  readonly responseBody: string | null;

  constructor(params: {
    endpoint: string;
    message: string;
    status?: number | null;
    responseBody?: string | null;
  }) {
    super(params.message);
    this.name = "UploadFailedError";
    this.endpoint = params.endpoint;
    this.status = params.status ?? null;
    this.responseBody = params.responseBody ?? null;
  }
}

/** Render any thrown value as a single log-friendly line. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
