import type { Failure, FailureKind } from "@vidx/contracts";

export class PipelineError extends Error {
  kind: FailureKind;
  details?: unknown;

  constructor(kind: FailureKind, message: string, opts?: { details?: unknown; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.details = opts?.details;
  }

  toFailure(): Failure {
    return this.details === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, details: this.details };
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, message: string, opts?: { details?: unknown; cause?: unknown }): Result<T> {
  return { ok: false, error: new PipelineError(kind, message, opts) };
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Wrap an unknown thrown value, keeping an existing PipelineError as-is.
 */
export function toPipelineError(kind: FailureKind, err: unknown, details?: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  return new PipelineError(kind, errorMessage(err), { details, cause: err });
}
