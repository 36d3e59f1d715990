import type { JobResult } from "@/types";

export type ErrorCode =
  | "LOCAL_IO"
  | "AMBIGUOUS_SEQUENCE"
  | "NETWORK"
  | "REMOTE_REJECTION"
  | "PARTIAL_UPLOAD"
  | "AUTH_FAILURE"
  | "JOB_NOT_FOUND"
  | "INVALID_PREVIEW_SOURCE"
  | "PARENT_FAILED"
  | "CANCELLED";

export class TransferError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransferError";
  }
}

/** Local path missing or unreadable. Fatal to the affected unit only. */
export class LocalIOError extends TransferError {
  constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
    super(message, "LOCAL_IO", options);
    this.name = "LocalIOError";
  }
}

/**
 * Frame files that look like one sequence but disagree on padding or extension.
 * The walker records it and falls back to independent files.
 */
export class AmbiguousSequenceError extends TransferError {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly memberNames: string[]
  ) {
    super(message, "AMBIGUOUS_SEQUENCE");
    this.name = "AmbiguousSequenceError";
  }
}

/** Transport failure or 5xx-class answer. Retried with backoff. */
export class NetworkError extends TransferError {
  constructor(message: string, public readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, "NETWORK", options);
    this.name = "NetworkError";
  }
}

export class TransferTimeoutError extends NetworkError {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs} ms`);
    this.name = "TransferTimeoutError";
  }
}

export type RejectionReason = "validation" | "quota" | "permission" | "not-found";

/** The archive refused the request. Never retried. */
export class RemoteRejection extends TransferError {
  constructor(
    message: string,
    public readonly reason: RejectionReason,
    public readonly statusCode?: number,
    public readonly responseBody?: string
  ) {
    super(message, "REMOTE_REJECTION");
    this.name = "RemoteRejection";
  }
}

/** Some units of a job call failed while others succeeded. */
export class PartialUploadError extends TransferError {
  constructor(public readonly failedCount: number, public readonly totalCount: number) {
    super(`${failedCount} of ${totalCount} units failed`, "PARTIAL_UPLOAD");
    this.name = "PartialUploadError";
  }
}

/** Session rejected. Aborts the whole operation. */
export class AuthFailure extends TransferError {
  result?: JobResult;

  constructor(message: string, public readonly statusCode?: number) {
    super(message, "AUTH_FAILURE");
    this.name = "AuthFailure";
  }
}

/** The addressed job does not exist. Aborts the whole operation. */
export class JobNotFound extends TransferError {
  result?: JobResult;

  constructor(message: string) {
    super(message, "JOB_NOT_FOUND");
    this.name = "JobNotFound";
  }
}

export class InvalidPreviewSource extends TransferError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Preview source is not a readable file: ${path}`, "INVALID_PREVIEW_SOURCE", options);
    this.name = "InvalidPreviewSource";
  }
}

/** Recorded for units whose parent folder never reached the archive. */
export class ParentTransferError extends TransferError {
  constructor(public readonly parentLabel: string) {
    super(`Parent "${parentLabel}" was not transferred`, "PARENT_FAILED");
    this.name = "ParentTransferError";
  }
}

export class CancelledError extends TransferError {
  constructor(message = "Cancelled by caller") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export type FatalJobError = AuthFailure | JobNotFound;

export function isFatal(err: unknown): err is FatalJobError {
  return err instanceof AuthFailure || err instanceof JobNotFound;
}

export function isTransient(err: unknown): boolean {
  return err instanceof NetworkError;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize anything thrown during a transfer into the taxonomy.
 * Node filesystem errors become LocalIOError; unknown errors are treated as
 * non-transient rejections so they are recorded rather than retried.
 */
export function toTransferError(err: unknown, path?: string): TransferError {
  if (err instanceof TransferError) return err;

  const code = errnoCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (code && ["ENOENT", "EACCES", "EPERM", "EISDIR", "ENOTDIR", "EEXIST", "EMFILE", "EBUSY"].includes(code)) {
    return new LocalIOError(message, path ?? "", { cause: err });
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new CancelledError();
  }
  return new RemoteRejection(message, "validation");
}
