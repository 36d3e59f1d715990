import type { TransferError, PartialUploadError } from "@/lib/errors";

/** Kind of media an appendage holds. Fixed when the appendage is created. */
export type AppendageType = "file" | "folder" | "image-sequence";

export const APPENDAGE_TYPE_FILE = "file" satisfies AppendageType;
export const APPENDAGE_TYPE_FOLDER = "folder" satisfies AppendageType;
export const APPENDAGE_TYPE_IMAGE_SEQUENCE = "image-sequence" satisfies AppendageType;

/** Selects the job inside a shot or asset: a concrete job or the one built from a job definition */
export type JobSelector = { jobId: number } | { jobDefId: number };

/** A shot addressed by its numeric ids, or by the customer's own shot id */
export type ShotJobRef = JobSelector & { kind: "shot" } & (
    | { shotListId: number; stageId: number; shotId: number }
    | { customShotId: string }
  );

/** An asset addressed by its numeric ids, or by the customer's own asset id */
export type AssetJobRef = JobSelector & { kind: "asset" } & (
    | { assetListId: number; assetId: number }
    | { customAssetId: string }
  );

/** Remote container that appendages are attached to */
export type JobRef = ShotJobRef | AssetJobRef;

/** Every appendage is created together with a message in the job's history */
export interface AppendageMessage {
  text: string;
  /** Must exist in the status pool of the shot or asset list */
  statusId: number;
}

/** How an appendage gets its preview */
export type PreviewDirective =
  | { kind: "none" }
  | { kind: "server-generated" }
  | { kind: "client-supplied"; path: string };

/** Which rendition of an appendage to download */
export type FileVersion = "original" | "preview" | "thumbnail";

/** Server-side representation of one media unit attached to a job */
export interface Appendage {
  id: string;
  type: AppendageType;
  name: string;
  size: number; // bytes; sum of members for sequences and folders
  isOnline: boolean;
  hasPreview: boolean;
  previewSource: PreviewDirective;
  parentId: string | null;
}

/** One frame file of a sequence listed by the archive */
export interface RemoteFrame {
  name: string;
  size: number;
}

// ─── Local transfer units ───────────────────────────────────

interface TransferUnitBase {
  index: number;
  parentIndex: number | null;
  name: string;
  relativePath: string; // POSIX separators, "" for the walk root
  absolutePath: string;
  size: number;
}

export interface FileUnit extends TransferUnitBase {
  type: "file";
}

export interface FolderUnit extends TransferUnitBase {
  type: "folder";
}

export interface SequenceMember {
  name: string;
  path: string;
  size: number;
  frame: number;
}

export interface SequenceUnit extends TransferUnitBase {
  type: "image-sequence";
  pattern: string; // e.g. "frame_####.png"
  members: SequenceMember[];
}

export type TransferUnit = FileUnit | FolderUnit | SequenceUnit;

// ─── Results ────────────────────────────────────────────────

/** Two-phase completion: bytes sent, then server processing done */
export type TransferState = "transferred" | "online";

export type PollOutcome =
  | { status: "online"; elapsedMs: number }
  | { status: "still-processing"; elapsedMs: number };

export type UnitResult =
  | {
      index: number;
      label: string;
      type: AppendageType;
      status: "succeeded";
      remoteId: string;
      state: TransferState;
      attempts: number;
      poll?: PollOutcome;
    }
  | {
      index: number;
      label: string;
      type: AppendageType;
      status: "failed";
      error: TransferError;
      attempts: number;
    }
  | {
      index: number;
      label: string;
      type: AppendageType;
      status: "cancelled";
      attempts: number;
    };

export type OperationKind =
  | "upload-file"
  | "upload-folder"
  | "upload-image-sequence"
  | "download-folder"
  | "download-image-sequence";

/** Aggregate outcome of one top-level upload or download call */
export interface JobResult {
  operationId: string;
  operation: OperationKind;
  job: JobRef;
  units: UnitResult[];
  succeeded: number;
  failed: number;
  cancelled: number;
  diagnostics: TransferError[];
  partialFailure: PartialUploadError | null;
  wasCancelled: boolean;
  startedAt: number; // Unix ms
  completedAt: number; // Unix ms
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: TransferError };

// ─── Events ─────────────────────────────────────────────────

export type TransferEvent =
  | { type: "unit-started"; index: number; label: string; attempt: number }
  | { type: "unit-retrying"; index: number; label: string; attempt: number; delayMs: number; error: TransferError }
  | { type: "unit-succeeded"; index: number; label: string; remoteId: string }
  | { type: "unit-failed"; index: number; label: string; error: TransferError }
  | { type: "unit-cancelled"; index: number; label: string }
  | { type: "unit-online"; index: number; label: string; remoteId: string }
  | { type: "unit-still-processing"; index: number; label: string; remoteId: string }
  | { type: "job-completed"; operationId: string; succeeded: number; failed: number; cancelled: number };

/** Log entry severity */
export type LogSeverity = "info" | "warn" | "error" | "success";

/** A single operation log entry */
export interface LogEntry {
  id: number;
  timestamp: number; // Unix ms
  severity: LogSeverity;
  message: string;
  unitLabel?: string;
}
