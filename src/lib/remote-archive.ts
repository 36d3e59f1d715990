import type { Appendage, AppendageMessage, AppendageType, FileVersion, JobRef, RemoteFrame } from "@/types";

export interface CreateAppendageRequest {
  type: AppendageType;
  name: string;
  parentId: string | null;
  createPreview: boolean;
  frames?: string[]; // frame file names, image sequences only
  fps?: number; // playback rate, image sequences only
  message?: AppendageMessage;
}

export interface UploadSource {
  name: string;
  path: string;
  size: number;
}

export interface DownloadRequest {
  version?: FileVersion;
  frame?: string; // one frame of an image sequence
}

/** Stable identity of a job, whichever way it is addressed. */
export function jobKey(job: JobRef): string {
  const selector = "jobId" in job ? `job:${job.jobId}` : `def:${job.jobDefId}`;
  if (job.kind === "shot") {
    const shot = "customShotId" in job ? `c:${job.customShotId}` : `${job.shotListId}/${job.stageId}/${job.shotId}`;
    return `shot/${shot}/${selector}`;
  }
  const asset = "customAssetId" in job ? `c:${job.customAssetId}` : `${job.assetListId}/${job.assetId}`;
  return `asset/${asset}/${selector}`;
}

/**
 * Capabilities the transfer engine needs from the archive. Authentication
 * and transport live behind this interface.
 */
export interface RemoteArchive {
  /** Throws JobNotFound or AuthFailure when the job cannot be addressed. */
  verifyJob(job: JobRef, signal?: AbortSignal): Promise<void>;

  /** Creates an offline appendage (or a folder container) and returns its id. */
  createAppendage(job: JobRef, request: CreateAppendageRequest, signal?: AbortSignal): Promise<string>;

  /** Sends the bytes of a file (one source) or an image sequence (one source per frame). */
  uploadContent(job: JobRef, appendageId: string, sources: UploadSource[], signal?: AbortSignal): Promise<void>;

  uploadPreview(job: JobRef, appendageId: string, previewPath: string, signal?: AbortSignal): Promise<void>;

  /** Marks a folder's child list as final. */
  completeFolder(job: JobRef, folderId: string, signal?: AbortSignal): Promise<void>;

  getAppendage(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<Appendage>;

  /** Direct children of a folder appendage, ordered by name. */
  listChildren(job: JobRef, folderId: string, signal?: AbortSignal): Promise<Appendage[]>;

  listFrames(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<RemoteFrame[]>;

  download(
    job: JobRef,
    appendageId: string,
    request: DownloadRequest,
    signal?: AbortSignal
  ): Promise<AsyncIterable<Uint8Array>>;
}
