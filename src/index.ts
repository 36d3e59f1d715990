export * from "./types";
export * from "./lib/errors";
export { ArchiveClient, statusError, type ArchiveClientOptions } from "./lib/archive-client";
export { ArchiveSession, type ArchiveSessionOptions, type SessionCredentials } from "./lib/session";
export { RateLimiter, type RateLimiterOptions } from "./lib/rate-limiter";
export {
  DEFAULT_CONFIG,
  DEFAULT_FRAME_PATTERN,
  MAX_WORKERS_LIMIT,
  loadConfig,
  resolveConfig,
  type PollPolicy,
  type RetryPolicy,
  type TransferConfig,
  type TransferConfigInput,
} from "./lib/config";
export { EventChannel } from "./lib/event-channel";
export { classifySequence, collectUnits, walkFolder, FolderWalk, type WalkOptions } from "./lib/folder-walker";
export {
  JobBuilder,
  type DownloadFileOptions,
  type JobBuilderOptions,
  type OperationOptions,
} from "./lib/job-builder";
export { logger, type Logger } from "./lib/logger";
export { decidePreview, planPreviews, resolvePreview } from "./lib/preview-policy";
export type {
  CreateAppendageRequest,
  DownloadRequest,
  RemoteArchive,
  UploadSource,
} from "./lib/remote-archive";
export { jobKey } from "./lib/remote-archive";
export { backoffDelay, withRetry, type RetryOptions } from "./lib/retry";
export { StatusPoller, type PollStatus, type WaitOptions } from "./lib/status-poller";
export {
  TransferEngine,
  TransferRun,
  type RunOptions,
  type TaskContext,
  type TransferEngineOptions,
  type TransferTask,
} from "./lib/transfer-engine";
