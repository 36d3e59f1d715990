/**
 * Archive API client - HTTP implementation of RemoteArchive.
 * Uses ArchiveSession for auth and RateLimiter for throttling.
 */

import fs from "fs-extra";
import type { Appendage, AppendageType, JobRef, PreviewDirective, RemoteFrame } from "@/types";
import {
  AuthFailure,
  JobNotFound,
  NetworkError,
  RemoteRejection,
  type TransferError,
} from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import { RateLimiter } from "./rate-limiter";
import type {
  CreateAppendageRequest,
  DownloadRequest,
  RemoteArchive,
  UploadSource,
} from "./remote-archive";
import { ArchiveSession, type SessionCredentials } from "./session";

const STATUS_SERVER_PROCESSING = 299;
const STATUS_PLEASE_AUTHENTICATE = 460;
const STATUS_BAD_CREDENTIALS = 462;
const STATUS_INSUFFICIENT_AUTH = 463;
const STATUS_SESSIONS_EXCEEDED = 464;

// Wire codes for appendage types
const TYPE_CODES: Record<AppendageType, number> = {
  file: 1,
  folder: 2,
  "image-sequence": 3,
};

export interface ArchiveClientOptions {
  /** Server origin, e.g. https://archive.example.com */
  baseUrl: string;
  customerId: string;
  credentials: SessionCredentials;
  fetch?: typeof fetch;
  rateLimiter?: RateLimiter;
  logger?: Logger;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  headers?: Record<string, string>;
  body?: string | Blob;
  signal?: AbortSignal;
  /** A 404 here means the job itself is missing */
  jobLevel?: boolean;
}

// ─── Wire decoding ──────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typeFromCode(code: unknown): AppendageType {
  for (const [type, value] of Object.entries(TYPE_CODES)) {
    if (value === code && (type === "file" || type === "folder" || type === "image-sequence")) {
      return type;
    }
  }
  throw new RemoteRejection(`Unknown appendage type code: ${String(code)}`, "validation");
}

function decodePreviewSource(value: unknown): PreviewDirective {
  if (value === "server") return { kind: "server-generated" };
  if (isRecord(value) && typeof value.path === "string") return { kind: "client-supplied", path: value.path };
  return { kind: "none" };
}

function decodeAppendage(value: unknown): Appendage {
  if (!isRecord(value) || (typeof value.id !== "string" && typeof value.id !== "number")) {
    throw new RemoteRejection("Malformed appendage in response", "validation");
  }
  const parentId = value.parentId;
  return {
    id: String(value.id),
    type: typeFromCode(value.appendageType),
    name: typeof value.fileName === "string" ? value.fileName : "",
    size: typeof value.size === "number" ? value.size : 0,
    isOnline: value.isOnline === true,
    hasPreview: value.hasPreview === true,
    previewSource: decodePreviewSource(value.previewSource),
    parentId: typeof parentId === "string" || typeof parentId === "number" ? String(parentId) : null,
  };
}

function decodeFrame(value: unknown): RemoteFrame {
  if (!isRecord(value) || typeof value.fileName !== "string") {
    throw new RemoteRejection("Malformed frame in response", "validation");
  }
  return { name: value.fileName, size: typeof value.size === "number" ? value.size : 0 };
}

function errorMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && typeof parsed.ERROR === "string") return parsed.ERROR;
  } catch {
    // not JSON; the raw body is kept on the error
  }
  return undefined;
}

/** Map a non-success status to the error taxonomy. */
export function statusError(status: number, body: string, jobLevel = false): TransferError {
  const detail = errorMessage(body);
  const message = detail ?? `Archive API error (${status})`;

  switch (status) {
    case STATUS_SERVER_PROCESSING:
    case 400:
    case 409:
    case 422:
      return new RemoteRejection(message, "validation", status, body);
    case STATUS_INSUFFICIENT_AUTH:
    case 403:
      return new RemoteRejection(message, "permission", status, body);
    case 413:
    case 507:
      return new RemoteRejection(message, "quota", status, body);
    case 401:
    case STATUS_BAD_CREDENTIALS:
    case STATUS_PLEASE_AUTHENTICATE:
      return new AuthFailure(message, status);
    case 404:
      return jobLevel ? new JobNotFound(message) : new RemoteRejection(message, "not-found", status, body);
    case STATUS_SESSIONS_EXCEEDED:
      return new NetworkError(message, status);
  }
  if (status >= 500 || status === 429) {
    return new NetworkError(message, status);
  }
  return new RemoteRejection(message, "validation", status, body);
}

/** Chunks of a response body. A connection lost mid-body surfaces as NetworkError. */
async function* readBody(body: ReadableStream<Uint8Array>, signal?: AbortSignal): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read().catch((err: unknown) => {
        if (signal?.aborted) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new NetworkError(`Download interrupted: ${message}`, undefined, { cause: err });
      });
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

function segment(value: string | number): string {
  return encodeURIComponent(String(value));
}

/** Path prefix of a job. Jobs under a custom shot or asset id are addressed through `shot_c`/`asset_c`. */
function jobPath(job: JobRef): string {
  const [id, isDefId] = "jobId" in job ? [job.jobId, false] : [job.jobDefId, true];
  let owner: string;
  if (job.kind === "shot") {
    owner =
      "customShotId" in job
        ? "shotList/stage/shot_c"
        : `shotList/${segment(job.shotListId)}/stage/${segment(job.stageId)}/shot/${segment(job.shotId)}`;
  } else {
    owner =
      "customAssetId" in job
        ? "assetList/asset_c"
        : `assetList/${segment(job.assetListId)}/asset/${segment(job.assetId)}`;
  }
  return `${owner}/job/${segment(id)}/${isDefId}/`;
}

function customId(job: JobRef): string | null {
  if ("customShotId" in job) return job.customShotId;
  if ("customAssetId" in job) return job.customAssetId;
  return null;
}

// ─── Client ─────────────────────────────────────────────────

export class ArchiveClient implements RemoteArchive {
  readonly session: ArchiveSession;
  private readonly apiRoot: string;
  private readonly fetchFn: typeof fetch;
  private readonly limiter: RateLimiter;
  private readonly logger: Logger;

  constructor(options: ArchiveClientOptions) {
    this.apiRoot = `${options.baseUrl.replace(/\/+$/, "")}/${segment(options.customerId)}/api/`;
    this.fetchFn = options.fetch ?? fetch;
    this.limiter = options.rateLimiter ?? new RateLimiter();
    this.logger = options.logger ?? defaultLogger;
    this.session = new ArchiveSession({
      apiRoot: this.apiRoot,
      credentials: options.credentials,
      fetch: this.fetchFn,
      logger: this.logger,
    });
  }

  /**
   * Make an authenticated, rate-limited request below a job's path. Renews
   * the session once when the server asks for authentication.
   */
  private async archiveFetch(job: JobRef, suffix: string, options: RequestOptions = {}): Promise<Response> {
    const { signal } = options;
    const path = `${jobPath(job)}${suffix}`;
    const custom = customId(job);
    let sessionId = await this.session.getSessionId(signal);

    const doRequest = async (): Promise<Response> => {
      try {
        return await this.fetchFn(`${this.apiRoot}${path}`, {
          method: options.method ?? "GET",
          headers: {
            Authorization: `Session ${sessionId}`,
            Accept: "application/json",
            "Content-Type": "application/json",
            ...(custom !== null ? { customId: custom } : {}),
            ...options.headers,
          },
          body: options.body,
          signal,
        });
      } catch (err) {
        if (signal?.aborted) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new NetworkError(`Request to ${path} failed: ${message}`, undefined, { cause: err });
      }
    };

    let response = await this.limiter.withRateLimit(doRequest, signal);

    if (response.status === STATUS_PLEASE_AUTHENTICATE) {
      await response.body?.cancel();
      sessionId = await this.session.renew(sessionId, signal);
      response = await this.limiter.withRateLimit(doRequest, signal);
    }

    if (response.status >= STATUS_SERVER_PROCESSING) {
      const body = await response.text();
      const error = statusError(response.status, body, options.jobLevel);
      this.logger.debug("Archive request failed", { path, status: response.status, code: error.code });
      throw error;
    }
    return response;
  }

  private async json(job: JobRef, suffix: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.archiveFetch(job, suffix, options);
    const text = await response.text();
    if (text === "") return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new RemoteRejection(`Invalid JSON from ${suffix}`, "validation", response.status, text);
    }
  }

  private async sendFile(job: JobRef, suffix: string, filePath: string, signal?: AbortSignal): Promise<void> {
    const bytes = await fs.readFile(filePath);
    await this.archiveFetch(job, suffix, {
      method: "POST",
      headers: { "Content-Type": "application/octet-stream" },
      body: new Blob([bytes]),
      signal,
    });
  }

  // ─── RemoteArchive ────────────────────────────────────────

  async verifyJob(job: JobRef, signal?: AbortSignal): Promise<void> {
    await this.archiveFetch(job, "object", { signal, jobLevel: true });
  }

  /** Sequences go through their own endpoint, which also takes the playback rate. */
  async createAppendage(job: JobRef, request: CreateAppendageRequest, signal?: AbortSignal): Promise<string> {
    const sequence = request.type === "image-sequence";
    const custom = customId(job);
    const response = await this.archiveFetch(job, sequence ? "addImageSeqAppendage" : "addAppendage", {
      method: "PUT",
      body: JSON.stringify({
        fileName: request.name,
        appendageType: TYPE_CODES[request.type],
        parentId: request.parentId,
        createPreview: request.createPreview,
        ...(request.message ? { text: request.message.text, statusId: request.message.statusId } : {}),
        ...(sequence && request.fps !== undefined ? { fps: request.fps } : {}),
        ...(request.frames ? { frames: request.frames } : {}),
        ...(custom !== null ? { customId: custom } : {}),
      }),
      signal,
      jobLevel: true,
    });
    const id = (await response.text()).trim();
    if (id === "") {
      throw new RemoteRejection("Appendage created but no id returned", "validation", response.status);
    }
    return id;
  }

  async uploadContent(job: JobRef, appendageId: string, sources: UploadSource[], signal?: AbortSignal): Promise<void> {
    for (const source of sources) {
      await this.sendFile(
        job,
        `appendage/${segment(appendageId)}/upload/${segment(source.name)}`,
        source.path,
        signal
      );
    }
  }

  async uploadPreview(job: JobRef, appendageId: string, previewPath: string, signal?: AbortSignal): Promise<void> {
    await this.sendFile(job, `appendage/${segment(appendageId)}/uploadPreview`, previewPath, signal);
  }

  async completeFolder(job: JobRef, folderId: string, signal?: AbortSignal): Promise<void> {
    await this.archiveFetch(job, `appendage/${segment(folderId)}/complete`, { method: "PUT", signal });
  }

  async getAppendage(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<Appendage> {
    return decodeAppendage(await this.json(job, `appendage/${segment(appendageId)}`, { signal }));
  }

  async listChildren(job: JobRef, folderId: string, signal?: AbortSignal): Promise<Appendage[]> {
    const body = await this.json(job, `appendage/${segment(folderId)}/children`, { signal });
    if (!Array.isArray(body)) return [];
    return body
      .map(decodeAppendage)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async listFrames(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<RemoteFrame[]> {
    const body = await this.json(job, `appendage/${segment(appendageId)}/frames`, { signal });
    return Array.isArray(body) ? body.map(decodeFrame) : [];
  }

  async download(
    job: JobRef,
    appendageId: string,
    request: DownloadRequest,
    signal?: AbortSignal
  ): Promise<AsyncIterable<Uint8Array>> {
    const base = `appendage/${segment(appendageId)}`;
    const suffix =
      request.frame !== undefined
        ? `${base}/frame/${segment(request.frame)}/getfile`
        : `${base}/getfile/${request.version ?? "original"}`;

    const response = await this.archiveFetch(job, suffix, {
      headers: { Accept: "application/octet-stream" },
      signal,
    });
    if (!response.body) {
      throw new NetworkError(`Empty download body for ${appendageId}`, response.status);
    }
    return readBody(response.body, signal);
  }
}
