import fs from "fs-extra";
import { v4 as uuidv4 } from "uuid";
import type { Appendage, JobRef, PreviewDirective, RemoteFrame } from "@/types";
import { CancelledError, JobNotFound, RemoteRejection, type TransferError } from "@/lib/errors";
import {
  jobKey,
  type CreateAppendageRequest,
  type DownloadRequest,
  type RemoteArchive,
  type UploadSource,
} from "@/lib/remote-archive";
import { sleep } from "@/lib/retry";

export type ArchiveCall =
  | "verify"
  | "create"
  | "upload"
  | "preview"
  | "complete"
  | "get"
  | "list"
  | "frames"
  | "download";

export interface RecordedCall {
  call: ArchiveCall;
  name: string; // appendage name, or the job key for "verify"
}

interface Fault {
  call: ArchiveCall;
  name: string | null; // null matches every name
  remaining: number; // Infinity for always
  error: () => TransferError;
}

interface StoredAppendage {
  appendage: Appendage;
  jobKey: string;
  request: CreateAppendageRequest;
  children: string[];
  content: Uint8Array | null;
  preview: Uint8Array | null;
  frames: Map<string, Uint8Array>;
  contentAt: number | null;
  completed: boolean;
}

export interface InMemoryArchiveOptions {
  /** Time between content arrival and `isOnline` turning true */
  processingDelayMs?: number;
  /** Delay added to every call, to let concurrent work overlap */
  latencyMs?: number;
  now?: () => number;
}

/**
 * In-process RemoteArchive for tests. Keeps appendages and their bytes in
 * memory, records the order of calls and injects faults on demand.
 */
export class InMemoryArchive implements RemoteArchive {
  readonly calls: RecordedCall[] = [];
  maxInFlight = 0;

  private readonly jobs = new Set<string>();
  private readonly appendages = new Map<string, StoredAppendage>();
  private readonly faults: Fault[] = [];
  private inFlight = 0;
  private readonly processingDelayMs: number;
  private readonly latencyMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryArchiveOptions = {}) {
    this.processingDelayMs = options.processingDelayMs ?? 0;
    this.latencyMs = options.latencyMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  addJob(job: JobRef): this {
    this.jobs.add(jobKey(job));
    return this;
  }

  /** Make the next `times` calls of kind `call` on `name` throw `error()`. */
  failOn(call: ArchiveCall, name: string | null, error: () => TransferError, times = Infinity): this {
    this.faults.push({ call, name, remaining: times, error });
    return this;
  }

  setOnline(id: string): void {
    const stored = this.appendages.get(id);
    if (stored) stored.appendage.isOnline = true;
  }

  /** Appendages of a job in creation order */
  list(job: JobRef): Appendage[] {
    const key = jobKey(job);
    return [...this.appendages.values()].filter((s) => s.jobKey === key).map((s) => ({ ...s.appendage }));
  }

  findByName(name: string): Appendage | undefined {
    for (const stored of this.appendages.values()) {
      if (stored.appendage.name === name) return { ...stored.appendage };
    }
    return undefined;
  }

  contentOf(id: string): Uint8Array | null {
    return this.appendages.get(id)?.content ?? null;
  }

  frameContent(id: string, frame: string): Uint8Array | null {
    return this.appendages.get(id)?.frames.get(frame) ?? null;
  }

  previewOf(id: string): Uint8Array | null {
    return this.appendages.get(id)?.preview ?? null;
  }

  /** The request an appendage was created with */
  requestOf(id: string): CreateAppendageRequest | undefined {
    return this.appendages.get(id)?.request;
  }

  isCompleted(id: string): boolean {
    return this.appendages.get(id)?.completed ?? false;
  }

  // ─── RemoteArchive ────────────────────────────────────────

  async verifyJob(job: JobRef, signal?: AbortSignal): Promise<void> {
    await this.enter("verify", jobKey(job), signal);
    try {
      if (!this.jobs.has(jobKey(job))) {
        throw new JobNotFound(`No job at ${jobKey(job)}`);
      }
    } finally {
      this.leave();
    }
  }

  async createAppendage(job: JobRef, request: CreateAppendageRequest, signal?: AbortSignal): Promise<string> {
    await this.enter("create", request.name, signal);
    try {
      const key = this.requireJob(job);
      if (request.parentId !== null) {
        const parent = this.require(key, request.parentId);
        if (parent.appendage.type !== "folder") {
          throw new RemoteRejection("Parent is not a folder", "validation", 422);
        }
        if (parent.completed) {
          throw new RemoteRejection("Parent folder is already complete", "validation", 409);
        }
      }

      const id = uuidv4();
      const previewSource: PreviewDirective = request.createPreview ? { kind: "server-generated" } : { kind: "none" };
      this.appendages.set(id, {
        appendage: {
          id,
          type: request.type,
          name: request.name,
          size: 0,
          isOnline: false,
          hasPreview: false,
          previewSource,
          parentId: request.parentId,
        },
        jobKey: key,
        request: { ...request },
        children: [],
        content: null,
        preview: null,
        frames: new Map(),
        contentAt: null,
        completed: false,
      });
      if (request.parentId !== null) {
        this.appendages.get(request.parentId)?.children.push(id);
      }
      return id;
    } finally {
      this.leave();
    }
  }

  async uploadContent(job: JobRef, appendageId: string, sources: UploadSource[], signal?: AbortSignal): Promise<void> {
    const stored = this.require(this.requireJob(job), appendageId);
    await this.enter("upload", stored.appendage.name, signal);
    try {
      const buffers = await Promise.all(sources.map((s) => fs.readFile(s.path)));
      if (stored.appendage.type === "image-sequence") {
        sources.forEach((source, i) => stored.frames.set(source.name, new Uint8Array(buffers[i])));
      } else {
        stored.content = new Uint8Array(buffers[0]);
      }
      stored.appendage.size = buffers.reduce((sum, b) => sum + b.length, 0);
      stored.contentAt = this.now();
      if (stored.appendage.previewSource.kind === "server-generated") {
        stored.appendage.hasPreview = true;
      }
    } finally {
      this.leave();
    }
  }

  async uploadPreview(job: JobRef, appendageId: string, previewPath: string, signal?: AbortSignal): Promise<void> {
    const stored = this.require(this.requireJob(job), appendageId);
    await this.enter("preview", stored.appendage.name, signal);
    try {
      stored.preview = new Uint8Array(await fs.readFile(previewPath));
      stored.appendage.hasPreview = true;
      stored.appendage.previewSource = { kind: "client-supplied", path: previewPath };
    } finally {
      this.leave();
    }
  }

  async completeFolder(job: JobRef, folderId: string, signal?: AbortSignal): Promise<void> {
    const stored = this.require(this.requireJob(job), folderId);
    await this.enter("complete", stored.appendage.name, signal);
    try {
      stored.completed = true;
      stored.contentAt = this.now();
      stored.appendage.size = stored.children.reduce(
        (sum, id) => sum + (this.appendages.get(id)?.appendage.size ?? 0),
        0
      );
    } finally {
      this.leave();
    }
  }

  async getAppendage(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<Appendage> {
    const stored = this.require(this.requireJob(job), appendageId);
    await this.enter("get", stored.appendage.name, signal);
    try {
      const { appendage, contentAt } = stored;
      if (!appendage.isOnline && contentAt !== null && this.now() - contentAt >= this.processingDelayMs) {
        appendage.isOnline = true;
      }
      return { ...appendage };
    } finally {
      this.leave();
    }
  }

  async listChildren(job: JobRef, folderId: string, signal?: AbortSignal): Promise<Appendage[]> {
    const key = this.requireJob(job);
    const stored = this.require(key, folderId);
    await this.enter("list", stored.appendage.name, signal);
    try {
      return stored.children
        .map((id) => this.require(key, id).appendage)
        .map((a) => ({ ...a }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } finally {
      this.leave();
    }
  }

  async listFrames(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<RemoteFrame[]> {
    const stored = this.require(this.requireJob(job), appendageId);
    await this.enter("frames", stored.appendage.name, signal);
    try {
      return [...stored.frames.entries()].map(([name, bytes]) => ({ name, size: bytes.length }));
    } finally {
      this.leave();
    }
  }

  async download(
    job: JobRef,
    appendageId: string,
    request: DownloadRequest,
    signal?: AbortSignal
  ): Promise<AsyncIterable<Uint8Array>> {
    const stored = this.require(this.requireJob(job), appendageId);
    await this.enter("download", request.frame ?? stored.appendage.name, signal);
    try {
      let bytes: Uint8Array | null | undefined;
      if (request.frame !== undefined) {
        bytes = stored.frames.get(request.frame);
      } else if (request.version === "preview" || request.version === "thumbnail") {
        bytes = stored.preview;
      } else {
        bytes = stored.content;
      }
      if (!bytes) {
        throw new RemoteRejection(`Nothing to download for ${stored.appendage.name}`, "not-found", 404);
      }
      return chunked(bytes, 4);
    } finally {
      this.leave();
    }
  }

  // ─── Internals ────────────────────────────────────────────

  private async enter(call: ArchiveCall, name: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    this.calls.push({ call, name });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs, signal);
      const fault = this.faults.find((f) => f.call === call && (f.name === null || f.name === name) && f.remaining > 0);
      if (fault) {
        fault.remaining--;
        throw fault.error();
      }
    } catch (err) {
      this.leave();
      throw err;
    }
  }

  private leave(): void {
    this.inFlight--;
  }

  private requireJob(job: JobRef): string {
    const key = jobKey(job);
    if (!this.jobs.has(key)) throw new JobNotFound(`No job at ${key}`);
    return key;
  }

  private require(key: string, id: string): StoredAppendage {
    const stored = this.appendages.get(id);
    if (!stored || stored.jobKey !== key) {
      throw new RemoteRejection(`No appendage ${id}`, "not-found", 404);
    }
    return stored;
  }
}

async function* chunked(bytes: Uint8Array, parts: number): AsyncGenerator<Uint8Array> {
  const size = Math.max(1, Math.ceil(bytes.length / parts));
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}
