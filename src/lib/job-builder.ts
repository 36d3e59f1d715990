import fs from "fs-extra";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type {
  Appendage,
  AppendageMessage,
  FileVersion,
  JobRef,
  JobResult,
  OperationKind,
  PollOutcome,
  PreviewDirective,
  Result,
  TransferEvent,
  TransferUnit,
} from "@/types";
import { DEFAULT_CONFIG, type TransferConfig } from "./config";
import {
  CancelledError,
  isFatal,
  LocalIOError,
  RemoteRejection,
  toTransferError,
  type TransferError,
} from "./errors";
import type { EventChannel } from "./event-channel";
import { classifySequence, collectUnits, walkFolder } from "./folder-walker";
import { logger as defaultLogger, type Logger } from "./logger";
import { planPreviews, resolvePreview } from "./preview-policy";
import type { RemoteArchive } from "./remote-archive";
import { withRetry } from "./retry";
import { StatusPoller } from "./status-poller";
import { TransferEngine, type TaskContext, type TransferRun, type TransferTask } from "./transfer-engine";

export interface OperationOptions {
  signal?: AbortSignal;
  /** Poll every transferred appendage until it is online or the timeout passes */
  waitForOnline?: boolean;
  onlineTimeoutMs?: number;
  events?: EventChannel<TransferEvent>;
  /** Message created with each top-level appendage */
  message?: AppendageMessage;
  /** Playback rate recorded on image sequences */
  fps?: number;
}

export interface DownloadFileOptions {
  version?: FileVersion;
}

export interface JobBuilderOptions {
  config?: TransferConfig;
  logger?: Logger;
}

type Step = TaskContext["step"];

// ─── Local file helpers ─────────────────────────────────────

/** Remote names become single path segments; anything else is refused. */
function localName(name: string): string {
  if (name === "" || name === "." || name === ".." || /[\\/]/.test(name)) {
    throw new LocalIOError(`Refusing to write remote name "${name}"`, name);
  }
  return name;
}

async function hasSize(filePath: string, size: number): Promise<boolean> {
  if (!(await fs.pathExists(filePath))) return false;
  const stats = await fs.stat(filePath);
  return stats.isFile() && stats.size === size;
}

/**
 * Stream a download into `<dest>.part` and move it into place. The partial
 * file is removed before a retry and when the download finally fails.
 */
async function fetchToFile(
  dest: string,
  overwrite: boolean,
  open: (signal: AbortSignal) => Promise<AsyncIterable<Uint8Array>>,
  step: Step
): Promise<void> {
  const part = `${dest}.part`;
  await step("download", async (signal) => {
    try {
      const chunks = await open(signal);
      await pipeline(Readable.from(chunks), fs.createWriteStream(part, { flags: "w" }), { signal });
    } catch (err) {
      await fs.remove(part);
      throw toTransferError(err, dest);
    }
  });
  try {
    await fs.move(part, dest, { overwrite });
  } catch (err) {
    await fs.remove(part);
    throw toTransferError(err, dest);
  }
}

function label(unit: TransferUnit): string {
  return unit.relativePath || unit.name;
}

/**
 * Public upload and download operations against Shot and Asset jobs. Each
 * call verifies the job before touching anything else and reports through a
 * JobResult (trees) or a Result (single appendages).
 */
export class JobBuilder {
  private readonly config: TransferConfig;
  private readonly logger: Logger;
  private readonly engine: TransferEngine;

  constructor(private readonly archive: RemoteArchive, options: JobBuilderOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? defaultLogger;
    this.engine = new TransferEngine({ config: this.config, logger: this.logger });
  }

  // ─── Uploads ──────────────────────────────────────────────

  uploadFile(
    job: JobRef,
    localPath: string,
    createPreview: boolean,
    previewPath?: string,
    options: OperationOptions = {}
  ): Promise<JobResult> {
    return this.runOperation("upload-file", job, options, async (run) => {
      const directive = await resolvePreview(createPreview, previewPath);
      const units = await collectUnits(walkFolder(localPath, { typeHint: "file" }));
      await this.upload(run, job, units, createPreview, directive, options);
    });
  }

  uploadFolder(
    job: JobRef,
    localRootPath: string,
    createPreview: boolean,
    previewPath?: string,
    options: OperationOptions = {}
  ): Promise<JobResult> {
    return this.runOperation("upload-folder", job, options, async (run) => {
      const directive = await resolvePreview(createPreview, previewPath);
      const walk = walkFolder(localRootPath, {
        typeHint: "folder",
        framePattern: this.config.framePattern,
        minSequenceLength: this.config.minSequenceLength,
      });
      const units = await collectUnits(walk);
      for (const diagnostic of walk.diagnostics) {
        run.addDiagnostic(diagnostic);
      }
      this.logger.info("Folder walked", { root: localRootPath, units: units.length });
      await this.upload(run, job, units, createPreview, directive, options);
    });
  }

  uploadImageSequence(
    job: JobRef,
    localPaths: string[],
    createPreview: boolean,
    previewPath?: string,
    options: OperationOptions = {}
  ): Promise<JobResult> {
    return this.runOperation("upload-image-sequence", job, options, async (run) => {
      const directive = await resolvePreview(createPreview, previewPath);
      const unit = await classifySequence(localPaths, { framePattern: this.config.framePattern });
      await this.upload(run, job, [unit], createPreview, directive, options);
    });
  }

  /** Attach a client-supplied preview to an existing appendage. */
  uploadPreview(
    job: JobRef,
    appendageId: string,
    previewPath: string,
    options: Pick<OperationOptions, "signal"> = {}
  ): Promise<Result<void>> {
    return this.attempt(async () => {
      await this.retry(options.signal, (signal) => this.archive.verifyJob(job, signal));
      const directive = await resolvePreview(false, previewPath);
      if (directive.kind !== "client-supplied") {
        throw new LocalIOError("A preview path is required", previewPath);
      }
      await this.retry(options.signal, (signal) =>
        this.archive.uploadPreview(job, appendageId, directive.path, signal)
      );
    });
  }

  private async upload(
    run: TransferRun,
    job: JobRef,
    units: TransferUnit[],
    createPreview: boolean,
    rootDirective: PreviewDirective,
    options: OperationOptions
  ): Promise<void> {
    const plan = planPreviews(units, createPreview, rootDirective);
    const tasks = units.map((unit) =>
      this.uploadTask(job, unit, plan.get(unit.index) ?? { kind: "none" }, options)
    );

    await run.execute(tasks);
    await this.completeFolders(run, job, units);
    if (options.waitForOnline) {
      await this.awaitOnline(run, job, options.onlineTimeoutMs ?? this.config.poll.timeoutMs);
    }
  }

  private uploadTask(
    job: JobRef,
    unit: TransferUnit,
    preview: PreviewDirective,
    options: Pick<OperationOptions, "message" | "fps">
  ): TransferTask {
    return {
      index: unit.index,
      parentIndex: unit.parentIndex,
      label: label(unit),
      type: unit.type,
      size: unit.size,
      run: async ({ parentResolved, step }) => {
        const id = await step("create", (signal) =>
          this.archive.createAppendage(
            job,
            {
              type: unit.type,
              name: unit.name,
              parentId: parentResolved,
              createPreview: preview.kind === "server-generated",
              ...(unit.type === "image-sequence" ? { frames: unit.members.map((m) => m.name) } : {}),
              ...(unit.type === "image-sequence" && options.fps !== undefined ? { fps: options.fps } : {}),
              ...(unit.parentIndex === null && options.message ? { message: options.message } : {}),
            },
            signal
          )
        );

        if (unit.type === "file") {
          const source = { name: unit.name, path: unit.absolutePath, size: unit.size };
          await step("upload", (signal) => this.archive.uploadContent(job, id, [source], signal));
        } else if (unit.type === "image-sequence") {
          const sources = unit.members.map(({ name, path, size }) => ({ name, path, size }));
          await step("upload", (signal) => this.archive.uploadContent(job, id, sources, signal));
        }

        if (preview.kind === "client-supplied") {
          await step("preview", (signal) => this.archive.uploadPreview(job, id, preview.path, signal));
        }
        return id;
      },
    };
  }

  /** Finalize created folders once their subtree has been attempted, deepest first. */
  private async completeFolders(run: TransferRun, job: JobRef, units: TransferUnit[]): Promise<void> {
    const state = run.store.getState();
    const folders = units.filter((u) => u.type === "folder").sort((a, b) => b.index - a.index);

    for (const folder of folders) {
      const folderId = state.resolved.get(folder.index);
      if (folderId === undefined || run.signal.aborted) continue;
      try {
        await this.retry(run.signal, (signal) => this.archive.completeFolder(job, folderId, signal));
      } catch (err) {
        const error = toTransferError(err);
        if (isFatal(error)) {
          run.abortWith(error);
          throw error;
        }
        if (error instanceof CancelledError) return;
        run.addDiagnostic(error);
      }
    }
  }

  private async awaitOnline(run: TransferRun, job: JobRef, timeoutMs: number): Promise<void> {
    const poller = this.poller();
    const deadline = Date.now() + timeoutMs;
    const state = run.store.getState();

    for (const index of state.unitOrder) {
      const record = state.units.get(index);
      if (!record || record.status !== "succeeded" || record.remoteId === null) continue;
      if (run.signal.aborted) return;

      try {
        const outcome = await poller.waitUntilOnline(job, record.remoteId, {
          timeoutMs: Math.max(0, deadline - Date.now()),
          signal: run.signal,
        });
        run.recordPoll(index, outcome);
      } catch (err) {
        const error = toTransferError(err);
        if (isFatal(error)) {
          run.abortWith(error);
          throw error;
        }
        if (error instanceof CancelledError) return;
        run.addDiagnostic(error);
      }
    }
  }

  // ─── Downloads ────────────────────────────────────────────

  /** Download one file appendage to `destPath`, which must not exist yet. */
  downloadFile(
    job: JobRef,
    appendageId: string,
    destPath: string,
    downloadOptions: DownloadFileOptions = {},
    options: Pick<OperationOptions, "signal"> = {}
  ): Promise<Result<string>> {
    return this.attempt(async () => {
      await this.retry(options.signal, (signal) => this.archive.verifyJob(job, signal));
      const appendage = await this.retry(options.signal, (signal) =>
        this.archive.getAppendage(job, appendageId, signal)
      );
      if (appendage.type !== "file") {
        throw new RemoteRejection(`Appendage ${appendageId} is a ${appendage.type}, not a file`, "validation");
      }

      const dest = path.resolve(destPath);
      if (await fs.pathExists(dest)) {
        throw new LocalIOError(`Destination already exists: ${dest}`, dest);
      }
      await fs.ensureDir(path.dirname(dest));

      const version = downloadOptions.version ?? "original";
      await fetchToFile(
        dest,
        false,
        (signal) => this.archive.download(job, appendageId, { version }, signal),
        (_name, fn) => this.retry(options.signal, fn)
      );
      this.logger.info("Downloaded appendage", { appendageId, dest, version });
      return dest;
    });
  }

  /**
   * Mirror a remote folder tree under `destRootPath`. Files already present
   * with the same size are kept, others are overwritten.
   */
  downloadFolder(
    job: JobRef,
    appendageId: string,
    destRootPath: string,
    options: OperationOptions = {}
  ): Promise<JobResult> {
    return this.runOperation("download-folder", job, options, async (run) => {
      const root = await this.retry(run.signal, (signal) => this.archive.getAppendage(job, appendageId, signal));
      if (root.type !== "folder") {
        throw new RemoteRejection(`Appendage ${appendageId} is a ${root.type}, not a folder`, "validation");
      }

      const destRoot = path.resolve(destRootPath);
      const nodes = await this.collectRemoteTree(run, job, root);
      const tasks = nodes.map(({ index, parentIndex, appendage }) =>
        this.downloadTask(job, index, parentIndex, appendage, destRoot)
      );
      await run.execute(tasks);
    });
  }

  /** Download every frame of a sequence into `destFolder`, skipping frames already there. */
  downloadImageSequence(
    job: JobRef,
    appendageId: string,
    destFolder: string,
    options: OperationOptions = {}
  ): Promise<JobResult> {
    return this.runOperation("download-image-sequence", job, options, async (run) => {
      const appendage = await this.retry(run.signal, (signal) =>
        this.archive.getAppendage(job, appendageId, signal)
      );
      if (appendage.type !== "image-sequence") {
        throw new RemoteRejection(
          `Appendage ${appendageId} is a ${appendage.type}, not an image sequence`,
          "validation"
        );
      }
      await run.execute([this.downloadTask(job, 0, null, appendage, path.resolve(destFolder))]);
    });
  }

  private async collectRemoteTree(
    run: TransferRun,
    job: JobRef,
    root: Appendage
  ): Promise<Array<{ index: number; parentIndex: number | null; appendage: Appendage }>> {
    const nodes: Array<{ index: number; parentIndex: number | null; appendage: Appendage }> = [];

    const visit = async (appendage: Appendage, parentIndex: number | null): Promise<void> => {
      const index = nodes.length;
      nodes.push({ index, parentIndex, appendage });
      if (appendage.type !== "folder") return;

      let children: Appendage[];
      try {
        children = await this.retry(run.signal, (signal) => this.archive.listChildren(job, appendage.id, signal));
      } catch (err) {
        const error = toTransferError(err);
        if (isFatal(error) || error instanceof CancelledError) throw error;
        run.addDiagnostic(error);
        return;
      }
      for (const child of children) {
        await visit(child, index);
      }
    };

    await visit(root, null);
    return nodes;
  }

  private downloadTask(
    job: JobRef,
    index: number,
    parentIndex: number | null,
    appendage: Appendage,
    destRoot: string
  ): TransferTask {
    return {
      index,
      parentIndex,
      label: appendage.name,
      type: appendage.type,
      size: appendage.size,
      run: async ({ parentResolved, step }) => {
        const dir = parentResolved ?? destRoot;

        if (appendage.type === "folder") {
          const target = parentResolved === null ? destRoot : path.join(dir, localName(appendage.name));
          await fs.ensureDir(target);
          return target;
        }

        await fs.ensureDir(dir);

        if (appendage.type === "file") {
          const dest = path.join(dir, localName(appendage.name));
          if (!(await hasSize(dest, appendage.size))) {
            await fetchToFile(
              dest,
              true,
              (signal) => this.archive.download(job, appendage.id, { version: "original" }, signal),
              step
            );
          }
          return dest;
        }

        // Frames land beside the sequence's siblings, as they were uploaded
        const frames = await step("list frames", (signal) => this.archive.listFrames(job, appendage.id, signal));
        for (const frame of frames) {
          const dest = path.join(dir, localName(frame.name));
          if (await hasSize(dest, frame.size)) continue;
          await fetchToFile(
            dest,
            true,
            (signal) => this.archive.download(job, appendage.id, { frame: frame.name }, signal),
            step
          );
        }
        return dir;
      },
    };
  }

  // ─── Status ───────────────────────────────────────────────

  async waitUntilOnline(
    job: JobRef,
    appendageId: string,
    timeoutMs: number,
    options: Pick<OperationOptions, "signal"> = {}
  ): Promise<PollOutcome> {
    await this.retry(options.signal, (signal) => this.archive.verifyJob(job, signal));
    return this.poller().waitUntilOnline(job, appendageId, { timeoutMs, signal: options.signal });
  }

  // ─── Plumbing ─────────────────────────────────────────────

  /** One poller per operation, so what it has seen online lives as long as the call. */
  private poller(): StatusPoller {
    return new StatusPoller(this.archive, this.config.poll, { logger: this.logger });
  }

  private retry<T>(signal: AbortSignal | undefined, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withRetry(fn, {
      policy: this.config.retry,
      attemptTimeoutMs: this.config.attemptTimeoutMs,
      signal,
    });
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      const error: TransferError = toTransferError(err);
      this.logger.warn("Operation failed", { code: error.code, error: error.message });
      return { ok: false, error };
    }
  }

  /**
   * Shared frame of every tree operation: verify the job, run `body`, and
   * turn the run into a JobResult. Fatal errors reject with the partial
   * result attached; other preconditions reject as they are.
   */
  private async runOperation(
    operation: OperationKind,
    job: JobRef,
    options: OperationOptions,
    body: (run: TransferRun) => Promise<void>
  ): Promise<JobResult> {
    const run = this.engine.begin({ operation, job, signal: options.signal, events: options.events });
    this.logger.info("Operation started", { operation, operationId: run.operationId });

    try {
      await this.retry(run.signal, (signal) => this.archive.verifyJob(job, signal));
      await body(run);
    } catch (err) {
      if (isFatal(err)) {
        run.abortWith(err);
        throw run.fail(err);
      }
      if (err instanceof CancelledError && run.wasCancelled) {
        return run.finish();
      }
      options.events?.close();
      throw err;
    }
    return run.finish();
  }
}
