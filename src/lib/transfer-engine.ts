import { v4 as uuidv4 } from "uuid";
import type {
  AppendageType,
  JobRef,
  JobResult,
  OperationKind,
  PollOutcome,
  TransferEvent,
  UnitResult,
} from "@/types";
import type { TransferConfig } from "./config";
import {
  CancelledError,
  isFatal,
  ParentTransferError,
  PartialUploadError,
  toTransferError,
  type FatalJobError,
  type TransferError,
} from "./errors";
import type { EventChannel } from "./event-channel";
import { logger as defaultLogger, type Logger } from "./logger";
import { withRetry } from "./retry";
import { createTransferStore, type TransferStore, type UnitRecord } from "@/stores/transfer-store";

export interface TaskContext {
  /** Remote id (upload) or local path (download) the parent task resolved to */
  parentResolved: string | null;
  /** Aborts when the operation is cancelled or hits a fatal error */
  signal: AbortSignal;
  /**
   * Run one remote call in its own retry loop. Steps of a task never share
   * attempts, so a retried upload does not recreate the appendage.
   */
  step<T>(name: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T>;
}

export interface TransferTask {
  index: number;
  parentIndex: number | null;
  label: string;
  type: AppendageType;
  size: number;
  /** Resolves to the remote id or local path children will receive */
  run(ctx: TaskContext): Promise<string>;
}

export interface RunOptions {
  operation: OperationKind;
  job: JobRef;
  signal?: AbortSignal;
  events?: EventChannel<TransferEvent>;
  diagnostics?: TransferError[];
}

export interface TransferEngineOptions {
  config: TransferConfig;
  logger?: Logger;
}

type TaskOutcome = { kind: "succeeded"; resolved: string } | { kind: "failed"; error: TransferError };

function toUnitResult(record: UnitRecord): UnitResult {
  const { index, label, type, attempts } = record;
  if (record.status === "succeeded" && record.remoteId !== null) {
    return {
      index,
      label,
      type,
      status: "succeeded",
      remoteId: record.remoteId,
      state: record.state ?? "transferred",
      attempts,
      ...(record.poll ? { poll: record.poll } : {}),
    };
  }
  if (record.status === "failed" && record.error) {
    return { index, label, type, status: "failed", error: record.error, attempts };
  }
  return { index, label, type, status: "cancelled", attempts };
}

/**
 * One top-level operation: owns its store, its abort controller and its
 * event channel. `execute` may be called more than once (e.g. a second
 * phase), `finish` exactly once.
 */
export class TransferRun {
  readonly operationId = uuidv4();
  readonly store: TransferStore;
  readonly startedAt = Date.now();

  private readonly controller = new AbortController();
  private readonly diagnostics: TransferError[];
  private fatal: FatalJobError | null = null;
  private finished = false;

  constructor(
    private readonly config: TransferConfig,
    private readonly logger: Logger,
    private readonly options: RunOptions
  ) {
    this.store = createTransferStore(this.operationId);
    this.diagnostics = [...(options.diagnostics ?? [])];

    const external = options.signal;
    if (external?.aborted) {
      this.controller.abort();
    } else {
      external?.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get wasCancelled(): boolean {
    return this.fatal === null && (this.options.signal?.aborted ?? false);
  }

  emit(event: TransferEvent): void {
    this.options.events?.push(event);
  }

  addDiagnostic(error: TransferError): void {
    this.diagnostics.push(error);
    this.store.getState().addLog("warn", error.message);
  }

  /** Stop all work because the job itself became unusable. */
  abortWith(error: FatalJobError): void {
    if (this.fatal) return;
    this.fatal = error;
    this.store.getState().addLog("error", `Operation aborted: ${error.message}`);
    this.controller.abort();
  }

  recordPoll(index: number, outcome: PollOutcome): void {
    const record = this.store.getState().units.get(index);
    if (!record || record.remoteId === null) return;
    this.store.getState().setPollOutcome(index, outcome);
    this.emit({
      type: outcome.status === "online" ? "unit-online" : "unit-still-processing",
      index,
      label: record.label,
      remoteId: record.remoteId,
    });
  }

  /**
   * Schedule `tasks` (in arena order) on a bounded pool. A task starts only
   * after its parent succeeded. Resolves once every task is terminal, or
   * throws the fatal error that stopped the run.
   */
  async execute(tasks: TransferTask[]): Promise<void> {
    const state = this.store.getState();
    state.addUnits(
      tasks.map(({ index, parentIndex, label, type, size }) => ({ index, parentIndex, label, type, size }))
    );

    const known = new Set(tasks.map((t) => t.index));
    const children = new Map<number, TransferTask[]>();
    const ready: TransferTask[] = [];
    for (const task of tasks) {
      if (task.parentIndex !== null && known.has(task.parentIndex)) {
        const siblings = children.get(task.parentIndex) ?? [];
        siblings.push(task);
        children.set(task.parentIndex, siblings);
      } else {
        ready.push(task);
      }
    }

    const maxWorkers = this.config.maxWorkers;
    let active = 0;

    await new Promise<void>((resolve) => {
      const check = () => {
        if (active === 0 && (this.signal.aborted || ready.length === 0)) {
          this.signal.removeEventListener("abort", check);
          resolve();
        }
      };

      const failDescendants = (task: TransferTask) => {
        for (const child of children.get(task.index) ?? []) {
          const error = new ParentTransferError(task.label);
          this.store.getState().markFailed(child.index, error);
          this.emit({ type: "unit-failed", index: child.index, label: child.label, error });
          failDescendants(child);
        }
      };

      const settle = (task: TransferTask, outcome: TaskOutcome) => {
        active--;
        const store = this.store.getState();

        if (outcome.kind === "succeeded") {
          store.markSucceeded(task.index, outcome.resolved);
          this.emit({ type: "unit-succeeded", index: task.index, label: task.label, remoteId: outcome.resolved });
          ready.push(...(children.get(task.index) ?? []));
        } else if (outcome.error instanceof CancelledError) {
          store.markCancelled(task.index);
          this.emit({ type: "unit-cancelled", index: task.index, label: task.label });
        } else {
          store.markFailed(task.index, outcome.error);
          this.emit({ type: "unit-failed", index: task.index, label: task.label, error: outcome.error });
          if (isFatal(outcome.error)) {
            this.abortWith(outcome.error);
          } else {
            failDescendants(task);
          }
        }

        pump();
        check();
      };

      const pump = () => {
        while (!this.signal.aborted && active < maxWorkers) {
          const task = ready.shift();
          if (!task) break;
          active++;
          this.runTask(task).then(
            (outcome) => settle(task, outcome),
            (err: unknown) => settle(task, { kind: "failed", error: toTransferError(err) })
          );
        }
      };

      this.signal.addEventListener("abort", check);
      pump();
      check();
    });

    // Whatever never started is cancelled
    for (const task of tasks) {
      const record = this.store.getState().units.get(task.index);
      if (record && (record.status === "pending" || record.status === "running")) {
        this.store.getState().markCancelled(task.index);
        this.emit({ type: "unit-cancelled", index: task.index, label: task.label });
      }
    }

    if (this.fatal) throw this.fatal;
  }

  private async runTask(task: TransferTask): Promise<TaskOutcome> {
    let attempts = 0;
    const store = this.store;
    const parentResolved =
      task.parentIndex !== null ? (store.getState().resolved.get(task.parentIndex) ?? null) : null;

    store.getState().markRunning(task.index, 0);
    store.getState().addLog("info", "Starting transfer", task.label);
    this.emit({ type: "unit-started", index: task.index, label: task.label, attempt: 1 });

    const ctx: TaskContext = {
      parentResolved,
      signal: this.signal,
      step: (name, fn) =>
        withRetry(fn, {
          policy: this.config.retry,
          attemptTimeoutMs: this.config.attemptTimeoutMs,
          signal: this.signal,
          onAttempt: () => {
            attempts++;
            store.getState().markRunning(task.index, attempts);
          },
          onRetry: (attempt, delayMs, error) => {
            store
              .getState()
              .addLog(
                "warn",
                `${name} attempt ${attempt} failed (${error.message}), retrying in ${Math.round(delayMs)} ms`,
                task.label
              );
            this.emit({
              type: "unit-retrying",
              index: task.index,
              label: task.label,
              attempt: attempt + 1,
              delayMs,
              error,
            });
          },
        }),
    };

    try {
      const resolved = await task.run(ctx);
      return { kind: "succeeded", resolved };
    } catch (err) {
      if (this.signal.aborted && !isFatal(err)) {
        return { kind: "failed", error: new CancelledError() };
      }
      return { kind: "failed", error: toTransferError(err) };
    }
  }

  /** Build the JobResult, emit `job-completed` and close the event channel. */
  finish(): JobResult {
    const state = this.store.getState();
    const units = [...state.unitOrder]
      .sort((a, b) => a - b)
      .flatMap((index) => {
        const record = state.units.get(index);
        return record ? [toUnitResult(record)] : [];
      });

    const succeeded = units.filter((u) => u.status === "succeeded").length;
    const failed = units.filter((u) => u.status === "failed").length;
    const cancelled = units.filter((u) => u.status === "cancelled").length;

    const result: JobResult = {
      operationId: this.operationId,
      operation: this.options.operation,
      job: this.options.job,
      units,
      succeeded,
      failed,
      cancelled,
      diagnostics: [...this.diagnostics],
      partialFailure: failed > 0 && failed < units.length ? new PartialUploadError(failed, units.length) : null,
      wasCancelled: this.wasCancelled,
      startedAt: this.startedAt,
      completedAt: Date.now(),
    };

    if (!this.finished) {
      this.finished = true;
      if (failed > 0) {
        state.addLog(
          "warn",
          `Finished with ${failed} failure${failed > 1 ? "s" : ""} and ${succeeded} success${succeeded !== 1 ? "es" : ""}`
        );
      } else {
        state.addLog("info", `Finished: ${succeeded} transferred, ${cancelled} cancelled`);
      }
      this.logger.debug("Operation finished", {
        operationId: this.operationId,
        operation: this.options.operation,
        succeeded,
        failed,
        cancelled,
      });
      this.emit({ type: "job-completed", operationId: this.operationId, succeeded, failed, cancelled });
      this.options.events?.close();
    }
    return result;
  }

  /** Finish the run and attach its partial result to the fatal error. */
  fail(error: FatalJobError): FatalJobError {
    error.result = this.finish();
    return error;
  }
}

/**
 * Dependency-aware bounded worker pool. Uploads and downloads are both
 * expressed as trees of TransferTasks.
 */
export class TransferEngine {
  private readonly config: TransferConfig;
  private readonly logger: Logger;

  constructor(options: TransferEngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
  }

  begin(options: RunOptions): TransferRun {
    return new TransferRun(this.config, this.logger, options);
  }

  /** Run every task to a terminal state and return the aggregate result. */
  async execute(tasks: TransferTask[], options: RunOptions): Promise<JobResult> {
    const run = this.begin(options);
    try {
      await run.execute(tasks);
    } catch (err) {
      if (isFatal(err)) throw run.fail(err);
      throw err;
    }
    return run.finish();
  }
}
