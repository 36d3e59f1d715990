import { createStore } from "zustand/vanilla";
import type { AppendageType, LogEntry, LogSeverity, PollOutcome, TransferState } from "@/types";
import type { TransferError } from "@/lib/errors";
import { logger } from "@/lib/logger";

const MAX_LOG_ENTRIES = 50_000;

/** Unit status state machine */
export type UnitStatus = "pending" | "running" | "succeeded" | "failed" | "cancelled";

export interface UnitRecord {
  index: number;
  parentIndex: number | null;
  label: string;
  type: AppendageType;
  size: number;
  status: UnitStatus;
  attempts: number;
  remoteId: string | null;
  state: TransferState | null;
  poll: PollOutcome | null;
  error: TransferError | null;
  startedAt: number | null; // Unix ms
  completedAt: number | null; // Unix ms
}

export interface UnitSeed {
  index: number;
  parentIndex: number | null;
  label: string;
  type: AppendageType;
  size: number;
}

export interface TransferStoreState {
  operationId: string;
  units: Map<number, UnitRecord>;
  unitOrder: number[];
  // resolved remote id (upload) or local path (download) per unit index
  resolved: Map<number, string>;
  logs: LogEntry[];

  addUnits: (seeds: UnitSeed[]) => void;
  markRunning: (index: number, attempt: number) => void;
  markSucceeded: (index: number, resolvedId: string) => void;
  markFailed: (index: number, error: TransferError) => void;
  markCancelled: (index: number) => void;
  setPollOutcome: (index: number, outcome: PollOutcome) => void;
  addLog: (severity: LogSeverity, message: string, unitLabel?: string) => void;
}

export type TransferStore = ReturnType<typeof createTransferStore>;

let logIdCounter = 0;

function makeRecord(seed: UnitSeed): UnitRecord {
  return {
    ...seed,
    status: "pending",
    attempts: 0,
    remoteId: null,
    state: null,
    poll: null,
    error: null,
    startedAt: null,
    completedAt: null,
  };
}

function appendLog(logs: LogEntry[], severity: LogSeverity, message: string, unitLabel?: string): LogEntry[] {
  const newLogs = [...logs];
  newLogs.push({
    id: ++logIdCounter,
    timestamp: Date.now(),
    severity,
    message,
    unitLabel,
  });
  while (newLogs.length > MAX_LOG_ENTRIES) {
    newLogs.shift();
  }

  const level = severity === "success" ? "info" : severity;
  logger.log(level, message, unitLabel ? { unit: unitLabel } : {});
  return newLogs;
}

/**
 * Per-operation aggregate. Every mutation is a single synchronous `set`, so
 * completions from concurrent workers are applied one at a time.
 */
export function createTransferStore(operationId: string) {
  return createStore<TransferStoreState>()((set) => ({
    operationId,
    units: new Map(),
    unitOrder: [],
    resolved: new Map(),
    logs: [],

    addUnits: (seeds) =>
      set((state) => {
        const units = new Map(state.units);
        const unitOrder = [...state.unitOrder];
        for (const seed of seeds) {
          units.set(seed.index, makeRecord(seed));
          unitOrder.push(seed.index);
        }
        return { units, unitOrder };
      }),

    markRunning: (index, attempt) =>
      set((state) => {
        const unit = state.units.get(index);
        if (!unit) return state;
        const units = new Map(state.units);
        units.set(index, {
          ...unit,
          status: "running",
          attempts: attempt,
          startedAt: unit.startedAt ?? Date.now(),
        });
        return { units };
      }),

    markSucceeded: (index, resolvedId) =>
      set((state) => {
        const unit = state.units.get(index);
        if (!unit) return state;
        const units = new Map(state.units);
        units.set(index, {
          ...unit,
          status: "succeeded",
          remoteId: resolvedId,
          state: "transferred",
          completedAt: Date.now(),
        });
        const resolved = new Map(state.resolved);
        resolved.set(index, resolvedId);
        return {
          units,
          resolved,
          logs: appendLog(state.logs, "success", `Transferred (${resolvedId})`, unit.label),
        };
      }),

    markFailed: (index, error) =>
      set((state) => {
        const unit = state.units.get(index);
        if (!unit) return state;
        const units = new Map(state.units);
        units.set(index, { ...unit, status: "failed", error, completedAt: Date.now() });
        return {
          units,
          logs: appendLog(state.logs, "error", `Transfer failed: ${error.message}`, unit.label),
        };
      }),

    markCancelled: (index) =>
      set((state) => {
        const unit = state.units.get(index);
        if (!unit || unit.status === "succeeded" || unit.status === "failed") return state;
        const units = new Map(state.units);
        units.set(index, { ...unit, status: "cancelled", completedAt: Date.now() });
        return { units };
      }),

    setPollOutcome: (index, outcome) =>
      set((state) => {
        const unit = state.units.get(index);
        if (!unit) return state;
        const units = new Map(state.units);
        units.set(index, {
          ...unit,
          poll: outcome,
          // online is one-directional
          state: unit.state === "online" || outcome.status === "online" ? "online" : unit.state,
        });
        const message =
          outcome.status === "online"
            ? `Online after ${outcome.elapsedMs} ms`
            : `Still processing after ${outcome.elapsedMs} ms`;
        return {
          units,
          logs: appendLog(state.logs, outcome.status === "online" ? "success" : "warn", message, unit.label),
        };
      }),

    addLog: (severity, message, unitLabel) =>
      set((state) => ({ logs: appendLog(state.logs, severity, message, unitLabel) })),
  }));
}
