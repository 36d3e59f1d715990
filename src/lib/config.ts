import fs from "fs-extra";
import { logger } from "./logger";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface PollPolicy {
  intervalMs: number;
  timeoutMs: number;
}

export interface TransferConfig {
  maxWorkers: number;
  retry: RetryPolicy;
  attemptTimeoutMs: number; // 0 disables the per-attempt timeout
  poll: PollPolicy;
  framePattern: RegExp; // needs named groups prefix, frame, ext
  minSequenceLength: number;
}

/** Shape accepted from a JSON config file or a caller override */
export interface TransferConfigInput {
  maxWorkers?: number;
  retry?: Partial<RetryPolicy>;
  attemptTimeoutMs?: number;
  poll?: Partial<PollPolicy>;
  framePattern?: RegExp | string;
  minSequenceLength?: number;
}

export const MAX_WORKERS_LIMIT = 12;

/** Image and frame formats only; numbered documents or archives stay files. */
export const DEFAULT_FRAME_PATTERN =
  /^(?<prefix>.*?)(?<frame>\d+)\.(?<ext>exr|dpx|cin|png|jpe?g|tiff?|tga|bmp|gif|webp|hdr|psd|sgi|rgba?|iff|jp2|dng|cr2|nef|arw|heic|avif)$/i;

export const DEFAULT_CONFIG: TransferConfig = {
  maxWorkers: 6,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60_000,
    jitterMs: 500,
  },
  attemptTimeoutMs: 10 * 60 * 1000,
  poll: {
    intervalMs: 2000,
    timeoutMs: 30 * 60 * 1000,
  },
  framePattern: DEFAULT_FRAME_PATTERN,
  minSequenceLength: 2,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function toPattern(value: RegExp | string): RegExp {
  const pattern = typeof value === "string" ? new RegExp(value) : value;
  const source = pattern.source;
  for (const group of ["prefix", "frame", "ext"]) {
    if (!source.includes(`(?<${group}>`)) {
      throw new Error(`framePattern must define the named group "${group}"`);
    }
  }
  return pattern;
}

export function resolveConfig(input: TransferConfigInput = {}): TransferConfig {
  const retry = { ...DEFAULT_CONFIG.retry, ...input.retry };
  const poll = { ...DEFAULT_CONFIG.poll, ...input.poll };

  return {
    maxWorkers: clamp(Math.floor(input.maxWorkers ?? DEFAULT_CONFIG.maxWorkers), 1, MAX_WORKERS_LIMIT),
    retry: {
      maxAttempts: Math.max(1, Math.floor(retry.maxAttempts)),
      baseDelayMs: Math.max(0, retry.baseDelayMs),
      maxDelayMs: Math.max(0, retry.maxDelayMs),
      jitterMs: Math.max(0, retry.jitterMs),
    },
    attemptTimeoutMs: Math.max(0, input.attemptTimeoutMs ?? DEFAULT_CONFIG.attemptTimeoutMs),
    poll: {
      intervalMs: Math.max(1, poll.intervalMs),
      timeoutMs: Math.max(0, poll.timeoutMs),
    },
    framePattern: toPattern(input.framePattern ?? DEFAULT_CONFIG.framePattern),
    minSequenceLength: Math.max(2, Math.floor(input.minSequenceLength ?? DEFAULT_CONFIG.minSequenceLength)),
  };
}

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = parseInt(raw, 10);
  if (isNaN(value)) {
    logger.warn(`Ignoring non-numeric ${name}`, { value: raw });
    return undefined;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickNumbers<K extends string>(source: unknown, keys: readonly K[]): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  if (!isRecord(source)) return picked;
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "number") picked[key] = value;
  }
  return picked;
}

function fromJson(content: unknown): TransferConfigInput {
  if (!isRecord(content)) return {};
  const top = pickNumbers(content, ["maxWorkers", "attemptTimeoutMs", "minSequenceLength"] as const);
  return {
    ...top,
    retry: pickNumbers(content.retry, ["maxAttempts", "baseDelayMs", "maxDelayMs", "jitterMs"] as const),
    poll: pickNumbers(content.poll, ["intervalMs", "timeoutMs"] as const),
    framePattern: typeof content.framePattern === "string" ? content.framePattern : undefined,
  };
}

/**
 * Load settings from an optional JSON file, then apply environment overrides.
 * A missing file is not an error; defaults are used.
 */
export async function loadConfig(configPath?: string): Promise<TransferConfig> {
  let input: TransferConfigInput = {};

  if (configPath) {
    if (await fs.pathExists(configPath)) {
      input = fromJson(await fs.readJson(configPath));
      logger.info("Transfer config loaded from file.", { configPath });
    } else {
      logger.warn("No transfer config found. Using defaults.", { configPath });
    }
  }

  const maxWorkers = readNumber("ARCHIVE_MAX_WORKERS");
  const maxAttempts = readNumber("ARCHIVE_RETRY_ATTEMPTS");
  const pollTimeout = readNumber("ARCHIVE_POLL_TIMEOUT_MS");

  return resolveConfig({
    ...input,
    maxWorkers: maxWorkers ?? input.maxWorkers,
    retry: { ...input.retry, ...(maxAttempts !== undefined ? { maxAttempts } : {}) },
    poll: { ...input.poll, ...(pollTimeout !== undefined ? { timeoutMs: pollTimeout } : {}) },
  });
}
