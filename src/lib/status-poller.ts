import type { JobRef, PollOutcome } from "@/types";
import type { PollPolicy } from "./config";
import { isTransient, toTransferError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import { jobKey, type RemoteArchive } from "./remote-archive";
import { sleep } from "./retry";

export type PollStatus = { status: "online" } | { status: "processing" };

export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Watches the server-side `isOnline` flag. Once an appendage has been seen
 * online it is never reported as processing again.
 */
export class StatusPoller {
  /** Keyed by job and appendage id */
  private readonly seenOnline = new Set<string>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly archive: RemoteArchive,
    private readonly policy: PollPolicy,
    options: { logger?: Logger; now?: () => number } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  /** One non-blocking check. */
  async poll(job: JobRef, appendageId: string, signal?: AbortSignal): Promise<PollStatus> {
    const key = `${jobKey(job)}#${appendageId}`;
    if (this.seenOnline.has(key)) return { status: "online" };

    const appendage = await this.archive.getAppendage(job, appendageId, signal);
    if (appendage.isOnline) {
      this.seenOnline.add(key);
      return { status: "online" };
    }
    return { status: "processing" };
  }

  /**
   * Poll until the appendage is online or `timeoutMs` elapses. Running out of
   * time yields `still-processing`, which is an outcome and not an error.
   */
  async waitUntilOnline(job: JobRef, appendageId: string, options: WaitOptions = {}): Promise<PollOutcome> {
    const timeoutMs = options.timeoutMs ?? this.policy.timeoutMs;
    const intervalMs = Math.max(1, options.intervalMs ?? this.policy.intervalMs);
    const started = this.now();
    const deadline = started + timeoutMs;

    for (;;) {
      try {
        const { status } = await this.poll(job, appendageId, options.signal);
        if (status === "online") {
          return { status: "online", elapsedMs: this.now() - started };
        }
      } catch (err) {
        const error = toTransferError(err);
        if (!isTransient(error)) throw error;
        this.logger.warn("Status poll failed, will retry", { appendageId, error: error.message });
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return { status: "still-processing", elapsedMs: this.now() - started };
      }
      await sleep(Math.min(intervalMs, remaining), options.signal);
    }
  }
}
