import { describe, expect, it } from "vitest";
import type { JobRef, TransferEvent } from "@/types";
import { resolveConfig } from "./config";
import {
  AuthFailure,
  NetworkError,
  ParentTransferError,
  PartialUploadError,
  RemoteRejection,
} from "./errors";
import { EventChannel } from "./event-channel";
import { sleep } from "./retry";
import { TransferEngine, type TaskContext, type TransferTask } from "./transfer-engine";

const job: JobRef = { kind: "asset", assetListId: 1, assetId: 2, jobId: 3 };

function engineWith(maxWorkers: number) {
  return new TransferEngine({
    config: resolveConfig({
      maxWorkers,
      retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 },
      attemptTimeoutMs: 0,
    }),
  });
}

function task(index: number, parentIndex: number | null, run: (ctx: TaskContext) => Promise<string>): TransferTask {
  return { index, parentIndex, label: `unit-${index}`, type: "file", size: 1, run };
}

const options = { operation: "upload-folder", job } as const;

describe("TransferEngine", () => {
  it.each([1, 3, 12])("aggregates N-K successes and K failures with %i workers", async (workers) => {
    const failing = new Set([1, 4, 6]);
    const tasks = Array.from({ length: 8 }, (_, i) =>
      task(i, null, ({ step }) =>
        step("upload", async () => {
          if (failing.has(i)) throw new NetworkError("connection reset");
          return `id-${i}`;
        })
      )
    );

    const result = await engineWith(workers).execute(tasks, options);

    expect(result.succeeded).toBe(5);
    expect(result.failed).toBe(3);
    expect(result.cancelled).toBe(0);
    expect(result.units.filter((u) => u.status === "failed").map((u) => u.index)).toEqual([1, 4, 6]);
    expect(result.partialFailure).toBeInstanceOf(PartialUploadError);
    expect(result.partialFailure?.message).toBe("3 of 8 units failed");
    for (const unit of result.units) {
      expect(unit.attempts).toBe(failing.has(unit.index) ? 2 : 1);
    }
  });

  it("starts a child only after its parent succeeded and passes the parent's id", async () => {
    const order: string[] = [];
    const parents = new Map<number, string | null>();
    const run = (index: number) => async (ctx: TaskContext) => {
      parents.set(index, ctx.parentResolved);
      order.push(`start:${index}`);
      await sleep(5);
      order.push(`end:${index}`);
      return `id-${index}`;
    };
    const tasks = [task(0, null, run(0)), task(1, 0, run(1)), task(2, 1, run(2)), task(3, 0, run(3))];

    const result = await engineWith(4).execute(tasks, options);

    expect(result.succeeded).toBe(4);
    for (const [child, parent] of [[1, 0], [2, 1], [3, 0]]) {
      expect(order.indexOf(`start:${child}`)).toBeGreaterThan(order.indexOf(`end:${parent}`));
    }
    expect(Object.fromEntries(parents)).toEqual({ 0: null, 1: "id-0", 2: "id-1", 3: "id-0" });
  });

  it("records descendants of a failed folder without attempting them", async () => {
    const ran: number[] = [];
    const ok = (index: number) => async () => {
      ran.push(index);
      return `id-${index}`;
    };
    const tasks = [
      task(0, null, ok(0)),
      task(1, 0, async () => {
        ran.push(1);
        throw new RemoteRejection("name taken", "validation", 409);
      }),
      task(2, 1, ok(2)),
      task(3, 2, ok(3)),
      task(4, 0, ok(4)),
    ];

    const result = await engineWith(2).execute(tasks, options);

    expect(ran.sort()).toEqual([0, 1, 4]);
    expect(result.units.map((u) => u.status)).toEqual(["succeeded", "failed", "failed", "failed", "succeeded"]);
    const orphan = result.units[3];
    expect(orphan.status === "failed" && orphan.error).toBeInstanceOf(ParentTransferError);
    expect(orphan.status === "failed" && orphan.error.message).toBe('Parent "unit-2" was not transferred');
  });

  it("never runs more tasks at once than the worker limit", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const tasks = Array.from({ length: 6 }, (_, i) =>
      task(i, null, async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await sleep(10);
        inFlight--;
        return `id-${i}`;
      })
    );

    await engineWith(2).execute(tasks, options);

    expect(maxInFlight).toBe(2);
  });

  it("aborts on a fatal error and attaches the partial result", async () => {
    const tasks = [
      task(0, null, async () => "id-0"),
      task(1, null, ({ step }) =>
        step("create", async () => {
          throw new AuthFailure("session rejected", 401);
        })
      ),
      task(2, null, async () => "id-2"),
    ];

    const error = await engineWith(1)
      .execute(tasks, options)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthFailure);
    if (!(error instanceof AuthFailure)) return;
    expect(error.result?.units.map((u) => u.status)).toEqual(["succeeded", "failed", "cancelled"]);
    expect(error.result?.wasCancelled).toBe(false);
  });

  it("cancels in-flight work when another unit hits a fatal error", async () => {
    const tasks = [
      task(0, null, (ctx) => sleep(60_000, ctx.signal).then(() => "id-0")),
      task(1, null, async () => {
        await sleep(5);
        throw new AuthFailure("session rejected", 401);
      }),
    ];

    const error = await engineWith(2)
      .execute(tasks, options)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthFailure);
    if (!(error instanceof AuthFailure)) return;
    expect(error.result?.units.map((u) => u.status)).toEqual(["cancelled", "failed"]);
  });

  it("stops scheduling when the caller cancels and keeps finished units", async () => {
    const controller = new AbortController();
    const tasks = [
      task(0, null, async () => {
        controller.abort();
        return "id-0";
      }),
      task(1, null, async () => "id-1"),
      task(2, 0, async () => "id-2"),
    ];

    const result = await engineWith(1).execute(tasks, { ...options, signal: controller.signal });

    expect(result.wasCancelled).toBe(true);
    expect(result.units.map((u) => u.status)).toEqual(["succeeded", "cancelled", "cancelled"]);
    expect(result.partialFailure).toBeNull();
  });

  it("streams events and closes the channel", async () => {
    const events = new EventChannel<TransferEvent>();
    let calls = 0;
    const tasks = [
      task(0, null, ({ step }) =>
        step("upload", async () => {
          calls++;
          if (calls === 1) throw new NetworkError("timeout");
          return "id-0";
        })
      ),
    ];

    const result = await engineWith(1).execute(tasks, { ...options, events });
    const seen: TransferEvent[] = [];
    for await (const event of events) seen.push(event);

    expect(seen.map((e) => e.type)).toEqual(["unit-started", "unit-retrying", "unit-succeeded", "job-completed"]);
    expect(seen[1]).toMatchObject({ type: "unit-retrying", index: 0, attempt: 2 });
    expect(seen[3]).toEqual({
      type: "job-completed",
      operationId: result.operationId,
      succeeded: 1,
      failed: 0,
      cancelled: 0,
    });
    expect(events.isClosed).toBe(true);
  });
});
