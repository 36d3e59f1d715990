import { beforeEach, describe, expect, it } from "vitest";
import type { Appendage, JobRef } from "@/types";
import { InMemoryArchive } from "@/testing/in-memory-archive";
import { NetworkError, RemoteRejection } from "./errors";
import { StatusPoller } from "./status-poller";

const job: JobRef = { kind: "shot", shotListId: 1, stageId: 2, shotId: 3, jobDefId: 4 };

/** Reports a scripted sequence of isOnline values, then offline. */
class ScriptedArchive extends InMemoryArchive {
  script: boolean[] = [];

  async getAppendage(j: JobRef, id: string, signal?: AbortSignal): Promise<Appendage> {
    const appendage = await super.getAppendage(j, id, signal);
    return { ...appendage, isOnline: this.script.shift() ?? false };
  }
}

describe("StatusPoller", () => {
  let archive: ScriptedArchive;
  let id: string;

  beforeEach(async () => {
    archive = new ScriptedArchive();
    archive.addJob(job);
    id = await archive.createAppendage(job, { type: "file", name: "a.mov", parentId: null, createPreview: false });
  });

  it("reports processing, then online", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.script = [false, true];

    await expect(poller.poll(job, id)).resolves.toEqual({ status: "processing" });
    await expect(poller.poll(job, id)).resolves.toEqual({ status: "online" });
  });

  it("never reports an appendage as processing once it was seen online", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.script = [true, false, false];

    const seen: string[] = [];
    for (let i = 0; i < 3; i++) seen.push((await poller.poll(job, id)).status);

    expect(seen).toEqual(["online", "online", "online"]);
  });

  it("keeps what it has seen online apart per job", async () => {
    const other: JobRef = { ...job, shotId: 9 };
    archive.addJob(other);
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.script = [true];

    await expect(poller.poll(job, id)).resolves.toEqual({ status: "online" });
    await expect(poller.poll(other, id)).rejects.toBeInstanceOf(RemoteRejection);
  });

  it("waits until the appendage comes online", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.script = [false, false, true];

    const outcome = await poller.waitUntilOnline(job, id);

    expect(outcome.status).toBe("online");
    expect(archive.calls.filter((c) => c.call === "get")).toHaveLength(3);
  });

  it("returns still-processing when the timeout runs out", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });

    const outcome = await poller.waitUntilOnline(job, id, { timeoutMs: 30 });

    expect(outcome.status).toBe("still-processing");
    expect(outcome.elapsedMs).toBeGreaterThanOrEqual(30);
  });

  it("tolerates transient poll failures", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.failOn("get", "a.mov", () => new NetworkError("gateway timeout", 504), 2);
    archive.script = [true];

    await expect(poller.waitUntilOnline(job, id)).resolves.toMatchObject({ status: "online" });
  });

  it("propagates a rejection", async () => {
    const poller = new StatusPoller(archive, { intervalMs: 5, timeoutMs: 1000 });
    archive.failOn("get", "a.mov", () => new RemoteRejection("gone", "not-found", 404));

    await expect(poller.waitUntilOnline(job, id)).rejects.toBeInstanceOf(RemoteRejection);
  });
});
