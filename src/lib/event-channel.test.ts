import { describe, expect, it } from "vitest";
import { EventChannel } from "./event-channel";

async function drain<T>(channel: EventChannel<T>): Promise<T[]> {
  const seen: T[] = [];
  for await (const value of channel) seen.push(value);
  return seen;
}

describe("EventChannel", () => {
  it("delivers buffered values in order, then ends on close", async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new EventChannel<string>();
    const consumed = drain(channel);

    channel.push("a");
    await Promise.resolve();
    channel.push("b");
    channel.close();

    expect(await consumed).toEqual(["a", "b"]);
  });

  it("drops values pushed after close", async () => {
    const channel = new EventChannel<number>();
    channel.close();
    channel.push(3);

    expect(channel.isClosed).toBe(true);
    expect(await drain(channel)).toEqual([]);
  });

  it("can be iterated only once", async () => {
    const channel = new EventChannel<number>();
    channel.close();
    await drain(channel);

    expect(() => channel[Symbol.asyncIterator]()).toThrow("only be consumed once");
  });

  it("closes when the consumer breaks out early", async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }
    expect(channel.isClosed).toBe(true);
  });
});
