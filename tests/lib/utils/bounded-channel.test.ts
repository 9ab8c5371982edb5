import { describe, it, expect } from "vitest";
import { BoundedChannel } from "../../../lib/utils/bounded-channel";

interface Item {
  n: number;
}

describe("BoundedChannel", () => {
  it("rejects a capacity below 1", () => {
    expect(() => new BoundedChannel<Item>(0)).toThrow(RangeError);
  });

  it("delivers values in order and ends after close", async () => {
    const channel = new BoundedChannel<Item>(4);
    await channel.send({ n: 1 });
    await channel.send({ n: 2 });
    channel.close();

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item.n);
    }
    expect(received).toEqual([1, 2]);
  });

  it("makes the producer wait while the buffer is full", async () => {
    const channel = new BoundedChannel<Item>(1);
    await channel.send({ n: 1 });

    let delivered = false;
    const pending = channel.send({ n: 2 }).then((accepted) => {
      delivered = accepted;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);
    expect(channel.buffered).toBe(1);

    await expect(channel.next()).resolves.toEqual({ value: { n: 1 }, done: false });
    await pending;
    expect(delivered).toBe(true);
    await expect(channel.next()).resolves.toEqual({ value: { n: 2 }, done: false });
  });

  it("hands a value straight to a waiting reader", async () => {
    const channel = new BoundedChannel<Item>(1);
    const read = channel.next();

    await expect(channel.send({ n: 7 })).resolves.toBe(true);
    await expect(read).resolves.toEqual({ value: { n: 7 }, done: false });
    expect(channel.buffered).toBe(0);
  });

  it("releases a blocked producer when the consumer cancels", async () => {
    const channel = new BoundedChannel<Item>(1);
    await channel.send({ n: 1 });
    const blocked = channel.send({ n: 2 });

    const iterator = channel[Symbol.asyncIterator]();
    await iterator.return?.();

    await expect(blocked).resolves.toBe(false);
    await expect(channel.send({ n: 3 })).resolves.toBe(false);
    expect(channel.cancelled).toBe(true);
    expect(channel.buffered).toBe(0);
  });

  it("drains buffered values before surfacing a failure", async () => {
    const channel = new BoundedChannel<Item>(2);
    await channel.send({ n: 1 });
    channel.fail(new Error("producer crashed"));

    await expect(channel.next()).resolves.toEqual({ value: { n: 1 }, done: false });
    await expect(channel.next()).rejects.toThrow("producer crashed");
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it("ends a pending read when closed", async () => {
    const channel = new BoundedChannel<Item>(1);
    const read = channel.next();
    channel.close();

    await expect(read).resolves.toEqual({ value: undefined, done: true });
  });
});
