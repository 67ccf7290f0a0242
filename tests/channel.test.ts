/**
 * ByteChannel tests.
 */

import { describe, expect, it } from "vitest";
import { ByteChannel, DEFAULT_CHANNEL_CAPACITY } from "../src/stream/channel.js";

describe("ByteChannel", () => {
  it("should default to an 8192 byte capacity", () => {
    expect(new ByteChannel().capacity).toBe(DEFAULT_CHANNEL_CAPACITY);
    expect(DEFAULT_CHANNEL_CAPACITY).toBe(8192);
  });

  it("should reject a non-positive capacity", () => {
    expect(() => new ByteChannel(0)).toThrow(RangeError);
    expect(() => new ByteChannel(1.5)).toThrow(RangeError);
  });

  it("should deliver bytes in order, then the end marker", async () => {
    const channel = new ByteChannel();
    await channel.write(Uint8Array.from([1, 2, 3]));
    channel.close();

    expect(await channel.receive()).toEqual({ kind: "byte", value: 1 });
    expect(await channel.receive()).toEqual({ kind: "byte", value: 2 });
    expect(await channel.receive()).toEqual({ kind: "byte", value: 3 });
    expect(await channel.receive()).toEqual({ kind: "end" });
    expect(await channel.receive()).toEqual({ kind: "end" });
  });

  it("should treat a zero byte as data", async () => {
    const channel = new ByteChannel();
    await channel.write(Uint8Array.from([0]));
    channel.close();

    expect(await channel.receive()).toEqual({ kind: "byte", value: 0 });
    expect(await channel.receive()).toEqual({ kind: "end" });
  });

  it("should make the receiver wait for a byte", async () => {
    const channel = new ByteChannel();
    const pending = channel.receive();

    await channel.write(Uint8Array.from([42]));

    expect(await pending).toEqual({ kind: "byte", value: 42 });
  });

  it("should hold the writer back once the buffer is full", async () => {
    const channel = new ByteChannel(4);
    let finished = false;
    const writing = channel
      .write(Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]))
      .then((accepted) => {
        finished = true;
        return accepted;
      });

    await Promise.resolve();
    expect(channel.length).toBe(4);
    expect(finished).toBe(false);

    const values: number[] = [];
    for (let i = 0; i < 10; i++) {
      const item = await channel.receive();
      expect(channel.length).toBeLessThanOrEqual(4);
      if (item.kind === "byte") {
        values.push(item.value);
      }
    }

    expect(values).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(await writing).toBe(true);
  });

  it("should deliver a failure after the buffered bytes", async () => {
    const channel = new ByteChannel();
    const failure = new Error("boom");
    await channel.write(Uint8Array.from([7]));
    channel.fail(failure);

    expect(await channel.receive()).toEqual({ kind: "byte", value: 7 });
    expect(await channel.receive()).toEqual({ kind: "error", error: failure });
  });

  it("should keep the first terminal item", async () => {
    const channel = new ByteChannel();
    channel.close();
    channel.fail(new Error("late"));

    expect(await channel.receive()).toEqual({ kind: "end" });
    expect(channel.isClosed).toBe(true);
  });

  it("should refuse writes after close", async () => {
    const channel = new ByteChannel();
    channel.close();

    await expect(channel.write(Uint8Array.from([1]))).rejects.toThrow(
      "Cannot write to a closed channel"
    );
  });

  it("should release a waiting writer on cancel", async () => {
    const channel = new ByteChannel(2);
    const writing = channel.write(Uint8Array.from([1, 2, 3]));

    channel.cancel();

    expect(await writing).toBe(false);
    expect(channel.length).toBe(0);
    expect(channel.isCancelled).toBe(true);
  });

  it("should hand out buffered bytes without waiting", async () => {
    const channel = new ByteChannel();
    expect(channel.tryReceive()).toBeUndefined();

    await channel.write(Uint8Array.from([9]));
    channel.close();

    expect(channel.tryReceive()).toEqual({ kind: "byte", value: 9 });
    expect(channel.tryReceive()).toEqual({ kind: "end" });
  });

  it("should abort its signal on cancel", () => {
    const channel = new ByteChannel();
    expect(channel.signal.aborted).toBe(false);

    channel.cancel();

    expect(channel.signal.aborted).toBe(true);
  });
});
