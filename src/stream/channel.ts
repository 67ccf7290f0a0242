/**
 * Bounded single-producer/single-consumer byte channel.
 *
 * Bytes sit in a fixed ring buffer; the producer waits for room when it is
 * full, so a fast source never runs more than `capacity` bytes ahead of the
 * comparator. Exhaustion and failure are terminal items, never byte values.
 */

import type { ChannelItem, EndItem, ErrorItem } from "../core/types.js";

/**
 * Default channel capacity in bytes.
 */
export const DEFAULT_CHANNEL_CAPACITY = 8192;

export class ByteChannel {
  private readonly buffer: Uint8Array;
  private head = 0;
  private size = 0;
  private terminal: EndItem | ErrorItem | null = null;
  private cancelled = false;
  private waitingReceiver: (() => void) | null = null;
  private waitingSender: (() => void) | null = null;
  private readonly abort = new AbortController();

  constructor(readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Uint8Array(capacity);
  }

  /** Bytes currently buffered. */
  get length(): number {
    return this.size;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Aborted when the consumer cancels the channel. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get isClosed(): boolean {
    return this.terminal !== null;
  }

  /**
   * Append a chunk, waiting for room whenever the buffer is full.
   * Resolves to false once the consumer has cancelled the channel.
   */
  async write(chunk: Uint8Array): Promise<boolean> {
    if (this.terminal) {
      throw new Error("Cannot write to a closed channel");
    }

    let index = 0;
    while (index < chunk.length) {
      if (this.cancelled) {
        return false;
      }
      if (this.size === this.capacity) {
        await new Promise<void>((resolve) => {
          this.waitingSender = resolve;
        });
        continue;
      }

      this.buffer[(this.head + this.size) % this.capacity] = chunk[index];
      this.size++;
      index++;
      this.wakeReceiver();
    }

    return !this.cancelled;
  }

  /**
   * Mark the end of the source. Buffered bytes are still delivered first.
   */
  close(): void {
    this.terminate({ kind: "end" });
  }

  /**
   * Terminate with a read failure, delivered after buffered bytes.
   */
  fail(error: Error): void {
    this.terminate({ kind: "error", error });
  }

  /**
   * Take the next item, waiting until a byte or a terminal item is available.
   * Once terminated and drained, every call returns the terminal item.
   */
  async receive(): Promise<ChannelItem> {
    for (;;) {
      const item = this.tryReceive();
      if (item) {
        return item;
      }
      await new Promise<void>((resolve) => {
        this.waitingReceiver = resolve;
      });
    }
  }

  /**
   * Take a buffered byte or the terminal item without waiting.
   * Returns undefined when the producer has not caught up yet.
   */
  tryReceive(): ChannelItem | undefined {
    if (this.size === 0) {
      return this.terminal ?? undefined;
    }

    const value = this.buffer[this.head];
    this.head = (this.head + 1) % this.capacity;
    this.size--;
    this.wakeSender();
    return { kind: "byte", value };
  }

  /**
   * Abandon the channel: buffered bytes are dropped, a waiting producer
   * is released and `signal` is aborted so an idle producer can stop too.
   */
  cancel(): void {
    this.cancelled = true;
    this.head = 0;
    this.size = 0;
    this.wakeSender();
    this.abort.abort();
  }

  private terminate(item: EndItem | ErrorItem): void {
    if (this.terminal) {
      return;
    }
    this.terminal = item;
    this.wakeReceiver();
  }

  private wakeReceiver(): void {
    const resolve = this.waitingReceiver;
    this.waitingReceiver = null;
    resolve?.();
  }

  private wakeSender(): void {
    const resolve = this.waitingSender;
    this.waitingSender = null;
    resolve?.();
  }
}
