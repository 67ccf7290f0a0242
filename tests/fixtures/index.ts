/**
 * Test fixtures for stream-cmp.
 */

import { Readable } from "node:stream";
import type { ChannelItem, Source, StreamSymbol } from "../../src/core/types.js";
import { ByteChannel } from "../../src/stream/channel.js";
import { emitSource } from "../../src/stream/reader.js";

/**
 * Create an in-memory source from one or more chunks.
 */
export function createSource(
  name: string,
  chunks: Array<string | Uint8Array>,
  overrides: Partial<Omit<Source, "stream" | "name">> = {}
): Source {
  return {
    name,
    offset: 0,
    skip: 0,
    stream: Readable.from(chunks.map((chunk) => Buffer.from(chunk))),
    ...overrides,
  };
}

/**
 * Create a stream that fails on its first read.
 */
export function createFailingStream(message: string): Readable {
  return new Readable({
    read() {
      this.destroy(new Error(message));
    },
  });
}

/**
 * Create a channel fed by a reader over the given content.
 */
export function createFedChannel(content: string | Uint8Array, capacity?: number): ByteChannel {
  const channel = new ByteChannel(capacity);
  void emitSource(createSource("fixture", [content]), channel);
  return channel;
}

/**
 * Receive items until the channel terminates.
 */
export async function drain(channel: ByteChannel): Promise<ChannelItem[]> {
  const items: ChannelItem[] = [];
  for (;;) {
    const item = await channel.receive();
    items.push(item);
    if (item.kind !== "byte") {
      return items;
    }
  }
}

/**
 * Shorthand for the byte items of a string, followed by the end marker.
 */
export function symbolsOf(text: string): StreamSymbol[] {
  return [
    ...Array.from(Buffer.from(text), (value): StreamSymbol => ({ kind: "byte", value })),
    { kind: "end" },
  ];
}

export const byte = (char: string): StreamSymbol => ({ kind: "byte", value: char.charCodeAt(0) });

export const END: StreamSymbol = { kind: "end" };
