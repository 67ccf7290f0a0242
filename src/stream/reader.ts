/**
 * Stream reader: pumps one source into its channel.
 */

import { describeError, SourceReadError } from "../core/errors.js";
import { debug } from "../core/logger.js";
import type { Source } from "../core/types.js";
import type { ByteChannel } from "./channel.js";

/**
 * Normalize a stream chunk to bytes.
 * Streams without an encoding yield Buffers; string chunks are UTF-8 encoded.
 */
function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk, "utf-8");
  }
  throw new TypeError(`Unexpected chunk type: ${typeof chunk}`);
}

/**
 * Emit every byte of `source` (after its skip) onto `channel`, then close it.
 *
 * Never rejects: a read failure terminates the channel with a
 * SourceReadError item instead. Once the channel is cancelled the stream
 * is destroyed, even while the reader is waiting on it for more data.
 */
export async function emitSource(source: Source, channel: ByteChannel): Promise<void> {
  let remainingSkip = source.skip;
  const release = (): void => {
    source.stream.destroy();
  };

  if (channel.isCancelled) {
    release();
    return;
  }
  channel.signal.addEventListener("abort", release, { once: true });
  debug(`Reading ${source.name} from byte ${source.offset}`);

  try {
    for await (const chunk of source.stream) {
      let bytes = toBytes(chunk);

      if (remainingSkip > 0) {
        const dropped = Math.min(remainingSkip, bytes.length);
        remainingSkip -= dropped;
        bytes = bytes.subarray(dropped);
      }

      if (bytes.length > 0 && !(await channel.write(bytes))) {
        // Leaving the loop destroys the stream.
        return;
      }
    }
    channel.close();
  } catch (error) {
    // A stream destroyed by cancellation ends with a premature-close error.
    if (!channel.isCancelled) {
      channel.fail(new SourceReadError(source.name, describeError(error)));
    }
  } finally {
    channel.signal.removeEventListener("abort", release);
  }
}
