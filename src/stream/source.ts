/**
 * Open the two sides of a comparison.
 */

import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { describeError, SourceOpenError } from "../core/errors.js";
import { debug } from "../core/logger.js";
import { STDIN_SOURCE, type Source } from "../core/types.js";

export interface OpenSourceOptions {
  /** Stream used for the `-` operand (defaults to process.stdin) */
  stdin?: Readable;
}

/**
 * Open a named source positioned at `offset`.
 *
 * Files are opened eagerly so that a missing or unreadable path fails before
 * any comparison starts. Standard input cannot seek; its offset is applied by
 * the reader discarding leading bytes.
 */
export async function openSource(
  name: string,
  offset: number,
  options: OpenSourceOptions = {}
): Promise<Source> {
  if (name === STDIN_SOURCE) {
    debug(`Reading ${name} from standard input, skipping ${offset} bytes`);
    return {
      name,
      offset,
      skip: offset,
      stream: options.stdin ?? process.stdin,
    };
  }

  try {
    const handle = await open(name, "r");
    debug(`Opened ${name} at offset ${offset}`);
    return {
      name,
      offset,
      skip: 0,
      stream: handle.createReadStream(offset > 0 ? { start: offset } : {}),
    };
  } catch (error) {
    throw new SourceOpenError(name, describeError(error));
  }
}

/**
 * Open both sources; the first failure wins and nothing is left open.
 */
export async function openSources(
  names: readonly [string, string],
  offsets: readonly [number, number],
  options: OpenSourceOptions = {}
): Promise<[Source, Source]> {
  const first = await openSource(names[0], offsets[0], options);
  try {
    const second = await openSource(names[1], offsets[1], options);
    return [first, second];
  } catch (error) {
    if (first.name !== STDIN_SOURCE) {
      first.stream.destroy();
    }
    throw error;
  }
}
