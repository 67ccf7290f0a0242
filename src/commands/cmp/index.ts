/**
 * cmp command implementation: readers, channels and the comparison loop.
 */

import { debug } from "../../core/logger.js";
import type {
  ChannelItem,
  CmpOptions,
  CompareOptions,
  ComparisonResult,
  Cursor,
  ReportWriter,
  StreamSymbol,
} from "../../core/types.js";
import { ByteChannel, DEFAULT_CHANNEL_CAPACITY } from "../../stream/channel.js";
import { emitSource } from "../../stream/reader.js";
import { openSources, type OpenSourceOptions } from "../../stream/source.js";
import { advanceCursor, decide } from "./core.js";

export {
  advanceCursor,
  decide,
  exitCodeFor,
  overriddenFlagsWarning,
  resolveReportingMode,
  type StepContext,
} from "./core.js";

const writeToStderr: ReportWriter = (message) => {
  process.stderr.write(`${message}\n`);
};

/**
 * Raise a failed read; pass bytes and end markers through.
 */
function unwrap(item: ChannelItem): StreamSymbol {
  if (item.kind === "error") {
    throw item.error;
  }
  return item;
}

/**
 * Compare two channels in lockstep until a terminal decision.
 *
 * Both channels are cancelled when the loop ends, however it ends, so their
 * readers stop. Rejects with the reader's SourceReadError on a failed read.
 */
export async function compareChannels(
  channels: readonly [ByteChannel, ByteChannel],
  options: CompareOptions
): Promise<ComparisonResult> {
  const write = options.write ?? writeToStderr;
  let cursor: Cursor = { charNumber: 1, lineNumber: 1 };
  let listed = false;

  try {
    for (;;) {
      // Only wait on a side whose producer is behind.
      const first = unwrap(channels[0].tryReceive() ?? (await channels[0].receive()));
      const second = unwrap(channels[1].tryReceive() ?? (await channels[1].receive()));

      const decision = decide(first, second, {
        mode: options.mode,
        names: options.names,
        cursor,
        listed,
      });

      switch (decision.action) {
        case "finish":
          if (decision.message !== undefined) {
            write(decision.message);
          }
          return { status: decision.status, ...cursor };
        case "report":
          write(decision.message);
          listed = true;
          break;
        case "advance":
          break;
      }

      cursor = advanceCursor(cursor, first);
    }
  } finally {
    channels[0].cancel();
    channels[1].cancel();
  }
}

/**
 * Open both sources, start a reader per source and compare them.
 */
export async function compareSources(
  options: CmpOptions,
  openOptions: OpenSourceOptions = {}
): Promise<ComparisonResult> {
  const capacity = options.capacity ?? DEFAULT_CHANNEL_CAPACITY;
  const channels: [ByteChannel, ByteChannel] = [
    new ByteChannel(capacity),
    new ByteChannel(capacity),
  ];
  const sources = await openSources(options.operands, options.offsets, openOptions);

  // Readers never reject (failures arrive as channel items) and are
  // abandoned rather than joined: cancelling their channel stops them.
  void emitSource(sources[0], channels[0]);
  void emitSource(sources[1], channels[1]);

  debug(`Comparing ${options.operands[0]} and ${options.operands[1]} in ${options.mode} mode`);
  const result = await compareChannels(channels, {
    mode: options.mode,
    names: options.operands,
    write: options.write,
  });
  debug(`Finished at char ${result.charNumber} line ${result.lineNumber}: ${result.status}`);

  return result;
}
