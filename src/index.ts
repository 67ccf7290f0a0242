/**
 * stream-cmp library exports.
 *
 * This module exports the core types and functions for programmatic use.
 */

// Core types
export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/operands.js";
export * from "./core/logger.js";

// Streams
export { ByteChannel, DEFAULT_CHANNEL_CAPACITY } from "./stream/channel.js";
export { emitSource } from "./stream/reader.js";
export { openSource, openSources, type OpenSourceOptions } from "./stream/source.js";

// Comparison
export {
  advanceCursor,
  compareChannels,
  compareSources,
  decide,
  exitCodeFor,
  overriddenFlagsWarning,
  resolveReportingMode,
  type StepContext,
} from "./commands/cmp/index.js";

// Renderers
export * from "./render/report.js";
