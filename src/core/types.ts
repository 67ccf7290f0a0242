/**
 * Core types for stream-cmp sources, channel items and comparison outcomes.
 */

import type { Readable } from "node:stream";

// ============================================================================
// Sources
// ============================================================================

/**
 * Name token that selects standard input instead of a file.
 */
export const STDIN_SOURCE = "-";

export interface Source {
  /** Name used in diagnostics (the operand as given) */
  name: string;
  /** Byte position the comparison starts at */
  offset: number;
  /**
   * Leading bytes the reader must discard before emitting.
   * Zero when the offset was already applied by opening the stream at it.
   */
  skip: number;
  stream: Readable;
}

// ============================================================================
// Channel Items (Discriminated Union)
// ============================================================================

export interface ByteItem {
  kind: "byte";
  value: number;
}

export interface EndItem {
  kind: "end";
}

export interface ErrorItem {
  kind: "error";
  error: Error;
}

export type ChannelItem = ByteItem | EndItem | ErrorItem;

/**
 * What the comparator sees once errors have been raised.
 */
export type StreamSymbol = ByteItem | EndItem;

// ============================================================================
// Comparison
// ============================================================================

export type ReportingMode = "quiet" | "line" | "long" | "default";

export interface ReportingFlags {
  silent?: boolean;
  line?: boolean;
  long?: boolean;
}

export interface Cursor {
  /** 1-based count of byte pairs examined */
  charNumber: number;
  /** 1-based line, counted from newlines of the first source */
  lineNumber: number;
}

export type ComparisonStatus = "equal" | "differ";

/**
 * Outcome of a single lockstep step.
 */
export type Decision =
  | { action: "advance" }
  | { action: "report"; message: string }
  | { action: "finish"; status: ComparisonStatus; message?: string };

export interface ComparisonResult extends Cursor {
  status: ComparisonStatus;
}

/**
 * Sink for comparison report lines.
 */
export type ReportWriter = (message: string) => void;

export interface CompareOptions {
  mode: ReportingMode;
  /** Diagnostic names of the first and second source */
  names: readonly [string, string];
  write?: ReportWriter;
}

export interface CmpOptions {
  operands: readonly [string, string];
  offsets: readonly [number, number];
  mode: ReportingMode;
  /** Channel capacity in bytes */
  capacity?: number;
  write?: ReportWriter;
}
