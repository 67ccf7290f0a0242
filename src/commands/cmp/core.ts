/**
 * Pure decision logic for the lockstep comparison.
 * No I/O here: every step returns a structured outcome the loop acts on.
 */

import type {
  ComparisonStatus,
  Cursor,
  Decision,
  ReportingFlags,
  ReportingMode,
  StreamSymbol,
} from "../../core/types.js";
import {
  formatDifference,
  formatEndOfStream,
  formatLineDifference,
  formatLongLine,
} from "../../render/report.js";

const NEWLINE = 0x0a;

/**
 * Context for deciding a single step.
 */
export interface StepContext {
  mode: ReportingMode;
  names: readonly [string, string];
  cursor: Cursor;
  /** Whether long mode already listed a differing pair */
  listed: boolean;
}

/**
 * Resolve CLI flags into a single reporting mode.
 * Priority: quiet, line, long, default.
 */
export function resolveReportingMode(flags: ReportingFlags): ReportingMode {
  if (flags.silent) return "quiet";
  if (flags.line) return "line";
  if (flags.long) return "long";
  return "default";
}

/**
 * Warning text when more than one reporting flag was given, else undefined.
 */
export function overriddenFlagsWarning(
  flags: ReportingFlags,
  mode: ReportingMode
): string | undefined {
  const given = [
    flags.silent && "-s",
    flags.line && "-L",
    flags.long && "-l",
  ].filter((flag): flag is string => typeof flag === "string");

  return given.length > 1 ? `Warning: ${given.join(", ")} given; using ${mode} mode` : undefined;
}

function sameSymbol(first: StreamSymbol, second: StreamSymbol): boolean {
  if (first.kind === "byte" && second.kind === "byte") {
    return first.value === second.value;
  }
  return first.kind === second.kind;
}

/**
 * Decide what to do with one pair of symbols.
 */
export function decide(
  first: StreamSymbol,
  second: StreamSymbol,
  context: StepContext
): Decision {
  const { mode, names, cursor } = context;

  if (first.kind === "end" && second.kind === "end") {
    return { action: "finish", status: context.listed ? "differ" : "equal" };
  }

  if (sameSymbol(first, second)) {
    return { action: "advance" };
  }

  switch (mode) {
    case "quiet":
      return { action: "finish", status: "differ" };
    case "line":
      return { action: "finish", status: "differ", message: formatLineDifference(names, cursor) };
    case "long":
      if (first.kind === "end") {
        return { action: "finish", status: "differ", message: formatEndOfStream(names[0]) };
      }
      if (second.kind === "end") {
        return { action: "finish", status: "differ", message: formatEndOfStream(names[1]) };
      }
      return {
        action: "report",
        message: formatLongLine(cursor.charNumber, first.value, second.value),
      };
    case "default":
      return { action: "finish", status: "differ", message: formatDifference(names, cursor) };
  }
}

/**
 * Move the cursor past a pair. Only the first source's newlines count.
 */
export function advanceCursor(cursor: Cursor, first: StreamSymbol): Cursor {
  return {
    charNumber: cursor.charNumber + 1,
    lineNumber:
      first.kind === "byte" && first.value === NEWLINE
        ? cursor.lineNumber + 1
        : cursor.lineNumber,
  };
}

/**
 * Process exit code for a finished comparison.
 */
export function exitCodeFor(status: ComparisonStatus): number {
  return status === "equal" ? 0 : 1;
}
