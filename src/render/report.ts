/**
 * Report line formatting for each reporting mode.
 */

import type { Cursor } from "../core/types.js";

/**
 * Octal rendering of a byte, at least two digits wide.
 */
export function formatOctalByte(value: number): string {
  return value.toString(8).padStart(2, "0");
}

/**
 * Default mode: `a b differ: char 5`
 */
export function formatDifference(
  names: readonly [string, string],
  cursor: Cursor
): string {
  return `${names[0]} ${names[1]} differ: char ${cursor.charNumber}`;
}

/**
 * Line mode: `a b differ: char 4 line 2`
 */
export function formatLineDifference(
  names: readonly [string, string],
  cursor: Cursor
): string {
  return `${formatDifference(names, cursor)} line ${cursor.lineNumber}`;
}

/**
 * Long mode listing row: position right-aligned in 8 columns, then both bytes.
 */
export function formatLongLine(charNumber: number, first: number, second: number): string {
  return `${String(charNumber).padStart(8)} ${formatOctalByte(first)} ${formatOctalByte(second)}`;
}

export function formatEndOfStream(name: string): string {
  return `EOF on ${name}`;
}
