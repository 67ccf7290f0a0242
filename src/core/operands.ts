/**
 * Positional operand handling: `source1 source2 [offset1 [offset2]]`.
 */

import { OffsetParseError, UsageError } from "./errors.js";

export interface ParsedOperands {
  names: [string, string];
  offsets: [number, number];
}

const DIGITS: Record<number, string> = {
  2: "[01]",
  8: "[0-7]",
  10: "[0-9]",
  16: "[0-9a-fA-F]",
};

/**
 * Split an unsigned literal into its radix and digit string.
 * `0x` hex, `0o` octal, `0b` binary, a bare leading `0` octal, else decimal.
 */
function splitRadix(literal: string): { radix: number; digits: string } {
  const prefixed = /^0([xXoObB])(.*)$/.exec(literal);
  if (prefixed) {
    const marker = prefixed[1].toLowerCase();
    const radix = marker === "x" ? 16 : marker === "o" ? 8 : 2;
    return { radix, digits: prefixed[2] };
  }
  if (literal.length > 1 && literal.startsWith("0")) {
    return { radix: 8, digits: literal.slice(1) };
  }
  return { radix: 10, digits: literal };
}

/**
 * Parse an offset literal with base auto-detection.
 *
 * @param label - `offset1` or `offset2`, used in the error message
 * @throws OffsetParseError on malformed, negative or oversized values
 */
export function parseOffset(token: string, label: string): number {
  if (token.startsWith("-")) {
    throw new OffsetParseError(label, token, "negative offset");
  }

  const literal = token.startsWith("+") ? token.slice(1) : token;
  const { radix, digits } = splitRadix(literal);
  const digit = DIGITS[radix];
  const pattern = new RegExp(`^${digit}+(?:_${digit}+)*$`);

  if (!pattern.test(digits)) {
    throw new OffsetParseError(label, token, "invalid syntax");
  }

  const value = Number.parseInt(digits.replaceAll("_", ""), radix);
  if (!Number.isSafeInteger(value)) {
    throw new OffsetParseError(label, token, "value out of range");
  }
  return value;
}

/**
 * Validate the operand count and parse the optional offsets.
 */
export function parseOperands(operands: readonly string[]): ParsedOperands {
  if (operands.length < 2 || operands.length > 4) {
    throw new UsageError(
      `expected two filenames (and one to two optional offsets), got ${operands.length}`
    );
  }

  const [first, second, offset1, offset2] = operands;
  return {
    names: [first, second],
    offsets: [
      offset1 === undefined ? 0 : parseOffset(offset1, "offset1"),
      offset2 === undefined ? 0 : parseOffset(offset2, "offset2"),
    ],
  };
}
