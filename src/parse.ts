/** Parsing of the analysis tool's stdout into fixed-width numeric records. */

import { MalformedOutput } from "./errors.js";

// Decimal float literal as printed by the tools: 1, -0.5, 2.5e-3, nan, inf.
const FLOAT_TOKEN = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf(?:inity)?|nan)$/i;

/** Component count of a shift-accumulation record. */
export const SHIFT_COMPONENTS = 3;

export interface ShiftPartial {
  count: number;
  sum: number[];
  sumSq: number[];
}

export function parseFloatToken(token: string): number {
  if (!FLOAT_TOKEN.test(token)) {
    throw new MalformedOutput(`"${token}" is not a number`);
  }
  const lower = token.toLowerCase().replace(/^\+/, "");
  if (lower.endsWith("nan")) return NaN;
  if (lower.startsWith("-inf")) return -Infinity;
  if (lower.startsWith("inf")) return Infinity;
  return Number(token);
}

function parseTokens(line: string, expectedLen: number, what: string): number[] {
  const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length !== expectedLen) {
    throw new MalformedOutput(`expected ${expectedLen} values in ${what}, got ${tokens.length}`);
  }
  return tokens.map(parseFloatToken);
}

/**
 * Cutoff-sweep output: a single line of exactly `expectedLen` values.
 */
export function parseRecord(text: string, expectedLen: number): number[] {
  const lines = text.split("\n").filter((l) => l.trim().length > 0);
  if (lines.length !== 1) {
    throw new MalformedOutput(`expected 1 output line, got ${lines.length}`);
  }
  return parseTokens(lines[0], expectedLen, "output line");
}

/**
 * Shift-accumulation output: a count, then the component sums, then the
 * component sums of squares, one per line.
 */
export function parseShiftOutput(text: string): ShiftPartial {
  const lines = text.split("\n").filter((l) => l.trim().length > 0);
  if (lines.length !== 3) {
    throw new MalformedOutput(`expected 3 output lines, got ${lines.length}`);
  }
  const [count] = parseTokens(lines[0], 1, "count line");
  return {
    count,
    sum: parseTokens(lines[1], SHIFT_COMPONENTS, "sum line"),
    sumSq: parseTokens(lines[2], SHIFT_COMPONENTS, "sum-of-squares line"),
  };
}

/**
 * Contract form covering both modes. With a leading count, `expectedLen` is
 * the width of the sum and sum-of-squares vectors.
 */
export function parseOutput(text: string, expectedLen: number, hasLeadingCount: false): number[];
export function parseOutput(text: string, expectedLen: number, hasLeadingCount: true): ShiftPartial;
export function parseOutput(text: string, expectedLen: number, hasLeadingCount: boolean): number[] | ShiftPartial {
  if (!hasLeadingCount) {
    return parseRecord(text, expectedLen);
  }
  if (expectedLen !== SHIFT_COMPONENTS) {
    throw new MalformedOutput(`shift output has ${SHIFT_COMPONENTS} components, not ${expectedLen}`);
  }
  return parseShiftOutput(text);
}
