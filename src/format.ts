/** Fixed-width table rows. */

import { parseFloatToken } from "./parse.js";

export interface RowFormat {
  width: number;
  precision: number;
}

export const SWEEP_ROW_FORMAT: RowFormat = { width: 9, precision: 3 };
export const MEAN_TABLE_FORMAT: RowFormat = { width: 8, precision: 2 };

/**
 * Like toFixed, but an exact halfway value rounds to the even digit
 * (0.0625 -> "0.062"), matching printf-style float formatting.
 */
export function toFixedHalfEven(value: number, precision: number): string {
  const fixed = value.toFixed(precision);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return fixed;
  }

  // Full decimal expansion of the double; a tie ends in 5 followed by zeros
  const exact = Math.abs(value).toFixed(100);
  const dot = exact.indexOf(".");
  if (!/^50*$/.test(exact.slice(dot + 1 + precision))) {
    return fixed;
  }

  const truncated = precision === 0 ? exact.slice(0, dot) : exact.slice(0, dot + 1 + precision);
  if (Number(truncated[truncated.length - 1]) % 2 !== 0) {
    return fixed;
  }
  return (value < 0 ? "-" : "") + truncated;
}

export function formatCell(value: number, format: RowFormat = SWEEP_ROW_FORMAT): string {
  const fixed = toFixedHalfEven(value, format.precision);
  // -0.0001 would otherwise print as "-0.000"
  const cell = Number(fixed) === 0 ? (0).toFixed(format.precision) : fixed;
  // A cell that fills its width would run into the previous one
  return cell.length >= format.width ? ` ${cell}` : cell.padStart(format.width);
}

export function formatRow(values: readonly number[], format: RowFormat = SWEEP_ROW_FORMAT): string {
  return values.map((v) => formatCell(v, format)).join("");
}

/** Inverse of formatRow, exact up to the printed precision. */
export function parseRow(line: string): number[] {
  return line
    .trim()
    .split(/\s+/)
    .filter((t) => t.length > 0)
    .map(parseFloatToken);
}

export function formatTableLine(trialIndex: number, output: string): string {
  return `${trialIndex} ${output.trim()}`;
}
