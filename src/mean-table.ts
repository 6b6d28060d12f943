/** Column means of a saved per-trial table (`<index> <v1> ... <vk>` lines). */

import { MalformedOutput } from "./errors.js";
import { parseFloatToken } from "./parse.js";
import { mean } from "./stats.js";

export function summarizeTable(text: string): number[] {
  const rows = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, i) => {
      const values = line.split(/\s+/).slice(1).map(parseFloatToken);
      if (values.length === 0) {
        throw new MalformedOutput(`table line ${i + 1} has no values after the trial index`);
      }
      return values;
    });

  if (rows.length === 0) {
    throw new MalformedOutput("table is empty");
  }

  const width = rows[0].length;
  rows.forEach((row, i) => {
    if (row.length !== width) {
      throw new MalformedOutput(`table line ${i + 1} has ${row.length} values, expected ${width}`);
    }
  });

  return Array.from({ length: width }, (_, col) => mean(rows.map((row) => row[col])));
}
