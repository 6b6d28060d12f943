import { describe, it, expect } from "vitest";
import { parseFloatToken, parseOutput, parseRecord, parseShiftOutput } from "../parse.js";
import { MalformedOutput } from "../errors.js";

describe("parseRecord", () => {
  it("parses one line of whitespace-separated values", () => {
    expect(parseRecord("   1.745   0.5  -2\t3e-1 7\n", 5)).toEqual([1.745, 0.5, -2, 0.3, 7]);
  });

  it("rejects the wrong number of values", () => {
    expect(() => parseRecord("1.0 2.0", 3)).toThrow(MalformedOutput);
    expect(() => parseRecord("1.0 2.0", 3)).toThrow("expected 3 values in output line, got 2");
  });

  it("rejects non-numeric tokens", () => {
    expect(() => parseRecord("1 abc 3", 3)).toThrow('"abc" is not a number');
  });

  it("rejects empty and multi-line output", () => {
    expect(() => parseRecord("", 3)).toThrow("expected 1 output line, got 0");
    expect(() => parseRecord("1 2 3\n4 5 6\n", 3)).toThrow("expected 1 output line, got 2");
  });
});

describe("parseShiftOutput", () => {
  it("parses count, sums and sums of squares", () => {
    expect(parseShiftOutput("12\n1 2 3\n4.5 5 6\n")).toEqual({
      count: 12,
      sum: [1, 2, 3],
      sumSq: [4.5, 5, 6],
    });
  });

  it("rejects missing lines and short vectors", () => {
    expect(() => parseShiftOutput("12\n1 2 3\n")).toThrow("expected 3 output lines, got 2");
    expect(() => parseShiftOutput("12\n1 2\n4 5 6")).toThrow("expected 3 values in sum line, got 2");
    expect(() => parseShiftOutput("12 13\n1 2 3\n4 5 6")).toThrow(MalformedOutput);
  });
});

describe("parseOutput", () => {
  it("dispatches on the leading-count flag", () => {
    expect(parseOutput("1 2 3", 3, false)).toEqual([1, 2, 3]);
    expect(parseOutput("2\n1 1 1\n1 1 1", 3, true)).toEqual({ count: 2, sum: [1, 1, 1], sumSq: [1, 1, 1] });
  });

  it("only knows three-component shift output", () => {
    expect(() => parseOutput("2\n1 1\n1 1", 2, true)).toThrow(MalformedOutput);
  });
});

describe("parseFloatToken", () => {
  it("accepts the float spellings the tools print", () => {
    expect(parseFloatToken("-0.25")).toBe(-0.25);
    expect(parseFloatToken(".5")).toBe(0.5);
    expect(parseFloatToken("1.")).toBe(1);
    expect(parseFloatToken("2E+3")).toBe(2000);
    expect(parseFloatToken("NaN")).toBeNaN();
    expect(parseFloatToken("inf")).toBe(Infinity);
    expect(parseFloatToken("-inf")).toBe(-Infinity);
  });

  it("rejects what Number() would quietly accept", () => {
    for (const token of ["", "0x10", "1e", "1_000", "--1"]) {
      expect(() => parseFloatToken(token)).toThrow(MalformedOutput);
    }
  });
});
