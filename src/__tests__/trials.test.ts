import { describe, it, expect } from "vitest";
import { locateTrial, trialRange } from "../trials.js";

describe("locateTrial", () => {
  it("derives the dump files and working directory of a trial", () => {
    expect(locateTrial("/data/sim", 7)).toEqual({
      index: 7,
      initialPath: "/data/sim/run_7/dump.initial",
      finalPath: "/data/sim/run_7/dump.final_no_cluster",
      workingDir: "/data/sim/run_7",
    });
  });

  it("keeps a relative base directory as given", () => {
    expect(locateTrial("../runs", 1).workingDir).toBe("../runs/run_1");
  });
});

describe("trialRange", () => {
  it("is 1-based and inclusive", () => {
    expect(trialRange(4)).toEqual([1, 2, 3, 4]);
    expect(trialRange(0)).toEqual([]);
  });
});
