/** Where each trial's dump files live under the base directory. */

export const INITIAL_DUMP = "dump.initial";
export const FINAL_DUMP = "dump.final_no_cluster";

export interface TrialLocation {
  index: number; // 1-based
  initialPath: string;
  finalPath: string;
  workingDir: string;
}

export function locateTrial(baseDir: string, index: number): TrialLocation {
  const workingDir = `${baseDir}/run_${index}`;
  return {
    index,
    initialPath: `${workingDir}/${INITIAL_DUMP}`,
    finalPath: `${workingDir}/${FINAL_DUMP}`,
    workingDir,
  };
}

export function trialRange(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}
