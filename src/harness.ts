/**
 * Sweep harness: runs the analysis tool over every trial for each cutoff,
 * under bounded concurrency, and folds the results into per-cutoff
 * statistics.
 *
 * Each batch is collected in full before anything is folded, so an
 * aggregate only ever sees a complete, successful batch. The first failing
 * trial aborts the whole run.
 */

import type { Driver, DriverOptions, ShiftSummary, SweepRow, TrialLine } from "./drivers/types.js";
import { invokeTool } from "./drivers/local.js";
import { ExternalToolFailure, MalformedOutput, TrialFailure } from "./errors.js";
import { parseRecord, parseShiftOutput, SHIFT_COMPONENTS } from "./parse.js";
import { runBatch, type Discipline } from "./scheduler.js";
import {
  emptyAggregate,
  finalizeMean,
  finalizeRms,
  foldPartial,
  foldRecord,
  type ShiftMode,
} from "./stats.js";
import { locateTrial, trialRange, type TrialLocation } from "./trials.js";

export interface HarnessOptions {
  driver: Driver;
  baseDir: string;
  trialCount: number;
  concurrency: number;
  discipline?: Discipline;
  driverOptions?: DriverOptions;
  onProgress?: (progress: ProgressInfo) => void;
}

export interface ProgressInfo {
  cutoff?: number;
  completed: number;
  total: number;
  elapsed: string;
}

export interface SweepOptions extends HarnessOptions {
  cutoffs: number[];
  recordWidth: number;
  onRow?: (row: SweepRow) => void;
}

export interface ShiftOptions extends HarnessOptions {
  mode: ShiftMode;
}

export interface TableOptions extends HarnessOptions {
  cutoff: number;
}

export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h${String(minutes % 60).padStart(2, "0")}m`;
  }
  if (minutes > 0) {
    return `${minutes}m${String(seconds % 60).padStart(2, "0")}s`;
  }
  return `${seconds}s`;
}

/** `<initial> <final> <workdir> -c <cutoff>` */
export function cutoffSweepArgs(trial: TrialLocation, cutoff: number): string[] {
  return [trial.initialPath, trial.finalPath, trial.workingDir, "-c", String(cutoff)];
}

/** `<initial> <final>` */
export function shiftArgs(trial: TrialLocation): string[] {
  return [trial.initialPath, trial.finalPath];
}

/**
 * Run one batch: every trial in [1, trialCount], each invocation parsed as
 * soon as it finishes. Returns the parsed values in trial order.
 */
async function runTrials<R>(
  options: HarnessOptions,
  cutoff: number | undefined,
  buildArgs: (trial: TrialLocation) => string[],
  parse: (stdout: string, trial: TrialLocation) => R,
): Promise<R[]> {
  const { driver, baseDir, trialCount, concurrency, discipline, driverOptions, onProgress } = options;
  const startTime = Date.now();

  return runBatch(
    trialRange(trialCount),
    async (trialIndex) => {
      const trial = locateTrial(baseDir, trialIndex);
      try {
        const stdout = await invokeTool(driver, buildArgs(trial), driverOptions);
        return parse(stdout, trial);
      } catch (err) {
        if (err instanceof ExternalToolFailure || err instanceof MalformedOutput) {
          throw new TrialFailure(trialIndex, cutoff, err);
        }
        throw err;
      }
    },
    {
      concurrency,
      discipline,
      onSettled: (completed, total) => {
        onProgress?.({ cutoff, completed, total, elapsed: formatElapsed(Date.now() - startTime) });
      },
    },
  );
}

/**
 * Sweep the cutoffs in ascending order, one batch per cutoff. Each row is
 * handed to `onRow` as soon as its batch is finalized, so rows printed
 * before a later failure stay valid.
 */
export async function runSweep(options: SweepOptions): Promise<SweepRow[]> {
  const { cutoffs, recordWidth, trialCount, onRow } = options;
  const rows: SweepRow[] = [];

  for (const cutoff of [...cutoffs].sort((a, b) => a - b)) {
    const records = await runTrials(
      options,
      cutoff,
      (trial) => cutoffSweepArgs(trial, cutoff),
      (stdout) => parseRecord(stdout, recordWidth),
    );

    const state = records.reduce(foldRecord, emptyAggregate(recordWidth));
    if (state.count !== trialCount) {
      throw new Error(`cutoff ${cutoff}: folded ${state.count} of ${trialCount} trials`);
    }

    const row: SweepRow = { cutoff, count: state.count, mean: finalizeMean(state) };
    rows.push(row);
    onRow?.(row);
  }

  return rows;
}

/**
 * Accumulate component shifts over all trials. The tool pre-sums within a
 * trial, so partial counts and sums are added directly.
 */
export async function runShift(options: ShiftOptions): Promise<ShiftSummary> {
  const partials = await runTrials(options, undefined, shiftArgs, (stdout) => parseShiftOutput(stdout));
  const state = partials.reduce(foldPartial, emptyAggregate(SHIFT_COMPONENTS, { squares: true }));

  const summary: ShiftSummary = {
    count: state.count,
    sum: [...state.sum],
    sumSq: [...(state.sumSq ?? [])],
    mean: finalizeMean(state),
  };
  if (options.mode === "shift-rms") {
    summary.rms = finalizeRms(state);
  }
  return summary;
}

/**
 * Per-trial output at a single cutoff, in trial order.
 */
export async function runTrialTable(options: TableOptions): Promise<TrialLine[]> {
  const { cutoff } = options;
  return runTrials(
    options,
    cutoff,
    (trial) => cutoffSweepArgs(trial, cutoff),
    (stdout, trial): TrialLine => ({ trialIndex: trial.index, output: stdout.trim() }),
  );
}
