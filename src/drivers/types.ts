/**
 * Driver interface for invoking the analysis tool.
 *
 * The sweep harness never spawns anything itself. Drivers are the adapters
 * that run the tool somewhere (a local subprocess, or an in-process fake in
 * tests) and report what it printed.
 */

export interface DriverOptions {
  timeout?: number; // milliseconds
}

export interface ToolResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  wallTimeMs: number;
}

export interface Driver {
  call(args: string[], options?: DriverOptions): Promise<ToolResult>;
}

/** Invocation shapes understood by the analysis tools. */
export type InvocationMode = "cutoff-sweep" | "shift-accumulation";

/**
 * One finalized row of a cutoff sweep.
 */
export interface SweepRow {
  cutoff: number;
  count: number;
  mean: number[];
}

/**
 * Finalized shift-accumulation statistics. `rms` is present only for the
 * `shift-rms` aggregation.
 */
export interface ShiftSummary {
  count: number;
  sum: number[];
  sumSq: number[];
  mean: number[];
  rms?: number[];
}

/**
 * Raw output of one trial at a fixed cutoff, tagged with its index.
 */
export interface TrialLine {
  trialIndex: number;
  output: string;
}
