#!/usr/bin/env node
/**
 * CLI entry point for the cutoff sweep.
 *
 * Usage:
 *   npx tsx src/run.ts sweep ../runs --start 1.6 --end 2.0 --step 0.05
 *   npx tsx src/run.ts table ../runs --cutoff 1.75 > table.txt
 *   npx tsx src/run.ts mean-table table.txt
 *   npx tsx src/run.ts shift ../runs --stat rms
 */

import { readFileSync } from "node:fs";
import { resolveConfig, DEFAULTS, type BatchSettings } from "./config.js";
import { LocalDriver } from "./drivers/local.js";
import { formatRow, formatTableLine, MEAN_TABLE_FORMAT } from "./format.js";
import { runShift, runSweep, runTrialTable, type HarnessOptions, type ProgressInfo } from "./harness.js";
import { summarizeTable } from "./mean-table.js";

const USAGE = `
Cutoff sweep over repeated simulation trials

Usage:
  npx tsx src/run.ts <command> <target> [options]

Commands:
  sweep <dir>       Mean tool output per cutoff, one row per cutoff
  table <dir>       Raw tool output per trial at one cutoff
  shift <dir>       Component shift totals, mean and RMS over all trials
  mean-table <file> Column means of a saved table

Options:
  --start           First cutoff (default: ${DEFAULTS.start})
  --end             Last cutoff, always included (default: ${DEFAULTS.end})
  --step            Cutoff step (default: ${DEFAULTS.step})
  --cutoff, -c      Cutoff for "table" (default: ${DEFAULTS.cutoff})
  --width           Values per tool output line for "sweep" (default: ${DEFAULTS.width})
  --stat            "mean" or "rms" for "shift" (default: ${DEFAULTS.stat})
  --trials, -n      Trials run_1 .. run_N under <dir> (default: ${DEFAULTS.trials})
  --concurrency, -j Tool processes in flight (default: ${DEFAULTS.concurrency})
  --discipline      "pool" or "chunked" scheduling (default: ${DEFAULTS.discipline})
  --tool            Path to the analysis binary (default: ./target/release or PATH)
  --timeout         Per-process timeout in ms (default: none)
  --help            Show this help message
`.trim();

function printUsage(): void {
  console.log(USAGE);
}

function reportProgress(progress: ProgressInfo): void {
  const label = progress.cutoff === undefined ? "" : `cutoff ${progress.cutoff} `;
  process.stderr.write(`\r${label}[${progress.completed}/${progress.total}] elapsed: ${progress.elapsed}`);
  if (progress.completed === progress.total) {
    process.stderr.write("\n");
  }
}

function harnessOptions(settings: BatchSettings): HarnessOptions {
  console.error(`Tool: ${settings.toolPath}`);
  console.error(`Trials: ${settings.trialCount}, Concurrency: ${settings.concurrency} (${settings.discipline})`);
  return {
    driver: new LocalDriver({ toolPath: settings.toolPath, timeout: settings.timeout }),
    baseDir: settings.target,
    trialCount: settings.trialCount,
    concurrency: settings.concurrency,
    discipline: settings.discipline,
    onProgress: reportProgress,
  };
}

async function main(): Promise<void> {
  const config = resolveConfig(process.argv.slice(2));

  switch (config.command) {
    case "help":
      printUsage();
      return;

    case "sweep":
      console.error(`cutoffs: ${config.cutoffs.join(", ")}`);
      await runSweep({
        ...harnessOptions(config),
        cutoffs: config.cutoffs,
        recordWidth: config.recordWidth,
        onRow: (row) => console.log(formatRow([row.cutoff, ...row.mean])),
      });
      return;

    case "table": {
      const lines = await runTrialTable({ ...harnessOptions(config), cutoff: config.cutoff });
      for (const line of lines) {
        console.log(formatTableLine(line.trialIndex, line.output));
      }
      return;
    }

    case "shift": {
      const summary = await runShift({ ...harnessOptions(config), mode: config.mode });
      console.log(`count: ${summary.count}`);
      console.log(`sum:   ${summary.sum.join(" ")}`);
      console.log(`sum2:  ${summary.sumSq.join(" ")}`);
      console.log(`mean:  ${summary.mean.join(" ")}`);
      if (summary.rms) {
        console.log(`rms:   ${summary.rms.join(" ")}`);
      }
      return;
    }

    case "mean-table":
      console.log(formatRow(summarizeTable(readFileSync(config.file, "utf-8")), MEAN_TABLE_FORMAT));
      return;
  }
}

main().catch((err) => {
  process.stderr.write("\n");
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
