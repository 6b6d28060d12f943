/**
 * Command-line configuration: parses flags with minimist, applies defaults,
 * and rejects anything invalid before a single process is spawned.
 */

import minimist from "minimist";
import { existsSync, statSync } from "node:fs";
import { cutoffRange } from "./cutoffs.js";
import { findToolBinary, TOOL_NAMES } from "./drivers/local.js";
import type { InvocationMode } from "./drivers/types.js";
import { ConfigurationError } from "./errors.js";
import { isDiscipline, type Discipline } from "./scheduler.js";
import type { ShiftMode } from "./stats.js";

export const DEFAULTS = {
  start: 1.745,
  end: 1.755,
  step: 0.005,
  cutoff: 1.75,
  trials: 100,
  concurrency: 10,
  discipline: "pool",
  stat: "rms",
  width: 5,
} as const;

export interface BatchSettings {
  target: string;
  toolPath: string;
  trialCount: number;
  concurrency: number;
  discipline: Discipline;
  timeout?: number;
}

export type RunConfig =
  | { command: "help" }
  | ({ command: "sweep"; cutoffs: number[]; recordWidth: number } & BatchSettings)
  | ({ command: "table"; cutoff: number } & BatchSettings)
  | ({ command: "shift"; mode: ShiftMode } & BatchSettings)
  | { command: "mean-table"; file: string };

const COMMANDS = ["sweep", "table", "shift", "mean-table"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function numberFlag(args: minimist.ParsedArgs, name: string, fallback: number): number {
  const raw: unknown = args[name];
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : NaN;
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`--${name} must be a number, got "${String(raw)}"`);
  }
  return value;
}

function positiveIntFlag(args: minimist.ParsedArgs, name: string, fallback: number): number {
  const value = numberFlag(args, name, fallback);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`--${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function stringFlag(args: minimist.ParsedArgs, name: string): string | undefined {
  const raw: unknown = args[name];
  if (raw === undefined) return undefined;
  if (typeof raw !== "string" || raw === "") {
    throw new ConfigurationError(`--${name} needs a value`);
  }
  return raw;
}

function requireDirectory(path: string): void {
  if (!existsSync(path) || !statSync(path).isDirectory()) {
    throw new ConfigurationError(`base directory not found: ${path}`);
  }
}

function batchSettings(args: minimist.ParsedArgs, target: string, mode: InvocationMode): BatchSettings {
  requireDirectory(target);

  const discipline = stringFlag(args, "discipline") ?? DEFAULTS.discipline;
  if (!isDiscipline(discipline)) {
    throw new ConfigurationError(`--discipline must be "pool" or "chunked", got "${discipline}"`);
  }

  const settings: BatchSettings = {
    target,
    toolPath: stringFlag(args, "tool") ?? findToolBinary(TOOL_NAMES[mode]),
    trialCount: positiveIntFlag(args, "trials", DEFAULTS.trials),
    concurrency: positiveIntFlag(args, "concurrency", DEFAULTS.concurrency),
    discipline,
  };
  if (args.timeout !== undefined) {
    settings.timeout = positiveIntFlag(args, "timeout", 0);
  }
  return settings;
}

export function resolveConfig(argv: string[]): RunConfig {
  const args = minimist(argv, {
    string: ["start", "end", "step", "cutoff", "trials", "concurrency", "discipline", "tool", "stat", "width", "timeout"],
    boolean: ["help"],
    alias: {
      h: "help",
      c: "cutoff",
      n: "trials",
      j: "concurrency",
    },
  });

  if (args.help) {
    return { command: "help" };
  }

  const [command, target, ...rest] = args._.map(String);
  if (command === undefined) {
    throw new ConfigurationError("a command is required (sweep, table, shift or mean-table)");
  }
  if (!isCommand(command)) {
    throw new ConfigurationError(`unknown command "${command}"`);
  }
  if (target === undefined) {
    throw new ConfigurationError(`${command} needs a target path`);
  }
  if (rest.length > 0) {
    throw new ConfigurationError(`unexpected arguments: ${rest.join(" ")}`);
  }

  switch (command) {
    case "sweep": {
      const cutoffs = cutoffRange(
        numberFlag(args, "start", DEFAULTS.start),
        numberFlag(args, "end", DEFAULTS.end),
        numberFlag(args, "step", DEFAULTS.step),
      );
      return {
        command,
        cutoffs,
        recordWidth: positiveIntFlag(args, "width", DEFAULTS.width),
        ...batchSettings(args, target, "cutoff-sweep"),
      };
    }
    case "table":
      return {
        command,
        cutoff: numberFlag(args, "cutoff", DEFAULTS.cutoff),
        ...batchSettings(args, target, "cutoff-sweep"),
      };
    case "shift": {
      const stat = stringFlag(args, "stat") ?? DEFAULTS.stat;
      if (stat !== "mean" && stat !== "rms") {
        throw new ConfigurationError(`--stat must be "mean" or "rms", got "${stat}"`);
      }
      return {
        command,
        mode: stat === "mean" ? "shift-mean" : "shift-rms",
        ...batchSettings(args, target, "shift-accumulation"),
      };
    }
    case "mean-table":
      if (!existsSync(target)) {
        throw new ConfigurationError(`table file not found: ${target}`);
      }
      return { command, file: target };
  }
}
