/** Local subprocess driver. Spawns the analysis tool as a child process. */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { Driver, DriverOptions, InvocationMode, ToolResult } from "./types.js";
import { spawnCollect } from "./spawn-helper.js";
import { ExternalToolFailure } from "../errors.js";

/** Binary name of the tool behind each invocation mode. */
export const TOOL_NAMES: Record<InvocationMode, string> = {
  "cutoff-sweep": "crater-analysis",
  "shift-accumulation": "component-shift",
};

export function findToolBinary(name: string, cwd: string = process.cwd()): string {
  // A cargo release build beside the working directory wins over PATH
  for (const candidate of [resolve(cwd, "target", "release", name), resolve(cwd, "..", "target", "release", name)]) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return name;
}

export class LocalDriver implements Driver {
  readonly toolPath: string;
  private timeout: number | undefined;

  constructor(options: { toolPath: string; timeout?: number }) {
    this.toolPath = options.toolPath;
    this.timeout = options.timeout;
  }

  async call(args: string[], options?: DriverOptions): Promise<ToolResult> {
    return spawnCollect(this.toolPath, args, {
      timeout: options?.timeout ?? this.timeout,
    });
  }
}

/**
 * Run the tool once and return its stdout. Any non-zero exit is a hard
 * failure; stderr is kept only for the error message.
 */
export async function invokeTool(driver: Driver, args: string[], options?: DriverOptions): Promise<string> {
  const result = await driver.call(args, options);
  if (result.exitCode !== 0) {
    throw new ExternalToolFailure(result.exitCode, result.stderr);
  }
  return result.stdout;
}
