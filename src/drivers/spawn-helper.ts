/** Spawn+collect helper for the analysis tool, with an optional timeout. */

import { spawn } from "node:child_process";

export interface SpawnOptions {
	timeout?: number; // milliseconds; unset means wait forever
}

export interface SpawnResult {
	stdout: string;
	stderr: string;
	exitCode: number;
	wallTimeMs: number;
}

// Conventional shell status for "command not found".
export const SPAWN_FAILED_EXIT_CODE = 127;

/**
 * Spawn a child process, collect stdout/stderr, and resolve once it exits.
 * When a timeout is given, SIGTERM is sent on expiry, followed by SIGKILL
 * 1 second later. A process killed by a signal reports exit code 1.
 */
export function spawnCollect(
	cmd: string,
	args: string[],
	opts: SpawnOptions = {},
): Promise<SpawnResult> {
	const start = Date.now();

	return new Promise<SpawnResult>((resolve) => {
		const child = spawn(cmd, args, {
			stdio: ["pipe", "pipe", "pipe"],
		});

		let stdout = "";
		let stderr = "";
		let settled = false;

		child.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		child.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		child.stdin.end();

		let timer: NodeJS.Timeout | undefined;
		if (opts.timeout !== undefined) {
			timer = setTimeout(() => {
				child.kill("SIGTERM");
				setTimeout(() => child.kill("SIGKILL"), 1000).unref();
			}, opts.timeout);
		}

		child.on("close", (code: number | null) => {
			clearTimeout(timer);
			if (settled) return;
			settled = true;
			resolve({
				stdout,
				stderr,
				exitCode: code ?? 1,
				wallTimeMs: Date.now() - start,
			});
		});

		child.on("error", (err: Error) => {
			clearTimeout(timer);
			if (settled) return;
			settled = true;
			resolve({
				stdout: "",
				stderr: `failed to spawn ${cmd}: ${err.message}`,
				exitCode: SPAWN_FAILED_EXIT_CODE,
				wallTimeMs: Date.now() - start,
			});
		});
	});
}
