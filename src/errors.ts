/** Error taxonomy for the sweep. Nothing here is recovered from locally. */

export class ExternalToolFailure extends Error {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(exitCode: number, stderr = "") {
    const detail = stderr.trim();
    super(`external tool exited with code ${exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "ExternalToolFailure";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class MalformedOutput extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`malformed tool output: ${reason}`);
    this.name = "MalformedOutput";
    this.reason = reason;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Attaches the failing trial index and cutoff to whatever went wrong while
 * running or parsing that trial.
 */
export class TrialFailure extends Error {
  readonly trialIndex: number;
  readonly cutoff: number | undefined;
  readonly failure: ExternalToolFailure | MalformedOutput;

  constructor(trialIndex: number, cutoff: number | undefined, failure: ExternalToolFailure | MalformedOutput) {
    const where = cutoff === undefined ? `trial ${trialIndex}` : `trial ${trialIndex} (cutoff ${cutoff})`;
    super(`${where}: ${failure.message}`);
    this.name = "TrialFailure";
    this.trialIndex = trialIndex;
    this.cutoff = cutoff;
    this.failure = failure;
  }
}
