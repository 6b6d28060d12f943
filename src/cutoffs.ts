/** Arithmetic progression of cutoff values, endpoint included. */

import { ConfigurationError } from "./errors.js";

// Absorbs drift such as (1.755 - 1.745) / 0.005 = 2.0000000000000018.
const STEP_EPSILON = 1e-9;

export function cutoffCount(start: number, end: number, step: number): number {
  const steps = Math.max(0, Math.ceil((end - start) / step - STEP_EPSILON));
  // A span narrower than the tolerance still needs both start and end
  return (steps === 0 && end > start ? 1 : steps) + 1;
}

export function cutoffRange(start: number, end: number, step: number): number[] {
  if (![start, end, step].every(Number.isFinite)) {
    throw new ConfigurationError(`cutoff bounds must be finite (start=${start}, end=${end}, step=${step})`);
  }
  if (step <= 0) {
    throw new ConfigurationError(`cutoff step must be positive, got ${step}`);
  }
  if (end < start) {
    throw new ConfigurationError(`cutoff end ${end} is below start ${start}`);
  }

  const count = cutoffCount(start, end, step);
  return Array.from({ length: count }, (_, i) => {
    if (i === 0) return start;
    if (i === count - 1) return end;
    return Number((start + i * step).toPrecision(12));
  });
}
