/** Running aggregates for the sweep, plus plain descriptive helpers. */

import { MalformedOutput } from "./errors.js";
import type { ShiftPartial } from "./parse.js";

export function mean(arr: number[]): number {
	if (arr.length === 0) return 0;
	return arr.reduce((a, b) => a + b, 0) / arr.length;
}

/**
 * How a batch is reduced to a summary.
 *
 * - `cutoff-mean`: every record counts once, the mean is sum / records.
 * - `shift-mean`: records carry their own count and pre-summed components;
 *   the mean is total sum / total count.
 * - `shift-rms`: as `shift-mean`, plus sqrt(total sum of squares / total
 *   count) per component. This is the population RMS of deviations the tool
 *   has already centred, not a Bessel-corrected standard deviation.
 */
export type AggregationMode = "cutoff-mean" | "shift-mean" | "shift-rms";

export type ShiftMode = Extract<AggregationMode, "shift-mean" | "shift-rms">;

export interface AggregateState {
	readonly count: number;
	readonly sum: readonly number[];
	readonly sumSq?: readonly number[];
}

export function emptyAggregate(width: number, options: { squares?: boolean } = {}): AggregateState {
	const zeros = new Array<number>(width).fill(0);
	return options.squares ? { count: 0, sum: zeros, sumSq: [...zeros] } : { count: 0, sum: zeros };
}

function addVectors(acc: readonly number[], add: readonly number[], what: string): number[] {
	if (acc.length !== add.length) {
		throw new MalformedOutput(`${what} has ${add.length} components, aggregate has ${acc.length}`);
	}
	return acc.map((v, i) => v + add[i]);
}

/** Fold one record that counts as a single sample. */
export function foldRecord(state: AggregateState, record: readonly number[]): AggregateState {
	const sum = addVectors(state.sum, record, "record");
	if (state.sumSq === undefined) {
		return { count: state.count + 1, sum };
	}
	const squares = record.map((v) => v * v);
	return { count: state.count + 1, sum, sumSq: addVectors(state.sumSq, squares, "record") };
}

/** Fold a trial's pre-aggregated count, sums and sums of squares. */
export function foldPartial(state: AggregateState, partial: ShiftPartial): AggregateState {
	const sum = addVectors(state.sum, partial.sum, "partial sum");
	const count = state.count + partial.count;
	if (state.sumSq === undefined) {
		return { count, sum };
	}
	return { count, sum, sumSq: addVectors(state.sumSq, partial.sumSq, "partial sum of squares") };
}

function requireSamples(state: AggregateState): void {
	if (state.count === 0) {
		throw new MalformedOutput("no samples to finalize");
	}
}

export function finalizeMean(state: AggregateState): number[] {
	requireSamples(state);
	return state.sum.map((s) => s / state.count);
}

export function finalizeRms(state: AggregateState): number[] {
	requireSamples(state);
	if (state.sumSq === undefined) {
		throw new MalformedOutput("aggregate was built without sums of squares");
	}
	return state.sumSq.map((s) => Math.sqrt(s / state.count));
}
