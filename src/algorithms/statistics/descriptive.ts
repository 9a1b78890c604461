// Descriptive statistics shared by the live filter, the BPM estimator and the
// offline summarizer. Percentiles use linear interpolation between order
// statistics (rank = p * (n - 1)), the same convention everywhere.

import { max, mean, median, min, quantileSeq, std } from 'mathjs';

export type TukeyFences = {
	q1: number;
	q3: number;
	iqr: number;
	lower: number;
	upper: number;
};

function scalar(value: unknown, label: string): number {
	if (typeof value !== 'number') {
		throw new TypeError(`${label} did not reduce to a plain number`);
	}
	return value;
}

/** Successive differences: n values → n-1 deltas. */
export function diff(values: readonly number[]): number[] {
	const out: number[] = [];
	for (let i = 1; i < values.length; i++) {
		out.push(values[i] - values[i - 1]);
	}
	return out;
}

export function average(values: readonly number[]): number {
	return scalar(mean([...values]), 'mean');
}

export function middle(values: readonly number[]): number {
	return scalar(median([...values]), 'median');
}

export function minimum(values: readonly number[]): number {
	return scalar(min([...values]), 'min');
}

export function maximum(values: readonly number[]): number {
	return scalar(max([...values]), 'max');
}

/**
 * @param p - percentile in [0, 100]
 */
export function percentile(values: readonly number[], p: number): number {
	return scalar(quantileSeq([...values], p / 100), `P${p}`);
}

/** Standard deviation with divisor N. */
export function populationStd(values: readonly number[]): number {
	return scalar(std([...values], 'uncorrected'), 'std');
}

/** Bessel-corrected standard deviation (divisor N-1). Needs at least two values. */
export function sampleStd(values: readonly number[]): number {
	return scalar(std([...values], 'unbiased'), 'std');
}

export function tukeyFences(values: readonly number[], multiplier: number = 1.5): TukeyFences {
	const q1 = percentile(values, 25);
	const q3 = percentile(values, 75);
	const iqr = q3 - q1;
	return {
		q1,
		q3,
		iqr,
		lower: q1 - multiplier * iqr,
		upper: q3 + multiplier * iqr,
	};
}

export function withinFences(value: number, fences: TukeyFences): boolean {
	return value >= fences.lower && value <= fences.upper;
}
