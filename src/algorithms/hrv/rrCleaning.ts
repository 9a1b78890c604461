/**
 * RR interval cleaning for batch HRV.
 *
 * 1) Normalise units (some exports store seconds instead of milliseconds)
 * 2) Reject values beyond a z-score threshold
 * 3) Re-fill rejected positions by linear interpolation over the beat index,
 *    extrapolating from the two nearest kept points at either end
 *
 * The cleaned series keeps the input length.
 */

import { RR_DEFAULTS } from '../../constants';
import { average, maximum, populationStd } from '../statistics/descriptive';

export type OutlierMask = {
	kept: number[];
	keepMask: boolean[];
};

/** Multiply by 1000 when the series looks like seconds (max below 10). */
export function normalizeRRUnits(values: readonly number[]): number[] {
	if (values.length === 0) return [];
	if (maximum(values) < RR_DEFAULTS.SECONDS_UNIT_CEILING) {
		return values.map((v) => v * 1000);
	}
	return [...values];
}

export function removeOutliers(
	values: readonly number[],
	zThreshold: number = RR_DEFAULTS.Z_SCORE_THRESHOLD
): OutlierMask {
	if (values.length === 0) return { kept: [], keepMask: [] };

	const mu = average(values);
	const sigma = populationStd(values);

	// flat series: nothing can be an outlier
	if (!(sigma > 0)) {
		return { kept: [...values], keepMask: values.map(() => true) };
	}

	const keepMask = values.map((v) => Math.abs(v - mu) / sigma < zThreshold);
	return { kept: values.filter((_, i) => keepMask[i]), keepMask };
}

function lineAt(x: number, x0: number, y0: number, x1: number, y1: number): number {
	return y0 + ((x - x0) * (y1 - y0)) / (x1 - x0);
}

export function interpolateRejected(values: readonly number[], keepMask: readonly boolean[]): number[] {
	const anchors: number[] = [];
	keepMask.forEach((keep, i) => {
		if (keep) anchors.push(i);
	});
	if (anchors.length === 0) return [...values];
	if (anchors.length === 1) return values.map(() => values[anchors[0]]);

	const first = anchors[0];
	const last = anchors[anchors.length - 1];

	return values.map((v, i) => {
		if (keepMask[i]) return v;

		if (i < first) {
			const [a, b] = [anchors[0], anchors[1]];
			return lineAt(i, a, values[a], b, values[b]);
		}
		if (i > last) {
			const [a, b] = [anchors[anchors.length - 2], anchors[anchors.length - 1]];
			return lineAt(i, a, values[a], b, values[b]);
		}

		let hi = 0;
		while (anchors[hi] < i) hi++;
		const a = anchors[hi - 1];
		const b = anchors[hi];
		return lineAt(i, a, values[a], b, values[b]);
	});
}

export function cleanRRIntervals(
	values: readonly number[],
	zThreshold: number = RR_DEFAULTS.Z_SCORE_THRESHOLD
): number[] {
	const { keepMask } = removeOutliers(values, zThreshold);
	return interpolateRejected(values, keepMask);
}
