// Time-domain HRV metrics over RR intervals in milliseconds.
// Every metric is omitted (undefined) instead of computed over too little data.

import { RR_DEFAULTS } from '../../constants';
import type { HrvMetrics } from '../../types/heartbeat.types';
import { average, diff, sampleStd } from '../statistics/descriptive';

/** Root mean square of successive differences. Needs two intervals. */
export function rmssd(rr: readonly number[]): number | undefined {
	if (rr.length < 2) return undefined;
	const squared = diff(rr).map((d) => d * d);
	return Math.sqrt(average(squared));
}

/** Sample standard deviation of RR intervals (divisor N-1). */
export function sdnn(rr: readonly number[]): number | undefined {
	if (rr.length < 2) return undefined;
	return sampleStd(rr);
}

/**
 * Percentage of successive differences larger than `thresholdMs`.
 * The divisor is the number of intervals, not the number of differences.
 */
export function pnn50(
	rr: readonly number[],
	thresholdMs: number = RR_DEFAULTS.NN50_THRESHOLD_MS
): number | undefined {
	if (rr.length === 0) return undefined;
	const nn50 = diff(rr).filter((d) => Math.abs(d) > thresholdMs).length;
	return (nn50 / rr.length) * 100;
}

export function calculateHrvMetrics(
	rr: readonly number[],
	options: { includePnn50?: boolean } = {}
): HrvMetrics {
	const metrics: HrvMetrics = {};
	const r = rmssd(rr);
	const s = sdnn(rr);
	if (r !== undefined) metrics.rmssd = r;
	if (s !== undefined) metrics.sdnn = s;
	if (options.includePnn50) {
		const p = pnn50(rr);
		if (p !== undefined) metrics.pnn50 = p;
	}
	return metrics;
}
