import type { Sample, StatisticsReport } from '../../types/heartbeat.types';
import { calculateHrvMetrics } from '../hrv/hrvMetrics';
import {
	average,
	maximum,
	middle,
	minimum,
	percentile,
	populationStd,
} from './descriptive';

export type SummarizeOptions = {
	/** pNN50 belongs to the batch HRV report only (default: false) */
	includePnn50?: boolean;
};

/**
 * Full metric set over one numeric sub-series.
 *
 * `stdDev` is the population deviation; `sdnn` (RR channel only) is the
 * Bessel-corrected one. They differ by sqrt(N / (N - 1)) and must not be
 * swapped. Returns null for an empty series.
 *
 * @param timestamps - parallel to `values`, only first and last are read
 */
export function summarize(
	values: readonly number[],
	timestamps: readonly number[],
	isRRChannel: boolean,
	options: SummarizeOptions = {}
): StatisticsReport | null {
	if (values.length === 0) {
		return null;
	}

	const duration = timestamps.length > 1 ? timestamps[timestamps.length - 1] - timestamps[0] : 0;
	const hrv = isRRChannel
		? calculateHrvMetrics(values, { includePnn50: options.includePnn50 })
		: {};

	return {
		mean: average(values),
		median: middle(values),
		min: minimum(values),
		max: maximum(values),
		stdDev: populationStd(values),
		iqr: percentile(values, 75) - percentile(values, 25),
		duration,
		...hrv,
	};
}

export function summarizeSamples(
	samples: readonly Sample[],
	isRRChannel: boolean,
	options: SummarizeOptions = {}
): StatisticsReport | null {
	return summarize(
		samples.map((s) => s.value),
		samples.map((s) => s.timestamp),
		isRRChannel,
		options
	);
}
