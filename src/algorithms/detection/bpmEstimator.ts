// Robust BPM from accepted beat timestamps.

import { DETECTION_DEFAULTS } from '../../constants';
import { average, diff, tukeyFences, withinFences } from '../statistics/descriptive';

/**
 * 60 / mean inter-beat interval, after a second IQR pass over the intervals.
 *
 * Returns 0 when undetermined: fewer than two beats, or every interval
 * falls outside the fences.
 */
export function calculateBpm(
	beatTimestamps: readonly number[],
	iqrMultiplier: number = DETECTION_DEFAULTS.IQR_MULTIPLIER
): number {
	if (beatTimestamps.length < 2) {
		return 0;
	}

	const intervals = diff(beatTimestamps);
	const fences = tukeyFences(intervals, iqrMultiplier);
	const kept = intervals.filter((interval) => withinFences(interval, fences));

	if (kept.length === 0) {
		return 0;
	}

	const meanInterval = average(kept);
	return meanInterval > 0 ? 60 / meanInterval : 0;
}
