// Threshold + refractory beat detection over raw analog samples.

import { NO_PREVIOUS_BEAT } from '../../constants';
import type { Sample } from '../../types/heartbeat.types';

export type DetectionResult = {
	isBeat: boolean;
	/** Unchanged unless a beat was declared */
	lastBeatTime: number;
};

/**
 * Decide whether `sample` is a heartbeat.
 *
 * A beat needs the value strictly above `threshold` and more than
 * `refractoryPeriod` seconds since `lastBeatTime`. Callers own the state and
 * seed it with NO_PREVIOUS_BEAT so the first genuine beat is never suppressed.
 *
 * @param now - time to stamp the beat with; the sample timestamp unless the
 *              caller runs on a wall clock
 */
export function detectBeat(
	sample: Sample,
	threshold: number,
	refractoryPeriod: number,
	lastBeatTime: number = NO_PREVIOUS_BEAT,
	now: number = sample.timestamp
): DetectionResult {
	if (sample.value > threshold && now - lastBeatTime > refractoryPeriod) {
		return { isBeat: true, lastBeatTime: now };
	}
	return { isBeat: false, lastBeatTime };
}
