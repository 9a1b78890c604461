// Gap-based partition of a recorded channel into contiguous segments.

import { SEGMENTATION_DEFAULTS } from '../constants';
import type { Sample, Segment } from '../types/heartbeat.types';

function toSegment(index: number, samples: Sample[]): Segment {
	return {
		index,
		startTime: samples[0].timestamp,
		endTime: samples[samples.length - 1].timestamp,
		samples,
	};
}

/**
 * Split `series` wherever two consecutive samples are more than
 * `gapThreshold` seconds apart. The input must already be time-ordered;
 * it is not re-sorted. Every sample lands in exactly one segment.
 */
export function segment(
	series: readonly Sample[],
	gapThreshold: number = SEGMENTATION_DEFAULTS.GAP_THRESHOLD_S
): Segment[] {
	const segments: Segment[] = [];
	let current: Sample[] = [];

	for (const sample of series) {
		const previous = current[current.length - 1];
		if (previous !== undefined && sample.timestamp - previous.timestamp > gapThreshold) {
			segments.push(toSegment(segments.length, current));
			current = [];
		}
		current.push(sample);
	}

	if (current.length > 0) {
		segments.push(toSegment(segments.length, current));
	}
	return segments;
}
