// Partition of a segment into episodes, from user marks or from explicit
// (start, end, duration) intervals.

import { SEGMENTATION_DEFAULTS } from '../constants';
import type {
	BoundaryMode,
	Episode,
	ExplicitInterval,
	Sample,
	Segment,
} from '../types/heartbeat.types';

function membersOf(
	samples: readonly Sample[],
	start: number,
	end: number,
	closedEnd: boolean
): Sample[] {
	return samples.filter(
		(s) => s.timestamp >= start && (closedEnd ? s.timestamp <= end : s.timestamp < end)
	);
}

/**
 * One episode per consecutive pair of `[segment start, ...marks inside, segment end]`.
 *
 * In `inclusive` mode a sample sitting exactly on a mark belongs to both
 * neighbouring episodes. In `half-open` mode episodes are [start, end) except
 * the last, which stays closed so the segment end is covered.
 *
 * @returns null when no mark falls inside the segment
 */
export function splitByMarks(
	seg: Segment,
	marks: readonly number[],
	mode: BoundaryMode = SEGMENTATION_DEFAULTS.EPISODE_BOUNDARIES
): Episode[] | null {
	const inside = marks.filter((m) => m >= seg.startTime && m <= seg.endTime);
	if (inside.length === 0) {
		return null;
	}

	const boundaries = [seg.startTime, ...inside, seg.endTime];
	const episodes: Episode[] = [];

	for (let i = 0; i < boundaries.length - 1; i++) {
		const start = boundaries[i];
		const end = boundaries[i + 1];
		const closedEnd = mode === 'inclusive' || i === boundaries.length - 2;
		episodes.push({
			index: i,
			start,
			end,
			samples: membersOf(seg.samples, start, end, closedEnd),
		});
	}
	return episodes;
}

/**
 * Episodes from pre-recorded intervals overlapping the segment
 * (`start <= seg.endTime && end >= seg.startTime`). Members are segment
 * samples inside [start, end].
 */
export function splitByIntervals(seg: Segment, intervals: readonly ExplicitInterval[]): Episode[] {
	return intervals
		.filter((iv) => iv.start <= seg.endTime && iv.end >= seg.startTime)
		.map((iv, index) => ({
			index,
			start: iv.start,
			end: iv.end,
			samples: membersOf(seg.samples, iv.start, iv.end, true),
		}));
}
