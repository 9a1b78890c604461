// Online outlier rejection for beat timestamps using a sliding IQR.
// A rejected beat is replaced by a synthetic one at the mean interval so the
// history keeps its cadence and the BPM estimate stays stable.

import { DETECTION_DEFAULTS } from '../../constants';
import { average, diff, tukeyFences } from '../statistics/descriptive';
import { BeatHistory } from './BeatHistory';

export type OutlierOptions = {
	/** History length below which every beat is accepted (default: 20) */
	minHistory?: number;
	/** Fence multiplier applied to the IQR (default: 1.5) */
	iqrMultiplier?: number;
};

export type FilterOutcome =
	| { kind: 'accepted'; timestamp: number }
	| { kind: 'substituted'; rejected: number; timestamp: number }
	| { kind: 'dropped'; rejected: number };

/**
 * True when the interval ending at `newBeatTime` falls strictly outside the
 * Tukey fences of all intervals in `history + [newBeatTime]`.
 */
export function isOutlier(
	newBeatTime: number,
	history: readonly number[],
	options: OutlierOptions = {}
): boolean {
	const minHistory = options.minHistory ?? DETECTION_DEFAULTS.MIN_HISTORY_FOR_OUTLIERS;
	if (history.length < minHistory || history.length === 0) {
		return false;
	}

	const intervals = diff([...history, newBeatTime]);
	const fences = tukeyFences(intervals, options.iqrMultiplier ?? DETECTION_DEFAULTS.IQR_MULTIPLIER);
	const newest = newBeatTime - history[history.length - 1];
	return newest < fences.lower || newest > fences.upper;
}

/**
 * Append `newBeatTime` to `history`, or a synthetic beat in its place when it
 * is an outlier. The history is trimmed to capacity by the push.
 */
export function acceptOrSubstitute(
	newBeatTime: number,
	history: BeatHistory,
	options: OutlierOptions = {}
): FilterOutcome {
	const beats = history.snapshot();

	if (!isOutlier(newBeatTime, beats, options)) {
		history.push(newBeatTime);
		return { kind: 'accepted', timestamp: newBeatTime };
	}

	const last = history.last();
	if (last === null) {
		return { kind: 'dropped', rejected: newBeatTime };
	}

	// an outlier needs at least two intervals, so the history holds two beats here
	const synthetic = last + average(history.intervals());
	history.push(synthetic);
	return { kind: 'substituted', rejected: newBeatTime, timestamp: synthetic };
}
