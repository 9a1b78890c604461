/**
 * Core heartbeat types.
 * Shared type definitions for samples, beats, segments and statistics reports.
 */

// ============================================================================
// CHANNELS & SAMPLES
// ============================================================================

export enum Channel {
	HeartRate = 'HeartRate',
	RRInterval = 'RRinterval',
}

/** Channels analysed offline, in report order. */
export const ANALYSED_CHANNELS: readonly Channel[] = [Channel.HeartRate, Channel.RRInterval];

export type Sample = {
	readonly timestamp: number; // seconds
	readonly value: number;
};

export type BeatEvent = {
	readonly timestamp: number; // seconds
};

// ============================================================================
// INTERVALS, SEGMENTS & EPISODES
// ============================================================================

export type TimeRange = {
	readonly start: number; // seconds
	readonly end: number;   // seconds
};

/** Pre-recorded interval as exported by the recorder. */
export type ExplicitInterval = TimeRange & {
	readonly duration: number;
};

export type Segment = {
	readonly index: number;
	readonly startTime: number;
	readonly endTime: number;
	readonly samples: readonly Sample[];
};

export type Episode = TimeRange & {
	readonly index: number;
	readonly samples: readonly Sample[];
};

/** `inclusive`: [start, end] on both sides. `half-open`: [start, end), last episode closed. */
export type BoundaryMode = 'inclusive' | 'half-open';

// ============================================================================
// STATISTICS
// ============================================================================

export type StatisticsReport = {
	readonly mean: number;
	readonly median: number;
	readonly min: number;
	readonly max: number;
	readonly stdDev: number;   // population (divisor N)
	readonly iqr: number;
	readonly duration: number; // seconds
	readonly rmssd?: number;   // ms, RR channel only
	readonly sdnn?: number;    // ms, sample std (divisor N-1)
	readonly pnn50?: number;   // percent, batch HRV report only
};

export type HrvMetrics = {
	rmssd?: number;
	sdnn?: number;
	pnn50?: number;
};

// ============================================================================
// SESSION REPORTS
// ============================================================================

export type SessionRecording = {
	channels: Partial<Record<Channel, readonly Sample[]>>;
	marks: readonly number[];
	intervals?: readonly ExplicitInterval[];
};

export type EpisodeReport = {
	channel: Channel;
	segmentIndex: number;
	episodeIndex: number;
	start: number;
	end: number;
	span: number;              // end - start
	sampleCount: number;
	statistics: StatisticsReport | null;
};

export type SegmentReport = {
	channel: Channel;
	segmentIndex: number;
	startTime: number;
	endTime: number;
	sampleCount: number;
	statistics: StatisticsReport | null;
	/** null when no mark falls inside the segment */
	episodes: EpisodeReport[] | null;
	/** null when no explicit intervals were supplied */
	intervalEpisodes: EpisodeReport[] | null;
};

export type ChannelReport =
	| { channel: Channel; status: 'no-data' }
	| { channel: Channel; status: 'ok'; segments: SegmentReport[] };

export type SessionReport = {
	channels: ChannelReport[];
	issues: SeriesIssue[];
};

export type SeriesIssue = {
	channel: Channel;
	index: number;
	reason: 'non-monotonic-timestamp' | 'non-finite-value' | 'non-finite-timestamp';
};

// ============================================================================
// HRV BATCH REPORT
// ============================================================================

export type ParticipantRecording = {
	participantId: string;
	rr: readonly Sample[];
	marks: readonly number[];
};

export type HrvReportRow = HrvMetrics & {
	participantId: string;
	label: string; // Segment_<n> | Overall
};
