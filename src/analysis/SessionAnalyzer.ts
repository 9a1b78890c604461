/**
 * Offline session analysis.
 *
 * Recorded series → gap segmentation → episodes (marks and/or explicit
 * intervals) → statistics, for every analysed channel. A channel without
 * data yields a `no-data` report instead of aborting the run.
 *
 * @example
 * ```typescript
 * const analyzer = new SessionAnalyzer({ gapThreshold: 10 }, createLogger({ name: 'analysis' }));
 * const report = analyzer.analyze({
 *   channels: { [Channel.RRInterval]: rrSamples, [Channel.HeartRate]: hrSamples },
 *   marks: [120.5, 300.0],
 * });
 * ```
 */

import { summarizeSamples } from '../algorithms/statistics/summarize';
import { resolveConfig, type PipelineConfig } from '../config/pipelineConfig';
import { componentLogger, silentLogger, type Logger } from '../logging/logger';
import {
	ANALYSED_CHANNELS,
	Channel,
	type ChannelReport,
	type Episode,
	type ExplicitInterval,
	type Sample,
	type Segment,
	type SegmentReport,
	type SessionRecording,
	type SessionReport,
	type EpisodeReport,
	type SeriesIssue,
} from '../types/heartbeat.types';
import { splitByIntervals, splitByMarks } from './episodeSplitter';
import { segment } from './segmenter';
import { checkSeries } from './seriesChecks';

export class SessionAnalyzer {
	private readonly config: PipelineConfig;
	private readonly logger: Logger;

	constructor(config: Partial<PipelineConfig> = {}, logger: Logger = silentLogger()) {
		this.config = resolveConfig(config);
		this.logger = componentLogger(logger, 'session-analyzer', this.config.logLevel);
	}

	analyze(recording: SessionRecording): SessionReport {
		const issues: SeriesIssue[] = [];
		const channels = ANALYSED_CHANNELS.map((channel) => {
			const series = recording.channels[channel] ?? [];
			issues.push(...checkSeries(channel, series));
			return this.analyzeChannel(channel, series, recording.marks, recording.intervals);
		});

		if (issues.length > 0) {
			this.logger.warn({ issues: issues.length, first: issues[0] }, 'recorded series violates ordering contract');
		}
		return { channels, issues };
	}

	/**
	 * Analyse one channel. Channels share no state, so callers may run them
	 * independently.
	 */
	analyzeChannel(
		channel: Channel,
		series: readonly Sample[],
		marks: readonly number[],
		intervals?: readonly ExplicitInterval[]
	): ChannelReport {
		if (series.length === 0) {
			this.logger.info({ channel }, 'no data available');
			return { channel, status: 'no-data' };
		}

		const segments = segment(series, this.config.gapThreshold);
		this.logger.debug({ channel, samples: series.length, segments: segments.length }, 'segmented channel');

		return {
			channel,
			status: 'ok',
			segments: segments.map((seg) => this.analyzeSegment(channel, seg, marks, intervals)),
		};
	}

	private analyzeSegment(
		channel: Channel,
		seg: Segment,
		marks: readonly number[],
		intervals?: readonly ExplicitInterval[]
	): SegmentReport {
		const isRR = channel === Channel.RRInterval;
		const episodes = splitByMarks(seg, marks, this.config.episodeBoundaries);
		const intervalEpisodes = intervals ? splitByIntervals(seg, intervals) : null;

		return {
			channel,
			segmentIndex: seg.index,
			startTime: seg.startTime,
			endTime: seg.endTime,
			sampleCount: seg.samples.length,
			statistics: summarizeSamples(seg.samples, isRR),
			episodes: episodes ? episodes.map((ep) => this.episodeReport(channel, seg.index, ep)) : null,
			intervalEpisodes: intervalEpisodes
				? intervalEpisodes.map((ep) => this.episodeReport(channel, seg.index, ep))
				: null,
		};
	}

	private episodeReport(channel: Channel, segmentIndex: number, ep: Episode): EpisodeReport {
		return {
			channel,
			segmentIndex,
			episodeIndex: ep.index,
			start: ep.start,
			end: ep.end,
			span: ep.end - ep.start,
			sampleCount: ep.samples.length,
			statistics: summarizeSamples(ep.samples, channel === Channel.RRInterval),
		};
	}
}
