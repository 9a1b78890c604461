// Batch HRV report across participant recordings: one row per span between
// consecutive marks plus an overall row, each with RMSSD, SDNN and pNN50.

import { calculateHrvMetrics } from '../algorithms/hrv/hrvMetrics';
import { cleanRRIntervals, normalizeRRUnits } from '../algorithms/hrv/rrCleaning';
import { RR_DEFAULTS } from '../constants';
import { componentLogger, silentLogger, type Logger } from '../logging/logger';
import type { HrvReportRow, ParticipantRecording } from '../types/heartbeat.types';

export type HrvBatchOptions = {
	zScoreThreshold?: number;
	logger?: Logger;
};

/**
 * Rows for one participant. Between-mark spans are half-open [start, end);
 * a span with fewer than two RR values reports no metrics.
 */
export function participantHrvRows(
	recording: ParticipantRecording,
	zScoreThreshold: number = RR_DEFAULTS.Z_SCORE_THRESHOLD
): HrvReportRow[] {
	const timestamps = recording.rr.map((s) => s.timestamp);
	const cleaned = cleanRRIntervals(
		normalizeRRUnits(recording.rr.map((s) => s.value)),
		zScoreThreshold
	);

	const rows: HrvReportRow[] = [];
	for (let i = 0; i < recording.marks.length - 1; i++) {
		const start = recording.marks[i];
		const end = recording.marks[i + 1];
		const span = cleaned.filter((_, k) => timestamps[k] >= start && timestamps[k] < end);
		rows.push({
			participantId: recording.participantId,
			label: `Segment_${i + 1}`,
			...(span.length > 1 ? calculateHrvMetrics(span, { includePnn50: true }) : {}),
		});
	}

	rows.push({
		participantId: recording.participantId,
		label: 'Overall',
		...calculateHrvMetrics(cleaned, { includePnn50: true }),
	});
	return rows;
}

export function buildHrvBatchReport(
	recordings: readonly ParticipantRecording[],
	options: HrvBatchOptions = {}
): HrvReportRow[] {
	const logger = componentLogger(options.logger ?? silentLogger(), 'hrv-batch');
	const rows: HrvReportRow[] = [];

	for (const recording of recordings) {
		if (recording.rr.length === 0) {
			logger.warn({ participantId: recording.participantId }, 'missing RR data, skipping participant');
			continue;
		}
		rows.push(...participantHrvRows(recording, options.zScoreThreshold));
		logger.debug({ participantId: recording.participantId, marks: recording.marks.length }, 'participant processed');
	}

	logger.info({ participants: recordings.length, rows: rows.length }, 'HRV batch report built');
	return rows;
}
