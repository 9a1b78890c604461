import type { Channel, Sample, SeriesIssue } from '../types/heartbeat.types';

/**
 * List contract violations in a recorded series. The analysis assumes
 * well-formed input and does not repair anything; this only reports.
 */
export function checkSeries(channel: Channel, series: readonly Sample[]): SeriesIssue[] {
	const issues: SeriesIssue[] = [];
	series.forEach((sample, index) => {
		if (!Number.isFinite(sample.timestamp)) {
			issues.push({ channel, index, reason: 'non-finite-timestamp' });
		} else if (index > 0 && sample.timestamp < series[index - 1].timestamp) {
			issues.push({ channel, index, reason: 'non-monotonic-timestamp' });
		}
		if (!Number.isFinite(sample.value)) {
			issues.push({ channel, index, reason: 'non-finite-value' });
		}
	});
	return issues;
}
