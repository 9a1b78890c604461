/**
 * Heartbeat Core Engine
 *
 * Exports all public APIs for:
 * - Live beat detection with outlier-aware BPM estimation
 * - Rolling HRV windows over RR interval streams
 * - Offline segmentation, episode splitting and statistics
 * - Batch HRV reports (RMSSD, SDNN, pNN50)
 *
 * @example
 * ```typescript
 * import { SessionAnalyzer, Channel } from 'heartbeat-core-engine';
 *
 * const report = new SessionAnalyzer().analyze({
 *   channels: { [Channel.RRInterval]: rrSamples },
 *   marks: [],
 * });
 * ```
 */

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================
export * from './types/heartbeat.types';
export { DETECTION_DEFAULTS, SEGMENTATION_DEFAULTS, RR_DEFAULTS, NO_PREVIOUS_BEAT } from './constants';

// ============================================================================
// CONFIGURATION, ERRORS & LOGGING
// ============================================================================
export {
	PipelineConfigSchema,
	DEFAULT_PIPELINE_CONFIG,
	resolveConfig,
	loadConfigFromEnv,
	type PipelineConfig,
	type EnvConfigOptions,
} from './config/pipelineConfig';

export { ConfigurationError } from './errors';

export { createLogger, silentLogger, componentLogger, type Logger, type LoggerOptions } from './logging/logger';

// ============================================================================
// DETECTION
// ============================================================================
export { detectBeat, type DetectionResult } from './algorithms/detection/beatDetector';
export { BeatHistory } from './algorithms/detection/BeatHistory';
export {
	isOutlier,
	acceptOrSubstitute,
	type OutlierOptions,
	type FilterOutcome,
} from './algorithms/detection/outlierFilter';
export { calculateBpm } from './algorithms/detection/bpmEstimator';

// ============================================================================
// STATISTICS & HRV
// ============================================================================
export {
	diff,
	percentile,
	populationStd,
	sampleStd,
	tukeyFences,
	type TukeyFences,
} from './algorithms/statistics/descriptive';
export { summarize, summarizeSamples, type SummarizeOptions } from './algorithms/statistics/summarize';
export { rmssd, sdnn, pnn50, calculateHrvMetrics } from './algorithms/hrv/hrvMetrics';
export {
	normalizeRRUnits,
	removeOutliers,
	interpolateRejected,
	cleanRRIntervals,
	type OutlierMask,
} from './algorithms/hrv/rrCleaning';

// ============================================================================
// OFFLINE ANALYSIS
// ============================================================================
export { segment } from './analysis/segmenter';
export { splitByMarks, splitByIntervals } from './analysis/episodeSplitter';
export { checkSeries } from './analysis/seriesChecks';
export { SessionAnalyzer } from './analysis/SessionAnalyzer';
export { buildHrvBatchReport, participantHrvRows, type HrvBatchOptions } from './analysis/hrvBatchReport';

// ============================================================================
// PROCESSORS (barrel export)
// ============================================================================
export * from './processors';
