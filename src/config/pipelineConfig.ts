import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DETECTION_DEFAULTS, RR_DEFAULTS, SEGMENTATION_DEFAULTS } from '../constants';
import { ConfigurationError } from '../errors';

export const PipelineConfigSchema = z
	.object({
		threshold: z.number().finite().nonnegative(),
		refractoryPeriod: z.number().finite().nonnegative(),
		historyCapacity: z.number().int().min(2),
		minHistoryForOutliers: z.number().int().min(2),
		iqrMultiplier: z.number().finite().nonnegative(),
		bpmPolicy: z.enum(['full-window', 'every-beat']),
		gapThreshold: z.number().finite().positive(),
		episodeBoundaries: z.enum(['inclusive', 'half-open']),
		rrWindowSize: z.number().int().min(2),
		minRRMs: z.number().finite().nonnegative(),
		maxRRMs: z.number().finite().positive(),
		zScoreThreshold: z.number().finite().positive(),
		/** Overrides the injected logger's level for the component; inherited when unset */
		logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
	})
	.refine((c) => c.minHistoryForOutliers <= c.historyCapacity, {
		message: 'must not exceed historyCapacity',
		path: ['minHistoryForOutliers'],
	})
	.refine((c) => c.minRRMs < c.maxRRMs, {
		message: 'must be below maxRRMs',
		path: ['minRRMs'],
	});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	threshold: DETECTION_DEFAULTS.THRESHOLD,
	refractoryPeriod: DETECTION_DEFAULTS.REFRACTORY_PERIOD_S,
	historyCapacity: DETECTION_DEFAULTS.HISTORY_CAPACITY,
	minHistoryForOutliers: DETECTION_DEFAULTS.MIN_HISTORY_FOR_OUTLIERS,
	iqrMultiplier: DETECTION_DEFAULTS.IQR_MULTIPLIER,
	bpmPolicy: DETECTION_DEFAULTS.BPM_POLICY,
	gapThreshold: SEGMENTATION_DEFAULTS.GAP_THRESHOLD_S,
	episodeBoundaries: SEGMENTATION_DEFAULTS.EPISODE_BOUNDARIES,
	rrWindowSize: RR_DEFAULTS.WINDOW_SIZE,
	minRRMs: RR_DEFAULTS.MIN_RR_MS,
	maxRRMs: RR_DEFAULTS.MAX_RR_MS,
	zScoreThreshold: RR_DEFAULTS.Z_SCORE_THRESHOLD,
};

function parseConfig(raw: Record<string, unknown>): PipelineConfig {
	const merged: Record<string, unknown> = { ...DEFAULT_PIPELINE_CONFIG };
	for (const [key, value] of Object.entries(raw)) {
		if (value !== undefined) merged[key] = value;
	}
	const result = PipelineConfigSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigurationError(
			result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		);
	}
	return result.data;
}

/**
 * Merge overrides onto the defaults and validate.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
	return parseConfig(overrides);
}

const ENV_KEYS = {
	threshold: 'HEARTBEAT_THRESHOLD',
	refractoryPeriod: 'HEARTBEAT_REFRACTORY_S',
	historyCapacity: 'HEARTBEAT_HISTORY_CAPACITY',
	minHistoryForOutliers: 'HEARTBEAT_MIN_HISTORY',
	iqrMultiplier: 'HEARTBEAT_IQR_MULTIPLIER',
	gapThreshold: 'HEARTBEAT_GAP_THRESHOLD_S',
	rrWindowSize: 'HEARTBEAT_RR_WINDOW',
	minRRMs: 'HEARTBEAT_MIN_RR_MS',
	maxRRMs: 'HEARTBEAT_MAX_RR_MS',
	zScoreThreshold: 'HEARTBEAT_Z_THRESHOLD',
} as const;

function getEnv(env: Record<string, string>, key: string): string | undefined {
	const v = env[key];
	if (v === undefined || v === '') return undefined;
	return v;
}

export type EnvConfigOptions = {
	env?: NodeJS.ProcessEnv;
	/** Optional .env file; values already present in `env` win */
	dotenvPath?: string;
};

/**
 * Build a validated config from HEARTBEAT_* environment variables.
 */
export function loadConfigFromEnv(options: EnvConfigOptions = {}): PipelineConfig {
	const source: Record<string, string> = {};
	for (const [key, value] of Object.entries(options.env ?? process.env)) {
		if (value !== undefined) source[key] = value;
	}

	if (options.dotenvPath) {
		const loaded = dotenv.config({ path: options.dotenvPath, processEnv: source });
		if (loaded.error) {
			throw new ConfigurationError([`${options.dotenvPath}: ${loaded.error.message}`]);
		}
	}

	const raw: Record<string, unknown> = {};
	for (const [field, key] of Object.entries(ENV_KEYS)) {
		const v = getEnv(source, key);
		if (v !== undefined) raw[field] = Number(v);
	}

	const bpmPolicy = getEnv(source, 'HEARTBEAT_BPM_POLICY');
	if (bpmPolicy !== undefined) raw.bpmPolicy = bpmPolicy;
	const boundaries = getEnv(source, 'HEARTBEAT_EPISODE_BOUNDARIES');
	if (boundaries !== undefined) raw.episodeBoundaries = boundaries;
	const logLevel = getEnv(source, 'LOG_LEVEL');
	if (logLevel !== undefined) raw.logLevel = logLevel;

	return parseConfig(raw);
}
