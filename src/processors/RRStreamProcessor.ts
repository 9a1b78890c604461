/**
 * Real-time RR interval stream processor.
 *
 * Buffers RR intervals from the sensor, rejects physiologically impossible
 * values, and every `windowSize` intervals cleans the window and reports
 * SDNN and RMSSD. The buffer is emptied after each window (tumbling, no
 * overlap).
 *
 * @example
 * ```typescript
 * const stream = new RRStreamProcessor({ windowSize: 50 }, logger);
 *
 * stream.onEvent((event) => {
 *   if (event.type === 'window') plot(event.window.sdnn, event.window.rmssd);
 * });
 * transport.onRR((rr, ts) => stream.pushRR(rr, ts));
 * ```
 */

import { calculateHrvMetrics } from '../algorithms/hrv/hrvMetrics';
import { cleanRRIntervals } from '../algorithms/hrv/rrCleaning';
import { average } from '../algorithms/statistics/descriptive';
import { DEFAULT_PIPELINE_CONFIG, resolveConfig } from '../config/pipelineConfig';
import { componentLogger, silentLogger, type Logger } from '../logging/logger';

export type StreamConfig = {
	/** RR intervals per HRV window (default: 50) */
	windowSize: number;
	/** RR below this is rejected as noise (default: 300ms) */
	minRRMs: number;
	/** RR above this is rejected as a dropped beat (default: 2000ms) */
	maxRRMs: number;
	/** z-score beyond which a value is interpolated over (default: 3) */
	zScoreThreshold: number;
};

export type HrvWindow = {
	sdnn: number;
	rmssd: number;
	samples: number;
	firstTimestamp: number | null;
	lastTimestamp: number | null;
	cleaned: number[];
};

export type StreamSnapshot = {
	bufferedSamples: number;
	windowsEmitted: number;
	artifactRate: number;
	meanRR: number | null;
	instantHR: number | null;
};

export type StreamEvent =
	| { type: 'window'; window: HrvWindow }
	| { type: 'artifact'; rr: number; reason: string }
	| { type: 'reset'; reason: string };

export type StreamEventHandler = (event: StreamEvent) => void;

type StreamState = {
	buffer: number[];
	timestamps: number[];
	sampleCount: number;
	artifactCount: number;
	windowCount: number;
	resetCount: number;
};

function emptyState(): StreamState {
	return {
		buffer: [],
		timestamps: [],
		sampleCount: 0,
		artifactCount: 0,
		windowCount: 0,
		resetCount: 0,
	};
}

function validated(config: StreamConfig): StreamConfig {
	const resolved = resolveConfig({
		rrWindowSize: config.windowSize,
		minRRMs: config.minRRMs,
		maxRRMs: config.maxRRMs,
		zScoreThreshold: config.zScoreThreshold,
	});
	return {
		windowSize: resolved.rrWindowSize,
		minRRMs: resolved.minRRMs,
		maxRRMs: resolved.maxRRMs,
		zScoreThreshold: resolved.zScoreThreshold,
	};
}

/**
 * Stateful RR accumulator producing tumbling HRV windows.
 */
export class RRStreamProcessor {
	private config: StreamConfig;
	private state: StreamState = emptyState();
	private eventHandler: StreamEventHandler | null = null;
	private readonly logger: Logger;

	constructor(config: Partial<StreamConfig> = {}, logger: Logger = silentLogger()) {
		const defaults = DEFAULT_PIPELINE_CONFIG;
		this.config = validated({
			windowSize: config.windowSize ?? defaults.rrWindowSize,
			minRRMs: config.minRRMs ?? defaults.minRRMs,
			maxRRMs: config.maxRRMs ?? defaults.maxRRMs,
			zScoreThreshold: config.zScoreThreshold ?? defaults.zScoreThreshold,
		});
		this.logger = componentLogger(logger, 'rr-stream');
	}

	/**
	 * Register event handler for stream events (window, artifact, reset).
	 */
	onEvent(handler: StreamEventHandler): void {
		this.eventHandler = handler;
	}

	/**
	 * Add a single RR interval.
	 *
	 * @param rrMs - RR interval in milliseconds
	 * @param timestamp - arrival time in seconds, if known
	 * @returns the completed window, or null while still filling
	 */
	pushRR(rrMs: number, timestamp?: number): HrvWindow | null {
		if (!Number.isFinite(rrMs) || rrMs < this.config.minRRMs || rrMs > this.config.maxRRMs) {
			this.state.artifactCount++;
			this.emitEvent({ type: 'artifact', rr: rrMs, reason: `RR outside ${this.config.minRRMs}-${this.config.maxRRMs}ms` });
			return null;
		}

		this.state.buffer.push(rrMs);
		if (timestamp !== undefined) this.state.timestamps.push(timestamp);
		this.state.sampleCount++;

		if (this.state.buffer.length < this.config.windowSize) {
			return null;
		}
		return this.closeWindow();
	}

	/**
	 * Add multiple RR intervals at once.
	 * @param timestamps - arrival times parallel to `rrArray`, if known
	 * @returns every window completed by the batch
	 */
	pushBatch(rrArray: readonly number[], timestamps?: readonly number[]): HrvWindow[] {
		if (timestamps && timestamps.length !== rrArray.length) {
			throw new RangeError(`pushBatch: ${rrArray.length} RR values but ${timestamps.length} timestamps`);
		}
		const windows: HrvWindow[] = [];
		rrArray.forEach((rr, i) => {
			const window = this.pushRR(rr, timestamps?.[i]);
			if (window) windows.push(window);
		});
		return windows;
	}

	/**
	 * Current buffer without modifying state.
	 */
	peek(): number[] {
		return [...this.state.buffer];
	}

	/**
	 * Clear buffer and counters (e.g., on sensor reconnect).
	 */
	reset(reason: string = 'manual'): void {
		const resets = this.state.resetCount + 1;
		this.state = { ...emptyState(), resetCount: resets };
		this.emitEvent({ type: 'reset', reason });
	}

	snapshot(): StreamSnapshot {
		const buffer = this.state.buffer;
		const meanRR = buffer.length > 0 ? average(buffer) : null;
		const seen = this.state.sampleCount + this.state.artifactCount;

		return {
			bufferedSamples: buffer.length,
			windowsEmitted: this.state.windowCount,
			artifactRate: seen > 0 ? this.state.artifactCount / seen : 0,
			meanRR,
			instantHR: meanRR !== null ? 60000 / meanRR : null,
		};
	}

	getStats(): {
		totalSamples: number;
		totalArtifacts: number;
		totalWindows: number;
		totalResets: number;
		bufferFillPercent: number;
	} {
		return {
			totalSamples: this.state.sampleCount,
			totalArtifacts: this.state.artifactCount,
			totalWindows: this.state.windowCount,
			totalResets: this.state.resetCount,
			bufferFillPercent: (this.state.buffer.length / this.config.windowSize) * 100,
		};
	}

	getConfig(): Readonly<StreamConfig> {
		return Object.freeze({ ...this.config });
	}

	/**
	 * Update config at runtime.
	 * @throws ConfigurationError when the merged config is invalid
	 */
	updateConfig(updates: Partial<StreamConfig>): void {
		this.config = validated({ ...this.config, ...updates });
	}

	private closeWindow(): HrvWindow {
		const raw = this.state.buffer;
		const timestamps = this.state.timestamps;
		const cleaned = cleanRRIntervals(raw, this.config.zScoreThreshold);
		const metrics = calculateHrvMetrics(cleaned);

		const window: HrvWindow = {
			sdnn: metrics.sdnn ?? 0,
			rmssd: metrics.rmssd ?? 0,
			samples: raw.length,
			firstTimestamp: timestamps.length > 0 ? timestamps[0] : null,
			lastTimestamp: timestamps.length > 0 ? timestamps[timestamps.length - 1] : null,
			cleaned,
		};

		this.state.buffer = [];
		this.state.timestamps = [];
		this.state.windowCount++;
		this.logger.info({ sdnn: window.sdnn, rmssd: window.rmssd, samples: window.samples }, 'HRV window');
		this.emitEvent({ type: 'window', window });
		return window;
	}

	private emitEvent(event: StreamEvent): void {
		if (this.eventHandler) {
			try {
				this.eventHandler(event);
			} catch (e) {
				this.logger.error({ err: e, event: event.type }, 'stream event handler failed');
			}
		}
	}
}
