/**
 * Live heartbeat pipeline.
 *
 * Orchestrates the real-time flow for one sensor connection:
 * 1. Beat detection (threshold + refractory) on raw analog samples
 * 2. Outlier-aware acceptance into a bounded beat history
 * 3. Robust BPM estimation over the history
 *
 * The monitor is the only writer of its beat history. Display or plotting
 * code reads through `snapshot()`, which returns frozen copies.
 *
 * @example
 * ```typescript
 * const monitor = new HeartbeatMonitor({ config: { threshold: 180 }, logger });
 * monitor.subscribe((event) => {
 *   if (event.type === 'bpm') display(event.bpm);
 * });
 *
 * transport.onSample((sample) => monitor.pushSample(sample));
 * ```
 */

import { BeatHistory } from '../algorithms/detection/BeatHistory';
import { detectBeat } from '../algorithms/detection/beatDetector';
import { calculateBpm } from '../algorithms/detection/bpmEstimator';
import { acceptOrSubstitute, type FilterOutcome } from '../algorithms/detection/outlierFilter';
import { resolveConfig, type PipelineConfig } from '../config/pipelineConfig';
import { NO_PREVIOUS_BEAT } from '../constants';
import { componentLogger, silentLogger, type Logger } from '../logging/logger';
import type { BeatEvent, Sample } from '../types/heartbeat.types';

// ============================================================================
// Types
// ============================================================================

export type MonitorEvent =
	| (BeatEvent & { type: 'beat'; outcome: FilterOutcome })
	| { type: 'outlier'; rejected: number; substitutedAt: number | null }
	| { type: 'bpm'; bpm: number; beats: number };

export type MonitorEventHandler = (event: MonitorEvent) => void;

export type BeatOutcome = {
	filter: FilterOutcome;
	/** null when the BPM policy did not report on this beat */
	bpm: number | null;
};

export type MonitorSnapshot = {
	history: readonly number[];
	lastBeatTime: number | null;
	bpm: number;
	beatsDetected: number;
	outliers: number;
	revision: number;
};

export type MonitorOptions = {
	config?: Partial<PipelineConfig>;
	logger?: Logger;
	/** Wall clock in seconds; beats are stamped with sample timestamps when absent */
	clock?: () => number;
};

// ============================================================================
// HeartbeatMonitor Class
// ============================================================================

export class HeartbeatMonitor {
	private readonly config: PipelineConfig;
	private readonly logger: Logger;
	private readonly clock: (() => number) | null;
	private readonly history: BeatHistory;
	private readonly handlers = new Set<MonitorEventHandler>();

	private lastBeatTime = NO_PREVIOUS_BEAT;
	private lastRRBeat: number | null = null;
	private bpm = 0;
	private beatsDetected = 0;
	private outliers = 0;

	constructor(options: MonitorOptions = {}) {
		this.config = resolveConfig(options.config);
		this.logger = componentLogger(options.logger ?? silentLogger(), 'heartbeat-monitor', this.config.logLevel);
		this.clock = options.clock ?? null;
		this.history = new BeatHistory(this.config.historyCapacity);
	}

	// ========================================================================
	// Public API
	// ========================================================================

	/**
	 * Subscribe to beat, outlier and BPM events.
	 * @returns unsubscribe function
	 */
	subscribe(handler: MonitorEventHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	/**
	 * Feed one raw analog sample.
	 * @returns the beat outcome, or null when the sample is not a beat
	 */
	pushSample(sample: Sample): BeatOutcome | null {
		const now = this.clock ? this.clock() : sample.timestamp;
		const detection = detectBeat(
			sample,
			this.config.threshold,
			this.config.refractoryPeriod,
			this.lastBeatTime,
			now
		);
		if (!detection.isBeat) {
			return null;
		}
		this.lastBeatTime = detection.lastBeatTime;
		return this.pushBeat(detection.lastBeatTime);
	}

	/**
	 * Feed a beat detected elsewhere (or derived from an RR channel).
	 */
	pushBeat(timestamp: number): BeatOutcome {
		this.beatsDetected++;
		const filter = acceptOrSubstitute(timestamp, this.history, {
			minHistory: this.config.minHistoryForOutliers,
			iqrMultiplier: this.config.iqrMultiplier,
		});

		if (filter.kind !== 'accepted') {
			this.outliers++;
			const substitutedAt = filter.kind === 'substituted' ? filter.timestamp : null;
			this.logger.debug({ rejected: filter.rejected, substitutedAt }, 'outlier beat');
			this.emit({ type: 'outlier', rejected: filter.rejected, substitutedAt });
		}
		this.emit({ type: 'beat', timestamp, outcome: filter });

		const bpm = this.shouldReportBpm() ? this.updateBpm() : null;
		return { filter, bpm };
	}

	/**
	 * Feed one sample of a pre-computed RR channel (value in ms).
	 *
	 * The first sample anchors the beat clock at its timestamp; each following
	 * beat sits one RR interval after the previous derived beat.
	 */
	pushRRSample(sample: Sample): BeatOutcome | null {
		if (!Number.isFinite(sample.value) || sample.value <= 0) {
			this.logger.warn({ rr: sample.value, timestamp: sample.timestamp }, 'ignoring invalid RR interval');
			return null;
		}
		const beat = this.lastRRBeat === null ? sample.timestamp : this.lastRRBeat + sample.value / 1000;
		this.lastRRBeat = beat;
		return this.pushBeat(beat);
	}

	/** Latest reported BPM; 0 while undetermined. */
	currentBpm(): number {
		return this.bpm;
	}

	snapshot(): Readonly<MonitorSnapshot> {
		return Object.freeze({
			history: this.history.snapshot(),
			lastBeatTime: this.history.last(),
			bpm: this.bpm,
			beatsDetected: this.beatsDetected,
			outliers: this.outliers,
			revision: this.history.revision,
		});
	}

	/**
	 * Clear history and detector state (e.g., on sensor reconnect).
	 */
	reset(): void {
		this.history.clear();
		this.lastBeatTime = NO_PREVIOUS_BEAT;
		this.lastRRBeat = null;
		this.bpm = 0;
		this.beatsDetected = 0;
		this.outliers = 0;
		this.logger.info('monitor reset');
	}

	getConfig(): Readonly<PipelineConfig> {
		return Object.freeze({ ...this.config });
	}

	// ========================================================================
	// Internals
	// ========================================================================

	private shouldReportBpm(): boolean {
		return this.config.bpmPolicy === 'every-beat' || this.history.isFull();
	}

	private updateBpm(): number {
		const beats = this.history.snapshot();
		this.bpm = calculateBpm(beats, this.config.iqrMultiplier);
		this.logger.debug({ bpm: this.bpm, beats: beats.length }, 'bpm updated');
		this.emit({ type: 'bpm', bpm: this.bpm, beats: beats.length });
		return this.bpm;
	}

	private emit(event: MonitorEvent): void {
		for (const handler of this.handlers) {
			try {
				handler(event);
			} catch (e) {
				this.logger.error({ err: e, event: event.type }, 'monitor event handler failed');
			}
		}
	}
}
