// Reference tuning for the heartbeat pipeline.
// Threshold and refractory values match the chest-strap deployment; both are
// sensor-gain dependent and are expected to be overridden through config.

/* ============================================================================
	 DETECTION & BPM
	 ============================================================================ */

export const DETECTION_DEFAULTS = {
	THRESHOLD: 210,              // raw ADC units
	REFRACTORY_PERIOD_S: 0.5,    // 500 ms, caps detection at 120 bpm
	HISTORY_CAPACITY: 20,        // accepted beats kept for outlier judgement
	MIN_HISTORY_FOR_OUTLIERS: 20,
	IQR_MULTIPLIER: 1.5,         // Tukey fences
	BPM_POLICY: 'full-window',
} as const;

/* ============================================================================
	 OFFLINE SEGMENTATION
	 ============================================================================ */

export const SEGMENTATION_DEFAULTS = {
	GAP_THRESHOLD_S: 10,
	EPISODE_BOUNDARIES: 'inclusive',
} as const;

/* ============================================================================
	 RR / HRV
	 ============================================================================ */

export const RR_DEFAULTS = {
	MIN_RR_MS: 300,              // 200 bpm
	MAX_RR_MS: 2000,             // 30 bpm
	WINDOW_SIZE: 50,             // RR intervals per live HRV window
	Z_SCORE_THRESHOLD: 3.0,
	NN50_THRESHOLD_MS: 50,
	SECONDS_UNIT_CEILING: 10,    // a series whose max is below this is in seconds
} as const;

/** Sentinel for "no beat seen yet"; any finite refractory window has elapsed since it. */
export const NO_PREVIOUS_BEAT = Number.NEGATIVE_INFINITY;
