/**
 * Processors Module
 *
 * Live, stateful components that sit on the sensor delivery path.
 *
 * @module processors
 *
 * Components:
 * - HeartbeatMonitor: raw samples → beats → outlier filter → BPM
 * - RRStreamProcessor: RR intervals → tumbling HRV windows (SDNN, RMSSD)
 */

// ============================================================================
// Heartbeat Monitoring
// ============================================================================

export {
  HeartbeatMonitor,
  type MonitorEvent,
  type MonitorEventHandler,
  type MonitorOptions,
  type MonitorSnapshot,
  type BeatOutcome,
} from './HeartbeatMonitor';

// ============================================================================
// RR Stream Processing
// ============================================================================

export {
  RRStreamProcessor,
  type StreamConfig,
  type StreamEvent,
  type StreamEventHandler,
  type StreamSnapshot,
  type HrvWindow,
} from './RRStreamProcessor';
