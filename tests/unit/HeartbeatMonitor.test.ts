/**
 * HeartbeatMonitor Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { HeartbeatMonitor, type MonitorEvent } from '../../src/processors/HeartbeatMonitor';
import { ConfigurationError } from '../../src/errors';
import { createLogger } from '../../src/logging/logger';
import type { BeatEvent, Sample } from '../../src/types/heartbeat.types';

// Samples every 0.25 s with a spike on every third one: one beat per 0.75 s.
function spikeTrain(beats: number): Sample[] {
  const samples: Sample[] = [];
  for (let k = 0; k <= (beats - 1) * 3; k++) {
    samples.push({ timestamp: k * 0.25, value: k % 3 === 0 ? 300 : 0 });
  }
  return samples;
}

function captureLines() {
  const lines: Record<string, unknown>[] = [];
  const destination = {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
  return { lines, destination };
}

describe('HeartbeatMonitor', () => {
  let monitor: HeartbeatMonitor;
  let events: MonitorEvent[];

  beforeEach(() => {
    monitor = new HeartbeatMonitor();
    events = [];
    monitor.subscribe((event) => events.push(event));
  });

  describe('Beat detection', () => {
    it('detects one beat per spike', () => {
      spikeTrain(5).forEach((s) => monitor.pushSample(s));
      expect(monitor.snapshot().history).toEqual([0, 0.75, 1.5, 2.25, 3]);
      expect(monitor.snapshot().beatsDetected).toBe(5);
    });

    it('returns null for samples that are not beats', () => {
      expect(monitor.pushSample({ timestamp: 0, value: 100 })).toBeNull();
      expect(events).toHaveLength(0);
    });

    it('emits a beat event carrying the beat timestamp and filter outcome', () => {
      monitor.pushBeat(1);
      const beats: BeatEvent[] = events.filter((e): e is Extract<MonitorEvent, { type: 'beat' }> => e.type === 'beat');
      expect(beats).toEqual([{ type: 'beat', timestamp: 1, outcome: { kind: 'accepted', timestamp: 1 } }]);
    });

    it('stamps beats with the injected clock', () => {
      const clocked = new HeartbeatMonitor({ clock: () => 1000 });
      const outcome = clocked.pushSample({ timestamp: 3, value: 300 });
      expect(outcome?.filter).toEqual({ kind: 'accepted', timestamp: 1000 });
      expect(clocked.snapshot().lastBeatTime).toBe(1000);
    });
  });

  describe('BPM reporting', () => {
    it('reports BPM only once the history is full by default', () => {
      const outcomes = spikeTrain(20).map((s) => monitor.pushSample(s));
      const beats = outcomes.filter((o) => o !== null);

      expect(beats).toHaveLength(20);
      expect(beats.slice(0, 19).every((o) => o?.bpm === null)).toBe(true);
      expect(beats[19]?.bpm).toBe(80);
      expect(events.filter((e) => e.type === 'bpm')).toEqual([{ type: 'bpm', bpm: 80, beats: 20 }]);
      expect(monitor.currentBpm()).toBe(80);
    });

    it('reports on every beat under the every-beat policy', () => {
      const eager = new HeartbeatMonitor({ config: { bpmPolicy: 'every-beat' } });
      expect(eager.pushBeat(0).bpm).toBe(0);
      expect(eager.pushBeat(0.75).bpm).toBe(80);
    });
  });

  describe('Outlier handling', () => {
    it('substitutes a synthetic beat and keeps the history full', () => {
      spikeTrain(20).forEach((s) => monitor.pushSample(s));
      events = [];

      const outcome = monitor.pushBeat(16.25);

      expect(outcome.filter).toEqual({ kind: 'substituted', rejected: 16.25, timestamp: 15 });
      expect(events.map((e) => e.type)).toEqual(['outlier', 'beat', 'bpm']);
      expect(events[0]).toEqual({ type: 'outlier', rejected: 16.25, substitutedAt: 15 });

      const snap = monitor.snapshot();
      expect(snap.history).toHaveLength(20);
      expect(snap.lastBeatTime).toBe(15);
      expect(snap.outliers).toBe(1);
      expect(snap.bpm).toBe(80);
    });
  });

  describe('RR channel input', () => {
    it('anchors on the first RR sample and advances by each interval', () => {
      monitor.pushRRSample({ timestamp: 10, value: 750 });
      monitor.pushRRSample({ timestamp: 11, value: 750 });
      monitor.pushRRSample({ timestamp: 12, value: 750 });
      expect(monitor.snapshot().history).toEqual([10, 10.75, 11.5]);
    });

    it('ignores non-positive RR values', () => {
      expect(monitor.pushRRSample({ timestamp: 10, value: 0 })).toBeNull();
      expect(monitor.snapshot().beatsDetected).toBe(0);
    });
  });

  describe('Subscriptions', () => {
    it('stops delivering after unsubscribe', () => {
      const received: MonitorEvent[] = [];
      const unsubscribe = monitor.subscribe((e) => received.push(e));
      monitor.pushBeat(1);
      unsubscribe();
      monitor.pushBeat(2);
      expect(received).toHaveLength(1);
    });

    it('logs a failing handler without interrupting the pipeline', () => {
      const { lines, destination } = captureLines();
      const logged = new HeartbeatMonitor({ logger: createLogger({ name: 'test', destination }) });
      logged.subscribe(() => {
        throw new Error('display gone');
      });

      expect(() => logged.pushBeat(1)).not.toThrow();
      expect(logged.snapshot().history).toEqual([1]);

      const failure = lines.find((l) => l.msg === 'monitor event handler failed');
      expect(failure?.level).toBe(50);
      expect(failure?.component).toBe('heartbeat-monitor');
      expect(failure?.event).toBe('beat');
    });
  });

  describe('Log level', () => {
    it('drops debug lines when configured at warn', () => {
      const { lines, destination } = captureLines();
      const logger = createLogger({ name: 'test', level: 'debug', destination });
      const quiet = new HeartbeatMonitor({ config: { bpmPolicy: 'every-beat', logLevel: 'warn' }, logger });

      quiet.pushBeat(0);
      quiet.pushRRSample({ timestamp: 1, value: 0 });

      expect(lines.map((l) => l.msg)).toEqual(['ignoring invalid RR interval']);
    });

    it('inherits the injected logger level when none is configured', () => {
      const { lines, destination } = captureLines();
      const logger = createLogger({ name: 'test', level: 'debug', destination });
      const verbose = new HeartbeatMonitor({ config: { bpmPolicy: 'every-beat' }, logger });

      verbose.pushBeat(0);

      expect(lines.map((l) => l.msg)).toEqual(['bpm updated']);
    });
  });

  describe('State', () => {
    it('hands out frozen snapshots that later beats do not change', () => {
      monitor.pushBeat(1);
      const snap = monitor.snapshot();
      monitor.pushBeat(2);
      expect(Object.isFrozen(snap)).toBe(true);
      expect(snap.history).toEqual([1]);
      expect(snap.revision).toBe(1);
    });

    it('reset clears history and re-arms the detector', () => {
      spikeTrain(20).forEach((s) => monitor.pushSample(s));
      monitor.reset();

      expect(monitor.snapshot()).toEqual({
        history: [],
        lastBeatTime: null,
        bpm: 0,
        beatsDetected: 0,
        outliers: 0,
        revision: 21,
      });
      expect(monitor.pushSample({ timestamp: 0.1, value: 300 })).not.toBeNull();
    });

    it('rejects invalid tuning eagerly', () => {
      expect(() => new HeartbeatMonitor({ config: { refractoryPeriod: -1 } })).toThrow(ConfigurationError);
    });

    it('exposes the resolved config', () => {
      const tuned = new HeartbeatMonitor({ config: { threshold: 180 } });
      expect(tuned.getConfig().threshold).toBe(180);
      expect(tuned.getConfig().refractoryPeriod).toBe(0.5);
    });
  });
});
