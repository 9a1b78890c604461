/**
 * Configuration and logging tests.
 */

import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import {
  DEFAULT_PIPELINE_CONFIG,
  loadConfigFromEnv,
  resolveConfig,
} from '../../src/config/pipelineConfig';
import { ConfigurationError } from '../../src/errors';
import { componentLogger, createLogger, silentLogger } from '../../src/logging/logger';

const fixture = path.join(__dirname, '..', 'fixtures', 'pipeline.env');

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(DEFAULT_PIPELINE_CONFIG).toMatchObject({
      threshold: 210,
      refractoryPeriod: 0.5,
      historyCapacity: 20,
      gapThreshold: 10,
      bpmPolicy: 'full-window',
      episodeBoundaries: 'inclusive',
    });
  });

  it('leaves the log level to the injected logger by default', () => {
    expect(resolveConfig().logLevel).toBeUndefined();
  });

  it('ignores overrides that are explicitly undefined', () => {
    expect(resolveConfig({ threshold: undefined }).threshold).toBe(210);
  });

  it('lists every invalid field', () => {
    const issues = issuesOf(() => resolveConfig({ refractoryPeriod: -0.1, gapThreshold: 0 }));
    expect(issues).toHaveLength(2);
    expect(issues.some((i) => i.startsWith('refractoryPeriod: '))).toBe(true);
    expect(issues.some((i) => i.startsWith('gapThreshold: '))).toBe(true);
  });

  it('checks cross-field constraints', () => {
    expect(issuesOf(() => resolveConfig({ minHistoryForOutliers: 30 }))).toEqual([
      'minHistoryForOutliers: must not exceed historyCapacity',
    ]);
    expect(issuesOf(() => resolveConfig({ minRRMs: 2000 }))).toEqual(['minRRMs: must be below maxRRMs']);
  });

  it('names the problem in the error message', () => {
    expect(() => resolveConfig({ minRRMs: 2000 })).toThrow(
      'Invalid configuration: minRRMs: must be below maxRRMs'
    );
  });
});

describe('loadConfigFromEnv', () => {
  it('reads HEARTBEAT_* variables', () => {
    const config = loadConfigFromEnv({
      env: {
        HEARTBEAT_THRESHOLD: '180',
        HEARTBEAT_GAP_THRESHOLD_S: '5',
        HEARTBEAT_BPM_POLICY: 'every-beat',
        LOG_LEVEL: 'debug',
      },
    });
    expect(config).toMatchObject({
      threshold: 180,
      gapThreshold: 5,
      bpmPolicy: 'every-beat',
      logLevel: 'debug',
      refractoryPeriod: 0.5,
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfigFromEnv({ env: { HEARTBEAT_THRESHOLD: '' } }).threshold).toBe(210);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfigFromEnv({ env: { HEARTBEAT_THRESHOLD: 'high' } })).toThrow(ConfigurationError);
  });

  it('rejects an unknown LOG_LEVEL', () => {
    expect(() => loadConfigFromEnv({ env: { LOG_LEVEL: 'loud' } })).toThrow(ConfigurationError);
  });

  it('rejects unknown enum values', () => {
    const issues = issuesOf(() => loadConfigFromEnv({ env: { HEARTBEAT_BPM_POLICY: 'sometimes' } }));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('bpmPolicy: ')).toBe(true);
  });

  it('layers a .env file under the environment', () => {
    const config = loadConfigFromEnv({ env: { HEARTBEAT_THRESHOLD: '190' }, dotenvPath: fixture });
    expect(config.threshold).toBe(190);
    expect(config.refractoryPeriod).toBe(0.3);
    expect(config.episodeBoundaries).toBe('half-open');
  });

  it('reports a missing .env file', () => {
    const missing = path.join(__dirname, '..', 'fixtures', 'absent.env');
    expect(() => loadConfigFromEnv({ env: {}, dotenvPath: missing })).toThrow(ConfigurationError);
  });
});

describe('createLogger', () => {
  it('writes JSON lines with the logger name', () => {
    const lines: Record<string, unknown>[] = [];
    const logger = createLogger({
      name: 'test',
      level: 'debug',
      destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
    });

    logger.debug({ beats: 3 }, 'hello');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 20, name: 'test', msg: 'hello', beats: 3 });
  });

  it('componentLogger binds the component and can narrow the level', () => {
    const lines: Record<string, unknown>[] = [];
    const parent = createLogger({
      name: 'test',
      level: 'debug',
      destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
    });
    const child = componentLogger(parent, 'segmenter', 'info');

    child.debug('dropped');
    child.info('kept');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ component: 'segmenter', msg: 'kept' });
  });

  it('silentLogger drops everything', () => {
    expect(silentLogger().isLevelEnabled('fatal')).toBe(false);
  });
});
