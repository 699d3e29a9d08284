import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  loadRulesFile,
  parseRules,
  readAlertEngineSettings,
  readBusSettings,
  readFusionSettings,
  readPushSettings,
  toAlertRules,
  toFusionRules,
} from '../src/config/settings.js';
import { withEnv } from './helpers/mockEnv.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('env settings', () => {
  it('reads bus settings with bounds', () => {
    const s = withEnv({ EVENT_BUS: 'redis', BUS_POLL_INTERVAL_MS: '0', BUS_SUBSCRIBER_MAX_QUEUE: '12.7' }, readBusSettings);
    expect(s.kind).toBe('redis');
    expect(s.pollIntervalMs).toBe(1);
    expect(s.maxQueue).toBe(12);
    expect(s.channelPrefix).toBe('cribwatch:events:');
    expect(withEnv({ EVENT_BUS: 'kafka' }, readBusSettings).kind).toBe('memory');
  });

  it('falls back on non-numeric values', () => {
    const s = withEnv({ ALERT_DETECTOR_TIMEOUT_SECONDS: 'soon', ALERT_MAX_PAUSE_MINUTES: '15' }, readAlertEngineSettings);
    expect(s.detectorTimeoutSeconds).toBe(10);
    expect(s.maxPauseMinutes).toBe(15);
  });

  it('parses push settings and alert levels', () => {
    const s = withEnv({
      PUSH_ENABLED: 'true',
      PUSH_PROVIDER: 'pushover',
      PUSHOVER_USER_KEY: 'test-user',
      PUSHOVER_API_TOKEN: 'test-token',
      PUSH_ALERT_LEVELS: ' Critical, warning ,bogus',
      PUSH_RETRY_COUNT: '3',
    }, readPushSettings);
    expect(s.enabled).toBe(true);
    expect(s.provider).toBe('pushover');
    expect(s.pushoverApiToken).toBe('test-token');
    expect(s.severities).toEqual(['warning', 'critical']);
    expect(s.retryCount).toBe(3);
    expect(withEnv({ PUSH_ALERT_LEVELS: 'bogus' }, readPushSettings).severities).toBeNull();
    expect(withEnv({ PUSH_ALERT_LEVELS: undefined }, readPushSettings).severities).toBeNull();
  });

  it('combines fusion scalars with the rules file', () => {
    const rules = parseRules({ fusion: [{ signal: 'rr', sources: [{ detector: 'radar', field: 'value.rr' }] }] });
    const s = withEnv({ FUSION_SIGNAL_MAX_AGE_SECONDS: '3', FUSION_CROSS_VALIDATION: 'false' }, () => readFusionSettings(rules));
    expect(s.signalMaxAgeSeconds).toBe(3);
    expect(s.crossValidationEnabled).toBe(false);
    expect(s.rules).toEqual([
      { signal: 'rr', strategy: 'weighted_average', minSources: 1, sources: [{ detector: 'radar', field: 'value.rr', weight: 1 }] },
    ]);
  });
});

describe('rules file', () => {
  it('loads the shipped rules', () => {
    const file = loadRulesFile('config/rules.json');
    expect(toFusionRules(file).map(r => r.signal)).toEqual(['respiration_rate', 'heart_rate', 'presence', 'seizure', 'movement']);
    const alerts = toAlertRules(file);
    expect(alerts.map(r => r.name)).toEqual(['apnea', 'low_respiration', 'bradycardia', 'seizure']);
    const seizure = alerts[3];
    expect(seizure?.combine).toBe('any');
    expect(seizure?.durationSeconds).toBe(3);
    expect(seizure?.conditions.map(c => c.operator)).toEqual(['==', '>']);
  });

  it('lists every schema issue', () => {
    const err = configError(() => parseRules({ alerts: [{ name: '', conditions: [] }] }));
    expect(err.issues.some(i => i.startsWith('alerts.0.name:'))).toBe(true);
    expect(err.issues.some(i => i.startsWith('alerts.0.conditions:'))).toBe(true);
  });

  it('rejects unknown operators', () => {
    const err = configError(() => parseRules({
      alerts: [{ name: 'x', conditions: [{ detector: 'radar', field: 'value.rr', operator: '=~', value: 1 }] }],
    }));
    expect(err.issues.some(i => i.startsWith('alerts.0.conditions.0.operator:'))).toBe(true);
  });

  it('names the rule with a bad field path', () => {
    const file = parseRules({
      alerts: [{ name: 'typo', conditions: [{ detector: 'radar', field: 'vals.rr', operator: '<', value: 1 }] }],
    });
    const err = configError(() => toAlertRules(file));
    expect(err.message).toBe('alert rule "typo" is invalid: invalid field path "vals.rr": unknown root "vals"');
  });

  it('reports unreadable and malformed files', () => {
    expect(configError(() => loadRulesFile('config/does-not-exist.json')).message).toContain('cannot read rules file');
    const dir = mkdtempSync(join(tmpdir(), 'cribwatch-'));
    const path = join(dir, 'rules.json');
    writeFileSync(path, '{ "fusion": [');
    expect(configError(() => loadRulesFile(path)).message).toContain('is not JSON');
  });
});
