import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { SEVERITIES, type Severity } from '../events/alert.js';
import type { AlertEngineSettings } from '../alerts/engine.js';
import { Rule } from '../alerts/rule.js';
import type { SubscriberOptions } from '../bus/hub.js';
import { DEFAULT_CHANNEL_PREFIX } from '../bus/redis.js';
import type { FusionRule, FusionSettings } from '../fusion/types.js';
import type { PushSettings } from '../notifiers/push.js';
import { errMessage } from '../observability/log.js';
import { rulesFileSchema, type RulesFile } from './schema.js';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

const num = (k: string, d: number) => {
  const n = Number(process.env[k] ?? d);
  return Number.isFinite(n) ? n : d;
};

const bool = (k: string, d: boolean) => {
  const raw = process.env[k];
  if (raw === undefined || raw === '') return d;
  return raw === 'true' || raw === '1';
};

const str = (k: string, d: string) => process.env[k] || d;

export function readFusionScalars(): Omit<FusionSettings, 'rules'> {
  return {
    signalMaxAgeSeconds: num('FUSION_SIGNAL_MAX_AGE_SECONDS', 5),
    crossValidationEnabled: bool('FUSION_CROSS_VALIDATION', true),
    agreementBonus: num('FUSION_AGREEMENT_BONUS', 0.1),
    disagreementPenalty: num('FUSION_DISAGREEMENT_PENALTY', 0.2),
  };
}

export function readFusionSettings(rules: RulesFile): FusionSettings {
  return { ...readFusionScalars(), rules: toFusionRules(rules) };
}

export function readAlertEngineSettings(): AlertEngineSettings {
  return {
    detectorTimeoutSeconds: num('ALERT_DETECTOR_TIMEOUT_SECONDS', 10),
    healthCheckIntervalSeconds: Math.max(0.1, num('ALERT_HEALTH_CHECK_INTERVAL_SECONDS', 5)),
    maxPauseMinutes: num('ALERT_MAX_PAUSE_MINUTES', 60),
    bufferCapacity: Math.max(1, Math.floor(num('ALERT_BUFFER_CAPACITY', 5000))),
    historyLimit: Math.max(1, Math.floor(num('ALERT_HISTORY_LIMIT', 1000))),
  };
}

export type BusSettings = SubscriberOptions & {
  kind: 'memory' | 'redis';
  redisUrl: string;
  channelPrefix: string;
};

export function readBusSettings(): BusSettings {
  return {
    kind: str('EVENT_BUS', 'memory') === 'redis' ? 'redis' : 'memory',
    redisUrl: str('REDIS_URL', 'redis://127.0.0.1:6379'),
    channelPrefix: str('BUS_REDIS_CHANNEL_PREFIX', DEFAULT_CHANNEL_PREFIX),
    pollIntervalMs: Math.max(1, num('BUS_POLL_INTERVAL_MS', 100)),
    maxQueue: Math.max(1, Math.floor(num('BUS_SUBSCRIBER_MAX_QUEUE', 10_000))),
  };
}

function parseSeverities(raw: string | undefined): Severity[] | null {
  if (!raw) return null;
  const wanted = raw.split(',').map(s => s.trim().toLowerCase());
  const out = SEVERITIES.filter(s => wanted.includes(s));
  return out.length ? out : null;
}

export function readPushSettings(): PushSettings {
  return {
    enabled: bool('PUSH_ENABLED', false),
    provider: str('PUSH_PROVIDER', 'ntfy') === 'pushover' ? 'pushover' : 'ntfy',
    ntfyServer: str('NTFY_SERVER', 'https://ntfy.sh'),
    ntfyTopic: str('NTFY_TOPIC', ''),
    pushoverUserKey: str('PUSHOVER_USER_KEY', ''),
    pushoverApiToken: str('PUSHOVER_API_TOKEN', ''),
    severities: parseSeverities(process.env.PUSH_ALERT_LEVELS),
    retryCount: Math.max(0, Math.floor(num('PUSH_RETRY_COUNT', 1))),
    retryDelayMs: Math.max(0, num('PUSH_RETRY_DELAY_MS', 1000)),
    timeoutMs: Math.max(1, num('PUSH_TIMEOUT_MS', 10_000)),
  };
}

export type ApiSettings = { port: number; host: string };

export function readApiSettings(): ApiSettings {
  return { port: num('API_PORT', 5000), host: str('API_HOST', '0.0.0.0') };
}

export function parseRules(raw: unknown): RulesFile {
  const parsed = rulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('invalid rules file', parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`));
  }
  return parsed.data;
}

export function loadRulesFile(path = str('RULES_FILE', 'config/rules.json')): RulesFile {
  const full = resolve(process.cwd(), path);
  let text: string;
  try {
    text = readFileSync(full, 'utf8');
  } catch (e) {
    throw new ConfigError(`cannot read rules file ${full}`, [errMessage(e)]);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`rules file ${full} is not JSON`, [errMessage(e)]);
  }
  return parseRules(json);
}

export function toFusionRules(file: RulesFile): FusionRule[] {
  return file.fusion.map(r => ({
    signal: r.signal,
    sources: r.sources.map(s => ({ detector: s.detector, field: s.field, weight: s.weight })),
    strategy: r.strategy,
    minSources: r.min_sources,
  }));
}

// Field-path and operator errors surface as ConfigError naming the rule.
export function toAlertRules(file: RulesFile): Rule[] {
  return file.alerts.map(cfg => {
    try {
      return Rule.fromConfig(cfg);
    } catch (e) {
      throw new ConfigError(`alert rule "${cfg.name}" is invalid`, [errMessage(e)]);
    }
  });
}
