import { setTimeout as delay } from 'node:timers/promises';
import { request } from 'undici';
import { Alert, type Severity } from '../events/alert.js';
import { errMessage, log } from '../observability/log.js';
import type { Notifier } from './types.js';

export type PushProvider = 'ntfy' | 'pushover';

export type PushSettings = {
  enabled: boolean;
  provider: PushProvider;
  ntfyServer: string;
  ntfyTopic: string;
  pushoverUserKey: string;
  pushoverApiToken: string;
  severities: Severity[] | null; // null sends every severity
  retryCount: number;
  retryDelayMs: number;
  timeoutMs: number;
};

export const DEFAULT_PUSH_SETTINGS: PushSettings = {
  enabled: false,
  provider: 'ntfy',
  ntfyServer: 'https://ntfy.sh',
  ntfyTopic: '',
  pushoverUserKey: '',
  pushoverApiToken: '',
  severities: null,
  retryCount: 1,
  retryDelayMs: 1000,
  timeoutMs: 10_000,
};

export const PUSHOVER_URL = 'https://api.pushover.net/1/messages.json';

const NTFY_PRIORITY: Record<Severity, number> = { info: 2, warning: 3, critical: 5 };
const NTFY_TAGS: Record<Severity, string> = { info: 'information_source', warning: 'warning', critical: 'rotating_light,skull' };
const PUSHOVER_PRIORITY: Record<Severity, number> = { info: -1, warning: 0, critical: 1 };

type Outgoing = { url: string; headers: Record<string, string>; body: string };

export class PushNotifier implements Notifier {
  readonly name = 'push';
  private readonly settings: PushSettings;

  constructor(settings: Partial<PushSettings> = {}) {
    this.settings = { ...DEFAULT_PUSH_SETTINGS, ...settings };
  }

  get enabled(): boolean { return this.settings.enabled; }

  async start(): Promise<void> {
    log.info('push.started', { provider: this.settings.provider, enabled: this.settings.enabled });
  }

  async notify(alert: Alert): Promise<boolean> {
    if (!this.settings.enabled) return false;
    const allowed = this.settings.severities;
    if (allowed && !allowed.includes(alert.severity)) {
      log.debug('push.skipped', { alert: alert.id, severity: alert.severity });
      return false;
    }
    return this.send(alert);
  }

  // Bypasses the severity filter.
  async test(): Promise<boolean> {
    return this.send(Alert.create({ severity: 'info', ruleName: 'Test', message: 'This is a test notification from CribWatch' }));
  }

  private build(alert: Alert): Outgoing | null {
    const s = this.settings;
    const title = `CribWatch: ${alert.ruleName}`;
    if (s.provider === 'ntfy') {
      if (!s.ntfyTopic) return null;
      return {
        url: `${s.ntfyServer.replace(/\/+$/, '')}/${s.ntfyTopic}`,
        headers: { Title: title, Priority: String(NTFY_PRIORITY[alert.severity]), Tags: NTFY_TAGS[alert.severity] },
        body: alert.message,
      };
    }
    if (!s.pushoverUserKey || !s.pushoverApiToken) return null;
    const form = new URLSearchParams({
      token: s.pushoverApiToken,
      user: s.pushoverUserKey,
      message: alert.message,
      title,
      priority: String(PUSHOVER_PRIORITY[alert.severity]),
      sound: alert.severity === 'critical' ? 'siren' : 'pushover',
    });
    return { url: PUSHOVER_URL, headers: { 'content-type': 'application/x-www-form-urlencoded' }, body: form.toString() };
  }

  private async send(alert: Alert): Promise<boolean> {
    const out = this.build(alert);
    if (!out) {
      log.error('push.misconfigured', { provider: this.settings.provider });
      return false;
    }
    const { retryCount, retryDelayMs, timeoutMs } = this.settings;
    for (let attempt = 0; attempt <= retryCount; attempt++) {
      if (attempt > 0) await delay(retryDelayMs);
      const controller = new AbortController();
      const id = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const res = await request(out.url, { method: 'POST', headers: out.headers, body: out.body, signal: controller.signal });
        const text = await res.body.text();
        if (res.statusCode === 200) {
          log.info('push.sent', { provider: this.settings.provider, alert: alert.id, rule: alert.ruleName });
          return true;
        }
        log.warn('push.rejected', { provider: this.settings.provider, status: res.statusCode, body: text.slice(0, 200), attempt });
      } catch (e) {
        log.warn('push.request.failed', { provider: this.settings.provider, error: errMessage(e), attempt });
      } finally {
        clearTimeout(id);
      }
    }
    return false;
  }
}
