import { trace } from '@opentelemetry/api';
import type { EventBus, Subscriber } from '../bus/types.js';
import { severityRank, type Alert, type AlertDict } from '../events/alert.js';
import { EventBuffer } from '../events/buffer.js';
import { nowSeconds, type Clock, type Event, type EventState } from '../events/event.js';
import type { Notifier } from '../notifiers/types.js';
import { errMessage, log } from '../observability/log.js';
import { alertsTriggered, detectorsOffline, eventsProcessed, notifierFailures } from '../observability/metrics.js';
import { DetectorHealthMonitor, type DetectorStatus } from './health.js';
import { AlertManager } from './manager.js';
import type { Rule } from './rule.js';

export type AlertLevel = 'ok' | 'warning' | 'critical';

export type AlertState = {
  level: AlertLevel;
  activeAlerts: Alert[];
  detectorStates: Record<string, EventState>;
  lastUpdate: number;
  paused: boolean;
  pauseExpires: number | null;
};

export type AlertStateDict = {
  level: AlertLevel;
  active_alerts: AlertDict[];
  detector_states: Record<string, EventState>;
  last_update: number;
  paused: boolean;
  pause_expires: number | null;
};

export function alertStateToDict(s: AlertState): AlertStateDict {
  return {
    level: s.level,
    active_alerts: s.activeAlerts.map(a => a.toDict()),
    detector_states: { ...s.detectorStates },
    last_update: s.lastUpdate,
    paused: s.paused,
    pause_expires: s.pauseExpires,
  };
}

export type AlertEngineSettings = {
  detectorTimeoutSeconds: number;
  healthCheckIntervalSeconds: number;
  maxPauseMinutes: number;
  bufferCapacity: number;
  historyLimit: number;
};

export const DEFAULT_ALERT_ENGINE_SETTINGS: AlertEngineSettings = {
  detectorTimeoutSeconds: 10,
  healthCheckIntervalSeconds: 5,
  maxPauseMinutes: 60,
  bufferCapacity: 5000,
  historyLimit: 1000,
};

export type AlertEngineOptions = {
  settings?: Partial<AlertEngineSettings>;
  rules?: Rule[];
  bus?: EventBus;
  notifiers?: Notifier[];
  clock?: Clock;
};

type Hook<T> = ((arg: T) => void | Promise<void>) | undefined;

const tracer = trace.getTracer('cribwatch.alerts');

/**
 * Evaluates rules against the latest event per detector, owns the alert
 * lifecycle and watches detector liveness. Callbacks and notifiers are
 * isolated: a failure is logged and counted, never propagated.
 */
export class AlertEngine {
  readonly settings: AlertEngineSettings;
  private readonly rules: Rule[];
  private readonly bus: EventBus | undefined;
  private readonly notifiers: Notifier[];
  private readonly clock: Clock;
  private readonly buffer: EventBuffer;
  private readonly current = new Map<string, Event>();
  private readonly alerts: AlertManager;
  private readonly health: DetectorHealthMonitor;

  private paused = false;
  private pauseExpires: number | null = null;
  private running = false;
  private subscriber: Subscriber | null = null;
  private loop: Promise<void> | null = null;
  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private healthTick: Promise<void> | null = null;

  onAlert: Hook<Alert>;
  onStateChange: Hook<AlertState>;
  onDetectorOffline: Hook<string>;

  constructor(opts: AlertEngineOptions = {}) {
    this.settings = { ...DEFAULT_ALERT_ENGINE_SETTINGS, ...opts.settings };
    this.rules = [...(opts.rules ?? [])];
    this.bus = opts.bus;
    this.notifiers = [...(opts.notifiers ?? [])];
    this.clock = opts.clock ?? nowSeconds;
    this.buffer = new EventBuffer(this.settings.bufferCapacity);
    this.alerts = new AlertManager(this.settings.historyLimit, this.clock);
    this.health = new DetectorHealthMonitor(this.settings.detectorTimeoutSeconds, this.clock);
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    for (const n of this.notifiers) {
      if (n.start) await n.start();
    }
    if (this.bus) {
      const sub = this.bus.createSubscriber(null);
      sub.setCallback((_topic, event) => this.processEvent(event));
      this.subscriber = sub;
      this.loop = sub.run();
    }
    this.healthTimer = setInterval(() => this.runHealthTick(), this.settings.healthCheckIntervalSeconds * 1000);
    log.info('alerts.started', { rules: this.rules.length, notifiers: this.notifiers.map(n => n.name) });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.healthTimer) clearInterval(this.healthTimer);
    this.healthTimer = null;
    const sub = this.subscriber;
    if (sub) {
      sub.stop();
      await this.loop;
      sub.close();
    }
    this.subscriber = null;
    this.loop = null;
    await this.healthTick;
    for (const n of this.notifiers) {
      if (!n.stop) continue;
      try {
        await n.stop();
      } catch (e) {
        log.warn('notifier.stop.failed', { notifier: n.name, error: errMessage(e) });
      }
    }
    log.info('alerts.stopped');
  }

  async processEvent(event: Event): Promise<void> {
    eventsProcessed.inc({ detector: event.detector });
    this.buffer.append(event);
    this.current.set(event.detector, event);
    this.health.update(event.detector);

    if (this.isPaused()) return;

    const now = this.clock();
    for (const rule of this.rules) {
      const alert = rule.evaluate(this.current, now);
      if (alert) await this.trigger(alert);
    }
  }

  private trigger(alert: Alert): Promise<void> {
    return tracer.startActiveSpan('alert.trigger', async span => {
      span.setAttribute('alert.rule', alert.ruleName);
      span.setAttribute('alert.severity', alert.severity);
      try {
        if (!this.alerts.add(alert)) return;
        alertsTriggered.inc({ rule: alert.ruleName, severity: alert.severity });
        log.warn('alert.triggered', { id: alert.id, rule: alert.ruleName, severity: alert.severity, message: alert.message });

        await this.fire('onAlert', this.onAlert, alert);
        await this.publishState();
        for (const n of this.notifiers) {
          if (!n.enabled) continue;
          let ok = false;
          try {
            ok = await n.notify(alert);
          } catch (e) {
            log.error('notifier.threw', { notifier: n.name, alert: alert.id, error: errMessage(e) });
          }
          if (!ok) {
            notifierFailures.inc({ notifier: n.name });
            log.warn('notifier.failed', { notifier: n.name, alert: alert.id });
          }
        }
      } finally {
        span.end();
      }
    });
  }

  private async fire<T>(hook: string, fn: Hook<T>, arg: T): Promise<void> {
    if (!fn) return;
    try {
      await fn(arg);
    } catch (e) {
      log.error('alerts.callback.failed', { hook, error: errMessage(e) });
    }
  }

  private publishState(): Promise<void> {
    return this.fire('onStateChange', this.onStateChange, this.getState());
  }

  // Skips a tick while the previous one is still in flight.
  private runHealthTick(): void {
    if (this.healthTick) return;
    this.healthTick = this.checkHealth().finally(() => {
      this.healthTick = null;
    });
  }

  async checkHealth(): Promise<void> {
    const offline = this.health.checkNewlyOffline();
    detectorsOffline.set(this.health.getOfflineDetectors().length);
    for (const detector of offline) {
      log.warn('detector.offline', { detector, timeout_s: this.settings.detectorTimeoutSeconds });
      await this.fire('onDetectorOffline', this.onDetectorOffline, detector);
    }
  }

  getState(): AlertState {
    const active = this.alerts.getActive();
    const top = active.reduce((m, a) => Math.max(m, severityRank(a.severity)), -1);
    const level: AlertLevel = top >= severityRank('critical') ? 'critical' : top >= severityRank('warning') ? 'warning' : 'ok';
    const detectorStates: Record<string, EventState> = {};
    for (const [d, e] of this.current) detectorStates[d] = e.state;
    const paused = this.isPaused();
    return {
      level,
      activeAlerts: active,
      detectorStates,
      lastUpdate: this.clock(),
      paused,
      pauseExpires: paused ? this.pauseExpires : null,
    };
  }

  async acknowledgeAlert(id: string): Promise<boolean> {
    if (!this.alerts.acknowledge(id)) return false;
    await this.publishState();
    return true;
  }

  async resolveAlert(id: string): Promise<boolean> {
    if (!this.alerts.resolve(id)) return false;
    await this.publishState();
    return true;
  }

  pause(durationSeconds: number): void {
    const requested = Number.isNaN(durationSeconds) ? 0 : durationSeconds;
    const capped = Math.max(0, Math.min(requested, this.settings.maxPauseMinutes * 60));
    this.paused = true;
    this.pauseExpires = this.clock() + capped;
    log.info('alerts.paused', { seconds: capped });
  }

  resume(): void {
    this.paused = false;
    this.pauseExpires = null;
    log.info('alerts.resumed');
  }

  // Clears an expired pause as a side effect.
  isPaused(): boolean {
    if (this.paused && this.pauseExpires !== null && this.clock() >= this.pauseExpires) {
      this.paused = false;
      this.pauseExpires = null;
    }
    return this.paused;
  }

  getRecentEvents(detector?: string, seconds = 60): Event[] {
    const events = this.buffer.getRecent(seconds, this.clock());
    return detector ? events.filter(e => e.detector === detector) : events;
  }

  getCurrentEvent(detector: string): Event | null {
    return this.current.get(detector) ?? null;
  }

  getActiveAlerts(): Alert[] {
    return this.alerts.getActive();
  }

  getAlertHistory(limit?: number): Alert[] {
    return this.alerts.getHistory(limit);
  }

  getDetectorHealth(): Record<string, DetectorStatus> {
    return this.health.getAllStatus();
  }

  addRule(rule: Rule): void {
    this.rules.push(rule);
  }

  removeRule(name: string): boolean {
    const i = this.rules.findIndex(r => r.name === name);
    if (i < 0) return false;
    this.rules.splice(i, 1);
    return true;
  }

  getRuleNames(): string[] {
    return this.rules.map(r => r.name);
  }
}
