import type { EventBus, Publisher, Subscriber } from '../bus/types.js';
import { isValueList, nowSeconds, type Clock, type Event, type EventValue } from '../events/event.js';
import { errMessage, log } from '../observability/log.js';
import { fusedEmitted, fusionErrors } from '../observability/metrics.js';
import { fuse, resolveStrategy } from './strategies.js';
import {
  DEFAULT_FUSION_SETTINGS,
  FUSION_PREFIX,
  type FusedSignal,
  type FusionRule,
  type FusionSettings,
  type SignalScalar,
  type SignalValue,
} from './types.js';

export type ChannelUpdateCallback = (signal: FusedSignal) => void | Promise<void>;

export type FusionEngineOptions = {
  settings?: Partial<FusionSettings>;
  bus?: EventBus;
  clock?: Clock;
  onChannelUpdate?: ChannelUpdateCallback;
};

const CONFIDENCE_EPSILON = 0.1;
const VALUE_ROOT = 'value';

function fieldKey(field: string): string {
  return field.startsWith(`${VALUE_ROOT}.`) ? field : `${VALUE_ROOT}.${field}`;
}

function asScalar(v: EventValue): SignalScalar | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'boolean' || typeof v === 'string') return v;
  return null;
}

// Nested records flatten to dotted keys; arrays, nulls and non-finite numbers are skipped.
// Keys whose value is null or a non-finite number are collected in `cleared`.
export function flattenPayload(
  payload: EventValue,
  prefix = VALUE_ROOT,
  out = new Map<string, SignalScalar>(),
  cleared?: Set<string>,
): Map<string, SignalScalar> {
  if (payload === null || typeof payload !== 'object' || isValueList(payload)) return out;
  for (const [k, v] of Object.entries(payload)) {
    const key = `${prefix}.${k}`;
    const scalar = asScalar(v);
    if (scalar !== null) out.set(key, scalar);
    else if (v === null || typeof v === 'number') cleared?.add(key);
    else if (typeof v === 'object' && !isValueList(v)) flattenPayload(v, key, out, cleared);
  }
  return out;
}

function sameSources(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const s = new Set(a);
  return b.every(x => s.has(x));
}

/**
 * Combines the latest per-detector readings into one value per channel and
 * republishes each material change as a `fusion.<channel>` event.
 */
export class FusionEngine {
  private readonly settings: FusionSettings;
  private readonly clock: Clock;
  private readonly bus: EventBus | undefined;
  private readonly latest = new Map<string, Map<string, SignalValue>>();
  private readonly channels = new Map<string, FusedSignal>();
  private readonly warnedFallback = new Set<string>();
  private publisher: Publisher | null = null;
  private subscriber: Subscriber | null = null;
  private loop: Promise<void> | null = null;
  onChannelUpdate: ChannelUpdateCallback | undefined;

  constructor(opts: FusionEngineOptions = {}) {
    this.settings = { ...DEFAULT_FUSION_SETTINGS, ...opts.settings };
    this.clock = opts.clock ?? nowSeconds;
    this.bus = opts.bus;
    this.onChannelUpdate = opts.onChannelUpdate;
  }

  get rules(): readonly FusionRule[] { return this.settings.rules; }

  async start(): Promise<void> {
    if (!this.bus || this.subscriber) return;
    this.publisher = this.bus.createPublisher();
    const sub = this.bus.createSubscriber(null);
    sub.setCallback((_topic, event) => this.processEvent(event));
    this.subscriber = sub;
    this.loop = sub.run();
    log.info('fusion.started', { rules: this.settings.rules.length });
  }

  async stop(): Promise<void> {
    const sub = this.subscriber;
    if (!sub) return;
    sub.stop();
    await this.loop;
    sub.close();
    this.publisher?.close();
    this.subscriber = null;
    this.publisher = null;
    this.loop = null;
    log.info('fusion.stopped');
  }

  async processEvent(event: Event): Promise<void> {
    if (event.detector.startsWith(FUSION_PREFIX)) return;

    let slots = this.latest.get(event.detector);
    if (!slots) {
      slots = new Map();
      this.latest.set(event.detector, slots);
    }
    const cleared = new Set<string>();
    const fields = flattenPayload(event.value, VALUE_ROOT, new Map(), cleared);
    // A reported null supersedes the previous reading.
    for (const field of cleared) slots.delete(field);
    for (const [field, value] of fields) {
      slots.set(field, {
        value,
        confidence: event.confidence,
        timestamp: event.timestamp,
        detector: event.detector,
        field,
        weight: 1,
      });
    }

    await this.recalculate();
  }

  private async recalculate(): Promise<void> {
    const now = this.clock();
    for (const rule of this.settings.rules) {
      let fused: FusedSignal | null;
      try {
        fused = this.evaluate(rule, now);
      } catch (e) {
        fusionErrors.inc({ channel: rule.signal });
        log.error('fusion.rule.failed', { channel: rule.signal, error: errMessage(e) });
        continue;
      }
      if (fused && this.shouldEmit(fused)) await this.emit(fused);
    }
  }

  private gather(rule: FusionRule, now: number): SignalValue[] {
    const out: SignalValue[] = [];
    for (const src of rule.sources) {
      const slot = this.latest.get(src.detector)?.get(fieldKey(src.field));
      if (!slot) continue;
      if (now - slot.timestamp > this.settings.signalMaxAgeSeconds) continue;
      out.push({ ...slot, weight: src.weight });
    }
    return out;
  }

  private evaluate(rule: FusionRule, now: number): FusedSignal | null {
    const sources = this.gather(rule, now);
    if (sources.length < rule.minSources || sources.length === 0) return null;

    let strategy = resolveStrategy(rule.strategy);
    if (!strategy) {
      if (!this.warnedFallback.has(rule.signal)) {
        this.warnedFallback.add(rule.signal);
        log.warn('fusion.strategy.unknown', { channel: rule.signal, strategy: rule.strategy, fallback: 'weighted_average' });
      }
      strategy = 'weighted_average';
    }

    return fuse(strategy, sources, {
      channel: rule.signal,
      now,
      expectedSources: rule.sources.length,
      settings: this.settings,
    });
  }

  private shouldEmit(next: FusedSignal): boolean {
    const prev = this.channels.get(next.channel);
    if (!prev) return true;
    if (prev.value !== next.value) return true;
    if (Math.abs(prev.confidence - next.confidence) > CONFIDENCE_EPSILON) return true;
    return !sameSources(prev.sources, next.sources);
  }

  private async emit(signal: FusedSignal): Promise<void> {
    this.channels.set(signal.channel, signal);
    fusedEmitted.inc({ channel: signal.channel });
    log.debug('fusion.emit', { channel: signal.channel, value: signal.value, confidence: signal.confidence, agreement: signal.agreement });

    if (this.publisher) {
      try {
        await this.publisher.send(signal.toEvent());
      } catch (e) {
        log.warn('fusion.publish.failed', { channel: signal.channel, error: errMessage(e) });
      }
    }
    if (this.onChannelUpdate) {
      try {
        await this.onChannelUpdate(signal);
      } catch (e) {
        log.warn('fusion.callback.failed', { channel: signal.channel, error: errMessage(e) });
      }
    }
  }

  getChannel(name: string): FusedSignal | null {
    return this.channels.get(name) ?? null;
  }

  // FusedSignal is frozen, so a shallow copy of the table is isolated.
  getAllChannels(): Record<string, FusedSignal> {
    return Object.fromEntries(this.channels);
  }

  getLatestDetectorValues(): Record<string, Record<string, SignalValue>> {
    const out: Record<string, Record<string, SignalValue>> = {};
    for (const [detector, slots] of this.latest) {
      const fields: Record<string, SignalValue> = {};
      for (const [field, slot] of slots) fields[field] = { ...slot };
      out[detector] = fields;
    }
    return out;
  }
}
