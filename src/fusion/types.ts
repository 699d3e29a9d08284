import { Event } from '../events/event.js';

export const FUSION_STRATEGIES = ['weighted_average', 'best_confidence', 'voting', 'any', 'all', 'max'] as const;
export type FusionStrategy = (typeof FUSION_STRATEGIES)[number];

export type SignalScalar = number | boolean | string;

/** Latest reading of one (detector, field) slot, replaced on every update. */
export type SignalValue = {
  value: SignalScalar;
  confidence: number;
  timestamp: number;
  detector: string;
  field: string; // e.g. "value.respiration_rate"
  weight: number;
};

export type FusionRuleSource = {
  detector: string;
  field: string;
  weight: number;
};

export type FusionRule = {
  signal: string; // output channel
  sources: FusionRuleSource[];
  strategy: string; // unknown names fall back to weighted_average
  minSources: number;
};

export type FusionSettings = {
  signalMaxAgeSeconds: number;
  crossValidationEnabled: boolean;
  agreementBonus: number;
  disagreementPenalty: number;
  rules: FusionRule[];
};

export const DEFAULT_FUSION_SETTINGS: FusionSettings = {
  signalMaxAgeSeconds: 5,
  crossValidationEnabled: true,
  agreementBonus: 0.1,
  disagreementPenalty: 0.2,
  rules: [],
};

export const FUSION_PREFIX = 'fusion.';

export type FusedSignalInit = {
  channel: string;
  value: SignalScalar | null;
  confidence: number;
  timestamp: number;
  sources?: readonly string[];
  agreement?: number;
  degraded?: boolean;
};

const clamp01 = (x: number) => Math.max(0, Math.min(1, x));

export class FusedSignal {
  readonly channel: string;
  readonly value: SignalScalar | null;
  readonly confidence: number;
  readonly timestamp: number;
  readonly sources: readonly string[];
  readonly agreement: number;
  readonly degraded: boolean;

  constructor(init: FusedSignalInit) {
    this.channel = init.channel;
    this.value = init.value;
    this.confidence = clamp01(init.confidence);
    this.timestamp = init.timestamp;
    this.sources = Object.freeze([...(init.sources ?? [])]);
    this.agreement = clamp01(init.agreement ?? 1);
    this.degraded = init.degraded ?? false;
    Object.freeze(this);
  }

  toEvent(): Event {
    return new Event({
      detector: FUSION_PREFIX + this.channel,
      timestamp: this.timestamp,
      confidence: this.confidence,
      state: 'normal',
      value: {
        value: this.value,
        sources: this.sources,
        source_count: this.sources.length,
        agreement: this.agreement,
        degraded: this.degraded,
      },
    });
  }
}
