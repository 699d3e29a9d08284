import { FUSION_STRATEGIES, FusedSignal, type FusionSettings, type FusionStrategy, type SignalValue } from './types.js';

export type FusionContext = {
  channel: string;
  now: number;
  expectedSources: number; // sources the rule configures; fewer live ones means degraded
  settings: Pick<FusionSettings, 'crossValidationEnabled' | 'agreementBonus' | 'disagreementPenalty'>;
};

type NumericSignal = SignalValue & { value: number };
type StrategyFn = (sources: SignalValue[], ctx: FusionContext) => FusedSignal;

const round2 = (x: number) => Math.round(x * 100) / 100;

function isNumeric(s: SignalValue): s is NumericSignal {
  return typeof s.value === 'number';
}

function truthy(s: SignalValue): boolean {
  return Boolean(s.value);
}

function emptyResult(ctx: FusionContext, sources: string[] = []): FusedSignal {
  return new FusedSignal({ channel: ctx.channel, value: null, confidence: 0, timestamp: ctx.now, sources, degraded: true });
}

export function resolveStrategy(name: string): FusionStrategy | null {
  const n = name.trim().toLowerCase();
  return FUSION_STRATEGIES.find(s => s === n) ?? null;
}

/**
 * Agreement from the spread of numeric readings, and the weight-averaged
 * source confidence adjusted by cross-validation. A lone source passes through.
 */
export function crossValidate(sources: NumericSignal[], ctx: FusionContext): { agreement: number; confidence: number } {
  const first = sources[0];
  if (sources.length < 2 || !first) return { agreement: 1, confidence: first ? first.confidence : 0 };

  const values = sources.map(s => s.value);
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((a, v) => a + (v - mean) ** 2, 0) / values.length;
  const agreement = variance === 0 ? 1 : Math.max(0, 1 - Math.sqrt(variance) / (Math.abs(mean) + 1));

  const totalWeight = sources.reduce((a, s) => a + s.weight, 0);
  const base = totalWeight > 0
    ? sources.reduce((a, s) => a + s.confidence * s.weight, 0) / totalWeight
    : sources.reduce((a, s) => a + s.confidence, 0) / sources.length;

  let adjusted = base;
  if (ctx.settings.crossValidationEnabled) {
    if (agreement > 0.8) adjusted = base + ctx.settings.agreementBonus;
    else if (agreement < 0.5) adjusted = base - ctx.settings.disagreementPenalty;
    adjusted = Math.max(0, Math.min(1, adjusted));
  }
  return { agreement: round2(agreement), confidence: round2(adjusted) };
}

// value = Σ(v·w·c) / Σ(w·c)
export const weightedAverage: StrategyFn = (sources, ctx) => {
  const numeric = sources.filter(isNumeric);
  if (!numeric.length) return emptyResult(ctx);
  const denom = numeric.reduce((a, s) => a + s.weight * s.confidence, 0);
  if (denom === 0) return emptyResult(ctx, numeric.map(s => s.detector));
  const value = numeric.reduce((a, s) => a + s.value * s.weight * s.confidence, 0) / denom;
  const { agreement, confidence } = crossValidate(numeric, ctx);
  return new FusedSignal({
    channel: ctx.channel,
    value: round2(value),
    confidence,
    timestamp: ctx.now,
    sources: numeric.map(s => s.detector),
    agreement,
    degraded: numeric.length < ctx.expectedSources,
  });
};

export const bestConfidence: StrategyFn = (sources, ctx) => {
  const best = sources.reduce<SignalValue | null>((b, s) => (b === null || s.confidence > b.confidence ? s : b), null);
  if (!best) return emptyResult(ctx);
  return new FusedSignal({
    channel: ctx.channel,
    value: best.value,
    confidence: best.confidence,
    timestamp: ctx.now,
    sources: [best.detector],
    agreement: 1,
    degraded: sources.length < ctx.expectedSources,
  });
};

// Majority of truthy votes; a tie is false. Confidence is scaled by agreement.
export const voting: StrategyFn = (sources, ctx) => {
  if (!sources.length) return emptyResult(ctx);
  const yes = sources.filter(truthy).length;
  const no = sources.length - yes;
  const agreement = Math.abs(yes - no) / sources.length;
  const meanConfidence = sources.reduce((a, s) => a + s.confidence, 0) / sources.length;
  return new FusedSignal({
    channel: ctx.channel,
    value: yes > no,
    confidence: meanConfidence * agreement,
    timestamp: ctx.now,
    sources: sources.map(s => s.detector),
    agreement,
    degraded: sources.length < ctx.expectedSources,
  });
};

// Boolean OR for safety-critical detections: one confident source is enough.
export const anyTrue: StrategyFn = (sources, ctx) => {
  if (!sources.length) return emptyResult(ctx);
  const yes = sources.filter(truthy);
  const fired = yes.length > 0;
  const pool = fired ? yes : sources;
  return new FusedSignal({
    channel: ctx.channel,
    value: fired,
    confidence: Math.max(...pool.map(s => s.confidence)),
    timestamp: ctx.now,
    sources: pool.map(s => s.detector),
    agreement: fired ? Math.min(1, yes.length / sources.length) : 1,
    degraded: sources.length < ctx.expectedSources,
  });
};

// Boolean AND; the weakest source caps confidence.
export const allTrue: StrategyFn = (sources, ctx) => {
  if (!sources.length) return emptyResult(ctx);
  const value = sources.every(truthy);
  return new FusedSignal({
    channel: ctx.channel,
    value,
    confidence: Math.min(...sources.map(s => s.confidence)),
    timestamp: ctx.now,
    sources: sources.map(s => s.detector),
    agreement: value ? 1 : 0,
    degraded: sources.length < ctx.expectedSources,
  });
};

export const maxValue: StrategyFn = (sources, ctx) => {
  const numeric = sources.filter(isNumeric);
  const best = numeric.reduce<NumericSignal | null>((b, s) => (b === null || s.value > b.value ? s : b), null);
  if (!best) return emptyResult(ctx);
  return new FusedSignal({
    channel: ctx.channel,
    value: best.value,
    confidence: best.confidence,
    timestamp: ctx.now,
    sources: [best.detector],
    agreement: 1,
    degraded: numeric.length < ctx.expectedSources,
  });
};

export const STRATEGIES: Record<FusionStrategy, StrategyFn> = {
  weighted_average: weightedAverage,
  best_confidence: bestConfidence,
  voting,
  any: anyTrue,
  all: allTrue,
  max: maxValue,
};

export function fuse(strategy: FusionStrategy, sources: SignalValue[], ctx: FusionContext): FusedSignal {
  return STRATEGIES[strategy](sources, ctx);
}
