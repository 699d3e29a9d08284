import { describe, it, expect } from 'vitest';
import { fuse, resolveStrategy, type FusionContext } from '../src/fusion/strategies.js';
import { FusedSignal, type SignalValue, type SignalScalar } from '../src/fusion/types.js';

function src(detector: string, value: SignalScalar, confidence: number, weight = 1): SignalValue {
  return { detector, value, confidence, weight, timestamp: 1000, field: 'value.x' };
}

function ctx(expectedSources: number, crossValidationEnabled = true): FusionContext {
  return {
    channel: 'ch',
    now: 1000,
    expectedSources,
    settings: { crossValidationEnabled, agreementBonus: 0.1, disagreementPenalty: 0.2 },
  };
}

describe('weighted_average', () => {
  it('blends close readings and rewards agreement', () => {
    const r = fuse('weighted_average', [src('radar', 14.0, 0.9, 1.0), src('audio', 14.5, 0.8, 0.8)], ctx(2));
    expect(r.value).toBe(14.21);
    expect(r.agreement).toBe(0.98);
    expect(r.confidence).toBe(0.96);
    expect(r.sources).toEqual(['radar', 'audio']);
    expect(r.degraded).toBe(false);
  });

  it('penalises disagreeing readings', () => {
    const r = fuse('weighted_average', [src('a', 1, 0.9), src('b', 20, 0.9)], ctx(2));
    expect(r.value).toBe(10.5);
    expect(r.agreement).toBe(0.17);
    expect(r.confidence).toBe(0.7);
  });

  it('leaves confidence alone with cross-validation off', () => {
    const r = fuse('weighted_average', [src('a', 1, 0.9), src('b', 20, 0.9)], ctx(2, false));
    expect(r.confidence).toBe(0.9);
  });

  it('passes a lone source through and marks it degraded', () => {
    const r = fuse('weighted_average', [src('audio', 14.5, 0.8, 0.8)], ctx(2));
    expect(r.value).toBe(14.5);
    expect(r.confidence).toBe(0.8);
    expect(r.agreement).toBe(1);
    expect(r.degraded).toBe(true);
  });

  it('ignores booleans', () => {
    const r = fuse('weighted_average', [src('a', true, 0.9), src('b', 10, 0.7)], ctx(2));
    expect(r.value).toBe(10);
    expect(r.sources).toEqual(['b']);
    expect(r.degraded).toBe(true);
  });

  it('returns a zero-confidence result when every weight is zero', () => {
    const r = fuse('weighted_average', [src('a', 12, 0.9, 0), src('b', 13, 0.9, 0)], ctx(2));
    expect(r.value).toBeNull();
    expect(r.confidence).toBe(0);
    expect(r.degraded).toBe(true);
  });
});

describe('boolean strategies', () => {
  it('any: one confident true source wins', () => {
    const r = fuse('any', [src('audio', true, 0.95), src('bcg', false, 0.9)], ctx(2));
    expect(r.value).toBe(true);
    expect(r.confidence).toBe(0.95);
    expect(r.agreement).toBe(0.5);
    expect(r.sources).toEqual(['audio']);
  });

  it('any: all false takes the max confidence of everyone', () => {
    const r = fuse('any', [src('audio', false, 0.6), src('bcg', 0, 0.8)], ctx(2));
    expect(r.value).toBe(false);
    expect(r.confidence).toBe(0.8);
    expect(r.agreement).toBe(1);
  });

  it('voting: a split vote has zero agreement and confidence', () => {
    const r = fuse('voting', [src('radar', true, 0.9), src('bcg', false, 0.9)], ctx(2));
    expect(r.value).toBe(false);
    expect(r.agreement).toBe(0);
    expect(r.confidence).toBe(0);
  });

  it('voting: majority with scaled confidence', () => {
    const r = fuse('voting', [src('a', true, 0.9), src('b', 'yes', 0.8), src('c', false, 0.7)], ctx(3));
    expect(r.value).toBe(true);
    expect(r.agreement).toBeCloseTo(1 / 3, 10);
    expect(r.confidence).toBeCloseTo(0.8 / 3, 10);
  });

  it('all: the weakest source caps confidence', () => {
    const yes = fuse('all', [src('a', true, 0.9), src('b', 1, 0.6)], ctx(2));
    expect(yes.value).toBe(true);
    expect(yes.confidence).toBe(0.6);
    expect(yes.agreement).toBe(1);
    const no = fuse('all', [src('a', true, 0.9), src('b', '', 0.6)], ctx(2));
    expect(no.value).toBe(false);
    expect(no.agreement).toBe(0);
  });
});

describe('single-source strategies', () => {
  it('max picks the highest numeric value', () => {
    const r = fuse('max', [src('radar', 0.3, 0.5), src('bcg', 0.7, 0.6), src('audio', true, 1)], ctx(3));
    expect(r.value).toBe(0.7);
    expect(r.confidence).toBe(0.6);
    expect(r.sources).toEqual(['bcg']);
    expect(r.agreement).toBe(1);
  });

  it('best_confidence picks the most confident source', () => {
    const r = fuse('best_confidence', [src('radar', 30, 0.5), src('bcg', 33, 0.85)], ctx(2));
    expect(r.value).toBe(33);
    expect(r.confidence).toBe(0.85);
    expect(r.sources).toEqual(['bcg']);
  });
});

describe('resolveStrategy', () => {
  it('normalises names and rejects unknown ones', () => {
    expect(resolveStrategy(' Voting ')).toBe('voting');
    expect(resolveStrategy('median')).toBeNull();
  });
});

describe('FusedSignal', () => {
  it('converts to a fusion.* event', () => {
    const s = new FusedSignal({ channel: 'respiration_rate', value: 14.21, confidence: 0.96, timestamp: 1000, sources: ['radar', 'audio'], agreement: 0.98 });
    const e = s.toEvent();
    expect(e.detector).toBe('fusion.respiration_rate');
    expect(e.state).toBe('normal');
    expect(e.confidence).toBe(0.96);
    expect(e.value).toEqual({ value: 14.21, sources: ['radar', 'audio'], source_count: 2, agreement: 0.98, degraded: false });
  });

  it('clamps confidence and agreement', () => {
    const s = new FusedSignal({ channel: 'c', value: 1, confidence: 1.4, timestamp: 0, agreement: -0.2 });
    expect(s.confidence).toBe(1);
    expect(s.agreement).toBe(0);
  });
});
