import { describe, it, expect } from 'vitest';
import { InvalidFieldPathError, parseFieldPath, resolveFieldPath } from '../src/alerts/field_path.js';
import { Condition, InvalidConditionError, Rule } from '../src/alerts/rule.js';
import type { Event } from '../src/events/event.js';
import { ev } from './helpers/factories.js';

function current(...events: Event[]): Map<string, Event> {
  return new Map(events.map(e => [e.detector, e]));
}

const lowRr = () => new Condition('radar', 'value.respiration_rate', '<', 8);

describe('field paths', () => {
  it('parses known roots', () => {
    expect(parseFieldPath('value.vitals.hr')).toEqual({ root: 'value', segments: ['vitals', 'hr'], raw: 'value.vitals.hr' });
    expect(parseFieldPath('confidence').segments).toEqual([]);
    expect(parseFieldPath('session_id').root).toBe('session_id');
  });

  it.each(['', 'value..x', 'value.', 'foo.bar', 'confidence.x'])('rejects %j', (raw) => {
    expect(() => parseFieldPath(raw)).toThrow(InvalidFieldPathError);
  });

  it('resolves without throwing', () => {
    const e = ev('radar', { vitals: { hr: 120 }, list: [1] }, { confidence: 0.8 });
    expect(resolveFieldPath(e, parseFieldPath('value.vitals.hr'))).toEqual({ found: true, value: 120 });
    expect(resolveFieldPath(e, parseFieldPath('confidence'))).toEqual({ found: true, value: 0.8 });
    expect(resolveFieldPath(e, parseFieldPath('value.vitals.rr'))).toEqual({ found: false });
    expect(resolveFieldPath(e, parseFieldPath('value.vitals.hr.x'))).toEqual({ found: false });
    expect(resolveFieldPath(e, parseFieldPath('value.list.0'))).toEqual({ found: false });
  });
});

describe('Condition', () => {
  it('compares numbers, strings and exact values', () => {
    const e = ev('radar', { rr: 6, mode: 'b', presence: true });
    expect(new Condition('radar', 'value.rr', '<', 8).evaluate(e)).toBe(true);
    expect(new Condition('radar', 'value.rr', '>=', 6).evaluate(e)).toBe(true);
    expect(new Condition('radar', 'value.rr', '>', 6).evaluate(e)).toBe(false);
    expect(new Condition('radar', 'value.mode', '<', 'c').evaluate(e)).toBe(true);
    expect(new Condition('radar', 'value.presence', '==', true).evaluate(e)).toBe(true);
    expect(new Condition('radar', 'value.presence', '!=', true).evaluate(e)).toBe(false);
    expect(new Condition('radar', 'state', '==', 'normal').evaluate(e)).toBe(true);
  });

  it('is false for mixed types, missing fields and other detectors', () => {
    const e = ev('radar', { rr: '6' });
    expect(new Condition('radar', 'value.rr', '<', 8).evaluate(e)).toBe(false);
    expect(new Condition('radar', 'value.hr', '<', 8).evaluate(e)).toBe(false);
    expect(new Condition('audio', 'value.rr', '==', '6').evaluate(e)).toBe(false);
  });

  it('rejects bad operators and paths at construction', () => {
    expect(() => new Condition('radar', 'value.rr', '=~', 1)).toThrow(InvalidConditionError);
    expect(() => new Condition('radar', 'vals.rr', '<', 1)).toThrow(InvalidFieldPathError);
    expect(() => new Condition('radar', 'value.rr', '<', 1, -1)).toThrow(InvalidConditionError);
  });
});

describe('Rule', () => {
  it('respects the cooldown', () => {
    const rule = new Rule({ name: 'apnea', conditions: [lowRr()], cooldownSeconds: 30 });
    const cur = current(ev('radar', { respiration_rate: 4 }));
    expect(rule.evaluate(cur, 100)).not.toBeNull();
    expect(rule.evaluate(cur, 110)).toBeNull();
    expect(rule.evaluate(cur, 129.9)).toBeNull();
    expect(rule.evaluate(cur, 130)).not.toBeNull();
  });

  it('requires a duration condition to hold continuously', () => {
    const rule = new Rule({ name: 'apnea', conditions: [new Condition('radar', 'value.respiration_rate', '<', 8, 3)] });
    const low = current(ev('radar', { respiration_rate: 4 }));
    const ok = current(ev('radar', { respiration_rate: 14 }));
    expect(rule.evaluate(low, 100)).toBeNull();
    expect(rule.evaluate(low, 101.5)).toBeNull();
    expect(rule.evaluate(ok, 102)).toBeNull();
    expect(rule.evaluate(low, 103)).toBeNull();
    expect(rule.evaluate(low, 105.9)).toBeNull();
    expect(rule.evaluate(low, 106)).not.toBeNull();
  });

  it('treats a missing detector as false and resets its timer', () => {
    const rule = new Rule({ name: 'apnea', conditions: [new Condition('radar', 'value.respiration_rate', '<', 8, 3)] });
    const low = current(ev('radar', { respiration_rate: 4 }));
    expect(rule.evaluate(low, 100)).toBeNull();
    expect(rule.evaluate(new Map(), 102)).toBeNull();
    expect(rule.evaluate(low, 103)).toBeNull();
    expect(rule.evaluate(low, 106)).not.toBeNull();
  });

  it('applies a rule-level duration to the combined result', () => {
    const rule = new Rule({ name: 'apnea', conditions: [lowRr()], durationSeconds: 5 });
    const low = current(ev('radar', { respiration_rate: 4 }));
    expect(rule.evaluate(low, 100)).toBeNull();
    expect(rule.evaluate(low, 104)).toBeNull();
    expect(rule.evaluate(low, 105)).not.toBeNull();
  });

  it('combines with all or any', () => {
    const conds = [lowRr(), new Condition('bcg', 'value.heart_rate', '<', 80)];
    const cur = current(ev('radar', { respiration_rate: 4 }), ev('bcg', { heart_rate: 120 }));
    expect(new Rule({ name: 'both', conditions: conds, combine: 'all' }).evaluate(cur, 1)).toBeNull();
    expect(new Rule({ name: 'either', conditions: conds, combine: 'any' }).evaluate(cur, 1)).not.toBeNull();
  });

  it('builds the alert from the current events', () => {
    const rule = new Rule({
      name: 'apnea',
      conditions: [lowRr()],
      severity: 'warning',
      messageTemplate: 'RR {respiration_rate} HR {heart_rate}',
    });
    const cur = current(ev('radar', { respiration_rate: 6 }), ev('bcg', { heart_rate: 70, respiration_rate: 7 }));
    const alert = rule.evaluate(cur, 100);
    expect(alert?.message).toBe('RR 6 HR 70');
    expect(alert?.severity).toBe('warning');
    expect(alert?.ruleName).toBe('apnea');
    expect(alert?.createdAt).toBe(100);
    expect(alert?.contributingEvents.map(e => e.detector)).toEqual(['radar', 'bcg']);
  });

  it('inserts values literally, without replacement patterns', () => {
    const rule = new Rule({ name: 'note', conditions: [lowRr()], messageTemplate: 'RR {respiration_rate} note {note}' });
    const cur = current(ev('radar', { respiration_rate: 6, note: "$& $` $$" }));
    expect(rule.evaluate(cur, 1)?.message).toBe("RR 6 note $& $` $$");
  });

  it('defaults the message, severity and cooldown', () => {
    const rule = Rule.fromConfig({
      name: 'apnea',
      conditions: [{ detector: 'radar', field: 'value.respiration_rate', operator: '<', value: 8 }],
    });
    expect(rule.severity).toBe('critical');
    expect(rule.cooldownSeconds).toBe(30);
    expect(rule.combine).toBe('all');
    expect(rule.evaluate(current(ev('radar', { respiration_rate: 2 })), 1)?.message).toBe('Alert: apnea');
  });

  it('reset clears the cooldown', () => {
    const rule = new Rule({ name: 'apnea', conditions: [lowRr()] });
    const cur = current(ev('radar', { respiration_rate: 4 }));
    expect(rule.evaluate(cur, 100)).not.toBeNull();
    rule.reset();
    expect(rule.lastTriggered).toBeNull();
    expect(rule.evaluate(cur, 101)).not.toBeNull();
  });
});
