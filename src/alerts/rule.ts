import { Alert, type Severity } from '../events/alert.js';
import type { Event, EventValue, Scalar } from '../events/event.js';
import { OPERATORS, type AlertRuleConfig } from '../config/schema.js';
import { parseFieldPath, resolveFieldPath, type FieldPath } from './field_path.js';

export type Operator = (typeof OPERATORS)[number];
export type Combine = 'all' | 'any';

export class InvalidConditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConditionError';
  }
}

// `order` is negative, zero or positive as value sorts before, with or after the threshold.
function ordered(order: number, op: Exclude<Operator, '==' | '!='>): boolean {
  switch (op) {
    case '<': return order < 0;
    case '>': return order > 0;
    case '<=': return order <= 0;
    case '>=': return order >= 0;
  }
}

// Ordering applies only to two numbers or two strings.
function compare(value: EventValue, op: Operator, threshold: Scalar): boolean {
  if (op === '==') return value === threshold;
  if (op === '!=') return value !== threshold;
  if (typeof value === 'number' && typeof threshold === 'number') return ordered(value - threshold, op);
  if (typeof value === 'string' && typeof threshold === 'string') {
    return ordered(value < threshold ? -1 : value > threshold ? 1 : 0, op);
  }
  return false;
}

export class Condition {
  readonly path: FieldPath;
  readonly operator: Operator;

  constructor(
    readonly detector: string,
    readonly field: string,
    operator: string,
    readonly threshold: Scalar,
    readonly durationSeconds = 0,
  ) {
    const op = OPERATORS.find(o => o === operator);
    if (!op) throw new InvalidConditionError(`unknown operator "${operator}"`);
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new InvalidConditionError(`duration_seconds must be >= 0, got ${durationSeconds}`);
    }
    this.operator = op;
    this.path = parseFieldPath(field);
  }

  evaluate(event: Event): boolean {
    if (event.detector !== this.detector) return false;
    const r = resolveFieldPath(event, this.path);
    if (!r.found || r.value === null) return false;
    return compare(r.value, this.operator, this.threshold);
  }
}

// Timer slots run parallel to `conditions`; null means not currently true.
type RuleState = {
  conditionSince: (number | null)[];
  ruleSince: number | null;
  lastTriggered: number | null;
};

export type RuleInit = {
  name: string;
  conditions: Condition[];
  severity?: Severity;
  combine?: Combine;
  durationSeconds?: number;
  cooldownSeconds?: number;
  messageTemplate?: string;
};

function renderValue(v: EventValue): string {
  return v !== null && typeof v === 'object' ? JSON.stringify(v) : String(v);
}

/**
 * Named set of conditions with sustained-truth timers and a cooldown.
 * IDLE -> CONDITION_PENDING -> TRIGGERED -> cooldown -> IDLE.
 */
export class Rule {
  readonly name: string;
  readonly conditions: readonly Condition[];
  readonly severity: Severity;
  readonly combine: Combine;
  readonly durationSeconds: number;
  readonly cooldownSeconds: number;
  readonly messageTemplate: string;
  private state: RuleState;

  constructor(init: RuleInit) {
    this.name = init.name;
    this.conditions = [...init.conditions];
    this.severity = init.severity ?? 'critical';
    this.combine = init.combine ?? 'all';
    this.durationSeconds = init.durationSeconds ?? 0;
    this.cooldownSeconds = init.cooldownSeconds ?? 30;
    this.messageTemplate = init.messageTemplate ?? '';
    this.state = this.freshState();
  }

  static fromConfig(cfg: AlertRuleConfig): Rule {
    return new Rule({
      name: cfg.name,
      conditions: cfg.conditions.map(c => new Condition(c.detector, c.field, c.operator, c.value, c.duration_seconds ?? 0)),
      severity: cfg.severity,
      combine: cfg.combine,
      durationSeconds: cfg.duration_seconds,
      cooldownSeconds: cfg.cooldown_seconds,
      messageTemplate: cfg.message,
    });
  }

  get lastTriggered(): number | null { return this.state.lastTriggered; }

  private freshState(): RuleState {
    return { conditionSince: this.conditions.map(() => null), ruleSince: null, lastTriggered: null };
  }

  evaluate(current: ReadonlyMap<string, Event>, now: number): Alert | null {
    const st = this.state;
    if (st.lastTriggered !== null && now - st.lastTriggered < this.cooldownSeconds) return null;

    const results = this.conditions.map((cond, i) => {
      const event = current.get(cond.detector);
      let ok = event ? cond.evaluate(event) : false;
      if (cond.durationSeconds > 0) {
        if (ok) {
          const since = st.conditionSince[i] ?? now;
          st.conditionSince[i] = since;
          ok = now - since >= cond.durationSeconds;
        } else {
          st.conditionSince[i] = null;
        }
      }
      return ok;
    });

    let triggered = this.combine === 'all'
      ? results.length > 0 && results.every(Boolean)
      : results.some(Boolean);

    if (!triggered) {
      st.ruleSince = null;
      return null;
    }
    if (this.durationSeconds > 0) {
      st.ruleSince = st.ruleSince ?? now;
      triggered = now - st.ruleSince >= this.durationSeconds;
      if (!triggered) return null;
    }

    this.state = { ...this.freshState(), lastTriggered: now };
    return Alert.create({
      severity: this.severity,
      ruleName: this.name,
      message: this.renderMessage(current),
      contributingEvents: [...current.values()],
      now,
    });
  }

  renderMessage(current: ReadonlyMap<string, Event>): string {
    let message = this.messageTemplate || `Alert: ${this.name}`;
    for (const event of current.values()) {
      for (const [key, value] of Object.entries(event.value)) {
        const rendered = renderValue(value);
        message = message.replaceAll(`{${key}}`, () => rendered);
      }
    }
    return message;
  }

  reset(): void {
    this.state = this.freshState();
  }
}
