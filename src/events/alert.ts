import { randomUUID } from 'node:crypto';
import { nowSeconds, type Event, type EventDict } from './event.js';

export const SEVERITIES = ['info', 'warning', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type AlertDict = {
  id: string;
  severity: Severity;
  rule_name: string;
  message: string;
  contributing_events: EventDict[];
  created_at: number;
  acknowledged: boolean;
  acknowledged_at: number | null;
  resolved: boolean;
  resolved_at: number | null;
};

type AlertFields = {
  id: string;
  severity: Severity;
  ruleName: string;
  message: string;
  contributingEvents: readonly Event[];
  createdAt: number;
  acknowledged: boolean;
  acknowledgedAt: number | null;
  resolved: boolean;
  resolvedAt: number | null;
};

// Transitions return a new Alert; nothing is mutated after construction.
export class Alert {
  readonly id: string;
  readonly severity: Severity;
  readonly ruleName: string;
  readonly message: string;
  readonly contributingEvents: readonly Event[];
  readonly createdAt: number;
  readonly acknowledged: boolean;
  readonly acknowledgedAt: number | null;
  readonly resolved: boolean;
  readonly resolvedAt: number | null;

  private constructor(f: AlertFields) {
    this.id = f.id;
    this.severity = f.severity;
    this.ruleName = f.ruleName;
    this.message = f.message;
    this.contributingEvents = Object.freeze([...f.contributingEvents]);
    this.createdAt = f.createdAt;
    this.acknowledged = f.acknowledged;
    this.acknowledgedAt = f.acknowledgedAt;
    this.resolved = f.resolved;
    this.resolvedAt = f.resolvedAt;
    Object.freeze(this);
  }

  static create(opts: {
    severity: Severity;
    ruleName: string;
    message: string;
    contributingEvents?: readonly Event[];
    now?: number;
    id?: string;
  }): Alert {
    return new Alert({
      id: opts.id ?? randomUUID(),
      severity: opts.severity,
      ruleName: opts.ruleName,
      message: opts.message,
      contributingEvents: opts.contributingEvents ?? [],
      createdAt: opts.now ?? nowSeconds(),
      acknowledged: false,
      acknowledgedAt: null,
      resolved: false,
      resolvedAt: null,
    });
  }

  private fields(): AlertFields {
    return {
      id: this.id,
      severity: this.severity,
      ruleName: this.ruleName,
      message: this.message,
      contributingEvents: this.contributingEvents,
      createdAt: this.createdAt,
      acknowledged: this.acknowledged,
      acknowledgedAt: this.acknowledgedAt,
      resolved: this.resolved,
      resolvedAt: this.resolvedAt,
    };
  }

  acknowledge(now = nowSeconds()): Alert {
    return new Alert({ ...this.fields(), acknowledged: true, acknowledgedAt: now });
  }

  resolve(now = nowSeconds()): Alert {
    return new Alert({ ...this.fields(), resolved: true, resolvedAt: now });
  }

  toDict(): AlertDict {
    return {
      id: this.id,
      severity: this.severity,
      rule_name: this.ruleName,
      message: this.message,
      contributing_events: this.contributingEvents.map(e => e.toDict()),
      created_at: this.createdAt,
      acknowledged: this.acknowledged,
      acknowledged_at: this.acknowledgedAt,
      resolved: this.resolved,
      resolved_at: this.resolvedAt,
    };
  }
}

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, critical: 2 };
export function severityRank(s: Severity): number { return SEVERITY_RANK[s]; }
