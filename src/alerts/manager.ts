import type { Alert } from '../events/alert.js';
import { nowSeconds, type Clock } from '../events/event.js';

export const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Owns alert identity. Alerts are replaced by value on acknowledge/resolve;
 * resolved alerts move to a bounded history, oldest dropped first.
 */
export class AlertManager {
  private readonly active = new Map<string, Alert>();
  private history: Alert[] = [];
  private readonly resolvedIds = new Set<string>();

  constructor(private readonly maxHistory = DEFAULT_HISTORY_LIMIT, private readonly clock: Clock = nowSeconds) {
    if (!Number.isInteger(maxHistory) || maxHistory < 1) throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
  }

  /** False when the id is already active or still in history. */
  add(alert: Alert): boolean {
    if (this.active.has(alert.id) || this.resolvedIds.has(alert.id)) return false;
    this.active.set(alert.id, alert);
    return true;
  }

  acknowledge(id: string): Alert | null {
    const cur = this.active.get(id);
    if (!cur) return null;
    const next = cur.acknowledge(this.clock());
    this.active.set(id, next);
    return next;
  }

  resolve(id: string): Alert | null {
    const cur = this.active.get(id);
    if (!cur) return null;
    const done = cur.resolve(this.clock());
    this.active.delete(id);
    this.history.push(done);
    this.resolvedIds.add(id);
    if (this.history.length > this.maxHistory) {
      for (const dropped of this.history.slice(0, -this.maxHistory)) this.resolvedIds.delete(dropped.id);
      this.history = this.history.slice(-this.maxHistory);
    }
    return done;
  }

  getActive(): Alert[] {
    return [...this.active.values()];
  }

  getById(id: string): Alert | null {
    return this.active.get(id) ?? null;
  }

  getHistory(limit = 50): Alert[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  clearAll(): void {
    for (const id of [...this.active.keys()]) this.resolve(id);
  }
}
