import { nowSeconds, type Event } from './event.js';

// Bounded, arrival-ordered window of recent events; oldest evicted first.
export class EventBuffer {
  private events: Event[] = [];
  readonly capacity: number;

  constructor(capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`buffer capacity must be a positive integer, got ${capacity}`);
    this.capacity = capacity;
  }

  append(event: Event): void {
    this.events.push(event);
    if (this.events.length > this.capacity) this.events.shift();
  }

  get size(): number { return this.events.length; }

  /** Events stamped within the last `seconds` (inclusive). */
  getRecent(seconds: number, now = nowSeconds()): Event[] {
    const cutoff = now - seconds;
    return this.events.filter(e => e.timestamp >= cutoff);
  }

  getByDetector(detector: string, limit?: number): Event[] {
    const out = this.events.filter(e => e.detector === detector);
    if (limit == null) return out;
    return limit > 0 ? out.slice(-limit) : [];
  }

  getLatest(detector: string): Event | null {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const e = this.events[i];
      if (e && e.detector === detector) return e;
    }
    return null;
  }

  getAllLatest(): Record<string, Event> {
    const out: Record<string, Event> = {};
    for (const e of this.events) out[e.detector] = e;
    return out;
  }

  toArray(): Event[] { return [...this.events]; }

  clear(): void { this.events = []; }
}
