import { EventEmitter } from 'node:events';
import type { Event } from '../events/event.js';
import { errMessage, log } from '../observability/log.js';
import { busDropped, subscriberErrors } from '../observability/metrics.js';
import { topicMatches, type EventCallback, type Subscriber } from './types.js';

export type SubscriberOptions = {
  pollIntervalMs: number;
  maxQueue: number;
};

export const DEFAULT_SUBSCRIBER_OPTIONS: SubscriberOptions = { pollIntervalMs: 100, maxQueue: 10_000 };

type Delivery = { topic: string; event: Event };
type Phase = 'idle' | 'running' | 'stopped' | 'closed';

/**
 * Subscriber with its own FIFO queue. It accepts events from creation until
 * stop(), and run() drains the queue one awaited callback at a time.
 */
export class QueuedSubscriber implements Subscriber {
  private queue: Delivery[] = [];
  private callback: EventCallback | null = null;
  private phase: Phase = 'idle';
  private wake: (() => void) | null = null;

  constructor(
    readonly topics: ReadonlySet<string> | null,
    private readonly opts: SubscriberOptions,
    private readonly onClose: (s: QueuedSubscriber) => void,
  ) {}

  get running(): boolean { return this.phase === 'running'; }

  get pending(): number { return this.queue.length; }

  matches(topic: string): boolean { return topicMatches(this.topics, topic); }

  deliver(topic: string, event: Event): void {
    if (this.phase === 'stopped' || this.phase === 'closed') return;
    if (this.queue.length >= this.opts.maxQueue) {
      busDropped.inc({ reason: 'overflow' });
      return;
    }
    this.queue.push({ topic, event });
    this.wake?.();
  }

  setCallback(cb: EventCallback): void { this.callback = cb; }

  async run(): Promise<void> {
    if (this.phase !== 'idle') return;
    this.phase = 'running';
    while (this.phase === 'running') {
      const next = this.queue.shift();
      if (!next) {
        await this.waitForWork();
        continue;
      }
      await this.dispatch(next);
    }
  }

  stop(): void {
    if (this.phase === 'idle' || this.phase === 'running') this.phase = 'stopped';
    this.wake?.();
  }

  close(): void {
    if (this.phase === 'closed') return;
    this.stop();
    this.phase = 'closed';
    this.queue = [];
    this.onClose(this);
  }

  private async dispatch(d: Delivery): Promise<void> {
    const cb = this.callback;
    if (!cb) return;
    try {
      await cb(d.topic, d.event);
    } catch (e) {
      subscriberErrors.inc();
      log.warn('bus.callback.failed', { topic: d.topic, detector: d.event.detector, error: errMessage(e) });
    }
  }

  // Bounded wait so a stop() is always observed within one poll interval.
  private waitForWork(): Promise<void> {
    return new Promise(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const done = () => {
        if (timer) clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      this.wake = done;
      timer = setTimeout(done, this.opts.pollIntervalMs);
    });
  }
}

// Registry of live subscribers; emit() iterates a copy of the listener list.
export class SubscriberHub {
  private readonly emitter = new EventEmitter();
  private readonly listeners = new Map<QueuedSubscriber, (topic: string, event: Event) => void>();

  constructor(private readonly opts: SubscriberOptions = DEFAULT_SUBSCRIBER_OPTIONS) {
    this.emitter.setMaxListeners(0);
  }

  create(topics: ReadonlySet<string> | null): QueuedSubscriber {
    const sub = new QueuedSubscriber(topics, this.opts, s => this.unregister(s));
    const listener = (topic: string, event: Event) => {
      if (sub.matches(topic)) sub.deliver(topic, event);
    };
    this.listeners.set(sub, listener);
    this.emitter.on('event', listener);
    return sub;
  }

  dispatch(topic: string, event: Event): void {
    this.emitter.emit('event', topic, event);
  }

  get size(): number { return this.listeners.size; }

  closeAll(): void {
    for (const sub of [...this.listeners.keys()]) sub.close();
  }

  private unregister(sub: QueuedSubscriber): void {
    const l = this.listeners.get(sub);
    if (!l) return;
    this.emitter.off('event', l);
    this.listeners.delete(sub);
  }
}
