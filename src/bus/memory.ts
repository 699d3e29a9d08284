import type { Event } from '../events/event.js';
import { DEFAULT_SUBSCRIBER_OPTIONS, SubscriberHub, type QueuedSubscriber, type SubscriberOptions } from './hub.js';
import { BusClosedError, normalizeTopics, type EventBus, type Publisher } from './types.js';

class MemoryPublisher implements Publisher {
  private closed = false;
  constructor(private readonly bus: MemoryEventBus) {}
  async send(event: Event): Promise<void> {
    if (this.closed) throw new BusClosedError('publisher is closed');
    this.bus.dispatch(event);
  }
  close(): void { this.closed = true; }
}

/** Single-process transport: publishers and subscribers share one registry. */
export class MemoryEventBus implements EventBus {
  private readonly hub: SubscriberHub;
  private closed = false;

  constructor(opts: Partial<SubscriberOptions> = {}) {
    this.hub = new SubscriberHub({ ...DEFAULT_SUBSCRIBER_OPTIONS, ...opts });
  }

  async start(): Promise<void> {}

  createPublisher(): Publisher {
    if (this.closed) throw new BusClosedError();
    return new MemoryPublisher(this);
  }

  createSubscriber(topics?: Iterable<string> | null): QueuedSubscriber {
    if (this.closed) throw new BusClosedError();
    return this.hub.create(normalizeTopics(topics));
  }

  dispatch(event: Event): void {
    if (this.closed) throw new BusClosedError();
    this.hub.dispatch(event.detector, event);
  }

  get subscriberCount(): number { return this.hub.size; }

  async close(): Promise<void> {
    this.closed = true;
    this.hub.closeAll();
  }
}
