import type { Event } from '../events/event.js';

export const ALL_TOPICS = '*';

export type EventCallback = (topic: string, event: Event) => void | Promise<void>;

export interface Publisher {
  /** Resolves once the event is handed to the transport; no subscribers is not an error. */
  send(event: Event): Promise<void>;
  close(): void;
}

export interface Subscriber {
  readonly topics: ReadonlySet<string> | null;
  readonly running: boolean;
  setCallback(cb: EventCallback): void;
  /** Receive loop; resolves after stop() once the in-flight callback has finished. */
  run(): Promise<void>;
  stop(): void;
  close(): void;
}

export interface EventBus {
  start(): Promise<void>;
  createPublisher(): Publisher;
  createSubscriber(topics?: Iterable<string> | null): Subscriber;
  close(): Promise<void>;
}

export class BusClosedError extends Error {
  constructor(message = 'event bus is closed') {
    super(message);
    this.name = 'BusClosedError';
  }
}

export function normalizeTopics(topics?: Iterable<string> | null): ReadonlySet<string> | null {
  if (topics == null) return null;
  const set = new Set(topics);
  return set.has(ALL_TOPICS) ? null : set;
}

// Exact match, or prefix match for entries ending in '*'.
export function topicMatches(filter: ReadonlySet<string> | null, topic: string): boolean {
  if (filter === null) return true;
  if (filter.has(topic)) return true;
  for (const f of filter) {
    if (f.endsWith('*') && topic.startsWith(f.slice(0, -1))) return true;
  }
  return false;
}
