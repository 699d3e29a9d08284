import { Redis } from 'ioredis';
import { Event } from '../events/event.js';
import { errMessage, log } from '../observability/log.js';
import { busDropped } from '../observability/metrics.js';
import { DEFAULT_SUBSCRIBER_OPTIONS, SubscriberHub, type SubscriberOptions } from './hub.js';
import { BusClosedError, normalizeTopics, type EventBus, type Publisher, type Subscriber } from './types.js';

// The slice of the ioredis client the transport uses; tests hand in an in-process broker.
export interface RedisPubSubClient {
  publish(channel: string, message: Buffer): Promise<number>;
  psubscribe(...patterns: string[]): Promise<unknown>;
  punsubscribe(...patterns: string[]): Promise<unknown>;
  on(event: 'pmessageBuffer', listener: (pattern: Buffer, channel: Buffer, message: Buffer) => void): unknown;
  quit(): Promise<unknown>;
}

export type RedisBusOptions = Partial<SubscriberOptions> & { channelPrefix?: string };

export const DEFAULT_CHANNEL_PREFIX = 'cribwatch:events:';

class RedisPublisher implements Publisher {
  private closed = false;
  constructor(private readonly bus: RedisEventBus) {}
  async send(event: Event): Promise<void> {
    if (this.closed) throw new BusClosedError('publisher is closed');
    await this.bus.publish(event);
  }
  close(): void { this.closed = true; }
}

/**
 * Cross-process transport over Redis pub/sub. Frames are the MessagePack form
 * of an Event on channel `<prefix><detector>`. One pattern subscription feeds
 * the local subscriber registry, so per-subscriber semantics match MemoryEventBus.
 */
export class RedisEventBus implements EventBus {
  private readonly hub: SubscriberHub;
  private readonly prefix: string;
  private subscribed: Promise<void> | null = null;
  private closed = false;

  constructor(private readonly pub: RedisPubSubClient, private readonly sub: RedisPubSubClient, opts: RedisBusOptions = {}) {
    const { channelPrefix, ...subOpts } = opts;
    this.prefix = channelPrefix ?? DEFAULT_CHANNEL_PREFIX;
    this.hub = new SubscriberHub({ ...DEFAULT_SUBSCRIBER_OPTIONS, ...subOpts });
    this.sub.on('pmessageBuffer', (_pattern, channel, message) => this.onFrame(channel, message));
  }

  static fromUrl(url: string, opts: RedisBusOptions = {}): RedisEventBus {
    const pub = new Redis(url, { maxRetriesPerRequest: null });
    const sub = new Redis(url, { maxRetriesPerRequest: null });
    return new RedisEventBus(pub, sub, opts);
  }

  private get pattern(): string { return `${this.prefix}*`; }

  start(): Promise<void> {
    if (this.closed) return Promise.reject(new BusClosedError());
    if (!this.subscribed) {
      this.subscribed = this.sub.psubscribe(this.pattern).then(() => {
        log.info('bus.redis.subscribed', { pattern: this.pattern });
      });
    }
    return this.subscribed;
  }

  createPublisher(): Publisher {
    if (this.closed) throw new BusClosedError();
    return new RedisPublisher(this);
  }

  createSubscriber(topics?: Iterable<string> | null): Subscriber {
    if (this.closed) throw new BusClosedError();
    return this.hub.create(normalizeTopics(topics));
  }

  async publish(event: Event): Promise<void> {
    if (this.closed) throw new BusClosedError();
    const bytes = event.toBytes();
    await this.pub.publish(this.prefix + event.detector, Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  }

  private onFrame(channel: Buffer, message: Buffer): void {
    if (this.closed) return;
    const topic = channel.toString('utf8').slice(this.prefix.length);
    let event: Event;
    try {
      event = Event.fromBytes(message);
    } catch (e) {
      busDropped.inc({ reason: 'undecodable' });
      log.warn('bus.redis.frame_dropped', { topic, error: errMessage(e) });
      return;
    }
    this.hub.dispatch(topic, event);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.hub.closeAll();
    if (this.subscribed) {
      await this.subscribed;
      await this.sub.punsubscribe(this.pattern);
    }
    await Promise.all([this.pub.quit(), this.sub.quit()]);
  }
}
