import { EventEmitter } from 'node:events';
import type { RedisPubSubClient } from '../../src/bus/redis.js';

// In-process stand-in for a Redis server's pub/sub: prefix patterns only ("foo:*").
export class FakeBroker {
  readonly clients = new Set<FakeRedis>();

  client(): FakeRedis {
    const c = new FakeRedis(this);
    this.clients.add(c);
    return c;
  }

  publish(channel: string, message: Buffer): number {
    let n = 0;
    for (const c of this.clients) n += c.receive(channel, message);
    return n;
  }
}

export class FakeRedis extends EventEmitter implements RedisPubSubClient {
  readonly patterns = new Set<string>();
  quitCalled = false;

  constructor(private readonly broker: FakeBroker) {
    super();
  }

  async publish(channel: string, message: Buffer): Promise<number> {
    // Real delivery happens on a later tick.
    await Promise.resolve();
    return this.broker.publish(channel, message);
  }

  async psubscribe(...patterns: string[]): Promise<number> {
    for (const p of patterns) this.patterns.add(p);
    return this.patterns.size;
  }

  async punsubscribe(...patterns: string[]): Promise<number> {
    for (const p of patterns) this.patterns.delete(p);
    return this.patterns.size;
  }

  async quit(): Promise<'OK'> {
    this.quitCalled = true;
    this.broker.clients.delete(this);
    return 'OK';
  }

  receive(channel: string, message: Buffer): number {
    let n = 0;
    for (const p of this.patterns) {
      const matches = p.endsWith('*') ? channel.startsWith(p.slice(0, -1)) : channel === p;
      if (!matches) continue;
      this.emit('pmessageBuffer', Buffer.from(p), Buffer.from(channel), message);
      n++;
    }
    return n;
  }
}
