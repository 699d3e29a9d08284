import { describe, it, expect, vi } from 'vitest';
import { MemoryEventBus } from '../src/bus/memory.js';
import { parseRules } from '../src/config/settings.js';
import { MockDetector } from '../src/detectors/mock.js';
import type { Alert } from '../src/events/alert.js';
import { createBus, createPipeline } from '../src/pipeline.js';

const rules = parseRules({
  fusion: [{
    signal: 'respiration_rate',
    strategy: 'weighted_average',
    sources: [{ detector: 'radar', field: 'value.respiration_rate' }],
  }],
  alerts: [{
    name: 'apnea',
    message: 'Apnea: RR {respiration_rate}',
    conditions: [{ detector: 'fusion.respiration_rate', field: 'value.value', operator: '<', value: 8 }],
  }],
});

describe('pipeline', () => {
  it('turns a detector reading into a fused alert', async () => {
    const bus = new MemoryEventBus({ pollIntervalMs: 5 });
    const radar = new MockDetector('radar', { updateRateHz: 50, random: () => 0.5 });
    radar.injectAnomaly('apnea', 60);
    const pipeline = createPipeline({ bus, rules, detectors: [radar] });
    radar.publisher = bus.createPublisher();

    const raised: Alert[] = [];
    pipeline.alerts.onAlert = (a) => { raised.push(a); };
    await pipeline.start();
    expect(pipeline.started).toBe(true);

    await vi.waitFor(() => expect(raised.length).toBeGreaterThanOrEqual(1));
    const [alert] = raised;
    expect(alert?.ruleName).toBe('apnea');
    expect(alert?.message).toBe('Apnea: RR 2.8');
    expect(pipeline.fusion.getChannel('respiration_rate')?.value).toBe(2.8);
    expect(alert?.contributingEvents.map(e => e.detector)).toContain('fusion.respiration_rate');

    await pipeline.stop();
    expect(pipeline.started).toBe(false);
    expect(radar.status).toBe('stopped');
  });

  it('builds the configured bus', () => {
    const bus = createBus({ kind: 'memory', redisUrl: 'redis://127.0.0.1:6379', channelPrefix: 'x:', pollIntervalMs: 10, maxQueue: 5 });
    expect(bus).toBeInstanceOf(MemoryEventBus);
  });
});
