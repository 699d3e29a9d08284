import { AlertEngine, type AlertEngineSettings } from './alerts/engine.js';
import { MemoryEventBus } from './bus/memory.js';
import { RedisEventBus } from './bus/redis.js';
import type { EventBus } from './bus/types.js';
import { toAlertRules, toFusionRules, type BusSettings } from './config/settings.js';
import type { RulesFile } from './config/schema.js';
import type { Detector } from './detectors/base.js';
import type { Clock } from './events/event.js';
import { FusionEngine } from './fusion/engine.js';
import type { FusionSettings } from './fusion/types.js';
import type { Notifier } from './notifiers/types.js';
import { errMessage, log } from './observability/log.js';

export function createBus(settings: BusSettings): EventBus {
  const opts = { pollIntervalMs: settings.pollIntervalMs, maxQueue: settings.maxQueue };
  if (settings.kind === 'redis') return RedisEventBus.fromUrl(settings.redisUrl, { ...opts, channelPrefix: settings.channelPrefix });
  return new MemoryEventBus(opts);
}

export type PipelineOptions = {
  bus: EventBus;
  rules: RulesFile;
  fusion?: Partial<Omit<FusionSettings, 'rules'>>;
  alerts?: Partial<AlertEngineSettings>;
  notifiers?: Notifier[];
  detectors?: Detector[];
  clock?: Clock;
};

export type Pipeline = {
  bus: EventBus;
  fusion: FusionEngine;
  alerts: AlertEngine;
  detectors: Detector[];
  readonly started: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
};

/**
 * Detectors -> bus -> fusion (republishes fusion.*) -> alert engine.
 * Consumers start before producers and stop after them.
 */
export function createPipeline(opts: PipelineOptions): Pipeline {
  const fusion = new FusionEngine({
    bus: opts.bus,
    clock: opts.clock,
    settings: { ...opts.fusion, rules: toFusionRules(opts.rules) },
  });
  const alerts = new AlertEngine({
    bus: opts.bus,
    clock: opts.clock,
    settings: opts.alerts,
    rules: toAlertRules(opts.rules),
    notifiers: opts.notifiers,
  });
  const detectors = [...(opts.detectors ?? [])];
  let started = false;

  return {
    bus: opts.bus,
    fusion,
    alerts,
    detectors,
    get started() { return started; },
    async start() {
      if (started) return;
      await opts.bus.start();
      await alerts.start();
      await fusion.start();
      for (const d of detectors) await d.start();
      started = true;
      log.info('pipeline.started', { detectors: detectors.map(d => d.name) });
    },
    async stop() {
      if (!started) return;
      started = false;
      for (const d of detectors) {
        try {
          await d.stop();
        } catch (e) {
          log.warn('pipeline.detector.stop_failed', { detector: d.name, error: errMessage(e) });
        }
      }
      await fusion.stop();
      await alerts.stop();
      await opts.bus.close();
      log.info('pipeline.stopped');
    },
  };
}
