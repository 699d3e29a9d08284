import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { buildApi } from './api/server.js';
import {
  loadRulesFile,
  readAlertEngineSettings,
  readApiSettings,
  readBusSettings,
  readFusionScalars,
  readPushSettings,
} from './config/settings.js';
import { MockDetector } from './detectors/mock.js';
import type { Detector } from './detectors/base.js';
import { ConsoleNotifier } from './notifiers/console.js';
import { PushNotifier } from './notifiers/push.js';
import type { Notifier } from './notifiers/types.js';
import { errMessage, log } from './observability/log.js';
import { enableDefaultMetrics } from './observability/metrics.js';
import { createBus, createPipeline } from './pipeline.js';
import { setupTracing, tracingEnabled } from './tracing.js';

process.on('uncaughtException', (e) => {
  log.error('process.uncaught_exception', { error: errMessage(e), stack: e.stack });
});
process.on('unhandledRejection', (e) => {
  log.error('process.unhandled_rejection', { error: errMessage(e) });
});

const stopTracing = tracingEnabled() ? await setupTracing('cribwatch') : async () => {};
enableDefaultMetrics();

const rules = loadRulesFile();
const bus = createBus(readBusSettings());

const notifiers: Notifier[] = [new ConsoleNotifier()];
const push = readPushSettings();
if (push.enabled) notifiers.push(new PushNotifier(push));

// Infant baselines; the real sensor front ends run as separate processes on the same bus.
const sessionId = randomUUID();
const detectors: Detector[] = process.env.MOCK_SENSORS === 'true'
  ? ['radar', 'bcg'].map(name => new MockDetector(name, {
    publisher: bus.createPublisher(),
    sessionId,
    updateRateHz: 2,
    baseRespirationRate: 32,
    baseHeartRate: 125,
  }))
  : [];

const pipeline = createPipeline({
  bus,
  rules,
  fusion: readFusionScalars(),
  alerts: readAlertEngineSettings(),
  notifiers,
  detectors,
});

pipeline.alerts.onDetectorOffline = (detector) => log.warn('pipeline.detector_offline', { detector });

const api = buildApi({ alerts: pipeline.alerts, fusion: pipeline.fusion, ready: () => pipeline.started });
const { port, host } = readApiSettings();

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('process.shutdown', { signal });
  try {
    await api.close();
    await pipeline.stop();
    await stopTracing();
  } catch (e) {
    log.error('process.shutdown.failed', { error: errMessage(e) });
    process.exitCode = 1;
  }
}
process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

try {
  await pipeline.start();
  await api.listen({ port, host });
  log.info('api.listening', { url: `http://${host}:${port}`, fusion_rules: rules.fusion.length, alert_rules: rules.alerts.length });
} catch (e) {
  log.error('process.start.failed', { error: errMessage(e) });
  await pipeline.stop();
  process.exit(1);
}
