import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

// One registry for the whole process; served on /metrics by the status API.
export const registry = new Registry();

export const eventsProcessed = new Counter({
  name: 'cribwatch_events_processed_total',
  help: 'Events evaluated by the alert engine',
  labelNames: ['detector'] as const,
  registers: [registry],
});

export const fusedEmitted = new Counter({
  name: 'cribwatch_fused_emitted_total',
  help: 'Fused channel updates emitted',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const fusionErrors = new Counter({
  name: 'cribwatch_fusion_errors_total',
  help: 'Fusion rule evaluations that threw',
  labelNames: ['channel'] as const,
  registers: [registry],
});

export const alertsTriggered = new Counter({
  name: 'cribwatch_alerts_triggered_total',
  help: 'Alerts raised by rules',
  labelNames: ['rule', 'severity'] as const,
  registers: [registry],
});

export const notifierFailures = new Counter({
  name: 'cribwatch_notifier_failures_total',
  help: 'Notifier deliveries that returned false or threw',
  labelNames: ['notifier'] as const,
  registers: [registry],
});

export const subscriberErrors = new Counter({
  name: 'cribwatch_bus_callback_errors_total',
  help: 'Subscriber callbacks that threw',
  registers: [registry],
});

export const busDropped = new Counter({
  name: 'cribwatch_bus_dropped_total',
  help: 'Bus frames dropped (queue overflow or undecodable)',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const detectorsOffline = new Gauge({
  name: 'cribwatch_detectors_offline',
  help: 'Detectors currently past their liveness timeout',
  registers: [registry],
});

let defaultsOn = false;
export function enableDefaultMetrics(): void {
  if (defaultsOn) return;
  defaultsOn = true;
  collectDefaultMetrics({ register: registry });
}
