import { NodeSDK } from '@opentelemetry/sdk-node';
import { trace } from '@opentelemetry/api';
import { JaegerExporter } from '@opentelemetry/exporter-jaeger';
import { errMessage, log } from './observability/log.js';

export function tracingEnabled(): boolean {
  return process.env.TRACING_ENABLED === 'true';
}

// Starts the OpenTelemetry SDK; spans from `trace.getTracer` are no-ops until this runs.
export async function setupTracing(serviceName: string): Promise<() => Promise<void>> {
  const jaegerEndpoint = process.env.JAEGER_ENDPOINT || 'http://127.0.0.1:14268/api/traces';
  if (!process.env.OTEL_SERVICE_NAME) {
    process.env.OTEL_SERVICE_NAME = serviceName;
  }

  const sdk = new NodeSDK({ traceExporter: new JaegerExporter({ endpoint: jaegerEndpoint }) });
  await sdk.start();
  trace.getTracer('startup').startSpan(`startup:${serviceName}`).end();
  log.info('tracing.started', { endpoint: jaegerEndpoint });

  return async () => {
    try {
      await sdk.shutdown();
    } catch (e) {
      log.warn('tracing.shutdown.failed', { error: errMessage(e) });
    }
  };
}
