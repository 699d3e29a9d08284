import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { alertStateToDict, type AlertEngine } from '../alerts/engine.js';
import type { FusionEngine } from '../fusion/engine.js';
import { registry } from '../observability/metrics.js';

export type ApiDeps = {
  alerts: AlertEngine;
  fusion: FusionEngine;
  ready?: () => boolean;
  logger?: boolean;
};

const eventsQuery = z.object({
  detector: z.string().min(1).optional(),
  seconds: z.coerce.number().positive().default(60),
});

const historyQuery = z.object({ limit: z.coerce.number().int().nonnegative().default(50) });

const pauseBody = z.object({ seconds: z.coerce.number().nonnegative() });

const idParams = z.object({ id: z.string().min(1) });

function issues(e: z.ZodError): string {
  return e.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

/** Read-only status surface plus the operator actions (ack, resolve, pause). */
export function buildApi(deps: ApiDeps): FastifyInstance {
  const app = Fastify({ logger: deps.logger ?? false });
  const { alerts, fusion } = deps;

  app.get('/live', async () => ({ ok: true }));

  app.get('/ready', async (_req, reply) => {
    const ready = deps.ready ? deps.ready() : true;
    if (!ready) return reply.code(503).header('Retry-After', '5').send({ ready: false });
    return { ready: true };
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return reply.send(await registry.metrics());
  });

  app.get('/state', async () => alertStateToDict(alerts.getState()));

  app.get('/channels', async () => {
    const out: Record<string, unknown> = {};
    for (const [name, s] of Object.entries(fusion.getAllChannels())) {
      out[name] = {
        value: s.value,
        confidence: s.confidence,
        timestamp: s.timestamp,
        sources: s.sources,
        agreement: s.agreement,
        degraded: s.degraded,
      };
    }
    return out;
  });

  app.get('/events', async (req, reply) => {
    const q = eventsQuery.safeParse(req.query);
    if (!q.success) return reply.code(400).send({ ok: false, error: issues(q.error) });
    return alerts.getRecentEvents(q.data.detector, q.data.seconds).map(e => e.toDict());
  });

  app.get('/alerts', async () => alerts.getActiveAlerts().map(a => a.toDict()));

  app.get('/alerts/history', async (req, reply) => {
    const q = historyQuery.safeParse(req.query);
    if (!q.success) return reply.code(400).send({ ok: false, error: issues(q.error) });
    return alerts.getAlertHistory(q.data.limit).map(a => a.toDict());
  });

  app.post('/alerts/:id/ack', async (req, reply) => {
    const p = idParams.safeParse(req.params);
    if (!p.success || !(await alerts.acknowledgeAlert(p.data.id))) {
      return reply.code(404).send({ ok: false, error: 'alert not found' });
    }
    return { ok: true };
  });

  app.post('/alerts/:id/resolve', async (req, reply) => {
    const p = idParams.safeParse(req.params);
    if (!p.success || !(await alerts.resolveAlert(p.data.id))) {
      return reply.code(404).send({ ok: false, error: 'alert not found' });
    }
    return { ok: true };
  });

  app.post('/pause', async (req, reply) => {
    const b = pauseBody.safeParse(req.body ?? {});
    if (!b.success) return reply.code(400).send({ ok: false, error: issues(b.error) });
    alerts.pause(b.data.seconds);
    const s = alerts.getState();
    return { ok: true, paused: s.paused, pause_expires: s.pauseExpires };
  });

  app.post('/resume', async () => {
    alerts.resume();
    return { ok: true, paused: false };
  });

  return app;
}
