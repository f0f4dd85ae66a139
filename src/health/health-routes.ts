import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { ModelRouter } from '../llm/model-router';
import { getMetrics, getContentType } from '../observability/metrics';

export interface HealthRouteDeps {
  redis?: Redis;
  router?: ModelRouter;
  /** Number of chunks currently indexed */
  indexedChunks?: () => number;
  enableMetrics: boolean;
}

type Check = { status: 'ok' | 'error' | 'skipped'; latencyMs?: number; detail?: string };

export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  /** Liveness check: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness check: checks Redis, the LLM providers and the knowledge index */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, Check> = {};

    if (deps.redis) {
      const start = Date.now();
      try {
        await deps.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch (err) {
        checks.redis = {
          status: 'error',
          latencyMs: Date.now() - start,
          detail: err instanceof Error ? err.message : String(err),
        };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    if (deps.router) {
      if (deps.router.isFullyOpen()) {
        checks.llm = { status: 'error', detail: 'all provider circuits open' };
      } else {
        const providerChecks = await deps.router.healthCheck();
        for (const [providerName, check] of Object.entries(providerChecks)) {
          checks[`llm_${providerName}`] = {
            status: check.status === 'ok' ? 'ok' : 'error',
            latencyMs: check.latencyMs,
          };
        }
      }
    } else {
      checks.llm = { status: 'skipped' };
    }

    if (deps.indexedChunks) {
      const count = deps.indexedChunks();
      checks.knowledge = count > 0
        ? { status: 'ok', detail: `${count} chunks` }
        : { status: 'error', detail: 'knowledge index is empty' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
