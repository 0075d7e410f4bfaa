import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { LLMProvider } from '../llm/types';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { getMetrics, getContentType } from '../observability/metrics';

interface CheckResult {
  status: 'ok' | 'error' | 'skipped' | 'degraded';
  latencyMs?: number;
  detail?: string;
}

export interface HealthDependencies {
  provider: LLMProvider;
  breaker: CircuitBreaker;
  redis?: Redis;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDependencies): void {
  /** Liveness probe */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Readiness probe. Only the cache backend gates readiness: a down provider
   * or an open breaker still serves fallbacks.
   */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, CheckResult> = {};

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
      checks.redis = { status: 'skipped', detail: 'in-memory cache' };
    }

    const llmStart = Date.now();
    const providerUp = await deps.provider.healthCheck();
    checks[`llm_${deps.provider.name}`] = {
      status: providerUp ? 'ok' : 'degraded',
      latencyMs: Date.now() - llmStart,
    };

    const breakerStatus = deps.breaker.status;
    checks.breaker = {
      status: breakerStatus === 'closed' ? 'ok' : 'degraded',
      detail: breakerStatus,
    };

    const ready = checks.redis.status !== 'error';
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
