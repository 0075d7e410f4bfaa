import client from 'prom-client';

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry, prefix: 'aigw_' });

export const gatewayRequestsTotal = new client.Counter({
  name: 'aigw_requests_total',
  help: 'Gateway invocations by tool and outcome source',
  labelNames: ['tool', 'source'] as const,
  registers: [registry],
});

export const fallbackReasonsTotal = new client.Counter({
  name: 'aigw_fallbacks_total',
  help: 'Fallback responses by tool and reason',
  labelNames: ['tool', 'reason'] as const,
  registers: [registry],
});

export const upstreamDuration = new client.Histogram({
  name: 'aigw_upstream_duration_seconds',
  help: 'Upstream AI call latency',
  labelNames: ['tool', 'provider', 'status'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
  registers: [registry],
});

export const tokensTotal = new client.Counter({
  name: 'aigw_tokens_total',
  help: 'Tokens consumed by upstream calls',
  labelNames: ['provider', 'token_type'] as const,
  registers: [registry],
});

export const costUsdTotal = new client.Counter({
  name: 'aigw_cost_usd_total',
  help: 'Actual upstream spend in USD',
  registers: [registry],
});

export const cacheHitsTotal = new client.Counter({
  name: 'aigw_cache_hits_total',
  help: 'Cache hits',
  labelNames: ['cache_type'] as const,
  registers: [registry],
});

export const cacheMissesTotal = new client.Counter({
  name: 'aigw_cache_misses_total',
  help: 'Cache misses (including unavailable cache)',
  labelNames: ['cache_type'] as const,
  registers: [registry],
});

/** 0 = closed, 1 = half_open, 2 = open */
export const breakerState = new client.Gauge({
  name: 'aigw_breaker_state',
  help: 'Circuit breaker state per upstream target',
  labelNames: ['target'] as const,
  registers: [registry],
});

export const httpRequestDuration = new client.Histogram({
  name: 'aigw_http_request_duration_seconds',
  help: 'HTTP request latency',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30],
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
