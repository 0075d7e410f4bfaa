import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { GatewaySettings, ProviderSettings } from './config/types';
import { loadExperimentsFile, resolveExperiments } from './config/config-service';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createCacheStore } from './cache/cache-service';
import { CacheStore } from './cache/types';
import { CostMeter } from './budget/cost-meter';
import { PricingTable } from './budget/pricing';
import { CircuitBreaker } from './resilience/circuit-breaker';
import { ExperimentRouter } from './experiment/experiment-router';
import { ExperimentDefinition } from './experiment/types';
import { createProvider } from './llm/provider-factory';
import { isLLMProviderName, LLMProvider, LLMProviderName } from './llm/types';
import { createToolRegistry } from './tools/registry';
import { AIGateway } from './gateway/ai-gateway';
import { ConfigurationError } from './gateway/errors';
import { registerGatewayRoutes } from './api/gateway-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface BuildAppOptions {
  /** Use this provider instead of the one named by AI_PROVIDER */
  provider?: LLMProvider;
  /** Use this Redis client instead of connecting to REDIS_URL */
  redis?: Redis;
  settings?: Partial<GatewaySettings>;
  /** Replaces the experiments file; the built-in ai_vs_rules experiment is always added */
  experiments?: ExperimentDefinition[];
  pricing?: PricingTable;
  now?: () => number;
}

export interface AppContext {
  app: FastifyInstance;
  gateway: AIGateway;
  cache: CacheStore;
  meter: CostMeter;
  breaker: CircuitBreaker;
  experiments: ExperimentRouter;
  redis?: Redis;
}

function settingsFromEnv(): GatewaySettings {
  return {
    cacheTtlSeconds: env.gateway.cacheTtlSeconds,
    dailyBudgetUsd: env.gateway.dailyBudgetUsd,
    breakerFailureThreshold: env.gateway.breakerFailureThreshold,
    breakerCooldownSeconds: env.gateway.breakerCooldownSeconds,
    upstreamTimeoutSeconds: env.gateway.upstreamTimeoutSeconds,
    singleFlight: env.gateway.singleFlight,
  };
}

function providerSettings(name: LLMProviderName, timeoutMs: number): ProviderSettings {
  switch (name) {
    case 'ollama':
      return { apiKey: '', host: env.ollama.host, model: env.ollama.model, maxTokens: env.ollama.maxTokens, temperature: env.ollama.temperature, timeoutMs };
    case 'openai':
      return { ...env.openai, timeoutMs };
    case 'anthropic':
      return { ...env.anthropic, timeoutMs };
    case 'gemini':
      return { ...env.gemini, timeoutMs };
  }
}

function providerFromEnv(timeoutMs: number): LLMProvider {
  const name = env.ai.provider;
  if (!isLLMProviderName(name)) {
    throw new ConfigurationError(`Unsupported AI_PROVIDER "${name}" (expected ollama, openai, anthropic or gemini)`);
  }
  return createProvider(name, providerSettings(name, timeoutMs));
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory cache');
    return undefined;
  }
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const settings: GatewaySettings = { ...settingsFromEnv(), ...options.settings };
  const now = options.now ?? Date.now;

  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = options.redis ?? (env.redis.url ? await connectRedis(env.redis.url) : undefined);
  const cache = createCacheStore(
    redis,
    { defaultTtlSeconds: settings.cacheTtlSeconds, keyPrefix: env.redis.keyPrefix },
    now,
  );

  const provider = options.provider ?? providerFromEnv(settings.upstreamTimeoutSeconds * 1000);
  const breaker = new CircuitBreaker(
    {
      target: provider.name,
      failureThreshold: settings.breakerFailureThreshold,
      cooldownMs: settings.breakerCooldownSeconds * 1000,
    },
    now,
  );
  const meter = new CostMeter(settings.dailyBudgetUsd, now);
  const experiments = new ExperimentRouter(
    resolveExperiments(env.gateway.experimentWeights, options.experiments ?? loadExperimentsFile()),
  );

  const gateway = new AIGateway({
    registry: createToolRegistry(),
    cache,
    meter,
    breaker,
    provider,
    settings,
    pricing: options.pricing,
    now,
  });

  registerGatewayRoutes(app, { gateway, experiments, meter, breaker, provider });
  registerHealthRoutes(app, { provider, breaker, redis });

  app.addHook('onClose', async () => {
    cache.close();
  });

  logger.info(
    {
      provider: provider.name,
      model: provider.model,
      cache: redis ? 'redis' : 'memory',
      dailyBudgetUsd: settings.dailyBudgetUsd,
      singleFlight: settings.singleFlight,
    },
    'AI gateway assembled',
  );

  return { app, gateway, cache, meter, breaker, experiments, redis };
}
