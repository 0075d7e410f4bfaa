import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalNumber(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = Number(val);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric env var ${key}: "${val}"`);
  }
  return parsed;
}

function optionalInt(key: string, fallback: number): number {
  const parsed = optionalNumber(key, fallback);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Env var ${key} must be an integer, got "${parsed}"`);
  }
  return parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8081),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Gateway policy ─────
  gateway: {
    cacheTtlSeconds: optionalInt('CACHE_TTL_SECONDS', 3600),
    dailyBudgetUsd: optionalNumber('DAILY_BUDGET_USD', 5),
    breakerFailureThreshold: optionalInt('BREAKER_FAILURE_THRESHOLD', 5),
    breakerCooldownSeconds: optionalNumber('BREAKER_COOLDOWN_SECONDS', 60),
    upstreamTimeoutSeconds: optionalNumber('UPSTREAM_TIMEOUT_SECONDS', 30),
    experimentWeights: optional('EXPERIMENT_WEIGHTS', 'ai:50,rules:50'),
    singleFlight: optionalBool('SINGLE_FLIGHT_ENABLED', false),
  },

  // ───── LLM Providers ─────
  ai: {
    provider: optional('AI_PROVIDER', 'ollama'),
  },

  ollama: {
    host: optional('OLLAMA_HOST', 'http://localhost:11434'),
    model: optional('AI_MODEL', 'llama3.2'),
    maxTokens: optionalInt('OLLAMA_MAX_TOKENS', 1024),
    temperature: optionalNumber('OLLAMA_TEMPERATURE', 0.7),
  },

  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalNumber('OPENAI_TEMPERATURE', 0.7),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: optionalNumber('ANTHROPIC_TEMPERATURE', 0.7),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 1024),
    temperature: optionalNumber('GEMINI_TEMPERATURE', 0.7),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('CACHE_KEY_PREFIX', 'aigw:cache:'),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
