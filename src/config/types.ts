/**
 * Process-wide gateway configuration. Loaded once at startup.
 */

export interface GatewaySettings {
  /** TTL applied to cached upstream responses */
  cacheTtlSeconds: number;
  /** Spend ceiling per UTC day */
  dailyBudgetUsd: number;
  /** Consecutive failures that open the breaker */
  breakerFailureThreshold: number;
  /** Time an open breaker waits before allowing a trial call */
  breakerCooldownSeconds: number;
  /** Bound on every upstream call */
  upstreamTimeoutSeconds: number;
  /** Share concurrent same-key cache misses (off by default) */
  singleFlight: boolean;
}

export interface ProviderSettings {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Base URL for self-hosted providers (Ollama) */
  host?: string;
}

export const DEFAULT_GATEWAY_SETTINGS: GatewaySettings = {
  cacheTtlSeconds: 3600,
  dailyBudgetUsd: 5,
  breakerFailureThreshold: 5,
  breakerCooldownSeconds: 60,
  upstreamTimeoutSeconds: 30,
  singleFlight: false,
};
