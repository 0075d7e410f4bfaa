import { CacheStore } from '../cache/types';
import { CostMeter } from '../budget/cost-meter';
import { PricingTable } from '../budget/pricing';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { ToolRegistry } from '../tools/registry';
import { LLMProvider } from '../llm/types';
import { GatewaySettings } from '../config/types';

export type OutcomeSource = 'cache' | 'upstream' | 'fallback';

export type FallbackReason =
  | 'breaker_open'
  | 'budget_exceeded'
  | 'upstream_failure'
  | 'upstream_timeout'
  | 'malformed_response'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'rule_based';

/** Result of one gateway invocation. Never an error. */
export interface RequestOutcome<T = unknown> {
  source: OutcomeSource;
  value: T;
  /** USD actually incurred by this caller; 0 for cache and fallback */
  cost: number;
  latencyMs: number;
  /** Set when source is 'fallback' */
  reason?: FallbackReason;
  /** Human-readable detail for invalid_arguments */
  detail?: string;
}

export interface InvokeOptions {
  /** Pre-call budget estimate (USD); defaults to the tool's token allowance priced for the provider */
  estimatedCost?: number;
  /** Cache TTL for a fresh upstream answer; defaults to settings.cacheTtlSeconds */
  ttlSeconds?: number;
  /** Correlation id for logs */
  requestId?: string;
}

export interface GatewayDependencies {
  registry: ToolRegistry;
  cache: CacheStore;
  meter: CostMeter;
  breaker: CircuitBreaker;
  provider: LLMProvider;
  settings: GatewaySettings;
  /** Per-1K-token overrides of the built-in price list */
  pricing?: PricingTable;
  now?: () => number;
}
