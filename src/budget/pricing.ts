import { LLMProviderName, LLMTokenUsage } from '../llm/types';

// Approximate cost per 1K tokens (blended input/output), USD
export const COST_PER_1K_TOKENS: Record<LLMProviderName, number> = {
  ollama: 0,
  openai: 0.003,
  anthropic: 0.008,
  gemini: 0.001,
};

export type PricingTable = Partial<Record<LLMProviderName, number>>;

function rateFor(provider: LLMProviderName, table: PricingTable): number {
  return table[provider] ?? COST_PER_1K_TOKENS[provider];
}

/** Pre-call estimate for a token allowance */
export function estimateCost(provider: LLMProviderName, tokens: number, table: PricingTable = {}): number {
  return (tokens / 1000) * rateFor(provider, table);
}

/** Post-call cost from reported usage */
export function costOfUsage(provider: LLMProviderName, usage: LLMTokenUsage, table: PricingTable = {}): number {
  return (usage.totalTokens / 1000) * rateFor(provider, table);
}
