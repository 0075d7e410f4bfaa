import { LLMProvider, LLMProviderName } from './types';
import { OllamaProvider } from './providers/ollama-provider';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { ProviderSettings } from '../config/types';
import { ConfigurationError } from '../gateway/errors';
import { logger } from '../observability/logger';

function instantiate(name: LLMProviderName, settings: ProviderSettings): LLMProvider {
  switch (name) {
    case 'ollama':
      return new OllamaProvider(settings);
    case 'openai':
      return new OpenAIProvider(settings);
    case 'anthropic':
      return new AnthropicProvider(settings);
    case 'gemini':
      return new GeminiProvider(settings);
  }
}

/**
 * Create a single LLM provider by name.
 * Hosted providers need an API key; Ollama runs locally without one.
 */
export function createProvider(name: LLMProviderName, settings: ProviderSettings): LLMProvider {
  if (name !== 'ollama' && !settings.apiKey) {
    throw new ConfigurationError(`AI_PROVIDER=${name} requires an API key`);
  }

  const provider = instantiate(name, settings);
  logger.child({ component: 'provider-factory' }).info(
    { provider: name, model: settings.model },
    'LLM provider initialized',
  );
  return provider;
}
