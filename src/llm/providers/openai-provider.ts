import OpenAI from 'openai';
import { LLMProvider, LLMCompletionRequest, LLMCompletionResponse, LLMModelInfo } from '../types';
import { UpstreamError } from '../../gateway/errors';
import { ProviderSettings } from '../../config/types';
import { logger } from '../../observability/logger';

/**
 * OpenAI provider adapter.
 *
 * JSON mode is handled via `response_format: { type: 'json_object' }`.
 * SDK retries are disabled: the gateway's circuit breaker decides when to try again.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private client: OpenAI;
  private settings: ProviderSettings;
  private log = logger.child({ component: 'openai-provider' });

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.settings = settings;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: request.temperature ?? this.settings.temperature,
        max_tokens: request.maxTokens ?? this.settings.maxTokens,
        ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal },
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('OpenAI returned empty response content');
    }

    const usage = completion.usage;

    return {
      content,
      model: completion.model ?? this.model,
      provider: 'openai',
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (err) {
      this.log.warn({ err }, 'OpenAI health check failed');
      return false;
    }
  }

  async listModels(): Promise<LLMModelInfo[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map((m) => ({ name: m.id, modifiedAt: new Date(m.created * 1000).toISOString() }));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`OpenAI model listing failed: ${reason}`, this.name);
    }
  }
}
