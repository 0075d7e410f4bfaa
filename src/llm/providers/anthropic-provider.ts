import Anthropic from '@anthropic-ai/sdk';
import { LLMProvider, LLMCompletionRequest, LLMCompletionResponse, LLMModelInfo } from '../types';
import { UpstreamError } from '../../gateway/errors';
import { ProviderSettings } from '../../config/types';
import { logger } from '../../observability/logger';

/**
 * Anthropic Claude provider adapter.
 *
 * 1. System message is passed as a separate `system` parameter, NOT in the messages array.
 * 2. Messages must alternate user/assistant; consecutive same-role messages are merged.
 * 3. JSON mode is requested through the system prompt.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private settings: ProviderSettings;
  private log = logger.child({ component: 'anthropic-provider' });

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.settings = settings;
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse> {
    const start = Date.now();

    let systemPrompt = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const claudeMessages: Array<{ role: 'user' | 'assistant'; content: string }> = [];
    for (const msg of request.messages) {
      if (msg.role === 'system') continue;
      const prev = claudeMessages[claudeMessages.length - 1];
      if (prev && prev.role === msg.role) {
        prev.content += '\n\n' + msg.content;
      } else {
        claudeMessages.push({ role: msg.role, content: msg.content });
      }
    }

    // Claude requires the first message to come from the user
    if (claudeMessages.length === 0 || claudeMessages[0].role !== 'user') {
      claudeMessages.unshift({ role: 'user', content: '(start)' });
    }

    if (request.jsonMode) {
      systemPrompt +=
        '\n\nRespond with valid JSON only. No markdown fences, no preamble, no explanation outside the JSON.';
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens ?? this.settings.maxTokens,
        temperature: request.temperature ?? this.settings.temperature,
        system: systemPrompt.trim() || undefined,
        messages: claudeMessages,
      },
      { signal },
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new Error('Anthropic returned no text content');
    }

    const inputTokens = response.usage?.input_tokens ?? 0;
    const outputTokens = response.usage?.output_tokens ?? 0;

    return {
      content: textBlock.text,
      model: response.model ?? this.model,
      provider: 'anthropic',
      usage: {
        promptTokens: inputTokens,
        completionTokens: outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.content.length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Anthropic health check failed');
      return false;
    }
  }

  async listModels(): Promise<LLMModelInfo[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map((m) => ({ name: m.id, modifiedAt: m.created_at }));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`Anthropic model listing failed: ${reason}`, this.name);
    }
  }
}
