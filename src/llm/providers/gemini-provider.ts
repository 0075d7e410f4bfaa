import { GoogleGenerativeAI, Content } from '@google/generative-ai';
import { LLMProvider, LLMCompletionRequest, LLMCompletionResponse, LLMModelInfo } from '../types';
import { ProviderSettings } from '../../config/types';
import { logger } from '../../observability/logger';

/**
 * Google Gemini provider adapter.
 *
 * 1. System instruction is a separate parameter, not in the messages array.
 * 2. Role mapping: 'assistant' → 'model', 'user' stays 'user'.
 * 3. JSON mode via `generationConfig: { responseMimeType: 'application/json' }`.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private settings: ProviderSettings;
  private log = logger.child({ component: 'gemini-provider' });

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.settings = settings;
    this.genAI = new GoogleGenerativeAI(settings.apiKey);
  }

  async complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const systemInstruction = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    const contents: Content[] = [];
    for (const msg of request.messages) {
      if (msg.role === 'system') continue;
      const role = msg.role === 'assistant' ? 'model' : 'user';
      const prev = contents[contents.length - 1];
      if (prev && prev.role === role) {
        prev.parts.push({ text: msg.content });
      } else {
        contents.push({ role, parts: [{ text: msg.content }] });
      }
    }

    // Gemini requires the first message to be 'user'
    if (contents.length === 0 || contents[0].role !== 'user') {
      contents.unshift({ role: 'user', parts: [{ text: '(start)' }] });
    }

    const model = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: systemInstruction || undefined,
        generationConfig: {
          temperature: request.temperature ?? this.settings.temperature,
          maxOutputTokens: request.maxTokens ?? this.settings.maxTokens,
          ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.settings.timeoutMs },
    );

    const result = await model.generateContent({ contents }, { signal });
    const response = result.response;
    const content = response.text();

    if (!content) {
      throw new Error('Gemini returned empty response');
    }

    const usageMetadata = response.usageMetadata;

    return {
      content,
      model: this.model,
      provider: 'gemini',
      usage: {
        promptTokens: usageMetadata?.promptTokenCount ?? 0,
        completionTokens: usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model });
      const result = await model.generateContent('ping');
      return result.response.text().length > 0;
    } catch (err) {
      this.log.warn({ err }, 'Gemini health check failed');
      return false;
    }
  }

  // @google/generative-ai has no model listing call; report the configured model
  async listModels(): Promise<LLMModelInfo[]> {
    return [{ name: this.model }];
  }
}
