import { LLMProvider, LLMCompletionRequest, LLMCompletionResponse, LLMModelInfo } from '../types';
import { ProviderSettings } from '../../config/types';
import { UpstreamError } from '../../gateway/errors';
import { logger } from '../../observability/logger';

interface OllamaGenerateResponse {
  model?: string;
  response?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

function isGenerateResponse(value: unknown): value is OllamaGenerateResponse {
  return typeof value === 'object' && value !== null && 'response' in value && typeof value.response === 'string';
}

interface OllamaTag {
  name: string;
  size?: number;
  modified_at?: string;
}

function isOllamaTag(value: unknown): value is OllamaTag {
  return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string';
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Ollama provider adapter (local models, no API key, no cost).
 *
 * Uses the non-streaming `/api/generate` endpoint. Messages are flattened
 * into a single prompt; system messages go to the `system` field.
 * Token counts fall back to word counts when Ollama omits them.
 */
export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama' as const;
  readonly model: string;
  private readonly host: string;
  private readonly settings: ProviderSettings;
  private readonly log = logger.child({ component: 'ollama-provider' });

  constructor(settings: ProviderSettings) {
    this.model = settings.model;
    this.host = (settings.host ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.settings = settings;
  }

  async complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse> {
    const start = Date.now();

    const system = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const prompt = request.messages
      .filter((m) => m.role !== 'system')
      .map((m) => m.content)
      .join('\n\n');

    let res: Response;
    try {
      res = await fetch(`${this.host}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt,
          system: system || undefined,
          stream: false,
          ...(request.jsonMode ? { format: 'json' } : {}),
          options: {
            temperature: request.temperature ?? this.settings.temperature,
            num_predict: request.maxTokens ?? this.settings.maxTokens,
          },
        }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new UpstreamError(`Cannot connect to Ollama at ${this.host}`, this.name);
    }

    if (!res.ok) {
      throw new UpstreamError(`Ollama responded with HTTP ${res.status}`, this.name, res.status);
    }

    const data: unknown = await res.json();
    if (!isGenerateResponse(data)) {
      throw new UpstreamError('Ollama returned an unexpected body', this.name, res.status);
    }

    const content = data.response ?? '';
    const promptTokens = data.prompt_eval_count ?? countWords(`${system} ${prompt}`);
    const completionTokens = data.eval_count ?? countWords(content);

    return {
      content,
      model: data.model ?? this.model,
      provider: 'ollama',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.host}/api/tags`, { signal: AbortSignal.timeout(5_000) });
      return res.ok;
    } catch (err) {
      this.log.warn({ err, host: this.host }, 'Ollama health check failed');
      return false;
    }
  }

  async listModels(): Promise<LLMModelInfo[]> {
    let res: Response;
    try {
      res = await fetch(`${this.host}/api/tags`, { signal: AbortSignal.timeout(5_000) });
    } catch {
      throw new UpstreamError(`Cannot connect to Ollama at ${this.host}`, this.name);
    }
    if (!res.ok) {
      throw new UpstreamError(`Ollama responded with HTTP ${res.status}`, this.name, res.status);
    }

    const data: unknown = await res.json();
    const models = typeof data === 'object' && data !== null && 'models' in data ? data.models : undefined;
    if (!Array.isArray(models)) {
      throw new UpstreamError('Ollama returned an unexpected tag list', this.name, res.status);
    }
    return models.filter(isOllamaTag).map((m) => ({
      name: m.name,
      size: typeof m.size === 'number' ? m.size : 0,
      modifiedAt: typeof m.modified_at === 'string' ? m.modified_at : '',
    }));
  }
}
