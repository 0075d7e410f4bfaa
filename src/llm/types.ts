// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'ollama' | 'openai' | 'anthropic' | 'gemini';

export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['ollama', 'openai', 'anthropic', 'gemini'];

export function isLLMProviderName(value: string): value is LLMProviderName {
  return (LLM_PROVIDER_NAMES as readonly string[]).includes(value);
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Hint providers to produce JSON output */
  jsonMode: boolean;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Raw text from the model */
  content: string;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  /** Token usage for cost tracking */
  usage: LLMTokenUsage;
  /** Wall-clock latency in milliseconds */
  latencyMs: number;
}

export interface LLMModelInfo {
  name: string;
  /** Bytes on disk, for locally hosted models */
  size?: number;
  modifiedAt?: string;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request. Must stop work when `signal` aborts.
   * Implementations map the generic message format to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse>;

  /** Lightweight connectivity check */
  healthCheck(): Promise<boolean>;

  /** Models the provider can serve; throws UpstreamError when it cannot be asked */
  listModels(): Promise<LLMModelInfo[]>;
}
