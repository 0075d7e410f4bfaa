import {
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMModelInfo,
  LLMProvider,
  LLMProviderName,
} from '../../src/llm/types';
import { UpstreamError } from '../../src/gateway/errors';

type Responder = (request: LLMCompletionRequest, signal?: AbortSignal) => Promise<LLMCompletionResponse>;

/** Scriptable in-process LLM provider */
export class FakeProvider implements LLMProvider {
  readonly model = 'fake-model';
  calls = 0;
  requests: LLMCompletionRequest[] = [];
  healthy = true;
  /** `undefined` makes `listModels` fail as an unreachable provider would */
  models: LLMModelInfo[] | undefined = [{ name: 'fake-model' }];

  constructor(
    private responder: Responder,
    readonly name: LLMProviderName = 'openai',
  ) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async complete(request: LLMCompletionRequest, signal?: AbortSignal): Promise<LLMCompletionResponse> {
    this.calls++;
    this.requests.push(request);
    return this.responder(request, signal);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async listModels(): Promise<LLMModelInfo[]> {
    if (!this.models) throw new UpstreamError('model listing unavailable', this.name, 503);
    return this.models;
  }
}

export function completion(content: string, totalTokens: number, name: LLMProviderName = 'openai'): LLMCompletionResponse {
  const promptTokens = Math.floor(totalTokens / 2);
  return {
    content,
    model: 'fake-model',
    provider: name,
    usage: { promptTokens, completionTokens: totalTokens - promptTokens, totalTokens },
    latencyMs: 5,
  };
}

export const replies = (content: string, totalTokens: number): Responder => async () =>
  completion(content, totalTokens);

export const fails = (message = 'connection refused'): Responder => async () => {
  throw new UpstreamError(message, 'openai', 503);
};

/** Never settles on its own; rejects once the gateway aborts it */
export const hangs = (): Responder => (_request, signal) =>
  new Promise<LLMCompletionResponse>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

/** A manually controlled clock */
export class FakeClock {
  constructor(public time: number = Date.UTC(2026, 0, 15, 12, 0, 0)) {}

  now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}
