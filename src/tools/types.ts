import { LLMCompletionRequest } from '../llm/types';

export type ToolArgs = Record<string, unknown>;

/**
 * An AI tool: how to ask the model, how to read its answer, and what to
 * answer when the model cannot be used.
 */
export interface ToolDefinition<TArgs extends ToolArgs = ToolArgs, TResult = unknown> {
  name: string;
  version: string;
  description: string;
  /** JSON Schema; `default` keywords are applied before the call */
  inputSchema: Record<string, unknown>;
  /** Token allowance used for the pre-call budget estimate */
  estimatedTokens: number;
  buildRequest(args: TArgs): LLMCompletionRequest;
  /** Turn model output into a result; throws MalformedUpstreamResponseError */
  parse(content: string, args: TArgs): TResult;
  /** Deterministic local substitute. Must not call out of process. */
  fallback(args: TArgs): TResult;
}

export interface ToolSummary {
  name: string;
  version: string;
  description: string;
}

export type PreparedArgs =
  | { ok: true; args: ToolArgs }
  | { ok: false; error: string };
