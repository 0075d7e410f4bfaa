/**
 * AI Gateway
 *
 * One entry point per AI tool call:
 *   cache → circuit breaker → budget → upstream (bounded by a timeout) → fallback
 *
 * A cache hit skips breaker and budget entirely. Every other path ends in
 * either a fresh upstream answer or the tool's deterministic fallback, so
 * invoke() always resolves with a RequestOutcome.
 */

import { v4 as uuidv4 } from 'uuid';
import { buildCacheKey } from '../cache/cache-key';
import { costOfUsage, estimateCost } from '../budget/pricing';
import { getDefaultFallback } from '../resilience/static-fallbacks';
import { ToolArgs, ToolDefinition, ToolSummary } from '../tools/types';
import { LLMCompletionResponse } from '../llm/types';
import { childLogger, Logger } from '../observability/logger';
import {
  gatewayRequestsTotal,
  fallbackReasonsTotal,
  upstreamDuration,
  tokensTotal,
} from '../observability/metrics';
import { MalformedUpstreamResponseError, UpstreamTimeoutError } from './errors';
import { SingleFlight } from './single-flight';
import {
  FallbackReason,
  GatewayDependencies,
  InvokeOptions,
  RequestOutcome,
} from './types';

type UpstreamAttempt =
  | { ok: true; value: unknown; cost: number }
  | { ok: false; reason: FallbackReason; error: Error };

/** Miss-path result before per-caller latency/cost are applied */
type MissResult = Omit<RequestOutcome, 'latencyMs'>;

export class AIGateway {
  private readonly deps: GatewayDependencies;
  private readonly now: () => number;
  private readonly flights = new SingleFlight<MissResult>();

  constructor(deps: GatewayDependencies) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  get provider(): string {
    return this.deps.provider.name;
  }

  hasTool(name: string): boolean {
    return this.deps.registry.has(name);
  }

  listTools(): ToolSummary[] {
    return this.deps.registry.list();
  }

  async invoke(toolName: string, args: unknown, options: InvokeOptions = {}): Promise<RequestOutcome> {
    const start = this.now();
    const log = childLogger(options.requestId ?? uuidv4(), { component: 'ai-gateway', tool: toolName });

    const registered = this.deps.registry.get(toolName);
    if (!registered) {
      log.warn('Unknown tool requested');
      return this.finish('unknown', { source: 'fallback', value: getDefaultFallback(), cost: 0, reason: 'unknown_tool' }, start, log);
    }

    const tool = registered.definition;
    const prepared = registered.prepare(args);
    if (!prepared.ok) {
      log.warn({ error: prepared.error }, 'Tool arguments failed validation');
      return this.finish(
        tool.name,
        { source: 'fallback', value: getDefaultFallback(), cost: 0, reason: 'invalid_arguments', detail: prepared.error },
        start,
        log,
      );
    }

    const key = buildCacheKey(tool.name, prepared.args);
    const cached = await this.cacheGet(key, log);
    if (cached !== null) {
      log.debug({ key }, 'Cache hit');
      return this.finish(tool.name, { source: 'cache', value: cached, cost: 0 }, start, log);
    }

    if (!this.deps.settings.singleFlight) {
      const result = await this.resolveMiss(tool, prepared.args, key, options, log);
      return this.finish(tool.name, result, start, log);
    }

    const { result, shared } = await this.flights.run(key, () =>
      this.resolveMiss(tool, prepared.args, key, options, log),
    );
    if (shared) log.debug({ key }, 'Joined in-flight upstream call');
    // Only the caller that started the flight paid for it
    return this.finish(tool.name, shared ? { ...result, cost: 0 } : result, start, log);
  }

  /** The rule-based arm of an experiment: the tool's fallback, without touching AI */
  async runRuleBased(toolName: string, args: unknown, requestId?: string): Promise<RequestOutcome> {
    const start = this.now();
    const log = childLogger(requestId ?? uuidv4(), { component: 'ai-gateway', tool: toolName });

    const registered = this.deps.registry.get(toolName);
    if (!registered) {
      return this.finish('unknown', { source: 'fallback', value: getDefaultFallback(), cost: 0, reason: 'unknown_tool' }, start, log);
    }
    const prepared = registered.prepare(args);
    if (!prepared.ok) {
      return this.finish(
        registered.definition.name,
        { source: 'fallback', value: getDefaultFallback(), cost: 0, reason: 'invalid_arguments', detail: prepared.error },
        start,
        log,
      );
    }
    return this.finish(
      registered.definition.name,
      this.fallback(registered.definition, prepared.args, 'rule_based', log),
      start,
      log,
    );
  }

  // ───── Miss path ────────────────────────────────────────────────

  private async resolveMiss(
    tool: ToolDefinition,
    args: ToolArgs,
    key: string,
    options: InvokeOptions,
    log: Logger,
  ): Promise<MissResult> {
    const { breaker, meter } = this.deps;

    if (!breaker.allow()) {
      log.info({ breaker: breaker.status }, 'Circuit open; serving fallback');
      return this.fallback(tool, args, 'breaker_open', log);
    }

    const estimate = this.estimateFor(tool, options.estimatedCost, log);
    const reservation = meter.reserve(estimate);
    if (!reservation) {
      // The breaker slot (if this was the half-open trial) was never used
      breaker.releaseTrial();
      return this.fallback(tool, args, 'budget_exceeded', log);
    }

    const attempt = await this.callUpstream(tool, args, log);
    if (!attempt.ok) {
      breaker.recordFailure(attempt.error.message);
      reservation.release();
      log.warn({ err: attempt.error, reason: attempt.reason }, 'Upstream call failed; serving fallback');
      return this.fallback(tool, args, attempt.reason, log);
    }

    breaker.recordSuccess();
    reservation.commit(attempt.cost);
    await this.cacheSet(key, attempt.value, options.ttlSeconds ?? this.deps.settings.cacheTtlSeconds, log);
    return { source: 'upstream', value: attempt.value, cost: attempt.cost };
  }

  private async callUpstream(tool: ToolDefinition, args: ToolArgs, log: Logger): Promise<UpstreamAttempt> {
    const { provider, pricing } = this.deps;
    const timeoutMs = this.deps.settings.upstreamTimeoutSeconds * 1000;
    const controller = new AbortController();
    const endTimer = upstreamDuration.startTimer({ tool: tool.name, provider: provider.name });
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new UpstreamTimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const response: LLMCompletionResponse = await Promise.race([
        provider.complete(tool.buildRequest(args), controller.signal),
        deadline,
      ]);
      const value = tool.parse(response.content, args);
      const cost = costOfUsage(provider.name, response.usage, pricing);

      tokensTotal.inc({ provider: provider.name, token_type: 'prompt' }, response.usage.promptTokens);
      tokensTotal.inc({ provider: provider.name, token_type: 'completion' }, response.usage.completionTokens);
      endTimer({ status: 'success' });
      log.info(
        { model: response.model, tokens: response.usage.totalTokens, cost, latencyMs: response.latencyMs },
        'Upstream call succeeded',
      );
      return { ok: true, value, cost };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const reason: FallbackReason =
        error instanceof UpstreamTimeoutError
          ? 'upstream_timeout'
          : error instanceof MalformedUpstreamResponseError
            ? 'malformed_response'
            : 'upstream_failure';
      endTimer({ status: reason });
      return { ok: false, reason, error };
    } finally {
      clearTimeout(timer);
    }
  }

  private estimateFor(tool: ToolDefinition, requested: number | undefined, log: Logger): number {
    if (requested !== undefined) {
      if (Number.isFinite(requested) && requested >= 0) return requested;
      log.warn({ requested }, 'Ignoring invalid estimatedCost; using tool default');
    }
    return estimateCost(this.deps.provider.name, tool.estimatedTokens, this.deps.pricing);
  }

  // ───── Fallback ─────────────────────────────────────────────────

  private fallback(tool: ToolDefinition, args: ToolArgs, reason: FallbackReason, log: Logger): MissResult {
    let value: unknown;
    try {
      value = tool.fallback(args);
    } catch (err) {
      log.error({ err }, 'Tool fallback threw; using generic fallback');
      value = getDefaultFallback();
    }
    return { source: 'fallback', value, cost: 0, reason };
  }

  // ───── Cache (soft-failing) ─────────────────────────────────────

  private async cacheGet(key: string, log: Logger): Promise<unknown> {
    try {
      return await this.deps.cache.get(key);
    } catch (err) {
      log.warn({ err, key }, 'Cache unavailable; treating as miss');
      return null;
    }
  }

  private async cacheSet(key: string, value: unknown, ttlSeconds: number, log: Logger): Promise<void> {
    try {
      await this.deps.cache.set(key, value, ttlSeconds);
    } catch (err) {
      log.warn({ err, key }, 'Cache write failed');
    }
  }

  private finish(metricTool: string, result: MissResult, start: number, log: Logger): RequestOutcome {
    const outcome: RequestOutcome = { ...result, latencyMs: Math.max(0, this.now() - start) };
    gatewayRequestsTotal.inc({ tool: metricTool, source: outcome.source });
    if (outcome.reason) {
      fallbackReasonsTotal.inc({ tool: metricTool, reason: outcome.reason });
    }
    log.debug({ source: outcome.source, reason: outcome.reason, cost: outcome.cost }, 'Invocation finished');
    return outcome;
  }
}
