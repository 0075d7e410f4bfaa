import { FastifyInstance } from 'fastify';
import { AIGateway } from '../gateway/ai-gateway';
import { RequestOutcome } from '../gateway/types';
import { ExperimentRouter } from '../experiment/experiment-router';
import { AI_VS_RULES_EXPERIMENT } from '../experiment/types';
import { LLMProvider } from '../llm/types';
import { CostMeter } from '../budget/cost-meter';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { logger } from '../observability/logger';

/** Provenance exposed to HTTP clients; `upstream` is reported as `ai` */
export type ResponseSource = 'cache' | 'ai' | 'fallback';

export interface ToolCallResponse {
  source: ResponseSource;
  result: unknown;
  cost: number;
  latencyMs: number;
  variant?: string;
  reason?: string;
  requestId: string;
}

interface ToolCallBody {
  arguments: Record<string, unknown>;
  subjectId?: string;
}

function parseToolCallBody(body: unknown): ToolCallBody | string {
  if (body === undefined || body === null) return { arguments: {} };
  if (typeof body !== 'object' || Array.isArray(body)) return 'body must be a JSON object';

  let args: Record<string, unknown> = {};
  if ('arguments' in body && body.arguments !== undefined) {
    const raw = body.arguments;
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return 'arguments must be an object';
    args = Object.fromEntries(Object.entries(raw));
  }

  let subjectId: string | undefined;
  if ('subjectId' in body && body.subjectId !== undefined) {
    const raw = body.subjectId;
    if (typeof raw !== 'string' || raw.length === 0) return 'subjectId must be a non-empty string';
    subjectId = raw;
  }

  return { arguments: args, subjectId };
}

function toResponse(outcome: RequestOutcome, requestId: string, variant?: string): ToolCallResponse {
  return {
    source: outcome.source === 'upstream' ? 'ai' : outcome.source,
    result: outcome.value,
    cost: outcome.cost,
    latencyMs: outcome.latencyMs,
    ...(variant ? { variant } : {}),
    ...(outcome.reason ? { reason: outcome.reason } : {}),
    requestId,
  };
}

export interface GatewayRouteDependencies {
  gateway: AIGateway;
  experiments: ExperimentRouter;
  meter: CostMeter;
  breaker: CircuitBreaker;
  provider: LLMProvider;
}

export function registerGatewayRoutes(app: FastifyInstance, deps: GatewayRouteDependencies): void {
  const { gateway, experiments, meter, breaker, provider } = deps;

  /** Call an AI tool. Always 200 for known tools with valid arguments. */
  app.post<{ Params: { tool: string } }>('/api/tools/:tool', async (req, reply) => {
    const { tool } = req.params;
    if (!gateway.hasTool(tool)) {
      return reply.status(404).send({ error: `Unknown tool: ${tool}`, requestId: req.id });
    }

    const body = parseToolCallBody(req.body);
    if (typeof body === 'string') {
      return reply.status(400).send({ error: body, requestId: req.id });
    }

    let variant: string | undefined;
    if (body.subjectId && experiments.has(AI_VS_RULES_EXPERIMENT)) {
      variant = experiments.assign(AI_VS_RULES_EXPERIMENT, body.subjectId);
    }

    const outcome =
      variant === 'rules'
        ? await gateway.runRuleBased(tool, body.arguments, req.id)
        : await gateway.invoke(tool, body.arguments, { requestId: req.id });

    if (outcome.reason === 'invalid_arguments') {
      return reply.status(400).send({ error: `Invalid arguments: ${outcome.detail ?? ''}`, requestId: req.id });
    }
    return reply.send(toResponse(outcome, req.id, variant));
  });

  app.get('/api/tools', async () => ({ tools: gateway.listTools() }));

  app.get('/api/experiments', async () => ({ experiments: experiments.list() }));

  app.get<{ Params: { name: string; subjectId: string } }>(
    '/api/experiments/:name/assignments/:subjectId',
    async (req, reply) => {
      const { name, subjectId } = req.params;
      if (!experiments.has(name)) {
        return reply.status(404).send({ error: `Unknown experiment: ${name}` });
      }
      return reply.send(experiments.assignment(name, subjectId));
    },
  );

  /** Models the active provider offers, plus the one the gateway calls */
  app.get('/api/models', async (req, reply) => {
    try {
      const models = await provider.listModels();
      return reply.send({ provider: provider.name, models, default: provider.model });
    } catch (err) {
      logger.warn({ err, requestId: req.id, provider: provider.name }, 'Model listing failed');
      const reason = err instanceof Error ? err.message : String(err);
      return reply.status(502).send({ error: reason, requestId: req.id });
    }
  });

  app.get('/api/budget', async () => meter.snapshot());

  app.get('/api/breaker', async () => ({ provider: gateway.provider, ...breaker.getState() }));
}
