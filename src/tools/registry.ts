import Ajv, { ValidateFunction } from 'ajv';
import { ToolArgs, ToolDefinition, ToolSummary, PreparedArgs } from './types';
import { ConfigurationError } from '../gateway/errors';
import { logger } from '../observability/logger';
import { generateBlogTopicsTool } from './implementations/generate-blog-topics';
import { generateBlogOutlineTool } from './implementations/generate-blog-outline';
import { moderateContentTool } from './implementations/moderate-content';

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export class RegisteredTool {
  constructor(
    readonly definition: ToolDefinition,
    private readonly validate: ValidateFunction,
  ) {}

  /** Validate a copy of the arguments and fill in schema defaults */
  prepare(args: unknown): PreparedArgs {
    if (args === null || typeof args !== 'object' || Array.isArray(args)) {
      return { ok: false, error: 'arguments must be an object' };
    }
    let copy: ToolArgs;
    try {
      copy = structuredClone(Object.fromEntries(Object.entries(args)));
    } catch {
      return { ok: false, error: 'arguments must be plain JSON data' };
    }
    if (!this.validate(copy)) {
      const errors = this.validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
      return { ok: false, error: errors ?? 'invalid arguments' };
    }
    return { ok: true, args: copy };
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly ajv = new Ajv({ allErrors: true, useDefaults: true });

  /** Register a tool. Misconfigured tools fail here, at startup. */
  register<TArgs extends ToolArgs, TResult>(tool: ToolDefinition<TArgs, TResult>): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ConfigurationError(`Invalid tool name "${tool.name}" (expected ${TOOL_NAME_PATTERN})`);
    }
    if (this.tools.has(tool.name)) {
      throw new ConfigurationError(`Tool already registered: ${tool.name}`);
    }
    if (!Number.isFinite(tool.estimatedTokens) || tool.estimatedTokens < 0) {
      throw new ConfigurationError(`Tool "${tool.name}" needs a non-negative estimatedTokens`);
    }

    let validate: ValidateFunction;
    try {
      validate = this.ajv.compile(tool.inputSchema);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Tool "${tool.name}" has an invalid input schema: ${reason}`);
    }

    this.tools.set(tool.name, new RegisteredTool(tool, validate));
    logger.info({ tool: tool.name, version: tool.version }, 'Tool registered');
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolSummary[] {
    return Array.from(this.tools.values(), ({ definition }) => ({
      name: definition.name,
      version: definition.version,
      description: definition.description,
    }));
  }
}

export function registerBuiltinTools(registry: ToolRegistry): ToolRegistry {
  registry.register(generateBlogTopicsTool);
  registry.register(generateBlogOutlineTool);
  registry.register(moderateContentTool);
  return registry;
}

export function createToolRegistry(): ToolRegistry {
  return registerBuiltinTools(new ToolRegistry());
}
