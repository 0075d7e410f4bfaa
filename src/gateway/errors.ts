// Error classes raised below the gateway. None of these reach callers of
// AIGateway.invoke; they are mapped to fallback reasons there.

/** Transport failure, 5xx, rate limit: anything worth retrying later */
export class UpstreamError extends Error {
  readonly provider: string;
  readonly status?: number;
  constructor(message: string, provider: string, status?: number) {
    super(message);
    this.name = 'UpstreamError';
    this.provider = provider;
    this.status = status;
  }
}

export class UpstreamTimeoutError extends Error {
  readonly timeoutMs: number;
  constructor(timeoutMs: number) {
    super(`Upstream call exceeded ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Upstream answered, but the content could not be turned into a tool result */
export class MalformedUpstreamResponseError extends Error {
  readonly tool: string;
  constructor(tool: string, message: string) {
    super(message);
    this.name = 'MalformedUpstreamResponseError';
    this.tool = tool;
  }
}

/** Startup-time misconfiguration (bad tool, bad experiment, bad env) */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
