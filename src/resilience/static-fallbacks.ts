/**
 * Static fallback used when no tool-specific substitute can be produced
 * (unknown tool, arguments that fail validation, a tool fallback that throws).
 */

export interface GenericFallback {
  message: string;
}

const DEFAULT_MESSAGE =
  'AI features are temporarily unavailable, so this is a basic response. Please try again in a few minutes.';

export function getDefaultFallback(): GenericFallback {
  return { message: DEFAULT_MESSAGE };
}
