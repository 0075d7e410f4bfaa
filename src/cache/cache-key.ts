import { createHash } from 'crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const sortObject = (value: Record<string, unknown>): Record<string, unknown> =>
  Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {});

/**
 * JSON serialization with object keys sorted at every depth.
 * Array order is significant and preserved.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key: string, val: unknown) => (isPlainObject(val) ? sortObject(val) : val));
}

/**
 * Cache key for a tool call. Field order in `args` does not affect the key.
 */
export function buildCacheKey(tool: string, args: Record<string, unknown>): string {
  const digest = createHash('sha256').update(stableStringify({ tool, args })).digest('hex');
  return `tool:${tool}:${digest}`;
}
