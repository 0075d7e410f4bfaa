// Models often wrap JSON in prose or markdown fences; these pull out the
// outermost array/object and parse it.

function parseOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function extractJsonArray(content: string): unknown[] | null {
  const match = content.match(/\[[\s\S]*\]/);
  if (!match) return null;
  const parsed = parseOrNull(match[0]);
  return Array.isArray(parsed) ? parsed : null;
}

export function extractJsonObject(content: string): Record<string, unknown> | null {
  const match = content.match(/\{[\s\S]*\}/);
  if (!match) return null;
  const parsed = parseOrNull(match[0]);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}
