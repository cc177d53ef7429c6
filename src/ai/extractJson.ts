// src/ai/extractJson.ts

export type JsonMap = Record<string, unknown>;

function parseObject(text: string): JsonMap | null {
  try {
    const v: unknown = JSON.parse(text);
    if (typeof v === "object" && v !== null && !Array.isArray(v)) {
      return Object.fromEntries(Object.entries(v));
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Best-effort recovery of a JSON object from model output.
 * Tries the whole text, then the span from the first "{" to the last "}".
 * Returns {} when neither parses; callers supply their own defaults.
 */
export function extractJson(text: string | null | undefined): JsonMap {
  if (!text) return {};

  const whole = parseObject(text);
  if (whole) return whole;

  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last <= first) return {};

  return parseObject(text.slice(first, last + 1)) ?? {};
}
