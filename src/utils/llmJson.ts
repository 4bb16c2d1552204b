/**
 * Helpers for pulling JSON out of free-form model output.
 * Models wrap answers in ``` fences or add prose around them; these
 * functions isolate the JSON part before it reaches JSON.parse.
 */

export function stripCodeFences(text: string): string {
  return text
    .replace(/```json\s*/gi, '')
    .replace(/```\s*/g, '')
    .trim();
}

/**
 * Return the first balanced {...} span, or null when there is none.
 * Braces inside string literals do not count toward the balance.
 */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

/** Substring from the first "[" to the last "]", or null. */
export function extractJsonArray(text: string): string | null {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

export type JsonParse =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function tryParseJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/** Fences stripped, first balanced object parsed. */
export function parseModelObject(raw: string): JsonParse {
  const cleaned = stripCodeFences(raw);
  const span = extractFirstJsonObject(cleaned);
  return tryParseJson(span ?? cleaned);
}

/** Fences stripped, outermost [...] parsed. */
export function parseModelArray(raw: string): JsonParse {
  const cleaned = stripCodeFences(raw);
  const span = extractJsonArray(cleaned);
  return tryParseJson(span ?? cleaned);
}
