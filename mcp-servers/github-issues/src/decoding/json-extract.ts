/**
 * Recover a JSON object from free-form agent text
 */

/**
 * Remove a markdown code fence around a response
 */
export function stripCodeFence(response: string): string {
  return response.trim().replace(/^```json?\s*/i, '').replace(/\s*```$/i, '');
}

/**
 * Extract the first balanced {...} object, skipping braces inside strings
 */
export function extractBalancedJSON(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === '\\' && inString) {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.substring(start, i + 1);
      }
    }
  }

  return null;
}

function parseObject(candidate: string | null): Record<string, unknown> | null {
  if (candidate === null) return null;
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Parse the JSON object embedded in agent text.
 * Tries the span from the first `{` to the last `}` first, then the first balanced object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const clean = stripCodeFence(text);
  const first = clean.indexOf('{');
  const last = clean.lastIndexOf('}');
  if (first === -1 || last <= first) return null;

  return parseObject(clean.substring(first, last + 1)) ?? parseObject(extractBalancedJSON(clean));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
