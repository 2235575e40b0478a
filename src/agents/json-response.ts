import { ResponseParseError } from '../types/index.js';

const FENCE_OPEN = /^```(?:json)?\s*/i;
const FENCE_CLOSE = /\s*```$/;

/**
 * Remove a surrounding Markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  return text.trim().replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '').trim();
}

/**
 * Parse an LLM reply that should be a single JSON object.
 * Throws ResponseParseError for invalid JSON or a non-object value.
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new ResponseParseError(
      `LLM response is not valid JSON: ${text.slice(0, 80)}`,
      error instanceof Error ? error : undefined
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ResponseParseError('LLM response is not a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}
