import type { z } from 'zod';
import { LLMResponseError } from '../../utils/errors.js';

const FENCED_BLOCK = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Parses a model's JSON answer, tolerating code fences and surrounding prose. */
export function parseJsonObject(content: string): unknown {
  const trimmed = content.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  const candidate = fenced ? fenced[1] : trimmed;

  try {
    return JSON.parse(candidate);
  } catch (error) {
    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');
    if (start >= 0 && end > start) {
      try {
        return JSON.parse(candidate.slice(start, end + 1));
      } catch (innerError) {
        throw new LLMResponseError('Model response is not valid JSON', {
          error: innerError,
          preview: candidate.slice(0, 200),
        });
      }
    }
    throw new LLMResponseError('Model response is not valid JSON', { error, preview: candidate.slice(0, 200) });
  }
}

export function parseStructuredResponse<S extends z.ZodTypeAny>(content: string, schema: S, label: string): z.infer<S> {
  const result = schema.safeParse(parseJsonObject(content));
  if (!result.success) {
    throw new LLMResponseError(`Malformed ${label} response`, result.error.issues);
  }
  return result.data;
}
