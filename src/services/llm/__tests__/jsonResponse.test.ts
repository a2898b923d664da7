import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { LLMResponseError } from '../../../utils/errors.js';
import { parseJsonObject, parseStructuredResponse } from '../jsonResponse.js';

describe('parseJsonObject', () => {
  it('parses plain JSON', () => {
    expect(parseJsonObject('{"approved": true}')).toEqual({ approved: true });
  });

  it('unwraps a fenced block', () => {
    expect(parseJsonObject('```json\n{"status": "PARTIAL"}\n```')).toEqual({ status: 'PARTIAL' });
  });

  it('extracts the object from surrounding prose', () => {
    expect(parseJsonObject('Here is my answer: {"confidence": 0.4} Hope this helps.')).toEqual({ confidence: 0.4 });
  });

  it('rejects text without an object', () => {
    expect(() => parseJsonObject('I cannot decide.')).toThrow(LLMResponseError);
  });
});

describe('parseStructuredResponse', () => {
  const schema = z.object({ approved: z.boolean() });

  it('returns data matching the schema', () => {
    expect(parseStructuredResponse('{"approved": false}', schema, 'verification')).toEqual({ approved: false });
  });

  it('names the response in schema errors', () => {
    expect(() => parseStructuredResponse('{"approved": "yes"}', schema, 'verification')).toThrow(
      'Malformed verification response'
    );
  });
});
