import { describe, it, expect } from 'vitest';
import { MockLLMProvider, parseJsonResponse } from './llmProvider';
import { ParseError, ServiceError } from './errors';
import type { LLMRequest } from './llmProvider';

function request(prompt: string): LLMRequest {
  return { purpose: 'extract', model: 'test-model', system: 'system', prompt };
}

describe('parseJsonResponse', () => {
  it('parses plain JSON', () => {
    expect(parseJsonResponse('{"is_genuine_check": true}')).toEqual({ is_genuine_check: true });
  });

  it('strips a json code fence', () => {
    const text = '```json\n[{"question": "What pairs with adenine?", "answer": "Thymine"}]\n```';
    expect(parseJsonResponse(text)).toEqual([{ question: 'What pairs with adenine?', answer: 'Thymine' }]);
  });

  it('strips a bare code fence', () => {
    expect(parseJsonResponse('```\n[]\n```')).toEqual([]);
  });

  it('throws ParseError on non-JSON text', () => {
    expect(() => parseJsonResponse('Sure! Here are the questions.')).toThrow(ParseError);
  });
});

describe('MockLLMProvider', () => {
  it('returns the response of the first matching pattern', async () => {
    const provider = new MockLLMProvider('default')
      .setResponse('adenine', 'first')
      .setResponse('pairs', 'second');

    expect(await provider.complete(request('What pairs with adenine?'))).toBe('first');
    expect(await provider.complete(request('Which pairs form?'))).toBe('second');
    expect(await provider.complete(request('Unrelated'))).toBe('default');
  });

  it('rejects for failure patterns and logs every call', async () => {
    const provider = new MockLLMProvider().setFailure('adenine', new ServiceError('upstream down'));

    await expect(provider.complete(request('What pairs with adenine?'))).rejects.toThrow('upstream down');
    expect(await provider.complete(request('other'))).toEqual([]);
    expect(provider.calls.map((call) => call.prompt)).toEqual(['What pairs with adenine?', 'other']);
  });
});
