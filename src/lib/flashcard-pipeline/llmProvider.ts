/**
 * External text-understanding capability
 *
 * Prompt in, JSON value out. Implementations own transport, retries and
 * timeouts; callers own failure isolation.
 */

import { ParseError } from './errors';

// ============================================
// Provider Interface
// ============================================

export interface LLMRequest {
  /** Which stage is calling; used for logging and routing */
  purpose: 'extract' | 'classify' | 'answer';
  model: string;
  system: string;
  prompt: string;
  /** Plain text instead of a JSON value */
  raw_text?: boolean;
}

export interface LLMProvider {
  /**
   * Call the capability and return the parsed JSON value (or the trimmed
   * text when raw_text is set). Rejects with ServiceError or ParseError.
   */
  complete(request: LLMRequest): Promise<unknown>;
}

// ============================================
// Response Parsing
// ============================================

const CODE_FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

/**
 * Parse capability text as JSON, tolerating a surrounding code fence
 */
export function parseJsonResponse(text: string): unknown {
  const trimmed = text.trim();
  const fenced = trimmed.match(CODE_FENCE);
  const body = fenced ? fenced[1].trim() : trimmed;

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ParseError('Capability response is not valid JSON', {
      excerpt: body.slice(0, 120),
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

// ============================================
// Mock LLM Provider (for testing)
// ============================================

type MockEntry = { kind: 'response'; value: unknown } | { kind: 'failure'; error: Error };

/**
 * In-process provider for tests. The first registered pattern found in the
 * prompt decides the outcome.
 */
export class MockLLMProvider implements LLMProvider {
  private entries: Array<[string, MockEntry]> = [];
  readonly calls: LLMRequest[] = [];

  constructor(private defaultResponse: unknown = []) {}

  /**
   * Set a mock response for a pattern
   */
  setResponse(pattern: string, response: unknown): this {
    this.entries.push([pattern, { kind: 'response', value: response }]);
    return this;
  }

  /**
   * Make calls whose prompt contains the pattern reject
   */
  setFailure(pattern: string, error: Error): this {
    this.entries.push([pattern, { kind: 'failure', error }]);
    return this;
  }

  async complete(request: LLMRequest): Promise<unknown> {
    this.calls.push(request);

    for (const [pattern, entry] of this.entries) {
      if (!request.prompt.includes(pattern)) continue;
      if (entry.kind === 'failure') throw entry.error;
      return entry.value;
    }

    return this.defaultResponse;
  }
}
