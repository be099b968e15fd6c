/**
 * Stage 3: Candidate Classification
 *
 * Two tiers:
 * - Rules: deterministic length, punctuation and FAQ-phrase checks
 * - Judge: the external capability applies a rubric to what the rules keep
 *
 * When the judge is unavailable the candidate is rejected with category
 * "error". Category counts are diagnostics only.
 */

import { z } from 'zod';
import type {
  Candidate,
  CandidateCategory,
  ClassificationStats,
  ClassifiedCandidate,
  ClassifierConfig,
  Logger,
  PipelineConfig,
} from './types';
import type { LLMProvider } from './llmProvider';
import { ConfigurationError, ParseError, describeError } from './errors';
import { excerpt } from './logger';

// ============================================
// Tier A: Local Rules
// ============================================

export type RuleRejection = 'too_short' | 'missing_question_mark' | 'exclusion_phrase';

export interface RuleCheck {
  passed: boolean;
  reason?: RuleRejection;
  matched_phrase?: string;
}

/**
 * Find the first exclusion phrase contained in the question (case-insensitive)
 */
export function findExclusionPhrase(question: string, phrases: readonly string[]): string | null {
  const lower = question.toLowerCase();
  for (const phrase of phrases) {
    if (phrase && lower.includes(phrase.toLowerCase())) return phrase;
  }
  return null;
}

export function checkQuestionRules(question: string, config: ClassifierConfig): RuleCheck {
  const trimmed = question.trim();

  if (trimmed.length < config.min_question_length) {
    return { passed: false, reason: 'too_short' };
  }
  if (config.require_question_mark && !trimmed.endsWith('?')) {
    return { passed: false, reason: 'missing_question_mark' };
  }

  const phrase = findExclusionPhrase(trimmed, config.exclusion_phrases);
  if (phrase !== null) {
    return { passed: false, reason: 'exclusion_phrase', matched_phrase: phrase };
  }

  return { passed: true };
}

// ============================================
// Tier B: Judge
// ============================================

export const JUDGE_SYSTEM_PROMPT =
  'Decide whether a question is a genuine comprehension check. Respond with JSON only.';

const JUDGE_PROMPT = `You are analyzing questions extracted from tutoring conversations where the assistant teaches the user step by step.

A genuine comprehension check is one where:
- The assistant asks the user to test their understanding
- The user has to think and apply what they learned
- The answer was NOT already given in the same message
- Examples: "What are the three components of a DNA nucleotide?", "Which bases pair together?"

NOT genuine comprehension checks:
- faq: a question immediately followed by its own answer
- rhetorical: a question used as a device inside an explanation
- meta: a question about the process or the conversation itself
- other: questions the user asked the assistant, headers, anything else

Many good checks have no explicit marker like "Q:". Judge by whether the question tests understanding.

Respond with JSON:
{
  "is_genuine_check": true | false,
  "category": "genuine_check" | "faq" | "rhetorical" | "meta" | "other",
  "reasoning": "brief explanation"
}

Question to analyze:
`;

const JUDGED_CATEGORIES = ['genuine_check', 'faq', 'rhetorical', 'meta', 'other'] as const;

const JudgeResponseSchema = z.object({
  is_genuine_check: z.boolean(),
  category: z.string().optional(),
  reasoning: z.string().optional(),
});

export interface JudgeVerdict {
  accepted: boolean;
  category: CandidateCategory;
  reasoning?: string;
}

function toCategory(value: string | undefined, accepted: boolean): CandidateCategory {
  const match = JUDGED_CATEGORIES.find((category) => category === value);
  if (match && (accepted || match !== 'genuine_check')) return match;
  return accepted ? 'genuine_check' : 'other';
}

/**
 * Ask the capability to judge a question. Rejects with ServiceError or
 * ParseError; callers decide what a failure means.
 */
export async function judgeQuestion(
  question: string,
  provider: LLMProvider,
  model: string
): Promise<JudgeVerdict> {
  const response = await provider.complete({
    purpose: 'classify',
    model,
    system: JUDGE_SYSTEM_PROMPT,
    prompt: JUDGE_PROMPT + question,
  });

  const parsed = JudgeResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new ParseError('Judge response does not match the expected shape', {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  return {
    accepted: parsed.data.is_genuine_check,
    category: toCategory(parsed.data.category, parsed.data.is_genuine_check),
    reasoning: parsed.data.reasoning,
  };
}

// ============================================
// Classification
// ============================================

export interface ClassificationContext {
  /** Required only when the judge is on */
  provider?: LLMProvider;
  config: PipelineConfig;
  logger: Logger;
}

/**
 * Classify one candidate. Judge failures become rejected "error" records;
 * only a missing provider with the judge on rejects.
 */
export async function classifyCandidate(
  candidate: Candidate,
  { provider, config, logger }: ClassificationContext
): Promise<ClassifiedCandidate> {
  const rules = checkQuestionRules(candidate.question, config.classifier);
  if (!rules.passed) {
    return {
      ...candidate,
      category: rules.reason === 'exclusion_phrase' ? 'faq' : 'other',
      accepted: false,
      rejected_by: 'rules',
      reason: rules.matched_phrase ? `${rules.reason}: ${rules.matched_phrase}` : rules.reason,
    };
  }

  if (!config.classifier.use_judge) {
    return { ...candidate, category: 'genuine_check', accepted: true };
  }
  if (!provider) {
    throw new ConfigurationError('The judge is enabled but no LLM provider is configured');
  }

  try {
    const verdict = await judgeQuestion(candidate.question, provider, config.models.classifier);
    return {
      ...candidate,
      category: verdict.category,
      accepted: verdict.accepted,
      ...(verdict.accepted ? {} : { rejected_by: 'judge' as const }),
      ...(verdict.reasoning ? { reason: verdict.reasoning } : {}),
    };
  } catch (error) {
    logger.error(
      `  Judge failed for ${candidate.source_conversation} ("${excerpt(candidate.question)}"): ${describeError(error)}`
    );
    return {
      ...candidate,
      category: 'error',
      accepted: false,
      rejected_by: 'judge',
      reason: describeError(error),
    };
  }
}

export function countCategories(classified: readonly ClassifiedCandidate[]): ClassificationStats {
  const breakdown: Partial<Record<CandidateCategory, number>> = {};
  let kept = 0;

  for (const item of classified) {
    breakdown[item.category] = (breakdown[item.category] ?? 0) + 1;
    if (item.accepted) kept++;
  }

  return {
    total_processed: classified.length,
    kept,
    category_breakdown: breakdown,
  };
}

/**
 * Classify candidates one at a time, in order
 */
export async function classifyCandidates(
  candidates: readonly Candidate[],
  context: ClassificationContext
): Promise<{ classified: ClassifiedCandidate[]; stats: ClassificationStats }> {
  const classified: ClassifiedCandidate[] = [];

  for (let i = 0; i < candidates.length; i++) {
    if (i % 5 === 0) {
      context.logger.info(`  Classifying ${i + 1}/${candidates.length}...`);
    }
    const result = await classifyCandidate(candidates[i], context);
    if (!result.accepted) {
      context.logger.debug(`  Excluded (${result.category}): ${excerpt(result.question)}`);
    }
    classified.push(result);
  }

  return { classified, stats: countCategories(classified) };
}
