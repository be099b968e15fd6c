/**
 * Optional stage: fresh answers.
 *
 * Extracted answers are only as good as the message they came from, so this
 * stage asks the capability for a concise flashcard answer per question.
 */

import type { FinalRecord, Logger, PipelineConfig } from './types';
import type { LLMProvider } from './llmProvider';
import { ParseError, describeError } from './errors';
import { excerpt } from './logger';

export const ANSWER_SYSTEM_PROMPT = `You are an expert tutor writing answers for spaced repetition flashcards.
Keep answers concise but complete. Include key facts and explanations.
For science questions, be precise with terminology.`;

export interface AnswerContext {
  provider: LLMProvider;
  config: PipelineConfig;
  logger: Logger;
}

/**
 * Replace each answer with a freshly generated one, keeping the previous
 * answer as original_answer. A failed call leaves the record unchanged.
 */
export async function generateFreshAnswers(
  records: readonly FinalRecord[],
  { provider, config, logger }: AnswerContext
): Promise<{ records: FinalRecord[]; failed: number }> {
  const updated: FinalRecord[] = [];
  let failed = 0;

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    logger.info(`  [${i + 1}/${records.length}] ${excerpt(record.question)}`);

    try {
      const response = await provider.complete({
        purpose: 'answer',
        model: config.models.answerer,
        system: ANSWER_SYSTEM_PROMPT,
        prompt: `Question: ${record.question}\n\nProvide a clear, accurate answer suitable for a flashcard:`,
        raw_text: true,
      });
      const answer = typeof response === 'string' ? response.trim() : '';
      if (!answer) {
        throw new ParseError('Capability returned no answer text');
      }
      updated.push({ ...record, original_answer: record.answer, answer });
    } catch (error) {
      failed++;
      logger.error(
        `  Answer generation failed for ${record.source_conversation} ("${excerpt(record.question)}"): ${describeError(error)}`
      );
      updated.push({ ...record });
    }
  }

  return { records: updated, failed };
}
