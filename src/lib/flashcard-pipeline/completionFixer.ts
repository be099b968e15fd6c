/**
 * Stage 4: Completion Fixing
 *
 * Exact-match rewrites for known questions that lost their setup during
 * extraction. No fuzzy matching; anything not in the table passes through.
 */

import type { ClassifiedCandidate, FinalRecord } from './types';
import { ConfigurationError } from './errors';
import { toFinalRecord } from './aggregation';

export type CompletionTable = Readonly<Record<string, string>>;

export const KNOWN_COMPLETIONS: CompletionTable = {
  'How many nucleotides total does that mean (considering both strands)?':
    'If you have a DNA strand that is 10 base pairs long, how many nucleotides total does that mean (considering both strands)?',
  'How many sugar molecules would be in those nucleotides?':
    'If you have 20 nucleotides total (from a 10 base pair DNA strand), how many sugar molecules would be in those nucleotides?',
};

export interface CompletionFixer {
  fix(question: string): string;
  readonly table: CompletionTable;
}

/**
 * Build a fixer over the built-in table plus any extra entries.
 *
 * A rewrite may not itself be a key that maps elsewhere, so fix(fix(q))
 * always equals fix(q).
 */
export function createCompletionFixer(extra: Record<string, string> = {}): CompletionFixer {
  const table: Record<string, string> = { ...KNOWN_COMPLETIONS, ...extra };

  for (const [incomplete, complete] of Object.entries(table)) {
    if (Object.prototype.hasOwnProperty.call(table, complete) && table[complete] !== complete) {
      throw new ConfigurationError('Completion rewrite is itself rewritten', { incomplete, complete });
    }
  }

  return {
    table,
    fix: (question) => (Object.prototype.hasOwnProperty.call(table, question) ? table[question] : question),
  };
}

const defaultFixer = createCompletionFixer();

export function fixQuestion(question: string): string {
  return defaultFixer.fix(question);
}

/**
 * Project accepted candidates into final records, rewriting known
 * incomplete questions. Returns the records and how many were rewritten.
 */
export function fixRecords(
  candidates: readonly ClassifiedCandidate[],
  fixer: CompletionFixer = defaultFixer
): { records: FinalRecord[]; fixed: number } {
  let fixed = 0;
  const records = candidates.map((candidate) => {
    const question = fixer.fix(candidate.question);
    if (question !== candidate.question) fixed++;
    return { ...toFinalRecord(candidate), question };
  });
  return { records, fixed };
}
