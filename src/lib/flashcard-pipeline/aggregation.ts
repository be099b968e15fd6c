/**
 * Aggregation of per-conversation results.
 */

import type { Candidate, FinalRecord } from './types';

export interface AggregateOptions {
  /** Drop exact question repeats inside each conversation */
  dedupe_within_conversation?: boolean;
}

/**
 * Drop exact question repeats, keeping the first occurrence
 */
export function dedupeByQuestion(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.question)) return false;
    seen.add(candidate.question);
    return true;
  });
}

/**
 * Concatenate per-conversation candidate lists in first-seen order.
 * There is no deduplication across conversations.
 */
export function aggregateCandidates(
  perConversation: ReadonlyArray<readonly Candidate[]>,
  options: AggregateOptions = {}
): Candidate[] {
  const all: Candidate[] = [];
  for (const list of perConversation) {
    all.push(...(options.dedupe_within_conversation ? dedupeByQuestion(list) : list));
  }
  return all;
}

export function toFinalRecord(candidate: Candidate): FinalRecord {
  return {
    question: candidate.question,
    answer: candidate.answer,
    source_conversation: candidate.source_conversation,
    title: candidate.title,
  };
}

const GENERIC_TITLE_WORDS = new Set(['untitled', 'new', 'chat']);

/**
 * Base tags plus the first word of the title, which usually names the topic
 */
export function buildTags(title: string, baseTags: readonly string[]): string[] {
  const tags = [...baseTags];
  const topic = title.trim().split(/\s+/)[0]?.toLowerCase() ?? '';
  if (topic && !GENERIC_TITLE_WORDS.has(topic) && !tags.includes(topic)) {
    tags.push(topic);
  }
  return tags;
}

/**
 * Group records by title, keeping first-seen order of titles and records
 */
export function groupByTitle(records: readonly FinalRecord[]): Map<string, FinalRecord[]> {
  const groups = new Map<string, FinalRecord[]>();
  for (const record of records) {
    const title = record.title || 'Unknown';
    const group = groups.get(title);
    if (group) {
      group.push(record);
    } else {
      groups.set(title, [record]);
    }
  }
  return groups;
}
