/**
 * Heuristic Question Detector
 *
 * Cheap syntactic pre-filter deciding whether a message is worth sending to
 * the extractor. Teaching questions close an explanation, so a marker only
 * counts when it sits in the tail of the message.
 *
 * A false negative silently drops a real question. This gate bounds the
 * number of extractor calls; it is never the only correctness check.
 */

import type { HeuristicConfig } from './types';
import { DEFAULT_PIPELINE_CONFIG } from './types';

// ============================================
// Marker Patterns
// ============================================

export interface MarkerPattern {
  name: string;
  pattern: RegExp;
}

/**
 * Marker families, tested in order. Patterns never span a newline.
 */
export const TEACHING_QUESTION_MARKERS: readonly MarkerPattern[] = [
  { name: 'q_prefix', pattern: /\bQ\d*:\s*[^\n]+\?/i }, // Q:, Q1:, **Q:**
  { name: 'quick_check', pattern: /Quick Check[^\n]*:\s*[^\n]+\?/i },
  { name: 'test_question', pattern: /Test Question[^\n]*:\s*[^\n]+\?/i },
  { name: 'numbered_check', pattern: /Check #\d+[^\n]*:\s*[^\n]+\?/i },
  { name: 'checkmark_header', pattern: /✅[^\n]*Check[^\n]*:\s*[^\n]+\?/i },
];

/**
 * Capture patterns for pulling question text out of marked lines
 */
const QUESTION_CAPTURE_PATTERNS: readonly RegExp[] = [
  /\bQ\d*:\s*([^\n]+)/gi,
  /(?:Test Question|Quick Check|Check #\d+)[^\n:]*:\s*([^\n]+)/gi,
];

// ============================================
// Detection
// ============================================

/**
 * Number of trailing lines that form the tail window.
 *
 * The window is max(min_tail_lines, floor(lines * tail_fraction)) but never
 * reaches into the first floor(lines / 2) lines.
 */
export function tailWindowSize(lineCount: number, config: HeuristicConfig): number {
  if (lineCount <= 0) return 0;
  const preferred = Math.max(config.min_tail_lines, Math.floor(lineCount * config.tail_fraction));
  const secondHalf = lineCount - Math.floor(lineCount / 2);
  return Math.min(preferred, secondHalf);
}

/**
 * Name of the first marker family found in the text, or null
 */
export function findMarker(text: string): string | null {
  for (const marker of TEACHING_QUESTION_MARKERS) {
    if (marker.pattern.test(text)) return marker.name;
  }
  return null;
}

/**
 * Returns true if the message probably ends with a teaching question
 */
export function looksLikeTeachingQuestion(
  text: string,
  config: HeuristicConfig = DEFAULT_PIPELINE_CONFIG.heuristics
): boolean {
  if (!text || text.length < config.min_message_length) return false;

  const lines = text.trim().split('\n');
  const tailSize = tailWindowSize(lines.length, config);
  const tail = lines.slice(lines.length - tailSize).join('\n');

  return findMarker(tail) !== null;
}

// ============================================
// Regex Extraction
// ============================================

function cleanCapturedQuestion(raw: string): string {
  return raw
    .replace(/^[\s*_]+/, '')
    .replace(/[\s*_]+$/, '')
    .trim();
}

/**
 * Pull marked question strings out of text in document order, exact
 * duplicates removed.
 */
export function extractMarkedQuestions(text: string): string[] {
  const found: Array<{ index: number; question: string }> = [];

  for (const pattern of QUESTION_CAPTURE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const question = cleanCapturedQuestion(match[1] ?? '');
      if (question) found.push({ index: match.index ?? 0, question });
    }
  }

  found.sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const questions: string[] = [];
  for (const { question } of found) {
    if (seen.has(question)) continue;
    seen.add(question);
    questions.push(question);
  }
  return questions;
}
