/**
 * Stage 2: Candidate Extraction
 *
 * Obtains candidate question/answer pairs from single messages or whole
 * conversations through the external capability, with a regex fallback
 * when the capability is unavailable.
 */

import { z } from 'zod';
import type {
  Candidate,
  ConversationTree,
  ExtractionOrigin,
  Logger,
  PipelineConfig,
  QAPair,
  SelectedMessage,
} from './types';
import type { LLMProvider } from './llmProvider';
import { materialize } from './treeMaterializer';
import { selectMessages } from './messageSelector';
import { extractMarkedQuestions, looksLikeTeachingQuestion } from './questionDetector';
import { describeError } from './errors';
import { excerpt } from './logger';

// ============================================
// Prompt Templates
// ============================================

export const EXTRACTION_SYSTEM_PROMPT =
  'Extract only genuine comprehension-check questions where the assistant tests the user. ' +
  'Exclude FAQ-style questions that are answered immediately. Respond with JSON only.';

const MESSAGE_EXTRACTION_PROMPT = `Extract the questions in this message where the assistant is testing the user's understanding.

Include questions that:
1. Appear at or near the END of the message
2. Expect the USER to answer (not rhetorical)
3. Are often marked: "Q:", "Q1:", "**Q:**", "Quick Check", "Test Question", "Check #N"
4. Are NOT answered in the same message

Exclude:
- FAQ-style headers followed by their answer (e.g. "How to obtain thread IDs?")
- Questions in the middle of explanatory text
- Rhetorical questions and section headers posed as questions

Make every question self-contained: fold any setup it depends on into the question.
For example "If you have a DNA strand that is 10 base pairs long... Q: How many nucleotides total does that mean?"
becomes "If you have a DNA strand that is 10 base pairs long, how many nucleotides total does that mean?"

For each question, write a correct, concise answer based on the message.

Return a JSON array, empty if there are none:
[{"question": "self-contained question", "answer": "answer"}]

MESSAGE:
`;

const CONVERSATION_EXTRACTION_PROMPT = `You are extracting teaching questions from a dialogue where the ASSISTANT tests the USER's understanding.

Find every question the assistant asks in formats such as:
- "Q: ...", "Q1: ...", "**Q: ...**"
- Questions under headers like "Quick Check", "Test Question", "Check #"

For each question:
1. Extract the complete question, including any setup needed to answer it on its own
2. Take the answer from the assistant's later explanation, or derive a correct one from the teaching material

Look through the ENTIRE conversation, including long messages.

Return a JSON array:
[{"question": "self-contained question", "answer": "answer"}]

CONVERSATION:
`;

export const FALLBACK_ANSWER_PLACEHOLDER = '[To be extracted from context]';

// ============================================
// Response Normalization
// ============================================

const QAItemSchema = z.union([
  z.string().transform((question) => ({ question, answer: '' })),
  z.object({
    question: z.string(),
    answer: z.union([z.string(), z.null()]).optional(),
  }).transform(({ question, answer }) => ({ question, answer: answer ?? '' })),
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accept a direct list, or an object wrapping the list under one of the
 * known keys (tried in order). Any other shape yields no pairs.
 * Items that are not {question, answer} objects or bare strings are dropped.
 */
export function normalizeExtractionResponse(value: unknown, listKeys: readonly string[]): QAPair[] {
  let items: unknown[] | null = null;

  if (Array.isArray(value)) {
    items = value;
  } else if (isRecord(value)) {
    for (const key of listKeys) {
      const wrapped = value[key];
      if (Array.isArray(wrapped)) {
        items = wrapped;
        break;
      }
    }
  }

  if (!items) return [];

  const pairs: QAPair[] = [];
  for (const item of items) {
    const parsed = QAItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const question = parsed.data.question.trim();
    if (!question) continue;
    pairs.push({ question, answer: parsed.data.answer.trim() });
  }
  return pairs;
}

// ============================================
// Extraction
// ============================================

export interface ExtractionContext {
  provider: LLMProvider;
  config: PipelineConfig;
  logger: Logger;
}

interface Provenance {
  id: string;
  title: string;
}

function toCandidates(pairs: QAPair[], source: Provenance, origin: ExtractionOrigin): Candidate[] {
  return pairs.map((pair) => ({
    question: pair.question,
    answer: pair.answer,
    source_conversation: source.id,
    title: source.title,
    origin,
  }));
}

function regexFallback(text: string, source: Provenance): Candidate[] {
  const questions = extractMarkedQuestions(text);
  return toCandidates(
    questions.map((question) => ({ question, answer: FALLBACK_ANSWER_PLACEHOLDER })),
    source,
    'regex_fallback'
  );
}

export interface ExtractionTextOptions {
  /** Questions already found by regex, appended to the prompt */
  hints?: string[];
  /** Text scanned by the conversation-mode regex fallback; defaults to the extracted text */
  fallbackText?: string;
}

/**
 * Extract candidates from one piece of text.
 *
 * Never rejects: capability failures are logged. A failed conversation call
 * falls back to the marked questions (when enabled); a failed message call
 * contributes nothing.
 */
export async function extractCandidatesFromText(
  text: string,
  source: Provenance,
  origin: Exclude<ExtractionOrigin, 'regex_fallback'>,
  { provider, config, logger }: ExtractionContext,
  { hints = [], fallbackText = text }: ExtractionTextOptions = {}
): Promise<Candidate[]> {
  const budget = origin === 'message'
    ? config.extraction.message_char_budget
    : config.extraction.conversation_char_budget;

  let prompt = origin === 'message' ? MESSAGE_EXTRACTION_PROMPT : CONVERSATION_EXTRACTION_PROMPT;
  if (hints.length > 0) {
    prompt = `${prompt.trimEnd()}\n\nHINT: Found these questions in the text:\n${hints.map((q) => `- ${q}`).join('\n')}\n\n`;
  }

  try {
    const response = await provider.complete({
      purpose: 'extract',
      model: config.models.extractor,
      system: EXTRACTION_SYSTEM_PROMPT,
      prompt: prompt + text.slice(0, budget),
    });

    const pairs = normalizeExtractionResponse(response, config.extraction.response_list_keys);
    if (pairs.length === 0) {
      logger.debug(`  No questions returned for ${source.id}: "${excerpt(text)}"`);
    }
    return toCandidates(pairs, source, origin);
  } catch (error) {
    logger.warn(
      `  Extraction failed for ${source.id} ("${excerpt(text)}"): ${describeError(error)}`
    );
    return origin === 'conversation' && config.extraction.regex_fallback
      ? regexFallback(fallbackText, source)
      : [];
  }
}

function formatTranscript(messages: Iterable<SelectedMessage>): string {
  const lines: string[] = [];
  for (const message of messages) {
    lines.push(`${message.role.toUpperCase()}: ${message.text}`);
  }
  return lines.join('\n\n');
}

/**
 * Extract candidates from a whole conversation tree.
 *
 * Per-message mode sends each assistant message that passes the heuristic
 * detector, one call at a time. Conversation mode sends the joined
 * transcript once, with regex-found questions as hints.
 */
export async function extractFromConversation(
  tree: ConversationTree,
  context: ExtractionContext
): Promise<Candidate[]> {
  const { config, logger } = context;
  const source: Provenance = { id: tree.id, title: tree.title };
  const nodes = materialize(tree);
  let candidates: Candidate[] = [];

  if (config.extraction.mode === 'per_message') {
    let sent = 0;
    for (const message of selectMessages(nodes, ['assistant'])) {
      if (!looksLikeTeachingQuestion(message.text, config.heuristics)) continue;
      sent++;
      const found = await extractCandidatesFromText(message.text, source, 'message', context);
      if (found.length > 0) {
        logger.debug(`  Found ${found.length} Q&A pairs in message ${message.node_id}`);
      }
      candidates.push(...found);
    }
    logger.debug(`  Sent ${sent} assistant messages from ${tree.id}`);
  } else {
    const transcript = formatTranscript(selectMessages(nodes));
    if (!transcript) return [];

    const assistantText = Array.from(selectMessages(nodes, ['assistant']), (m) => m.text).join('\n\n');
    const hints = extractMarkedQuestions(assistantText);
    logger.debug(`  Found ${hints.length} questions via regex in ${tree.id}`);

    candidates = await extractCandidatesFromText(transcript, source, 'conversation', context, {
      hints,
      fallbackText: assistantText,
    });
  }

  return candidates;
}
