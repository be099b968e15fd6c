/**
 * Flashcard Pipeline Types
 *
 * Type definitions for the pipeline that turns branching conversation
 * transcripts into curated question/answer flashcards.
 */

// ============================================
// Raw Conversation Tree (input)
// ============================================

export type NodeId = string;

export type MessageRole = 'user' | 'assistant' | 'other';

export interface RawMessage {
  author?: { role?: string | null } | null;
  content?: {
    content_type?: string | null;
    parts?: unknown[] | null;
  } | null;
}

export interface RawNode {
  id?: string;
  parent?: string | null;
  children?: string[] | null;
  message?: RawMessage | null;
}

/**
 * Tree JSON as exposed by the upstream conversational service
 */
export interface RawConversationTree {
  id?: string;
  title?: string | null;
  current_node?: string | null;
  mapping?: Record<string, RawNode> | null;
}

// ============================================
// Materialized Tree
// ============================================

export interface ConversationMessage {
  role: MessageRole;
  content_type: string;
  /** First textual segment only; later parts are dropped */
  text: string;
}

export interface ConversationNode {
  id: NodeId;
  parent_id: NodeId | null; // back-reference only
  children: NodeId[];
  message: ConversationMessage | null;
}

export interface ConversationTree {
  id: string;
  title: string;
  current_node: NodeId | null;
  mapping: Map<NodeId, ConversationNode>;
}

export interface SelectedMessage {
  node_id: NodeId;
  role: Exclude<MessageRole, 'other'>;
  text: string;
  /** Position in traversal order */
  index: number;
}

// ============================================
// Candidates and Records
// ============================================

export type ExtractionOrigin = 'message' | 'conversation' | 'regex_fallback';

export interface QAPair {
  question: string;
  answer: string;
}

export interface Candidate extends QAPair {
  source_conversation: string;
  title: string;
  origin: ExtractionOrigin;
}

export type CandidateCategory =
  | 'genuine_check'
  | 'faq'
  | 'rhetorical'
  | 'meta'
  | 'other'
  | 'error';

export type RejectionTier = 'rules' | 'judge';

export interface ClassifiedCandidate extends Candidate {
  category: CandidateCategory;
  accepted: boolean;
  rejected_by?: RejectionTier;
  reason?: string;
}

export interface FinalRecord extends QAPair {
  source_conversation: string;
  title: string;
  original_answer?: string;
}

export interface ClassificationStats {
  total_processed: number;
  kept: number;
  category_breakdown: Partial<Record<CandidateCategory, number>>;
}

// ============================================
// Configuration
// ============================================

export interface ModelConfig {
  extractor: string;
  classifier: string;
  answerer: string;
}

export interface LLMConfig {
  base_url: string;
  api_key?: string;
  temperature: number;
  timeout_ms: number;
  max_retries: number;
  /** Fixed pause between consecutive capability calls */
  call_delay_ms: number;
}

export interface PathConfig {
  data_dir: string;
  flashcards_dir: string;
}

export interface HeuristicConfig {
  min_message_length: number;
  min_tail_lines: number;
  tail_fraction: number;
}

export interface ClassifierConfig {
  min_question_length: number;
  require_question_mark: boolean;
  exclusion_phrases: string[];
  use_judge: boolean;
}

export type ExtractionMode = 'per_message' | 'conversation';

export interface ExtractionConfig {
  mode: ExtractionMode;
  message_char_budget: number;
  conversation_char_budget: number;
  /** Keys tried, in order, when the response wraps its list in an object */
  response_list_keys: string[];
  regex_fallback: boolean;
  dedupe_within_conversation: boolean;
}

export type OutputFormat = 'anki' | 'csv' | 'markdown' | 'jsonl' | 'json';

export interface OutputConfig {
  formats: OutputFormat[];
  base_tags: string[];
}

export interface PipelineConfig {
  models: ModelConfig;
  llm: LLMConfig;
  paths: PathConfig;
  heuristics: HeuristicConfig;
  classifier: ClassifierConfig;
  extraction: ExtractionConfig;
  output: OutputConfig;
  verbose: boolean;
}

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: PipelineConfig[K] extends object
    ? Partial<PipelineConfig[K]>
    : PipelineConfig[K];
};

/**
 * FAQ-style fragments that never make a flashcard
 */
export const DEFAULT_EXCLUSION_PHRASES: string[] = [
  'How to obtain',
  'Deck strategy',
  'Duplicate handling',
  'Edge cases',
  'MVP first',
  "Claude 'answer enhancer'",
  'What cellular fate',
  'Checking your understanding',
  'Can you explain',
];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  models: {
    extractor: 'gpt-4o-mini',
    classifier: 'gpt-4o-mini',
    answerer: 'gpt-4o',
  },
  llm: {
    base_url: 'https://api.openai.com/v1',
    temperature: 0.1, // pinned low so accept/reject decisions repeat
    timeout_ms: 30_000,
    max_retries: 2,
    call_delay_ms: 0,
  },
  paths: {
    data_dir: './data',
    flashcards_dir: './flashcards',
  },
  heuristics: {
    min_message_length: 50,
    min_tail_lines: 10,
    tail_fraction: 0.25,
  },
  classifier: {
    min_question_length: 15,
    require_question_mark: true,
    exclusion_phrases: DEFAULT_EXCLUSION_PHRASES,
    use_judge: true,
  },
  extraction: {
    mode: 'per_message',
    message_char_budget: 8_000,
    conversation_char_budget: 25_000,
    response_list_keys: ['questions', 'qa_pairs', 'cards'],
    regex_fallback: true,
    dedupe_within_conversation: false,
  },
  output: {
    formats: ['anki', 'csv', 'markdown', 'jsonl', 'json'],
    base_tags: ['chatgpt', 'socratic'],
  },
  verbose: false,
};

/**
 * Merge per-section overrides onto a base configuration
 */
export function mergeConfig(
  base: PipelineConfig,
  overrides: PipelineConfigOverrides = {}
): PipelineConfig {
  return {
    models: { ...base.models, ...overrides.models },
    llm: { ...base.llm, ...overrides.llm },
    paths: { ...base.paths, ...overrides.paths },
    heuristics: { ...base.heuristics, ...overrides.heuristics },
    classifier: { ...base.classifier, ...overrides.classifier },
    extraction: { ...base.extraction, ...overrides.extraction },
    output: { ...base.output, ...overrides.output },
    verbose: overrides.verbose ?? base.verbose,
  };
}

// ============================================
// Logging
// ============================================

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}
