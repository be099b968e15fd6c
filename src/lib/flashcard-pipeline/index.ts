/**
 * Flashcard Pipeline
 *
 * Turns branching conversation transcripts into curated question/answer
 * flashcards.
 *
 * Pipeline:
 * 1. Materialization: Find the root of each tree and flatten it in pre-order
 * 2. Selection: Keep role-tagged textual messages
 * 3. Extraction: Heuristic gate, then the capability extracts Q&A pairs
 * 4. Classification: Local rules, then the capability judges what is left
 * 5. Completion: Rewrite known incomplete questions
 * 6. Output: Anki, CSV, Markdown, JSONL and JSON projections
 */

// Re-export types
export * from './types';
export * from './errors';

export { createConsoleLogger, silentLogger, excerpt } from './logger';
export { loadConfig, parseConfigYaml, readApiKey, DEFAULT_CONFIG_FILE, API_KEY_ENV_VARS } from './config';
export type { LoadConfigOptions } from './config';

// Stage modules for advanced usage
export { normalizeConversationTree, findRoot, materialize } from './treeMaterializer';
export type { RootDiscovery } from './treeMaterializer';
export { selectMessages, isSelectable, TEXT_CONTENT_TYPE, ALL_SELECTABLE_ROLES } from './messageSelector';
export type { SelectableRole } from './messageSelector';
export {
  looksLikeTeachingQuestion,
  extractMarkedQuestions,
  findMarker,
  tailWindowSize,
  TEACHING_QUESTION_MARKERS,
} from './questionDetector';
export type { MarkerPattern } from './questionDetector';
export { MockLLMProvider, parseJsonResponse } from './llmProvider';
export type { LLMProvider, LLMRequest } from './llmProvider';
export { AiSdkProvider, buildModelFactory, PROVIDER_NAME } from './aiSdkProvider';
export type { AiSdkProviderOptions, ModelFactory } from './aiSdkProvider';
export {
  extractFromConversation,
  extractCandidatesFromText,
  normalizeExtractionResponse,
  FALLBACK_ANSWER_PLACEHOLDER,
} from './extraction';
export type { ExtractionContext, ExtractionTextOptions } from './extraction';
export {
  classifyCandidates,
  classifyCandidate,
  checkQuestionRules,
  judgeQuestion,
  countCategories,
  findExclusionPhrase,
} from './classifiers';
export type { ClassificationContext, JudgeVerdict, RuleCheck, RuleRejection } from './classifiers';
export { createCompletionFixer, fixQuestion, fixRecords, KNOWN_COMPLETIONS } from './completionFixer';
export type { CompletionFixer, CompletionTable } from './completionFixer';
export { aggregateCandidates, dedupeByQuestion, toFinalRecord, buildTags, groupByTitle } from './aggregation';
export { generateFreshAnswers } from './answerGenerator';
export {
  formatAnki,
  formatCsv,
  formatMarkdown,
  formatJsonl,
  formatJson,
  parseCsv,
  parseCsvRows,
  toCardLines,
  outputFileName,
  renderFormat,
  CSV_HEADER,
} from './formatters';
export type { CardLine, CsvRow } from './formatters';
export { STAGE_FILES, stageFilePath, resolveLatestStageFile, readJsonFile, writeJsonFile } from './stageFiles';
export type { StageName } from './stageFiles';
export { listConversationFiles, loadConversation, loadConversations, splitExport, EXPORT_SUMMARY_FILE } from './conversationStore';
export type { ExportSummary } from './conversationStore';

// Orchestration
export {
  executeFlashcardPipeline,
  runImportStage,
  runExtractStage,
  runClassifyStage,
  runFixStage,
  runAnswerStage,
  runGenerateStage,
  STAGE_ORDER,
  stages,
} from './pipeline';
export type { PipelineContext, PipelineRunOptions, PipelineStage } from './pipeline';
