/**
 * Flashcard Pipeline
 *
 * Orchestrates the stages. Each stage reads the previous stage file from
 * the data directory and writes its own, so any stage can be rerun alone.
 *
 * raw trees -> extracted -> classified/filtered -> complete -> (fresh) -> flashcard files
 */

import path from 'node:path';
import { writeFile, mkdir } from 'node:fs/promises';
import type { Candidate, FinalRecord, Logger, PipelineConfig } from './types';
import type { LLMProvider } from './llmProvider';
import { extractFromConversation } from './extraction';
import { classifyCandidates } from './classifiers';
import { createCompletionFixer, fixRecords, type CompletionFixer } from './completionFixer';
import { aggregateCandidates } from './aggregation';
import { generateFreshAnswers } from './answerGenerator';
import { outputFileName, renderFormat } from './formatters';
import { loadConversations, splitExport, type ExportSummary } from './conversationStore';
import {
  readCandidates,
  readClassified,
  readFinalRecords,
  resolveLatestStageFile,
  stageFilePath,
  writeJsonFile,
  writeStats,
  clearDownstream,
} from './stageFiles';
import { ConfigurationError, SourceUnavailableError, describeError } from './errors';

export type PipelineStage = 'import' | 'extract' | 'classify' | 'fix' | 'answers' | 'generate';

export const STAGE_ORDER: readonly PipelineStage[] = [
  'import',
  'extract',
  'classify',
  'fix',
  'answers',
  'generate',
];

export interface PipelineContext {
  config: PipelineConfig;
  logger: Logger;
  /** Required by extract, answers, and classify when the judge is on */
  provider?: LLMProvider;
  fixer?: CompletionFixer;
  now?: () => Date;
}

function requireProvider(context: PipelineContext, stage: PipelineStage): LLMProvider {
  if (!context.provider) {
    throw new ConfigurationError(`Stage "${stage}" needs a configured LLM provider`);
  }
  return context.provider;
}

// ============================================
// Stages
// ============================================

export async function runImportStage(exportFile: string, context: PipelineContext): Promise<ExportSummary> {
  const summary = await splitExport(exportFile, context.config.paths.data_dir, context.logger, context.now?.());
  context.logger.info(`✅ Imported ${summary.conversation_count} conversations`);
  return summary;
}

/**
 * Extract candidates from every tree in the data directory.
 * A failing conversation is logged and contributes nothing.
 */
export async function runExtractStage(context: PipelineContext): Promise<Candidate[]> {
  const { config, logger } = context;
  const provider = requireProvider(context, 'extract');
  const trees = await loadConversations(config.paths.data_dir, logger);

  logger.info(`Processing ${trees.length} conversations...`);

  const perConversation: Candidate[][] = [];
  for (let i = 0; i < trees.length; i++) {
    const tree = trees[i];
    logger.info(`  [${i + 1}/${trees.length}] ${tree.title} (${tree.id})`);
    try {
      const candidates = await extractFromConversation(tree, { provider, config, logger });
      if (candidates.length > 0) {
        logger.info(`    Found ${candidates.length} Q&A pairs`);
      }
      perConversation.push(candidates);
    } catch (error) {
      logger.error(`    Error processing ${tree.id}: ${describeError(error)}`);
    }
  }

  const candidates = aggregateCandidates(perConversation, {
    dedupe_within_conversation: config.extraction.dedupe_within_conversation,
  });
  const output = stageFilePath(config.paths.data_dir, 'extracted');
  await writeJsonFile(output, candidates);
  await clearDownstream(config.paths.data_dir, 'extracted');

  logger.info(`✅ Extraction complete: ${candidates.length} Q&A pairs -> ${output}`);
  return candidates;
}

export async function runClassifyStage(context: PipelineContext) {
  const { config, logger } = context;
  const provider = config.classifier.use_judge ? requireProvider(context, 'classify') : undefined;

  const candidates = await readCandidates(stageFilePath(config.paths.data_dir, 'extracted'));
  logger.info(`Classifying ${candidates.length} Q&A pairs...`);

  const result = await classifyCandidates(candidates, { provider, config, logger });
  const accepted = result.classified.filter((item) => item.accepted);

  await writeJsonFile(stageFilePath(config.paths.data_dir, 'classified'), result.classified);
  await writeJsonFile(stageFilePath(config.paths.data_dir, 'filtered'), accepted);
  await writeStats(config.paths.data_dir, result.stats);
  await clearDownstream(config.paths.data_dir, 'classified');

  logger.info(`✅ Kept ${accepted.length} of ${candidates.length} questions`);
  const breakdown = Object.entries(result.stats.category_breakdown).sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0));
  for (const [category, count] of breakdown) {
    logger.info(`     ${category}: ${count}`);
  }
  return result;
}

export async function runFixStage(context: PipelineContext): Promise<FinalRecord[]> {
  const { config, logger } = context;
  const fixer = context.fixer ?? createCompletionFixer();

  const filtered = await readClassified(stageFilePath(config.paths.data_dir, 'filtered'));
  const { records, fixed } = fixRecords(
    filtered.filter((item) => item.accepted),
    fixer
  );

  await writeJsonFile(stageFilePath(config.paths.data_dir, 'complete'), records);
  await clearDownstream(config.paths.data_dir, 'complete');
  logger.info(`✅ Fixed ${fixed} incomplete questions (${records.length} records)`);
  return records;
}

export async function runAnswerStage(context: PipelineContext): Promise<FinalRecord[]> {
  const { config, logger } = context;
  const provider = requireProvider(context, 'answers');

  const records = await readFinalRecords(stageFilePath(config.paths.data_dir, 'complete'));
  logger.info(`Generating fresh answers for ${records.length} questions...`);

  const result = await generateFreshAnswers(records, { provider, config, logger });
  await writeJsonFile(stageFilePath(config.paths.data_dir, 'answered'), result.records);

  logger.info(`✅ Generated ${records.length - result.failed} answers (${result.failed} failed)`);
  return result.records;
}

/**
 * Write every configured output format from the newest stage file.
 * Returns the paths written.
 */
export async function runGenerateStage(context: PipelineContext): Promise<string[]> {
  const { config, logger } = context;
  const input = resolveLatestStageFile(config.paths.data_dir);
  if (!input) {
    throw new SourceUnavailableError('No extracted Q&A pairs found. Run extraction first.', {
      data_dir: config.paths.data_dir,
    });
  }

  const all = await readFinalRecords(input);
  const records = all.filter((record) => record.question.trim().length > 0);
  if (records.length < all.length) {
    logger.warn(`  Skipped ${all.length - records.length} records with an empty question`);
  }
  if (records.length === 0) {
    logger.warn('No Q&A pairs to write.');
    return [];
  }

  const at = context.now?.() ?? new Date();
  await mkdir(config.paths.flashcards_dir, { recursive: true });

  const written: string[] = [];
  for (const kind of config.output.formats) {
    const file = path.join(config.paths.flashcards_dir, outputFileName(kind, at));
    await writeFile(file, renderFormat(kind, records, { at, baseTags: config.output.base_tags }), 'utf-8');
    written.push(file);
    logger.info(`✅ Created ${kind}: ${file}`);
  }

  logger.info(`Total flashcards: ${records.length} (from ${path.basename(input)})`);
  return written;
}

// ============================================
// Orchestration
// ============================================

export interface PipelineRunOptions {
  stages: readonly PipelineStage[];
  /** Bulk export to split, required by the import stage */
  exportFile?: string;
}

/**
 * Run the requested stages in canonical order. Fatal errors propagate.
 */
export async function executeFlashcardPipeline(
  { stages, exportFile }: PipelineRunOptions,
  context: PipelineContext
): Promise<void> {
  const requested = new Set(stages);

  for (const stage of STAGE_ORDER) {
    if (!requested.has(stage)) continue;
    context.logger.info(`\n${'='.repeat(60)}\n${stage.toUpperCase()}\n${'='.repeat(60)}`);

    switch (stage) {
      case 'import':
        if (!exportFile) {
          throw new ConfigurationError('The import stage needs an export file');
        }
        await runImportStage(exportFile, context);
        break;
      case 'extract':
        await runExtractStage(context);
        break;
      case 'classify':
        await runClassifyStage(context);
        break;
      case 'fix':
        await runFixStage(context);
        break;
      case 'answers':
        await runAnswerStage(context);
        break;
      case 'generate':
        await runGenerateStage(context);
        break;
    }
  }
}

/**
 * Execute pipeline stages individually for debugging/testing
 */
export const stages = {
  runImportStage,
  runExtractStage,
  runClassifyStage,
  runFixStage,
  runAnswerStage,
  runGenerateStage,
};
