/**
 * Stage files: the persisted hand-off between pipeline stages.
 *
 * Each stage reads one complete file and writes one complete file. A crash
 * mid-stage means rerunning that stage from its input file.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Candidate, ClassificationStats, ClassifiedCandidate, FinalRecord } from './types';
import { DataError, SourceUnavailableError } from './errors';

export const STAGE_FILES = {
  extracted: 'extracted_qa.json',
  classified: 'extracted_qa_classified.json',
  filtered: 'extracted_qa_filtered.json',
  complete: 'extracted_qa_complete.json',
  answered: 'extracted_qa_fresh.json',
  stats: 'postprocess_stats.json',
} as const;

export type StageName = keyof typeof STAGE_FILES;

export const STAGE_FILE_NAMES: ReadonlySet<string> = new Set(Object.values(STAGE_FILES));

export function stageFilePath(dataDir: string, stage: StageName): string {
  return path.join(dataDir, STAGE_FILES[stage]);
}

// ============================================
// Schemas
// ============================================

const CandidateSchema = z.object({
  question: z.string(),
  answer: z.string().default(''),
  source_conversation: z.string().default(''),
  title: z.string().default('Untitled'),
  origin: z.enum(['message', 'conversation', 'regex_fallback']).default('message'),
});

const ClassifiedCandidateSchema = CandidateSchema.extend({
  category: z.enum(['genuine_check', 'faq', 'rhetorical', 'meta', 'other', 'error']),
  accepted: z.boolean(),
  rejected_by: z.enum(['rules', 'judge']).optional(),
  reason: z.string().optional(),
});

const FinalRecordSchema = z.object({
  question: z.string(),
  answer: z.string().default(''),
  source_conversation: z.string().default(''),
  title: z.string().default('Untitled'),
  original_answer: z.string().optional(),
});

// ============================================
// IO
// ============================================

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  if (!existsSync(filePath)) {
    throw new SourceUnavailableError(`Input file not found: ${filePath}`, { file: filePath });
  }
  const text = await readFile(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DataError(`Input file is not valid JSON: ${filePath}`, {
      file: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

async function readList<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>[]> {
  const parsed = z.array(schema).safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw new DataError(`Stage file has an unexpected shape: ${filePath}`, {
      file: filePath,
      issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function readCandidates(filePath: string): Promise<Candidate[]> {
  return readList(filePath, CandidateSchema);
}

export function readClassified(filePath: string): Promise<ClassifiedCandidate[]> {
  return readList(filePath, ClassifiedCandidateSchema);
}

export function readFinalRecords(filePath: string): Promise<FinalRecord[]> {
  return readList(filePath, FinalRecordSchema);
}

export function writeStats(dataDir: string, stats: ClassificationStats): Promise<void> {
  return writeJsonFile(stageFilePath(dataDir, 'stats'), stats);
}

/**
 * Files each stage makes obsolete when it writes a new output. A rerun of
 * an earlier stage must not leave later outputs from the previous run behind.
 */
const DOWNSTREAM: Record<'extracted' | 'classified' | 'complete', StageName[]> = {
  extracted: ['classified', 'filtered', 'stats', 'complete', 'answered'],
  classified: ['complete', 'answered'],
  complete: ['answered'],
};

export async function clearDownstream(dataDir: string, stage: keyof typeof DOWNSTREAM): Promise<void> {
  for (const later of DOWNSTREAM[stage]) {
    await rm(stageFilePath(dataDir, later), { force: true });
  }
}

/**
 * Newest available input for card generation: answered, then complete,
 * then filtered, then raw extraction output.
 */
export function resolveLatestStageFile(dataDir: string): string | null {
  const order: StageName[] = ['answered', 'complete', 'filtered', 'extracted'];
  for (const stage of order) {
    const candidate = stageFilePath(dataDir, stage);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}
