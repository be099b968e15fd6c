/**
 * Pipeline Stage Tests
 *
 * Runs the stages against temporary directories with in-process providers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  executeFlashcardPipeline,
  runAnswerStage,
  runClassifyStage,
  runExtractStage,
  runFixStage,
  runGenerateStage,
  type PipelineContext,
} from './pipeline';
import { MockLLMProvider, type LLMProvider } from './llmProvider';
import { readJsonFile, stageFilePath, writeJsonFile } from './stageFiles';
import { ConfigurationError, SourceUnavailableError } from './errors';
import { silentLogger } from './logger';
import { ADENINE_MESSAGE, linearTree, makeCandidate, makeClassified, makeConfig, makeRecord } from './testFixtures';

const NOW = new Date(2024, 0, 15, 9, 5, 7);
const COMPLETE_NUCLEOTIDE_QUESTION =
  'If you have a DNA strand that is 10 base pairs long, how many nucleotides total does that mean (considering both strands)?';

let dir: string;
let dataDir: string;
let flashcardsDir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'ankify-pipeline-'));
  dataDir = path.join(dir, 'data');
  flashcardsDir = path.join(dir, 'cards');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

/**
 * Routes each request to the mock for its purpose, so extraction and
 * judge prompts mentioning the same words get different answers.
 */
function routedProvider(routes: { extract?: MockLLMProvider; classify?: MockLLMProvider; answer?: MockLLMProvider }) {
  const fallback = new MockLLMProvider();
  const provider: LLMProvider = {
    complete: (request) => (routes[request.purpose] ?? fallback).complete(request),
  };
  return provider;
}

function context(provider?: LLMProvider, overrides: Parameters<typeof makeConfig>[0] = {}): PipelineContext {
  return {
    config: makeConfig({ ...overrides, paths: { data_dir: dataDir, flashcards_dir: flashcardsDir } }),
    logger: silentLogger,
    provider,
    now: () => NOW,
  };
}

describe('executeFlashcardPipeline', () => {
  it('turns an export into flashcard files', async () => {
    const exportFile = path.join(dir, 'conversations.json');
    await writeJsonFile(exportFile, [
      linearTree('conv-dna', 'DNA Basics', [
        ['user', 'Teach me how the bases pair, please.'],
        ['assistant', ADENINE_MESSAGE],
        ['user', 'Thymine!'],
        [
          'assistant',
          'Right. Now picture why the two strands stay together so well.\nCheck #2: How many nucleotides total does that mean (considering both strands)?',
        ],
      ]),
      linearTree('conv-faq', 'New chat', [
        ['user', 'How do I get thread IDs?'],
        ['assistant', 'Here is the process for the export tool you asked about, step by step.\nQ: How to obtain thread IDs?'],
      ]),
      { title: 'Entry without an id' },
    ]);

    const extract = new MockLLMProvider()
      .setResponse('adenine', [{ question: 'What pairs with adenine?', answer: 'Thymine' }])
      .setResponse('stay together', [
        { question: 'How many nucleotides total does that mean (considering both strands)?', answer: '20' },
      ])
      .setResponse('export tool', [{ question: 'How to obtain thread IDs?', answer: 'Use the export.' }]);
    const classify = new MockLLMProvider({ is_genuine_check: true, category: 'genuine_check' });

    await executeFlashcardPipeline(
      { stages: ['generate', 'fix', 'classify', 'extract', 'import'], exportFile },
      context(routedProvider({ extract, classify }))
    );

    expect(extract.calls).toHaveLength(3);
    expect(classify.calls).toHaveLength(2);

    expect(await readJsonFile(stageFilePath(dataDir, 'stats'))).toEqual({
      total_processed: 3,
      kept: 2,
      category_breakdown: { genuine_check: 2, faq: 1 },
    });
    expect(await readJsonFile(stageFilePath(dataDir, 'complete'))).toEqual([
      { question: 'What pairs with adenine?', answer: 'Thymine', source_conversation: 'conv-dna', title: 'DNA Basics' },
      { question: COMPLETE_NUCLEOTIDE_QUESTION, answer: '20', source_conversation: 'conv-dna', title: 'DNA Basics' },
    ]);

    expect((await readdir(flashcardsDir)).sort()).toEqual([
      'anki_flashcards_20240115_090507.txt',
      'flashcards_20240115_090507.csv',
      'flashcards_20240115_090507.json',
      'flashcards_20240115_090507.jsonl',
      'flashcards_20240115_090507.md',
    ]);
    expect(await readFile(path.join(flashcardsDir, 'anki_flashcards_20240115_090507.txt'), 'utf-8')).toBe(
      `What pairs with adenine?\tThymine\n${COMPLETE_NUCLEOTIDE_QUESTION}\t20\n`
    );
  });

  it('needs an export file for the import stage', async () => {
    await expect(executeFlashcardPipeline({ stages: ['import'] }, context())).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

describe('runExtractStage', () => {
  it('needs a provider', async () => {
    await expect(runExtractStage(context())).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('keeps regex fallback candidates when a whole-conversation call fails', async () => {
    await writeJsonFile(
      path.join(dataDir, 'conv-dna.json'),
      linearTree('conv-dna', 'DNA Basics', [['assistant', ADENINE_MESSAGE]])
    );
    const extract = new MockLLMProvider().setFailure('adenine', new Error('upstream down'));

    const candidates = await runExtractStage(
      context(routedProvider({ extract }), { extraction: { mode: 'conversation' } })
    );

    expect(candidates.map((c) => [c.question, c.origin])).toEqual([['What pairs with adenine?', 'regex_fallback']]);
    expect(await readJsonFile(stageFilePath(dataDir, 'extracted'))).toEqual(candidates);
  });

  it('dedupes repeats within a conversation once when enabled', async () => {
    await writeJsonFile(
      path.join(dataDir, 'conv-dna.json'),
      linearTree('conv-dna', 'DNA Basics', [
        ['assistant', ADENINE_MESSAGE],
        ['user', 'Thymine, I think.'],
        ['assistant', ADENINE_MESSAGE],
      ])
    );
    const extract = new MockLLMProvider([{ question: 'What pairs with adenine?', answer: 'Thymine' }]);

    const candidates = await runExtractStage(
      context(routedProvider({ extract }), { extraction: { dedupe_within_conversation: true } })
    );

    expect(extract.calls).toHaveLength(2);
    expect(candidates.map((c) => c.question)).toEqual(['What pairs with adenine?']);
  });
});

describe('runFixStage', () => {
  it('removes fresh answers left by an earlier run', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'answered'), [
      makeRecord('Which question came from the old run?', { answer: 'Stale' }),
    ]);
    await writeJsonFile(stageFilePath(dataDir, 'filtered'), [
      makeClassified('What pairs with adenine?', { answer: 'Thymine' }),
    ]);

    await runFixStage(context());
    const written = await runGenerateStage(context(undefined, { output: { formats: ['anki'] } }));

    expect(existsSync(stageFilePath(dataDir, 'answered'))).toBe(false);
    expect(await readFile(written[0], 'utf-8')).toBe('What pairs with adenine?\tThymine\n');
  });
});

describe('runClassifyStage', () => {
  it('runs the rules alone without a provider when the judge is off', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'extracted'), [
      makeCandidate('What pairs with adenine?'),
      makeCandidate('Can you explain DNA replication?'),
    ]);

    const result = await runClassifyStage(context(undefined, { classifier: { use_judge: false } }));

    expect(result.stats).toEqual({ total_processed: 2, kept: 1, category_breakdown: { genuine_check: 1, faq: 1 } });
    const filtered = await readJsonFile(stageFilePath(dataDir, 'filtered'));
    expect(filtered).toEqual([
      { ...makeCandidate('What pairs with adenine?'), category: 'genuine_check', accepted: true },
    ]);
  });

  it('needs a provider when the judge is on', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'extracted'), []);
    await expect(runClassifyStage(context())).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('runAnswerStage', () => {
  it('writes fresh answers that the generate stage then prefers', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'complete'), [
      makeRecord('What pairs with adenine?', { answer: 'Thymine' }),
    ]);
    const answer = new MockLLMProvider('Thymine, via two hydrogen bonds.');

    await runAnswerStage(context(routedProvider({ answer }), { output: { formats: ['anki'] } }));
    const written = await runGenerateStage(context(undefined, { output: { formats: ['anki'] } }));

    expect(written).toEqual([path.join(flashcardsDir, 'anki_flashcards_20240115_090507.txt')]);
    expect(await readFile(written[0], 'utf-8')).toBe('What pairs with adenine?\tThymine, via two hydrogen bonds.\n');
  });
});

describe('runGenerateStage', () => {
  it('fails when no stage file exists', async () => {
    await expect(runGenerateStage(context())).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('skips records with an empty question', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'complete'), [
      makeRecord('   ', { answer: 'Orphaned answer' }),
      makeRecord('What pairs with adenine?', { answer: 'Thymine' }),
    ]);

    const written = await runGenerateStage(context(undefined, { output: { formats: ['anki'] } }));

    expect(await readFile(written[0], 'utf-8')).toBe('What pairs with adenine?\tThymine\n');
  });

  it('writes nothing when there are no records', async () => {
    await writeJsonFile(stageFilePath(dataDir, 'extracted'), []);
    expect(await runGenerateStage(context())).toEqual([]);
  });
});
