import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  readCandidates,
  readClassified,
  readJsonFile,
  resolveLatestStageFile,
  stageFilePath,
  writeJsonFile,
} from './stageFiles';
import { DataError, SourceUnavailableError } from './errors';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'ankify-stage-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('writeJsonFile', () => {
  it('creates parent directories and writes indented JSON with a trailing newline', async () => {
    const file = path.join(dir, 'nested', 'out.json');
    await writeJsonFile(file, [{ question: 'Q?' }]);

    expect(await readFile(file, 'utf-8')).toBe('[\n  {\n    "question": "Q?"\n  }\n]\n');
  });
});

describe('readJsonFile', () => {
  it('rejects a missing file with SourceUnavailableError', async () => {
    await expect(readJsonFile(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('rejects invalid JSON with DataError', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ not json', 'utf-8');

    await expect(readJsonFile(file)).rejects.toBeInstanceOf(DataError);
  });
});

describe('readCandidates', () => {
  it('fills defaults for missing fields', async () => {
    const file = stageFilePath(dir, 'extracted');
    await writeJsonFile(file, [{ question: 'What pairs with adenine?' }]);

    expect(await readCandidates(file)).toEqual([
      {
        question: 'What pairs with adenine?',
        answer: '',
        source_conversation: '',
        title: 'Untitled',
        origin: 'message',
      },
    ]);
  });

  it('rejects a file of the wrong shape with DataError', async () => {
    const file = stageFilePath(dir, 'extracted');
    await writeJsonFile(file, [{ answer: 'orphan' }]);

    await expect(readCandidates(file)).rejects.toBeInstanceOf(DataError);
  });
});

describe('readClassified', () => {
  it('requires the classification fields', async () => {
    const file = stageFilePath(dir, 'filtered');
    await writeJsonFile(file, [{ question: 'What pairs with adenine?', answer: 'Thymine' }]);

    await expect(readClassified(file)).rejects.toBeInstanceOf(DataError);
  });
});

describe('resolveLatestStageFile', () => {
  it('prefers the most processed stage file', async () => {
    expect(resolveLatestStageFile(dir)).toBeNull();

    await writeJsonFile(stageFilePath(dir, 'extracted'), []);
    expect(resolveLatestStageFile(dir)).toBe(path.join(dir, 'extracted_qa.json'));

    await writeJsonFile(stageFilePath(dir, 'filtered'), []);
    expect(resolveLatestStageFile(dir)).toBe(path.join(dir, 'extracted_qa_filtered.json'));

    await writeJsonFile(stageFilePath(dir, 'complete'), []);
    expect(resolveLatestStageFile(dir)).toBe(path.join(dir, 'extracted_qa_complete.json'));

    await writeJsonFile(stageFilePath(dir, 'answered'), []);
    expect(resolveLatestStageFile(dir)).toBe(path.join(dir, 'extracted_qa_fresh.json'));
  });
});
