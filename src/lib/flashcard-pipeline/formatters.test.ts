/**
 * Output Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatAnki,
  formatCsv,
  formatJson,
  formatJsonl,
  formatMarkdown,
  outputFileName,
  parseCsv,
  renderFormat,
} from './formatters';
import { makeRecord } from './testFixtures';

const GENERATED_AT = new Date(2024, 0, 15, 9, 5, 7);
const BASE_TAGS = ['chatgpt', 'socratic'];

const adenine = makeRecord('What pairs with adenine?', { answer: 'Thymine' });
const tricky = makeRecord('Line one\nline two?', {
  answer: 'Tab\there, "quoted", comma',
  source_conversation: 'conv-2',
  title: 'Cells, part 1',
});

describe('formatAnki', () => {
  it('writes one tab-separated pair per line', () => {
    expect(formatAnki([adenine, tricky])).toBe(
      'What pairs with adenine?\tThymine\nLine one<br>line two?\tTab    here, "quoted", comma\n'
    );
  });

  it('converts every newline style to <br>', () => {
    expect(formatAnki([makeRecord('a\r\nb\rc?', { answer: 'x' })])).toBe('a<br>b<br>c?\tx\n');
  });
});

describe('formatCsv', () => {
  it('writes the header and unquoted plain fields', () => {
    expect(formatCsv([adenine])).toBe(
      'question,answer,source,title\nWhat pairs with adenine?,Thymine,conv-1,DNA Basics\n'
    );
  });

  it('quotes fields with commas, quotes and newlines', () => {
    expect(formatCsv([tricky]).split('\n').slice(1).join('\n')).toBe(
      '"Line one\nline two?","Tab\there, ""quoted"", comma",conv-2,"Cells, part 1"\n'
    );
  });

  it('round-trips through parseCsv', () => {
    const records = [
      adenine,
      tricky,
      makeRecord('Carriage\r\nreturn?', { answer: '', source_conversation: '', title: '' }),
    ];

    expect(parseCsv(formatCsv(records))).toEqual(
      records.map((record) => ({
        question: record.question,
        answer: record.answer,
        source: record.source_conversation,
        title: record.title,
      }))
    );
  });
});

describe('formatMarkdown', () => {
  it('groups cards by title with per-group numbering', () => {
    const records = [
      adenine,
      makeRecord('Which sugar is in RNA?', { answer: 'Ribose', title: 'RNA' }),
      makeRecord('Which sugar is in DNA?', { answer: 'Deoxyribose' }),
    ];

    expect(formatMarkdown(records, GENERATED_AT)).toBe(
      '# Extracted Flashcards\n\n' +
        'Generated on: 2024-01-15 09:05:07\n' +
        'Total cards: 3\n\n' +
        '## DNA Basics\n\n' +
        '### Card 1\n\n**Question:** What pairs with adenine?\n\n**Answer:** Thymine\n\n---\n\n' +
        '### Card 2\n\n**Question:** Which sugar is in DNA?\n\n**Answer:** Deoxyribose\n\n---\n\n' +
        '## RNA\n\n' +
        '### Card 1\n\n**Question:** Which sugar is in RNA?\n\n**Answer:** Ribose\n\n---\n\n'
    );
  });
});

describe('formatJsonl', () => {
  it('writes one card per line and skips records missing a side', () => {
    const records = [
      adenine,
      makeRecord('No answer yet?', { answer: '  ' }),
      makeRecord('Which sugar is in RNA?', { answer: 'Ribose', title: '' }),
    ];

    const lines = formatJsonl(records, BASE_TAGS).trimEnd().split('\n');

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { front: 'What pairs with adenine?', back: 'Thymine', tags: ['chatgpt', 'socratic', 'dna'], source: 'DNA Basics' },
      { front: 'Which sugar is in RNA?', back: 'Ribose', tags: ['chatgpt', 'socratic'], source: 'Unknown' },
    ]);
  });
});

describe('formatJson', () => {
  it('wraps records with metadata', () => {
    expect(JSON.parse(formatJson([adenine], GENERATED_AT))).toEqual({
      metadata: {
        created_at: GENERATED_AT.toISOString(),
        total_cards: 1,
        source: 'Tutoring dialogue transcripts',
      },
      flashcards: [adenine],
    });
  });
});

describe('outputFileName', () => {
  it('stamps file names with the local time', () => {
    expect(outputFileName('anki', GENERATED_AT)).toBe('anki_flashcards_20240115_090507.txt');
    expect(outputFileName('csv', GENERATED_AT)).toBe('flashcards_20240115_090507.csv');
    expect(outputFileName('markdown', GENERATED_AT)).toBe('flashcards_20240115_090507.md');
    expect(outputFileName('jsonl', GENERATED_AT)).toBe('flashcards_20240115_090507.jsonl');
    expect(outputFileName('json', GENERATED_AT)).toBe('flashcards_20240115_090507.json');
  });
});

describe('renderFormat', () => {
  it('dispatches to the matching formatter', () => {
    expect(renderFormat('anki', [adenine], { at: GENERATED_AT, baseTags: BASE_TAGS })).toBe(formatAnki([adenine]));
    expect(renderFormat('jsonl', [adenine], { at: GENERATED_AT, baseTags: BASE_TAGS })).toBe(
      formatJsonl([adenine], BASE_TAGS)
    );
  });
});
