/**
 * Output projections for final flashcard records.
 *
 * Every formatter is pure and order-preserving; none of them filter
 * except JSONL, which mirrors card-store rules and skips records with an
 * empty question or answer.
 */

import { format } from 'date-fns';
import type { FinalRecord, OutputFormat } from './types';
import { buildTags, groupByTitle } from './aggregation';

// ============================================
// Anki (tab-separated pairs)
// ============================================

function escapeAnkiField(value: string): string {
  return value.replace(/\r\n|\r|\n/g, '<br>').replace(/\t/g, '    ');
}

export function formatAnki(records: readonly FinalRecord[]): string {
  return records
    .map((record) => `${escapeAnkiField(record.question)}\t${escapeAnkiField(record.answer)}\n`)
    .join('');
}

// ============================================
// CSV
// ============================================

export const CSV_HEADER = ['question', 'answer', 'source', 'title'] as const;

export type CsvRow = Record<(typeof CSV_HEADER)[number], string>;

function quoteCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(records: readonly FinalRecord[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const record of records) {
    const row: CsvRow = {
      question: record.question,
      answer: record.answer,
      source: record.source_conversation,
      title: record.title,
    };
    lines.push(CSV_HEADER.map((column) => quoteCsvField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Parse CSV text into rows of fields (RFC 4180 quoting, LF or CRLF)
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      if (char === '\r' && text[i + 1] === '\n') i++;
    } else {
      field += char;
    }
    i++;
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * Parse CSV written by formatCsv back into keyed rows
 */
export function parseCsv(text: string): CsvRow[] {
  const [header, ...body] = parseCsvRows(text);
  if (!header) return [];

  return body.map((fields) => {
    const row: CsvRow = { question: '', answer: '', source: '', title: '' };
    for (const column of CSV_HEADER) {
      const index = header.indexOf(column);
      row[column] = index >= 0 ? fields[index] ?? '' : '';
    }
    return row;
  });
}

// ============================================
// Markdown
// ============================================

export function formatMarkdown(records: readonly FinalRecord[], generatedAt: Date): string {
  let markdown = '# Extracted Flashcards\n\n';
  markdown += `Generated on: ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}\n`;
  markdown += `Total cards: ${records.length}\n\n`;

  for (const [title, cards] of groupByTitle(records)) {
    markdown += `## ${title}\n\n`;
    cards.forEach((record, idx) => {
      markdown += `### Card ${idx + 1}\n\n`;
      markdown += `**Question:** ${record.question}\n\n`;
      markdown += `**Answer:** ${record.answer}\n\n`;
      markdown += '---\n\n';
    });
  }

  return markdown;
}

// ============================================
// JSON Lines / JSON
// ============================================

export interface CardLine {
  front: string;
  back: string;
  tags: string[];
  source: string;
}

export function toCardLines(records: readonly FinalRecord[], baseTags: readonly string[]): CardLine[] {
  return records
    .filter((record) => record.question.trim() && record.answer.trim())
    .map((record) => ({
      front: record.question,
      back: record.answer,
      tags: buildTags(record.title, baseTags),
      source: record.title || 'Unknown',
    }));
}

export function formatJsonl(records: readonly FinalRecord[], baseTags: readonly string[]): string {
  return toCardLines(records, baseTags)
    .map((line) => `${JSON.stringify(line)}\n`)
    .join('');
}

export function formatJson(records: readonly FinalRecord[], createdAt: Date): string {
  return JSON.stringify(
    {
      metadata: {
        created_at: createdAt.toISOString(),
        total_cards: records.length,
        source: 'Tutoring dialogue transcripts',
      },
      flashcards: records,
    },
    null,
    2
  );
}

// ============================================
// File naming
// ============================================

export function outputFileName(kind: OutputFormat, at: Date): string {
  const stamp = format(at, 'yyyyMMdd_HHmmss');
  switch (kind) {
    case 'anki':
      return `anki_flashcards_${stamp}.txt`;
    case 'csv':
      return `flashcards_${stamp}.csv`;
    case 'markdown':
      return `flashcards_${stamp}.md`;
    case 'jsonl':
      return `flashcards_${stamp}.jsonl`;
    case 'json':
      return `flashcards_${stamp}.json`;
  }
}

/**
 * Render one output format
 */
export function renderFormat(
  kind: OutputFormat,
  records: readonly FinalRecord[],
  options: { at: Date; baseTags: readonly string[] }
): string {
  switch (kind) {
    case 'anki':
      return formatAnki(records);
    case 'csv':
      return formatCsv(records);
    case 'markdown':
      return formatMarkdown(records, options.at);
    case 'jsonl':
      return formatJsonl(records, options.baseTags);
    case 'json':
      return formatJson(records, options.at);
  }
}
