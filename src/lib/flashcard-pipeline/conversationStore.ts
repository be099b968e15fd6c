/**
 * Raw conversation tree files on disk.
 *
 * One `<conversation-id>.json` per tree in the data directory, next to the
 * stage files. Trees come from a bulk export split by splitExport or from
 * an external fetcher that writes the same layout.
 */

import { readdir } from 'node:fs/promises';
import path from 'node:path';
import type { ConversationTree, Logger } from './types';
import { normalizeConversationTree } from './treeMaterializer';
import { readJsonFile, writeJsonFile, STAGE_FILE_NAMES } from './stageFiles';
import { DataError, SourceUnavailableError, describeError } from './errors';

export const EXPORT_SUMMARY_FILE = '.process_summary.json';

const RESERVED_FILES = new Set(['conversations.json', 'conversations_list.json']);

function isConversationFile(name: string): boolean {
  return (
    name.endsWith('.json') &&
    !name.startsWith('.') &&
    !STAGE_FILE_NAMES.has(name) &&
    !RESERVED_FILES.has(name)
  );
}

/**
 * Tree files in the data directory, sorted by name
 */
export async function listConversationFiles(dataDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dataDir);
  } catch (error) {
    throw new SourceUnavailableError(`Data directory not readable: ${dataDir}`, {
      cause: describeError(error),
    });
  }
  return names.filter(isConversationFile).sort().map((name) => path.join(dataDir, name));
}

export async function loadConversation(filePath: string): Promise<ConversationTree> {
  const stem = path.basename(filePath, '.json');
  return normalizeConversationTree(await readJsonFile(filePath), stem);
}

/**
 * Load every tree file. Unreadable trees are logged and skipped.
 */
export async function loadConversations(dataDir: string, logger: Logger): Promise<ConversationTree[]> {
  const files = await listConversationFiles(dataDir);
  const trees: ConversationTree[] = [];

  for (const file of files) {
    try {
      trees.push(await loadConversation(file));
    } catch (error) {
      logger.error(`  Skipping ${path.basename(file)}: ${describeError(error)}`);
    }
  }
  return trees;
}

// ============================================
// Bulk export
// ============================================

export interface ExportSummary {
  processed_at: string;
  conversation_count: number;
  conversations: Array<{ id: string; title: string; nodes: number }>;
}

/**
 * Split a bulk export (an array of raw trees) into one file per tree.
 * Entries without an id are skipped.
 */
export async function splitExport(
  exportFile: string,
  dataDir: string,
  logger: Logger,
  now: Date = new Date()
): Promise<ExportSummary> {
  let data: unknown;
  try {
    data = await readJsonFile(exportFile);
  } catch (error) {
    if (error instanceof DataError) {
      throw new SourceUnavailableError(`Export file is not valid JSON: ${exportFile}`, {
        file: exportFile,
        cause: error.message,
      });
    }
    throw error;
  }
  if (!Array.isArray(data)) {
    throw new SourceUnavailableError('Export file does not contain a list of conversations', {
      file: exportFile,
    });
  }

  const summary: ExportSummary = {
    processed_at: now.toISOString(),
    conversation_count: 0,
    conversations: [],
  };

  for (const entry of data) {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) continue;
    const id = 'id' in entry && typeof entry.id === 'string' ? entry.id : '';
    if (!id) continue;

    const tree = normalizeConversationTree(entry, id);
    await writeJsonFile(path.join(dataDir, `${id}.json`), entry);

    summary.conversations.push({ id, title: tree.title, nodes: tree.mapping.size });
    logger.info(`  Processed: ${tree.title} (${tree.mapping.size} nodes)`);
  }

  summary.conversation_count = summary.conversations.length;
  await writeJsonFile(path.join(dataDir, EXPORT_SUMMARY_FILE), summary);
  return summary;
}
