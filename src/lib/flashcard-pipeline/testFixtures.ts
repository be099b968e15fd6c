/**
 * Builders for raw trees, configs and candidates used across the tests.
 */

import { vi } from 'vitest';
import type {
  Candidate,
  ClassifiedCandidate,
  FinalRecord,
  Logger,
  PipelineConfig,
  PipelineConfigOverrides,
} from './types';
import { DEFAULT_PIPELINE_CONFIG, mergeConfig } from './types';

export interface NodeSpec {
  id: string;
  parent?: string | null;
  children?: string[];
  /** No role means the node carries no message */
  role?: string;
  text?: string;
  contentType?: string;
}

export function rawTree(
  nodes: NodeSpec[],
  meta: { id?: string; title?: string; current_node?: string } = {}
): Record<string, unknown> {
  const mapping: Record<string, unknown> = {};
  for (const node of nodes) {
    mapping[node.id] = {
      id: node.id,
      parent: node.parent ?? null,
      children: node.children ?? [],
      message:
        node.role === undefined
          ? null
          : {
              author: { role: node.role },
              content: { content_type: node.contentType ?? 'text', parts: [node.text ?? ''] },
            },
    };
  }
  return { ...meta, mapping };
}

/**
 * A single-branch conversation: root -> m1 -> m2 -> ... with the last
 * message as the current node.
 */
export function linearTree(
  id: string,
  title: string,
  messages: Array<[role: string, text: string]>
): Record<string, unknown> {
  const nodes: NodeSpec[] = [{ id: 'root', children: messages.length > 0 ? ['m1'] : [] }];
  messages.forEach(([role, text], i) => {
    nodes.push({
      id: `m${i + 1}`,
      parent: i === 0 ? 'root' : `m${i}`,
      children: i + 1 < messages.length ? [`m${i + 2}`] : [],
      role,
      text,
    });
  });
  return rawTree(nodes, {
    id,
    title,
    current_node: messages.length > 0 ? `m${messages.length}` : 'root',
  });
}

export function makeConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return mergeConfig(DEFAULT_PIPELINE_CONFIG, overrides);
}

export function makeCandidate(question: string, overrides: Partial<Candidate> = {}): Candidate {
  return {
    question,
    answer: 'An answer',
    source_conversation: 'conv-1',
    title: 'DNA Basics',
    origin: 'message',
    ...overrides,
  };
}

export function makeClassified(question: string, overrides: Partial<ClassifiedCandidate> = {}): ClassifiedCandidate {
  return {
    ...makeCandidate(question),
    category: 'genuine_check',
    accepted: true,
    ...overrides,
  };
}

export function makeRecord(question: string, overrides: Partial<FinalRecord> = {}): FinalRecord {
  return {
    question,
    answer: 'An answer',
    source_conversation: 'conv-1',
    title: 'DNA Basics',
    ...overrides,
  };
}

export function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/** Assistant turn whose closing line is a marked teaching question */
export const ADENINE_MESSAGE =
  'Background text long enough to explain how the bases pair across the two strands.\nQ: What pairs with adenine?';
