/**
 * Stage 0: Tree Materialization
 *
 * Normalizes raw tree JSON into an id-indexed node table, finds the root
 * by walking up from the "current" leaf, and flattens the tree into a
 * deterministic pre-order sequence.
 */

import type {
  ConversationMessage,
  ConversationNode,
  ConversationTree,
  MessageRole,
  NodeId,
} from './types';
import { DataError } from './errors';

// ============================================
// Normalization
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRole(role: unknown): MessageRole {
  return role === 'user' || role === 'assistant' ? role : 'other';
}

function normalizeMessage(raw: unknown): ConversationMessage | null {
  if (!isRecord(raw)) return null;

  const content = isRecord(raw.content) ? raw.content : {};
  const contentType = typeof content.content_type === 'string' ? content.content_type : '';
  const parts: unknown[] = Array.isArray(content.parts) ? content.parts : [];
  const firstText = parts.find((part): part is string => typeof part === 'string');

  return {
    role: toRole(isRecord(raw.author) ? raw.author.role : undefined),
    content_type: contentType,
    text: firstText ?? '',
  };
}

function normalizeNode(key: string, raw: Record<string, unknown>): ConversationNode {
  const children = Array.isArray(raw.children)
    ? raw.children.filter((child): child is string => typeof child === 'string')
    : [];

  return {
    id: typeof raw.id === 'string' && raw.id ? raw.id : key,
    parent_id: typeof raw.parent === 'string' && raw.parent ? raw.parent : null,
    children,
    message: normalizeMessage(raw.message),
  };
}

/**
 * Build a ConversationTree from raw JSON (see RawConversationTree).
 *
 * Throws DataError when the payload is not a tree object at all. A missing
 * or malformed mapping yields an empty tree rather than an error.
 */
export function normalizeConversationTree(
  raw: unknown,
  fallbackId = 'unknown'
): ConversationTree {
  if (!isRecord(raw)) {
    throw new DataError('Conversation payload is not an object', { conversation: fallbackId });
  }

  const tree = raw;
  const mapping = new Map<NodeId, ConversationNode>();

  if (isRecord(tree.mapping)) {
    for (const [key, node] of Object.entries(tree.mapping)) {
      if (!isRecord(node)) continue;
      mapping.set(key, normalizeNode(key, node));
    }
  }

  return {
    id: typeof tree.id === 'string' && tree.id ? tree.id : fallbackId,
    title: typeof tree.title === 'string' && tree.title ? tree.title : 'Untitled',
    current_node: typeof tree.current_node === 'string' && tree.current_node ? tree.current_node : null,
    mapping,
  };
}

// ============================================
// Root Discovery
// ============================================

export interface RootDiscovery {
  root_id: NodeId | null;
  steps: number;
  cycle_detected: boolean;
}

/**
 * Walk parent links up from the current node.
 *
 * Stops at a node with no parent or an unresolvable one. The walk is bounded
 * by the mapping size; on a cyclic chain the current node itself is the root.
 * Only the ancestor chain of the current node is reachable this way.
 */
export function findRoot(tree: ConversationTree): RootDiscovery {
  const start = tree.current_node;
  if (start === null || !tree.mapping.has(start)) {
    return { root_id: null, steps: 0, cycle_detected: false };
  }

  const visited = new Set<NodeId>([start]);
  let cursor = start;
  let steps = 0;

  while (steps < tree.mapping.size) {
    const parentId = tree.mapping.get(cursor)?.parent_id ?? null;
    if (parentId === null || !tree.mapping.has(parentId)) {
      return { root_id: cursor, steps, cycle_detected: false };
    }
    if (visited.has(parentId)) {
      return { root_id: start, steps, cycle_detected: true };
    }
    visited.add(parentId);
    cursor = parentId;
    steps++;
  }

  return { root_id: start, steps, cycle_detected: true };
}

// ============================================
// Flattening
// ============================================

/**
 * Pre-order depth-first walk from the discovered root, children in stored
 * order. Uses an explicit stack; nodes already emitted are not revisited.
 */
export function materialize(tree: ConversationTree): ConversationNode[] {
  const { root_id } = findRoot(tree);
  if (root_id === null) return [];

  const ordered: ConversationNode[] = [];
  const visited = new Set<NodeId>();
  const stack: NodeId[] = [root_id];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;

    const node = tree.mapping.get(id);
    if (!node) continue;

    visited.add(id);
    ordered.push(node);

    for (let i = node.children.length - 1; i >= 0; i--) {
      const childId = node.children[i];
      if (tree.mapping.has(childId) && !visited.has(childId)) {
        stack.push(childId);
      }
    }
  }

  return ordered;
}
