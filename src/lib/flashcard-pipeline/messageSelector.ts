/**
 * Stage 1: Message Selection
 *
 * Filters the flattened node sequence down to role-tagged textual messages.
 */

import type { ConversationNode, SelectedMessage } from './types';

export type SelectableRole = SelectedMessage['role'];

export const TEXT_CONTENT_TYPE = 'text';

export const ALL_SELECTABLE_ROLES: readonly SelectableRole[] = ['user', 'assistant'];

/**
 * Returns true if the node carries a message eligible for output
 */
export function isSelectable(
  node: ConversationNode,
  roles: readonly SelectableRole[] = ALL_SELECTABLE_ROLES
): boolean {
  const message = node.message;
  if (!message) return false;
  if (message.content_type !== TEXT_CONTENT_TYPE) return false;
  if (message.text.trim().length === 0) return false;
  return message.role !== 'other' && roles.includes(message.role);
}

/**
 * Lazy, restartable view over the selectable messages of a traversal.
 * Each iteration walks the node list again from the start.
 */
export function selectMessages(
  nodes: readonly ConversationNode[],
  roles: readonly SelectableRole[] = ALL_SELECTABLE_ROLES
): Iterable<SelectedMessage> {
  return {
    *[Symbol.iterator]() {
      for (let index = 0; index < nodes.length; index++) {
        const node = nodes[index];
        const message = node.message;
        if (!message || message.role === 'other' || !isSelectable(node, roles)) continue;

        yield {
          node_id: node.id,
          role: message.role,
          text: message.text,
          index,
        };
      }
    },
  };
}
