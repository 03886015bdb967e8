import type { ConversationSummary } from '../types/index.js';

/**
 * Order conversation summaries for the landing page: most recent first,
 * conversations without messages last. Ties keep their input order.
 */
export function orderIndex(
  summaries: readonly ConversationSummary[],
): ConversationSummary[] {
  return [...summaries].sort((a, b) => {
    if (a.lastMessageTimestamp === null) return b.lastMessageTimestamp === null ? 0 : 1;
    if (b.lastMessageTimestamp === null) return -1;
    return b.lastMessageTimestamp - a.lastMessageTimestamp;
  });
}
