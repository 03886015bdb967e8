import type { Conversation } from '../types/index.js';

/** Display name used for the backup owner's own messages. */
export const SELF_LABEL = 'Me';

/** Name given to a conversation with no other participants. */
export const EMPTY_CHAT_NAME = 'Empty Chat';

/** Group chats list at most this many participants before summarising. */
const MAX_LISTED_PARTICIPANTS = 3;

/**
 * Derive the display name of a conversation.
 *
 * A non-empty display name set on the source device always wins, even
 * when it is only whitespace. Otherwise the name is built from the
 * participants with one self label removed: "Alice", "Alice, Bob", or
 * "Alice, Bob, Carol ... (4 people)".
 */
export function conversationName(
  conversation: Pick<Conversation, 'displayName' | 'participants'>,
): string {
  const override = conversation.displayName;
  if (override) {
    return override;
  }

  // Only the owner's own entry is dropped; a contact also named "Me" stays.
  const others = Object.values(conversation.participants);
  const self = others.indexOf(SELF_LABEL);
  if (self !== -1) others.splice(self, 1);

  if (others.length === 0) return EMPTY_CHAT_NAME;
  if (others.length <= MAX_LISTED_PARTICIPANTS) return others.join(', ');

  const listed = others.slice(0, MAX_LISTED_PARTICIPANTS).join(', ');
  return `${listed} ... (${others.length} people)`;
}
