import type {
  Conversation,
  ConversationSummary,
  SequencedMessage,
} from '../types/index.js';
import { conversationName } from './naming.js';

/** Previews longer than this many characters are cut. */
export const PREVIEW_LENGTH = 50;
export const PREVIEW_ELLIPSIS = '...';

/**
 * Shorten a message text for the index page. Counts code points so an
 * emoji is never split in half.
 */
export function previewText(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= PREVIEW_LENGTH) return text;
  return chars.slice(0, PREVIEW_LENGTH).join('') + PREVIEW_ELLIPSIS;
}

/**
 * Newest non-empty text of a sequence, in newest-first order. Messages
 * that share a timestamp keep their document order, so within a run of
 * equal timestamps the earliest entry is considered first.
 */
function newestText(sequence: readonly SequencedMessage[]): string | null {
  let end = sequence.length;
  while (end > 0) {
    const timestamp = sequence[end - 1].timestamp;
    let start = end - 1;
    while (start > 0 && sequence[start - 1].timestamp === timestamp) start--;

    for (let i = start; i < end; i++) {
      const text = sequence[i].message.text;
      if (text) return text;
    }
    end = start;
  }
  return null;
}

/**
 * Build the index summary of a conversation from its sequenced messages.
 *
 * The sequence must come from `sequenceMessages`, so the last entry is
 * the newest message.
 */
export function summarizeConversation(
  conversation: Pick<Conversation, 'chatId' | 'displayName' | 'participants'>,
  sequence: readonly SequencedMessage[],
): ConversationSummary {
  const newest = sequence.at(-1);
  const text = newestText(sequence);
  const lastMessagePreview = text === null ? '' : previewText(text);

  return {
    chatId: conversation.chatId,
    name: conversationName(conversation),
    lastMessageTimestamp: newest ? newest.timestamp : null,
    lastMessagePreview,
  };
}
