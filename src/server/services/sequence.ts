/**
 * Message sequencing: puts a conversation's messages in chronological
 * order and annotates each with what the chat page needs: date-bucket
 * boundaries, sender name, bubble side and attachment kind.
 */

import type {
  BackupMessage,
  Conversation,
  PipelineOptions,
  SequencedMessage,
} from '../types/index.js';
import { appleToUnix, calendarDateKey } from './dateConvert.js';
import { SELF_LABEL } from './naming.js';
import { toAttachment } from './attachments.js';

/** Shown when a message has neither the self flag nor a sender id. */
export const UNKNOWN_SENDER = 'Unknown';

/**
 * Resolve the name shown above a message bubble. Unknown sender ids fall
 * back to the raw id rather than failing.
 */
export function resolveSenderName(
  message: BackupMessage,
  participants: Conversation['participants'],
): string {
  if (message.isFromMe) return SELF_LABEL;
  if (message.sender === null) return UNKNOWN_SENDER;
  return Object.hasOwn(participants, message.sender)
    ? participants[message.sender]
    : message.sender;
}

/**
 * Order a conversation's messages by normalized timestamp (stable for
 * equal timestamps) and mark where each calendar date begins.
 *
 * Never throws; an empty conversation yields an empty sequence. The
 * input conversation is left untouched.
 */
export function sequenceMessages(
  conversation: Pick<Conversation, 'participants' | 'messages'>,
  options: PipelineOptions,
): SequencedMessage[] {
  const ordered = conversation.messages
    .map((message) => ({ message, timestamp: appleToUnix(message.date) }))
    .sort((a, b) => a.timestamp - b.timestamp);

  let previousDateKey: string | null = null;

  return ordered.map(({ message, timestamp }): SequencedMessage => {
    const dateKey = calendarDateKey(timestamp, options.timeZone);
    const startsDateBucket = dateKey !== previousDateKey;
    previousDateKey = dateKey;

    return {
      message,
      timestamp,
      dateKey,
      startsDateBucket,
      senderName: resolveSenderName(message, conversation.participants),
      side: message.isFromMe ? 'outgoing' : 'incoming',
      attachment: toAttachment(message.attachmentPath),
    };
  });
}
