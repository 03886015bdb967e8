import type {
  Conversation,
  ConversationPage,
  ConversationSummary,
  PipelineOptions,
  SiteModel,
} from '../types/index.js';
import { conversationName } from './naming.js';
import { sequenceMessages } from './sequence.js';
import { summarizeConversation } from './summary.js';
import { orderIndex } from './siteIndex.js';

/**
 * Run the whole transformation pipeline.
 *
 * Each conversation is sequenced and summarised on its own; ordering the
 * index is the only step that needs every summary at once.
 */
export function buildSiteModel(
  conversations: readonly Conversation[],
  options: PipelineOptions,
): SiteModel {
  const pages: ConversationPage[] = [];
  const summaries: ConversationSummary[] = [];

  for (const conversation of conversations) {
    const messages = sequenceMessages(conversation, options);
    pages.push({
      chatId: conversation.chatId,
      name: conversationName(conversation),
      participantNames: Object.values(conversation.participants),
      messages,
    });
    summaries.push(summarizeConversation(conversation, messages));
  }

  return { index: orderIndex(summaries), pages };
}
