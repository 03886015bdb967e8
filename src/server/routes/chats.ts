import type { FastifyInstance } from 'fastify';

import { SiteError } from '../errors.js';
import { formatClockTime } from '../services/dateConvert.js';
import type { ConversationPage, SequencedMessage, SiteModel } from '../types/index.js';

export interface ChatRoutesOptions {
  model: SiteModel;
  timeZone: string;
}

/** JSON shape of one message in the preview API. */
export interface MessageResponse {
  timestamp: number;
  date: string;
  time: string;
  startsDateBucket: boolean;
  sender: string;
  side: SequencedMessage['side'];
  text: string | null;
  attachment: SequencedMessage['attachment'];
}

function toMessageResponse(entry: SequencedMessage, timeZone: string): MessageResponse {
  return {
    timestamp: entry.timestamp,
    date: entry.dateKey,
    time: formatClockTime(entry.timestamp, timeZone),
    startsDateBucket: entry.startsDateBucket,
    sender: entry.senderName,
    side: entry.side,
    text: entry.message.text,
    attachment: entry.attachment,
  };
}

/**
 * Conversation routes plugin.
 *
 * Exposes the normalized site model the generator renders, so other
 * tools can read the same ordering and naming as the static pages.
 */
export default async function chatRoutes(
  fastify: FastifyInstance,
  options: ChatRoutesOptions,
): Promise<void> {
  const { model, timeZone } = options;
  const pages = new Map<string, ConversationPage>(
    model.pages.map((page) => [page.chatId, page]),
  );

  /** GET /api/chats: Conversation summaries, most recent first. */
  fastify.get('/api/chats', async () => ({
    chats: model.index,
    count: model.index.length,
  }));

  /** GET /api/chats/:id/messages: Messages of one conversation in display order. */
  fastify.get<{
    Params: { id: string };
  }>('/api/chats/:id/messages', async (request) => {
    const { id } = request.params;
    const page = pages.get(id);

    if (!page) {
      throw new SiteError(`Unknown chat: ${id}`, 'NOT_FOUND', { statusCode: 404 });
    }

    return {
      chatId: page.chatId,
      name: page.name,
      messages: page.messages.map((entry) => toMessageResponse(entry, timeZone)),
      count: page.messages.length,
    };
  });
}
