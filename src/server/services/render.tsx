/**
 * Renderer: turns the normalized site model into HTML documents using
 * React's static server renderer. React escapes all message text.
 */

import { renderToStaticMarkup } from 'react-dom/server';

import { ChatPage } from '../../client/components/ChatPage/ChatPage.js';
import { IndexPage } from '../../client/components/IndexPage/IndexPage.js';
import type { ConversationPage, ConversationSummary } from '../types/index.js';

const DOCTYPE = '<!DOCTYPE html>\n';

export interface RenderOptions {
  title: string;
  timeZone: string;
}

export function renderIndexPage(
  conversations: readonly ConversationSummary[],
  options: RenderOptions,
): string {
  return DOCTYPE + renderToStaticMarkup(
    <IndexPage title={options.title} conversations={conversations} timeZone={options.timeZone} />,
  );
}

export function renderChatPage(
  page: ConversationPage,
  options: Pick<RenderOptions, 'timeZone'>,
): string {
  return DOCTYPE + renderToStaticMarkup(
    <ChatPage page={page} timeZone={options.timeZone} />,
  );
}

/** File name of a conversation page inside the chats/ folder. */
export function chatPageFileName(chatId: string): string {
  return `chat_${chatId}.html`;
}
