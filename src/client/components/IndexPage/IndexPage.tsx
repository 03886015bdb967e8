/**
 * Landing page: searchable list of every conversation, most recent first.
 */

import type { ConversationSummary } from '../../../server/types/index.js';
import { formatDateTime } from '../../../server/services/dateConvert.js';

interface IndexPageProps {
  title: string;
  conversations: readonly ConversationSummary[];
  timeZone: string;
}

/** Output file of a conversation page, relative to the site root. */
export function chatPageHref(chatId: string): string {
  return `chats/chat_${encodeURIComponent(chatId)}.html`;
}

export function IndexPage({ title, conversations, timeZone }: IndexPageProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{title}</title>
        <link rel="stylesheet" href="css/style.css" />
      </head>
      <body>
        <div className="container">
          <header className="main-header">
            <h1>{title}</h1>
            <p>Your backed up conversations</p>
          </header>
          <div className="search-bar">
            <input type="text" id="chat-search" placeholder="Search chats..." />
          </div>
          <div className="chat-list">
            {conversations.map((chat) => (
              <ChatListItem key={chat.chatId} chat={chat} timeZone={timeZone} />
            ))}
          </div>
        </div>
        <script src="js/script.js"></script>
      </body>
    </html>
  );
}

function ChatListItem({ chat, timeZone }: { chat: ConversationSummary; timeZone: string }) {
  const lastMessageDate = chat.lastMessageTimestamp === null
    ? 'No messages'
    : formatDateTime(chat.lastMessageTimestamp, timeZone);

  return (
    <a href={chatPageHref(chat.chatId)} className="chat-item">
      <div className="chat-info">
        <h2 className="chat-name">{chat.name}</h2>
        <p className="chat-preview">{chat.lastMessagePreview}</p>
      </div>
      <div className="chat-date">{lastMessageDate}</div>
    </a>
  );
}
