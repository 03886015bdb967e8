/**
 * Conversation page: message history in chronological order with a
 * divider at the start of each calendar date.
 */

import { Fragment } from 'react';
import type { ConversationPage, SequencedMessage } from '../../../server/types/index.js';
import { attachmentHref } from '../../../server/services/attachments.js';
import { formatClockTime } from '../../../server/services/dateConvert.js';

interface ChatPageProps {
  page: ConversationPage;
  timeZone: string;
}

export function ChatPage({ page, timeZone }: ChatPageProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{`Chat: ${page.name}`}</title>
        <link rel="stylesheet" href="../css/style.css" />
      </head>
      <body>
        <div className="chat-container">
          <header>
            <a href="../index.html" className="back-button">&larr; Back to Chats</a>
            <h1>{page.name}</h1>
            <div className="participants">{page.participantNames.join(', ')}</div>
          </header>
          <div className="messages">
            {page.messages.map((entry, i) => (
              <Fragment key={i}>
                {entry.startsDateBucket && (
                  <div className="date-divider">{entry.dateKey}</div>
                )}
                <MessageBubble entry={entry} timeZone={timeZone} />
              </Fragment>
            ))}
          </div>
        </div>
        <script src="../js/script.js"></script>
      </body>
    </html>
  );
}

function MessageBubble({ entry, timeZone }: { entry: SequencedMessage; timeZone: string }) {
  const { message, attachment } = entry;

  return (
    <div className={`message-${entry.side}`}>
      <div className="message-header">
        <span className="sender">{entry.senderName}</span>
        <span className="time">{formatClockTime(entry.timestamp, timeZone)}</span>
      </div>
      <div className="message-content">
        {message.text && <p>{message.text}</p>}
        {attachment?.kind === 'image' && (
          <img src={attachmentHref(attachment.fileName)} alt="Attachment" className="message-image" />
        )}
        {attachment?.kind === 'generic' && (
          <a href={attachmentHref(attachment.fileName)} className="attachment-link">
            {`Attachment: ${attachment.fileName}`}
          </a>
        )}
      </div>
    </div>
  );
}
