/** Core domain types for the message backup site generator. */

/** Participant id (phone number, email or extractor key) → display name. */
export type ParticipantMap = Record<string, string>;

/** A single message as read from a backup document. */
export interface BackupMessage {
  /** Participant id of the sender. Null when the extractor had none. */
  sender: string | null;
  /** Raw Apple timestamp: seconds (older backups) or nanoseconds since 2001-01-01. */
  date: number;
  /** Whether this message was sent by the backup owner. */
  isFromMe: boolean;
  /** Message body text. Null for attachment-only messages. */
  text: string | null;
  /** Attachment file name relative to the attachments folder. */
  attachmentPath: string | null;
}

/** One conversation document from the backup. */
export interface Conversation {
  /** Unique, file-name safe chat identifier. */
  chatId: string;
  /** Explicit name assigned on the source device, if any. */
  displayName: string | null;
  participants: ParticipantMap;
  /** Messages in extractor order (not necessarily chronological). */
  messages: BackupMessage[];
}

export type AttachmentKind = 'image' | 'generic';

export interface Attachment {
  fileName: string;
  kind: AttachmentKind;
}

export type MessageSide = 'outgoing' | 'incoming';

/** A message placed in chronological order with its rendering hints. */
export interface SequencedMessage {
  message: BackupMessage;
  /** Unix seconds. */
  timestamp: number;
  /** Calendar date (yyyy-MM-dd) in the site's time zone. */
  dateKey: string;
  /** True for the first message of each calendar date. */
  startsDateBucket: boolean;
  senderName: string;
  side: MessageSide;
  attachment: Attachment | null;
}

/** What the index page needs to know about a conversation. */
export interface ConversationSummary {
  chatId: string;
  name: string;
  /** Unix seconds of the newest message. Null for empty conversations. */
  lastMessageTimestamp: number | null;
  lastMessagePreview: string;
}

/** Everything needed to render one conversation page. */
export interface ConversationPage {
  chatId: string;
  name: string;
  participantNames: string[];
  messages: SequencedMessage[];
}

/** The normalized model handed to the renderer. */
export interface SiteModel {
  /** Summaries, most recent first. */
  index: ConversationSummary[];
  /** Pages in input order. */
  pages: ConversationPage[];
}

/** Options shared by the calendar-aware pipeline steps. */
export interface PipelineOptions {
  /** IANA time zone used for date buckets and displayed times. */
  timeZone: string;
}

/** Resolved configuration for a generator run. */
export interface SiteConfig extends PipelineOptions {
  /** Backup directory or archive. */
  inputPath: string;
  outputDir: string;
  title: string;
}

/** Server-only settings layered on top of the site configuration. */
export interface ServerConfig extends SiteConfig {
  port: number;
  host: string;
  /** Allowed CORS origin in production. False disables cross-origin access. */
  corsOrigin: string | false;
  production: boolean;
}

/** Counts reported after a generator run. */
export interface GenerateResult {
  conversations: number;
  messages: number;
  attachments: number;
  outputDir: string;
}

/** Structured error response format. */
export interface ErrorResponse {
  error: {
    /** Machine-readable error code (e.g. NOT_FOUND, UNSUPPORTED_FORMAT). */
    code: string;
    /** Human-readable error message. */
    message: string;
    /** Optional additional details for debugging. */
    details?: unknown;
  };
}
