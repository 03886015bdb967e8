/**
 * Backup reader: loads the conversation documents written by the
 * extractor (`<source>/chats/*.json`) and validates them into the
 * in-memory model.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import pino from 'pino';
import { z } from 'zod';

import { SiteError } from '../errors.js';
import type { Conversation } from '../types/index.js';

export const CHATS_DIR = 'chats';
export const ATTACHMENTS_DIR = 'attachments';

/** Rejects ids that would escape the chats/ output folder. */
function isFileNameSafe(id: string): boolean {
  return id.length > 0 && id !== '.' && id !== '..' && !/[\\/]/.test(id);
}

const optionalText = z.string().nullish().transform((value) => value ?? null);

const messageSchema = z.object({
  sender: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined || value === '' ? null : String(value))),
  date: z.number().int(),
  // Extractors reading chat.db directly emit 0/1 rather than booleans.
  is_from_me: z
    .union([z.boolean(), z.literal(0), z.literal(1)])
    .default(false)
    .transform((value) => value === true || value === 1),
  text: optionalText,
  attachment_path: optionalText,
});

const conversationSchema = z.object({
  chat_id: z
    .union([z.string(), z.number()])
    .transform(String)
    .refine(isFileNameSafe, { message: 'chat_id must be a non-empty, file-name safe string' }),
  display_name: optionalText,
  participants: z.record(z.string()).default({}),
  messages: z.array(messageSchema).default([]),
});

/** Raw document shape, as written by the extractor. */
export type BackupDocument = z.input<typeof conversationSchema>;

/**
 * Validate one parsed JSON document and convert it to a Conversation.
 * `source` names the document in error messages.
 */
export function parseConversation(json: unknown, source: string): Conversation {
  const result = conversationSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new SiteError(
      `Invalid backup document ${source}: ${issues.join('; ')}`,
      'INVALID_DOCUMENT',
      { details: { source, issues } },
    );
  }

  const doc = result.data;
  return {
    chatId: doc.chat_id,
    displayName: doc.display_name,
    participants: doc.participants,
    messages: doc.messages.map((m) => ({
      sender: m.sender,
      date: m.date,
      isFromMe: m.is_from_me,
      text: m.text,
      attachmentPath: m.attachment_path,
    })),
  };
}

/** List the conversation documents in a backup, sorted by file name. */
export async function listConversationFiles(sourceDir: string): Promise<string[]> {
  const chatsDir = join(sourceDir, CHATS_DIR);
  try {
    const entries = await readdir(chatsDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.json'))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SiteError(
        `No ${CHATS_DIR}/ folder found in backup at ${sourceDir}`,
        'BACKUP_NOT_FOUND',
        { cause: err },
      );
    }
    throw err;
  }
}

/**
 * Read and validate every conversation document of a backup.
 *
 * Documents are returned in file-name order, which is the tie-break order
 * of the index page. Fails on the first unreadable or invalid document
 * and on duplicate chat ids, since either would silently drop a page.
 */
export async function loadConversations(
  sourceDir: string,
  logger?: pino.Logger,
): Promise<Conversation[]> {
  const log = logger ?? pino({ name: 'backup-site' });
  const files = await listConversationFiles(sourceDir);

  log.info({ sourceDir, count: files.length }, 'Reading conversation documents');

  const conversations: Conversation[] = [];
  const seen = new Map<string, string>();

  for (const file of files) {
    const raw = await readFile(join(sourceDir, CHATS_DIR, file), 'utf-8');

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SiteError(
        `Backup document ${file} is not valid JSON`,
        'INVALID_DOCUMENT',
        { details: { source: file }, cause: err },
      );
    }

    const conversation = parseConversation(json, file);

    const previous = seen.get(conversation.chatId);
    if (previous !== undefined) {
      throw new SiteError(
        `chat_id ${conversation.chatId} appears in both ${previous} and ${file}`,
        'DUPLICATE_CHAT_ID',
        { details: { chatId: conversation.chatId, files: [previous, file] } },
      );
    }
    seen.set(conversation.chatId, file);

    log.debug(
      { file, chatId: conversation.chatId, messages: conversation.messages.length },
      'Conversation loaded',
    );
    conversations.push(conversation);
  }

  return conversations;
}
