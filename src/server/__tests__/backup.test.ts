import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { pino } from 'pino';

import { SiteError } from '../errors.js';
import { loadConversations, parseConversation } from '../services/backup.js';

const silent = pino({ level: 'silent' });

describe('parseConversation', () => {
  it('should convert a backup document to the conversation model', () => {
    const conversation = parseConversation({
      chat_id: 'chat42',
      display_name: 'Weekend',
      participants: { '+15550100': 'Alice' },
      messages: [
        {
          sender: '+15550100',
          date: 727_012_800,
          is_from_me: false,
          text: 'hello',
          attachment_path: 'photo.jpg',
        },
      ],
    }, 'chat42.json');

    expect(conversation).toEqual({
      chatId: 'chat42',
      displayName: 'Weekend',
      participants: { '+15550100': 'Alice' },
      messages: [
        {
          sender: '+15550100',
          date: 727_012_800,
          isFromMe: false,
          text: 'hello',
          attachmentPath: 'photo.jpg',
        },
      ],
    });
  });

  it('should normalise numeric ids, 0/1 flags and missing optional fields', () => {
    const conversation = parseConversation({
      chat_id: 7,
      messages: [
        { sender: 3, date: 1, is_from_me: 1 },
        { sender: '', date: 2 },
      ],
    }, 'seven.json');

    expect(conversation.chatId).toBe('7');
    expect(conversation.displayName).toBeNull();
    expect(conversation.participants).toEqual({});
    expect(conversation.messages).toEqual([
      { sender: '3', date: 1, isFromMe: true, text: null, attachmentPath: null },
      { sender: null, date: 2, isFromMe: false, text: null, attachmentPath: null },
    ]);
  });

  it('should reject chat ids that are not file-name safe', () => {
    expect(() => parseConversation({ chat_id: '../escape' }, 'bad.json')).toThrow(SiteError);
    expect(() => parseConversation({ chat_id: '' }, 'bad.json')).toThrow(SiteError);
  });

  it('should report invalid fields with code INVALID_DOCUMENT', () => {
    try {
      parseConversation({ chat_id: 'c1', messages: [{ date: 'yesterday' }] }, 'c1.json');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SiteError);
      expect((err as SiteError).code).toBe('INVALID_DOCUMENT');
      expect((err as SiteError).message).toContain('c1.json');
      expect((err as SiteError).message).toContain('messages.0.date');
    }
  });
});

describe('loadConversations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'backup-test-'));
    await mkdir(join(dir, 'chats'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeChat(name: string, content: unknown): Promise<void> {
    const body = typeof content === 'string' ? content : JSON.stringify(content);
    await writeFile(join(dir, 'chats', name), body, 'utf-8');
  }

  it('should load documents in file-name order and skip other files', async () => {
    await writeChat('b.json', { chat_id: 'second' });
    await writeChat('a.json', { chat_id: 'first' });
    await writeChat('notes.txt', 'not a chat');

    const conversations = await loadConversations(dir, silent);

    expect(conversations.map((c) => c.chatId)).toEqual(['first', 'second']);
  });

  it('should fail on a document that is not JSON', async () => {
    await writeChat('broken.json', '{ "chat_id": ');

    await expect(loadConversations(dir, silent)).rejects.toMatchObject({
      code: 'INVALID_DOCUMENT',
      message: 'Backup document broken.json is not valid JSON',
    });
  });

  it('should fail when two documents share a chat id', async () => {
    await writeChat('a.json', { chat_id: 'same' });
    await writeChat('b.json', { chat_id: 'same' });

    await expect(loadConversations(dir, silent)).rejects.toMatchObject({
      code: 'DUPLICATE_CHAT_ID',
      message: 'chat_id same appears in both a.json and b.json',
    });
  });

  it('should fail with BACKUP_NOT_FOUND when there is no chats folder', async () => {
    await rm(join(dir, 'chats'), { recursive: true });

    await expect(loadConversations(dir, silent)).rejects.toMatchObject({
      code: 'BACKUP_NOT_FOUND',
    });
  });
});
