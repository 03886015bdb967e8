import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import AdmZip from 'adm-zip';
import { pino } from 'pino';
import { c as createTar } from 'tar';

import { SiteError, UnsupportedFormatError } from '../errors.js';
import {
  SUPPORTED_ARCHIVE_EXTENSIONS,
  getArchiveFormat,
  resolveBackupSource,
} from '../services/archive.js';

const silent = pino({ level: 'silent' });
const CHAT_JSON = JSON.stringify({ chat_id: 'c1', participants: {}, messages: [] });

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('getArchiveFormat', () => {
  it('should recognise supported extensions case-insensitively', () => {
    expect(getArchiveFormat('backup.zip')).toBe('zip');
    expect(getArchiveFormat('BACKUP.ZIP')).toBe('zip');
    expect(getArchiveFormat('backup.tar')).toBe('tar');
    expect(getArchiveFormat('backup.tgz')).toBe('gztar');
    expect(getArchiveFormat('/data/backup.tar.gz')).toBe('gztar');
  });

  it('should throw UnsupportedFormatError with the extension and the supported set', () => {
    try {
      getArchiveFormat('backup.rar');
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedFormatError);
      const error = err as UnsupportedFormatError;
      expect(error.code).toBe('UNSUPPORTED_FORMAT');
      expect(error.extension).toBe('.rar');
      expect(error.supported).toEqual(['.tar.gz', '.tgz', '.tar', '.zip']);
      expect(error.message).toBe(
        'Unsupported archive format: .rar. Supported formats are: .tar.gz, .tgz, .tar, .zip',
      );
    }
  });

  it('should report the last suffix of an unsupported multi-part extension', () => {
    expect(() => getArchiveFormat('backup.tar.bz2')).toThrow(
      'Unsupported archive format: .bz2.',
    );
  });

  it('should export the supported extensions', () => {
    expect(SUPPORTED_ARCHIVE_EXTENSIONS).toEqual(['.tar.gz', '.tgz', '.tar', '.zip']);
  });
});

describe('resolveBackupSource', () => {
  let work: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'archive-test-'));
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('should use a directory as is', async () => {
    const source = await resolveBackupSource(work, silent);

    expect(source.dir).toBe(work);
    expect(source.archiveFormat).toBeNull();
    await source.cleanup();
    expect(await exists(work)).toBe(true);
  });

  it('should extract a zip archive and descend into its single top folder', async () => {
    const archivePath = join(work, 'backup.zip');
    const zip = new AdmZip();
    zip.addFile('backup/chats/c1.json', Buffer.from(CHAT_JSON, 'utf-8'));
    zip.writeZip(archivePath);

    const source = await resolveBackupSource(archivePath, silent);

    expect(source.archiveFormat).toBe('zip');
    expect(source.dir.endsWith('backup')).toBe(true);
    expect(await readFile(join(source.dir, 'chats', 'c1.json'), 'utf-8')).toBe(CHAT_JSON);

    await source.cleanup();
    expect(await exists(source.dir)).toBe(false);
  });

  it('should extract a gzipped tarball with chats at the top level', async () => {
    const contents = join(work, 'contents');
    await mkdir(join(contents, 'chats'), { recursive: true });
    await writeFile(join(contents, 'chats', 'c1.json'), CHAT_JSON, 'utf-8');
    const archivePath = join(work, 'backup.tar.gz');
    await createTar({ gzip: true, file: archivePath, cwd: contents }, ['chats']);

    const source = await resolveBackupSource(archivePath, silent);

    expect(source.archiveFormat).toBe('gztar');
    expect(await readFile(join(source.dir, 'chats', 'c1.json'), 'utf-8')).toBe(CHAT_JSON);

    await source.cleanup();
    expect(await exists(source.dir)).toBe(false);
  });

  it('should reject a file with an unsupported extension', async () => {
    const notes = join(work, 'notes.txt');
    await writeFile(notes, 'hello', 'utf-8');

    await expect(resolveBackupSource(notes, silent)).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('should fail with BACKUP_NOT_FOUND for a missing path', async () => {
    const missing = resolveBackupSource(join(work, 'missing'), silent);

    await expect(missing).rejects.toBeInstanceOf(SiteError);
    await expect(resolveBackupSource(join(work, 'missing'), silent)).rejects.toMatchObject({
      code: 'BACKUP_NOT_FOUND',
    });
  });
});
