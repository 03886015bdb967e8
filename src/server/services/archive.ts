/**
 * Locating the backup source.
 *
 * The generator accepts either an extracted backup directory or an
 * archive of one. Archives are unpacked into a temporary directory that
 * the caller removes with `cleanup()` when done.
 */

import { mkdtemp, readdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import AdmZip from 'adm-zip';
import pino from 'pino';
import { x as extractTar } from 'tar';

import { SiteError, UnsupportedFormatError } from '../errors.js';
import { CHATS_DIR } from './backup.js';

export type ArchiveFormat = 'zip' | 'tar' | 'gztar';

/** Recognised suffixes. Multi-part suffixes are matched before single ones. */
const ARCHIVE_FORMATS: ReadonlyArray<readonly [string, ArchiveFormat]> = [
  ['.tar.gz', 'gztar'],
  ['.tgz', 'gztar'],
  ['.tar', 'tar'],
  ['.zip', 'zip'],
];

export const SUPPORTED_ARCHIVE_EXTENSIONS: readonly string[] = ARCHIVE_FORMATS
  .map(([ext]) => ext);

/** The extension reported back when a file name is rejected. */
function extensionOf(fileName: string): string {
  const name = basename(fileName).toLowerCase();
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot) : '';
}

/**
 * Determine the archive format from a file name (case-insensitive).
 * Throws UnsupportedFormatError for anything not in the supported set.
 */
export function getArchiveFormat(fileName: string): ArchiveFormat {
  const name = basename(fileName).toLowerCase();
  const match = ARCHIVE_FORMATS.find(([ext]) => name.endsWith(ext));
  if (!match) {
    throw new UnsupportedFormatError(extensionOf(fileName), SUPPORTED_ARCHIVE_EXTENSIONS);
  }
  return match[1];
}

/** Where the backup lives for the duration of a run. */
export interface BackupSource {
  /** Directory containing chats/ and attachments/. */
  dir: string;
  /** Format of the archive it came from, or null for a plain directory. */
  archiveFormat: ArchiveFormat | null;
  /** Removes any temporary extraction directory. Safe to call more than once. */
  cleanup(): Promise<void>;
}

export async function extractArchive(
  archivePath: string,
  format: ArchiveFormat,
  destination: string,
): Promise<void> {
  if (format === 'zip') {
    new AdmZip(archivePath).extractAllTo(destination, true);
    return;
  }
  // node-tar detects gzip compression on its own.
  await extractTar({ file: archivePath, cwd: destination });
}

/**
 * Archives are often made of the backup folder itself rather than its
 * contents. When chats/ is not at the top, descend into a lone directory.
 */
async function findBackupRoot(dir: string): Promise<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  if (entries.some((entry) => entry.isDirectory() && entry.name === CHATS_DIR)) {
    return dir;
  }
  const dirs = entries.filter((entry) => entry.isDirectory());
  if (dirs.length === 1 && entries.length === 1) {
    return join(dir, dirs[0].name);
  }
  return dir;
}

/**
 * Resolve the input path of a run to a backup directory, extracting it
 * first when it is an archive.
 */
export async function resolveBackupSource(
  inputPath: string,
  logger?: pino.Logger,
): Promise<BackupSource> {
  const log = logger ?? pino({ name: 'backup-site' });

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputPath)).isDirectory();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SiteError(`Backup not found at ${inputPath}`, 'BACKUP_NOT_FOUND', { cause: err });
    }
    throw err;
  }

  if (isDirectory) {
    log.debug({ inputPath }, 'Using backup directory');
    return { dir: inputPath, archiveFormat: null, cleanup: async () => {} };
  }

  const format = getArchiveFormat(inputPath);
  const tempDir = await mkdtemp(join(tmpdir(), 'backup-site-'));
  const cleanup = async (): Promise<void> => {
    await rm(tempDir, { recursive: true, force: true });
  };

  try {
    log.info({ inputPath, format, tempDir }, 'Extracting backup archive');
    await extractArchive(inputPath, format, tempDir);
    const dir = await findBackupRoot(tempDir);
    return { dir, archiveFormat: format, cleanup };
  } catch (err) {
    await cleanup();
    throw err;
  }
}
