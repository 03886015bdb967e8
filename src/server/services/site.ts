/**
 * Site generator: rebuilds the whole static site from a backup.
 *
 * Output layout:
 *   index.html
 *   chats/chat_<chat_id>.html
 *   attachments/<file>
 *   css/style.css
 *   js/script.js
 */

import { copyFile, mkdir, readdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import pino from 'pino';

import { SITE_SCRIPT, SITE_STYLESHEET } from '../../client/assets.js';
import type { GenerateResult, SiteConfig, SiteModel } from '../types/index.js';
import { resolveBackupSource } from './archive.js';
import { ATTACHMENTS_DIR, CHATS_DIR, loadConversations } from './backup.js';
import { chatPageFileName, renderChatPage, renderIndexPage } from './render.js';
import { buildSiteModel } from './siteModel.js';

const OUTPUT_DIRS = ['css', 'js', ATTACHMENTS_DIR, CHATS_DIR] as const;

/** Log a progress line every this many items. */
const PROGRESS_EVERY = 100;

/** Relative paths (with `/` separators) of every regular file under `dir`. */
async function listFiles(dir: string, prefix = ''): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(join(dir, prefix), { withFileTypes: true })) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

/**
 * Copy every regular file from the backup's attachments folder, keeping
 * subfolders so nested attachment paths still resolve. A backup without
 * attachments is valid; returns the number copied.
 */
export async function copyAttachments(
  sourceDir: string,
  outputDir: string,
  log: pino.Logger,
): Promise<number> {
  const from = join(sourceDir, ATTACHMENTS_DIR);
  const to = join(outputDir, ATTACHMENTS_DIR);

  let names: string[];
  try {
    names = await listFiles(from);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.warn({ from }, 'Backup has no attachments folder, skipping copy');
      return 0;
    }
    throw err;
  }

  log.info({ count: names.length }, 'Copying attachments');
  let copied = 0;
  for (const name of names) {
    const target = join(to, name);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(join(from, name), target);
    copied++;
    if (copied % PROGRESS_EVERY === 0) {
      log.info({ copied, total: names.length }, 'Copying attachments');
    }
  }
  return copied;
}

/** Read a backup (directory or archive) and build its site model without writing anything. */
export async function loadSiteModel(
  config: Pick<SiteConfig, 'inputPath' | 'timeZone'>,
  logger?: pino.Logger,
): Promise<SiteModel> {
  const log = logger ?? pino({ name: 'backup-site' });
  const source = await resolveBackupSource(config.inputPath, log);
  try {
    const conversations = await loadConversations(source.dir, log);
    return buildSiteModel(conversations, { timeZone: config.timeZone });
  } finally {
    await source.cleanup();
  }
}

/**
 * Generate the static site described by `config`.
 *
 * Every run rebuilds all pages. A temporary extraction directory, if the
 * input was an archive, is removed whether or not generation succeeds.
 */
export async function generateSite(
  config: SiteConfig,
  logger?: pino.Logger,
): Promise<GenerateResult> {
  const log = logger ?? pino({ name: 'backup-site' });
  const startedAt = Date.now();

  log.info({ inputPath: config.inputPath, outputDir: config.outputDir }, 'Creating website from backup data');

  const source = await resolveBackupSource(config.inputPath, log);
  try {
    for (const dir of OUTPUT_DIRS) {
      await mkdir(join(config.outputDir, dir), { recursive: true });
    }

    const attachments = await copyAttachments(source.dir, config.outputDir, log);

    const conversations = await loadConversations(source.dir, log);
    const model = buildSiteModel(conversations, { timeZone: config.timeZone });

    let written = 0;
    let messages = 0;
    for (const page of model.pages) {
      await writeFile(
        join(config.outputDir, CHATS_DIR, chatPageFileName(page.chatId)),
        renderChatPage(page, config),
        'utf-8',
      );
      written++;
      messages += page.messages.length;
      if (written % PROGRESS_EVERY === 0) {
        log.info({ written, total: model.pages.length }, 'Creating chat pages');
      }
    }

    await writeFile(join(config.outputDir, 'index.html'), renderIndexPage(model.index, config), 'utf-8');
    await writeFile(join(config.outputDir, 'css', 'style.css'), SITE_STYLESHEET, 'utf-8');
    await writeFile(join(config.outputDir, 'js', 'script.js'), SITE_SCRIPT, 'utf-8');

    const result: GenerateResult = {
      conversations: model.pages.length,
      messages,
      attachments,
      outputDir: config.outputDir,
    };

    log.info(
      { ...result, elapsedMs: Date.now() - startedAt, index: join(config.outputDir, 'index.html') },
      'Website created successfully',
    );
    return result;
  } finally {
    await source.cleanup();
  }
}
