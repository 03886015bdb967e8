#!/usr/bin/env node
/**
 * CLI entry point for the static site generator.
 *
 *   generate [inputPath] [outputDir]
 *
 * inputPath is an extracted backup directory (chats/ + attachments/) or a
 * .zip/.tar/.tgz archive of one. Positional arguments override the
 * environment variables below.
 *
 * Environment variables:
 *   INPUT_DIR       Backup directory or archive.
 *   OUTPUT_DIR      Where the site is written (default: ./site).
 *   SITE_TITLE      Index page heading.
 *   SITE_TIME_ZONE  IANA zone for dates and times (default: UTC).
 *   LOG_LEVEL       Pino log level (default: "info").
 */

import process from 'node:process';
import { pino } from 'pino';

import { loadSiteConfig } from './server/config.js';
import { SiteError } from './server/errors.js';
import { generateSite } from './server/services/site.js';

const logger = pino({
  name: 'backup-site',
  level: process.env.LOG_LEVEL ?? 'info',
});

async function main(): Promise<void> {
  const [inputArg, outputArg] = process.argv.slice(2);

  const config = loadSiteConfig({
    ...process.env,
    INPUT_DIR: inputArg ?? process.env.INPUT_DIR,
    OUTPUT_DIR: outputArg ?? process.env.OUTPUT_DIR,
  });

  const result = await generateSite(config, logger);

  logger.info(
    { index: `${result.outputDir}/index.html` },
    'Open the index page in a browser to view the site',
  );
}

main().catch((err: unknown) => {
  if (err instanceof SiteError) {
    logger.fatal({ code: err.code, details: err.details }, err.message);
  } else {
    logger.fatal({ err }, 'Site generation failed');
  }
  process.exit(1);
});
