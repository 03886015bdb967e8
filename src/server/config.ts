/**
 * Environment-driven configuration for the generator CLI and the
 * preview server.
 *
 *   INPUT_DIR       Backup directory or archive (required).
 *   OUTPUT_DIR      Where the site is written (default: ./site).
 *   SITE_TITLE      Heading of the index page (default: "iMessage Backup").
 *   SITE_TIME_ZONE  IANA zone for dates and times (default: UTC).
 *   PORT, HOST      Preview server bind address (default: 3000, 0.0.0.0).
 *   CORS_ORIGIN     Allowed origin for the preview API in production.
 *   NODE_ENV        "production" tightens CORS and error details.
 */

import { resolve } from 'path';
import { z } from 'zod';

import { SiteError } from './errors.js';
import { isValidTimeZone } from './services/dateConvert.js';
import type { ServerConfig, SiteConfig } from './types/index.js';

export const DEFAULT_TITLE = 'iMessage Backup';

type Env = Record<string, string | undefined>;

/** Treat empty strings as unset so `FOO= cmd` falls back to defaults. */
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const siteEnvSchema = z.object({
  INPUT_DIR: z.string({ required_error: 'INPUT_DIR is required' }).min(1, 'INPUT_DIR is required'),
  OUTPUT_DIR: optional(z.string().default('./site')),
  SITE_TITLE: optional(z.string().default(DEFAULT_TITLE)),
  SITE_TIME_ZONE: optional(
    z.string().default('UTC').refine(isValidTimeZone, { message: 'SITE_TIME_ZONE is not a known IANA time zone' }),
  ),
});

const serverEnvSchema = z.object({
  PORT: optional(z.coerce.number().int().min(0).max(65_535).default(3000)),
  HOST: optional(z.string().default('0.0.0.0')),
  CORS_ORIGIN: optional(z.string().optional()),
  NODE_ENV: optional(z.string().optional()),
});

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new SiteError(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIG_INVALID',
      { details: { issues } },
    );
  }
  return result.data;
}

/** Load the generator configuration. Paths are resolved against the cwd. */
export function loadSiteConfig(env: Env = process.env): SiteConfig {
  const parsed = parseEnv(siteEnvSchema, env);
  return {
    inputPath: resolve(parsed.INPUT_DIR),
    outputDir: resolve(parsed.OUTPUT_DIR),
    title: parsed.SITE_TITLE,
    timeZone: parsed.SITE_TIME_ZONE,
  };
}

/** Load the preview server configuration (site settings plus bind address). */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const site = loadSiteConfig(env);
  const server = parseEnv(serverEnvSchema, env);
  const production = server.NODE_ENV === 'production';
  return {
    ...site,
    port: server.PORT,
    host: server.HOST,
    corsOrigin: server.CORS_ORIGIN ?? false,
    production,
  };
}
