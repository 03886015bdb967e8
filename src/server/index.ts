import { pino } from 'pino';

import { buildApp } from './app.js';
import { loadServerConfig } from './config.js';
import { loadSiteModel } from './services/site.js';

const config = loadServerConfig();

const logOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  // Structured JSON output (Pino default)
  transport: !config.production
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
};

const startupLog = pino({ name: 'backup-site', ...logOptions });

try {
  // The preview API serves a snapshot of the backup taken at startup
  const model = await loadSiteModel(config, startupLog);
  const fastify = await buildApp(config, model, logOptions);

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info(`Backup site preview listening on ${config.host}:${config.port}`);
} catch (err) {
  startupLog.fatal({ err }, 'Failed to start backup site preview');
  process.exit(1);
}
