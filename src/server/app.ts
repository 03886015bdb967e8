import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import { existsSync } from 'fs';

import { errorHandler } from './middleware/errorHandler.js';
import chatRoutes from './routes/chats.js';
import type { ServerConfig, SiteModel } from './types/index.js';

/**
 * Build the preview server: the generated site as static files plus a
 * small JSON API over the same site model.
 *
 * The caller builds the model (see `loadSiteModel`) so tests can inject
 * one without touching the file system.
 */
export async function buildApp(
  config: Pick<ServerConfig, 'outputDir' | 'timeZone' | 'corsOrigin' | 'production'>,
  model: SiteModel,
  logger: FastifyServerOptions['logger'] = false,
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger });

  // CORS: permissive in dev, restrictive in production
  await fastify.register(fastifyCors, {
    origin: config.production ? config.corsOrigin : true,
  });

  // Serve the generated site when it has been built
  if (existsSync(config.outputDir)) {
    await fastify.register(fastifyStatic, {
      root: config.outputDir,
      prefix: '/',
    });
  } else {
    fastify.log.warn(
      { outputDir: config.outputDir },
      'Output directory not found; run the generator first to browse the site',
    );
  }

  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });

  fastify.setErrorHandler(errorHandler);

  await fastify.register(chatRoutes, { model, timeZone: config.timeZone });

  fastify.get('/api/health', async () => ({
    status: 'ok',
    service: 'backup-site',
    timestamp: new Date().toISOString(),
  }));

  return fastify;
}
