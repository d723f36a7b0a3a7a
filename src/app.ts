import Fastify, { FastifyInstance } from 'fastify';
import cookie from '@fastify/cookie';
import formbody from '@fastify/formbody';
import helmet from '@fastify/helmet';
import staticFiles from '@fastify/static';
import { join } from 'path';
import { ShowService } from './services/show-service';
import { StationService } from './services/station-service';
import { ConfigStore } from './store/config-store';
import { ConfigStoreError } from './store/errors';
import { logger } from './utils/logger';
import { renderErrorPage } from './views/error';
import { sendHtml } from './routes/respond';
import { healthRoutes } from './routes/health';
import { showRoutes } from './routes/shows';
import { stationRoutes } from './routes/stations';

export interface ServerOptions {
  store: ConfigStore;
  secretKey: string;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false, // We use our own logger
    trustProxy: true,
    maxParamLength: 500
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false
  });

  await fastify.register(cookie, {
    secret: options.secretKey
  });

  await fastify.register(formbody);

  await fastify.register(staticFiles, {
    root: join(__dirname, '../public'),
    prefix: '/static/'
  });

  // Broken or unwritable config files end up here and are shown to the user
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ConfigStoreError) {
      logger.error({ err: error, file: error.filePath, url: request.url }, 'Configuration file error');
      return sendHtml(
        reply,
        renderErrorPage({ title: 'Configuration file error', message: error.message, filePath: error.filePath }),
        500
      );
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err: error, url: request.url }, 'Request failed');
      return sendHtml(reply, renderErrorPage({ title: 'Something went wrong', message: 'The request could not be completed.' }), statusCode);
    }
    return sendHtml(reply, renderErrorPage({ title: 'Bad request', message: error.message }), statusCode);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return sendHtml(reply, renderErrorPage({ title: 'Not found', message: `Nothing lives at ${request.url}.` }), 404);
  });

  const shows = new ShowService(options.store);
  const stations = new StationService(options.store);

  // Register routes
  fastify.get('/', async (request, reply) => {
    return reply.redirect('/shows');
  });
  await fastify.register(showRoutes, { shows, stations });
  await fastify.register(stationRoutes, { stations });
  await fastify.register(healthRoutes, { store: options.store });

  return fastify;
}
