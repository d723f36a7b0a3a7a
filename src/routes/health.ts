import { FastifyInstance } from 'fastify';
import { ConfigStore } from '../store/config-store';
import { logger } from '../utils/logger';

export type HealthRoutesOptions = {
  store: ConfigStore;
};

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  fastify.get('/health', async (request, reply) => {
    const files = options.store.inspect();
    if (!files.healthy) {
      logger.warn({ files }, 'Health check found unreadable configuration files');
    }

    const health = {
      status: files.healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      files: {
        shows: files.shows,
        stations: files.stations
      }
    };

    return reply.status(files.healthy ? 200 : 503).send(health);
  });
}
