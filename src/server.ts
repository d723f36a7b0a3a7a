import 'dotenv/config';
import { config } from './config';
import { buildServer } from './app';
import { ConfigStore } from './store/config-store';
import { logger, logStartupBanner } from './utils/logger';

async function start() {
  try {
    logStartupBanner();

    const store = new ConfigStore({
      showsFile: config.showsFile,
      stationsFile: config.stationsFile
    });

    // Broken files do not stop the server: every page reports them until they are fixed
    const health = store.inspect();
    if (health.healthy) {
      logger.info(
        { shows: health.shows.records, stations: health.stations.records },
        'Configuration files loaded'
      );
    } else {
      logger.error({ shows: health.shows, stations: health.stations }, 'Configuration files could not be loaded');
    }

    if (config.nodeEnv === 'production' && config.secretKey === 'dev') {
      logger.warn('RECORDER_ADMIN_SECRET_KEY is not set, flash cookies are signed with the development key');
    }

    const server = await buildServer({ store, secretKey: config.secretKey });

    await server.listen({
      port: config.port,
      host: config.host
    });

    logger.info(`Server listening on http://${config.host}:${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);

    // Graceful shutdown
    const gracefulShutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      try {
        await server.close();
        logger.info('Server shut down successfully');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error({ err: error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  process.exit(1);
});

void start();
