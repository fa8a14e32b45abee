import 'dotenv/config';
import { createAPIServer } from './api/server.js';
import { RatingService } from './services/rating-service.js';
import { JsonRecordStore } from './store/record-store.js';
import { JsonRatingRepository } from './store/rating-repository.js';
import { config } from './shared/config.js';
import { createLogger } from './shared/utils/logger.js';

const log = createLogger('Main');

// Global error handlers: log, then let the process die
process.on('uncaughtException', (error) => {
  log.error('Uncaught exception, shutting down', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled promise rejection', { reason: String(reason) });
});

async function main() {
  log.info('Bout Forecast starting...');

  const service = new RatingService({
    store: new JsonRecordStore(config.recordsDir),
    repository: new JsonRatingRepository(config.ratingsFile),
    engine: config.engine,
  });

  const server = createAPIServer(service);
  await server.start(config.port);

  log.info(`Ratings API: http://localhost:${config.port}/api/ratings`);

  const shutdown = async () => {
    log.info('Shutting down...');
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  log.error('Fatal error:', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
