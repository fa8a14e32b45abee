import express from 'express';
import { createServer } from 'http';
import helmet from 'helmet';
import { config, validateConfig } from '../shared/config.js';
import { eventBus, type EngineEventType } from '../shared/utils/events.js';
import { createLogger } from '../shared/utils/logger.js';
import type { RatingService } from '../services/rating-service.js';
import { createRatingsRouter } from './routes/ratings.js';
import { createPredictionsRouter } from './routes/predictions.js';
import { errorHandler } from './middleware/errors.js';

const log = createLogger('APIServer');

const EVENT_TYPES: readonly EngineEventType[] = ['replay:started', 'replay:warning', 'replay:completed', 'prediction:made'];

function isEventType(value: unknown): value is EngineEventType {
  return EVENT_TYPES.some(type => type === value);
}

export function createAPIServer(service: RatingService) {
  const app = express();
  const server = createServer(app);

  // Security headers; the API serves JSON only
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  }));

  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // API ENDPOINTS
  // ============================================================================

  app.get('/api/health', (_req, res) => {
    const snapshot = service.getSnapshotInfo();
    res.json({
      status: service.isReady() ? 'ok' : 'no_ratings',
      timestamp: Date.now(),
      version: '0.1.0',
      ratings: {
        loaded: service.isReady(),
        competitors: service.getState()?.size ?? 0,
        generatedAt: snapshot?.generatedAt ?? null,
        throughDate: snapshot?.throughDate ?? null,
      },
    });
  });

  app.use('/api/ratings', createRatingsRouter(service));
  app.use('/api/predictions', createPredictionsRouter(service));

  // Recent replay and prediction events
  app.get('/api/events', (req, res) => {
    const { type, runId, since } = req.query;
    res.json(eventBus.getHistory({
      type: isEventType(type) ? type : undefined,
      runId: typeof runId === 'string' ? runId : undefined,
      since: typeof since === 'string' ? parseInt(since, 10) : undefined,
    }));
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  // ============================================================================
  // SERVER LIFECYCLE
  // ============================================================================

  const start = async (port: number = config.port): Promise<void> => {
    log.info('Validating configuration...');
    const configCheck = validateConfig();
    for (const warning of configCheck.warnings) {
      log.warn(warning);
    }
    if (!configCheck.valid) {
      log.error('Configuration validation failed - server cannot start', { errors: configCheck.errors });
      throw new Error(`Configuration errors: ${configCheck.errors.join('; ')}`);
    }

    await service.initialize();
    if (!service.isReady()) {
      log.info('No stored ratings, running initial replay');
      await service.replay();
    }

    return new Promise((resolve) => {
      server.listen(port, () => {
        server.setTimeout(120_000);
        log.info(`API server running on http://localhost:${port}`);
        resolve();
      });
    });
  };

  const stop = async (): Promise<void> => {
    return new Promise((resolve) => {
      server.close(() => {
        log.info('API server stopped');
        resolve();
      });
    });
  };

  return {
    app,
    server,
    start,
    stop,
  };
}

export default createAPIServer;
