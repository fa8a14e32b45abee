import { Router, Request, Response } from 'express';
import { createLogger } from '../../shared/utils/logger.js';
import type { RatingService } from '../../services/rating-service.js';
import { firstIssue } from '../../shared/utils/validation.js';
import { compareQuerySchema, leaderboardQuerySchema } from '../schemas.js';

const log = createLogger('RatingsAPI');

const NOT_READY = 'No ratings loaded; run a replay first';

export function createRatingsRouter(service: RatingService): Router {
  const router = Router();

  // Leaderboard by average rating
  router.get('/', (req: Request, res: Response) => {
    if (!service.isReady()) {
      return res.status(409).json({ error: NOT_READY });
    }
    const query = leaderboardQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: firstIssue(query.error) });
    }
    res.json({
      snapshot: service.getSnapshotInfo(),
      competitors: service.getLeaderboard(query.data.limit),
    });
  });

  // Side-by-side comparison
  router.get('/compare/:a/:b', (req: Request, res: Response) => {
    if (!service.isReady()) {
      return res.status(409).json({ error: NOT_READY });
    }
    const query = compareQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: firstIssue(query.error) });
    }
    const { a, b } = req.params;
    const comparison = service.compare(a, b, query.data.asOf);
    if (!comparison) {
      return res.status(404).json({ error: `No ratings for ${service.getProfile(a) ? b : a}` });
    }
    res.json(comparison);
  });

  // Flat rating record for one competitor
  router.get('/:competitorId', (req: Request, res: Response) => {
    if (!service.isReady()) {
      return res.status(409).json({ error: NOT_READY });
    }
    const { competitorId } = req.params;
    const profile = service.getProfile(competitorId);
    if (!profile) {
      return res.status(404).json({ error: `No ratings for ${competitorId}` });
    }
    res.json(profile);
  });

  // Full replay from the record store
  router.post('/replay', async (_req: Request, res: Response) => {
    try {
      const summary = await service.replay();
      res.json(summary);
    } catch (error) {
      log.error('Replay request failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Replay failed' });
    }
  });

  return router;
}

export default createRatingsRouter;
