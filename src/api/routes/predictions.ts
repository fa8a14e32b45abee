import { Router, Request, Response } from 'express';
import { createLogger } from '../../shared/utils/logger.js';
import type { MatchupContext } from '../../shared/types/index.js';
import type { RatingService } from '../../services/rating-service.js';
import { renderNarrative } from '../../prediction/narrative.js';
import { validateBody } from '../middleware/validate.js';
import {
  backtestRequestSchema,
  predictionRequestSchema,
  type BacktestRequest,
  type PredictionRequest,
} from '../schemas.js';

const log = createLogger('PredictionsAPI');

export function createPredictionsRouter(service: RatingService): Router {
  const router = Router();

  // Predict one matchup; refusals come back as 200 with refused: true
  router.post('/', validateBody(predictionRequestSchema), (req: Request, res: Response) => {
    if (!service.isReady()) {
      return res.status(409).json({ error: 'No ratings loaded; run a replay first' });
    }
    try {
      const input: PredictionRequest = req.body;
      const context: MatchupContext = {
        scheduledRounds: input.scheduledRounds,
        asOf: input.asOf,
        weightClass: input.weightClass ?? null,
        weightClasses: input.weightClasses,
        noticeDays: input.noticeDays,
        venue: input.venue ?? null,
        region: input.region ?? null,
      };
      const prediction = service.predict(input.competitorA, input.competitorB, context);
      const names = {
        [input.competitorA]: service.competitorName(input.competitorA),
        [input.competitorB]: service.competitorName(input.competitorB),
      };
      res.json({ prediction, narrative: renderNarrative(prediction, names) });
    } catch (error) {
      log.error('Prediction failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Prediction failed' });
    }
  });

  // Replay before the cutoff and score the following bouts
  router.post('/backtest', validateBody(backtestRequestSchema), async (req: Request, res: Response) => {
    try {
      const input: BacktestRequest = req.body;
      const report = await service.backtest(input.cutoff, input.limit);
      res.json(input.includeEntries ? report : { ...report, entries: undefined });
    } catch (error) {
      log.error('Backtest failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({ error: 'Backtest failed' });
    }
  });

  return router;
}

export default createPredictionsRouter;
