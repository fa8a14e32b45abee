import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../shared/utils/logger.js', () => ({
  createLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), bout: vi.fn() }),
}));

import { EngineEventBus } from '../../shared/utils/events.js';
import { competitor, decisionWin, koWin } from '../../shared/testing/fixtures.js';
import { createMockReq, createMockRes, getAllRouteHandlers, getRouteHandler } from '../../shared/testing/routes.js';
import { MemoryRecordStore } from '../../store/record-store.js';
import { MemoryRatingRepository } from '../../store/rating-repository.js';
import { RatingService } from '../../services/rating-service.js';
import { createPredictionsRouter } from './predictions.js';

const competitors = [
  competitor('alpha', { name: 'Ana Alpha' }),
  competitor('bravo', { name: 'Bea Bravo' }),
  competitor('charlie'),
  competitor('rookie'),
];

const bouts = [
  koWin('b1', '2023-01-01', 'alpha', 'bravo', 1),
  koWin('b2', '2023-03-01', 'alpha', 'charlie', 1),
  decisionWin('b3', '2023-05-01', 'bravo', 'charlie'),
  koWin('b4', '2024-02-01', 'alpha', 'bravo', 2),
];

function createService(): RatingService {
  return new RatingService({
    store: new MemoryRecordStore(competitors, bouts),
    repository: new MemoryRatingRepository(),
    events: new EngineEventBus(),
  });
}

describe('Predictions API', () => {
  let service: RatingService;
  let router: ReturnType<typeof createPredictionsRouter>;

  beforeEach(async () => {
    service = createService();
    await service.replay();
    router = createPredictionsRouter(service);
  });

  describe('POST /', () => {
    it('validates the body before predicting', () => {
      const [validate] = getAllRouteHandlers(router, 'post', '/');
      const res = createMockRes();
      const next = vi.fn();
      validate(createMockReq({ body: { competitorA: 'alpha', competitorB: 'bravo', scheduledRounds: 4 } }), res, next);

      expect(next).not.toHaveBeenCalled();
      expect(res.status).toHaveBeenCalledWith(400);
    });

    it('returns the prediction and its narrative', () => {
      const res = createMockRes();
      getRouteHandler(router, 'post', '/')(
        createMockReq({ body: { competitorA: 'alpha', competitorB: 'bravo', scheduledRounds: 3, asOf: '2023-06-01' } }),
        res
      );

      const body = res.json.mock.calls[0][0];
      expect(body.prediction.winner).toBe('alpha');
      expect(body.prediction.refused).toBe(false);
      expect(body.narrative[0].startsWith('Ana Alpha over Bea Bravo')).toBe(true);
      expect(res.status).not.toHaveBeenCalled();
    });

    it('returns a refusal as a normal response', () => {
      const res = createMockRes();
      getRouteHandler(router, 'post', '/')(
        createMockReq({ body: { competitorA: 'rookie', competitorB: 'alpha', scheduledRounds: 3 } }),
        res
      );

      const body = res.json.mock.calls[0][0];
      expect(body.prediction.refused).toBe(true);
      expect(body.prediction.refusal.kind).toBe('InsufficientHistory');
      expect(body.narrative).toEqual(['No pick for ROOKIE vs Ana Alpha: Competitor rookie has no recorded bouts']);
    });

    it('returns 409 before the first replay', () => {
      const idle = createPredictionsRouter(createService());
      const res = createMockRes();
      getRouteHandler(idle, 'post', '/')(
        createMockReq({ body: { competitorA: 'alpha', competitorB: 'bravo', scheduledRounds: 3 } }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(409);
    });

    it('returns 500 when the engine throws', () => {
      vi.spyOn(service, 'predict').mockImplementation(() => {
        throw new Error('boom');
      });
      const res = createMockRes();
      getRouteHandler(router, 'post', '/')(
        createMockReq({ body: { competitorA: 'alpha', competitorB: 'bravo', scheduledRounds: 3 } }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'Prediction failed' });
    });
  });

  describe('POST /backtest', () => {
    it('omits per-bout entries unless asked', async () => {
      const res = createMockRes();
      await getRouteHandler(router, 'post', '/backtest')(
        createMockReq({ body: { cutoff: '2024-01-01', includeEntries: false } }),
        res
      );

      const body = res.json.mock.calls[0][0];
      expect(body.replayedBouts).toBe(3);
      expect(body.total).toBe(1);
      expect(body.entries).toBeUndefined();
    });

    it('includes entries on request', async () => {
      const res = createMockRes();
      await getRouteHandler(router, 'post', '/backtest')(
        createMockReq({ body: { cutoff: '2024-01-01', includeEntries: true } }),
        res
      );

      const body = res.json.mock.calls[0][0];
      expect(body.entries).toHaveLength(1);
      expect(body.entries[0].boutId).toBe('b4');
    });

    it('returns 500 when the backtest fails', async () => {
      vi.spyOn(service, 'backtest').mockRejectedValue(new Error('records unavailable'));
      const res = createMockRes();
      await getRouteHandler(router, 'post', '/backtest')(
        createMockReq({ body: { cutoff: '2024-01-01', includeEntries: false } }),
        res
      );

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'Backtest failed' });
    });
  });
});
