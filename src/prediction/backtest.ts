/**
 * Backtest: replay strictly before a cutoff, then predict the next bouts and
 * count how the picks held up.
 */

import type { Bout, BoutMethod, Competitor, PredictionResult } from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { compareIsoDates } from '../shared/utils/dates.js';
import { createLogger } from '../shared/utils/logger.js';
import { replayBouts, sortBouts } from '../ratings/replay-engine.js';
import type { RatingState } from '../ratings/rating-state.js';
import { reconcileBouts } from '../store/reconcile.js';
import { predictBout } from './prediction-engine.js';

const log = createLogger('Backtest');

export const DEFAULT_BACKTEST_LIMIT = 50;

export interface BacktestOptions {
  cutoff: string;
  limit?: number;
  engine?: EngineConfig;
}

export interface MethodTally {
  total: number;
  winnerCorrect: number;
  methodCorrect: number;
}

export interface WeightClassTally {
  total: number;
  winnerCorrect: number;
}

export interface FavoriteTally {
  favoriteWins: number;
  underdogWins: number;
  even: number;
  pickedFavorite: number;
  pickedFavoriteCorrect: number;
  pickedUnderdog: number;
  pickedUnderdogCorrect: number;
}

export interface BacktestEntry {
  boutId: string;
  date: string;
  actualWinner: string | null;
  actualMethod: BoutMethod | null;
  actualRound: number | null;
  prediction: PredictionResult | null;
  skippedReason: string | null;
  winnerCorrect: boolean;
  methodCorrect: boolean;
  roundCorrect: boolean;
}

export interface BacktestReport {
  cutoff: string;
  replayedBouts: number;
  total: number;
  predicted: number;
  skipped: number;
  winnerCorrect: number;
  methodCorrect: number;
  roundCorrect: number;
  winnerAccuracy: number;
  methodAccuracy: number;
  roundAccuracy: number;
  byMethod: Partial<Record<BoutMethod, MethodTally>>;
  byWeightClass: Record<string, WeightClassTally>;
  favorites: FavoriteTally;
  entries: BacktestEntry[];
}

function ratio(hits: number, total: number): number {
  return total > 0 ? hits / total : 0;
}

function emptyFavorites(): FavoriteTally {
  return {
    favoriteWins: 0,
    underdogWins: 0,
    even: 0,
    pickedFavorite: 0,
    pickedFavoriteCorrect: 0,
    pickedUnderdog: 0,
    pickedUnderdogCorrect: 0,
  };
}

/** Higher average rating going in; null when level. */
function favoriteOf(state: RatingState, bout: Bout): string | null {
  const [a, b] = bout.competitorIds;
  const avgA = state.averageRating(a);
  const avgB = state.averageRating(b);
  if (avgA === undefined || avgB === undefined || avgA === avgB) return null;
  return avgA > avgB ? a : b;
}

function skippedEntry(bout: Bout, reason: string, prediction: PredictionResult | null = null): BacktestEntry {
  return {
    boutId: bout.id,
    date: bout.date,
    actualWinner: null,
    actualMethod: bout.method,
    actualRound: bout.finishRound,
    prediction,
    skippedReason: reason,
    winnerCorrect: false,
    methodCorrect: false,
    roundCorrect: false,
  };
}

export function runBacktest(
  bouts: readonly Bout[],
  competitors: readonly Competitor[],
  options: BacktestOptions
): BacktestReport {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  const limit = options.limit ?? DEFAULT_BACKTEST_LIMIT;
  const { cutoff } = options;

  const replay = replayBouts(bouts, competitors, { engine, cutoff });
  const state = replay.state;
  const registry = new Map(competitors.map(c => [c.id, c]));

  const upcoming = sortBouts(reconcileBouts(bouts).records)
    .filter(bout => compareIsoDates(bout.date, cutoff) >= 0)
    .slice(0, Math.max(0, limit));

  const report: BacktestReport = {
    cutoff,
    replayedBouts: replay.processed,
    total: upcoming.length,
    predicted: 0,
    skipped: 0,
    winnerCorrect: 0,
    methodCorrect: 0,
    roundCorrect: 0,
    winnerAccuracy: 0,
    methodAccuracy: 0,
    roundAccuracy: 0,
    byMethod: {},
    byWeightClass: {},
    favorites: emptyFavorites(),
    entries: [],
  };
  let finishesWithMethodRight = 0;

  for (const bout of upcoming) {
    if (bout.outcome?.kind !== 'win') {
      report.skipped += 1;
      report.entries.push(skippedEntry(bout, bout.outcome ? bout.outcome.kind : 'no outcome'));
      continue;
    }

    const [a, b] = bout.competitorIds;
    const prediction = predictBout(state, a, b, {
      scheduledRounds: bout.scheduledRounds,
      asOf: bout.date,
      weightClass: bout.weightClass,
      noticeDays: { a: bout.noticeDays[a], b: bout.noticeDays[b] },
      region: bout.region ?? null,
      venue: bout.venue,
    }, { competitors: registry, engine });

    if (prediction.refused) {
      report.skipped += 1;
      report.entries.push(skippedEntry(bout, prediction.refusal?.kind ?? 'refused', prediction));
      continue;
    }

    const actualWinner = bout.outcome.winnerId;
    const winnerCorrect = prediction.winner === actualWinner;
    const methodCorrect = winnerCorrect && prediction.method === bout.method;
    const roundCorrect = methodCorrect
      && prediction.round !== null
      && bout.finishRound !== null
      && Math.abs(prediction.round - bout.finishRound) <= 1;

    report.predicted += 1;
    if (winnerCorrect) report.winnerCorrect += 1;
    if (methodCorrect) report.methodCorrect += 1;
    if (methodCorrect && prediction.method !== 'decision') finishesWithMethodRight += 1;
    if (roundCorrect) report.roundCorrect += 1;

    if (bout.method) {
      const tally = report.byMethod[bout.method] ?? { total: 0, winnerCorrect: 0, methodCorrect: 0 };
      tally.total += 1;
      if (winnerCorrect) tally.winnerCorrect += 1;
      if (methodCorrect) tally.methodCorrect += 1;
      report.byMethod[bout.method] = tally;
    }

    const classTally = report.byWeightClass[bout.weightClass] ?? { total: 0, winnerCorrect: 0 };
    classTally.total += 1;
    if (winnerCorrect) classTally.winnerCorrect += 1;
    report.byWeightClass[bout.weightClass] = classTally;

    const favorite = favoriteOf(state, bout);
    const fav = report.favorites;
    if (favorite === null) {
      fav.even += 1;
    } else {
      if (actualWinner === favorite) fav.favoriteWins += 1;
      else fav.underdogWins += 1;
      if (prediction.winner === favorite) {
        fav.pickedFavorite += 1;
        if (winnerCorrect) fav.pickedFavoriteCorrect += 1;
      } else {
        fav.pickedUnderdog += 1;
        if (winnerCorrect) fav.pickedUnderdogCorrect += 1;
      }
    }

    report.entries.push({
      boutId: bout.id,
      date: bout.date,
      actualWinner,
      actualMethod: bout.method,
      actualRound: bout.finishRound,
      prediction,
      skippedReason: null,
      winnerCorrect,
      methodCorrect,
      roundCorrect,
    });
  }

  report.winnerAccuracy = ratio(report.winnerCorrect, report.predicted);
  report.methodAccuracy = ratio(report.methodCorrect, report.winnerCorrect);
  report.roundAccuracy = ratio(report.roundCorrect, finishesWithMethodRight);

  log.info('Backtest complete', {
    cutoff,
    total: report.total,
    predicted: report.predicted,
    winnerAccuracy: Number(report.winnerAccuracy.toFixed(3)),
  });

  return report;
}
