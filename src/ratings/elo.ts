/**
 * Elo primitives for per-dimension rating updates.
 *
 * K starts high for provisional competitors (< provisionalBouts) and tapers
 * with experience. Deviation follows the Glicko-1 shrink so that confidence
 * grows with every bout.
 */

import type { BoutMethod } from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';

const Q = Math.LN10 / 400;

/**
 * Calculate the expected score for A against B.
 */
export function expectedScore(
  ratingA: number,
  ratingB: number,
  scale: number = DEFAULT_ENGINE_CONFIG.elo.logisticScale
): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / scale));
}

/**
 * K-factor for a competitor who has `boutsBefore` rated bouts in the dimension.
 */
export function kFactor(boutsBefore: number, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  const { baseK, provisionalBouts, provisionalMultiplier, declinePerBout, minKMultiplier } = engine.elo;
  if (boutsBefore < provisionalBouts) {
    return baseK * provisionalMultiplier;
  }
  const taper = 1 - (boutsBefore - provisionalBouts) * declinePerBout;
  return baseK * Math.max(minKMultiplier, taper);
}

/**
 * Finishes transfer more rating than decisions; first-round finishes most.
 */
export function finishMultiplier(
  method: BoutMethod | null,
  finishRound: number | null,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  if (method !== 'ko_tko' && method !== 'submission') return 1;
  return finishRound === 1 ? engine.elo.firstRoundFinishMultiplier : engine.elo.finishMultiplier;
}

export function clampRating(value: number, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  return Math.max(engine.rating.min, Math.min(engine.rating.max, value));
}

export function ratingAfter(
  rating: number,
  expected: number,
  actual: number,
  k: number,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  return clampRating(rating + k * (actual - expected), engine);
}

/**
 * The g function reduces the impact of opponents with high deviation.
 */
function g(deviation: number): number {
  return 1 / Math.sqrt(1 + 3 * Q * Q * deviation * deviation / (Math.PI * Math.PI));
}

/**
 * Glicko-1 deviation after one bout against an opponent.
 * RD' = sqrt(1 / (1/RD^2 + 1/d^2)), d^2 = 1 / (q^2 g^2 E (1 - E))
 */
export function shrinkDeviation(
  deviation: number,
  rating: number,
  opponentRating: number,
  opponentDeviation: number,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  const gOpp = g(opponentDeviation);
  const expected = 1 / (1 + Math.pow(10, -gOpp * (rating - opponentRating) / 400));
  const dSquaredInverse = Q * Q * gOpp * gOpp * expected * (1 - expected);
  const next = Math.sqrt(1 / (1 / (deviation * deviation) + dSquaredInverse));
  return Math.max(engine.rating.minDeviation, next);
}
