/**
 * Decay Module
 *
 * Time-based pull of a rating toward its dimension baseline. Two sources:
 *
 * - inactivity: beyond the grace period the kept share of the gap to
 *   baseline shrinks by `maxFraction * (1 - e^(-rate * months))`, so a rating
 *   approaches baseline but never reaches it;
 * - age: at or above the decline threshold an extra fraction per elapsed
 *   year, faster for cardio and slower for striking defense.
 *
 * Only ratings above baseline move. Deviation grows with inactivity.
 *
 * Chin damage is not decay: it is a fixed offset derived from the KO/TKO
 * loss counter, so neither later wins nor inactivity can wear it down.
 */

import type { Dimension, Rating, RatingProfile } from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { ageOn, daysBetween, DAYS_PER_MONTH, DAYS_PER_YEAR } from '../shared/utils/dates.js';
import { mapDimensions } from './dimensions.js';
import { clampRating } from './elo.js';

export interface DecayOptions {
  dimension: Dimension;
  /** Competitor age in years at the as-of date; null when unknown. */
  age: number | null;
  engine?: EngineConfig;
}

export function inactivityFraction(months: number, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  const { graceMonths, ratePerMonth, maxFraction } = engine.decay;
  if (months <= graceMonths) return 0;
  return maxFraction * (1 - Math.exp(-ratePerMonth * (months - graceMonths)));
}

export function ageMultiplier(dimension: Dimension, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  if (dimension === 'cardio') return engine.age.cardioMultiplier;
  if (dimension === 'striking_defense') return engine.age.chinMultiplier;
  return 1;
}

export function ageFraction(
  age: number | null,
  elapsedYears: number,
  dimension: Dimension,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  if (age === null || age < engine.age.declineStart || elapsedYears <= 0) return 0;
  const fraction = engine.age.fractionPerYear * ageMultiplier(dimension, engine) * elapsedYears;
  return Math.min(engine.age.maxFraction, fraction);
}

/**
 * Decay a rating to `asOf`. Pure: returns a new Rating and leaves the
 * activity timestamp untouched.
 */
export function decayRating(rating: Rating, asOf: string, options: DecayOptions): Rating {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  if (rating.lastActive === null) return { ...rating };

  const days = daysBetween(rating.lastActive, asOf);
  if (days <= 0) return { ...rating };

  const months = days / DAYS_PER_MONTH;
  const keep = (1 - inactivityFraction(months, engine))
    * (1 - ageFraction(options.age, days / DAYS_PER_YEAR, options.dimension, engine));

  const baseline = engine.rating.baseline;
  const value = rating.value > baseline
    ? baseline + (rating.value - baseline) * keep
    : rating.value;

  const growth = engine.rating.deviationGrowthPerMonth;
  const deviation = Math.min(
    Math.max(engine.rating.initialDeviation, rating.deviation),
    Math.sqrt(rating.deviation * rating.deviation + growth * growth * months)
  );

  return { ...rating, value, deviation };
}

/**
 * Decay-on-read for a whole profile. The caller's profile is not modified.
 */
export function decayProfile(
  profile: RatingProfile,
  asOf: string,
  birthDate: string | null,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): RatingProfile {
  const age = ageOn(birthDate, asOf);
  return mapDimensions(dimension => decayRating(profile[dimension], asOf, { dimension, age, engine }));
}

/**
 * Permanent striking-defense offset for recorded KO/TKO losses. Only the
 * first `maxPenalizedKos` losses count.
 */
export function chinPenalty(chinFlags: number, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  return Math.min(chinFlags, engine.chin.maxPenalizedKos) * engine.chin.penaltyPerKo;
}

/**
 * Record a KO/TKO loss. Only the counter changes: the stored value stays the
 * Elo value, and the penalty is applied when the profile is read.
 */
export function recordKnockoutLoss(rating: Rating): Rating {
  return { ...rating, chinFlags: rating.chinFlags + 1 };
}

/**
 * The profile as predictions see it: striking defense carries the chin
 * penalty, every other dimension is unchanged. Returns a copy.
 */
export function withChinPenalty(profile: RatingProfile, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): RatingProfile {
  const copy = mapDimensions(dimension => ({ ...profile[dimension] }));
  const chin = copy.striking_defense;
  const penalty = chinPenalty(chin.chinFlags, engine);
  if (penalty > 0) {
    copy.striking_defense = { ...chin, value: clampRating(chin.value - penalty, engine) };
  }
  return copy;
}
