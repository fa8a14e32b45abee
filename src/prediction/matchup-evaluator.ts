/**
 * Matchup Evaluator
 *
 * Reads two competitors from a RatingState (decayed to the matchup date,
 * without touching the state) and produces signed A - B differentials plus
 * the contextual signals the Prediction Engine and narrative use:
 * short-notice penalty, location-bias flag, size differential and style
 * matchups. Refuses instead of guessing when either side has no ratings.
 */

import { DIMENSIONS } from '../shared/types/index.js';
import type {
  Competitor,
  CompetitorHistory,
  ContributingFactor,
  Dimension,
  LocationBiasFlag,
  MatchupContext,
  RatingProfile,
  Refusal,
  Side,
  SizeDifferential,
} from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { compareIsoDates } from '../shared/utils/dates.js';
import { decayProfile, withChinPenalty } from '../ratings/decay.js';
import { mapDimensions } from '../ratings/dimensions.js';
import type { RatingState } from '../ratings/rating-state.js';
import { findWeightClass, weightClassStep } from './weight-classes.js';

/** Dimensions that lean on preparation; short notice penalizes these. */
export const OFFENSE_DIMENSIONS: readonly Dimension[] = [
  'knockout_power',
  'striking_volume',
  'wrestling_offense',
  'submission_offense',
  'pressure',
];

export interface EvaluatorOptions {
  /** Registered competitors, used to tell unknown ids from debutants. */
  competitors?: ReadonlyMap<string, Competitor>;
  engine?: EngineConfig;
}

export interface MatchupEvaluation {
  competitorA: string;
  competitorB: string;
  asOf: string | null;
  scheduledRounds: 3 | 5;
  profiles: Record<Side, RatingProfile>;
  histories: Record<Side, CompetitorHistory>;
  averageDeviation: Record<Side, number>;
  rawDifferentials: Record<Dimension, number>;
  differentials: Record<Dimension, number>;
  shortNotice: Side[];
  locationBias: LocationBiasFlag | null;
  sizeDifferential: SizeDifferential | null;
  factors: ContributingFactor[];
}

export type MatchupOutcome =
  | { ok: true; evaluation: MatchupEvaluation }
  | { ok: false; refusal: Refusal };

export type StyleLabel = 'striker' | 'grappler' | 'balanced';

export interface DimensionComparison {
  dimension: Dimension;
  a: number;
  b: number;
  difference: number;
  advantage: Side | null;
}

export interface ProfileComparison {
  competitorA: string;
  competitorB: string;
  dimensions: DimensionComparison[];
  averageA: number;
  averageB: number;
}

export function favorOf(signedTowardA: number): Side | null {
  if (signedTowardA > 0) return 'a';
  if (signedTowardA < 0) return 'b';
  return null;
}

export function otherSide(side: Side): Side {
  return side === 'a' ? 'b' : 'a';
}

function average(profile: RatingProfile, field: 'value' | 'deviation'): number {
  return DIMENSIONS.reduce((sum, dim) => sum + profile[dim][field], 0) / DIMENSIONS.length;
}

function refusalFor(
  state: RatingState,
  competitorId: string,
  competitors: ReadonlyMap<string, Competitor> | undefined
): Refusal | null {
  const history = state.history(competitorId);
  if (history && history.bouts > 0) return null;
  if (history || competitors?.has(competitorId)) {
    return {
      kind: 'InsufficientHistory',
      competitorId,
      reason: `Competitor ${competitorId} has no recorded bouts`,
    };
  }
  return {
    kind: 'UnknownCompetitor',
    competitorId,
    reason: `Competitor ${competitorId} is not in the rating state`,
  };
}

export function styleOf(profile: RatingProfile, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): StyleLabel {
  const striking = (profile.knockout_power.value + profile.striking_volume.value) / 2;
  const grappling = (profile.wrestling_offense.value + profile.submission_offense.value) / 2;
  if (striking - grappling >= engine.matchup.significantDifference) return 'striker';
  if (grappling - striking >= engine.matchup.significantDifference) return 'grappler';
  return 'balanced';
}

function sameRegion(a: string | null | undefined, b: string | null | undefined): boolean {
  return !!a && !!b && a.trim().toLowerCase() === b.trim().toLowerCase();
}

function locationBiasFor(
  context: MatchupContext,
  competitorA: Competitor | undefined,
  competitorB: Competitor | undefined
): LocationBiasFlag | null {
  const region = context.region;
  if (!region) return null;
  const homeA = sameRegion(region, competitorA?.homeRegion);
  const homeB = sameRegion(region, competitorB?.homeRegion);
  if (homeA === homeB) return null;
  return { favors: homeA ? 'a' : 'b', region, venue: context.venue ?? null };
}

function sizeDifferentialFor(
  classA: string | null | undefined,
  classB: string | null | undefined,
  engine: EngineConfig
): SizeDifferential | null {
  if (!classA || !classB) return null;
  const stepA = weightClassStep(classA);
  const stepB = weightClassStep(classB);
  const limitA = findWeightClass(classA)?.limit;
  const limitB = findWeightClass(classB)?.limit;
  if (stepA === undefined || stepB === undefined || limitA === undefined || limitB === undefined) return null;
  if (stepA === stepB) return null;

  const classGap = Math.abs(stepA - stepB);
  return {
    favors: stepA > stepB ? 'a' : 'b',
    classGap,
    poundsGap: Math.abs(limitA - limitB),
    magnitude: classGap * engine.matchup.sizePerClass,
  };
}

function styleFactors(
  profiles: Record<Side, RatingProfile>,
  histories: Record<Side, CompetitorHistory>,
  raw: Record<Dimension, number>,
  scheduledRounds: 3 | 5,
  engine: EngineConfig
): ContributingFactor[] {
  const factors: ContributingFactor[] = [];
  const significant = engine.matchup.significantDifference;

  const styleA = styleOf(profiles.a, engine);
  const styleB = styleOf(profiles.b, engine);
  if ((styleA === 'striker' && styleB === 'grappler') || (styleA === 'grappler' && styleB === 'striker')) {
    const grappler: Side = styleA === 'grappler' ? 'a' : 'b';
    const striker = otherSide(grappler);
    // Can the grappler get it to the mat?
    const edge = profiles[grappler].wrestling_offense.value - profiles[striker].wrestling_defense.value;
    const towardA = grappler === 'a' ? edge : -edge;
    factors.push({ stage: 'context', name: 'striker_vs_grappler', magnitude: towardA, favors: favorOf(towardA) });
  }

  if (Math.abs(raw.pressure) >= significant) {
    factors.push({ stage: 'context', name: 'pressure_edge', magnitude: raw.pressure, favors: favorOf(raw.pressure) });
  }

  if (scheduledRounds === 5 && Math.abs(raw.cardio) >= significant) {
    factors.push({ stage: 'context', name: 'cardio_edge', magnitude: raw.cardio, favors: favorOf(raw.cardio) });
  }

  const experience = histories.a.bouts - histories.b.bouts;
  if (Math.abs(experience) > 5) {
    factors.push({ stage: 'context', name: 'experience_edge', magnitude: experience, favors: favorOf(experience) });
  }

  return factors;
}

/** Decay-on-read first, then the chin penalty, which decay never shrinks. */
function profileAt(
  stored: RatingProfile,
  asOf: string | null | undefined,
  birthDate: string | null,
  engine: EngineConfig
): RatingProfile {
  const decayed = asOf ? decayProfile(stored, asOf, birthDate, engine) : stored;
  return withChinPenalty(decayed, engine);
}

function laterDate(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return compareIsoDates(a, b) >= 0 ? a : b;
}

/**
 * Evaluate A against B. Pure with respect to `state`.
 */
export function evaluateMatchup(
  state: RatingState,
  competitorA: string,
  competitorB: string,
  context: MatchupContext,
  options: EvaluatorOptions = {}
): MatchupOutcome {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  const registry = options.competitors;

  if (competitorA === competitorB) {
    return {
      ok: false,
      refusal: { kind: 'InvalidMatchup', competitorId: competitorA, reason: 'A competitor cannot face themself' },
    };
  }

  for (const id of [competitorA, competitorB]) {
    const refusal = refusalFor(state, id, registry);
    if (refusal) return { ok: false, refusal };
  }

  const historyA = state.history(competitorA);
  const historyB = state.history(competitorB);
  const storedA = state.profile(competitorA);
  const storedB = state.profile(competitorB);
  if (!historyA || !historyB || !storedA || !storedB) {
    return {
      ok: false,
      refusal: { kind: 'UnknownCompetitor', competitorId: null, reason: 'Rating state is missing a competitor' },
    };
  }

  const asOf = context.asOf ?? laterDate(historyA.lastBoutDate, historyB.lastBoutDate);
  const competitorARecord = registry?.get(competitorA);
  const competitorBRecord = registry?.get(competitorB);
  const profiles: Record<Side, RatingProfile> = {
    a: profileAt(storedA, asOf, competitorARecord?.birthDate ?? null, engine),
    b: profileAt(storedB, asOf, competitorBRecord?.birthDate ?? null, engine),
  };

  const rawDifferentials = mapDimensions(dim => profiles.a[dim].value - profiles.b[dim].value);
  const differentials = { ...rawDifferentials };
  const factors: ContributingFactor[] = [];

  const shortNotice: Side[] = [];
  for (const side of ['a', 'b'] as const) {
    const notice = context.noticeDays?.[side];
    if (notice === undefined || notice >= engine.matchup.shortNoticeDays) continue;
    shortNotice.push(side);
    const shift = side === 'a' ? -engine.matchup.shortNoticePenalty : engine.matchup.shortNoticePenalty;
    for (const dim of OFFENSE_DIMENSIONS) {
      differentials[dim] += shift;
    }
    factors.push({ stage: 'context', name: 'short_notice', magnitude: shift, favors: otherSide(side) });
  }

  const locationBias = locationBiasFor(context, competitorARecord, competitorBRecord);
  if (locationBias) {
    factors.push({ stage: 'context', name: 'location_bias', magnitude: 0, favors: locationBias.favors });
  }

  // A side with no known class of its own is taken to be at the bout's class
  const sizeDifferential = sizeDifferentialFor(
    context.weightClasses?.a ?? historyA.lastWeightClass ?? context.weightClass,
    context.weightClasses?.b ?? historyB.lastWeightClass ?? context.weightClass,
    engine
  );
  if (sizeDifferential) {
    const towardA = sizeDifferential.favors === 'a' ? sizeDifferential.magnitude : -sizeDifferential.magnitude;
    factors.push({ stage: 'context', name: 'size_differential', magnitude: towardA, favors: sizeDifferential.favors });
  }

  const histories: Record<Side, CompetitorHistory> = { a: historyA, b: historyB };
  factors.push(...styleFactors(profiles, histories, rawDifferentials, context.scheduledRounds, engine));

  return {
    ok: true,
    evaluation: {
      competitorA,
      competitorB,
      asOf,
      scheduledRounds: context.scheduledRounds,
      profiles,
      histories,
      averageDeviation: { a: average(profiles.a, 'deviation'), b: average(profiles.b, 'deviation') },
      rawDifferentials,
      differentials,
      shortNotice,
      locationBias,
      sizeDifferential,
      factors,
    },
  };
}

/**
 * Side-by-side ratings for two competitors, optionally decayed to `asOf`.
 */
export function compareProfiles(
  state: RatingState,
  competitorA: string,
  competitorB: string,
  options: EvaluatorOptions & { asOf?: string } = {}
): ProfileComparison | undefined {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  const storedA = state.profile(competitorA);
  const storedB = state.profile(competitorB);
  if (!storedA || !storedB) return undefined;

  const asOf = options.asOf;
  const a = profileAt(storedA, asOf, options.competitors?.get(competitorA)?.birthDate ?? null, engine);
  const b = profileAt(storedB, asOf, options.competitors?.get(competitorB)?.birthDate ?? null, engine);

  return {
    competitorA,
    competitorB,
    dimensions: DIMENSIONS.map(dimension => {
      const difference = a[dimension].value - b[dimension].value;
      return {
        dimension,
        a: a[dimension].value,
        b: b[dimension].value,
        difference,
        advantage: favorOf(difference),
      };
    }),
    averageA: average(a, 'value'),
    averageB: average(b, 'value'),
  };
}
