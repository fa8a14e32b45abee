/**
 * Rating State
 *
 * The (competitor, dimension) -> Rating mapping plus the per-competitor bout
 * history the prediction engine reads. It is an explicit value: a replay run
 * owns one instance and hands it to callers, there is no process-wide copy.
 *
 * Reads never mutate, with one exception: a competitor that is present but
 * missing a dimension (e.g. loaded from an older snapshot) gets that dimension
 * initialized at baseline on first read.
 */

import { DIMENSIONS } from '../shared/types/index.js';
import type {
  CompetitorHistory,
  CompetitorRatingRecord,
  Dimension,
  Rating,
  RatingProfile,
  RatingSnapshot,
} from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { mapDimensions } from './dimensions.js';
import { withChinPenalty } from './decay.js';

export type FlatRatingRecord = Record<string, string | number | null>;

export function baselineRating(engine: EngineConfig = DEFAULT_ENGINE_CONFIG): Rating {
  return {
    value: engine.rating.baseline,
    deviation: engine.rating.initialDeviation,
    lastActive: null,
    chinFlags: 0,
    bouts: 0,
  };
}

export function emptyHistory(competitorId: string): CompetitorHistory {
  return {
    competitorId,
    bouts: 0,
    wins: 0,
    losses: 0,
    draws: 0,
    noContests: 0,
    decisionWins: 0,
    finishRounds: { ko_tko: [], submission: [] },
    finishLosses: { ko_tko: 0, submission: 0 },
    lastWeightClass: null,
    lastBoutDate: null,
  };
}

function copyHistory(history: CompetitorHistory): CompetitorHistory {
  return {
    ...history,
    finishRounds: {
      ko_tko: [...history.finishRounds.ko_tko],
      submission: [...history.finishRounds.submission],
    },
    finishLosses: { ...history.finishLosses },
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class RatingState {
  private readonly profiles = new Map<string, Partial<RatingProfile>>();
  private readonly histories = new Map<string, CompetitorHistory>();

  constructor(private readonly engine: EngineConfig = DEFAULT_ENGINE_CONFIG) {}

  has(competitorId: string): boolean {
    return this.profiles.has(competitorId);
  }

  get size(): number {
    return this.profiles.size;
  }

  competitorIds(): string[] {
    return [...this.profiles.keys()].sort();
  }

  /** Create baseline entries for every dimension on first bout involvement. */
  initialize(competitorId: string): void {
    if (this.profiles.has(competitorId)) return;
    this.profiles.set(competitorId, mapDimensions(() => baselineRating(this.engine)));
    this.histories.set(competitorId, emptyHistory(competitorId));
  }

  private read(profile: Partial<RatingProfile>, dimension: Dimension): Rating {
    let rating = profile[dimension];
    if (!rating) {
      rating = baselineRating(this.engine);
      profile[dimension] = rating;
    }
    return { ...rating };
  }

  get(competitorId: string, dimension: Dimension): Rating | undefined {
    const profile = this.profiles.get(competitorId);
    return profile ? this.read(profile, dimension) : undefined;
  }

  set(competitorId: string, dimension: Dimension, rating: Rating): void {
    if (!Number.isFinite(rating.value) || !Number.isFinite(rating.deviation)) {
      throw new RangeError(`Non-finite rating for ${competitorId}/${dimension}`);
    }
    this.initialize(competitorId);
    const profile = this.profiles.get(competitorId);
    if (profile) {
      profile[dimension] = { ...rating };
    }
  }

  profile(competitorId: string): RatingProfile | undefined {
    const profile = this.profiles.get(competitorId);
    if (!profile) return undefined;
    return mapDimensions(dim => this.read(profile, dim));
  }

  /** Stored ratings with the chin penalty applied to striking defense. */
  effectiveProfile(competitorId: string): RatingProfile | undefined {
    const profile = this.profile(competitorId);
    return profile ? withChinPenalty(profile, this.engine) : undefined;
  }

  history(competitorId: string): CompetitorHistory | undefined {
    const history = this.histories.get(competitorId);
    return history ? copyHistory(history) : undefined;
  }

  setHistory(competitorId: string, history: CompetitorHistory): void {
    this.initialize(competitorId);
    this.histories.set(competitorId, copyHistory(history));
  }

  chinFlags(competitorId: string): number {
    return this.get(competitorId, 'striking_defense')?.chinFlags ?? 0;
  }

  averageRating(competitorId: string): number | undefined {
    const profile = this.effectiveProfile(competitorId);
    if (!profile) return undefined;
    return DIMENSIONS.reduce((sum, dim) => sum + profile[dim].value, 0) / DIMENSIONS.length;
  }

  /** Mean deviation across dimensions; lower means more confidence. */
  averageDeviation(competitorId: string): number | undefined {
    const profile = this.profile(competitorId);
    if (!profile) return undefined;
    return DIMENSIONS.reduce((sum, dim) => sum + profile[dim].deviation, 0) / DIMENSIONS.length;
  }

  clone(): RatingState {
    return RatingState.fromSnapshot(this.snapshot(), this.engine);
  }

  snapshot(throughDate: string | null = null, generatedAt: string = new Date().toISOString()): RatingSnapshot {
    const competitors: CompetitorRatingRecord[] = [];
    for (const competitorId of this.competitorIds()) {
      const ratings = this.profile(competitorId);
      const history = this.history(competitorId);
      if (!ratings || !history) continue;
      competitors.push({ competitorId, ratings, history });
    }
    return deepFreeze({ generatedAt, throughDate, competitors });
  }

  static fromSnapshot(snapshot: RatingSnapshot, engine: EngineConfig = DEFAULT_ENGINE_CONFIG): RatingState {
    const state = new RatingState(engine);
    for (const record of snapshot.competitors) {
      state.initialize(record.competitorId);
      for (const dim of DIMENSIONS) {
        const rating = record.ratings[dim];
        if (rating) state.set(record.competitorId, dim, rating);
      }
      state.setHistory(record.competitorId, record.history);
    }
    return state;
  }

  /**
   * Flat keyed export: `<dimension>_value`, `<dimension>_deviation`,
   * `<dimension>_last_active`, `<dimension>_chin_flags` per dimension.
   * Values are effective ones, chin penalty included.
   */
  toFlatRecord(competitorId: string): FlatRatingRecord | undefined {
    const profile = this.effectiveProfile(competitorId);
    const history = this.histories.get(competitorId);
    if (!profile || !history) return undefined;

    const record: FlatRatingRecord = {
      competitor_id: competitorId,
      bouts: history.bouts,
      last_bout_date: history.lastBoutDate,
    };
    for (const dim of DIMENSIONS) {
      const rating = profile[dim];
      record[`${dim}_value`] = rating.value;
      record[`${dim}_deviation`] = rating.deviation;
      record[`${dim}_last_active`] = rating.lastActive;
      record[`${dim}_chin_flags`] = rating.chinFlags;
    }
    return record;
  }
}
