import { DIMENSIONS } from '../types/index.js';
import type { Bout, BoutStatLine, Competitor, CompetitorHistory, Dimension } from '../types/index.js';
import { RatingState, emptyHistory } from '../../ratings/rating-state.js';

// Record builders shared by the engine, service and route tests.

export function competitor(id: string, overrides: Partial<Competitor> = {}): Competitor {
  return {
    id,
    name: id.toUpperCase(),
    gender: 'male',
    birthDate: null,
    debutDate: null,
    boutIds: [],
    ...overrides,
  };
}

export function statLine(competitorId: string, overrides: Partial<BoutStatLine> = {}): BoutStatLine {
  return {
    competitorId,
    knockdowns: 0,
    sigStrikesLanded: 0,
    sigStrikesAttempted: 0,
    totalStrikesLanded: 0,
    takedownsLanded: 0,
    takedownsAttempted: 0,
    submissionAttempts: 0,
    controlTimeSeconds: 0,
    ...overrides,
  };
}

/** A decision win for `winner` over `loser`, with no stat lines. */
export function decisionWin(id: string, date: string, winner: string, loser: string, overrides: Partial<Bout> = {}): Bout {
  return {
    id,
    date,
    competitorIds: [winner, loser],
    weightClass: 'Lightweight',
    scheduledRounds: 3,
    stats: [],
    outcome: { kind: 'win', winnerId: winner },
    method: 'decision',
    finishRound: null,
    noticeDays: {},
    venue: null,
    ...overrides,
  };
}

export function koWin(id: string, date: string, winner: string, loser: string, round = 1, overrides: Partial<Bout> = {}): Bout {
  return decisionWin(id, date, winner, loser, { method: 'ko_tko', finishRound: round, ...overrides });
}

export function submissionWin(id: string, date: string, winner: string, loser: string, round = 1, overrides: Partial<Bout> = {}): Bout {
  return decisionWin(id, date, winner, loser, { method: 'submission', finishRound: round, ...overrides });
}

export interface SeedOptions {
  values?: Partial<Record<Dimension, number>>;
  deviation?: number;
  chinFlags?: number;
  lastActive?: string;
  history?: Partial<CompetitorHistory>;
}

/**
 * Put a rated competitor straight into `state`: every dimension at 1500
 * unless overridden, six bouts of history, last active 2024-01-01.
 */
export function seedCompetitor(state: RatingState, id: string, options: SeedOptions = {}): RatingState {
  const lastActive = options.lastActive ?? '2024-01-01';
  for (const dim of DIMENSIONS) {
    state.set(id, dim, {
      value: options.values?.[dim] ?? 1500,
      deviation: options.deviation ?? 100,
      lastActive,
      chinFlags: dim === 'striking_defense' ? options.chinFlags ?? 0 : 0,
      bouts: 6,
    });
  }
  state.setHistory(id, {
    ...emptyHistory(id),
    bouts: 6,
    lastWeightClass: 'Lightweight',
    lastBoutDate: lastActive,
    ...options.history,
  });
  return state;
}

export function seededState(...ids: string[]): RatingState {
  const state = new RatingState();
  for (const id of ids) seedCompetitor(state, id);
  return state;
}
