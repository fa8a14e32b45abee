/**
 * Replay Engine
 *
 * Derives Rating State from bout history in one deterministic pass:
 *
 *   1. reconcile duplicate bout ids (latest supplied wins)
 *   2. drop bouts on or after the cutoff
 *   3. sort by (date, id)
 *   4. skip malformed bouts with a warning
 *   5. fold the remaining bouts over a fresh RatingState
 *
 * Each bout decays both participants to the bout date, then applies a
 * per-dimension Elo update scaled by K, form, dimension weight and finish.
 * KO/TKO losses bump the chin-flag counter; the penalty it implies is applied
 * on read (see `withChinPenalty`).
 */

import type {
  Bout,
  Competitor,
  CompetitorHistory,
  RecordIssueKind,
} from '../shared/types/index.js';
import { DIMENSIONS } from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { ageOn, compareIsoDates, isIsoDate } from '../shared/utils/dates.js';
import { createLogger } from '../shared/utils/logger.js';
import { reconcileBouts } from '../store/reconcile.js';
import { decayRating, recordKnockoutLoss } from './decay.js';
import { extractDimensionScores } from './dimensions.js';
import { expectedScore, finishMultiplier, kFactor, ratingAfter, shrinkDeviation } from './elo.js';
import { RatingState } from './rating-state.js';

const log = createLogger('ReplayEngine');

export interface ReplayWarning {
  kind: RecordIssueKind;
  boutId: string | null;
  message: string;
}

export interface ReplayOptions {
  engine?: EngineConfig;
  /** Only bouts strictly before this date are replayed. */
  cutoff?: string | null;
}

export interface ReplayResult {
  state: RatingState;
  processed: number;
  skipped: number;
  warnings: ReplayWarning[];
  throughDate: string | null;
}

export interface ReplayContext {
  engine: EngineConfig;
  birthDates: Map<string, string | null>;
  recentBouts: Map<string, Set<string>>;
}

/**
 * Total order on bouts: date, then id.
 */
export function sortBouts(bouts: readonly Bout[]): Bout[] {
  return [...bouts].sort((a, b) => {
    const byDate = compareIsoDates(a.date, b.date);
    if (byDate !== 0) return byDate;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

/**
 * Reason a bout cannot be replayed, or null when it is well-formed.
 */
export function validateBout(bout: Bout, known: ReadonlySet<string>): string | null {
  if (!isIsoDate(bout.date)) return `invalid date "${bout.date}"`;

  const [a, b] = bout.competitorIds;
  if (a === b) return `competitor ${a} listed on both sides`;
  for (const id of bout.competitorIds) {
    if (!known.has(id)) return `unknown competitor ${id}`;
  }

  const outcome = bout.outcome;
  if (outcome === null) return 'missing outcome';
  if (outcome.kind !== 'win') return null;

  if (outcome.winnerId !== a && outcome.winnerId !== b) {
    return `winner ${outcome.winnerId} did not compete`;
  }
  if (bout.method === null) return 'missing method for a decided bout';
  if (bout.method === 'ko_tko' || bout.method === 'submission') {
    const round = bout.finishRound;
    if (round === null || round < 1 || round > bout.scheduledRounds) {
      return `finish without a valid round (${round ?? 'none'})`;
    }
  }
  return null;
}

/**
 * Ids of each competitor's last `window` bouts in the replayed sequence.
 */
function recentBoutIndex(bouts: readonly Bout[], window: number): Map<string, Set<string>> {
  const ordered = new Map<string, string[]>();
  for (const bout of bouts) {
    for (const id of bout.competitorIds) {
      const list = ordered.get(id) ?? [];
      list.push(bout.id);
      ordered.set(id, list);
    }
  }

  const recent = new Map<string, Set<string>>();
  for (const [id, list] of ordered) {
    recent.set(id, new Set(window > 0 ? list.slice(-window) : []));
  }
  return recent;
}

export function recordBoutInHistory(history: CompetitorHistory, bout: Bout, competitorId: string): CompetitorHistory {
  const next: CompetitorHistory = {
    ...history,
    bouts: history.bouts + 1,
    finishRounds: {
      ko_tko: [...history.finishRounds.ko_tko],
      submission: [...history.finishRounds.submission],
    },
    finishLosses: { ...history.finishLosses },
    lastWeightClass: bout.weightClass,
    lastBoutDate: bout.date,
  };

  const outcome = bout.outcome;
  if (outcome === null || outcome.kind === 'no_contest') {
    next.noContests += 1;
  } else if (outcome.kind === 'draw') {
    next.draws += 1;
  } else if (outcome.winnerId === competitorId) {
    next.wins += 1;
    if (bout.method === 'decision') {
      next.decisionWins += 1;
    } else if ((bout.method === 'ko_tko' || bout.method === 'submission') && bout.finishRound !== null) {
      next.finishRounds[bout.method].push(bout.finishRound);
    }
  } else {
    next.losses += 1;
    if (bout.method === 'ko_tko' || bout.method === 'submission') {
      next.finishLosses[bout.method] += 1;
    }
  }
  return next;
}

function decayToBoutDate(state: RatingState, competitorId: string, bout: Bout, ctx: ReplayContext): void {
  const age = ageOn(ctx.birthDates.get(competitorId) ?? null, bout.date);
  for (const dimension of DIMENSIONS) {
    const rating = state.get(competitorId, dimension);
    if (!rating) continue;
    state.set(competitorId, dimension, decayRating(rating, bout.date, { dimension, age, engine: ctx.engine }));
  }
}

function touchHistory(state: RatingState, competitorId: string, bout: Bout): void {
  const history = state.history(competitorId);
  if (history) {
    state.setHistory(competitorId, recordBoutInHistory(history, bout, competitorId));
  }
}

/**
 * Apply one bout to the state. Mutates and returns `state`.
 */
export function applyBout(state: RatingState, bout: Bout, ctx: ReplayContext): RatingState {
  const { engine } = ctx;
  const [aId, bId] = bout.competitorIds;

  state.initialize(aId);
  state.initialize(bId);
  decayToBoutDate(state, aId, bout, ctx);
  decayToBoutDate(state, bId, bout, ctx);

  if (bout.outcome?.kind === 'no_contest') {
    for (const id of bout.competitorIds) {
      for (const dimension of DIMENSIONS) {
        const rating = state.get(id, dimension);
        if (rating) state.set(id, dimension, { ...rating, lastActive: bout.date });
      }
      touchHistory(state, id, bout);
    }
    return state;
  }

  const scoresA = extractDimensionScores(bout, aId);
  const scoresB = extractDimensionScores(bout, bId);
  const finish = finishMultiplier(bout.method, bout.finishRound, engine);
  const formA = ctx.recentBouts.get(aId)?.has(bout.id) ? engine.elo.formMultiplier : 1;
  const formB = ctx.recentBouts.get(bId)?.has(bout.id) ? engine.elo.formMultiplier : 1;

  DIMENSIONS.forEach((dimension, i) => {
    const ra = state.get(aId, dimension);
    const rb = state.get(bId, dimension);
    if (!ra || !rb) return;
    const sa = scoresA[i];
    const sb = scoresB[i];

    const kA = kFactor(ra.bouts, engine) * formA * sa.weight * finish;
    const kB = kFactor(rb.bouts, engine) * formB * sb.weight * finish;
    const expectedA = expectedScore(ra.value, rb.value, engine.elo.logisticScale);
    const expectedB = expectedScore(rb.value, ra.value, engine.elo.logisticScale);

    state.set(aId, dimension, {
      ...ra,
      value: ratingAfter(ra.value, expectedA, sa.score, kA, engine),
      deviation: shrinkDeviation(ra.deviation, ra.value, rb.value, rb.deviation, engine),
      lastActive: bout.date,
      bouts: ra.bouts + 1,
    });
    state.set(bId, dimension, {
      ...rb,
      value: ratingAfter(rb.value, expectedB, sb.score, kB, engine),
      deviation: shrinkDeviation(rb.deviation, rb.value, ra.value, ra.deviation, engine),
      lastActive: bout.date,
      bouts: rb.bouts + 1,
    });
  });

  if (bout.outcome?.kind === 'win' && bout.method === 'ko_tko') {
    const loserId = bout.outcome.winnerId === aId ? bId : aId;
    const chin = state.get(loserId, 'striking_defense');
    if (chin) state.set(loserId, 'striking_defense', recordKnockoutLoss(chin));
  }

  touchHistory(state, aId, bout);
  touchHistory(state, bId, bout);
  return state;
}

/**
 * Replay `bouts` from an empty state. The input order does not matter.
 */
export function replayBouts(
  bouts: readonly Bout[],
  competitors: readonly Competitor[],
  options: ReplayOptions = {}
): ReplayResult {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  const cutoff = options.cutoff ?? null;
  const warnings: ReplayWarning[] = [];

  const reconciled = reconcileBouts(bouts);
  for (const issue of reconciled.issues) {
    warnings.push({ kind: issue.kind, boutId: issue.recordId, message: issue.message });
  }

  const known = new Set(competitors.map(c => c.id));
  const inWindow = cutoff === null
    ? reconciled.records
    : reconciled.records.filter(bout => compareIsoDates(bout.date, cutoff) < 0);

  const valid: Bout[] = [];
  for (const bout of sortBouts(inWindow)) {
    const problem = validateBout(bout, known);
    if (problem === null) {
      valid.push(bout);
    } else {
      warnings.push({ kind: 'MalformedRecord', boutId: bout.id, message: `Skipped bout ${bout.id}: ${problem}` });
    }
  }

  for (const warning of warnings) {
    if (warning.boutId) {
      log.bout(warning.boutId, warning.message, { kind: warning.kind });
    } else {
      log.warn(warning.message, { kind: warning.kind });
    }
  }

  const ctx: ReplayContext = {
    engine,
    birthDates: new Map(competitors.map(c => [c.id, c.birthDate])),
    recentBouts: recentBoutIndex(valid, engine.elo.formWindow),
  };

  const state = valid.reduce((acc, bout) => applyBout(acc, bout, ctx), new RatingState(engine));
  const throughDate = valid.length > 0 ? valid[valid.length - 1].date : null;

  log.info('Replay complete', {
    processed: valid.length,
    skipped: inWindow.length - valid.length,
    competitors: state.size,
    throughDate,
  });

  return {
    state,
    processed: valid.length,
    skipped: inWindow.length - valid.length,
    warnings,
    throughDate,
  };
}
