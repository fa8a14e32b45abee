/**
 * Prediction Engine
 *
 * Three decisions in sequence, each final once made:
 *
 *   winner -> method -> round (finishes only)
 *
 * Every stage appends the factors that drove it to the result, so a pick can
 * be traced without re-running the engine. Refusals come back in the same
 * shape with `refused: true` and every decision field null.
 */

import { DIMENSIONS } from '../shared/types/index.js';
import type {
  Competitor,
  ContributingFactor,
  Dimension,
  MatchupContext,
  PredictedMethod,
  PredictionResult,
  Refusal,
  Side,
  WinnerResolution,
} from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { createLogger } from '../shared/utils/logger.js';
import type { RatingState } from '../ratings/rating-state.js';
import { evaluateMatchup, favorOf, otherSide, type MatchupEvaluation } from './matchup-evaluator.js';

const log = createLogger('PredictionEngine');

/** Offense/defense pairings compared by the stylistic tiebreaker. */
export const STYLE_PAIRS: ReadonlyArray<readonly [Dimension, Dimension]> = [
  ['wrestling_offense', 'wrestling_defense'],
  ['striking_volume', 'striking_defense'],
  ['knockout_power', 'striking_defense'],
  ['submission_offense', 'submission_defense'],
  ['pressure', 'cardio'],
];

export interface PredictOptions {
  competitors?: ReadonlyMap<string, Competitor>;
  engine?: EngineConfig;
}

interface WinnerDecision {
  side: Side;
  composite: number;
  resolution: WinnerResolution;
  factors: ContributingFactor[];
}

interface MethodDecision {
  method: PredictedMethod;
  scores: Record<PredictedMethod, number>;
  factors: ContributingFactor[];
}

interface RoundDecision {
  round: number;
  curve: number[];
  factors: ContributingFactor[];
}

export function refusedResult(
  competitorA: string,
  competitorB: string,
  scheduledRounds: 3 | 5,
  refusal: Refusal
): PredictionResult {
  return {
    competitorA,
    competitorB,
    winner: null,
    method: null,
    round: null,
    scheduledRounds,
    compositeScore: null,
    winnerResolution: null,
    methodScores: null,
    roundCurve: null,
    differentials: null,
    factors: [],
    locationBias: null,
    sizeDifferential: null,
    refused: true,
    refusal,
  };
}

export function dimensionWeightsFor(scheduledRounds: 3 | 5, engine: EngineConfig): Record<Dimension, number> {
  const weights = { ...engine.prediction.dimensionWeights };
  if (scheduledRounds === 5) {
    weights.cardio *= engine.prediction.championshipCardioWeight;
  }
  return weights;
}

function decideWinner(evaluation: MatchupEvaluation, engine: EngineConfig): WinnerDecision {
  const weights = dimensionWeightsFor(evaluation.scheduledRounds, engine);
  const contributions = DIMENSIONS.map(dimension => ({
    dimension,
    value: weights[dimension] * evaluation.differentials[dimension],
  }));

  const size = evaluation.sizeDifferential;
  const sizeTowardA = size ? (size.favors === 'a' ? size.magnitude : -size.magnitude) : 0;
  const composite = contributions.reduce((sum, c) => sum + c.value, 0) + sizeTowardA;

  const factors: ContributingFactor[] = [...contributions]
    .filter(c => c.value !== 0)
    .sort((x, y) => Math.abs(y.value) - Math.abs(x.value))
    .slice(0, 3)
    .map((c): ContributingFactor => ({ stage: 'winner', name: c.dimension, magnitude: c.value, favors: favorOf(c.value) }));
  if (sizeTowardA !== 0) {
    factors.push({ stage: 'winner', name: 'size_differential', magnitude: sizeTowardA, favors: favorOf(sizeTowardA) });
  }

  if (Math.abs(composite) >= engine.prediction.closenessThreshold) {
    return { side: composite > 0 ? 'a' : 'b', composite, resolution: 'composite', factors };
  }

  // Close fight: who wins more of the offense-vs-defense pairings?
  const { a, b } = evaluation.profiles;
  let pairBalance = 0;
  for (const [offense, defense] of STYLE_PAIRS) {
    const edgeA = a[offense].value - b[defense].value;
    const edgeB = b[offense].value - a[defense].value;
    if (edgeA > edgeB) pairBalance += 1;
    else if (edgeB > edgeA) pairBalance -= 1;
  }
  if (pairBalance !== 0) {
    factors.push({ stage: 'winner', name: 'stylistic_tiebreak', magnitude: pairBalance, favors: favorOf(pairBalance) });
    return { side: pairBalance > 0 ? 'a' : 'b', composite, resolution: 'stylistic_tiebreak', factors };
  }

  const confidence = evaluation.averageDeviation.b - evaluation.averageDeviation.a;
  if (confidence !== 0) {
    factors.push({ stage: 'winner', name: 'confidence_tiebreak', magnitude: confidence, favors: favorOf(confidence) });
    return { side: confidence > 0 ? 'a' : 'b', composite, resolution: 'confidence_tiebreak', factors };
  }

  const side: Side = evaluation.competitorA < evaluation.competitorB ? 'a' : 'b';
  factors.push({ stage: 'winner', name: 'identity_tiebreak', magnitude: 0, favors: side });
  return { side, composite, resolution: 'identity_tiebreak', factors };
}

function decideMethod(evaluation: MatchupEvaluation, winner: Side, engine: EngineConfig): MethodDecision {
  const p = engine.prediction;
  const loser = otherSide(winner);
  const w = evaluation.profiles[winner];
  const l = evaluation.profiles[loser];
  const history = evaluation.histories[winner];

  const denominator = history.wins + 3 * p.finishRatePrior;
  const koRate = (history.finishRounds.ko_tko.length + p.finishRatePrior) / denominator;
  const subRate = (history.finishRounds.submission.length + p.finishRatePrior) / denominator;
  const decRate = (history.decisionWins + p.finishRatePrior) / denominator;

  const powerEdge = w.knockout_power.value - l.striking_defense.value;
  const submissionEdge = w.submission_offense.value - l.submission_defense.value;
  const chinFlags = l.striking_defense.chinFlags;
  const longFight = evaluation.scheduledRounds === 5 ? p.fiveRoundDecisionBonus : 0;

  const scores: Record<PredictedMethod, number> = {
    ko_tko: koRate * 100 + powerEdge * p.differentialWeight + chinFlags * p.chinFlagWeight,
    submission: subRate * 100 + submissionEdge * p.differentialWeight,
    decision: decRate * 100 + longFight,
  };

  const best = Math.max(scores.ko_tko, scores.submission, scores.decision);
  let method: PredictedMethod;
  if (scores.decision === best || (scores.ko_tko === best && scores.submission === best)) {
    method = 'decision';
  } else {
    method = scores.ko_tko === best ? 'ko_tko' : 'submission';
  }

  const towardWinner = (value: number): Side | null => (value > 0 ? winner : value < 0 ? loser : null);
  const factors: ContributingFactor[] = [
    {
      stage: 'method',
      name: 'finish_rate',
      magnitude: (method === 'ko_tko' ? koRate : method === 'submission' ? subRate : decRate) * 100,
      favors: winner,
    },
  ];
  if (method === 'ko_tko') {
    factors.push({ stage: 'method', name: 'knockout_power_vs_striking_defense', magnitude: powerEdge, favors: towardWinner(powerEdge) });
    if (chinFlags > 0) {
      factors.push({ stage: 'method', name: 'chin_flags', magnitude: chinFlags, favors: winner });
    }
  } else if (method === 'submission') {
    factors.push({ stage: 'method', name: 'submission_offense_vs_submission_defense', magnitude: submissionEdge, favors: towardWinner(submissionEdge) });
  } else if (longFight > 0) {
    factors.push({ stage: 'method', name: 'scheduled_rounds', magnitude: longFight, favors: null });
  }

  return { method, scores, factors };
}

function decideRound(
  evaluation: MatchupEvaluation,
  winner: Side,
  method: 'ko_tko' | 'submission',
  engine: EngineConfig
): RoundDecision {
  const p = engine.prediction;
  const rounds = evaluation.scheduledRounds;
  const loser = otherSide(winner);
  const finishes = evaluation.histories[winner].finishRounds[method].filter(r => r >= 1 && r <= rounds);

  const weights = Array.from({ length: rounds }, (_, i) => {
    const count = finishes.filter(r => r === i + 1).length;
    return count + (p.roundPrior[i] ?? 0) * p.roundPriorStrength;
  });

  const factors: ContributingFactor[] = [
    { stage: 'round', name: 'finish_round_history', magnitude: finishes.length, favors: winner },
  ];

  if (rounds === 5) {
    const cardioEdge = evaluation.profiles[winner].cardio.value - evaluation.profiles[loser].cardio.value;
    const cardioScale = Math.max(0.5, Math.min(1.5, 1 + cardioEdge / 400));
    const boost = 1 + p.championshipFactor * cardioScale;
    weights[3] *= boost;
    weights[4] *= boost;
    factors.push({ stage: 'round', name: 'championship_factor', magnitude: boost, favors: null });
  }

  const total = weights.reduce((sum, v) => sum + v, 0);
  const curve = weights.map(v => (total > 0 ? v / total : 1 / rounds));

  let modal = 0;
  curve.forEach((v, i) => {
    if (v > curve[modal]) modal = i;
  });

  return { round: modal + 1, curve, factors };
}

/**
 * Decide a matchup that has already been evaluated.
 */
export function predictFromEvaluation(
  evaluation: MatchupEvaluation,
  engine: EngineConfig = DEFAULT_ENGINE_CONFIG
): PredictionResult {
  const winner = decideWinner(evaluation, engine);
  const method = decideMethod(evaluation, winner.side, engine);
  const round = method.method === 'decision'
    ? null
    : decideRound(evaluation, winner.side, method.method, engine);

  return {
    competitorA: evaluation.competitorA,
    competitorB: evaluation.competitorB,
    winner: winner.side === 'a' ? evaluation.competitorA : evaluation.competitorB,
    method: method.method,
    round: round?.round ?? null,
    scheduledRounds: evaluation.scheduledRounds,
    compositeScore: winner.composite,
    winnerResolution: winner.resolution,
    methodScores: method.scores,
    roundCurve: round?.curve ?? null,
    differentials: evaluation.differentials,
    factors: [...evaluation.factors, ...winner.factors, ...method.factors, ...(round?.factors ?? [])],
    locationBias: evaluation.locationBias,
    sizeDifferential: evaluation.sizeDifferential,
    refused: false,
    refusal: null,
  };
}

/**
 * Predict A vs B from the given state. Never throws on unknown or unrated
 * competitors; those come back as refusals.
 */
export function predictBout(
  state: RatingState,
  competitorA: string,
  competitorB: string,
  context: MatchupContext,
  options: PredictOptions = {}
): PredictionResult {
  const engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
  const outcome = evaluateMatchup(state, competitorA, competitorB, context, {
    competitors: options.competitors,
    engine,
  });

  if (!outcome.ok) {
    log.debug('Prediction refused', { competitorA, competitorB, kind: outcome.refusal.kind, reason: outcome.refusal.reason });
    return refusedResult(competitorA, competitorB, context.scheduledRounds, outcome.refusal);
  }
  return predictFromEvaluation(outcome.evaluation, engine);
}
