/**
 * Dimension feature extraction.
 *
 * Turns one bout's recorded statistics into an implied per-dimension result
 * for one competitor: a score in [0, 1] (1 = dominated that dimension,
 * 0.5 = even) and a weight that scales the rating update.
 */

import type { Bout, BoutStatLine, Dimension } from '../shared/types/index.js';

export interface DimensionScore {
  dimension: Dimension;
  score: number;
  weight: number;
}

export type BoutResult = 'win' | 'loss' | 'draw';

export function mapDimensions<T>(fn: (dimension: Dimension) => T): Record<Dimension, T> {
  return {
    knockout_power: fn('knockout_power'),
    striking_volume: fn('striking_volume'),
    striking_defense: fn('striking_defense'),
    wrestling_offense: fn('wrestling_offense'),
    wrestling_defense: fn('wrestling_defense'),
    submission_offense: fn('submission_offense'),
    submission_defense: fn('submission_defense'),
    cardio: fn('cardio'),
    pressure: fn('pressure'),
    adaptability: fn('adaptability'),
  };
}

export function resultFor(bout: Bout, competitorId: string): BoutResult {
  if (bout.outcome?.kind === 'win') {
    return bout.outcome.winnerId === competitorId ? 'win' : 'loss';
  }
  return 'draw';
}

function share(mine: number, theirs: number, fallback = 0.5): number {
  const total = mine + theirs;
  return total > 0 ? mine / total : fallback;
}

function clampScore(value: number, lo = 0.1, hi = 0.9): number {
  return Math.max(lo, Math.min(hi, value));
}

function isSplit(bout: Bout): boolean {
  return (bout.methodDetail ?? '').toLowerCase().includes('split');
}

function knockoutPower(bout: Bout, result: BoutResult, mine: BoutStatLine, theirs: BoutStatLine): number {
  if (bout.method === 'ko_tko' && result === 'win') return 1;
  if (bout.method === 'ko_tko' && result === 'loss') return 0;

  if (mine.knockdowns > theirs.knockdowns) return 0.7 + Math.min(0.2, mine.knockdowns * 0.1);
  if (mine.knockdowns < theirs.knockdowns) return 0.3 - Math.min(0.2, theirs.knockdowns * 0.1);
  return 0.5;
}

function strikingVolume(mine: BoutStatLine, theirs: BoutStatLine): number {
  if (mine.sigStrikesLanded + theirs.sigStrikesLanded === 0) return 0.5;
  const landedShare = share(mine.sigStrikesLanded, theirs.sigStrikesLanded);
  return 0.2 + landedShare * 0.6 + (landedShare > 0.6 ? 0.2 : 0);
}

function strikingDefense(theirs: BoutStatLine): number {
  if (theirs.sigStrikesAttempted === 0) return 0.5;
  return clampScore(1 - theirs.sigStrikesLanded / theirs.sigStrikesAttempted);
}

function wrestlingOffense(mine: BoutStatLine, theirs: BoutStatLine): number {
  if (mine.takedownsLanded + theirs.takedownsLanded === 0) return 0.5;
  const accuracy = mine.takedownsAttempted > 0 ? mine.takedownsLanded / mine.takedownsAttempted : 0;
  return accuracy * 0.4 + share(mine.takedownsLanded, theirs.takedownsLanded) * 0.6;
}

function wrestlingDefense(theirs: BoutStatLine): number {
  if (theirs.takedownsAttempted === 0) return 0.55;
  return clampScore(1 - theirs.takedownsLanded / theirs.takedownsAttempted);
}

function submissionOffense(bout: Bout, result: BoutResult, mine: BoutStatLine, theirs: BoutStatLine): number {
  if (bout.method === 'submission' && result === 'win') return 1;
  if (mine.submissionAttempts + theirs.submissionAttempts === 0) return 0.5;
  return 0.3 + share(mine.submissionAttempts, theirs.submissionAttempts) * 0.4;
}

function submissionDefense(bout: Bout, result: BoutResult, theirs: BoutStatLine): number {
  if (bout.method === 'submission' && result === 'loss') return 0;
  if (theirs.submissionAttempts === 0) return 0.55;
  return Math.min(0.9, 0.5 + theirs.submissionAttempts * 0.1);
}

function cardio(bout: Bout, result: BoutResult): number {
  if (result === 'draw') return 0.5;
  const won = result === 'win';
  if (bout.method === 'decision') return won ? 0.65 : 0.45;

  const round = bout.finishRound;
  if (round !== null && round <= 2) return won ? 0.55 : 0.4;
  if (round !== null && round >= 3) return won ? 0.75 : 0.35;
  return 0.5;
}

function pressure(mine: BoutStatLine, theirs: BoutStatLine): number {
  const controlShare = share(mine.controlTimeSeconds, theirs.controlTimeSeconds);
  const strikeShare = share(mine.totalStrikesLanded, theirs.totalStrikesLanded);
  return controlShare * 0.6 + strikeShare * 0.4;
}

function adaptability(bout: Bout, result: BoutResult): number {
  if (result === 'draw') return 0.5;
  if (result === 'win') {
    if (bout.method === 'decision') return isSplit(bout) ? 0.7 : 0.65;
    return 0.6;
  }
  if (bout.method === 'decision') return isSplit(bout) ? 0.45 : 0.4;
  return 0.35;
}

/**
 * Scores when the bout carries no statistics for one or both sides: the
 * outcome drives every dimension at reduced weight, with the finishing
 * method sharpening the dimensions it speaks to.
 */
export function outcomeOnlyScores(bout: Bout, competitorId: string): DimensionScore[] {
  const result = resultFor(bout, competitorId);
  const won = result === 'win';
  const base = result === 'draw' ? 0.5 : won ? 0.7 : 0.3;

  return Object.values(mapDimensions((dimension): DimensionScore => {
    if (result !== 'draw') {
      if (bout.method === 'ko_tko') {
        if (dimension === 'knockout_power') return { dimension, score: won ? 1 : 0, weight: 1 };
        if (dimension === 'striking_defense') return { dimension, score: won ? 0.7 : 0, weight: 0.8 };
      } else if (bout.method === 'submission') {
        if (dimension === 'submission_offense') return { dimension, score: won ? 1 : 0, weight: 1 };
        if (dimension === 'submission_defense') return { dimension, score: won ? 0.7 : 0, weight: 0.8 };
      } else if (bout.method === 'decision' && dimension === 'cardio') {
        return { dimension, score: won ? 0.6 : 0.4, weight: 0.7 };
      }
    }
    return { dimension, score: base, weight: 0.5 };
  }));
}

export function findStatLine(bout: Bout, competitorId: string): BoutStatLine | undefined {
  return bout.stats.find(line => line.competitorId === competitorId);
}

/**
 * Implied per-dimension result for `competitorId` in `bout`, in the fixed
 * dimension order.
 */
export function extractDimensionScores(bout: Bout, competitorId: string): DimensionScore[] {
  const opponentId = bout.competitorIds[0] === competitorId ? bout.competitorIds[1] : bout.competitorIds[0];
  const mine = findStatLine(bout, competitorId);
  const theirs = findStatLine(bout, opponentId);

  if (!mine || !theirs) {
    return outcomeOnlyScores(bout, competitorId);
  }

  const result = resultFor(bout, competitorId);
  const scores = mapDimensions((dimension): number => {
    switch (dimension) {
      case 'knockout_power': return knockoutPower(bout, result, mine, theirs);
      case 'striking_volume': return strikingVolume(mine, theirs);
      case 'striking_defense': return strikingDefense(theirs);
      case 'wrestling_offense': return wrestlingOffense(mine, theirs);
      case 'wrestling_defense': return wrestlingDefense(theirs);
      case 'submission_offense': return submissionOffense(bout, result, mine, theirs);
      case 'submission_defense': return submissionDefense(bout, result, theirs);
      case 'cardio': return cardio(bout, result);
      case 'pressure': return pressure(mine, theirs);
      case 'adaptability': return adaptability(bout, result);
    }
  });

  return Object.values(mapDimensions((dimension): DimensionScore => ({
    dimension,
    score: scores[dimension],
    weight: 1,
  })));
}
