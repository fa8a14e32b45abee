import { describe, it, expect } from 'vitest';
import { RatingState } from '../ratings/rating-state.js';
import { competitor, seedCompetitor, seededState } from '../shared/testing/fixtures.js';
import { dimensionWeightsFor, predictBout } from './prediction-engine.js';
import { DEFAULT_ENGINE_CONFIG } from '../shared/config.js';

/** A heavy hitter against a durable-looking opponent with two KO losses. */
function powerMismatch(): RatingState {
  const state = new RatingState();
  seedCompetitor(state, 'alpha', {
    values: { knockout_power: 1700 },
    history: { wins: 5, losses: 1, decisionWins: 2, finishRounds: { ko_tko: [1, 1, 2], submission: [] } },
  });
  seedCompetitor(state, 'bravo', {
    values: { striking_defense: 1350 },
    chinFlags: 2, // reads as 1300 once the two-KO penalty applies
    history: { wins: 3, losses: 3, decisionWins: 3, finishLosses: { ko_tko: 2, submission: 0 } },
  });
  return state;
}

describe('predictBout', () => {
  it('picks the power puncher by early knockout', () => {
    const result = predictBout(powerMismatch(), 'alpha', 'bravo', { scheduledRounds: 3 });

    expect(result.refused).toBe(false);
    expect(result.winner).toBe('alpha');
    expect(result.winnerResolution).toBe('composite');
    expect(result.compositeScore).toBeCloseTo(48, 10);
    expect(result.method).toBe('ko_tko');
    expect(result.round).toBe(1);

    // (3 KOs + 1) / (5 wins + 3) * 100 + 400 * 0.5 + 2 chin flags * 20
    expect(result.methodScores?.ko_tko).toBe(290);
    expect(result.methodScores?.submission).toBe(12.5);
    expect(result.methodScores?.decision).toBe(37.5);

    const curve = result.roundCurve ?? [];
    expect(curve).toHaveLength(3);
    expect(curve[0]).toBeCloseTo(2.5 / 4.2, 10);
    expect(curve[1]).toBeCloseTo(1.4 / 4.2, 10);
    expect(curve[2]).toBeCloseTo(0.3 / 4.2, 10);
  });

  it('records the factors behind each decision', () => {
    const result = predictBout(powerMismatch(), 'alpha', 'bravo', { scheduledRounds: 3 });

    expect(result.factors.map(f => `${f.stage}:${f.name}`)).toEqual([
      'winner:knockout_power',
      'winner:striking_defense',
      'method:finish_rate',
      'method:knockout_power_vs_striking_defense',
      'method:chin_flags',
      'round:finish_round_history',
    ]);
    expect(result.factors.find(f => f.name === 'chin_flags')).toEqual({ stage: 'method', name: 'chin_flags', magnitude: 2, favors: 'a' });
    expect(result.factors.find(f => f.name === 'finish_round_history')?.magnitude).toBe(3);
  });

  it('names the same winner from the other corner', () => {
    const result = predictBout(powerMismatch(), 'bravo', 'alpha', { scheduledRounds: 3 });
    expect(result.winner).toBe('alpha');
    expect(result.compositeScore).toBeCloseTo(-48, 10);
    expect(result.method).toBe('ko_tko');
    expect(result.round).toBe(1);
  });

  it('returns identical results for identical inputs', () => {
    const state = powerMismatch();
    const context = { scheduledRounds: 5 as const, noticeDays: { b: 14 } };
    expect(predictBout(state, 'alpha', 'bravo', context)).toEqual(predictBout(state, 'alpha', 'bravo', context));
  });

  it('redistributes toward the championship rounds in a five-round bout', () => {
    const result = predictBout(powerMismatch(), 'alpha', 'bravo', { scheduledRounds: 5 });

    expect(result.round).toBe(1);
    expect(result.roundCurve).toHaveLength(5);
    expect(result.factors.find(f => f.name === 'championship_factor')?.magnitude).toBe(1.3);
    const curve = result.roundCurve ?? [];
    // round 4 prior 0.2 and round 5 prior 0.15, both scaled by 1.3
    expect(curve[3] / curve[4]).toBeCloseTo(0.2 / 0.15, 10);
    expect(curve.reduce((sum, p) => sum + p, 0)).toBeCloseTo(1, 10);
  });

  it('weights cardio up for five rounds', () => {
    const three = dimensionWeightsFor(3, DEFAULT_ENGINE_CONFIG);
    const five = dimensionWeightsFor(5, DEFAULT_ENGINE_CONFIG);
    expect(three.cardio).toBe(0.1);
    expect(five.cardio).toBeCloseTo(0.15, 10);
    expect(five.pressure).toBe(three.pressure);
  });

  it('picks a submission for a grappler with a submission record', () => {
    const state = new RatingState();
    seedCompetitor(state, 'alpha', {
      values: { submission_offense: 1700, wrestling_offense: 1600 },
      history: { wins: 6, finishRounds: { ko_tko: [], submission: [2, 2, 3, 1] } },
    });
    seedCompetitor(state, 'bravo', { values: { submission_defense: 1400 } });

    const result = predictBout(state, 'alpha', 'bravo', { scheduledRounds: 3 });
    expect(result.winner).toBe('alpha');
    expect(result.method).toBe('submission');
    // round 2: 2 finishes + 0.8 * 0.5 beats round 1: 1 + 1.0 * 0.5
    expect(result.round).toBe(2);
    expect(result.factors.find(f => f.stage === 'method' && f.name !== 'finish_rate')?.name)
      .toBe('submission_offense_vs_submission_defense');
  });

  it('predicts a decision, with no round, when finish signals are level', () => {
    const result = predictBout(seededState('alpha', 'bravo'), 'alpha', 'bravo', { scheduledRounds: 5 });
    expect(result.method).toBe('decision');
    expect(result.round).toBeNull();
    expect(result.roundCurve).toBeNull();
    expect(result.factors.find(f => f.name === 'scheduled_rounds')).toEqual({
      stage: 'method',
      name: 'scheduled_rounds',
      magnitude: 10,
      favors: null,
    });
  });

  it('adds the size gap to the composite', () => {
    const result = predictBout(seededState('alpha', 'bravo'), 'alpha', 'bravo', {
      scheduledRounds: 3,
      weightClasses: { a: 'Lightweight', b: 'Welterweight' },
    });
    expect(result.compositeScore).toBe(-20);
    expect(result.winner).toBe('bravo');
    expect(result.winnerResolution).toBe('composite');
    expect(result.sizeDifferential?.favors).toBe('b');
  });
});

describe('close-fight tiebreaks', () => {
  it('uses the stylistic pairings first', () => {
    const state = new RatingState();
    seedCompetitor(state, 'alpha', { values: { wrestling_offense: 1530 } });
    seedCompetitor(state, 'bravo');

    const result = predictBout(state, 'alpha', 'bravo', { scheduledRounds: 3 });
    expect(result.compositeScore).toBeCloseTo(3, 10);
    expect(result.winnerResolution).toBe('stylistic_tiebreak');
    expect(result.winner).toBe('alpha');
    expect(result.factors.find(f => f.name === 'stylistic_tiebreak')?.magnitude).toBe(1);
  });

  it('then prefers the better-established ratings', () => {
    const state = new RatingState();
    seedCompetitor(state, 'alpha', { deviation: 120 });
    seedCompetitor(state, 'bravo', { deviation: 80 });

    const result = predictBout(state, 'alpha', 'bravo', { scheduledRounds: 3 });
    expect(result.winnerResolution).toBe('confidence_tiebreak');
    expect(result.winner).toBe('bravo');
  });

  it('falls back to competitor order when nothing separates them', () => {
    const state = seededState('alpha', 'bravo');
    const forward = predictBout(state, 'alpha', 'bravo', { scheduledRounds: 3 });
    const reverse = predictBout(state, 'bravo', 'alpha', { scheduledRounds: 3 });

    expect(forward.winnerResolution).toBe('identity_tiebreak');
    expect(forward.winner).toBe('alpha');
    expect(reverse.winner).toBe('alpha');
  });
});

describe('refusals', () => {
  const registry = new Map([
    ['rookie', competitor('rookie')],
    ['newbie', competitor('newbie')],
  ]);

  it('refuses two debutants in both directions', () => {
    const state = new RatingState();
    const forward = predictBout(state, 'rookie', 'newbie', { scheduledRounds: 3 }, { competitors: registry });
    const reverse = predictBout(state, 'newbie', 'rookie', { scheduledRounds: 3 }, { competitors: registry });

    for (const result of [forward, reverse]) {
      expect(result.refused).toBe(true);
      expect(result.winner).toBeNull();
      expect(result.method).toBeNull();
      expect(result.round).toBeNull();
      expect(result.factors).toEqual([]);
      expect(result.refusal?.kind).toBe('InsufficientHistory');
    }
    expect(forward.refusal?.competitorId).toBe('rookie');
    expect(reverse.refusal?.competitorId).toBe('newbie');
  });

  it('refuses when only one side is a debutant', () => {
    const state = seededState('alpha');
    const result = predictBout(state, 'alpha', 'rookie', { scheduledRounds: 3 }, { competitors: registry });
    expect(result.refused).toBe(true);
    expect(result.refusal).toEqual({
      kind: 'InsufficientHistory',
      competitorId: 'rookie',
      reason: 'Competitor rookie has no recorded bouts',
    });
  });
});
