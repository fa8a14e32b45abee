import { describe, it, expect } from 'vitest';
import type { Bout } from '../shared/types/index.js';
import { competitor, decisionWin, koWin } from '../shared/testing/fixtures.js';
import { runBacktest } from './backtest.js';

const roster = ['alpha', 'bravo', 'charlie', 'echo'].map(id => competitor(id));

const before: Bout[] = [
  koWin('p1', '2023-01-01', 'alpha', 'bravo', 1),
  koWin('p2', '2023-03-01', 'alpha', 'charlie', 1),
  decisionWin('p3', '2023-05-01', 'bravo', 'charlie'),
];

describe('runBacktest', () => {
  it('replays before the cutoff and scores the following bouts', () => {
    const after: Bout[] = [
      koWin('u1', '2024-01-10', 'alpha', 'bravo', 2),
      decisionWin('u2', '2024-02-01', 'charlie', 'echo'),
      decisionWin('u3', '2024-03-01', 'bravo', 'charlie', { outcome: { kind: 'draw' } }),
      decisionWin('u4', '2024-04-01', 'alpha', 'charlie'),
    ];

    const report = runBacktest([...after, ...before], roster, { cutoff: '2024-01-01', limit: 3 });

    expect(report.replayedBouts).toBe(3);
    expect(report.total).toBe(3);
    expect(report.predicted).toBe(1);
    expect(report.skipped).toBe(2);
    expect(report.winnerCorrect).toBe(1);
    expect(report.methodCorrect).toBe(1);
    // predicted round 1 against an actual round 2 counts within one round
    expect(report.roundCorrect).toBe(1);
    expect(report.winnerAccuracy).toBe(1);
    expect(report.methodAccuracy).toBe(1);
    expect(report.roundAccuracy).toBe(1);
    expect(report.byMethod).toEqual({ ko_tko: { total: 1, winnerCorrect: 1, methodCorrect: 1 } });
    expect(report.byWeightClass).toEqual({ Lightweight: { total: 1, winnerCorrect: 1 } });
    expect(report.favorites).toEqual({
      favoriteWins: 1,
      underdogWins: 0,
      even: 0,
      pickedFavorite: 1,
      pickedFavoriteCorrect: 1,
      pickedUnderdog: 0,
      pickedUnderdogCorrect: 0,
    });

    expect(report.entries.map(e => [e.boutId, e.skippedReason])).toEqual([
      ['u1', null],
      ['u2', 'InsufficientHistory'],
      ['u3', 'draw'],
    ]);
    expect(report.entries[0].prediction?.round).toBe(1);
    expect(report.entries[1].prediction?.refused).toBe(true);
  });

  it('applies the recorded notice to the side that took the bout late', () => {
    const late = koWin('u1', '2024-01-10', 'alpha', 'bravo', 2, { noticeDays: { alpha: 10, bravo: 90 } });
    const report = runBacktest([...before, late], roster, { cutoff: '2024-01-01' });

    const factors = report.entries[0].prediction?.factors ?? [];
    expect(factors).toContainEqual({ stage: 'context', name: 'short_notice', magnitude: -25, favors: 'b' });
    expect(factors.filter(f => f.name === 'short_notice')).toHaveLength(1);
  });

  it('counts an upset against the favorite', () => {
    const upset = decisionWin('u1', '2024-01-10', 'bravo', 'alpha');
    const report = runBacktest([...before, upset], roster, { cutoff: '2024-01-01' });

    expect(report.predicted).toBe(1);
    expect(report.entries[0].prediction?.winner).toBe('alpha');
    expect(report.winnerCorrect).toBe(0);
    expect(report.winnerAccuracy).toBe(0);
    expect(report.methodAccuracy).toBe(0);
    expect(report.byMethod.decision).toEqual({ total: 1, winnerCorrect: 0, methodCorrect: 0 });
    expect(report.favorites.underdogWins).toBe(1);
    expect(report.favorites.pickedFavorite).toBe(1);
    expect(report.favorites.pickedFavoriteCorrect).toBe(0);
  });

  it('reports nothing when no bouts follow the cutoff', () => {
    const report = runBacktest(before, roster, { cutoff: '2025-01-01' });
    expect(report.replayedBouts).toBe(3);
    expect(report.total).toBe(0);
    expect(report.entries).toEqual([]);
    expect(report.winnerAccuracy).toBe(0);
  });
});
