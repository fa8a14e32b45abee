import { describe, it, expect } from 'vitest';
import { RatingState, baselineRating, emptyHistory } from './rating-state.js';

describe('RatingState', () => {
  it('initializes every dimension at baseline on first involvement', () => {
    const state = new RatingState();
    state.initialize('alpha');

    expect(state.has('alpha')).toBe(true);
    expect(state.get('alpha', 'cardio')).toEqual(baselineRating());
    expect(state.history('alpha')).toEqual(emptyHistory('alpha'));
    expect(state.averageRating('alpha')).toBe(1500);
    expect(state.averageDeviation('alpha')).toBe(350);
  });

  it('returns undefined for unknown competitors', () => {
    const state = new RatingState();
    expect(state.get('ghost', 'cardio')).toBeUndefined();
    expect(state.profile('ghost')).toBeUndefined();
    expect(state.toFlatRecord('ghost')).toBeUndefined();
    expect(state.chinFlags('ghost')).toBe(0);
  });

  it('hands out copies, not live references', () => {
    const state = new RatingState();
    state.initialize('alpha');

    const read = state.get('alpha', 'pressure');
    if (!read) throw new Error('expected a rating');
    read.value = 9999;

    expect(state.get('alpha', 'pressure')?.value).toBe(1500);
  });

  it('rejects non-finite ratings', () => {
    const state = new RatingState();
    expect(() => state.set('alpha', 'cardio', { ...baselineRating(), value: Number.NaN })).toThrow(RangeError);
  });

  it('lists competitors in sorted order', () => {
    const state = new RatingState();
    state.initialize('charlie');
    state.initialize('alpha');
    state.initialize('bravo');
    expect(state.competitorIds()).toEqual(['alpha', 'bravo', 'charlie']);
    expect(state.size).toBe(3);
  });

  it('produces a frozen snapshot that restores an equal state', () => {
    const state = new RatingState();
    state.set('alpha', 'striking_defense', { value: 1450, deviation: 200, lastActive: '2024-03-01', chinFlags: 2, bouts: 4 });
    state.setHistory('alpha', { ...emptyHistory('alpha'), bouts: 4, wins: 2, losses: 2, lastBoutDate: '2024-03-01' });

    const snapshot = state.snapshot('2024-03-01', '2024-03-02T00:00:00.000Z');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.competitors[0].ratings.cardio)).toBe(true);

    const restored = RatingState.fromSnapshot(snapshot);
    expect(restored.snapshot('2024-03-01', '2024-03-02T00:00:00.000Z')).toEqual(snapshot);
    expect(restored.chinFlags('alpha')).toBe(2);
  });

  it('clones independently', () => {
    const state = new RatingState();
    state.initialize('alpha');
    const copy = state.clone();
    copy.set('alpha', 'cardio', { ...baselineRating(), value: 1600 });

    expect(state.get('alpha', 'cardio')?.value).toBe(1500);
    expect(copy.get('alpha', 'cardio')?.value).toBe(1600);
  });

  it('applies the chin penalty to effective reads only', () => {
    const state = new RatingState();
    state.set('alpha', 'striking_defense', { value: 1500, deviation: 200, lastActive: '2024-03-01', chinFlags: 1, bouts: 4 });

    expect(state.get('alpha', 'striking_defense')?.value).toBe(1500);
    expect(state.effectiveProfile('alpha')?.striking_defense.value).toBe(1475);
    expect(state.toFlatRecord('alpha')?.striking_defense_value).toBe(1475);
    expect(state.averageRating('alpha')).toBe(1497.5);
    expect(state.snapshot(null, 'fixed').competitors[0].ratings.striking_defense.value).toBe(1500);
  });

  it('exports a flat keyed record', () => {
    const state = new RatingState();
    state.set('alpha', 'knockout_power', { value: 1620, deviation: 120, lastActive: '2024-05-05', chinFlags: 0, bouts: 3 });

    const flat = state.toFlatRecord('alpha');
    expect(flat?.competitor_id).toBe('alpha');
    expect(flat?.knockout_power_value).toBe(1620);
    expect(flat?.knockout_power_deviation).toBe(120);
    expect(flat?.knockout_power_last_active).toBe('2024-05-05');
    expect(flat?.striking_defense_chin_flags).toBe(0);
    expect(flat?.cardio_last_active).toBeNull();
    // 3 identity keys + 4 per dimension
    expect(Object.keys(flat ?? {})).toHaveLength(43);
  });
});
