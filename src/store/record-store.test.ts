import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { competitor, decisionWin } from '../shared/testing/fixtures.js';
import { competitorSchema } from './record-schemas.js';
import { reconcileById } from './reconcile.js';
import { JsonRecordStore, MemoryRecordStore, normalizeRecords, parseRecords } from './record-store.js';

describe('parseRecords', () => {
  it('rejects a non-array payload', () => {
    const result = parseRecords({ id: 'alpha' }, competitorSchema, 'competitors');
    expect(result.records).toEqual([]);
    expect(result.issues).toEqual([
      { kind: 'MalformedRecord', recordId: null, message: 'competitors: expected an array of records' },
    ]);
  });

  it('fills defaults and strips unknown keys', () => {
    const result = parseRecords([{ id: 'alpha', gender: 'female', nickname: 'The Test' }], competitorSchema, 'competitors');
    expect(result.issues).toEqual([]);
    expect(result.records).toEqual([
      { id: 'alpha', gender: 'female', birthDate: null, debutDate: null, boutIds: [] },
    ]);
  });

  it('drops invalid entries, naming them by id or index', () => {
    const result = parseRecords(
      [
        { id: 'alpha', gender: 'male', birthDate: '1990-13-01' },
        { gender: 'male' },
        { id: 'bravo', gender: 'male' },
      ],
      competitorSchema,
      'competitors'
    );
    expect(result.records.map(c => c.id)).toEqual(['bravo']);
    expect(result.issues).toHaveLength(2);
    expect(result.issues[0]).toEqual({
      kind: 'MalformedRecord',
      recordId: 'alpha',
      message: 'competitors[alpha] birthDate: must be an ISO date (YYYY-MM-DD)',
    });
    expect(result.issues[1].recordId).toBeNull();
    expect(result.issues[1].message.startsWith('competitors[1] id: ')).toBe(true);
  });
});

describe('normalizeRecords', () => {
  it('collapses duplicates latest-wins and reports conflicting results', () => {
    const first = decisionWin('b1', '2024-01-01', 'alpha', 'bravo');
    const second = { ...first, outcome: { kind: 'draw' } };
    const set = normalizeRecords(
      [competitor('alpha', { name: 'Old' }), competitor('alpha', { name: 'New' }), competitor('bravo')],
      [first, second]
    );

    expect(set.competitors.map(c => c.name)).toEqual(['New', 'BRAVO']);
    expect(set.bouts).toHaveLength(1);
    expect(set.bouts[0].outcome).toEqual({ kind: 'draw' });
    expect(set.issues).toEqual([
      { kind: 'DataConflict', recordId: 'b1', message: 'Bout b1: win:alpha/decision superseded by draw/decision' },
    ]);
  });

  it('does not report identical duplicates', () => {
    const bout = decisionWin('b1', '2024-01-01', 'alpha', 'bravo');
    expect(normalizeRecords([], [bout, { ...bout }]).issues).toEqual([]);
  });
});

describe('reconcileById', () => {
  it('keeps the first position of each id with the latest value', () => {
    const merged = reconcileById([{ id: 'x', v: 1 }, { id: 'y', v: 2 }, { id: 'x', v: 3 }]);
    expect(merged).toEqual([{ id: 'x', v: 3 }, { id: 'y', v: 2 }]);
  });
});

describe('MemoryRecordStore', () => {
  it('validates what it was given', async () => {
    const store = new MemoryRecordStore([competitor('alpha'), { id: 'bravo' }], []);
    const set = await store.load();
    expect(set.competitors.map(c => c.id)).toEqual(['alpha']);
    expect(set.issues).toHaveLength(1);
  });
});

describe('JsonRecordStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'records-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads competitors and bouts from the directory', async () => {
    await writeFile(path.join(dir, 'competitors.json'), JSON.stringify([competitor('alpha'), competitor('bravo')]));
    await writeFile(path.join(dir, 'bouts.json'), JSON.stringify([decisionWin('b1', '2024-01-01', 'alpha', 'bravo')]));

    const set = await new JsonRecordStore(dir).load();
    expect(set.competitors).toHaveLength(2);
    expect(set.bouts[0].id).toBe('b1');
    expect(set.issues).toEqual([]);
  });

  it('treats missing files as empty', async () => {
    const set = await new JsonRecordStore(path.join(dir, 'missing')).load();
    expect(set).toEqual({ competitors: [], bouts: [], issues: [] });
  });

  it('fails on unreadable JSON', async () => {
    await writeFile(path.join(dir, 'competitors.json'), '{not json');
    await expect(new JsonRecordStore(dir).load()).rejects.toThrow(SyntaxError);
  });
});
