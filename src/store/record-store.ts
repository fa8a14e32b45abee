/**
 * Record Store Adapter
 *
 * Read-only typed access to normalized competitor and bout records. Every
 * raw record is shape-checked here; anything that fails is dropped with a
 * MalformedRecord issue so the engine only ever sees well-typed values.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Bout, Competitor, RecordIssue } from '../shared/types/index.js';
import { firstIssue } from '../shared/utils/validation.js';
import { createLogger } from '../shared/utils/logger.js';
import { boutSchema, competitorSchema } from './record-schemas.js';
import { reconcileBouts, reconcileById } from './reconcile.js';

const log = createLogger('RecordStore');

export interface RecordSet {
  competitors: Competitor[];
  bouts: Bout[];
  issues: RecordIssue[];
}

export interface RecordStore {
  load(): Promise<RecordSet>;
}

function recordIdOf(raw: unknown): string | null {
  if (raw !== null && typeof raw === 'object' && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return null;
}

/**
 * Validate each raw entry; keep the valid ones.
 */
export function parseRecords<T>(
  raw: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): { records: T[]; issues: RecordIssue[] } {
  const issues: RecordIssue[] = [];
  if (!Array.isArray(raw)) {
    issues.push({ kind: 'MalformedRecord', recordId: null, message: `${label}: expected an array of records` });
    return { records: [], issues };
  }

  const records: T[] = [];
  raw.forEach((entry: unknown, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      records.push(result.data);
      return;
    }
    const recordId = recordIdOf(entry);
    issues.push({
      kind: 'MalformedRecord',
      recordId,
      message: `${label}[${recordId ?? index}] ${firstIssue(result.error)}`,
    });
  });
  return { records, issues };
}

/**
 * Shape-check, then collapse duplicate identities latest-wins.
 */
export function normalizeRecords(rawCompetitors: unknown, rawBouts: unknown): RecordSet {
  const competitors = parseRecords(rawCompetitors, competitorSchema, 'competitors');
  const bouts = parseRecords(rawBouts, boutSchema, 'bouts');
  const reconciled = reconcileBouts(bouts.records);

  return {
    competitors: reconcileById(competitors.records),
    bouts: reconciled.records,
    issues: [...competitors.issues, ...bouts.issues, ...reconciled.issues],
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads `competitors.json` and `bouts.json` from a directory.
 */
export class JsonRecordStore implements RecordStore {
  constructor(private readonly dir: string) {}

  private async readJson(file: string): Promise<unknown> {
    const fullPath = path.join(this.dir, file);
    try {
      const text = await readFile(fullPath, 'utf8');
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      if (isMissingFile(err)) {
        log.warn('Record file not found, treating as empty', { file: fullPath });
        return [];
      }
      throw err;
    }
  }

  async load(): Promise<RecordSet> {
    const [rawCompetitors, rawBouts] = await Promise.all([
      this.readJson('competitors.json'),
      this.readJson('bouts.json'),
    ]);
    const set = normalizeRecords(rawCompetitors, rawBouts);
    for (const issue of set.issues) {
      log.warn(issue.message, { kind: issue.kind, recordId: issue.recordId });
    }
    log.info('Records loaded', {
      competitors: set.competitors.length,
      bouts: set.bouts.length,
      issues: set.issues.length,
    });
    return set;
  }
}

/**
 * In-memory store for tests and embedding.
 */
export class MemoryRecordStore implements RecordStore {
  constructor(
    private readonly competitors: unknown[] = [],
    private readonly bouts: unknown[] = []
  ) {}

  async load(): Promise<RecordSet> {
    return normalizeRecords(this.competitors, this.bouts);
  }
}
