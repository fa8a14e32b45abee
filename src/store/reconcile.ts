import type { Bout, BoutOutcome, RecordIssue } from '../shared/types/index.js';

export interface Reconciled<T> {
  records: T[];
  issues: RecordIssue[];
}

function describeOutcome(outcome: BoutOutcome | null): string {
  if (outcome === null) return 'no outcome';
  return outcome.kind === 'win' ? `win:${outcome.winnerId}` : outcome.kind;
}

function sameResult(a: Bout, b: Bout): boolean {
  return describeOutcome(a.outcome) === describeOutcome(b.outcome)
    && a.method === b.method
    && a.finishRound === b.finishRound;
}

/**
 * Collapse records sharing an id; the latest supplied record wins.
 * A superseded bout whose result differs from its replacement is reported
 * as a DataConflict.
 */
export function reconcileBouts(bouts: readonly Bout[]): Reconciled<Bout> {
  const byId = new Map<string, Bout>();
  const issues: RecordIssue[] = [];

  for (const bout of bouts) {
    const previous = byId.get(bout.id);
    if (previous && !sameResult(previous, bout)) {
      issues.push({
        kind: 'DataConflict',
        recordId: bout.id,
        message: `Bout ${bout.id}: ${describeOutcome(previous.outcome)}/${previous.method ?? 'none'} superseded by ${describeOutcome(bout.outcome)}/${bout.method ?? 'none'}`,
      });
    }
    byId.set(bout.id, bout);
  }

  return { records: [...byId.values()], issues };
}

export function reconcileById<T extends { id: string }>(records: readonly T[]): T[] {
  const byId = new Map<string, T>();
  for (const record of records) {
    byId.set(record.id, record);
  }
  return [...byId.values()];
}
