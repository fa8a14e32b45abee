import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { RatingSnapshot } from '../shared/types/index.js';
import { createLogger } from '../shared/utils/logger.js';
import { firstIssue } from '../shared/utils/validation.js';
import { ratingSnapshotSchema } from './record-schemas.js';

const log = createLogger('RatingRepository');

export interface RatingRepository {
  load(): Promise<RatingSnapshot | null>;
  save(snapshot: RatingSnapshot): Promise<void>;
}

/**
 * Persists the latest snapshot as a single JSON document.
 */
export class JsonRatingRepository implements RatingRepository {
  constructor(private readonly file: string) {}

  async load(): Promise<RatingSnapshot | null> {
    let text: string;
    try {
      text = await readFile(this.file, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      log.warn('Stored ratings are not valid JSON, ignoring', { file: this.file, error: err.message });
      return null;
    }

    const parsed = ratingSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Stored ratings failed validation, ignoring', {
        file: this.file,
        error: firstIssue(parsed.error),
      });
      return null;
    }
    return parsed.data;
  }

  async save(snapshot: RatingSnapshot): Promise<void> {
    await mkdir(path.dirname(this.file), { recursive: true });
    await writeFile(this.file, JSON.stringify(snapshot, null, 2), 'utf8');
    log.info('Ratings saved', { file: this.file, competitors: snapshot.competitors.length });
  }
}

export class MemoryRatingRepository implements RatingRepository {
  private stored: RatingSnapshot | null = null;

  async load(): Promise<RatingSnapshot | null> {
    return this.stored;
  }

  async save(snapshot: RatingSnapshot): Promise<void> {
    this.stored = snapshot;
  }
}
