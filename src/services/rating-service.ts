// Rating Service
// Owns the current Rating State, serializes full replays, and answers
// profile, comparison, prediction and backtest requests against it.

import { nanoid } from 'nanoid';
import type {
  Competitor,
  MatchupContext,
  PredictionResult,
  RatingSnapshot,
} from '../shared/types/index.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../shared/config.js';
import { eventBus as defaultEventBus, createEngineEvent, type EngineEventBus } from '../shared/utils/events.js';
import { createLogger } from '../shared/utils/logger.js';
import { RatingState, type FlatRatingRecord } from '../ratings/rating-state.js';
import { replayBouts, type ReplayWarning } from '../ratings/replay-engine.js';
import { compareProfiles, type ProfileComparison } from '../prediction/matchup-evaluator.js';
import { predictBout } from '../prediction/prediction-engine.js';
import { runBacktest, type BacktestReport } from '../prediction/backtest.js';
import type { RecordStore } from '../store/record-store.js';
import type { RatingRepository } from '../store/rating-repository.js';

const log = createLogger('RatingService');

export interface RatingServiceOptions {
  store: RecordStore;
  repository: RatingRepository;
  engine?: EngineConfig;
  events?: EngineEventBus;
}

export interface ReplaySummary {
  runId: string;
  processed: number;
  skipped: number;
  warnings: ReplayWarning[];
  recordIssues: number;
  competitors: number;
  throughDate: string | null;
  durationMs: number;
}

export interface LeaderboardEntry {
  rank: number;
  competitorId: string;
  name: string | null;
  averageRating: number;
  averageDeviation: number;
  bouts: number;
}

export class RatingService {
  private state: RatingState | null = null;
  private snapshotMeta: Pick<RatingSnapshot, 'generatedAt' | 'throughDate'> | null = null;
  private competitors = new Map<string, Competitor>();
  private queue: Promise<unknown> = Promise.resolve();

  private readonly store: RecordStore;
  private readonly repository: RatingRepository;
  private readonly engine: EngineConfig;
  private readonly events: EngineEventBus;

  constructor(options: RatingServiceOptions) {
    this.store = options.store;
    this.repository = options.repository;
    this.engine = options.engine ?? DEFAULT_ENGINE_CONFIG;
    this.events = options.events ?? defaultEventBus;
  }

  /**
   * Load the persisted snapshot and the competitor registry. Does not replay.
   */
  async initialize(): Promise<void> {
    const [snapshot, records] = await Promise.all([this.repository.load(), this.store.load()]);
    this.competitors = new Map(records.competitors.map(c => [c.id, c]));
    if (snapshot) {
      this.state = RatingState.fromSnapshot(snapshot, this.engine);
      this.snapshotMeta = { generatedAt: snapshot.generatedAt, throughDate: snapshot.throughDate };
      log.info('Ratings loaded from snapshot', {
        competitors: snapshot.competitors.length,
        throughDate: snapshot.throughDate,
      });
    }
  }

  isReady(): boolean {
    return this.state !== null;
  }

  getState(): RatingState | null {
    return this.state;
  }

  getSnapshotInfo(): Pick<RatingSnapshot, 'generatedAt' | 'throughDate'> | null {
    return this.snapshotMeta;
  }

  /**
   * Full replay from the record store. Concurrent calls run one after the
   * other; each caller gets its own run's summary or error.
   */
  replay(): Promise<ReplaySummary> {
    const run = this.queue.then(() => this.runReplay());
    // The queue tail only orders runs; `run` carries the outcome to the caller
    this.queue = run.catch((error: unknown) => {
      log.error('Replay failed', { error: error instanceof Error ? error.message : String(error) });
    });
    return run;
  }

  private async runReplay(): Promise<ReplaySummary> {
    const runId = `replay-${nanoid(10)}`;
    const started = Date.now();
    this.events.publish(createEngineEvent('replay:started', runId));

    const records = await this.store.load();
    const result = replayBouts(records.bouts, records.competitors, { engine: this.engine });

    for (const warning of result.warnings) {
      this.events.publish(createEngineEvent('replay:warning', runId, { ...warning }));
    }

    const snapshot = result.state.snapshot(result.throughDate);
    await this.repository.save(snapshot);

    this.competitors = new Map(records.competitors.map(c => [c.id, c]));
    this.state = result.state;
    this.snapshotMeta = { generatedAt: snapshot.generatedAt, throughDate: snapshot.throughDate };

    const summary: ReplaySummary = {
      runId,
      processed: result.processed,
      skipped: result.skipped,
      warnings: result.warnings,
      recordIssues: records.issues.length,
      competitors: result.state.size,
      throughDate: result.throughDate,
      durationMs: Date.now() - started,
    };

    this.events.publish(createEngineEvent('replay:completed', runId, {
      processed: summary.processed,
      skipped: summary.skipped,
      competitors: summary.competitors,
      throughDate: summary.throughDate,
    }));
    log.info('Replay run finished', { runId, processed: summary.processed, durationMs: summary.durationMs });

    return summary;
  }

  getProfile(competitorId: string): FlatRatingRecord | undefined {
    return this.state?.toFlatRecord(competitorId);
  }

  getLeaderboard(limit = 50): LeaderboardEntry[] {
    const state = this.state;
    if (!state) return [];

    const rows = state.competitorIds().map(competitorId => ({
      competitorId,
      name: this.competitors.get(competitorId)?.name ?? null,
      averageRating: state.averageRating(competitorId) ?? this.engine.rating.baseline,
      averageDeviation: state.averageDeviation(competitorId) ?? this.engine.rating.initialDeviation,
      bouts: state.history(competitorId)?.bouts ?? 0,
    }));

    return rows
      .sort((x, y) => y.averageRating - x.averageRating || (x.competitorId < y.competitorId ? -1 : 1))
      .slice(0, limit)
      .map((row, i) => ({ rank: i + 1, ...row }));
  }

  compare(competitorA: string, competitorB: string, asOf?: string): ProfileComparison | undefined {
    if (!this.state) return undefined;
    return compareProfiles(this.state, competitorA, competitorB, {
      asOf,
      competitors: this.competitors,
      engine: this.engine,
    });
  }

  /**
   * Predict against the current state. An empty state refuses every matchup.
   */
  predict(competitorA: string, competitorB: string, context: MatchupContext): PredictionResult {
    const state = this.state ?? new RatingState(this.engine);
    const result = predictBout(state, competitorA, competitorB, context, {
      competitors: this.competitors,
      engine: this.engine,
    });

    this.events.publish(createEngineEvent('prediction:made', `predict-${nanoid(10)}`, {
      competitorA,
      competitorB,
      winner: result.winner,
      method: result.method,
      round: result.round,
      refused: result.refused,
    }));
    return result;
  }

  /**
   * Backtest against fresh records. Uses its own replay; the served state is
   * left alone.
   */
  async backtest(cutoff: string, limit?: number): Promise<BacktestReport> {
    const records = await this.store.load();
    return runBacktest(records.bouts, records.competitors, { cutoff, limit, engine: this.engine });
  }

  competitorName(competitorId: string): string {
    return this.competitors.get(competitorId)?.name ?? competitorId;
  }
}
