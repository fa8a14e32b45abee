import { z } from 'zod';
import { isIsoDate } from '../shared/utils/dates.js';

const isoDate = z.string().refine(isIsoDate, 'must be an ISO date (YYYY-MM-DD)');

// ============================================================================
// PREDICTIONS
// ============================================================================

const sidePair = <T extends z.ZodTypeAny>(value: T) => z.object({
  a: value.optional(),
  b: value.optional(),
});

export const predictionRequestSchema = z.object({
  competitorA: z.string().min(1).max(100),
  competitorB: z.string().min(1).max(100),
  scheduledRounds: z.union([z.literal(3), z.literal(5)]).default(3),
  asOf: isoDate.optional(),
  weightClass: z.string().max(50).optional(),
  weightClasses: sidePair(z.string().max(50)).optional(),
  noticeDays: sidePair(z.number().int().min(0).max(365)).optional(),
  venue: z.string().max(200).optional(),
  region: z.string().max(100).optional(),
});

export type PredictionRequest = z.infer<typeof predictionRequestSchema>;

export const backtestRequestSchema = z.object({
  cutoff: isoDate,
  limit: z.number().int().min(1).max(1000).optional(),
  includeEntries: z.boolean().default(false),
});

export type BacktestRequest = z.infer<typeof backtestRequestSchema>;

// ============================================================================
// RATINGS
// ============================================================================

export const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const compareQuerySchema = z.object({
  asOf: isoDate.optional(),
});
