import { z } from 'zod';
import { isIsoDate } from '../shared/utils/dates.js';
import { mapDimensions } from '../ratings/dimensions.js';

// Shape checks for records arriving from the data pipeline. Unknown keys are
// stripped, so upstream may add fields without breaking the loader.

const isoDate = z.string().refine(isIsoDate, 'must be an ISO date (YYYY-MM-DD)');
const count = z.number().int().min(0);

export const competitorSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  gender: z.enum(['male', 'female']),
  division: z.string().nullable().optional(),
  birthDate: isoDate.nullable().default(null),
  debutDate: isoDate.nullable().default(null),
  homeRegion: z.string().nullable().optional(),
  boutIds: z.array(z.string()).default([]),
});

export const statLineSchema = z.object({
  competitorId: z.string().min(1),
  knockdowns: count.default(0),
  sigStrikesLanded: count.default(0),
  sigStrikesAttempted: count.default(0),
  totalStrikesLanded: count.default(0),
  takedownsLanded: count.default(0),
  takedownsAttempted: count.default(0),
  submissionAttempts: count.default(0),
  controlTimeSeconds: z.number().min(0).default(0),
});

export const outcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('win'), winnerId: z.string().min(1) }),
  z.object({ kind: z.literal('draw') }),
  z.object({ kind: z.literal('no_contest') }),
]);

export const boutSchema = z.object({
  id: z.string().min(1),
  date: isoDate,
  competitorIds: z.tuple([z.string().min(1), z.string().min(1)]),
  weightClass: z.string().min(1),
  scheduledRounds: z.union([z.literal(3), z.literal(5)]),
  stats: z.array(statLineSchema).default([]),
  outcome: outcomeSchema.nullable(),
  method: z.enum(['ko_tko', 'submission', 'decision', 'other']).nullable(),
  methodDetail: z.string().nullable().optional(),
  finishRound: z.number().int().min(1).max(5).nullable().default(null),
  noticeDays: z.record(z.number().int().min(0)).default({}),
  venue: z.string().nullable().default(null),
  commission: z.string().nullable().optional(),
  region: z.string().nullable().optional(),
  isTitleFight: z.boolean().optional(),
});

const ratingSchema = z.object({
  value: z.number().finite(),
  deviation: z.number().finite().min(0),
  lastActive: isoDate.nullable(),
  chinFlags: count,
  bouts: count,
});

const profileSchema = z.object(mapDimensions(() => ratingSchema));

const historySchema = z.object({
  competitorId: z.string().min(1),
  bouts: count,
  wins: count,
  losses: count,
  draws: count,
  noContests: count,
  decisionWins: count,
  finishRounds: z.object({ ko_tko: z.array(z.number().int()), submission: z.array(z.number().int()) }),
  finishLosses: z.object({ ko_tko: count, submission: count }),
  lastWeightClass: z.string().nullable(),
  lastBoutDate: isoDate.nullable(),
});

export const ratingSnapshotSchema = z.object({
  generatedAt: z.string(),
  throughDate: isoDate.nullable(),
  competitors: z.array(z.object({
    competitorId: z.string().min(1),
    ratings: profileSchema,
    history: historySchema,
  })),
});
