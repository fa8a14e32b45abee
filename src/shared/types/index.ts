// Bout Forecast - Core Type Definitions

// ============================================================================
// DIMENSIONS
// ============================================================================

export const DIMENSIONS = [
  'knockout_power',
  'striking_volume',
  'striking_defense',
  'wrestling_offense',
  'wrestling_defense',
  'submission_offense',
  'submission_defense',
  'cardio',
  'pressure',
  'adaptability',
] as const;

export type Dimension = typeof DIMENSIONS[number];

export const DIMENSION_LABELS: Record<Dimension, string> = {
  knockout_power: 'Knockout Power',
  striking_volume: 'Striking Volume',
  striking_defense: 'Striking Defense',
  wrestling_offense: 'Wrestling Offense',
  wrestling_defense: 'Takedown Defense',
  submission_offense: 'Submission Threat',
  submission_defense: 'Submission Defense',
  cardio: 'Cardio',
  pressure: 'Pressure',
  adaptability: 'Adaptability',
};

// ============================================================================
// RECORDS (delivered by the record store)
// ============================================================================

export type Gender = 'male' | 'female';

export interface Competitor {
  id: string;
  name?: string;
  gender: Gender;
  division?: string | null;
  birthDate: string | null;  // ISO YYYY-MM-DD
  debutDate: string | null;
  homeRegion?: string | null;
  boutIds: string[];
}

export type BoutMethod = 'ko_tko' | 'submission' | 'decision' | 'other';

export type BoutOutcome =
  | { kind: 'win'; winnerId: string }
  | { kind: 'draw' }
  | { kind: 'no_contest' };

export interface BoutStatLine {
  competitorId: string;
  knockdowns: number;
  sigStrikesLanded: number;
  sigStrikesAttempted: number;
  totalStrikesLanded: number;
  takedownsLanded: number;
  takedownsAttempted: number;
  submissionAttempts: number;
  controlTimeSeconds: number;
}

export interface Bout {
  id: string;
  date: string;  // ISO YYYY-MM-DD
  competitorIds: [string, string];
  weightClass: string;
  scheduledRounds: 3 | 5;
  stats: BoutStatLine[];
  outcome: BoutOutcome | null;
  method: BoutMethod | null;
  methodDetail?: string | null;  // "Split", "Rear Naked Choke", ...
  finishRound: number | null;
  noticeDays: Record<string, number>;  // competitor id -> days between booking and bout
  venue: string | null;
  commission?: string | null;
  region?: string | null;
  isTitleFight?: boolean;
}

// ============================================================================
// RATINGS
// ============================================================================

export interface Rating {
  value: number;
  deviation: number;           // Glicko-style uncertainty
  lastActive: string | null;   // date of last bout that touched this dimension
  chinFlags: number;           // KO/TKO losses, only incremented on striking_defense
  bouts: number;               // bouts that updated this dimension
}

export type RatingProfile = Record<Dimension, Rating>;

export type FinishMethod = 'ko_tko' | 'submission';

export interface CompetitorHistory {
  competitorId: string;
  bouts: number;
  wins: number;
  losses: number;
  draws: number;
  noContests: number;
  decisionWins: number;
  finishRounds: Record<FinishMethod, number[]>;  // rounds of finish wins
  finishLosses: Record<FinishMethod, number>;
  lastWeightClass: string | null;
  lastBoutDate: string | null;
}

export interface CompetitorRatingRecord {
  competitorId: string;
  ratings: RatingProfile;
  history: CompetitorHistory;
}

export interface RatingSnapshot {
  generatedAt: string;
  throughDate: string | null;
  competitors: CompetitorRatingRecord[];
}

// ============================================================================
// ERRORS (modeled as result states)
// ============================================================================

export type RecordIssueKind = 'MalformedRecord' | 'DataConflict';

export interface RecordIssue {
  kind: RecordIssueKind;
  recordId: string | null;
  message: string;
}

export type RefusalKind = 'UnknownCompetitor' | 'InsufficientHistory' | 'InvalidMatchup';

export interface Refusal {
  kind: RefusalKind;
  competitorId: string | null;
  reason: string;
}

// ============================================================================
// MATCHUPS & PREDICTIONS
// ============================================================================

export type Side = 'a' | 'b';

export interface MatchupContext {
  scheduledRounds: 3 | 5;
  asOf?: string;                              // decay-on-read date, usually the bout date
  weightClass?: string | null;                // the bout's class
  weightClasses?: Partial<Record<Side, string>>;  // each side's usual class
  noticeDays?: Partial<Record<Side, number>>;
  venue?: string | null;
  region?: string | null;
}

export type PredictedMethod = 'ko_tko' | 'submission' | 'decision';

export type DecisionStage = 'winner' | 'method' | 'round' | 'context';

export interface ContributingFactor {
  stage: DecisionStage;
  name: string;        // dimension name or named signal
  magnitude: number;   // signed toward side A for winner factors
  favors: Side | null;
}

export interface LocationBiasFlag {
  favors: Side;
  region: string;
  venue: string | null;
}

export interface SizeDifferential {
  favors: Side;
  classGap: number;
  poundsGap: number;
  magnitude: number;
}

export type WinnerResolution = 'composite' | 'stylistic_tiebreak' | 'confidence_tiebreak' | 'identity_tiebreak';

export interface PredictionResult {
  competitorA: string;
  competitorB: string;
  winner: string | null;
  method: PredictedMethod | null;
  round: number | null;
  scheduledRounds: 3 | 5;
  compositeScore: number | null;
  winnerResolution: WinnerResolution | null;
  methodScores: Record<PredictedMethod, number> | null;
  roundCurve: number[] | null;
  differentials: Record<Dimension, number> | null;
  factors: ContributingFactor[];
  locationBias: LocationBiasFlag | null;
  sizeDifferential: SizeDifferential | null;
  refused: boolean;
  refusal: Refusal | null;
}
