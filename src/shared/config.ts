import 'dotenv/config';
import { z } from 'zod';
import type { Dimension } from './types/index.js';
import { issueMessage } from './utils/validation.js';

// ========================================================================
// ENGINE TUNING
// Every constant the rating and prediction engines use. These are product
// tuning parameters: validate changes through the backtest, not by eye.
// ========================================================================

export interface EngineConfig {
  rating: {
    baseline: number;
    min: number;
    max: number;
    initialDeviation: number;
    minDeviation: number;
    deviationGrowthPerMonth: number;
  };
  elo: {
    baseK: number;
    logisticScale: number;
    provisionalBouts: number;
    provisionalMultiplier: number;
    declinePerBout: number;
    minKMultiplier: number;
    formWindow: number;
    formMultiplier: number;
    firstRoundFinishMultiplier: number;
    finishMultiplier: number;
  };
  decay: {
    graceMonths: number;
    ratePerMonth: number;
    maxFraction: number;
  };
  age: {
    declineStart: number;
    fractionPerYear: number;
    maxFraction: number;
    cardioMultiplier: number;
    chinMultiplier: number;
  };
  chin: {
    penaltyPerKo: number;
    maxPenalizedKos: number;
  };
  matchup: {
    shortNoticeDays: number;
    shortNoticePenalty: number;
    sizePerClass: number;
    significantDifference: number;
  };
  prediction: {
    closenessThreshold: number;
    dimensionWeights: Record<Dimension, number>;
    championshipCardioWeight: number;
    finishRatePrior: number;
    differentialWeight: number;
    chinFlagWeight: number;
    fiveRoundDecisionBonus: number;
    roundPrior: number[];
    roundPriorStrength: number;
    championshipFactor: number;
  };
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  rating: {
    baseline: 1500,
    min: 800,
    max: 2400,
    initialDeviation: 350,
    minDeviation: 50,
    deviationGrowthPerMonth: 15,
  },
  elo: {
    baseK: 32,
    logisticScale: 400,
    provisionalBouts: 10,
    provisionalMultiplier: 1.5,
    declinePerBout: 0.01,
    minKMultiplier: 0.75,
    formWindow: 3,
    formMultiplier: 1.25,
    firstRoundFinishMultiplier: 1.25,
    finishMultiplier: 1.1,
  },
  decay: {
    graceMonths: 12,
    ratePerMonth: 0.03,
    maxFraction: 0.5,
  },
  age: {
    declineStart: 35,
    fractionPerYear: 0.04,
    maxFraction: 0.2,
    cardioMultiplier: 1.5,
    chinMultiplier: 0.5,
  },
  chin: {
    penaltyPerKo: 25,
    maxPenalizedKos: 4,
  },
  matchup: {
    shortNoticeDays: 21,
    shortNoticePenalty: 25,
    sizePerClass: 20,
    significantDifference: 75,
  },
  prediction: {
    closenessThreshold: 10,
    dimensionWeights: {
      knockout_power: 0.12,
      striking_volume: 0.12,
      striking_defense: 0.12,
      wrestling_offense: 0.1,
      wrestling_defense: 0.1,
      submission_offense: 0.08,
      submission_defense: 0.08,
      cardio: 0.1,
      pressure: 0.08,
      adaptability: 0.1,
    },
    championshipCardioWeight: 1.5,
    finishRatePrior: 1,
    differentialWeight: 0.5,
    chinFlagWeight: 20,
    fiveRoundDecisionBonus: 10,
    roundPrior: [1.0, 0.8, 0.6, 0.4, 0.3],
    roundPriorStrength: 0.5,
    championshipFactor: 0.3,
  },
};

function envNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Apply environment overrides on top of the default engine constants.
 */
export function resolveEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    ...d,
    elo: {
      ...d.elo,
      baseK: envNumber(env, 'ELO_BASE_K', d.elo.baseK),
      provisionalBouts: envNumber(env, 'ELO_PROVISIONAL_BOUTS', d.elo.provisionalBouts),
      formMultiplier: envNumber(env, 'ELO_FORM_MULTIPLIER', d.elo.formMultiplier),
    },
    decay: {
      ...d.decay,
      graceMonths: envNumber(env, 'DECAY_GRACE_MONTHS', d.decay.graceMonths),
      ratePerMonth: envNumber(env, 'DECAY_RATE_PER_MONTH', d.decay.ratePerMonth),
    },
    age: {
      ...d.age,
      declineStart: envNumber(env, 'AGE_DECLINE_START', d.age.declineStart),
      fractionPerYear: envNumber(env, 'AGE_DECAY_PER_YEAR', d.age.fractionPerYear),
    },
    chin: {
      ...d.chin,
      penaltyPerKo: envNumber(env, 'CHIN_PENALTY_PER_KO', d.chin.penaltyPerKo),
    },
    matchup: {
      ...d.matchup,
      shortNoticeDays: envNumber(env, 'SHORT_NOTICE_DAYS', d.matchup.shortNoticeDays),
      shortNoticePenalty: envNumber(env, 'SHORT_NOTICE_PENALTY', d.matchup.shortNoticePenalty),
    },
    prediction: {
      ...d.prediction,
      closenessThreshold: envNumber(env, 'CLOSENESS_THRESHOLD', d.prediction.closenessThreshold),
    },
  };
}

// Environment configuration with defaults
export const config = {
  port: parseInt(process.env.PORT || '3010', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
  logDir: process.env.LOG_DIR || 'logs',

  // Records and persisted ratings
  recordsDir: process.env.RECORDS_DIR || 'data/records',
  ratingsFile: process.env.RATINGS_FILE || 'data/ratings.json',

  engine: resolveEngineConfig(process.env),
};

// ========================================================================
// VALIDATION
// ========================================================================

const fraction = z.number().min(0).lt(1);
const positive = z.number().positive();
const nonNegative = z.number().min(0);

export const engineConfigSchema = z.object({
  rating: z.object({
    baseline: positive,
    min: positive,
    max: positive,
    initialDeviation: positive,
    minDeviation: positive,
    deviationGrowthPerMonth: nonNegative,
  })
    .refine(r => r.min < r.baseline && r.baseline < r.max, {
      message: 'rating.min < rating.baseline < rating.max must hold',
    })
    .refine(r => r.minDeviation <= r.initialDeviation, {
      message: 'rating.minDeviation must not exceed rating.initialDeviation',
    }),
  elo: z.object({
    baseK: positive,
    logisticScale: positive,
    provisionalBouts: z.number().int().min(0),
    provisionalMultiplier: z.number().min(1),
    declinePerBout: nonNegative,
    minKMultiplier: z.number().gt(0).max(1),
    formWindow: z.number().int().min(0),
    formMultiplier: z.number().min(1),
    firstRoundFinishMultiplier: z.number().min(1),
    finishMultiplier: z.number().min(1),
  }),
  decay: z.object({
    graceMonths: nonNegative,
    ratePerMonth: nonNegative,
    maxFraction: fraction,
  }),
  age: z.object({
    declineStart: positive,
    fractionPerYear: nonNegative,
    maxFraction: fraction,
    cardioMultiplier: nonNegative,
    chinMultiplier: nonNegative,
  }),
  chin: z.object({
    penaltyPerKo: nonNegative,
    maxPenalizedKos: z.number().int().min(0),
  }),
  matchup: z.object({
    shortNoticeDays: nonNegative,
    shortNoticePenalty: nonNegative,
    sizePerClass: nonNegative,
    significantDifference: nonNegative,
  }),
  prediction: z.object({
    closenessThreshold: nonNegative,
    dimensionWeights: z.record(nonNegative),
    championshipCardioWeight: nonNegative,
    finishRatePrior: nonNegative,
    differentialWeight: nonNegative,
    chinFlagWeight: nonNegative,
    fiveRoundDecisionBonus: nonNegative,
    roundPrior: z.array(nonNegative).length(5),
    roundPriorStrength: nonNegative,
    championshipFactor: nonNegative,
  }),
});

// Validate the resolved configuration
export function validateConfig(
  engine: EngineConfig = config.engine
): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = engineConfigSchema.safeParse(engine);
  if (!parsed.success) {
    errors.push(...parsed.error.issues.map(issueMessage));
  }

  if (Number.isNaN(config.port) || config.port <= 0) {
    errors.push('PORT must be a positive integer');
  }

  if (engine.decay.graceMonths === 0) {
    warnings.push('decay.graceMonths is 0 - ratings start decaying the day after every bout');
  }
  const weightTotal = Object.values(engine.prediction.dimensionWeights).reduce((a, b) => a + b, 0);
  if (Math.abs(weightTotal - 1) > 1e-6) {
    warnings.push(`prediction.dimensionWeights sum to ${weightTotal.toFixed(3)}, not 1`);
  }
  if (engine.elo.formWindow === 0) {
    warnings.push('elo.formWindow is 0 - recent-form weighting is disabled');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export default config;
