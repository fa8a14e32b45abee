/**
 * Narrative projection of a PredictionResult.
 *
 * Text comes only from the structured result through the template tables
 * below; nothing here feeds back into a decision.
 */

import { DIMENSION_LABELS, DIMENSIONS } from '../shared/types/index.js';
import type {
  ContributingFactor,
  Dimension,
  LocationBiasFlag,
  PredictedMethod,
  PredictionResult,
  Side,
  WinnerResolution,
} from '../shared/types/index.js';

export type CompetitorNames = Readonly<Record<string, string>>;

interface TemplateContext {
  winner: string;
  loser: string;
  round: number | null;
  composite: number;
}

interface FactorContext {
  factor: ContributingFactor;
  /** Display name of the favored side, or null when neutral. */
  favored: string | null;
  /** Display name of the other side. */
  other: string | null;
  location: LocationBiasFlag | null;
}

const WINNER_TEMPLATES: Record<WinnerResolution, (ctx: TemplateContext) => string> = {
  composite: ({ winner, loser, composite }) =>
    `${winner} over ${loser} (composite edge ${fmt(Math.abs(composite))})`,
  stylistic_tiebreak: ({ winner, loser }) =>
    `${winner} over ${loser} in a close fight, on stylistic matchups`,
  confidence_tiebreak: ({ winner, loser }) =>
    `${winner} over ${loser} in a close fight, on the better-established ratings`,
  identity_tiebreak: ({ winner, loser }) =>
    `${winner} over ${loser}: ratings are level, pick by competitor order`,
};

const METHOD_TEMPLATES: Record<PredictedMethod, (ctx: TemplateContext) => string> = {
  ko_tko: ({ winner, round }) => `${winner} by KO/TKO${round !== null ? ` in round ${round}` : ''}`,
  submission: ({ winner, round }) => `${winner} by submission${round !== null ? ` in round ${round}` : ''}`,
  decision: ({ winner }) => `${winner} by decision`,
};

const FACTOR_TEMPLATES: Readonly<Partial<Record<string, (ctx: FactorContext) => string | null>>> = {
  short_notice: ({ other }) => other ? `${other} took the bout on short notice` : null,
  location_bias: ({ favored, location }) => {
    if (!favored) return null;
    const venue = location?.venue ? ` at ${location.venue}` : '';
    return `${favored} fights in their home region${venue}`;
  },
  size_differential: ({ favored, factor }) =>
    favored ? `${favored} is the naturally bigger competitor (${fmt(Math.abs(factor.magnitude))} pts)` : null,
  striker_vs_grappler: ({ favored }) =>
    favored ? `Striker vs grappler: the takedown battle favors ${favored}` : null,
  pressure_edge: ({ favored }) => favored ? `${favored} should dictate the pace` : null,
  cardio_edge: ({ favored }) => favored ? `${favored} holds the cardio edge over five rounds` : null,
  experience_edge: ({ favored, factor }) =>
    favored ? `${favored} has ${Math.abs(factor.magnitude)} more bouts of experience` : null,
  stylistic_tiebreak: ({ favored }) => favored ? `${favored} wins more of the style pairings` : null,
  confidence_tiebreak: ({ favored }) => favored ? `${favored}'s ratings carry less uncertainty` : null,
  finish_rate: ({ factor }) => `Historical rate for this method: ${fmt(factor.magnitude)}%`,
  knockout_power_vs_striking_defense: ({ factor }) =>
    `Power vs striking defense: ${signed(factor.magnitude)}`,
  chin_flags: ({ other, factor }) =>
    other ? `${other} has been stopped by strikes ${factor.magnitude} time${factor.magnitude === 1 ? '' : 's'}` : null,
  submission_offense_vs_submission_defense: ({ factor }) =>
    `Submission threat vs defense: ${signed(factor.magnitude)}`,
  scheduled_rounds: () => 'Five scheduled rounds lean toward a decision',
  finish_round_history: ({ factor }) =>
    factor.magnitude > 0 ? `Based on ${factor.magnitude} prior finish${factor.magnitude === 1 ? '' : 'es'}` : 'No prior finishes by this method',
  championship_factor: () => 'Championship rounds carry extra weight',
};

function fmt(value: number): string {
  return value.toFixed(1);
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${fmt(value)}`;
}

function isDimension(name: string): name is Dimension {
  return DIMENSIONS.some(dim => dim === name);
}

function dimensionLine({ factor, favored }: FactorContext): string | null {
  if (!isDimension(factor.name) || !favored) return null;
  return `${DIMENSION_LABELS[factor.name]}: edge ${favored} (${fmt(Math.abs(factor.magnitude))})`;
}

/**
 * Render a result as lines of text. `names` maps ids to display names;
 * missing ids fall back to the id itself.
 */
export function renderNarrative(result: PredictionResult, names: CompetitorNames = {}): string[] {
  const nameOf = (id: string): string => names[id] ?? id;
  const sideName = (side: Side | null): string | null =>
    side === null ? null : nameOf(side === 'a' ? result.competitorA : result.competitorB);

  if (result.refused || result.winner === null || result.method === null) {
    const reason = result.refusal?.reason ?? 'insufficient data';
    return [`No pick for ${nameOf(result.competitorA)} vs ${nameOf(result.competitorB)}: ${reason}`];
  }

  const loserId = result.winner === result.competitorA ? result.competitorB : result.competitorA;
  const ctx: TemplateContext = {
    winner: nameOf(result.winner),
    loser: nameOf(loserId),
    round: result.round,
    composite: result.compositeScore ?? 0,
  };

  const lines = [
    WINNER_TEMPLATES[result.winnerResolution ?? 'composite'](ctx),
    METHOD_TEMPLATES[result.method](ctx),
  ];

  for (const factor of result.factors) {
    const other: Side | null = factor.favors === null ? null : factor.favors === 'a' ? 'b' : 'a';
    const factorCtx: FactorContext = {
      factor,
      favored: sideName(factor.favors),
      other: sideName(other),
      location: result.locationBias,
    };
    const template = FACTOR_TEMPLATES[factor.name];
    const line = template ? template(factorCtx) : dimensionLine(factorCtx);
    if (line) lines.push(line);
  }
  return lines;
}
