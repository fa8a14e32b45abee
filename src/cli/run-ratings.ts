#!/usr/bin/env node
// Ratings CLI Entry Point
// Usage:
//   npm run ratings -- replay
//   npm run ratings -- predict --a c-001 --b c-002 --rounds 5
//   npm run ratings -- backtest --cutoff 2023-01-01

import chalk from 'chalk';
import { config, validateConfig } from '../shared/config.js';
import { DIMENSION_LABELS } from '../shared/types/index.js';
import { todayIso } from '../shared/utils/dates.js';
import { createLogger } from '../shared/utils/logger.js';
import { RatingService } from '../services/rating-service.js';
import { JsonRecordStore } from '../store/record-store.js';
import { JsonRatingRepository } from '../store/rating-repository.js';
import { renderNarrative } from '../prediction/narrative.js';
import { HELP_TEXT, parseArgs, UsageError, type CLIOptions } from './args.js';

const log = createLogger('RatingsCLI');

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function loadService(options: CLIOptions): Promise<RatingService> {
  const service = new RatingService({
    store: new JsonRecordStore(options.recordsDir ?? config.recordsDir),
    repository: new JsonRatingRepository(options.ratingsFile ?? config.ratingsFile),
    engine: config.engine,
  });
  await service.initialize();
  return service;
}

async function requireRatings(service: RatingService): Promise<void> {
  if (service.isReady()) return;
  console.log(chalk.yellow('No stored ratings found, replaying records first...'));
  await service.replay();
}

async function runReplay(service: RatingService, options: CLIOptions): Promise<void> {
  const summary = await service.replay();
  if (options.json) return printJson(summary);

  console.log(chalk.bold('\nReplay complete'));
  console.log(`  Bouts processed: ${chalk.green(summary.processed)}`);
  console.log(`  Bouts skipped:   ${summary.skipped > 0 ? chalk.yellow(summary.skipped) : summary.skipped}`);
  console.log(`  Competitors:     ${summary.competitors}`);
  console.log(`  Through:         ${summary.throughDate ?? '-'}`);
  for (const warning of summary.warnings) {
    console.log(chalk.yellow(`  ! [${warning.kind}] ${warning.message}`));
  }
  console.log('');
}

function runShow(service: RatingService, options: CLIOptions, competitorId: string): void {
  const record = service.getProfile(competitorId);
  if (!record) {
    throw new UsageError(`No ratings for ${competitorId}`);
  }
  if (options.json) return printJson(record);

  console.log(chalk.bold(`\n${service.competitorName(competitorId)}`) + chalk.gray(` (${competitorId})`));
  console.log(`  Bouts: ${record.bouts}   Last bout: ${record.last_bout_date ?? '-'}\n`);
  for (const [dimension, label] of Object.entries(DIMENSION_LABELS)) {
    const value = Number(record[`${dimension}_value`]);
    const deviation = Number(record[`${dimension}_deviation`]);
    const chin = Number(record[`${dimension}_chin_flags`]);
    const chinNote = chin > 0 ? chalk.red(`  chin flags: ${chin}`) : '';
    console.log(`  ${label.padEnd(20)} ${value.toFixed(0).padStart(5)} ${chalk.gray(`±${deviation.toFixed(0)}`)}${chinNote}`);
  }
  console.log('');
}

function runCompare(service: RatingService, options: CLIOptions, a: string, b: string): void {
  const comparison = service.compare(a, b, options.date);
  if (!comparison) {
    throw new UsageError(`No ratings for ${service.getProfile(a) ? b : a}`);
  }
  if (options.json) return printJson(comparison);

  const nameA = service.competitorName(a);
  const nameB = service.competitorName(b);
  console.log(chalk.bold(`\n${nameA} vs ${nameB}\n`));
  for (const row of comparison.dimensions) {
    const diff = row.difference >= 0 ? `+${row.difference.toFixed(0)}` : row.difference.toFixed(0);
    const color = row.advantage === 'a' ? chalk.green : row.advantage === 'b' ? chalk.red : chalk.gray;
    console.log(
      `  ${DIMENSION_LABELS[row.dimension].padEnd(20)} ${row.a.toFixed(0).padStart(5)} ${row.b.toFixed(0).padStart(5)} ${color(diff.padStart(6))}`
    );
  }
  console.log(`\n  Average: ${comparison.averageA.toFixed(0)} vs ${comparison.averageB.toFixed(0)}\n`);
}

function runPredict(service: RatingService, options: CLIOptions, a: string, b: string): void {
  const prediction = service.predict(a, b, {
    scheduledRounds: options.rounds,
    asOf: options.date ?? todayIso(),
    weightClass: options.weightClass ?? null,
    region: options.region ?? null,
  });
  if (options.json) return printJson(prediction);

  const names = { [a]: service.competitorName(a), [b]: service.competitorName(b) };
  const [headline, ...details] = renderNarrative(prediction, names);
  console.log('');
  console.log(prediction.refused ? chalk.yellow(headline) : chalk.bold.green(headline));
  for (const line of details) {
    console.log(`  ${line}`);
  }
  console.log('');
}

async function runBacktest(service: RatingService, options: CLIOptions, cutoff: string): Promise<void> {
  const report = await service.backtest(cutoff, options.limit);
  if (options.json) return printJson({ ...report, entries: undefined });

  console.log(chalk.bold(`\nBacktest from ${report.cutoff}`));
  console.log(`  Replayed bouts:  ${report.replayedBouts}`);
  console.log(`  Evaluated:       ${report.total} (${report.predicted} predicted, ${report.skipped} skipped)`);
  console.log(`  Winner:          ${report.winnerCorrect}/${report.predicted} ${chalk.cyan(pct(report.winnerAccuracy))}`);
  console.log(`  Method:          ${report.methodCorrect}/${report.winnerCorrect} ${chalk.cyan(pct(report.methodAccuracy))}`);
  console.log(`  Round (±1):      ${report.roundCorrect} ${chalk.cyan(pct(report.roundAccuracy))}`);

  console.log(chalk.bold('\n  By method'));
  for (const [method, tally] of Object.entries(report.byMethod)) {
    if (!tally) continue;
    console.log(`    ${method.padEnd(12)} winner ${tally.winnerCorrect}/${tally.total}  method ${tally.methodCorrect}/${tally.total}`);
  }

  console.log(chalk.bold('\n  By weight class'));
  for (const [weightClass, tally] of Object.entries(report.byWeightClass)) {
    console.log(`    ${weightClass.padEnd(24)} ${tally.winnerCorrect}/${tally.total}`);
  }

  const fav = report.favorites;
  console.log(chalk.bold('\n  Favorites'));
  console.log(`    Favorite won ${fav.favoriteWins}, underdog won ${fav.underdogWins}, level ${fav.even}`);
  console.log(`    Picked favorite ${fav.pickedFavoriteCorrect}/${fav.pickedFavorite}, picked underdog ${fav.pickedUnderdogCorrect}/${fav.pickedUnderdog}\n`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(HELP_TEXT);
    return;
  }

  const validation = validateConfig();
  if (!validation.valid) {
    throw new UsageError(`Configuration errors: ${validation.errors.join('; ')}`);
  }
  for (const warning of validation.warnings) {
    console.log(chalk.yellow(`warning: ${warning}`));
  }

  const service = await loadService(options);

  switch (options.command) {
    case 'replay':
      await runReplay(service, options);
      return;
    case 'backtest':
      await runBacktest(service, options, options.cutoff ?? todayIso());
      return;
  }

  await requireRatings(service);
  switch (options.command) {
    case 'show':
      runShow(service, options, options.competitor ?? '');
      break;
    case 'compare':
      runCompare(service, options, options.a ?? '', options.b ?? '');
      break;
    case 'predict':
      runPredict(service, options, options.a ?? '', options.b ?? '');
      break;
  }
}

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(chalk.red(`Error: ${error.message}`));
    console.error(chalk.gray('Run with --help for usage'));
  } else {
    log.error('Ratings CLI failed', { error: error instanceof Error ? error.message : String(error) });
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
});
