import { isIsoDate } from '../shared/utils/dates.js';

export const COMMANDS = ['replay', 'show', 'compare', 'predict', 'backtest'] as const;

export type Command = typeof COMMANDS[number];

export interface CLIOptions {
  command: Command;
  competitor?: string;
  a?: string;
  b?: string;
  rounds: 3 | 5;
  date?: string;
  cutoff?: string;
  limit?: number;
  weightClass?: string;
  region?: string;
  recordsDir?: string;
  ratingsFile?: string;
  json: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

function requireDate(value: string, flag: string): string {
  if (!isIsoDate(value)) {
    throw new UsageError(`${flag} must be an ISO date (YYYY-MM-DD), got "${value}"`);
  }
  return value;
}

/**
 * Parse `<command> [options]`. Throws UsageError on bad input.
 */
export function parseArgs(argv: string[]): CLIOptions {
  const args = [...argv];
  const first = args[0];

  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'replay', rounds: 3, json: false, help: true };
  }
  if (!isCommand(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }

  const options: CLIOptions = { command: first, rounds: 3, json: false, help: false };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--competitor':
      case '-c':
        options.competitor = requireValue(args, ++i, arg);
        break;

      case '--a':
        options.a = requireValue(args, ++i, arg);
        break;

      case '--b':
        options.b = requireValue(args, ++i, arg);
        break;

      case '--rounds':
      case '-r': {
        const rounds = requireValue(args, ++i, arg);
        if (rounds !== '3' && rounds !== '5') {
          throw new UsageError(`--rounds must be 3 or 5, got "${rounds}"`);
        }
        options.rounds = rounds === '5' ? 5 : 3;
        break;
      }

      case '--date':
      case '-d':
        options.date = requireDate(requireValue(args, ++i, arg), arg);
        break;

      case '--cutoff':
        options.cutoff = requireDate(requireValue(args, ++i, arg), arg);
        break;

      case '--limit':
      case '-n': {
        const limit = parseInt(requireValue(args, ++i, arg), 10);
        if (!Number.isInteger(limit) || limit < 1) {
          throw new UsageError(`${arg} must be a positive integer`);
        }
        options.limit = limit;
        break;
      }

      case '--weight-class':
        options.weightClass = requireValue(args, ++i, arg);
        break;

      case '--region':
        options.region = requireValue(args, ++i, arg);
        break;

      case '--records-dir':
        options.recordsDir = requireValue(args, ++i, arg);
        break;

      case '--ratings-file':
        options.ratingsFile = requireValue(args, ++i, arg);
        break;

      case '--json':
        options.json = true;
        break;

      case '--help':
      case '-h':
        options.help = true;
        break;

      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (options.help) return options;

  switch (options.command) {
    case 'show':
      if (!options.competitor) throw new UsageError('show requires --competitor');
      break;
    case 'compare':
    case 'predict':
      if (!options.a || !options.b) throw new UsageError(`${options.command} requires --a and --b`);
      break;
    case 'backtest':
      if (!options.cutoff) throw new UsageError('backtest requires --cutoff');
      break;
    case 'replay':
      break;
  }

  return options;
}

export const HELP_TEXT = `
Bout Forecast ratings CLI

Usage:
  npm run ratings -- <command> [options]

Commands:
  replay                          Rebuild ratings from the record store and save them
  show --competitor <id>          Print one competitor's flat rating record
  compare --a <id> --b <id>       Compare two competitors dimension by dimension
  predict --a <id> --b <id>       Predict a matchup
  backtest --cutoff <date>        Replay before the cutoff and score the following bouts

Options:
  --rounds, -r <3|5>        Scheduled rounds for predict (default: 3)
  --date, -d <date>         Decay-on-read date for compare/predict
  --limit, -n <n>           Bouts to score in backtest (default: 50)
  --weight-class <name>     Bout weight class for predict
  --region <region>         Bout region for predict
  --records-dir <dir>       Directory holding competitors.json and bouts.json
  --ratings-file <file>     Where ratings are stored
  --json                    Print raw JSON
  --help, -h                Show this help

Examples:
  npm run ratings -- replay
  npm run ratings -- predict --a c-001 --b c-002 --rounds 5 --date 2024-06-01
  npm run ratings -- backtest --cutoff 2023-01-01 --limit 100
`;
