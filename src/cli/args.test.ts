import { describe, it, expect } from 'vitest';
import { parseArgs, UsageError } from './args.js';

describe('parseArgs', () => {
  it('shows help with no arguments', () => {
    expect(parseArgs([])).toEqual({ command: 'replay', rounds: 3, json: false, help: true });
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('parses a bare replay', () => {
    expect(parseArgs(['replay'])).toEqual({ command: 'replay', rounds: 3, json: false, help: false });
  });

  it('parses a full predict command', () => {
    const options = parseArgs([
      'predict', '--a', 'c-001', '--b', 'c-002', '-r', '5', '--date', '2024-06-01',
      '--weight-class', 'Lightweight', '--region', 'Brazil', '--json',
    ]);
    expect(options).toEqual({
      command: 'predict',
      a: 'c-001',
      b: 'c-002',
      rounds: 5,
      date: '2024-06-01',
      weightClass: 'Lightweight',
      region: 'Brazil',
      json: true,
      help: false,
    });
  });

  it('parses backtest and storage options', () => {
    const options = parseArgs([
      'backtest', '--cutoff', '2023-01-01', '-n', '25', '--records-dir', 'fixtures', '--ratings-file', 'out.json',
    ]);
    expect(options.cutoff).toBe('2023-01-01');
    expect(options.limit).toBe(25);
    expect(options.recordsDir).toBe('fixtures');
    expect(options.ratingsFile).toBe('out.json');
  });

  it('lets --help skip the required-option checks', () => {
    expect(parseArgs(['show', '--help']).help).toBe(true);
  });

  it.each([
    [['fight'], 'Unknown command: fight'],
    [['show'], 'show requires --competitor'],
    [['compare', '--a', 'x'], 'compare requires --a and --b'],
    [['predict', '--b', 'y'], 'predict requires --a and --b'],
    [['backtest'], 'backtest requires --cutoff'],
    [['show', '--competitor'], 'Missing value for --competitor'],
    [['show', '-c', '--json'], 'Missing value for -c'],
    [['predict', '--a', 'x', '--b', 'y', '--rounds', '4'], '--rounds must be 3 or 5, got "4"'],
    [['compare', '--a', 'x', '--b', 'y', '--date', '2024-13-01'], '--date must be an ISO date (YYYY-MM-DD), got "2024-13-01"'],
    [['backtest', '--cutoff', '2023-01-01', '--limit', '0'], '--limit must be a positive integer'],
    [['replay', '--verbose'], 'Unknown option: --verbose'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new UsageError(message));
  });
});
