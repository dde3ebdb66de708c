import { describe, it, expect } from 'vitest';
import { DEFAULT_ROSTER_PATH, parseArgs } from '../src/cli.js';
import { InvalidArgumentError } from '../src/errors.js';

describe('parseArgs', () => {
  it('should use the per-source default month count', () => {
    expect(parseArgs(['fetch', 'jira'])).toEqual({
      command: 'fetch',
      source: 'jira',
      months: 6,
      verbose: false,
      roster: DEFAULT_ROSTER_PATH,
      help: false,
    });
    expect(parseArgs(['fetch', 'sonarqube']).months).toBe(12);
  });

  it('should parse months, verbosity and the roster path', () => {
    expect(parseArgs(['plot', 'sonarqube', '-m', '3', '--verbose', '--config', 'people.json'])).toEqual({
      command: 'plot',
      source: 'sonarqube',
      months: 3,
      verbose: true,
      roster: 'people.json',
      help: false,
    });
  });

  it('should reject a month count below 1', () => {
    expect(() => parseArgs(['fetch', 'jira', '--months', '0'])).toThrow(
      'The --months argument must be a positive integer.'
    );
    expect(() => parseArgs(['fetch', 'jira', '--months', '-2'])).toThrow(InvalidArgumentError);
  });

  it('should reject non-integer month counts', () => {
    expect(() => parseArgs(['fetch', 'jira', '--months', 'six'])).toThrow(InvalidArgumentError);
    expect(() => parseArgs(['fetch', 'jira', '--months'])).toThrow(InvalidArgumentError);
  });

  it('should reject unknown commands, sources and options', () => {
    expect(() => parseArgs(['sync', 'jira'])).toThrow('Unknown command: sync');
    expect(() => parseArgs(['fetch'])).toThrow('Unknown or missing source');
    expect(() => parseArgs(['fetch', 'jira', '--force'])).toThrow('Unknown option: --force');
  });

  it('should short-circuit on --help', () => {
    expect(parseArgs(['--help']).help).toBe(true);
    expect(parseArgs(['sync', '-h']).help).toBe(true);
  });
});
