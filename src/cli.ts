/**
 * Command-line argument parsing
 */

import { InvalidArgumentError } from './errors.js';
import type { Source } from '../schemas/index.js';

export type Command = 'fetch' | 'plot';

export interface CliArgs {
  command: Command;
  source: Source;
  months: number;
  verbose: boolean;
  roster: string;
  help: boolean;
}

/** Trailing months fetched when --months is not given */
export const DEFAULT_MONTHS: Record<Source, number> = {
  jira: 6,
  sonarqube: 12,
};

export const DEFAULT_ROSTER_PATH = './roster.json';

const COMMANDS: readonly Command[] = ['fetch', 'plot'];
const SOURCES: readonly Source[] = ['jira', 'sonarqube'];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isSource(value: string | undefined): value is Source {
  return SOURCES.some((source) => source === value);
}

/**
 * Parse CLI arguments
 *
 * @throws InvalidArgumentError for unknown commands, sources or flags and for
 *         a --months value below 1
 */
export function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  let months: number | undefined;
  let verbose = false;
  let help = false;
  let roster = DEFAULT_ROSTER_PATH;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '-m':
      case '--months':
        if (nextArg === undefined || !/^-?\d+$/.test(nextArg)) {
          throw new InvalidArgumentError(`${arg} expects an integer, got ${nextArg ?? 'nothing'}`);
        }
        months = Number.parseInt(nextArg, 10);
        i++;
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '--config':
        if (nextArg === undefined) {
          throw new InvalidArgumentError('--config expects a path');
        }
        roster = nextArg;
        i++;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new InvalidArgumentError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [command = 'fetch', source] = positional;

  if (help) {
    return { command: 'fetch', source: 'jira', months: DEFAULT_MONTHS.jira, verbose, roster, help };
  }

  if (!isCommand(command)) {
    throw new InvalidArgumentError(`Unknown command: ${command} (expected ${COMMANDS.join(' or ')})`);
  }
  if (!isSource(source)) {
    throw new InvalidArgumentError(`Unknown or missing source: ${source ?? 'none'} (expected ${SOURCES.join(' or ')})`);
  }

  const resolvedMonths = months ?? DEFAULT_MONTHS[source];
  if (resolvedMonths < 1) {
    throw new InvalidArgumentError('The --months argument must be a positive integer.');
  }

  return { command, source, months: resolvedMonths, verbose, roster, help };
}

export const HELP_TEXT = `
Worklog Metrics CLI

Usage:
  npx tsx src/run.ts <command> <source> [options]

Commands:
  fetch                Query the source and persist flat records under DATA_DIR
  plot                 Aggregate persisted records into charts under PLOT_DIR

Sources:
  jira                 Work logs per person and calendar month
  sonarqube            Measures, metric history and open issues per project

Options:
  -m, --months <n>     Trailing months to cover (default: 6 for jira, 12 for sonarqube)
  -v, --verbose        Enable debug logging
  --config <path>      Roster file with people and projects (default: ./roster.json)
  -h, --help           Show this help message

Examples:
  npx tsx src/run.ts fetch jira --months 3
  npx tsx src/run.ts plot sonarqube -v
`;
