#!/usr/bin/env node
/**
 * CLI entrypoint
 *
 * Usage:
 *   npx tsx src/run.ts fetch jira --months 6
 *   npx tsx src/run.ts fetch sonarqube --months 12 --verbose
 *   npx tsx src/run.ts plot jira
 */

import dotenv from 'dotenv';
import { HELP_TEXT, parseArgs } from './cli.js';
import type { CliArgs } from './cli.js';
import { loadConfig, loadRoster } from './config.js';
import type { AppConfig } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { runJiraFetch, runSonarQubeFetch } from './pipeline.js';
import { createPresenter } from './presenter.js';
import { runQualityReport, runWorklogReport } from './reports.js';
import { coveringWindow, formatDay, generateWindows } from './windows.js';
import type { Roster } from '../schemas/index.js';

async function fetchSource(args: CliArgs, config: AppConfig, roster: Roster, logger: Logger): Promise<void> {
  const windows = generateWindows(args.months);
  logger.info('fetch:start', {
    source: args.source,
    months: args.months,
    from: formatDay(windows[0].start),
    to: formatDay(windows[windows.length - 1].end),
  });

  if (args.source === 'jira') {
    await runJiraFetch({ config, people: roster.people, windows, logger });
  } else {
    await runSonarQubeFetch({ config, projects: roster.projects, window: coveringWindow(windows), logger });
  }
}

async function plotSource(args: CliArgs, config: AppConfig, roster: Roster, logger: Logger): Promise<void> {
  const presenter = createPresenter({ config, logger });
  const written =
    args.source === 'jira'
      ? await runWorklogReport(config, presenter, logger)
      : await runQualityReport(config, roster.projects, presenter, logger);
  logger.info('plot:done', { source: args.source, charts: written });
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(HELP_TEXT);
    process.exit(1);
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  dotenv.config();
  const logger = createLogger(args.verbose ? 'debug' : 'info');
  const config = loadConfig();
  const roster = await loadRoster(args.roster);

  if (args.command === 'fetch') {
    await fetchSource(args, config, roster, logger);
  } else {
    await plotSource(args, config, roster, logger);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
