#!/usr/bin/env node
/**
 * manga-organizer CLI
 *
 * Sorts zip-packaged manga volumes from an inbox folder into the matching
 * series folders of a library.
 */

import './env.js';
import { Command, InvalidArgumentError } from 'commander';
import { runOrganizer, NoFolderSelectedError } from './app.js';
import type { RunOptions } from './app.js';
import { ConfigError, DEFAULT_CONFIG_PATH } from './services/config.service.js';
import { logger, logError } from './services/logger.service.js';

process.on('uncaughtException', (error) => {
  logError('process', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('process', reason);
  process.exit(1);
});

function parseConcurrency(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command()
  .name('manga-organizer')
  .description('Move manga volume archives into their series folders')
  .version('0.1.0')
  .option('-c, --config <path>', 'configuration file', process.env.ORGANIZER_CONFIG ?? DEFAULT_CONFIG_PATH)
  .option('-s, --source <dir>', 'folder to organize (skips the folder prompt)')
  .option('-j, --concurrency <n>', 'number of archives processed at once', parseConcurrency)
  .option('-y, --yes', 'accept the first candidate without asking')
  .option('--no-interactive', 'decline every candidate without asking');

interface CliOptions {
  config: string;
  source?: string;
  concurrency?: number;
  yes?: boolean;
  interactive: boolean;
}

async function main(): Promise<void> {
  program.parse();
  const opts = program.opts<CliOptions>();

  const runOptions: RunOptions = {
    configPath: opts.config,
    source: opts.source,
    concurrency: opts.concurrency,
    assumeYes: opts.yes,
    interactive: opts.interactive,
  };

  try {
    await runOrganizer(runOptions);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof NoFolderSelectedError) {
      logger.error(error.message);
    } else {
      logError('fatal', error);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logError('fatal', error);
  process.exitCode = 1;
});
