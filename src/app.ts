/**
 * Organizer run: load configuration, choose the inbox, index the library and
 * move every archive. Collaborators are injectable so the run can be driven
 * without a terminal.
 */

import { loadConfig, DEFAULT_CONFIG_PATH } from './services/config.service.js';
import { buildSeriesIndex } from './services/series-index.service.js';
import { organizeDirectory } from './services/organizer.service.js';
import type { OrganizeSummary } from './services/organizer.service.js';
import {
  AutoConfirmationPrompt,
  ConsoleConfirmationPrompt,
} from './services/confirmation.service.js';
import type { ConfirmationPrompt } from './services/confirmation.service.js';
import { ConsoleFolderPicker, FixedFolderPicker } from './services/folder-picker.service.js';
import type { DirectoryPicker } from './services/folder-picker.service.js';
import { logger } from './services/logger.service.js';

export interface RunOptions {
  configPath?: string;
  /** Inbox folder; skips the picker */
  source?: string;
  concurrency?: number;
  /** Accept every candidate prompt */
  assumeYes?: boolean;
  /** false declines every candidate prompt */
  interactive?: boolean;
}

export interface AppDependencies {
  loadConfig: typeof loadConfig;
  buildSeriesIndex: typeof buildSeriesIndex;
  createPicker: (source?: string) => DirectoryPicker;
  createPrompt: (options: RunOptions) => ConfirmationPrompt;
}

/**
 * Raised when the user picks no usable folder.
 */
export class NoFolderSelectedError extends Error {
  constructor() {
    super('No folder selected. Exiting.');
    this.name = 'NoFolderSelectedError';
  }
}

export function createPrompt(options: RunOptions): ConfirmationPrompt {
  if (options.assumeYes) {
    return new AutoConfirmationPrompt(true);
  }
  if (options.interactive === false) {
    return new AutoConfirmationPrompt(false);
  }
  return new ConsoleConfirmationPrompt();
}

const defaultDependencies: AppDependencies = {
  loadConfig,
  buildSeriesIndex,
  createPicker: (source) => (source ? new FixedFolderPicker(source) : new ConsoleFolderPicker()),
  createPrompt,
};

export async function runOrganizer(
  options: RunOptions = {},
  deps: AppDependencies = defaultDependencies
): Promise<OrganizeSummary> {
  const config = deps.loadConfig(options.configPath ?? DEFAULT_CONFIG_PATH);

  const picker = deps.createPicker(options.source);
  const sourceDir = await picker.pick(config.sourceDirectory);
  if (!sourceDir) {
    throw new NoFolderSelectedError();
  }

  const index = await deps.buildSeriesIndex(config.destinationDirectory);

  const summary = await organizeDirectory(sourceDir, index, {
    prompt: deps.createPrompt(options),
    concurrency: options.concurrency ?? config.concurrency,
  });

  if (summary.errors.length > 0) {
    logger.warn({ errors: summary.errors.length }, `${summary.errors.length} archives failed with errors`);
  }
  logger.info({ ...summary, outcomes: undefined }, `Finished. Moved ${summary.moved} files.`);

  return summary;
}
