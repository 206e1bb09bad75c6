/**
 * Folder Picker Service
 *
 * Chooses the inbox folder to organize. The terminal picker offers the
 * configured source folder as the default answer.
 */

import * as readline from 'readline/promises';
import { stat } from 'fs/promises';
import { resolve } from 'path';
import { promptLogger as logger } from './logger.service.js';

export interface DirectoryPicker {
  /** Resolves to the chosen directory, or null when nothing usable was chosen */
  pick(initialDir?: string): Promise<string | null>;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check a picked path and normalize it. Empty answers fall back to `initialDir`.
 */
export async function validatePickedDirectory(answer: string, initialDir?: string): Promise<string | null> {
  const trimmed = answer.trim();
  const chosen = trimmed.length > 0 ? trimmed : initialDir;

  if (!chosen) {
    return null;
  }

  const absolute = resolve(chosen);
  if (!(await isDirectory(absolute))) {
    logger.warn({ path: absolute }, `Not a folder: ${absolute}`);
    return null;
  }

  return absolute;
}

/**
 * Asks for a folder on the terminal.
 */
export class ConsoleFolderPicker implements DirectoryPicker {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async pick(initialDir?: string): Promise<string | null> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      const hint = initialDir ? ` [${initialDir}]` : '';
      const answer = await rl.question(`Folder to organize${hint}: `);
      return await validatePickedDirectory(answer, initialDir);
    } finally {
      rl.close();
    }
  }
}

/**
 * Returns a fixed folder, used when the folder is given on the command line.
 */
export class FixedFolderPicker implements DirectoryPicker {
  constructor(private readonly directory: string) {}

  pick(): Promise<string | null> {
    return validatePickedDirectory(this.directory);
  }
}
