/**
 * Configuration Service
 *
 * Loads the organizer configuration from a YAML file (./config.yaml by default).
 * The file names the destination library and, optionally, the inbox folder
 * that the folder picker offers first.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { configLogger as logger } from './logger.service.js';

// =============================================================================
// Type Definitions
// =============================================================================

export const DEFAULT_CONFIG_PATH = './config.yaml';

export const OrganizerConfigSchema = z.object({
  destination_directory: z.string().min(1, 'destination_directory is required'),
  source_directory: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
});

export interface OrganizerConfig {
  /** Absolute path of the series folder tree */
  destinationDirectory: string;
  /** Absolute path offered first by the folder picker */
  sourceDirectory?: string;
  /** Worker count override */
  concurrency?: number;
}

/**
 * Error raised for any configuration problem. Always fatal to the run.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Loading
// =============================================================================

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      return `${path} ${issue.message}`;
    })
    .join('; ');
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Parse and validate configuration text.
 *
 * @throws ConfigError when the YAML is malformed or does not match the schema
 */
export function parseConfig(content: string, baseDir: string = process.cwd()): OrganizerConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Error reading config: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = OrganizerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Error reading config: ${formatZodError(result.error)}`);
  }

  const { destination_directory, source_directory, concurrency } = result.data;
  return {
    destinationDirectory: resolve(baseDir, destination_directory),
    sourceDirectory: source_directory !== undefined ? resolve(baseDir, source_directory) : undefined,
    concurrency,
  };
}

/**
 * Load configuration from disk and check that the destination exists.
 * Relative paths inside the file resolve against the working directory.
 *
 * @throws ConfigError if the file is missing, malformed, or names a missing destination
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): OrganizerConfig {
  const absolutePath = resolve(process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`${configPath} not found.`);
  }

  const content = readFileSync(absolutePath, 'utf-8');
  const config = parseConfig(content);

  if (!isDirectory(config.destinationDirectory)) {
    throw new ConfigError(
      `'destination_directory' not found: ${config.destinationDirectory}`
    );
  }

  logger.debug({ path: absolutePath, ...config }, 'Configuration loaded');
  return config;
}
