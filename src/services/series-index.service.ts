/**
 * Series Index Service
 *
 * Maps canonical series titles to their folders in the destination library.
 * Folder names look like "あ) [Author] Series Title"; the reading-index prefix
 * and author block are dropped to get the title.
 *
 * The index is built once per run and only read afterwards.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';
import { createServiceLogger } from './logger.service.js';

const logger = createServiceLogger('series-index');

// =============================================================================
// Types
// =============================================================================

/** Canonical title -> destination folder path */
export type SeriesIndex = ReadonlyMap<string, string>;

export interface SeriesEntry {
  title: string;
  folderPath: string;
}

// =============================================================================
// Name Cleaning
// =============================================================================

const FOLDER_PREFIX_PATTERN = /^.*\)\s\[.*\]/;

/**
 * Canonical title of a series folder name.
 * "あ) [作者] タイトル" -> "タイトル"; names without the prefix are only trimmed.
 */
export function cleanSeriesFolderName(folderName: string): string {
  return folderName.replace(FOLDER_PREFIX_PATTERN, '').trim();
}

// =============================================================================
// Building
// =============================================================================

/**
 * Create an index from explicit entries. Later entries with the same title
 * replace the folder of earlier ones.
 */
export function createSeriesIndex(entries: Iterable<readonly [string, string]>): SeriesIndex {
  return new Map(entries);
}

/**
 * Walk every directory below `rootDir`, depth first, siblings in code-point order.
 */
async function* walkDirectories(rootDir: string): AsyncGenerator<{ name: string; path: string }> {
  const entries = await readdir(rootDir, { withFileTypes: true });
  const directories = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const name of directories) {
    const path = join(rootDir, name);
    yield { name, path };
    yield* walkDirectories(path);
  }
}

/**
 * List every folder below the destination as a series entry.
 */
export async function scanSeriesFolders(destinationDir: string): Promise<SeriesEntry[]> {
  const entries: SeriesEntry[] = [];
  for await (const directory of walkDirectories(destinationDir)) {
    entries.push({ title: cleanSeriesFolderName(directory.name), folderPath: directory.path });
  }
  return entries;
}

/**
 * Build the index from a full recursive scan of the destination tree.
 */
export async function buildSeriesIndex(destinationDir: string): Promise<SeriesIndex> {
  const entries = await scanSeriesFolders(destinationDir);
  const index = createSeriesIndex(entries.map((entry) => [entry.title, entry.folderPath] as const));

  if (index.size < entries.length) {
    logger.debug(
      { folders: entries.length, titles: index.size },
      'Some folders share a title; the last one scanned wins'
    );
  }
  logger.info({ destinationDir, titles: index.size }, `Indexed ${index.size} series folders`);

  return index;
}

// =============================================================================
// Lookup
// =============================================================================

/**
 * Folder for a title that equals an index key, or null.
 */
export function findExactMatch(index: SeriesIndex, title: string): string | null {
  return index.get(title) ?? null;
}

/**
 * Every index key containing `title`, in index order.
 */
export function findCandidates(index: SeriesIndex, title: string): string[] {
  const candidates: string[] = [];
  for (const key of index.keys()) {
    if (key.includes(title)) {
      candidates.push(key);
    }
  }
  return candidates;
}
