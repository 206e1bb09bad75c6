/**
 * Organizer Service
 *
 * Moves volume archives from an inbox folder into the series folder tree.
 *
 * Per archive:
 * 1. Parse the file name into title + volume suffix
 * 2. Exact title match -> move under the original name
 * 3. Otherwise ask about substring candidates; on acceptance rename the file
 *    (and the folder inside it) to the series title, then move it
 * 4. Never overwrite an existing file; undo the rename if the move cannot happen
 */

import { readdir } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { parseArchivePath } from './filename-parser.service.js';
import type { ArchiveReference } from './filename-parser.service.js';
import { findCandidates, findExactMatch } from './series-index.service.js';
import type { SeriesIndex } from './series-index.service.js';
import { renameArchiveRootFolder } from './archive.service.js';
import { resolveCandidate } from './confirmation.service.js';
import type { ConfirmationPrompt } from './confirmation.service.js';
import { DestinationExistsError, fileExists, moveFile, withRenameScope } from './file-operations.service.js';
import type { RenameScope } from './file-operations.service.js';
import { parallelMap } from './parallel.service.js';
import { logError, organizerLogger as logger } from './logger.service.js';

// =============================================================================
// Types
// =============================================================================

export type MoveStatus = 'moved' | 'skipped-exists' | 'rename-failed' | 'declined' | 'no-match';

export interface MoveOutcome {
  status: MoveStatus;
  /** True only for 'moved' */
  moved: boolean;
  /** Archive path before processing */
  source: string;
  /** Final path when moved, or the occupied path when skipped */
  destination?: string;
  /** File name the archive ended up with (or would have had) */
  finalName?: string;
  /** Non-fatal problem, e.g. the folder inside the archive could not be renamed */
  warning?: string;
}

export interface OrganizeOptions {
  prompt: ConfirmationPrompt;
}

export interface OrganizeDirectoryOptions extends OrganizeOptions {
  concurrency?: number;
}

export interface OrganizeSummary {
  total: number;
  moved: number;
  skipped: number;
  declined: number;
  noMatch: number;
  renameFailed: number;
  errors: Array<{ path: string; error: string }>;
  outcomes: MoveOutcome[];
}

function outcome(status: MoveStatus, source: string, extra: Omit<MoveOutcome, 'status' | 'moved' | 'source'> = {}): MoveOutcome {
  return { status, moved: status === 'moved', source, ...extra };
}

// =============================================================================
// Single Archive
// =============================================================================

async function moveExactMatch(archive: ArchiveReference, folderPath: string): Promise<MoveOutcome> {
  const destination = join(folderPath, archive.fileName);

  if (await fileExists(destination)) {
    return outcome('skipped-exists', archive.path, { destination, finalName: archive.fileName });
  }

  try {
    await moveFile(archive.path, destination);
  } catch (error) {
    if (error instanceof DestinationExistsError) {
      return outcome('skipped-exists', archive.path, { destination, finalName: archive.fileName });
    }
    throw error;
  }

  return outcome('moved', archive.path, { destination, finalName: archive.fileName });
}

/**
 * Rename the folder inside the archive and register its undo on the scope.
 * Returns a warning message on failure; the move goes ahead either way.
 */
async function renameInnerFolder(scope: RenameScope, folderName: string): Promise<string | undefined> {
  const result = await renameArchiveRootFolder(scope.currentPath, folderName);

  if (!result.success) {
    return `Failed to rename folder inside ${basename(scope.currentPath)}: ${result.error ?? 'unknown error'}`;
  }

  const [previousName] = result.previousNames;
  if (result.previousNames.length === 1 && previousName !== undefined && previousName !== folderName) {
    scope.onRollback(async () => {
      const undo = await renameArchiveRootFolder(scope.currentPath, previousName);
      if (!undo.success) {
        throw new Error(undo.error ?? `could not restore folder '${previousName}'`);
      }
    });
  }

  return undefined;
}

async function moveCandidateMatch(
  archive: ArchiveReference,
  seriesTitle: string,
  folderPath: string
): Promise<MoveOutcome> {
  const finalName = `${seriesTitle}${archive.suffix}${archive.extension}`;
  const renamedPath = join(archive.directory, finalName);
  const destination = join(folderPath, finalName);

  if (await fileExists(destination)) {
    return outcome('skipped-exists', archive.path, { destination, finalName });
  }

  const renameConflict = (): MoveOutcome =>
    outcome('rename-failed', archive.path, {
      finalName,
      warning: `Another file named ${finalName} is already in ${archive.directory}`,
    });

  if (renamedPath !== archive.path && (await fileExists(renamedPath))) {
    return renameConflict();
  }

  try {
    return await renameAndMove(archive, seriesTitle, renamedPath, destination, finalName);
  } catch (error) {
    // Another worker took the new name between the check and the rename
    if (error instanceof DestinationExistsError && error.destination === renamedPath) {
      return renameConflict();
    }
    throw error;
  }
}

async function renameAndMove(
  archive: ArchiveReference,
  seriesTitle: string,
  renamedPath: string,
  destination: string,
  finalName: string
): Promise<MoveOutcome> {
  return withRenameScope(archive.path, renamedPath, async (scope) => {
    const warning = await renameInnerFolder(scope, `${seriesTitle}${archive.suffix}`);
    if (warning) {
      logger.warn({ archive: renamedPath }, `Warning: ${warning}`);
    }

    try {
      await moveFile(renamedPath, destination);
    } catch (error) {
      if (error instanceof DestinationExistsError) {
        return outcome('skipped-exists', archive.path, { destination, finalName, warning });
      }
      throw error;
    }

    scope.commit();
    return outcome('moved', archive.path, { destination, finalName, warning });
  });
}

/**
 * Classify and move a single archive. The index is only read.
 *
 * Only 'moved' changes anything on disk; every other outcome leaves the
 * archive at its original path under its original name.
 */
export async function organizeArchive(
  archivePath: string,
  index: SeriesIndex,
  options: OrganizeOptions
): Promise<MoveOutcome> {
  const archive = parseArchivePath(archivePath);

  const exactFolder = findExactMatch(index, archive.title);
  if (exactFolder !== null) {
    return moveExactMatch(archive, exactFolder);
  }

  const candidates = findCandidates(index, archive.title);
  if (candidates.length === 0) {
    return outcome('no-match', archive.path);
  }

  const selected = await resolveCandidate(
    { title: archive.title, candidates, fileName: archive.fileName },
    options.prompt
  );
  if (selected === null) {
    return outcome('declined', archive.path);
  }

  const folderPath = findExactMatch(index, selected);
  if (folderPath === null) {
    return outcome('no-match', archive.path);
  }

  return moveCandidateMatch(archive, selected, folderPath);
}

// =============================================================================
// Whole Inbox
// =============================================================================

/**
 * Zip files directly inside `sourceDir`, sorted by name.
 */
export async function listSourceArchives(sourceDir: string): Promise<string[]> {
  const entries = await readdir(sourceDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.zip'))
    .map((entry) => join(sourceDir, entry.name))
    .sort();
}

function logOutcome(result: MoveOutcome): void {
  const name = basename(result.source);
  const folder = result.destination ? basename(dirname(result.destination)) : undefined;

  switch (result.status) {
    case 'moved':
      if (result.finalName && result.finalName !== name) {
        logger.info(result, `Moved and renamed ${name} to ${result.finalName} into ${folder}`);
      } else {
        logger.info(result, `Moved ${name} into ${folder}`);
      }
      break;
    case 'skipped-exists':
      logger.info(result, `File ${result.finalName ?? name} already exists. Skipping.`);
      break;
    case 'rename-failed':
      logger.warn(result, `Could not rename ${name}: ${result.warning ?? 'unknown error'}`);
      break;
    case 'declined':
      logger.info(result, `Skipped ${name}: move declined`);
      break;
    case 'no-match':
      logger.info(result, `No matching series for ${name}`);
      break;
  }
}

/**
 * Organize every zip archive in `sourceDir` through a bounded worker pool.
 * An error in one archive is reported for that archive only.
 */
export async function organizeDirectory(
  sourceDir: string,
  index: SeriesIndex,
  options: OrganizeDirectoryOptions
): Promise<OrganizeSummary> {
  const archives = await listSourceArchives(sourceDir);

  logger.info({ sourceDir, archives: archives.length }, `Found ${archives.length} zip files in ${sourceDir}`);

  const results = await parallelMap(
    archives,
    async (archivePath) => {
      const result = await organizeArchive(archivePath, index, options);
      logOutcome(result);
      return result;
    },
    {
      concurrency: options.concurrency,
      onProgress: (completed, total) => {
        logger.debug({ completed, total }, `Processed ${completed}/${total}`);
      },
    }
  );

  const summary: OrganizeSummary = {
    total: archives.length,
    moved: 0,
    skipped: 0,
    declined: 0,
    noMatch: 0,
    renameFailed: 0,
    errors: [],
    outcomes: [],
  };

  for (const item of results) {
    const archivePath = archives[item.index] ?? '';

    if (!item.success || item.result === undefined) {
      const error = item.error ?? 'unknown error';
      summary.errors.push({ path: archivePath, error });
      logError('organizer', error, { archive: archivePath });
      continue;
    }

    summary.outcomes.push(item.result);
    switch (item.result.status) {
      case 'moved':
        summary.moved++;
        break;
      case 'skipped-exists':
        summary.skipped++;
        break;
      case 'declined':
        summary.declined++;
        break;
      case 'no-match':
        summary.noMatch++;
        break;
      case 'rename-failed':
        summary.renameFailed++;
        break;
    }
  }

  return summary;
}
