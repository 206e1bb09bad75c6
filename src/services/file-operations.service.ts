/**
 * File Operations Service
 *
 * Filesystem primitives for relocating archives: existence checks, a move
 * that refuses to overwrite, and a rename scope that restores the original
 * name unless it is committed.
 */

import { rename, unlink, link, copyFile, access, rm, constants } from 'fs/promises';
import { createServiceLogger } from './logger.service.js';

const logger = createServiceLogger('file-operations');

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when a move or rename would replace an existing file.
 */
export class DestinationExistsError extends Error {
  constructor(public readonly destination: string) {
    super(`Destination file already exists: ${destination}`);
    this.name = 'DestinationExistsError';
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check if a file exists.
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// =============================================================================
// File Operations
// =============================================================================

/**
 * Move a file, across devices if needed, without overwriting the destination.
 *
 * Same-device moves are a rename after an existence check. Cross-device moves
 * copy with exclusive create, so a destination that appeared in the meantime
 * fails the copy instead of being replaced.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  if (await fileExists(destination)) {
    throw new DestinationExistsError(destination);
  }

  try {
    await rename(source, destination);
    return;
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
  }

  logger.debug({ source, destination }, 'Cross-device move, copying');

  try {
    await copyFile(source, destination, constants.COPYFILE_EXCL);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new DestinationExistsError(destination);
    }
    await rm(destination, { force: true });
    throw error;
  }

  try {
    await unlink(source);
  } catch (error) {
    // Keep exactly one copy: the source stays where it was
    await rm(destination, { force: true });
    throw error;
  }
}

/** Filesystems without hard links (FAT, exFAT, some network shares) */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS']);

/**
 * Rename a file in place without overwriting another file.
 *
 * Links the new name first, which fails atomically when it is taken, then
 * drops the old name. Where hard links are unsupported it falls back to a
 * check followed by a rename.
 */
export async function renameFile(source: string, destination: string): Promise<void> {
  try {
    await link(source, destination);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new DestinationExistsError(destination);
    }
    if (!isErrnoException(error) || !LINK_UNSUPPORTED.has(error.code ?? '')) {
      throw error;
    }

    logger.debug({ source, destination, code: error.code }, 'Hard links unsupported, renaming directly');
    if (await fileExists(destination)) {
      throw new DestinationExistsError(destination);
    }
    await rename(source, destination);
    return;
  }

  try {
    await unlink(source);
  } catch (error) {
    await unlink(destination);
    throw error;
  }
}

// =============================================================================
// Rename Scope
// =============================================================================

/**
 * A rename that is undone unless committed.
 */
export class RenameScope {
  private committed = false;
  private restored = false;
  private undoActions: Array<() => Promise<void>> = [];

  private constructor(
    readonly originalPath: string,
    readonly currentPath: string
  ) {}

  /**
   * Rename `source` to `target` and remember the original path.
   */
  static async open(source: string, target: string): Promise<RenameScope> {
    await renameFile(source, target);
    return new RenameScope(source, target);
  }

  get isActive(): boolean {
    return !this.committed && !this.restored;
  }

  /**
   * Register extra work to undo before the name is restored.
   * Actions run newest first; a failing action is logged and skipped.
   */
  onRollback(action: () => Promise<void>): void {
    this.undoActions.unshift(action);
  }

  /**
   * Keep the new name. Later rollbacks do nothing.
   */
  commit(): void {
    this.committed = true;
  }

  /**
   * Put the file back under its original name. Runs at most once.
   * Returns false when there was nothing to restore.
   */
  async rollback(): Promise<boolean> {
    if (!this.isActive) {
      return false;
    }
    this.restored = true;

    for (const action of this.undoActions) {
      try {
        await action();
      } catch (error) {
        logger.warn(
          { currentPath: this.currentPath, error: error instanceof Error ? error.message : String(error) },
          'Undo action failed during rollback'
        );
      }
    }

    if (!(await fileExists(this.currentPath))) {
      logger.warn(
        { originalPath: this.originalPath, currentPath: this.currentPath },
        'Renamed file is gone, nothing to restore'
      );
      return false;
    }

    await renameFile(this.currentPath, this.originalPath);
    logger.debug({ originalPath: this.originalPath }, 'Restored original file name');
    return true;
  }
}

/**
 * Rename `source` to `target`, run `fn`, and restore the original name on
 * every exit where `fn` did not commit the scope, including thrown errors.
 */
export async function withRenameScope<T>(
  source: string,
  target: string,
  fn: (scope: RenameScope) => Promise<T>
): Promise<T> {
  const scope = await RenameScope.open(source, target);
  try {
    return await fn(scope);
  } finally {
    if (scope.isActive) {
      await scope.rollback();
    }
  }
}
