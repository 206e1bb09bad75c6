/**
 * Archive Service
 *
 * Rewrites the top-level folder recorded inside a zip archive.
 * Volume archives usually hold a single folder named after the file
 * ("Title第1巻/001.jpg"); after the file is renamed the folder is renamed to match.
 *
 * The source archive is never modified in place: a new archive is written to a
 * temporary file beside it and renamed over it only once it is complete.
 */

import JSZip from 'jszip';
import * as yauzl from 'yauzl';
import { readFile, writeFile, rename, rm } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { randomUUID } from 'crypto';
import { archiveLogger as logger } from './logger.service.js';

// =============================================================================
// Types
// =============================================================================

type JSZipObject = JSZip.JSZipObject;

type CompressionMethod = 'STORE' | 'DEFLATE';

/** ZIP method ids JSZip can write */
const COMPRESSION_METHODS: ReadonlyMap<number, CompressionMethod> = new Map([
  [0, 'STORE'],
  [8, 'DEFLATE'],
]);

/** Info-ZIP Unicode Path extra field */
const UNICODE_PATH_FIELD = 0x7075;

export interface ArchiveFolderRenameResult {
  success: boolean;
  archivePath: string;
  newName: string;
  /** Distinct top-level folder names found before the rename */
  previousNames: string[];
  error?: string;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Replace the first segment of an entry path.
 * Entries at the archive root ("ComicInfo.xml") have no folder and are kept.
 */
export function replaceTopLevelFolder(entryPath: string, newName: string): string {
  const separator = entryPath.indexOf('/');
  if (separator === -1) {
    return entryPath;
  }
  return newName + entryPath.slice(separator);
}

/**
 * First path segment of an entry, or null for root-level files.
 */
export function getTopLevelFolder(entryPath: string): string | null {
  const separator = entryPath.indexOf('/');
  return separator === -1 ? null : entryPath.slice(0, separator);
}

/**
 * Temporary file path in the same directory as the archive.
 */
function getTempArchivePath(archivePath: string): string {
  const stem = basename(archivePath, extname(archivePath));
  return join(dirname(archivePath), `.${stem}.${randomUUID()}.tmp`);
}

function collectEntries(zip: JSZip): JSZipObject[] {
  const entries: JSZipObject[] = [];
  zip.forEach((_relativePath, entry) => {
    entries.push(entry);
  });
  return entries;
}

/**
 * Copy one entry into the target archive under a new name, keeping its metadata.
 */
async function copyEntry(
  target: JSZip,
  entry: JSZipObject,
  newPath: string,
  compression: CompressionMethod
): Promise<void> {
  const options = {
    date: entry.date,
    comment: entry.comment || undefined,
    unixPermissions: entry.unixPermissions,
    dosPermissions: entry.dosPermissions,
    createFolders: false,
  };

  if (entry.dir) {
    target.file(newPath, null, { ...options, dir: true });
    return;
  }

  const data = await entry.async('uint8array');
  target.file(newPath, data, {
    ...options,
    binary: true,
    compression,
  });
}

/**
 * Entry name as JSZip decodes it: the Unicode Path field when present,
 * otherwise the raw name bytes as UTF-8.
 */
function decodeEntryName(entry: yauzl.Entry): string {
  const unicodePath = entry.extraFields.find((field) => field.id === UNICODE_PATH_FIELD);
  if (unicodePath && unicodePath.data.length > 5 && unicodePath.data[0] === 1) {
    return unicodePath.data.subarray(5).toString('utf8');
  }

  const raw: unknown = entry.fileName;
  return Buffer.isBuffer(raw) ? raw.toString('utf8') : String(raw);
}

/**
 * Read the compression method of every entry from the central directory.
 * JSZip does not expose it for loaded entries.
 *
 * @throws when an entry uses a method other than STORE or DEFLATE
 */
export function readCompressionMethods(buffer: Buffer): Promise<Map<string, CompressionMethod>> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(buffer, { lazyEntries: true, decodeStrings: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error('Failed to read zip central directory'));
        return;
      }

      const methods = new Map<string, CompressionMethod>();

      zipfile.on('entry', (entry: yauzl.Entry) => {
        const name = decodeEntryName(entry);
        const method = COMPRESSION_METHODS.get(entry.compressionMethod);
        if (method === undefined) {
          zipfile.close();
          reject(new Error(`Unsupported compression method ${entry.compressionMethod} for ${name}`));
          return;
        }
        methods.set(name, method);
        zipfile.readEntry();
      });

      zipfile.on('end', () => {
        resolve(methods);
      });

      zipfile.on('error', (error: Error) => {
        reject(error);
      });

      zipfile.readEntry();
    });
  });
}

function methodFor(methods: ReadonlyMap<string, CompressionMethod>, entryName: string): CompressionMethod {
  // JSZip adds the trailing slash to directories stored without one
  return methods.get(entryName) ?? methods.get(entryName.replace(/\/$/, '')) ?? 'DEFLATE';
}

// =============================================================================
// Listing
// =============================================================================

/**
 * List the entry paths of a zip archive, in archive order.
 */
export async function listArchiveEntries(archivePath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await readFile(archivePath));
  return collectEntries(zip).map((entry) => entry.name);
}

// =============================================================================
// Folder Rename
// =============================================================================

/**
 * Rename the top-level folder inside a zip archive.
 *
 * Every entry whose path has a folder component gets its first segment
 * replaced with `newName`, whatever that segment was. On any failure the
 * temporary archive is removed and the original is left as it was.
 */
export async function renameArchiveRootFolder(
  archivePath: string,
  newName: string
): Promise<ArchiveFolderRenameResult> {
  const tempPath = getTempArchivePath(archivePath);
  const previousNames = new Set<string>();

  try {
    const buffer = await readFile(archivePath);
    const source = await JSZip.loadAsync(buffer);
    const methods = await readCompressionMethods(buffer);
    const target = new JSZip();
    const entries = collectEntries(source);

    for (const entry of entries) {
      const folder = getTopLevelFolder(entry.name);
      if (folder !== null) {
        previousNames.add(folder);
      }
      await copyEntry(target, entry, replaceTopLevelFolder(entry.name, newName), methodFor(methods, entry.name));
    }

    if (previousNames.size > 1) {
      logger.warn(
        { archivePath, folders: [...previousNames] },
        'Archive has several top-level folders; all of them are renamed'
      );
    }

    const usesUnixAttributes = entries.some((entry) => entry.unixPermissions !== null);
    const output = await target.generateAsync({
      type: 'nodebuffer',
      platform: usesUnixAttributes ? 'UNIX' : 'DOS',
    });

    await writeFile(tempPath, output, { flag: 'wx' });
    await rename(tempPath, archivePath);

    logger.debug({ archivePath, newName, entries: entries.length }, 'Renamed folder inside archive');

    return {
      success: true,
      archivePath,
      newName,
      previousNames: [...previousNames],
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ archivePath, error: errorMessage }, `Error renaming folder in archive ${archivePath}`);

    await rm(tempPath, { force: true });

    return {
      success: false,
      archivePath,
      newName,
      previousNames: [...previousNames],
      error: errorMessage,
    };
  }
}
