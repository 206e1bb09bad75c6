/**
 * Filename Parser Service
 *
 * Splits a volume archive's file name into the series title and the
 * trailing volume designator, e.g. "Foo第1巻 (part 2)" -> "Foo" + "第1巻 (part 2)".
 */

import { basename, dirname, extname } from 'path';

// =============================================================================
// Types
// =============================================================================

export interface VolumeName {
  /** Series title, trimmed */
  title: string;
  /** Volume marker and everything after it, or '' when there is none */
  suffix: string;
}

export interface ArchiveReference extends VolumeName {
  path: string;
  directory: string;
  /** File name with extension */
  fileName: string;
  /** File name without extension */
  stem: string;
  extension: string;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * "<digits>巻", optionally preceded by "第", plus any trailing text.
 * Without "第" the digits may not continue a longer number or follow a bare "第".
 */
const VOLUME_NAME_PATTERN = /^(.+?)((?:第|(?<![\d第]))\d+巻.*)?$/s;

/**
 * Split a file stem into title and volume suffix.
 */
export function parseVolumeFilename(stem: string): VolumeName {
  const match = VOLUME_NAME_PATTERN.exec(stem);
  if (!match) {
    return { title: stem.trim(), suffix: '' };
  }

  return {
    title: (match[1] ?? stem).trim(),
    suffix: match[2] ?? '',
  };
}

/**
 * Describe an archive path and parse its name.
 */
export function parseArchivePath(path: string): ArchiveReference {
  const fileName = basename(path);
  const extension = extname(fileName);
  const stem = fileName.slice(0, fileName.length - extension.length);

  return {
    path,
    directory: dirname(path),
    fileName,
    stem,
    extension,
    ...parseVolumeFilename(stem),
  };
}
