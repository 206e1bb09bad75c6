/**
 * Series Index Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  cleanSeriesFolderName,
  createSeriesIndex,
  buildSeriesIndex,
  scanSeriesFolders,
  findExactMatch,
  findCandidates,
} from '../series-index.service.js';
import { createTestWorkspace } from './__fixtures__/test-archive-helpers.js';
import type { TestWorkspace } from './__fixtures__/test-archive-helpers.js';

describe('Series Index Service', () => {
  // ===========================================================================
  // cleanSeriesFolderName
  // ===========================================================================

  describe('cleanSeriesFolderName', () => {
    it('should strip the reading prefix and author block', () => {
      expect(cleanSeriesFolderName('あ) [作者x作者2] てすとフォルダ1')).toBe('てすとフォルダ1');
    });

    it('should use names without the prefix as they are, trimmed', () => {
      expect(cleanSeriesFolderName('  FooBar ')).toBe('FooBar');
    });

    it('should strip up to the last author block', () => {
      expect(cleanSeriesFolderName('か) [A] [B] Title')).toBe('Title');
    });

    it('should keep a name with brackets but no marker', () => {
      expect(cleanSeriesFolderName('[Author] Title')).toBe('[Author] Title');
    });
  });

  // ===========================================================================
  // Lookup
  // ===========================================================================

  describe('lookup', () => {
    const index = createSeriesIndex([
      ['てすとフォルダ1', '/dest/1'],
      ['てすとフォルダ2', '/dest/2'],
      ['FooBar', '/dest/foobar'],
    ]);

    it('should find exact matches', () => {
      expect(findExactMatch(index, 'FooBar')).toBe('/dest/foobar');
    });

    it('should return null when there is no exact match', () => {
      expect(findExactMatch(index, 'Foo')).toBeNull();
    });

    it('should list substring candidates in index order', () => {
      expect(findCandidates(index, 'てすと')).toEqual(['てすとフォルダ1', 'てすとフォルダ2']);
    });

    it('should return an empty list when nothing contains the title', () => {
      expect(findCandidates(index, '完全に違う名前')).toEqual([]);
    });

    it('should let later entries replace the folder of an earlier title', () => {
      const duplicated = createSeriesIndex([
        ['Same', '/a'],
        ['Other', '/b'],
        ['Same', '/c'],
      ]);
      expect(findExactMatch(duplicated, 'Same')).toBe('/c');
      expect([...duplicated.keys()]).toEqual(['Same', 'Other']);
    });
  });

  // ===========================================================================
  // buildSeriesIndex
  // ===========================================================================

  describe('buildSeriesIndex', () => {
    let workspace: TestWorkspace;

    beforeEach(async () => {
      workspace = await createTestWorkspace();
    });

    afterEach(async () => {
      await workspace.cleanup();
    });

    it('should index every folder of the tree, depth first in name order', async () => {
      const dest = workspace.destination;
      await mkdir(join(dest, 'い) [作者B] Beta'), { recursive: true });
      await mkdir(join(dest, 'あ) [作者A] Alpha', 'Extras'), { recursive: true });
      await writeFile(join(dest, 'note.txt'), 'not a folder');

      const index = await buildSeriesIndex(dest);

      expect([...index.entries()]).toEqual([
        ['Alpha', join(dest, 'あ) [作者A] Alpha')],
        ['Extras', join(dest, 'あ) [作者A] Alpha', 'Extras')],
        ['Beta', join(dest, 'い) [作者B] Beta')],
      ]);
    });

    it('should report every folder even when titles repeat', async () => {
      const dest = workspace.destination;
      await mkdir(join(dest, 'あ) [A] Same'));
      await mkdir(join(dest, 'い) [B] Same'));

      const entries = await scanSeriesFolders(dest);
      const index = await buildSeriesIndex(dest);

      expect(entries).toHaveLength(2);
      expect(index.size).toBe(1);
      expect(findExactMatch(index, 'Same')).toBe(join(dest, 'い) [B] Same'));
    });

    it('should return an empty index for an empty library', async () => {
      const index = await buildSeriesIndex(workspace.destination);
      expect(index.size).toBe(0);
    });
  });
});
