/**
 * App Tests
 *
 * Drives a full run with injected configuration, picker and prompt.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readdir } from 'fs/promises';
import { join } from 'path';
import { runOrganizer, createPrompt, NoFolderSelectedError } from '../app.js';
import type { AppDependencies } from '../app.js';
import { buildSeriesIndex } from '../services/series-index.service.js';
import { AutoConfirmationPrompt, ConsoleConfirmationPrompt } from '../services/confirmation.service.js';
import { FixedFolderPicker } from '../services/folder-picker.service.js';
import { ConfigError } from '../services/config.service.js';
import {
  createTestWorkspace,
  createVolumeZip,
} from '../services/__tests__/__fixtures__/test-archive-helpers.js';
import type { TestWorkspace } from '../services/__tests__/__fixtures__/test-archive-helpers.js';

describe('App', () => {
  let workspace: TestWorkspace;
  let deps: AppDependencies;

  beforeEach(async () => {
    workspace = await createTestWorkspace();
    deps = {
      loadConfig: vi.fn(() => ({ destinationDirectory: workspace.destination, sourceDirectory: workspace.source })),
      buildSeriesIndex: vi.fn(buildSeriesIndex),
      createPicker: vi.fn((source?: string) => new FixedFolderPicker(source ?? workspace.source)),
      createPrompt: vi.fn(() => new AutoConfirmationPrompt(true)),
    };
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('runOrganizer', () => {
    it('should move every matching archive into the library', async () => {
      await mkdir(join(workspace.destination, 'Foo'));
      await mkdir(join(workspace.destination, 'BarBaz'));
      await createVolumeZip(join(workspace.source, 'Foo第1巻.zip'), 'Foo第1巻');
      await createVolumeZip(join(workspace.source, 'Bar第2巻.zip'), 'Bar第2巻');

      const summary = await runOrganizer({ configPath: 'test.yaml' }, deps);

      expect(summary.moved).toBe(2);
      expect(deps.loadConfig).toHaveBeenCalledWith('test.yaml');
      expect(deps.buildSeriesIndex).toHaveBeenCalledWith(workspace.destination);
      expect(await readdir(workspace.source)).toEqual([]);
      expect(await readdir(join(workspace.destination, 'BarBaz'))).toEqual(['BarBaz第2巻.zip']);
    });

    it('should use the default config path', async () => {
      await runOrganizer({}, deps);

      expect(deps.loadConfig).toHaveBeenCalledWith('./config.yaml');
    });

    it('should pass the command-line folder to the picker', async () => {
      await runOrganizer({ source: workspace.root }, deps);

      expect(deps.createPicker).toHaveBeenCalledWith(workspace.root);
    });

    it('should stop when no folder is picked', async () => {
      deps.createPicker = () => ({ pick: async () => null });

      await expect(runOrganizer({}, deps)).rejects.toBeInstanceOf(NoFolderSelectedError);
      expect(deps.buildSeriesIndex).not.toHaveBeenCalled();
    });

    it('should propagate configuration errors', async () => {
      deps.loadConfig = () => {
        throw new ConfigError('./config.yaml not found.');
      };

      await expect(runOrganizer({}, deps)).rejects.toThrow('./config.yaml not found.');
    });
  });

  describe('createPrompt', () => {
    it('should answer yes automatically with assumeYes', async () => {
      const prompt = createPrompt({ assumeYes: true });

      expect(await prompt.confirm({ title: 'Confirm move', message: 'Move?' })).toBe(true);
    });

    it('should answer no automatically when not interactive', async () => {
      const prompt = createPrompt({ interactive: false });

      expect(await prompt.confirm({ title: 'Confirm move', message: 'Move?' })).toBe(false);
    });

    it('should ask on the terminal by default', () => {
      expect(createPrompt({})).toBeInstanceOf(ConsoleConfirmationPrompt);
    });
  });
});
