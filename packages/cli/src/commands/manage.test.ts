import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createConfig } from '@scopepack/common';
import type { Clock, ResolverConfig } from '@scopepack/common';
import { formatBackupTimestamp } from '@scopepack/core';
import { FakeSolver, fixedIdentity, steppingClock } from '@scopepack/core/test-utils';
import { run } from '../index.js';
import { recordingIO } from '../test-utils/recording-io.js';
import type { RecordingIO } from '../test-utils/recording-io.js';

const STUDIO_LINE = 'Current context: studio [step: all] (software: all)';
const SHOW_LINE = 'Current context: studio, show [step: all] (software: all)';

describe('manage command', () => {
  let dir: string;
  let config: ResolverConfig;
  let solver: FakeSolver;
  let clock: Clock;

  async function cli(argv: string[], answers: string[] = []): Promise<{ code: number; io: RecordingIO }> {
    const io = recordingIO(answers);
    const code = await run(argv, { config, io, session: { solver, identity: fixedIdentity, clock } });
    return { code, io };
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scopepack-manage-'));
    config = createConfig({ productionDatabase: path.join(dir, 'prod.sqlite3'), logLevel: 'silent' });
    solver = new FakeSolver();
    clock = steppingClock(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('before initialization', () => {
    it('should refuse to edit an uninitialized store', async () => {
      const { code, io } = await cli(['manage', '-ls']);

      expect(code).toBe(1);
      expect(io.stderr).toEqual([
        `Staging store ${config.stagingDatabase} is not initialized, run 'manage --initialize' first`,
      ]);
    });

    it('should initialize only after confirmation', async () => {
      const cancelled = await cli(['manage', '-init'], ['n']);
      expect(cancelled.io.stdout).toEqual(['Initialization cancelled by user.']);
      expect((await cli(['manage', '-ls'])).code).toBe(1);

      const approved = await cli(['manage', '--initialize'], ['y']);
      expect(approved.io.questions).toEqual([
        `Initialize the staging store at ${config.stagingDatabase}? Existing entries are kept. [y/N]: `,
      ]);
      expect(approved.io.stdout).toEqual(['Staging store initialized.']);
      expect((await cli(['manage', '-ls'])).code).toBe(0);
    });
  });

  describe('after initialization', () => {
    beforeEach(async () => {
      await cli(['manage', '-init'], ['y']);
    });

    it('should install confirmed packages with validation', async () => {
      const { code, io } = await cli(['manage', 'show', '-i', 'maya', 'nuke'], ['y']);

      expect(code).toBe(0);
      expect(io.questions).toEqual(['Install the following packages: maya, nuke? [y/N]: ']);
      expect(io.stdout).toEqual([SHOW_LINE, 'Installed: maya, nuke']);
      expect(solver.calls).toEqual([['maya'], ['maya', 'nuke']]);

      const listed = await cli(['manage', 'show', '-ls']);
      expect(listed.io.stdout).toEqual([SHOW_LINE, 'Installed packages: maya, nuke']);
    });

    it('should save nothing when a batch is cancelled', async () => {
      const { code, io } = await cli(['manage', '-i', 'maya'], ['']);

      expect(code).toBe(0);
      expect(io.stdout).toEqual([STUDIO_LINE, 'Operation cancelled by user.']);
      expect((await cli(['manage', '-ls'])).io.stdout).toEqual([STUDIO_LINE, 'Installed packages: ']);
    });

    it('should uninstall before installing', async () => {
      await cli(['manage', 'show', '-i', 'maya', '-f']);

      const { io } = await cli(['manage', 'show', '-i', 'nuke', '-ui', 'maya'], ['y', 'y']);

      expect(io.questions).toEqual([
        'Uninstall the following packages: maya? [y/N]: ',
        'Install the following packages: nuke? [y/N]: ',
      ]);
      expect(io.stdout).toEqual([SHOW_LINE, 'Uninstalled: maya', 'Installed: nuke']);
    });

    it('should skip prompts and validation when forced', async () => {
      solver.reject('broken');

      const { code, io } = await cli(['manage', 'show', '-i', 'broken', '--force']);

      expect(code).toBe(0);
      expect(io.questions).toEqual([]);
      expect(solver.calls).toEqual([]);
    });

    it('should report a rejected set and keep the store unchanged', async () => {
      solver.reject('broken');

      const { code, io } = await cli(['manage', 'show', '-i', 'maya', 'broken'], ['y']);

      expect(code).toBe(1);
      expect(io.stdout).toEqual([SHOW_LINE]);
      expect(io.stderr).toEqual(["Error: Package list can't be validated: conflict on broken"]);
      expect((await cli(['manage', 'show', '-ls', '-f'])).io.stdout).toEqual([
        SHOW_LINE,
        'Installed packages: ',
      ]);
    });

    it('should report removing from an unknown context', async () => {
      const { code, io } = await cli(['manage', 'show', '-ui', 'ghost', '-f']);

      expect(code).toBe(1);
      expect(io.stderr).toEqual(["Error: Context 'studio, show' doesn't exist"]);
    });

    it('should show the narrowing axes in the context line', async () => {
      const { io } = await cli(['manage', 'show', '-ls', '-s', 'anim', '-sw', 'maya']);
      expect(io.stdout[0]).toBe('Current context: studio, show [step: anim] (software: maya)');
    });

    it('should list known contexts', async () => {
      await cli(['manage', 'show', 'assets', '-i', 'maya', '-f']);

      const { io } = await cli(['manage', '--contexts']);

      expect(io.stdout).toEqual([STUDIO_LINE, '  studio', '  studio, show, assets']);
    });

    it('should deploy after saving', async () => {
      const deployedAt = new Date(2026, 0, 2, 3, 4, 5, 678);
      clock = { now: () => deployedAt };

      const { code, io } = await cli(['manage', '-i', 'maya', '--deploy', '-f']);

      expect(code).toBe(0);
      expect(io.stdout).toEqual([
        STUDIO_LINE,
        'Installed: maya',
        `Previous production saved to ${path.join(dir, 'history', `${formatBackupTimestamp(deployedAt)}.db`)}`,
        `Production configuration updated: ${config.productionDatabase}`,
      ]);

      const resolved = await cli(['resolve']);
      expect(resolved.io.stdout).toEqual([STUDIO_LINE, 'Installed packages: maya']);
    });

    it('should keep production untouched when deployment is cancelled', async () => {
      const { io } = await cli(['manage', '-i', 'maya', '--deploy'], ['y', 'n']);

      expect(io.stdout).toEqual([STUDIO_LINE, 'Installed: maya', 'Deployment cancelled by user.']);
      expect(fs.existsSync(config.productionDatabase)).toBe(false);
      expect((await cli(['manage', '-ls'])).io.stdout).toEqual([STUDIO_LINE, 'Installed packages: maya']);
    });
  });
});
