import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  HistoryOperation,
  InvalidContextError,
  UnknownContextError,
  UnknownPackageError,
  UnresolvableSetError,
} from '@scopepack/common';
import { ContextRepository, HistoryRepository, PackageRepository } from '@scopepack/db';
import type { Store } from '@scopepack/db';
import { createTestStore } from '@scopepack/db/test-utils';
import { PackageLedger } from './ledger.service.js';
import { ValidationGateway } from './validation.service.js';
import { EditRecorder } from './history-recorder.js';
import { FakeSolver, fixedIdentity, steppingClock } from '../test-utils/fakes.js';

const noValidation = { validate: false };

describe('PackageLedger', () => {
  let store: Store;
  let solver: FakeSolver;
  let contexts: ContextRepository;
  let recorder: EditRecorder;
  let ledger: PackageLedger;

  beforeEach(() => {
    store = createTestStore();
    solver = new FakeSolver();
    contexts = new ContextRepository(store);
    recorder = new EditRecorder(
      store,
      new HistoryRepository(store),
      fixedIdentity,
      steppingClock(new Date('2026-03-01T09:00:00.000Z')),
    );
    ledger = new PackageLedger(
      contexts,
      new PackageRepository(store),
      new ValidationGateway(solver),
      recorder,
    );
  });

  afterEach(() => {
    store.close();
  });

  describe('resolvePackages', () => {
    it('should stack scopes from studio down to entity', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage(['show'], 'pkgB', noValidation);
      await ledger.addPackage(['show', 'assets'], 'pkgC', noValidation);
      await ledger.addPackage(['show', 'assets', 'hero'], 'pkgD', noValidation);

      expect(ledger.resolvePackages(['show', 'assets', 'hero'])).toEqual(['pkgA', 'pkgB', 'pkgC', 'pkgD']);
      expect(ledger.resolvePackages(['show', 'assets'])).toEqual(['pkgA', 'pkgB', 'pkgC']);
      expect(ledger.resolvePackages([])).toEqual(['pkgA']);
    });

    it('should include step entries only when the step is requested', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage([], 'pkgE', { step: 'stepA', validate: false });

      expect(ledger.resolvePackages([], { step: 'stepA' })).toEqual(['pkgA', 'pkgE']);
      expect(ledger.resolvePackages([])).toEqual(['pkgA']);
      expect(ledger.resolvePackages([], { step: 'stepB' })).toEqual(['pkgA']);
    });

    it('should order axis groups as plain, step, software, then both', async () => {
      await ledger.addPackage([], 'sw-pkg', { software: 'maya', validate: false });
      await ledger.addPackage([], 'step-pkg', { step: 'light', validate: false });
      await ledger.addPackage([], 'plain', noValidation);
      await ledger.addPackage([], 'both', { step: 'light', software: 'maya', validate: false });

      expect(ledger.resolvePackages([], { step: 'light', software: 'maya' })).toEqual([
        'plain',
        'step-pkg',
        'sw-pkg',
        'both',
      ]);
      expect(ledger.resolvePackages([], { software: 'maya' })).toEqual(['plain', 'sw-pkg']);
    });

    it('should not return step-and-software entries for a single axis', async () => {
      await ledger.addPackage([], 'both', { step: 'light', software: 'maya', validate: false });

      expect(ledger.resolvePackages([], { step: 'light' })).toEqual([]);
      expect(ledger.resolvePackages([], { software: 'maya' })).toEqual([]);
    });

    it('should order by scope before axis', async () => {
      await ledger.addPackage(['show'], 'show-plain', noValidation);
      await ledger.addPackage([], 'studio-step', { step: 'comp', validate: false });

      expect(ledger.resolvePackages(['show'], { step: 'comp' })).toEqual(['studio-step', 'show-plain']);
    });

    it('should keep the first occurrence of a repeated name', async () => {
      await ledger.addPackage([], 'maya', noValidation);
      await ledger.addPackage([], 'nuke', noValidation);
      await ledger.addPackage(['show'], 'maya', noValidation);
      await ledger.addPackage(['show'], 'houdini', noValidation);

      expect(ledger.resolvePackages(['show'])).toEqual(['maya', 'nuke', 'houdini']);
    });

    it('should skip scopes that were never created', async () => {
      await ledger.addPackage(['show', 'assets', 'hero'], 'deep', noValidation);

      expect(ledger.resolvePackages(['show', 'assets', 'hero'])).toEqual(['deep']);
      expect(contexts.findId(['show', null, null])).toBeUndefined();
    });

    it('should reject invalid contexts', () => {
      expect(() => ledger.resolvePackages(['a', 'b', 'c', 'd'])).toThrow(InvalidContextError);
    });
  });

  describe('listPackages', () => {
    it('should validate the resolved list', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);

      await expect(ledger.listPackages([])).resolves.toEqual(['pkgA']);
      expect(solver.calls).toEqual([['pkgA']]);
    });

    it('should fail with the solver diagnostic', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      solver.reject('pkgA');

      await expect(ledger.listPackages([])).rejects.toThrow(
        "Package list can't be validated: conflict on pkgA",
      );
    });

    it('should skip the solver when validation is off', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      solver.reject('pkgA');

      await expect(ledger.listPackages([], noValidation)).resolves.toEqual(['pkgA']);
      expect(solver.calls).toEqual([]);
    });
  });

  describe('addPackage', () => {
    it('should validate the current list plus the new package', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage(['show'], 'pkgB');

      expect(solver.calls).toEqual([['pkgA', 'pkgB']]);
      expect(ledger.resolvePackages(['show'])).toEqual(['pkgA', 'pkgB']);
    });

    it('should write nothing when the set is rejected', async () => {
      solver.reject('bad');

      const attempt = ledger.addPackage(['show'], 'bad');

      await expect(attempt).rejects.toBeInstanceOf(UnresolvableSetError);
      await expect(attempt).rejects.toMatchObject({ diagnostic: 'conflict on bad', packages: ['bad'] });
      expect(contexts.findId(['show', null, null])).toBeUndefined();
      expect(recorder.edits).toEqual([]);
      expect(store.inTransaction).toBe(false);
    });

    it('should record an install edit with the normalized context', async () => {
      const entryId = await ledger.addPackage(['show', ''], 'pkgB', { step: 'anim', validate: false });

      expect(entryId).toBe(1);
      expect(recorder.edits).toEqual([
        {
          context: ['show', null, null],
          packageName: 'pkgB',
          step: 'anim',
          software: null,
          operation: HistoryOperation.INSTALL,
        },
      ]);
    });
  });

  describe('removePackage', () => {
    it('should fail for an unknown context without creating it', async () => {
      await expect(ledger.removePackage(['ghost'], 'pkgA', noValidation)).rejects.toBeInstanceOf(
        UnknownContextError,
      );
      expect(contexts.findId(['ghost', null, null])).toBeUndefined();
    });

    it('should only remove an exact match', async () => {
      await ledger.addPackage([], 'pkgB', { step: 'anim', validate: false });

      await expect(ledger.removePackage([], 'pkgB', noValidation)).rejects.toBeInstanceOf(
        UnknownPackageError,
      );
      expect(ledger.resolvePackages([], { step: 'anim' })).toEqual(['pkgB']);
    });

    it('should validate the list without the removed package', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage([], 'pkgB', noValidation);

      await ledger.removePackage([], 'pkgB');

      expect(solver.calls).toEqual([['pkgA']]);
      expect(ledger.resolvePackages([])).toEqual(['pkgA']);
    });

    it('should keep the entry when the remainder is rejected', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage([], 'pkgB', noValidation);
      solver.reject('pkgA');

      await expect(ledger.removePackage([], 'pkgB')).rejects.toBeInstanceOf(UnresolvableSetError);
      expect(ledger.resolvePackages([])).toEqual(['pkgA', 'pkgB']);
      expect(recorder.edits).toHaveLength(2);
    });

    it('should remove a single duplicate entry', async () => {
      await ledger.addPackage([], 'pkgA', noValidation);
      await ledger.addPackage([], 'pkgA', noValidation);

      await ledger.removePackage([], 'pkgA', noValidation);

      expect(ledger.resolvePackages([])).toEqual(['pkgA']);
    });

    it('should record an uninstall edit', async () => {
      await ledger.addPackage(['show'], 'pkgA', { software: 'nuke', validate: false });
      await ledger.removePackage(['show'], 'pkgA', { software: 'nuke', validate: false });

      expect(recorder.edits.map((edit) => edit.operation)).toEqual([
        HistoryOperation.INSTALL,
        HistoryOperation.UNINSTALL,
      ]);
    });
  });

  describe('edit buffer', () => {
    it('should hold one edit per successful mutation, in call order', async () => {
      await ledger.addPackage([], 'a', noValidation);
      await ledger.addPackage(['show'], 'b', noValidation);
      await ledger.removePackage([], 'a', noValidation);
      await expect(ledger.removePackage([], 'missing', noValidation)).rejects.toThrow();

      expect(recorder.edits.map((edit) => [edit.packageName, edit.operation])).toEqual([
        ['a', HistoryOperation.INSTALL],
        ['b', HistoryOperation.INSTALL],
        ['a', HistoryOperation.UNINSTALL],
      ]);
    });

    it('should be empty after save whether or not it was logged', async () => {
      await ledger.addPackage([], 'a', noValidation);
      recorder.save({ flushToLog: false });
      expect(recorder.edits).toEqual([]);

      await ledger.addPackage([], 'b', noValidation);
      recorder.save();
      expect(recorder.edits).toEqual([]);
    });
  });

  describe('batches', () => {
    it('should stop at the first rejected package', async () => {
      solver.reject('bad');

      await expect(ledger.installPackages(['show'], ['ok', 'bad', 'later'])).rejects.toBeInstanceOf(
        UnresolvableSetError,
      );
      expect(recorder.edits.map((edit) => edit.packageName)).toEqual(['ok']);
    });

    it('should return the state to where it started after matching removes', async () => {
      await ledger.addPackage([], 'base', noValidation);
      const before = ledger.resolvePackages(['show'], { step: 'fx' });

      await ledger.installPackages(['show'], ['x', 'y', 'base'], { step: 'fx', validate: false });
      await ledger.uninstallPackages(['show'], ['x', 'y', 'base'], { step: 'fx', validate: false });

      expect(ledger.resolvePackages(['show'], { step: 'fx' })).toEqual(before);
    });
  });
});
