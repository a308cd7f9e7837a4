/**
 * Unit tests for sync/import.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SyncError } from '../errors.js';
import { provision } from '../orchestrator/provision.js';
import { copyRoutineComments, importFromNative } from '../sync/import.js';
import { buildNativeCatalog, settings } from './support/native-catalog.js';
import { FakeCatalog } from './support/fake-catalog.js';

async function seededCatalog(): Promise<FakeCatalog> {
  const catalog = buildNativeCatalog();
  catalog.insertRows('syscat', 'tables', [
    { tabschema: 'app', tabname: 'orders', type: 'T', remarks: 'Orders' },
    { tabschema: 'app', tabname: 'items', type: 'T', remarks: '' },
    { tabschema: 'app', tabname: 'audit', type: 'T', remarks: 'Audit trail' },
  ]);
  catalog.insertRows('syscat', 'routineparms', [
    { routineschema: 'app', specificname: 'sql_archive', parmname: null, rowtype: 'P', ordinal: 1, remarks: 'Cutoff date' },
    { routineschema: 'app', specificname: 'sql_archive', parmname: '', rowtype: 'P', ordinal: 2, remarks: 'Batch size' },
    { routineschema: 'app', specificname: 'sql_archive', parmname: 'keep', rowtype: 'P', ordinal: 3, remarks: 'Keep flag' },
    { routineschema: null, specificname: null, parmname: 'moved', rowtype: 'R', ordinal: 0, remarks: 'Rows moved' },
    { routineschema: 'app', specificname: 'sql_archive', parmname: 'quiet', rowtype: 'P', ordinal: 4, remarks: null },
  ]);

  await provision(catalog, settings);

  catalog.insertRows('docdata', 'tables', [
    { tabschema: 'app', tabname: 'orders', remarks: 'A much longer description of orders' },
    { tabschema: 'app', tabname: 'legacy', remarks: 'Only in the extended store' },
  ]);

  return catalog;
}

describe('import', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('importFromNative', () => {
    it('should mirror the native comments exactly', async () => {
      const catalog = await seededCatalog();
      catalog.insertRows('docdata', 'columns', [
        { tabschema: 'app', tabname: 'orders', colname: 'id', remarks: 'Only in the extended store' },
      ]);

      const report = await importFromNative(catalog, settings);

      expect(catalog.rows('docdata', 'tables')).toEqual([
        { tabschema: 'app', tabname: 'orders', remarks: 'Orders' },
        { tabschema: 'app', tabname: 'audit', remarks: 'Audit trail' },
      ]);
      expect(catalog.rows('docdata', 'columns')).toEqual([]);
      expect(report.kinds).toEqual([
        { table: 'columns', rows: 0 },
        { table: 'routines', rows: 0 },
        { table: 'routineparms', rows: 4 },
        { table: 'tables', rows: 2 },
      ]);
    });

    it('should name unnamed parameters by ordinal and blank null keys', async () => {
      const catalog = await seededCatalog();

      await importFromNative(catalog, settings);

      expect(catalog.rows('docdata', 'routineparms')).toEqual([
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 1, parmname: 'P1', remarks: 'Cutoff date' },
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 2, parmname: 'P2', remarks: 'Batch size' },
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 3, parmname: 'keep', remarks: 'Keep flag' },
        { routineschema: '', specificname: '', rowtype: 'R', ordinal: 0, parmname: 'moved', remarks: 'Rows moved' },
      ]);
    });

    it('should keep committed kinds and report them when a later kind fails', async () => {
      const catalog = await seededCatalog();
      catalog.insertRows('docdata', 'routineparms', [
        { routineschema: 'app', specificname: 'old', rowtype: 'P', ordinal: 1, parmname: 'x', remarks: 'Old' },
      ]);
      catalog.insertRows('docdata', 'columns', [
        { tabschema: 'app', tabname: 'orders', colname: 'id', remarks: 'Gone after import' },
      ]);
      catalog.failWhen(
        statement => statement.type === 'insert_select' && statement.table.name === 'routineparms'
      );

      const error = await importFromNative(catalog, settings).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SyncError);
      if (!(error instanceof SyncError)) return;
      expect(error.failedKind).toBe('routineparms');
      expect(error.committedKinds).toEqual(['columns', 'routines']);
      expect(error.message).toBe(
        'Sync of routineparms failed (injected failure); already committed: columns, routines'
      );

      expect(catalog.rows('docdata', 'columns')).toEqual([]);
      expect(catalog.rows('docdata', 'routineparms')).toHaveLength(1);
      expect(catalog.rows('docdata', 'tables').map(row => row.tabname)).toEqual(['orders', 'legacy']);
    });

    it('should report committed kinds when reading the catalog fails', async () => {
      const catalog = await seededCatalog();
      const relationExists = catalog.introspector.relationExists;
      vi.spyOn(catalog.introspector, 'relationExists').mockImplementation(async (schema, relation) => {
        if (relation === 'tables') {
          throw new Error('catalog unavailable');
        }
        return relationExists(schema, relation);
      });

      const error = await importFromNative(catalog, settings).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SyncError);
      if (!(error instanceof SyncError)) return;
      expect(error.failedKind).toBe('tables');
      expect(error.committedKinds).toEqual(['columns', 'routines', 'routineparms']);
      expect(error.message).toBe(
        'Sync of tables failed (catalog unavailable); already committed: columns, routines, routineparms'
      );
    });
  });

  describe('copyRoutineComments', () => {
    it('should replace the target overload comments with the source ones', async () => {
      const catalog = await seededCatalog();
      catalog.insertRows('docdata', 'routines', [
        { routineschema: 'app', specificname: 'sql_archive', remarks: 'Moves closed orders' },
        { routineschema: 'app', specificname: 'sql_archive2', remarks: 'Stale' },
      ]);
      catalog.insertRows('docdata', 'routineparms', [
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 1, parmname: 'cutoff', remarks: 'Cutoff date' },
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 2, parmname: 'batch', remarks: 'Batch size' },
        { routineschema: 'app', specificname: 'sql_archive2', rowtype: 'P', ordinal: 9, parmname: 'stale', remarks: 'Stale' },
      ]);

      const copied = await copyRoutineComments(catalog, settings, 'app', 'sql_archive', 'sql_archive2');

      expect(copied).toBe(3);
      expect(catalog.rows('docdata', 'routines')).toEqual([
        { routineschema: 'app', specificname: 'sql_archive', remarks: 'Moves closed orders' },
        { routineschema: 'app', specificname: 'sql_archive2', remarks: 'Moves closed orders' },
      ]);
      expect(
        catalog
          .rows('docdata', 'routineparms')
          .filter(row => row.specificname === 'sql_archive2')
          .map(row => `${row.ordinal}:${row.parmname}`)
      ).toEqual(['1:cutoff', '2:batch']);
    });

    it('should refuse to copy a routine onto itself', async () => {
      const catalog = await seededCatalog();
      catalog.insertRows('docdata', 'routines', [
        { routineschema: 'app', specificname: 'sql_archive', remarks: 'Moves closed orders' },
      ]);
      catalog.insertRows('docdata', 'routineparms', [
        { routineschema: 'app', specificname: 'sql_archive', rowtype: 'P', ordinal: 1, parmname: 'cutoff', remarks: 'Cutoff date' },
      ]);

      await expect(
        copyRoutineComments(catalog, settings, 'app', 'sql_archive', 'sql_archive')
      ).rejects.toThrow('Cannot copy app.sql_archive comments onto itself');

      expect(catalog.rows('docdata', 'routines')).toEqual([
        { routineschema: 'app', specificname: 'sql_archive', remarks: 'Moves closed orders' },
      ]);
      expect(catalog.rows('docdata', 'routineparms')).toHaveLength(1);
    });
  });
});
