/**
 * Unit tests for generator/merge-view.ts
 */

import { describe, it, expect } from 'vitest';
import { renderStatement } from '../ddl/render.js';
import { KeyShapeViolationError, MetadataNotFoundError } from '../errors.js';
import { describeMergeView, generateMergeView } from '../generator/merge-view.js';
import { ColumnMeta, DEFAULT_SETTINGS } from '../types/index.js';

function column(
  name: string,
  position: number,
  options: { nullable?: boolean; textual?: boolean; keyPosition?: number } = {}
): ColumnMeta {
  return {
    name,
    position,
    nullable: options.nullable ?? false,
    textual: options.textual ?? true,
    keyPosition: options.keyPosition ?? null,
  };
}

const nativeTables = [
  column('remarks', 4, { nullable: true }),
  column('tabschema', 1),
  column('type', 3, { nullable: true }),
  column('tabname', 2),
];

const extendedTables = [
  column('tabschema', 1, { keyPosition: 1 }),
  column('tabname', 2, { keyPosition: 2 }),
  column('remarks', 3, { nullable: true }),
];

describe('merge-view', () => {
  describe('describeMergeView', () => {
    it('should keep native column order', () => {
      const spec = describeMergeView('tables', nativeTables, extendedTables, DEFAULT_SETTINGS);

      expect(spec.columns).toEqual(['tabschema', 'tabname', 'type', 'remarks']);
      expect(spec.keys).toEqual([
        { column: 'tabschema', blankWhenNull: false },
        { column: 'tabname', blankWhenNull: false },
      ]);
      expect(spec.view).toEqual({ schema: 'doccat', name: 'tables' });
    });

    it('should order keys by key position, not column position', () => {
      const spec = describeMergeView(
        'tables',
        nativeTables,
        [
          column('tabschema', 1, { keyPosition: 2 }),
          column('tabname', 2, { keyPosition: 1 }),
          column('remarks', 3, { nullable: true }),
        ],
        DEFAULT_SETTINGS
      );

      expect(spec.keys.map(key => key.column)).toEqual(['tabname', 'tabschema']);
    });

    it('should mark nullable textual native keys for blank joins only', () => {
      const spec = describeMergeView(
        'routineparms',
        [
          column('routineschema', 1, { nullable: true }),
          column('specificname', 2, { nullable: true }),
          column('parmname', 3, { nullable: true }),
          column('rowtype', 4),
          column('ordinal', 5, { nullable: true, textual: false }),
          column('remarks', 6, { nullable: true }),
        ],
        [
          column('routineschema', 1, { keyPosition: 1 }),
          column('specificname', 2, { keyPosition: 2 }),
          column('rowtype', 3, { keyPosition: 3 }),
          column('ordinal', 4, { keyPosition: 4, textual: false }),
          column('parmname', 5, { nullable: true }),
          column('remarks', 6, { nullable: true }),
        ],
        DEFAULT_SETTINGS
      );

      expect(spec.keys).toEqual([
        { column: 'routineschema', blankWhenNull: true },
        { column: 'specificname', blankWhenNull: true },
        { column: 'rowtype', blankWhenNull: false },
        { column: 'ordinal', blankWhenNull: false },
      ]);
      expect(spec.carried).toEqual(['parmname']);
    });

    it('should reject an extended table without key columns', () => {
      const run = () =>
        describeMergeView(
          'tables',
          nativeTables,
          extendedTables.map(c => ({ ...c, keyPosition: null })),
          DEFAULT_SETTINGS
        );

      expect(run).toThrow(KeyShapeViolationError);
      expect(run).toThrow('docdata.tables declares no key columns; cannot join it to the native catalog');
    });

    it('should reject a key column the native relation lacks', () => {
      const run = () =>
        describeMergeView(
          'tables',
          nativeTables,
          [...extendedTables, column('colname', 4, { keyPosition: 3 })],
          DEFAULT_SETTINGS
        );

      expect(run).toThrow(MetadataNotFoundError);
      expect(run).toThrow('Column colname of syscat.tables not found in the catalog');
    });

    it('should reject a native relation without the comment column', () => {
      const run = () =>
        describeMergeView(
          'tables',
          nativeTables.filter(c => c.name !== 'remarks'),
          extendedTables,
          DEFAULT_SETTINGS
        );

      expect(run).toThrow('Column remarks of syscat.tables not found in the catalog');
    });
  });

  describe('generateMergeView', () => {
    it('should prefer the extended comment over the native one', () => {
      const spec = describeMergeView('tables', nativeTables, extendedTables, DEFAULT_SETTINGS);

      expect(renderStatement(generateMergeView(spec))).toBe(
        'CREATE VIEW "doccat"."tables" AS SELECT s."tabschema", s."tabname", s."type", ' +
          'COALESCE(d."remarks", s."remarks") AS "remarks" ' +
          'FROM "syscat"."tables" s LEFT JOIN "docdata"."tables" d ' +
          'ON s."tabschema" = d."tabschema" AND s."tabname" = d."tabname"'
      );
    });

    it('should join nullable textual keys through COALESCE', () => {
      const spec = describeMergeView(
        'routines',
        [
          column('routineschema', 1, { nullable: true }),
          column('specificname', 2),
          column('remarks', 3, { nullable: true }),
        ],
        [
          column('routineschema', 1, { keyPosition: 1 }),
          column('specificname', 2, { keyPosition: 2 }),
          column('remarks', 3, { nullable: true }),
        ],
        DEFAULT_SETTINGS
      );

      expect(renderStatement(generateMergeView(spec))).toContain(
        'ON COALESCE(s."routineschema", \'\') = d."routineschema" AND s."specificname" = d."specificname"'
      );
    });
  });
});
