/**
 * Object kinds that carry comments
 *
 * Each entry names the native relation (and the extended table of the same
 * name), its key shape, and how a native COMMENT ON statement addresses one
 * of its objects. The key shape drives provisioning, export and import;
 * merge views and triggers read the key from the extended table's metadata.
 */

import { quoteIdentifier } from '../ddl/render.js';
import { ColumnType, SqlExpression, TableCheck, coalesce, col, str } from '../ddl/statements.js';
import type { CatalogRow } from '../types/index.js';

export interface KindColumn {
  name: string;
  type: ColumnType;
}

export interface CommentTarget {
  objectType: string;
  target: string;
}

export interface ObjectKindDefinition {
  kind: string;
  table: string;
  keys: KindColumn[];
  /** Non-key columns kept alongside the comment */
  carried: KindColumn[];
  checks: TableCheck[];
  /**
   * Import expression per extended column, evaluated against the native row
   * aliased as `s`. Columns without an entry are copied as-is.
   */
  importValues: Record<string, SqlExpression>;
  /** Absent for kinds the native COMMENT ON statement cannot address */
  comment?: {
    /** Native columns needed beyond the key */
    nativeColumns: string[];
    target(row: CatalogRow): CommentTarget;
  };
}

function text(row: CatalogRow, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value);
}

function path(row: CatalogRow, ...columns: string[]): string {
  return columns.map(column => quoteIdentifier(text(row, column))).join('.');
}

function simpleKind(
  kind: string,
  table: string,
  keys: string[],
  objectType: string
): ObjectKindDefinition {
  return {
    kind,
    table,
    keys: keys.map(name => ({ name, type: 'text' })),
    carried: [],
    checks: [],
    importValues: {},
    comment: {
      nativeColumns: [],
      target: row => ({ objectType, target: path(row, ...keys) }),
    },
  };
}

export const ROUTINE_PARAMETER_ROW_TYPES = ['B', 'C', 'O', 'P', 'R'] as const;

export const OBJECT_KINDS: readonly ObjectKindDefinition[] = [
  simpleKind('type', 'datatypes', ['typeschema', 'typename'], 'TYPE'),
  simpleKind('column', 'columns', ['tabschema', 'tabname', 'colname'], 'COLUMN'),
  {
    kind: 'constraint',
    table: 'tabconst',
    keys: [
      { name: 'tabschema', type: 'text' },
      { name: 'tabname', type: 'text' },
      { name: 'constname', type: 'text' },
    ],
    carried: [],
    checks: [],
    importValues: {},
    comment: {
      nativeColumns: [],
      target: row => ({
        objectType: 'CONSTRAINT',
        target: `${path(row, 'constname')} ON ${path(row, 'tabschema', 'tabname')}`,
      }),
    },
  },
  simpleKind('index', 'indexes', ['indschema', 'indname'], 'INDEX'),
  {
    kind: 'trigger',
    table: 'triggers',
    keys: [
      { name: 'trigschema', type: 'text' },
      { name: 'trigname', type: 'text' },
    ],
    carried: [],
    checks: [],
    importValues: {},
    comment: {
      nativeColumns: ['tabschema', 'tabname'],
      target: row => ({
        objectType: 'TRIGGER',
        target: `${path(row, 'trigname')} ON ${path(row, 'tabschema', 'tabname')}`,
      }),
    },
  },
  {
    kind: 'routine',
    table: 'routines',
    keys: [
      { name: 'routineschema', type: 'text' },
      { name: 'specificname', type: 'text' },
    ],
    carried: [],
    checks: [],
    importValues: {},
    comment: {
      nativeColumns: ['routinetype'],
      target: row => ({
        objectType: text(row, 'routinetype') === 'P' ? 'PROCEDURE' : 'FUNCTION',
        target: path(row, 'routineschema', 'specificname'),
      }),
    },
  },
  {
    kind: 'routine parameter',
    table: 'routineparms',
    keys: [
      { name: 'routineschema', type: 'text' },
      { name: 'specificname', type: 'text' },
      { name: 'rowtype', type: 'char1' },
      { name: 'ordinal', type: 'integer' },
    ],
    carried: [{ name: 'parmname', type: 'text' }],
    checks: [
      { type: 'in', name: 'rowtype_ck', column: 'rowtype', values: [...ROUTINE_PARAMETER_ROW_TYPES] },
      { type: 'min', name: 'ordinal_ck', column: 'ordinal', min: 0 },
    ],
    importValues: {
      routineschema: coalesce(col('s', 'routineschema'), str('')),
      specificname: coalesce(col('s', 'specificname'), str('')),
      parmname: {
        type: 'blank_default',
        value: col('s', 'parmname'),
        fallback: { type: 'concat', args: [str('P'), col('s', 'ordinal')] },
      },
    },
  },
  simpleKind('schema', 'schemata', ['schemaname'], 'SCHEMA'),
  simpleKind('storage space', 'tablespaces', ['tbspace'], 'TABLESPACE'),
  simpleKind('table', 'tables', ['tabschema', 'tabname'], 'TABLE'),
];

export function findKind(table: string): ObjectKindDefinition | undefined {
  return OBJECT_KINDS.find(definition => definition.table === table);
}
