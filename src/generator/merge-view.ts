/**
 * Merge view generation
 *
 * A merge view is the native relation, column for column, with the comment
 * column replaced by the extended comment where one exists.
 */

import { KeyShapeViolationError, MetadataNotFoundError } from '../errors.js';
import {
  CreateViewStatement,
  KeyBinding,
  QualifiedName,
  SelectItem,
  SqlCondition,
  coalesce,
  col,
  equals,
  qualified,
  str,
} from '../ddl/statements.js';
import type { CatalogSettings, ColumnMeta } from '../types/index.js';

export const NATIVE_ALIAS = 's';
export const EXTENDED_ALIAS = 'd';

/**
 * Everything needed to build the view and its trigger for one object kind
 */
export interface MergeViewSpec {
  readonly relation: string;
  readonly native: QualifiedName;
  readonly extended: QualifiedName;
  readonly view: QualifiedName;
  /** Native columns in declared order */
  readonly columns: readonly string[];
  /** Extended key columns in key order */
  readonly keys: readonly KeyBinding[];
  readonly commentColumn: string;
  /** Extended non-key columns that the native relation also has */
  readonly carried: readonly string[];
}

export function describeMergeView(
  relation: string,
  nativeColumns: readonly ColumnMeta[],
  extendedColumns: readonly ColumnMeta[],
  settings: CatalogSettings
): MergeViewSpec {
  const keyColumns = extendedColumns
    .filter((column): column is ColumnMeta & { keyPosition: number } => column.keyPosition !== null)
    .sort((a, b) => a.keyPosition - b.keyPosition);

  if (keyColumns.length === 0) {
    throw new KeyShapeViolationError(settings.extendedSchema, relation);
  }

  const nativeByName = new Map(nativeColumns.map(column => [column.name, column]));
  if (!nativeByName.has(settings.commentColumn)) {
    throw new MetadataNotFoundError(settings.nativeSchema, relation, settings.commentColumn);
  }

  const keys = keyColumns.map(key => {
    const native = nativeByName.get(key.name);
    if (!native) {
      throw new MetadataNotFoundError(settings.nativeSchema, relation, key.name);
    }
    return { column: key.name, blankWhenNull: native.nullable && native.textual };
  });

  const keyNames = new Set(keys.map(key => key.column));
  const carried = extendedColumns
    .filter(column => !keyNames.has(column.name))
    .filter(column => column.name !== settings.commentColumn && nativeByName.has(column.name))
    .map(column => column.name);

  const ordered = [...nativeColumns].sort((a, b) => a.position - b.position);

  return {
    relation,
    native: qualified(settings.nativeSchema, relation),
    extended: qualified(settings.extendedSchema, relation),
    view: qualified(settings.mergeSchema, relation),
    columns: ordered.map(column => column.name),
    keys,
    commentColumn: settings.commentColumn,
    carried,
  };
}

export function joinConditions(keys: readonly KeyBinding[]): SqlCondition[] {
  return keys.map(key => {
    const native = col(NATIVE_ALIAS, key.column);
    return equals(key.blankWhenNull ? coalesce(native, str('')) : native, col(EXTENDED_ALIAS, key.column));
  });
}

export function generateMergeView(spec: MergeViewSpec): CreateViewStatement {
  const items: SelectItem[] = spec.columns.map(column =>
    column === spec.commentColumn
      ? { expr: coalesce(col(EXTENDED_ALIAS, column), col(NATIVE_ALIAS, column)), alias: column }
      : { expr: col(NATIVE_ALIAS, column) }
  );

  return {
    type: 'create_view',
    name: spec.view,
    query: {
      items,
      from: { table: spec.native, alias: NATIVE_ALIAS },
      join: {
        type: 'left',
        table: { table: spec.extended, alias: EXTENDED_ALIAS },
        on: joinConditions(spec.keys),
      },
    },
  };
}
