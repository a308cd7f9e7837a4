/**
 * Import: native comments → extended store
 *
 * A full mirror, not a merge. Every kind's extended table is emptied and
 * refilled from the native catalog, so extended comments without a native
 * counterpart, and the tail of any comment longer than the native ceiling,
 * are gone afterwards.
 */

import { OBJECT_KINDS, ObjectKindDefinition, findKind } from '../catalog/kinds.js';
import type { CatalogDatabase } from '../catalog/session.js';
import {
  DeleteAllStatement,
  InsertSelectStatement,
  SqlStatement,
  col,
  equals,
  qualified,
  str,
} from '../ddl/statements.js';
import { NATIVE_ALIAS } from '../generator/merge-view.js';
import { SyncError } from '../errors.js';
import type { CatalogSettings, ImportReport } from '../types/index.js';

export interface ImportStatements {
  clear: DeleteAllStatement;
  fill: InsertSelectStatement;
}

export function buildImportStatements(
  definition: ObjectKindDefinition,
  settings: CatalogSettings
): ImportStatements {
  const target = qualified(settings.extendedSchema, definition.table);
  const columns = [
    ...definition.keys.map(key => key.name),
    ...definition.carried.map(column => column.name),
    settings.commentColumn,
  ];

  return {
    clear: { type: 'delete_all', table: target },
    fill: {
      type: 'insert_select',
      table: target,
      columns,
      query: {
        items: columns.map(column => ({
          expr: definition.importValues[column] ?? col(NATIVE_ALIAS, column),
        })),
        from: { table: qualified(settings.nativeSchema, definition.table), alias: NATIVE_ALIAS },
        where: [{ type: 'not_blank', expr: col(NATIVE_ALIAS, settings.commentColumn) }],
      },
    },
  };
}

/**
 * Mirror native comments into the extended tables, one transaction per kind.
 * A failure stops the run; kinds committed before it stay committed and are
 * listed on the SyncError.
 */
export async function importFromNative(db: CatalogDatabase, settings: CatalogSettings): Promise<ImportReport> {
  const report: ImportReport = { kinds: [] };

  for (const definition of OBJECT_KINDS) {
    try {
      const { introspector } = db;
      const present =
        (await introspector.relationExists(settings.nativeSchema, definition.table)) &&
        (await introspector.relationExists(settings.extendedSchema, definition.table));
      if (!present) {
        continue;
      }

      const { clear, fill } = buildImportStatements(definition, settings);
      const rows = await db.transaction(async tx => {
        await tx.execute(clear);
        return tx.execute(fill);
      });
      report.kinds.push({ table: definition.table, rows });
      console.log(`Imported ${rows} ${definition.kind} comment(s) into ${settings.extendedSchema}.${definition.table}`);
    } catch (error) {
      throw new SyncError(
        definition.table,
        report.kinds.map(kind => kind.table),
        error
      );
    }
  }

  return report;
}

/**
 * Statements that copy a routine's comment and its parameter comments onto
 * another specific name in the same schema, replacing what the target had.
 */
export function buildRoutineCopyStatements(
  settings: CatalogSettings,
  schema: string,
  fromSpecificName: string,
  toSpecificName: string
): SqlStatement[] {
  const statements: SqlStatement[] = [];

  for (const table of ['routines', 'routineparms']) {
    const definition = findKind(table);
    if (!definition) {
      continue;
    }

    const target = qualified(settings.extendedSchema, table);
    const columns = [
      ...definition.keys.map(key => key.name),
      ...definition.carried.map(column => column.name),
      settings.commentColumn,
    ];

    statements.push({
      type: 'delete_all',
      table: target,
      where: [
        equals(col(undefined, 'routineschema'), str(schema)),
        equals(col(undefined, 'specificname'), str(toSpecificName)),
      ],
    });
    statements.push({
      type: 'insert_select',
      table: target,
      columns,
      query: {
        items: columns.map(column => ({
          expr: column === 'specificname' ? str(toSpecificName) : col('c', column),
        })),
        from: { table: target, alias: 'c' },
        where: [
          equals(col('c', 'routineschema'), str(schema)),
          equals(col('c', 'specificname'), str(fromSpecificName)),
        ],
      },
    });
  }

  return statements;
}

export async function copyRoutineComments(
  db: CatalogDatabase,
  settings: CatalogSettings,
  schema: string,
  fromSpecificName: string,
  toSpecificName: string
): Promise<number> {
  // The target is cleared before the source is read
  if (fromSpecificName === toSpecificName) {
    throw new Error(`Cannot copy ${schema}.${fromSpecificName} comments onto itself`);
  }

  const statements = buildRoutineCopyStatements(settings, schema, fromSpecificName, toSpecificName);

  const copied = await db.transaction(async tx => {
    let inserted = 0;
    for (const statement of statements) {
      const rows = await tx.execute(statement);
      if (statement.type === 'insert_select') {
        inserted += rows;
      }
    }
    return inserted;
  });

  console.log(`Copied ${copied} routine comment row(s) from ${schema}.${fromSpecificName} to ${toSpecificName}`);
  return copied;
}
