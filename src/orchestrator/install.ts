/**
 * Overlay installation
 *
 * For every native relation: a merge view plus its write-through trigger when
 * an extended table of the same name exists, otherwise a pass-through alias.
 * Each relation is created in its own transaction, so a view never exists
 * without its trigger.
 */

import type { CatalogDatabase, CatalogSession } from '../catalog/session.js';
import { SqlStatement, qualified } from '../ddl/statements.js';
import { describeMergeView, generateMergeView } from '../generator/merge-view.js';
import { generateSyncTrigger } from '../generator/sync-trigger.js';
import type { CatalogSettings, InstallReport } from '../types/index.js';

/**
 * Read both relations' metadata and build the merge view, trigger function
 * and trigger for one relation
 */
export async function generateMergeStatements(
  session: CatalogSession,
  relation: string,
  settings: CatalogSettings
): Promise<SqlStatement[]> {
  const nativeColumns = await session.introspector.columnsOf(settings.nativeSchema, relation);
  const extendedColumns = await session.introspector.columnsOf(settings.extendedSchema, relation);

  const spec = describeMergeView(relation, nativeColumns, extendedColumns, settings);
  const { fn, trigger } = generateSyncTrigger(spec);

  return [generateMergeView(spec), fn, trigger];
}

export function generateAlias(relation: string, settings: CatalogSettings): SqlStatement {
  return {
    type: 'create_alias',
    name: qualified(settings.mergeSchema, relation),
    target: qualified(settings.nativeSchema, relation),
  };
}

/**
 * Requires a clean merge namespace: run uninstall() first when re-installing
 */
export async function install(db: CatalogDatabase, settings: CatalogSettings): Promise<InstallReport> {
  const report: InstallReport = { merged: [], aliased: [] };

  if (!(await db.introspector.schemaExists(settings.mergeSchema))) {
    await db.execute({ type: 'create_schema', schema: settings.mergeSchema });
  }

  const relations = await db.introspector.listRelations(settings.nativeSchema);

  for (const relation of relations) {
    const extended = await db.introspector.relationExists(settings.extendedSchema, relation.name);

    await db.transaction(async tx => {
      const statements = extended
        ? await generateMergeStatements(tx, relation.name, settings)
        : [generateAlias(relation.name, settings)];

      for (const statement of statements) {
        await tx.execute(statement);
      }
    });

    if (extended) {
      report.merged.push(relation.name);
    } else {
      report.aliased.push(relation.name);
    }
  }

  console.log(
    `Installed ${settings.mergeSchema}: ${report.merged.length} merge view(s), ${report.aliased.length} alias(es)`
  );
  return report;
}
