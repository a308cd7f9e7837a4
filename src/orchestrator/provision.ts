/**
 * Extended table provisioning
 */

import { OBJECT_KINDS, ObjectKindDefinition } from '../catalog/kinds.js';
import type { CatalogDatabase } from '../catalog/session.js';
import { CreateTableStatement, qualified } from '../ddl/statements.js';
import type { CatalogSettings, ProvisionReport } from '../types/index.js';

export function buildExtendedTable(
  definition: ObjectKindDefinition,
  settings: CatalogSettings
): CreateTableStatement {
  return {
    type: 'create_table',
    name: qualified(settings.extendedSchema, definition.table),
    columns: [
      ...definition.keys.map(key => ({ name: key.name, type: key.type, notNull: true })),
      ...definition.carried.map(column => ({ name: column.name, type: column.type, notNull: false })),
      { name: settings.commentColumn, type: 'text', notNull: false },
    ],
    primaryKey: definition.keys.map(key => key.name),
    checks: definition.checks,
  };
}

/**
 * Create the extended namespace and any missing extended table for kinds the
 * native catalog has. Existing tables are left alone.
 */
export async function provision(db: CatalogDatabase, settings: CatalogSettings): Promise<ProvisionReport> {
  return db.transaction(async tx => {
    const report: ProvisionReport = { createdSchema: false, created: [], skipped: [] };

    if (!(await tx.introspector.schemaExists(settings.extendedSchema))) {
      await tx.execute({ type: 'create_schema', schema: settings.extendedSchema });
      report.createdSchema = true;
    }

    for (const definition of OBJECT_KINDS) {
      const nativeExists = await tx.introspector.relationExists(settings.nativeSchema, definition.table);
      const extendedExists = await tx.introspector.relationExists(settings.extendedSchema, definition.table);

      if (!nativeExists || extendedExists) {
        report.skipped.push(definition.table);
        continue;
      }

      await tx.execute(buildExtendedTable(definition, settings));
      report.created.push(definition.table);
    }

    console.log(
      `Provisioned ${settings.extendedSchema}: ${report.created.length} table(s) created, ${report.skipped.length} skipped`
    );
    return report;
  });
}
