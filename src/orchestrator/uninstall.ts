/**
 * Overlay teardown
 *
 * Objects are dropped in reverse dependency order: aliases, triggers, merge
 * views, generated routines, extended tables, then the namespaces. Every drop
 * is RESTRICT; anything left referencing a namespace stops the teardown with
 * TeardownBlockedError instead of being cascaded away.
 */

import type { CatalogDatabase, CatalogSession } from '../catalog/session.js';
import { renderStatement } from '../ddl/render.js';
import { DropStatement, qualified } from '../ddl/statements.js';
import { TeardownBlockedError, isDependencyError } from '../errors.js';
import type { CatalogSettings, RoutineRef, TriggerRef, UninstallReport } from '../types/index.js';

export type TeardownGroup = keyof UninstallReport['dropped'];

export const TEARDOWN_ORDER: readonly TeardownGroup[] = [
  'aliases',
  'triggers',
  'views',
  'routines',
  'tables',
  'schemas',
];

export interface OverlayInventory {
  /** Views in the merge namespace */
  mergeViews: string[];
  triggers: TriggerRef[];
  routines: RoutineRef[];
  /** Tables in the extended namespace */
  extendedTables: string[];
  /** Which of the extended and merge namespaces exist */
  schemas: string[];
}

export interface TeardownStep {
  group: TeardownGroup;
  label: string;
  statement: DropStatement;
}

export async function takeInventory(session: CatalogSession, settings: CatalogSettings): Promise<OverlayInventory> {
  const { introspector } = session;
  const inventory: OverlayInventory = {
    mergeViews: [],
    triggers: [],
    routines: [],
    extendedTables: [],
    schemas: [],
  };

  if (await introspector.schemaExists(settings.mergeSchema)) {
    const relations = await introspector.listRelations(settings.mergeSchema);
    inventory.mergeViews = relations.filter(relation => relation.type === 'view').map(relation => relation.name);
    inventory.triggers = await introspector.listTriggers(settings.mergeSchema);
    inventory.routines = await introspector.listRoutines(settings.mergeSchema);
  }

  if (await introspector.schemaExists(settings.extendedSchema)) {
    const relations = await introspector.listRelations(settings.extendedSchema);
    inventory.extendedTables = relations
      .filter(relation => relation.type === 'table')
      .map(relation => relation.name);
    inventory.schemas.push(settings.extendedSchema);
  }

  if (await introspector.schemaExists(settings.mergeSchema)) {
    inventory.schemas.push(settings.mergeSchema);
  }

  return inventory;
}

/**
 * Order the drops. A merge-namespace view with no trigger on it is an alias.
 */
export function planUninstall(inventory: OverlayInventory, settings: CatalogSettings): TeardownStep[] {
  const triggered = new Set(inventory.triggers.map(trigger => trigger.table));
  const merge = (name: string) => qualified(settings.mergeSchema, name);

  const steps: Record<TeardownGroup, TeardownStep[]> = {
    aliases: inventory.mergeViews
      .filter(view => !triggered.has(view))
      .map((view): TeardownStep => ({
        group: 'aliases',
        label: `${settings.mergeSchema}.${view}`,
        statement: { type: 'drop', target: { type: 'view', name: merge(view) } },
      })),
    triggers: inventory.triggers.map((trigger): TeardownStep => ({
      group: 'triggers',
      label: `${trigger.name} on ${settings.mergeSchema}.${trigger.table}`,
      statement: { type: 'drop', target: { type: 'trigger', name: trigger.name, on: merge(trigger.table) } },
    })),
    views: inventory.mergeViews
      .filter(view => triggered.has(view))
      .map((view): TeardownStep => ({
        group: 'views',
        label: `${settings.mergeSchema}.${view}`,
        statement: { type: 'drop', target: { type: 'view', name: merge(view) } },
      })),
    routines: inventory.routines.map((routine): TeardownStep => ({
      group: 'routines',
      label: `${settings.mergeSchema}.${routine.name}(${routine.signature})`,
      statement: {
        type: 'drop',
        target: { type: routine.type, name: merge(routine.name), signature: routine.signature },
      },
    })),
    tables: inventory.extendedTables.map((table): TeardownStep => ({
      group: 'tables',
      label: `${settings.extendedSchema}.${table}`,
      statement: {
        type: 'drop',
        target: { type: 'table', name: qualified(settings.extendedSchema, table) },
      },
    })),
    schemas: inventory.schemas.map((schema): TeardownStep => ({
      group: 'schemas',
      label: schema,
      statement: { type: 'drop', target: { type: 'schema', schema } },
    })),
  };

  return TEARDOWN_ORDER.flatMap(group => steps[group]);
}

export async function uninstall(db: CatalogDatabase, settings: CatalogSettings): Promise<UninstallReport> {
  return db.transaction(async tx => {
    const steps = planUninstall(await takeInventory(tx, settings), settings);
    const report: UninstallReport = {
      statements: 0,
      dropped: { aliases: [], triggers: [], views: [], routines: [], tables: [], schemas: [] },
    };

    for (const step of steps) {
      try {
        await tx.execute(step.statement);
      } catch (error) {
        if (isDependencyError(error)) {
          throw new TeardownBlockedError(step.label, error.message);
        }
        console.error(`Teardown failed at: ${renderStatement(step.statement)}`);
        throw error;
      }
      report.dropped[step.group].push(step.label);
      report.statements++;
    }

    console.log(`Uninstalled overlay: ${report.statements} object(s) dropped`);
    return report;
  });
}
