/**
 * Overlay status: how each native relation is exposed in the merge namespace
 */

import type { CatalogSession } from '../catalog/session.js';
import type { CatalogSettings, OverlayMode, OverlayStatus } from '../types/index.js';

export async function describeOverlay(session: CatalogSession, settings: CatalogSettings): Promise<OverlayStatus> {
  const { introspector } = session;
  const installed = await introspector.schemaExists(settings.mergeSchema);

  const native = await introspector.listRelations(settings.nativeSchema);
  const extended = new Set(
    (await introspector.schemaExists(settings.extendedSchema))
      ? (await introspector.listRelations(settings.extendedSchema)).map(relation => relation.name)
      : []
  );
  const merged = new Set(
    installed ? (await introspector.listTriggers(settings.mergeSchema)).map(trigger => trigger.table) : []
  );
  const present = new Set(
    installed ? (await introspector.listRelations(settings.mergeSchema)).map(relation => relation.name) : []
  );

  return {
    installed,
    relations: native.map(relation => {
      let mode: OverlayMode = 'missing';
      if (merged.has(relation.name)) {
        mode = 'merged';
      } else if (present.has(relation.name)) {
        mode = 'aliased';
      }
      return { name: relation.name, mode, extended: extended.has(relation.name) };
    }),
  };
}

/**
 * Namespace catalog readers should query: the merge namespace once installed
 */
export async function readableSchema(session: CatalogSession, settings: CatalogSettings): Promise<string> {
  return (await session.introspector.schemaExists(settings.mergeSchema))
    ? settings.mergeSchema
    : settings.nativeSchema;
}
