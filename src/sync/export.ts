/**
 * Export: extended comments → native COMMENT ON statements
 *
 * The native comment column holds at most nativeCommentLimit characters;
 * longer text is cut, marked with an ellipsis and flagged as truncated.
 */

import { OBJECT_KINDS, ObjectKindDefinition } from '../catalog/kinds.js';
import type { CatalogDatabase, CatalogSession } from '../catalog/session.js';
import { renderStatement } from '../ddl/render.js';
import { CommentOnStatement, SelectQuery, SqlExpression, col, qualified } from '../ddl/statements.js';
import { SyncError } from '../errors.js';
import { EXTENDED_ALIAS, NATIVE_ALIAS, joinConditions } from '../generator/merge-view.js';
import type { CatalogRow, CatalogSettings, ExportSummary } from '../types/index.js';

export const TRUNCATION_MARKER = '...';

export interface EncodedComment {
  text: string;
  truncated: boolean;
}

export interface ExportedComment {
  kind: string;
  statement: CommentOnStatement;
  sql: string;
  truncated: boolean;
}

/**
 * Fit a comment into the native ceiling. Lengths are counted in characters
 * (code points), not UTF-16 units.
 */
export function encodeComment(text: string, limit: number): EncodedComment {
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return { text, truncated: false };
  }
  return {
    text: chars.slice(0, limit - TRUNCATION_MARKER.length).join('') + TRUNCATION_MARKER,
    truncated: true,
  };
}

export function buildExportQuery(definition: ObjectKindDefinition, settings: CatalogSettings): SelectQuery {
  const nativeColumns = definition.comment?.nativeColumns ?? [];
  const keys = definition.keys.map(key => col(EXTENDED_ALIAS, key.name));
  const extras: SqlExpression[] = nativeColumns.map(column => col(NATIVE_ALIAS, column));

  return {
    items: [...keys, ...extras, col(EXTENDED_ALIAS, settings.commentColumn)].map(expr => ({ expr })),
    from: { table: qualified(settings.extendedSchema, definition.table), alias: EXTENDED_ALIAS },
    join: {
      type: 'inner',
      table: { table: qualified(settings.nativeSchema, definition.table), alias: NATIVE_ALIAS },
      on: joinConditions(definition.keys.map(key => ({ column: key.name, blankWhenNull: false }))),
    },
    where: [{ type: 'not_null', expr: col(EXTENDED_ALIAS, settings.commentColumn) }],
    orderBy: keys,
  };
}

export function exportComment(
  definition: ObjectKindDefinition,
  row: CatalogRow,
  settings: CatalogSettings
): ExportedComment | null {
  const value = row[settings.commentColumn];
  if (!definition.comment || value === null || value === undefined) {
    return null;
  }

  const encoded = encodeComment(String(value), settings.nativeCommentLimit);
  const { objectType, target } = definition.comment.target(row);
  const statement: CommentOnStatement = {
    type: 'comment_on',
    objectType,
    target,
    comment: encoded.text,
  };

  return {
    kind: definition.kind,
    statement,
    sql: renderStatement(statement),
    truncated: encoded.truncated,
  };
}

async function isExportable(
  session: CatalogSession,
  definition: ObjectKindDefinition,
  settings: CatalogSettings
): Promise<boolean> {
  if (!definition.comment) {
    return false;
  }
  const { introspector } = session;
  return (
    (await introspector.relationExists(settings.nativeSchema, definition.table)) &&
    (await introspector.relationExists(settings.extendedSchema, definition.table))
  );
}

async function* exportKind(
  session: CatalogSession,
  definition: ObjectKindDefinition,
  settings: CatalogSettings
): AsyncGenerator<ExportedComment> {
  const rows = await session.select(buildExportQuery(definition, settings));
  for (const row of rows) {
    const exported = exportComment(definition, row, settings);
    if (exported) {
      yield exported;
    }
  }
}

/**
 * One statement per extended comment that has a native counterpart. Each
 * call re-reads the store, so two runs over unchanged data yield the same
 * statements in the same order.
 */
export async function* exportStatements(
  session: CatalogSession,
  settings: CatalogSettings
): AsyncGenerator<ExportedComment> {
  for (const definition of OBJECT_KINDS) {
    if (await isExportable(session, definition, settings)) {
      yield* exportKind(session, definition, settings);
    }
  }
}

/**
 * Execute every export statement against the native catalog, one transaction
 * per kind. A failure stops the run; kinds committed before it stay committed
 * and are listed on the SyncError.
 */
export async function applyExport(db: CatalogDatabase, settings: CatalogSettings): Promise<ExportSummary> {
  const summary: ExportSummary = { applied: 0, truncated: 0 };
  const committed: string[] = [];

  for (const definition of OBJECT_KINDS) {
    try {
      if (!(await isExportable(db, definition, settings))) {
        continue;
      }

      const kindSummary = await db.transaction(async tx => {
        const counts: ExportSummary = { applied: 0, truncated: 0 };
        for await (const exported of exportKind(tx, definition, settings)) {
          await tx.execute(exported.statement);
          counts.applied++;
          if (exported.truncated) {
            counts.truncated++;
          }
        }
        return counts;
      });

      summary.applied += kindSummary.applied;
      summary.truncated += kindSummary.truncated;
      committed.push(definition.table);
    } catch (error) {
      throw new SyncError(definition.table, committed, error);
    }
  }

  if (summary.truncated > 0) {
    console.warn(
      `Export truncated ${summary.truncated} comment(s) to ${settings.nativeCommentLimit} characters`
    );
  }
  console.log(`Export applied ${summary.applied} comment(s) to ${settings.nativeSchema}`);

  return summary;
}
