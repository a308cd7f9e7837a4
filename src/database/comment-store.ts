/**
 * pg-backed ExtendedCommentStore for one extended table
 */

import type { ObjectKindDefinition } from '../catalog/kinds.js';
import { quoteIdentifier, renderExpression, renderName } from '../ddl/render.js';
import { QualifiedName, SqlExpression, col, qualified } from '../ddl/statements.js';
import type { CommentKey, ExtendedCommentStore } from '../generator/comment-policy.js';
import { NATIVE_ALIAS } from '../generator/merge-view.js';
import type { CatalogSettings } from '../types/index.js';
import type { Queryable } from './client.js';

/**
 * Non-key columns filled from the matching native row on insert
 */
export interface CarriedColumns {
  native: QualifiedName;
  /** Native-side expression per key column, in key order */
  keys: readonly SqlExpression[];
  columns: ReadonlyArray<{ name: string; value: SqlExpression }>;
}

export class PgExtendedCommentStore implements ExtendedCommentStore {
  constructor(
    private readonly db: Queryable,
    private readonly table: QualifiedName,
    private readonly keyColumns: readonly string[],
    private readonly commentColumn: string,
    private readonly carried: CarriedColumns | null = null
  ) {}

  private keyValues(key: CommentKey): Array<string | number> {
    return this.keyColumns.map(column => {
      const value = key[column];
      if (value === undefined) {
        throw new Error(`Missing key column ${column} for ${this.table.schema}.${this.table.name}`);
      }
      return value;
    });
  }

  private whereKey(offset: number): string {
    return this.keyColumns.map((column, i) => `${quoteIdentifier(column)} = $${i + offset}`).join(' AND ');
  }

  async exists(key: CommentKey): Promise<boolean> {
    const result = await this.db.query<{ found: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM ${renderName(this.table)} WHERE ${this.whereKey(1)}) AS found`,
      this.keyValues(key)
    );
    return result.rows[0]?.found === true;
  }

  async insert(key: CommentKey, comment: string): Promise<void> {
    const keyValues = this.keyValues(key);
    const keyCount = this.keyColumns.length;
    const carried = this.carried?.columns ?? [];

    const columns = [...this.keyColumns, ...carried.map(column => column.name), this.commentColumn];
    const values = this.keyColumns.map((_, i) => `$${i + 1}`);
    const params: Array<string | number> = [...keyValues, comment];

    if (this.carried && carried.length > 0) {
      // The native lookup gets its own copy of the key parameters
      const nativeWhere = this.carried.keys
        .map((expr, i) => `${renderExpression(expr)} = $${keyCount + 2 + i}`)
        .join(' AND ');
      const from = `${renderName(this.carried.native)} ${NATIVE_ALIAS}`;
      for (const column of carried) {
        values.push(`(SELECT ${renderExpression(column.value)} FROM ${from} WHERE ${nativeWhere} LIMIT 1)`);
      }
      params.push(...keyValues);
    }
    values.push(`$${keyCount + 1}`);

    await this.db.query(
      `INSERT INTO ${renderName(this.table)} (${columns.map(quoteIdentifier).join(', ')}) VALUES (${values.join(', ')})`,
      params
    );
  }

  async update(key: CommentKey, comment: string): Promise<void> {
    await this.db.query(
      `UPDATE ${renderName(this.table)} SET ${quoteIdentifier(this.commentColumn)} = $1 WHERE ${this.whereKey(2)}`,
      [comment, ...this.keyValues(key)]
    );
  }

  async delete(key: CommentKey): Promise<void> {
    await this.db.query(`DELETE FROM ${renderName(this.table)} WHERE ${this.whereKey(1)}`, this.keyValues(key));
  }
}

/**
 * Store for one kind's extended table. Carried columns take the same values
 * import would give them.
 */
export function commentStoreFor(
  db: Queryable,
  definition: ObjectKindDefinition,
  settings: CatalogSettings
): PgExtendedCommentStore {
  const nativeValue = (column: string): SqlExpression =>
    definition.importValues[column] ?? col(NATIVE_ALIAS, column);

  const carried: CarriedColumns | null =
    definition.carried.length > 0
      ? {
          native: qualified(settings.nativeSchema, definition.table),
          keys: definition.keys.map(key => nativeValue(key.name)),
          columns: definition.carried.map(column => ({ name: column.name, value: nativeValue(column.name) })),
        }
      : null;

  return new PgExtendedCommentStore(
    db,
    qualified(settings.extendedSchema, definition.table),
    definition.keys.map(key => key.name),
    settings.commentColumn,
    carried
  );
}
