/**
 * Catalog introspection
 * Reads relation, column, key, trigger and routine metadata from pg_catalog
 */

import type { Queryable } from '../database/client.js';
import { MetadataNotFoundError } from '../errors.js';
import type { ColumnMeta, RelationInfo, RoutineRef, TriggerRef } from '../types/index.js';

export interface CatalogIntrospector {
  schemaExists(schema: string): Promise<boolean>;
  relationExists(schema: string, relation: string): Promise<boolean>;
  listRelations(schema: string): Promise<RelationInfo[]>;
  /** Columns in declared order; throws MetadataNotFoundError for a missing relation */
  columnsOf(schema: string, relation: string): Promise<ColumnMeta[]>;
  listTriggers(schema: string): Promise<TriggerRef[]>;
  listRoutines(schema: string): Promise<RoutineRef[]>;
}

export class PgCatalogIntrospector implements CatalogIntrospector {
  constructor(private readonly db: Queryable) {}

  async schemaExists(schema: string): Promise<boolean> {
    const result = await this.db.query<{ found: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM pg_namespace WHERE nspname = $1) AS found',
      [schema]
    );
    return result.rows[0]?.found === true;
  }

  async relationExists(schema: string, relation: string): Promise<boolean> {
    const result = await this.db.query<{ found: boolean }>(
      `
      SELECT EXISTS (
        SELECT 1
        FROM pg_class c
        JOIN pg_namespace n ON c.relnamespace = n.oid
        WHERE n.nspname = $1
          AND c.relname = $2
          AND c.relkind IN ('r', 'p', 'v', 'm', 'f')
      ) AS found
      `,
      [schema, relation]
    );
    return result.rows[0]?.found === true;
  }

  async listRelations(schema: string): Promise<RelationInfo[]> {
    const result = await this.db.query<{ relname: string; relkind: string }>(
      `
      SELECT c.relname, c.relkind
      FROM pg_class c
      JOIN pg_namespace n ON c.relnamespace = n.oid
      WHERE n.nspname = $1
        AND c.relkind IN ('r', 'p', 'v', 'm', 'f')
      ORDER BY c.relname
      `,
      [schema]
    );

    return result.rows.map(row => ({
      name: row.relname,
      type: row.relkind === 'v' || row.relkind === 'm' ? 'view' : 'table',
    }));
  }

  async columnsOf(schema: string, relation: string): Promise<ColumnMeta[]> {
    // indkey is 0-based; shift to a 1-based place in the primary key
    const result = await this.db.query<{
      column_name: string;
      position: number;
      nullable: boolean;
      textual: boolean;
      key_position: number | null;
    }>(
      `
      SELECT
        a.attname AS column_name,
        a.attnum AS position,
        NOT a.attnotnull AS nullable,
        t.typcategory = 'S' AS textual,
        k.key_position
      FROM pg_attribute a
      JOIN pg_class c ON a.attrelid = c.oid
      JOIN pg_namespace n ON c.relnamespace = n.oid
      JOIN pg_type t ON a.atttypid = t.oid
      LEFT JOIN LATERAL (
        SELECT array_position(i.indkey::int2[], a.attnum) - array_lower(i.indkey::int2[], 1) + 1 AS key_position
        FROM pg_index i
        WHERE i.indrelid = c.oid
          AND i.indisprimary
      ) k ON true
      WHERE n.nspname = $1
        AND c.relname = $2
        AND a.attnum > 0
        AND NOT a.attisdropped
      ORDER BY a.attnum
      `,
      [schema, relation]
    );

    if (result.rows.length === 0) {
      throw new MetadataNotFoundError(schema, relation);
    }

    return result.rows.map(row => ({
      name: row.column_name,
      position: row.position,
      nullable: row.nullable,
      textual: row.textual,
      keyPosition: row.key_position,
    }));
  }

  async listTriggers(schema: string): Promise<TriggerRef[]> {
    const result = await this.db.query<{ trigger_name: string; table_name: string }>(
      `
      SELECT t.tgname AS trigger_name, c.relname AS table_name
      FROM pg_trigger t
      JOIN pg_class c ON t.tgrelid = c.oid
      JOIN pg_namespace n ON c.relnamespace = n.oid
      WHERE n.nspname = $1
        AND NOT t.tgisinternal
      ORDER BY c.relname, t.tgname
      `,
      [schema]
    );

    return result.rows.map(row => ({ name: row.trigger_name, table: row.table_name }));
  }

  async listRoutines(schema: string): Promise<RoutineRef[]> {
    // prokind: 'f' function, 'p' procedure; aggregates and window functions are not generated here
    const result = await this.db.query<{ proname: string; prokind: string; signature: string }>(
      `
      SELECT
        p.proname,
        p.prokind,
        pg_get_function_identity_arguments(p.oid) AS signature
      FROM pg_proc p
      JOIN pg_namespace n ON p.pronamespace = n.oid
      WHERE n.nspname = $1
        AND p.prokind IN ('f', 'p')
      ORDER BY p.proname, signature
      `,
      [schema]
    );

    return result.rows.map(row => ({
      name: row.proname,
      type: row.prokind === 'p' ? 'procedure' : 'function',
      signature: row.signature,
    }));
  }
}
