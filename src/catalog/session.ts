/**
 * Port between the catalog core and a database
 *
 * The generators, sync engine and orchestrator only ever talk to these
 * interfaces; PgCatalogDatabase implements them over pg.
 */

import type { SelectQuery, SqlStatement } from '../ddl/statements.js';
import type { CatalogRow } from '../types/index.js';
import type { CatalogIntrospector } from './introspector.js';

export interface CatalogSession {
  readonly introspector: CatalogIntrospector;
  /** Run one statement; resolves to the affected row count (0 for DDL) */
  execute(statement: SqlStatement): Promise<number>;
  select(query: SelectQuery): Promise<CatalogRow[]>;
}

export interface CatalogDatabase extends CatalogSession {
  /** Commit when work resolves, roll back when it rejects */
  transaction<T>(work: (session: CatalogSession) => Promise<T>): Promise<T>;
}
