/**
 * CatalogDatabase over pg
 */

import { PgCatalogIntrospector } from '../catalog/introspector.js';
import type { CatalogDatabase, CatalogSession } from '../catalog/session.js';
import { renderSelect, renderStatement } from '../ddl/render.js';
import type { SelectQuery, SqlStatement } from '../ddl/statements.js';
import type { CatalogRow } from '../types/index.js';
import { Queryable, poolQueryable, withTransaction } from './client.js';

class PgCatalogSession implements CatalogSession {
  readonly introspector: PgCatalogIntrospector;

  constructor(protected readonly db: Queryable) {
    this.introspector = new PgCatalogIntrospector(db);
  }

  async execute(statement: SqlStatement): Promise<number> {
    const result = await this.db.query(renderStatement(statement));
    return result.rowCount ?? 0;
  }

  async select(query: SelectQuery): Promise<CatalogRow[]> {
    const result = await this.db.query<CatalogRow>(renderSelect(query));
    return result.rows;
  }
}

export class PgCatalogDatabase extends PgCatalogSession implements CatalogDatabase {
  constructor(
    db: Queryable = poolQueryable,
    private readonly runInTransaction: <T>(work: (client: Queryable) => Promise<T>) => Promise<T> = withTransaction
  ) {
    super(db);
  }

  transaction<T>(work: (session: CatalogSession) => Promise<T>): Promise<T> {
    return this.runInTransaction(client => work(new PgCatalogSession(client)));
  }
}

let catalogDatabase: PgCatalogDatabase | null = null;

/**
 * Shared pool-backed catalog database
 */
export function getCatalogDatabase(): PgCatalogDatabase {
  if (!catalogDatabase) {
    catalogDatabase = new PgCatalogDatabase();
  }
  return catalogDatabase;
}
