/**
 * Error types raised by generation, teardown and sync
 */

export class MetadataNotFoundError extends Error {
  public schema: string;
  public relation: string;
  public column: string | null;

  constructor(schema: string, relation: string, column: string | null = null) {
    const target = column ? `Column ${column} of ${schema}.${relation}` : `Relation ${schema}.${relation}`;
    super(`${target} not found in the catalog`);
    this.name = 'MetadataNotFoundError';
    this.schema = schema;
    this.relation = relation;
    this.column = column;
  }
}

export class KeyShapeViolationError extends Error {
  public schema: string;
  public relation: string;

  constructor(schema: string, relation: string) {
    super(`${schema}.${relation} declares no key columns; cannot join it to the native catalog`);
    this.name = 'KeyShapeViolationError';
    this.schema = schema;
    this.relation = relation;
  }
}

export class TeardownBlockedError extends Error {
  public object: string;
  public detail: string;

  constructor(object: string, detail: string) {
    super(`Cannot drop ${object}: ${detail}`);
    this.name = 'TeardownBlockedError';
    this.object = object;
    this.detail = detail;
  }
}

export class SyncError extends Error {
  public failedKind: string;
  public committedKinds: string[];

  constructor(failedKind: string, committedKinds: string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const committed = committedKinds.length > 0 ? committedKinds.join(', ') : 'none';
    super(`Sync of ${failedKind} failed (${reason}); already committed: ${committed}`, { cause });
    this.name = 'SyncError';
    this.failedKind = failedKind;
    this.committedKinds = committedKinds;
  }
}

/**
 * PostgreSQL SQLSTATE 2BP01 (dependent_objects_still_exist)
 */
export function isDependencyError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === '2BP01'
  );
}
