/**
 * Statement model
 *
 * Generators build these values; renderStatement() turns them into SQL and
 * a CatalogSession executes them. Nothing here touches a connection, so
 * generation can be tested without a database.
 */

import type { CommentWritePolicy } from '../generator/comment-policy.js';

export interface QualifiedName {
  readonly schema: string;
  readonly name: string;
}

// ─── Expressions ────────────────────────────────────────────────────────────

export type SqlExpression =
  | { readonly type: 'column'; readonly source?: string; readonly column: string }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'coalesce'; readonly args: readonly SqlExpression[] }
  | { readonly type: 'concat'; readonly args: readonly SqlExpression[] }
  /** value itself, or fallback when value is null or '' */
  | { readonly type: 'blank_default'; readonly value: SqlExpression; readonly fallback: SqlExpression };

export type SqlCondition =
  | { readonly type: 'equals'; readonly left: SqlExpression; readonly right: SqlExpression }
  | { readonly type: 'not_null'; readonly expr: SqlExpression }
  | { readonly type: 'not_blank'; readonly expr: SqlExpression };

export interface SelectItem {
  readonly expr: SqlExpression;
  readonly alias?: string;
}

export interface TableRef {
  readonly table: QualifiedName;
  readonly alias: string;
}

export interface JoinClause {
  readonly type: 'left' | 'inner';
  readonly table: TableRef;
  readonly on: readonly SqlCondition[];
}

export interface SelectQuery {
  readonly items: readonly SelectItem[];
  readonly from: TableRef;
  readonly join?: JoinClause;
  readonly where?: readonly SqlCondition[];
  readonly orderBy?: readonly SqlExpression[];
}

// ─── Statements ─────────────────────────────────────────────────────────────

export interface CreateSchemaStatement {
  readonly type: 'create_schema';
  readonly schema: string;
}

export type ColumnType = 'text' | 'integer' | 'char1';

export type TableCheck =
  | { readonly type: 'in'; readonly name: string; readonly column: string; readonly values: readonly string[] }
  | { readonly type: 'min'; readonly name: string; readonly column: string; readonly min: number };

export interface CreateTableStatement {
  readonly type: 'create_table';
  readonly name: QualifiedName;
  readonly columns: ReadonlyArray<{ readonly name: string; readonly type: ColumnType; readonly notNull: boolean }>;
  readonly primaryKey: readonly string[];
  readonly checks: readonly TableCheck[];
}

export interface CreateViewStatement {
  readonly type: 'create_view';
  readonly name: QualifiedName;
  readonly query: SelectQuery;
}

/** Pass-through view standing in for a native relation without extended comments */
export interface CreateAliasStatement {
  readonly type: 'create_alias';
  readonly name: QualifiedName;
  readonly target: QualifiedName;
}

export interface KeyBinding {
  readonly column: string;
  /** Native side may be null; stored as '' in the extended table */
  readonly blankWhenNull: boolean;
}

export interface CreateTriggerFunctionStatement {
  readonly type: 'create_trigger_function';
  readonly name: QualifiedName;
  readonly target: QualifiedName;
  readonly keys: readonly KeyBinding[];
  /** Extended-table columns copied from the OLD row on insert */
  readonly carried: readonly string[];
  readonly commentColumn: string;
  /** Indexed [row exists][new value is null] */
  readonly policy: CommentWritePolicy;
}

export interface CreateTriggerStatement {
  readonly type: 'create_trigger';
  readonly name: string;
  readonly on: QualifiedName;
  readonly fn: QualifiedName;
}

export type DropTarget =
  | { readonly type: 'view' | 'table'; readonly name: QualifiedName }
  | { readonly type: 'trigger'; readonly name: string; readonly on: QualifiedName }
  | { readonly type: 'function' | 'procedure'; readonly name: QualifiedName; readonly signature: string }
  | { readonly type: 'schema'; readonly schema: string };

export interface DropStatement {
  readonly type: 'drop';
  readonly target: DropTarget;
}

export interface DeleteAllStatement {
  readonly type: 'delete_all';
  readonly table: QualifiedName;
  readonly where?: readonly SqlCondition[];
}

export interface InsertSelectStatement {
  readonly type: 'insert_select';
  readonly table: QualifiedName;
  readonly columns: readonly string[];
  readonly query: SelectQuery;
}

export interface CommentOnStatement {
  readonly type: 'comment_on';
  /** TABLE, COLUMN, SCHEMA, ... */
  readonly objectType: string;
  /** Already-quoted object reference */
  readonly target: string;
  readonly comment: string;
}

export type SqlStatement =
  | CreateSchemaStatement
  | CreateTableStatement
  | CreateViewStatement
  | CreateAliasStatement
  | CreateTriggerFunctionStatement
  | CreateTriggerStatement
  | DropStatement
  | DeleteAllStatement
  | InsertSelectStatement
  | CommentOnStatement;

// ─── Builders ───────────────────────────────────────────────────────────────

export function qualified(schema: string, name: string): QualifiedName {
  return { schema, name };
}

export function col(source: string | undefined, column: string): SqlExpression {
  return source === undefined ? { type: 'column', column } : { type: 'column', source, column };
}

export function str(value: string): SqlExpression {
  return { type: 'string', value };
}

export function coalesce(...args: SqlExpression[]): SqlExpression {
  return { type: 'coalesce', args };
}

export function equals(left: SqlExpression, right: SqlExpression): SqlCondition {
  return { type: 'equals', left, right };
}
