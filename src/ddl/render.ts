/**
 * SQL rendering for the statement model (PostgreSQL dialect)
 */

import type { CommentWriteAction } from '../generator/comment-policy.js';
import type {
  CreateTriggerFunctionStatement,
  DropTarget,
  QualifiedName,
  SelectQuery,
  SqlCondition,
  SqlExpression,
  SqlStatement,
  TableCheck,
} from './statements.js';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderName(name: QualifiedName): string {
  return `${quoteIdentifier(name.schema)}.${quoteIdentifier(name.name)}`;
}

export function renderExpression(expr: SqlExpression): string {
  switch (expr.type) {
    case 'column':
      return expr.source === undefined
        ? quoteIdentifier(expr.column)
        : `${expr.source}.${quoteIdentifier(expr.column)}`;
    case 'string':
      return quoteLiteral(expr.value);
    case 'coalesce':
      return `COALESCE(${expr.args.map(renderExpression).join(', ')})`;
    case 'concat':
      return expr.args.map(renderExpression).join(' || ');
    case 'blank_default': {
      const value = renderExpression(expr.value);
      return `CASE WHEN COALESCE(${value}, '') = '' THEN ${renderExpression(expr.fallback)} ELSE ${value} END`;
    }
  }
}

export function renderCondition(condition: SqlCondition): string {
  switch (condition.type) {
    case 'equals':
      return `${renderExpression(condition.left)} = ${renderExpression(condition.right)}`;
    case 'not_null':
      return `${renderExpression(condition.expr)} IS NOT NULL`;
    case 'not_blank':
      return `COALESCE(${renderExpression(condition.expr)}, '') <> ''`;
  }
}

function renderConditions(conditions: readonly SqlCondition[]): string {
  return conditions.map(renderCondition).join(' AND ');
}

export function renderSelect(query: SelectQuery): string {
  const items = query.items
    .map(item => {
      const expr = renderExpression(item.expr);
      return item.alias === undefined ? expr : `${expr} AS ${quoteIdentifier(item.alias)}`;
    })
    .join(', ');

  let sql = `SELECT ${items} FROM ${renderName(query.from.table)} ${query.from.alias}`;

  if (query.join) {
    const joinType = query.join.type === 'left' ? 'LEFT JOIN' : 'JOIN';
    sql += ` ${joinType} ${renderName(query.join.table.table)} ${query.join.table.alias}`;
    sql += ` ON ${renderConditions(query.join.on)}`;
  }
  if (query.where && query.where.length > 0) {
    sql += ` WHERE ${renderConditions(query.where)}`;
  }
  if (query.orderBy && query.orderBy.length > 0) {
    sql += ` ORDER BY ${query.orderBy.map(renderExpression).join(', ')}`;
  }

  return sql;
}

const COLUMN_TYPES = {
  text: 'TEXT',
  integer: 'INTEGER',
  char1: 'CHAR(1)',
} as const;

function renderCheck(check: TableCheck): string {
  const body =
    check.type === 'in'
      ? `${quoteIdentifier(check.column)} IN (${check.values.map(quoteLiteral).join(', ')})`
      : `${quoteIdentifier(check.column)} >= ${check.min}`;
  return `CONSTRAINT ${quoteIdentifier(check.name)} CHECK (${body})`;
}

function renderDropTarget(target: DropTarget): string {
  switch (target.type) {
    case 'view':
      return `VIEW ${renderName(target.name)}`;
    case 'table':
      return `TABLE ${renderName(target.name)}`;
    case 'trigger':
      return `TRIGGER ${quoteIdentifier(target.name)} ON ${renderName(target.on)}`;
    case 'function':
      return `FUNCTION ${renderName(target.name)}(${target.signature})`;
    case 'procedure':
      return `PROCEDURE ${renderName(target.name)}(${target.signature})`;
    case 'schema':
      return `SCHEMA ${quoteIdentifier(target.schema)}`;
  }
}

/**
 * Body of the INSTEAD OF UPDATE trigger function. Each branch is read off the
 * statement's policy table, so the four cells stay in one place.
 */
function renderTriggerBody(statement: CreateTriggerFunctionStatement): string {
  const table = renderName(statement.target);
  const comment = quoteIdentifier(statement.commentColumn);
  const oldKey = (binding: { column: string; blankWhenNull: boolean }): string => {
    const ref = `OLD.${quoteIdentifier(binding.column)}`;
    return binding.blankWhenNull ? `COALESCE(${ref}, '')` : ref;
  };
  const whereKey = statement.keys
    .map(binding => `${quoteIdentifier(binding.column)} = ${oldKey(binding)}`)
    .join(' AND ');

  const insertColumns = [
    ...statement.keys.map(binding => quoteIdentifier(binding.column)),
    ...statement.carried.map(quoteIdentifier),
    comment,
  ];
  const insertValues = [
    ...statement.keys.map(oldKey),
    ...statement.carried.map(column => `OLD.${quoteIdentifier(column)}`),
    `NEW.${comment}`,
  ];

  const actions: Record<CommentWriteAction, string> = {
    insert: `INSERT INTO ${table} (${insertColumns.join(', ')}) VALUES (${insertValues.join(', ')});`,
    update: `UPDATE ${table} SET ${comment} = NEW.${comment} WHERE ${whereKey};`,
    delete: `DELETE FROM ${table} WHERE ${whereKey};`,
    noop: 'NULL;',
  };

  const branch = (cells: { null: CommentWriteAction; value: CommentWriteAction }, indent: string): string[] => [
    `${indent}IF NULLIF(NEW.${comment}, '') IS NULL THEN`,
    `${indent}  ${actions[cells.null]}`,
    `${indent}ELSE`,
    `${indent}  ${actions[cells.value]}`,
    `${indent}END IF;`,
  ];

  return [
    'BEGIN',
    `  IF NOT EXISTS (SELECT 1 FROM ${table} WHERE ${whereKey}) THEN`,
    ...branch(statement.policy.absent, '    '),
    '  ELSE',
    ...branch(statement.policy.present, '    '),
    '  END IF;',
    '  RETURN NEW;',
    'END',
  ].join('\n');
}

export function renderStatement(statement: SqlStatement): string {
  switch (statement.type) {
    case 'create_schema':
      return `CREATE SCHEMA ${quoteIdentifier(statement.schema)}`;

    case 'create_table': {
      const parts = statement.columns.map(
        column => `${quoteIdentifier(column.name)} ${COLUMN_TYPES[column.type]}${column.notNull ? ' NOT NULL' : ''}`
      );
      parts.push(`PRIMARY KEY (${statement.primaryKey.map(quoteIdentifier).join(', ')})`);
      parts.push(...statement.checks.map(renderCheck));
      return `CREATE TABLE ${renderName(statement.name)} (${parts.join(', ')})`;
    }

    case 'create_view':
      return `CREATE VIEW ${renderName(statement.name)} AS ${renderSelect(statement.query)}`;

    case 'create_alias':
      return `CREATE VIEW ${renderName(statement.name)} AS SELECT * FROM ${renderName(statement.target)}`;

    case 'create_trigger_function':
      return [
        `CREATE FUNCTION ${renderName(statement.name)}() RETURNS trigger LANGUAGE plpgsql AS $doccat$`,
        renderTriggerBody(statement),
        '$doccat$',
      ].join('\n');

    case 'create_trigger':
      return (
        `CREATE TRIGGER ${quoteIdentifier(statement.name)} INSTEAD OF UPDATE ON ${renderName(statement.on)} ` +
        `FOR EACH ROW EXECUTE FUNCTION ${renderName(statement.fn)}()`
      );

    case 'drop':
      return `DROP ${renderDropTarget(statement.target)} RESTRICT`;

    case 'delete_all':
      return statement.where && statement.where.length > 0
        ? `DELETE FROM ${renderName(statement.table)} WHERE ${renderConditions(statement.where)}`
        : `DELETE FROM ${renderName(statement.table)}`;

    case 'insert_select':
      return (
        `INSERT INTO ${renderName(statement.table)} (${statement.columns.map(quoteIdentifier).join(', ')}) ` +
        renderSelect(statement.query)
      );

    case 'comment_on':
      return `COMMENT ON ${statement.objectType} ${statement.target} IS ${quoteLiteral(statement.comment)}`;
  }
}
