/**
 * Get Comment tool - Read one object's comment: merged, extended and native
 */

import { ObjectKindDefinition, findKind } from '../catalog/kinds.js';
import { getCatalogSettings } from '../config.js';
import { rawQuery } from '../database/client.js';
import { quoteIdentifier, renderName } from '../ddl/render.js';
import { qualified } from '../ddl/statements.js';
import type { CommentKey } from '../generator/comment-policy.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface GetCommentToolInput {
  relation: string;
  key: CommentKey;
}

export function resolveKey(
  relation: string,
  key: CommentKey
): { definition: ObjectKindDefinition; columns: string[]; values: Array<string | number> } {
  const definition = findKind(relation);
  if (!definition) {
    throw new Error(`${relation} is not a commentable object kind`);
  }

  const columns = definition.keys.map(column => column.name);
  const values = columns.map(column => {
    const value = key[column];
    if (value === undefined) {
      throw new Error(`Key for ${relation} needs ${columns.join(', ')}; missing ${column}`);
    }
    return value;
  });

  return { definition, columns, values };
}

export async function executeGetCommentTool(input: GetCommentToolInput): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const { columns, values } = resolveKey(input.relation, input.key);
    const where = columns.map((column, i) => `${quoteIdentifier(column)} = $${i + 1}`).join(' AND ');
    const comment = quoteIdentifier(settings.commentColumn);

    const nativeResult = await rawQuery<{ comment: string | null }>(
      `SELECT ${comment} AS comment FROM ${renderName(qualified(settings.nativeSchema, input.relation))} WHERE ${where}`,
      values
    );
    const extendedResult = await rawQuery<{ comment: string | null }>(
      `SELECT ${comment} AS comment FROM ${renderName(qualified(settings.extendedSchema, input.relation))} WHERE ${where}`,
      values
    );

    const nativeComment = nativeResult.rows[0]?.comment ?? null;
    const extendedComment = extendedResult.rows[0]?.comment ?? null;

    if (nativeResult.rows.length === 0 && extendedResult.rows.length === 0) {
      return textResult(`No ${input.relation} object matches ${JSON.stringify(input.key)}.`);
    }

    const lines: string[] = [
      `## ${input.relation} ${values.join('.')}`,
      '',
      '### Effective comment',
      extendedComment ?? nativeComment ?? '*(none)*',
      '',
      `- Extended store: ${extendedComment === null ? 'no entry' : `${Array.from(extendedComment).length} characters`}`,
      `- Native catalog: ${nativeComment === null ? 'no comment' : `${Array.from(nativeComment).length} characters`}`,
    ];
    if (nativeResult.rows.length === 0) {
      lines.push('', '> The native catalog has no such object; export will skip this comment.');
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('reading comment', error);
  }
}
