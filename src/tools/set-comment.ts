/**
 * Set Comment tool - Write or clear an extended comment
 */

import { getCatalogSettings } from '../config.js';
import { withTransaction } from '../database/client.js';
import { commentStoreFor } from '../database/comment-store.js';
import { CommentKey, applyCommentWrite } from '../generator/comment-policy.js';
import type { ToolResponse } from '../types/index.js';
import { resolveKey } from './get-comment.js';
import { errorResult, textResult } from './shared.js';

interface SetCommentToolInput {
  relation: string;
  key: CommentKey;
  comment: string | null;
}

const ACTION_MESSAGES = {
  insert: 'Extended comment created.',
  update: 'Extended comment updated.',
  delete: 'Extended comment removed; the native comment applies again.',
  noop: 'No extended comment existed; nothing to clear.',
} as const;

export async function executeSetCommentTool(input: SetCommentToolInput): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const { definition } = resolveKey(input.relation, input.key);

    const action = await withTransaction(client =>
      applyCommentWrite(commentStoreFor(client, definition, settings), input.key, input.comment)
    );

    const length = input.comment === null ? 0 : Array.from(input.comment).length;
    const lines: string[] = [ACTION_MESSAGES[action]];
    if (length > settings.nativeCommentLimit) {
      lines.push(
        '',
        `> ${length} characters: export will truncate this to ${settings.nativeCommentLimit} in ${settings.nativeSchema}.`
      );
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('writing comment', error);
  }
}
