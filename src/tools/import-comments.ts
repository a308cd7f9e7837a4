/**
 * Import Comments tool - Mirror native comments into the extended store
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { SyncError } from '../errors.js';
import { importFromNative } from '../sync/import.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface ImportCommentsToolInput {
  confirm: boolean;
}

export async function executeImportCommentsTool(input: ImportCommentsToolInput): Promise<ToolResponse> {
  if (!input.confirm) {
    return {
      content: [
        {
          type: 'text',
          text:
            'Import replaces every extended comment with the native catalog\'s comments. ' +
            'Extended-only comments and text beyond the native limit are lost. Re-run with confirm=true.',
        },
      ],
      isError: true,
    };
  }

  try {
    const report = await importFromNative(getCatalogDatabase(), getCatalogSettings());

    const lines: string[] = ['# Import Complete', '', '| Relation | Rows |', '|----------|------|'];
    for (const kind of report.kinds) {
      lines.push(`| ${kind.table} | ${kind.rows} |`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    if (error instanceof SyncError) {
      const committed = error.committedKinds.length > 0 ? error.committedKinds.join(', ') : 'none';
      return {
        content: [
          {
            type: 'text',
            text: `Error importing comments: ${error.message}\n\nRefreshed before the failure: ${committed}. ${error.failedKind} and later relations were not touched.`,
          },
        ],
        isError: true,
      };
    }
    return errorResult('importing comments', error);
  }
}
