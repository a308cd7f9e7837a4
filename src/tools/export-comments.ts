/**
 * Export Comments tool - Render (and optionally apply) native COMMENT ON
 * statements for every extended comment
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { applyExport, exportStatements } from '../sync/export.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface ExportCommentsToolInput {
  apply: boolean;
}

export async function executeExportCommentsTool(input: ExportCommentsToolInput): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const db = getCatalogDatabase();

    if (input.apply) {
      const summary = await applyExport(db, settings);
      return textResult(
        [
          '# Export Applied',
          '',
          `- **Statements executed**: ${summary.applied}`,
          `- **Truncated comments**: ${summary.truncated}`,
        ].join('\n')
      );
    }

    const statements: string[] = [];
    let truncated = 0;
    for await (const exported of exportStatements(db, settings)) {
      statements.push(`${exported.sql};${exported.truncated ? ' -- truncated' : ''}`);
      if (exported.truncated) truncated++;
    }

    const lines: string[] = [
      '# Export Preview',
      '',
      `${statements.length} statement(s), ${truncated} truncated to ${settings.nativeCommentLimit} characters.`,
      '',
      '```sql',
      ...statements,
      '```',
    ];

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('exporting comments', error);
  }
}
