/**
 * Catalog Status tool - How each native relation is exposed by the overlay
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { describeOverlay, readableSchema } from '../orchestrator/status.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

export async function executeCatalogStatusTool(_input: Record<string, never>): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const db = getCatalogDatabase();
    const status = await describeOverlay(db, settings);
    const readable = await readableSchema(db, settings);

    const lines: string[] = [
      '# Comment Catalog Status',
      '',
      `- **Native catalog**: ${settings.nativeSchema}`,
      `- **Extended store**: ${settings.extendedSchema}`,
      `- **Merge namespace**: ${settings.mergeSchema} (${status.installed ? 'installed' : 'not installed'})`,
      `- **Native comment limit**: ${settings.nativeCommentLimit} characters`,
      `- **Readers should query**: ${readable}`,
      '',
      '| Relation | Exposed as | Extended table |',
      '|----------|------------|----------------|',
    ];

    for (const relation of status.relations) {
      lines.push(`| ${relation.name} | ${relation.mode} | ${relation.extended ? 'yes' : 'no'} |`);
    }

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('reading catalog status', error);
  }
}
