/**
 * Preview DDL tool - Show the merge view and trigger a relation would get,
 * without executing anything
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { renderStatement } from '../ddl/render.js';
import { generateAlias, generateMergeStatements } from '../orchestrator/install.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface PreviewDdlToolInput {
  relation: string;
}

export async function executePreviewDdlTool(input: PreviewDdlToolInput): Promise<ToolResponse> {
  try {
    const settings = getCatalogSettings();
    const db = getCatalogDatabase();

    const extended = await db.introspector.relationExists(settings.extendedSchema, input.relation);
    const statements = extended
      ? await generateMergeStatements(db, input.relation, settings)
      : [generateAlias(input.relation, settings)];

    const lines: string[] = [
      `## ${settings.mergeSchema}.${input.relation}`,
      '',
      extended
        ? `Merge view over ${settings.nativeSchema}.${input.relation} and ${settings.extendedSchema}.${input.relation}, with write-through trigger.`
        : `No extended table; ${settings.nativeSchema}.${input.relation} is aliased through unchanged.`,
      '',
      '```sql',
      statements.map(statement => `${renderStatement(statement)};`).join('\n\n'),
      '```',
    ];

    return textResult(lines.join('\n'));
  } catch (error) {
    return errorResult('generating DDL preview', error);
  }
}
