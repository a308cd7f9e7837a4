/**
 * Copy Routine Comments tool - Reuse one overload's comments for another
 */

import { getCatalogSettings } from '../config.js';
import { getCatalogDatabase } from '../database/pg-catalog.js';
import { copyRoutineComments } from '../sync/import.js';
import type { ToolResponse } from '../types/index.js';
import { errorResult, textResult } from './shared.js';

interface CopyRoutineCommentsToolInput {
  schema: string;
  from_specific_name: string;
  to_specific_name: string;
}

export async function executeCopyRoutineCommentsTool(input: CopyRoutineCommentsToolInput): Promise<ToolResponse> {
  try {
    const copied = await copyRoutineComments(
      getCatalogDatabase(),
      getCatalogSettings(),
      input.schema,
      input.from_specific_name,
      input.to_specific_name
    );

    return textResult(
      `Copied ${copied} comment row(s) from ${input.schema}.${input.from_specific_name} to ${input.schema}.${input.to_specific_name}.`
    );
  } catch (error) {
    return errorResult('copying routine comments', error);
  }
}
