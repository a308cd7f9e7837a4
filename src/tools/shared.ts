/**
 * Helpers shared by the tool executors
 */

import type { ToolResponse } from '../types/index.js';

export function textResult(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(action: string, error: unknown): ToolResponse {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';

  return {
    content: [{ type: 'text', text: `Error ${action}: ${errorMessage}` }],
    isError: true,
  };
}
