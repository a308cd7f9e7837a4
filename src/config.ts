/**
 * Configuration module for doccat
 * Parses and validates environment variables
 */

import { z } from 'zod';
import type { CatalogSettings } from './types/index.js';

const identifier = z.string().min(1).max(63);

const configSchema = z.object({
  databaseUrl: z.string().url().describe('PostgreSQL connection URL'),
  nativeSchema: identifier.default('syscat').describe('Native catalog namespace (read-only)'),
  extendedSchema: identifier.default('docdata').describe('Namespace of the extended comment tables'),
  mergeSchema: identifier.default('doccat').describe('Namespace of the generated merge views'),
  commentColumn: identifier.default('remarks'),
  nativeCommentLimit: z.number().int().min(4).default(254),
  queryTimeoutMs: z.number().int().positive().default(30000),
  mcpPort: z.number().int().positive().default(3000),
  mcpAuthToken: z.string().min(1).optional().describe('Bearer token required on /mcp when --auth is set'),
  enableAdminTools: z.boolean().default(false).describe('Expose install/uninstall over MCP'),
});

export type Config = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function loadConfig(): Config {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const rawConfig = {
    databaseUrl,
    nativeSchema: process.env.NATIVE_SCHEMA || undefined,
    extendedSchema: process.env.EXTENDED_SCHEMA || undefined,
    mergeSchema: process.env.MERGE_SCHEMA || undefined,
    commentColumn: process.env.COMMENT_COLUMN || undefined,
    nativeCommentLimit: parseInteger(process.env.NATIVE_COMMENT_LIMIT),
    queryTimeoutMs: parseInteger(process.env.QUERY_TIMEOUT_MS),
    mcpPort: parseInteger(process.env.MCP_PORT),
    mcpAuthToken: process.env.MCP_AUTH_TOKEN || undefined,
    enableAdminTools: process.env.ENABLE_ADMIN_TOOLS === 'true',
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const { nativeSchema, extendedSchema, mergeSchema } = result.data;
  if (new Set([nativeSchema, extendedSchema, mergeSchema]).size !== 3) {
    throw new Error('Invalid configuration: native, extended and merge schemas must be distinct');
  }

  return result.data;
}

// Singleton config instance
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Namespace and limit settings for the catalog core
 */
export function getCatalogSettings(): CatalogSettings {
  const config = getConfig();
  return {
    nativeSchema: config.nativeSchema,
    extendedSchema: config.extendedSchema,
    mergeSchema: config.mergeSchema,
    commentColumn: config.commentColumn,
    nativeCommentLimit: config.nativeCommentLimit,
  };
}
