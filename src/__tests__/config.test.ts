/**
 * Unit tests for config.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadConfig } from '../config.js';

describe('config', () => {
  beforeEach(() => {
    vi.stubEnv('DATABASE_URL', 'postgres://localhost:5432/catalog');
    for (const name of [
      'NATIVE_SCHEMA',
      'EXTENDED_SCHEMA',
      'MERGE_SCHEMA',
      'COMMENT_COLUMN',
      'NATIVE_COMMENT_LIMIT',
      'QUERY_TIMEOUT_MS',
      'MCP_PORT',
      'MCP_AUTH_TOKEN',
      'ENABLE_ADMIN_TOOLS',
    ]) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should apply defaults', () => {
    expect(loadConfig()).toEqual({
      databaseUrl: 'postgres://localhost:5432/catalog',
      nativeSchema: 'syscat',
      extendedSchema: 'docdata',
      mergeSchema: 'doccat',
      commentColumn: 'remarks',
      nativeCommentLimit: 254,
      queryTimeoutMs: 30000,
      mcpPort: 3000,
      enableAdminTools: false,
    });
  });

  it('should read overrides from the environment', () => {
    vi.stubEnv('MERGE_SCHEMA', 'catalog_docs');
    vi.stubEnv('NATIVE_COMMENT_LIMIT', '1000');
    vi.stubEnv('ENABLE_ADMIN_TOOLS', 'true');

    const config = loadConfig();

    expect(config.mergeSchema).toBe('catalog_docs');
    expect(config.nativeCommentLimit).toBe(1000);
    expect(config.enableAdminTools).toBe(true);
  });

  it('should require DATABASE_URL', () => {
    vi.stubEnv('DATABASE_URL', '');

    expect(() => loadConfig()).toThrow('DATABASE_URL environment variable is required');
  });

  it('should reject a comment limit too small for the truncation marker', () => {
    vi.stubEnv('NATIVE_COMMENT_LIMIT', '3');

    expect(() => loadConfig()).toThrow(/^Invalid configuration: nativeCommentLimit: /);
  });

  it('should reject overlapping namespaces', () => {
    vi.stubEnv('MERGE_SCHEMA', 'docdata');

    expect(() => loadConfig()).toThrow(
      'Invalid configuration: native, extended and merge schemas must be distinct'
    );
  });
});
