#!/usr/bin/env node
/**
 * doccat MCP Server
 *
 * Long-form comments for a database catalog, served over MCP.
 *
 * Usage:
 *   npm start              - Run with .env file
 *   npm run start:auth     - Require MCP_AUTH_TOKEN on /mcp
 *
 * Tools provided:
 *   - catalog_status: Overlay state per catalog relation
 *   - preview_ddl: Generated merge view and trigger for a relation
 *   - get_comment / set_comment: Read and write extended comments
 *   - export_comments / import_comments: Sync with the native catalog
 *   - copy_routine_comments: Reuse comments across routine overloads
 */

// Load .env file before anything else
import 'dotenv/config';

import { startServer } from './server.js';

startServer().catch((error) => {
  console.error('Fatal error starting server:', error);
  process.exit(1);
});
