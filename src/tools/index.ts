/**
 * Tool executor re-exports
 *
 * Each tool's sole public API is its execute function.
 * Registration (name, schema, description) is handled in server.ts via the MCP SDK.
 */

export { executeCatalogStatusTool } from './catalog-status.js';
export { executePreviewDdlTool } from './preview-ddl.js';
export { executeGetCommentTool } from './get-comment.js';
export { executeSetCommentTool } from './set-comment.js';
export { executeExportCommentsTool } from './export-comments.js';
export { executeImportCommentsTool } from './import-comments.js';
export { executeCopyRoutineCommentsTool } from './copy-routine-comments.js';
export { executeInstallOverlayTool, executeUninstallOverlayTool } from './install-overlay.js';
