/**
 * Type definitions for the doccat comment catalog
 */

/**
 * Column metadata from catalog introspection
 */
export interface ColumnMeta {
  name: string;
  position: number;
  nullable: boolean;
  /** String-category type (text, varchar, name, ...) */
  textual: boolean;
  /** 1-based position in the primary key, null when not a key column */
  keyPosition: number | null;
}

/**
 * Table or view found in a namespace
 */
export interface RelationInfo {
  name: string;
  type: 'table' | 'view';
}

export interface TriggerRef {
  name: string;
  table: string;
}

export interface RoutineRef {
  name: string;
  type: 'function' | 'procedure';
  /** Identity argument list, e.g. "integer, text" */
  signature: string;
}

/**
 * A row as read back from a catalog relation
 */
export type CatalogValue = string | number | null;
export type CatalogRow = Record<string, CatalogValue>;

/**
 * Names of the three namespaces plus the comment column and native ceiling.
 * Everything in the core takes this instead of reading the environment.
 */
export interface CatalogSettings {
  nativeSchema: string;
  extendedSchema: string;
  mergeSchema: string;
  commentColumn: string;
  nativeCommentLimit: number;
}

export const DEFAULT_SETTINGS: CatalogSettings = {
  nativeSchema: 'syscat',
  extendedSchema: 'docdata',
  mergeSchema: 'doccat',
  commentColumn: 'remarks',
  nativeCommentLimit: 254,
};

/**
 * How a native relation is currently exposed in the merge namespace
 */
export type OverlayMode = 'merged' | 'aliased' | 'missing';

export interface OverlayStatus {
  installed: boolean;
  relations: Array<{ name: string; mode: OverlayMode; extended: boolean }>;
}

export interface InstallReport {
  merged: string[];
  aliased: string[];
}

export interface ProvisionReport {
  createdSchema: boolean;
  created: string[];
  skipped: string[];
}

export interface UninstallReport {
  statements: number;
  dropped: Record<'aliases' | 'triggers' | 'views' | 'routines' | 'tables' | 'schemas', string[]>;
}

export interface ImportReport {
  kinds: Array<{ table: string; rows: number }>;
}

export interface ExportSummary {
  applied: number;
  truncated: number;
}

/**
 * MCP tool result
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}
