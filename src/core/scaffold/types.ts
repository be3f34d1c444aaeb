/**
 * Scaffold type definitions.
 */
import type { SyncSummary } from '../manifest/types.js';

/**
 * Placeholders available to templates as `{{NAME}}`.
 */
export const PLACEHOLDER_NAMES = [
  'MODULE_NAME',
  'MODULE_NAME_TITLE',
  'MODULE_NAME_UPPER',
  'MODULE_NAME_LOWER',
  'MODULE_NAME_KEBAB',
  'MODULE_FILE',
  'MODULE_DESCRIPTION',
  'MODULE_DESCRIPTION_LOWER',
  'VERSION',
  'ENTITY_NAME',
  'ENTITY_NAME_LOWER',
  'ENTITY_NAME_UPPER',
  'MESSAGE_PREFIX',
  'DATE',
] as const;

export type PlaceholderName = (typeof PLACEHOLDER_NAMES)[number];

export type TemplateVariables = Record<PlaceholderName, string>;

/**
 * Raw scaffold input. Everything but the module name is optional.
 */
export interface ScaffoldRequest {
  moduleName: string;
  description?: string;
  version?: string;
  entityName?: string;
}

/**
 * Scaffold input after defaults are applied and validation passed.
 */
export interface ModuleSpec {
  moduleName: string;
  description: string;
  version: string;
  entityName: string;
}

export interface ScaffoldOptions {
  /** Run workspace sync after the files are written (default: true) */
  sync?: boolean;
  /** Render only; nothing is written and sync is skipped */
  dryRun?: boolean;
}

/**
 * One file produced from the template set.
 */
export interface RenderedFile {
  /** Template file name */
  source: string;
  /** Output path relative to the schema root */
  target: string;
  /** Absolute output path */
  path: string;
  content: string;
}

export interface ScaffoldResult {
  module: ModuleSpec;
  moduleDir: string;
  files: RenderedFile[];
  variables: TemplateVariables;
  dryRun: boolean;
  /** Present when sync ran */
  sync?: SyncSummary;
}
