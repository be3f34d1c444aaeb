/**
 * Scaffold exports barrel file.
 */
export { ModuleScaffolder } from './engine.js';
export { buildTemplateVariables, renderTemplate, loadTemplateSet, isPlaceholderName } from './template.js';
export type { LoadedTemplate } from './template.js';
export { PLACEHOLDER_NAMES } from './types.js';
export type {
  PlaceholderName,
  TemplateVariables,
  ScaffoldRequest,
  ScaffoldOptions,
  ModuleSpec,
  RenderedFile,
  ScaffoldResult,
} from './types.js';
