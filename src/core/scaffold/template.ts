/**
 * Template set loading and `{{NAME}}` substitution.
 *
 * Substitution is a single pass over the template: replaced values are
 * never scanned again, so a description containing `{{VERSION}}` stays
 * literal. Unknown placeholders are errors, not blanks.
 */
import * as path from 'node:path';
import { directoryExists, isFile, readFile } from '../../utils/file-system.js';
import { ErrorCodes, TemplateError } from '../../utils/errors.js';
import { toKebabCase, toSnakeCase, toTitleCase, toUpperCase } from '../../utils/string.js';
import type { TemplateFile } from '../config/schema.js';
import { PLACEHOLDER_NAMES, type ModuleSpec, type PlaceholderName, type TemplateVariables } from './types.js';

const PLACEHOLDER_PATTERN = /\{\{\s*(\w+)\s*\}\}/g;

export interface LoadedTemplate extends TemplateFile {
  /** Template file contents */
  body: string;
}

/**
 * Derive every placeholder value from a validated module spec.
 */
export function buildTemplateVariables(spec: ModuleSpec, now: Date = new Date()): TemplateVariables {
  return {
    MODULE_NAME: spec.moduleName,
    MODULE_NAME_TITLE: toTitleCase(spec.moduleName),
    MODULE_NAME_UPPER: toUpperCase(spec.moduleName),
    MODULE_NAME_LOWER: spec.moduleName.toLowerCase(),
    MODULE_NAME_KEBAB: toKebabCase(spec.moduleName),
    MODULE_FILE: toSnakeCase(spec.moduleName),
    MODULE_DESCRIPTION: spec.description,
    MODULE_DESCRIPTION_LOWER: spec.description.toLowerCase(),
    VERSION: spec.version,
    ENTITY_NAME: spec.entityName,
    ENTITY_NAME_LOWER: spec.entityName.toLowerCase(),
    ENTITY_NAME_UPPER: toUpperCase(spec.entityName),
    MESSAGE_PREFIX: toTitleCase(spec.moduleName),
    DATE: now.toISOString().slice(0, 10),
  };
}

export function isPlaceholderName(name: string): name is PlaceholderName {
  return PLACEHOLDER_NAMES.some((p) => p === name);
}

/**
 * Substitute placeholders in `template`.
 * @param origin - named in the error for an unknown placeholder
 */
export function renderTemplate(template: string, variables: TemplateVariables, origin: string): string {
  return template.replace(PLACEHOLDER_PATTERN, (_, name: string) => {
    if (!isPlaceholderName(name)) {
      throw new TemplateError(
        ErrorCodes.TEMPLATE_INVALID,
        `Unknown placeholder {{${name}}} in ${origin}`,
        { template: origin, placeholder: name }
      );
    }
    return variables[name];
  });
}

/**
 * Read every file of the template set. Fails before anything is rendered
 * if the directory or any listed file is absent.
 */
export async function loadTemplateSet(
  templateDir: string,
  files: readonly TemplateFile[]
): Promise<LoadedTemplate[]> {
  if (!(await directoryExists(templateDir))) {
    throw new TemplateError(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Template directory not found: ${templateDir}`,
      { templateDir }
    );
  }

  const loaded: LoadedTemplate[] = [];
  for (const file of files) {
    const templatePath = path.join(templateDir, file.source);
    if (!(await isFile(templatePath))) {
      throw new TemplateError(
        ErrorCodes.TEMPLATE_NOT_FOUND,
        `Template not found: ${templatePath}`,
        { templateDir, template: file.source }
      );
    }
    loaded.push({ ...file, body: await readFile(templatePath) });
  }
  return loaded;
}
