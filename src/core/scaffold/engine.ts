/**
 * Module scaffolder.
 *
 * Validates the request, renders the whole template set in memory, and only
 * then touches the filesystem. A failed write removes the module directory
 * this run created. Workspace sync runs after every file is on disk.
 */
import * as path from 'node:path';
import { fileExists, isWithin, removeDir, writeFile } from '../../utils/file-system.js';
import {
  ErrorCodes,
  ModSyncError,
  SecurityError,
  ValidationError,
  getErrorMessage,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { toTitleCase } from '../../utils/string.js';
import type { Config } from '../config/schema.js';
import { resolveSchemaRoot } from '../config/loader.js';
import { MODULE_ID_PATTERN } from '../discovery/index.js';
import { syncWorkspaces } from '../manifest/synchronizer.js';
import { buildTemplateVariables, loadTemplateSet, renderTemplate } from './template.js';
import type {
  ModuleSpec,
  RenderedFile,
  ScaffoldOptions,
  ScaffoldRequest,
  ScaffoldResult,
  TemplateVariables,
} from './types.js';

const VERSION_PATTERN = /^v[0-9]+$/;
const ENTITY_PATTERN = /^[A-Z][A-Za-z0-9]*$/;
const DEFAULT_VERSION = 'v1';

const log = logger.child('scaffold');

export class ModuleScaffolder {
  private readonly schemaRoot: string;

  constructor(
    private readonly projectRoot: string,
    private readonly config: Config,
    private readonly now: () => Date = () => new Date()
  ) {
    this.schemaRoot = resolveSchemaRoot(projectRoot, config);
  }

  /**
   * Apply defaults and check the request. The first failing rule wins.
   */
  async validate(request: ScaffoldRequest): Promise<ModuleSpec> {
    const moduleName = request.moduleName.trim();

    if (moduleName === '') {
      throw new ValidationError(ErrorCodes.EMPTY_NAME, 'Module name cannot be empty');
    }
    if (!MODULE_ID_PATTERN.test(moduleName)) {
      throw new ValidationError(
        ErrorCodes.INVALID_NAME,
        `Invalid module name "${moduleName}": use lowercase letters, digits and hyphens, starting with a letter`,
        { moduleName }
      );
    }
    // Any entry counts, a plain file included
    if (await fileExists(path.join(this.schemaRoot, moduleName))) {
      throw new ValidationError(
        ErrorCodes.MODULE_EXISTS,
        `Module "${moduleName}" already exists in ${this.schemaRoot}`,
        { moduleName, schemaRoot: this.schemaRoot }
      );
    }
    if (this.config.reserved_names.includes(moduleName)) {
      throw new ValidationError(
        ErrorCodes.RESERVED_NAME,
        `Module name "${moduleName}" is reserved`,
        { moduleName, reserved: this.config.reserved_names }
      );
    }
    const { hidden_prefix: hiddenPrefix, exclude } = this.config.discovery;
    if (exclude.includes(moduleName) || (hiddenPrefix !== '' && moduleName.startsWith(hiddenPrefix))) {
      throw new ValidationError(
        ErrorCodes.RESERVED_NAME,
        `Module name "${moduleName}" is skipped by discovery and would never be synced`,
        { moduleName, exclude, hiddenPrefix }
      );
    }

    const version = request.version?.trim() || DEFAULT_VERSION;
    if (!VERSION_PATTERN.test(version)) {
      throw new ValidationError(
        ErrorCodes.INVALID_VERSION,
        `Invalid version "${version}": expected v followed by digits, e.g. v1`,
        { moduleName, version }
      );
    }

    const entityName = request.entityName?.trim() || toTitleCase(moduleName);
    if (!ENTITY_PATTERN.test(entityName)) {
      throw new ValidationError(
        ErrorCodes.INVALID_ENTITY,
        `Invalid entity name "${entityName}": expected TitleCase, e.g. UserProfile`,
        { moduleName, entityName }
      );
    }

    const description = request.description?.trim() || `Service for ${moduleName}`;
    return { moduleName, description, version, entityName };
  }

  /**
   * Render every template for `spec` without writing anything.
   */
  async render(spec: ModuleSpec, variables: TemplateVariables): Promise<RenderedFile[]> {
    const templateDir = path.resolve(this.projectRoot, this.config.templates.dir);
    const templates = await loadTemplateSet(templateDir, this.config.templates.files);
    const moduleDir = path.join(this.schemaRoot, spec.moduleName);

    return templates.map((template) => {
      const target = renderTemplate(template.target, variables, `target of ${template.source}`);
      const outputPath = path.resolve(this.schemaRoot, target);

      if (!isWithin(moduleDir, outputPath) || outputPath === moduleDir) {
        throw new SecurityError(
          ErrorCodes.PATH_TRAVERSAL,
          `Template target "${target}" resolves outside ${moduleDir}`,
          { template: template.source, target, moduleDir }
        );
      }

      return {
        source: template.source,
        target,
        path: outputPath,
        content: renderTemplate(template.body, variables, template.source),
      };
    });
  }

  async scaffold(request: ScaffoldRequest, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const spec = await this.validate(request);
    const variables = buildTemplateVariables(spec, this.now());
    const files = await this.render(spec, variables);
    const moduleDir = path.join(this.schemaRoot, spec.moduleName);
    const result: ScaffoldResult = { module: spec, moduleDir, files, variables, dryRun: options.dryRun ?? false };

    if (options.dryRun) {
      return result;
    }

    await this.writeAll(moduleDir, files);
    log.debug(`Created ${files.length} file(s) in ${moduleDir}`);

    if (options.sync !== false) {
      result.sync = await syncWorkspaces(this.projectRoot, this.config);
    }
    return result;
  }

  private async writeAll(moduleDir: string, files: readonly RenderedFile[]): Promise<void> {
    const existed = await fileExists(moduleDir);
    for (const file of files) {
      try {
        await writeFile(file.path, file.content);
      } catch (error) {
        if (!existed) {
          await removeDir(moduleDir);
        }
        throw new ModSyncError(
          ErrorCodes.SCAFFOLD_WRITE_ERROR,
          `Failed to write ${file.path}: ${getErrorMessage(error)}`,
          { moduleDir, filePath: file.path }
        );
      }
    }
  }
}
