/**
 * Tests for the ModuleScaffolder class.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { ModuleScaffolder } from '../../../../src/core/scaffold/engine.js';
import { mergeConfig } from '../../../../src/core/config/loader.js';
import type { Config } from '../../../../src/core/config/schema.js';
import type { ModuleSpec, ScaffoldRequest } from '../../../../src/core/scaffold/types.js';
import { MODULE_PROTO_TEMPLATE, README_TEMPLATE } from '../../../../src/cli/commands/init-templates.js';
import { ErrorCodes, SecurityError, ValidationError } from '../../../../src/utils/errors.js';
import { MANIFEST_PATHS, createTempDir, createWorkspace, manifestsFor } from '../../../helpers/workspace.js';

const NOW = new Date('2026-03-04T10:00:00Z');

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function writeTemplates(root: string): Promise<void> {
  const dir = join(root, 'templates/module');
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'README.md.template'), README_TEMPLATE);
  await writeFile(join(dir, 'module.proto.template'), MODULE_PROTO_TEMPLATE);
}

describe('ModuleScaffolder', () => {
  let root: string;
  let config: Config;

  const scaffolder = (cfg: Config = config) => new ModuleScaffolder(root, cfg, () => NOW);

  beforeEach(async () => {
    root = await createTempDir('scaffold');
    await createWorkspace(root, ['core']);
    await writeTemplates(root);
    config = mergeConfig({});
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('should apply defaults and trim the name', async () => {
      const spec = await scaffolder().validate({ moduleName: '  user-management ' });

      expect(spec).toEqual({
        moduleName: 'user-management',
        description: 'Service for user-management',
        version: 'v1',
        entityName: 'UserManagement',
      });
    });

    it('should keep explicit values', async () => {
      const spec = await scaffolder().validate({
        moduleName: 'billing',
        description: 'Invoices',
        version: 'v3',
        entityName: 'Invoice',
      });

      expect(spec).toEqual({ moduleName: 'billing', description: 'Invoices', version: 'v3', entityName: 'Invoice' });
    });

    it('should reject an empty name', async () => {
      await expect(scaffolder().validate({ moduleName: '   ' })).rejects.toMatchObject({
        code: ErrorCodes.EMPTY_NAME,
        message: 'Module name cannot be empty',
      });
    });

    it.each(['Billing', '1billing', 'bill_ing', '-billing'])('should reject the malformed name %s', async (name) => {
      await expect(scaffolder().validate({ moduleName: name })).rejects.toMatchObject({
        code: ErrorCodes.INVALID_NAME,
      });
    });

    it('should report an existing module before a reserved name', async () => {
      const error = await scaffolder()
        .validate({ moduleName: 'core' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: ErrorCodes.MODULE_EXISTS,
        message: `Module "core" already exists in ${join(root, 'proto')}`,
      });
    });

    it('should reject a reserved name', async () => {
      await expect(scaffolder().validate({ moduleName: 'common' })).rejects.toMatchObject({
        code: ErrorCodes.RESERVED_NAME,
        message: 'Module name "common" is reserved',
      });
    });

    it('should reject a name that discovery excludes', async () => {
      await expect(scaffolder().validate({ moduleName: 'proto' })).rejects.toMatchObject({
        code: ErrorCodes.RESERVED_NAME,
        message: 'Module name "proto" is skipped by discovery and would never be synced',
      });
    });

    it('should reject a name with the hidden prefix', async () => {
      const hidden = mergeConfig({ discovery: { hidden_prefix: 'tmp' } });

      await expect(scaffolder(hidden).validate({ moduleName: 'tmp-billing' })).rejects.toMatchObject({
        code: ErrorCodes.RESERVED_NAME,
        message: 'Module name "tmp-billing" is skipped by discovery and would never be synced',
      });
    });

    it.each(['V1', '1', 'v', 'v1beta'])('should reject the version %s', async (version) => {
      await expect(scaffolder().validate({ moduleName: 'billing', version })).rejects.toMatchObject({
        code: ErrorCodes.INVALID_VERSION,
      });
    });

    it.each(['invoice', 'Invoice-Line', '9Lives'])('should reject the entity %s', async (entityName) => {
      await expect(scaffolder().validate({ moduleName: 'billing', entityName })).rejects.toMatchObject({
        code: ErrorCodes.INVALID_ENTITY,
      });
    });
  });

  describe('scaffold', () => {
    it('should write the rendered template set', async () => {
      const result = await scaffolder().scaffold({ moduleName: 'billing', description: 'Billing and invoices' });

      expect(result.moduleDir).toBe(join(root, 'proto/billing'));
      expect(result.files.map((f) => f.target)).toEqual(['billing/README.md', 'billing/v1/billing.proto']);
      expect(await readFile(join(root, 'proto/billing/README.md'), 'utf-8')).toBe(
        '# Billing\n\nBilling and invoices\n\n## Layout\n\n' +
          '- `v1/billing.proto`: Billing messages and the BillingService definition\n\nCreated 2026-03-04.\n'
      );

      const proto = await readFile(join(root, 'proto/billing/v1/billing.proto'), 'utf-8');
      expect(proto.split('\n').slice(0, 6)).toEqual([
        'syntax = "proto3";',
        '',
        'package billing.v1;',
        '',
        '// Billing and invoices',
        'service BillingService {',
      ]);
      expect(proto).toContain('  string billing_id = 1;\n');
      expect(proto).toContain('  BILLING_STATUS_UNSPECIFIED = 0;\n');
    });

    it('should synchronize the workspace manifests afterwards', async () => {
      const result = await scaffolder().scaffold({ moduleName: 'billing' });

      expect(result.sync?.modules).toEqual(['billing', 'core']);
      expect(result.sync?.outcomes.map((o) => o.status)).toEqual([
        'changed',
        'changed',
        'changed',
        'changed',
        'changed',
      ]);
      const expected = manifestsFor(['billing', 'core']);
      for (const manifest of Object.values(MANIFEST_PATHS)) {
        expect(await readFile(join(root, manifest), 'utf-8')).toBe(expected[manifest]);
      }
    });

    it('should skip the sync when asked', async () => {
      const result = await scaffolder().scaffold({ moduleName: 'billing' }, { sync: false });

      expect(result.sync).toBeUndefined();
      expect(await exists(join(root, 'proto/billing/README.md'))).toBe(true);
      expect(await readFile(join(root, MANIFEST_PATHS.rust), 'utf-8')).toBe(manifestsFor(['core'])[MANIFEST_PATHS.rust]);
    });

    it('should render without writing on a dry run', async () => {
      const result = await scaffolder().scaffold({ moduleName: 'billing' }, { dryRun: true });

      expect(result.dryRun).toBe(true);
      expect(result.files).toHaveLength(2);
      expect(result.files[0].content.startsWith('# Billing\n')).toBe(true);
      expect(result.sync).toBeUndefined();
      expect(await exists(join(root, 'proto/billing'))).toBe(false);
    });

    it('should write nothing when validation fails', async () => {
      await expect(scaffolder().scaffold({ moduleName: 'billing', version: 'beta' })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(await exists(join(root, 'proto/billing'))).toBe(false);
    });

    it('should refuse a plain file at the module path and leave it alone', async () => {
      await writeFile(join(root, 'proto/billing'), 'keep me\n');

      await expect(scaffolder().scaffold({ moduleName: 'billing' })).rejects.toMatchObject({
        code: ErrorCodes.MODULE_EXISTS,
        message: `Module "billing" already exists in ${join(root, 'proto')}`,
      });
      expect(await readFile(join(root, 'proto/billing'), 'utf-8')).toBe('keep me\n');
      expect(await readFile(join(root, MANIFEST_PATHS.rust), 'utf-8')).toBe(manifestsFor(['core'])[MANIFEST_PATHS.rust]);
    });

    it('should fail before writing when a template is missing', async () => {
      await rm(join(root, 'templates/module/module.proto.template'));

      await expect(scaffolder().scaffold({ moduleName: 'billing' })).rejects.toMatchObject({
        code: ErrorCodes.TEMPLATE_NOT_FOUND,
      });
      expect(await exists(join(root, 'proto/billing'))).toBe(false);
    });

    it('should fail before writing on an unknown placeholder', async () => {
      await writeFile(join(root, 'templates/module/module.proto.template'), 'owner: {{AUTHOR}}\n');

      await expect(scaffolder().scaffold({ moduleName: 'billing' })).rejects.toMatchObject({
        code: ErrorCodes.TEMPLATE_INVALID,
        message: 'Unknown placeholder {{AUTHOR}} in module.proto.template',
      });
      expect(await exists(join(root, 'proto/billing'))).toBe(false);
    });

    it('should refuse targets outside the module directory', async () => {
      const escaping = mergeConfig({
        templates: { files: [{ source: 'README.md.template', target: '{{MODULE_NAME}}/../escape.md' }] },
      });

      await expect(scaffolder(escaping).scaffold({ moduleName: 'billing' })).rejects.toBeInstanceOf(SecurityError);
      expect(await exists(join(root, 'proto/escape.md'))).toBe(false);
    });

    it('should refuse a target that is the module directory itself', async () => {
      const self = mergeConfig({
        templates: { files: [{ source: 'README.md.template', target: '{{MODULE_NAME}}' }] },
      });

      await expect(scaffold(self)).rejects.toMatchObject({ code: ErrorCodes.PATH_TRAVERSAL });
    });

    it('should remove the module directory when a write fails', async () => {
      const clashing = mergeConfig({
        templates: {
          files: [
            { source: 'README.md.template', target: '{{MODULE_NAME}}/docs' },
            { source: 'README.md.template', target: '{{MODULE_NAME}}/docs/README.md' },
          ],
        },
      });

      await expect(scaffold(clashing)).rejects.toMatchObject({ code: ErrorCodes.SCAFFOLD_WRITE_ERROR });
      expect(await exists(join(root, 'proto/billing'))).toBe(false);
      expect(await readFile(join(root, MANIFEST_PATHS.go), 'utf-8')).toBe(manifestsFor(['core'])[MANIFEST_PATHS.go]);
    });

    it('should keep a module directory it did not create when a write fails', async () => {
      class UncheckedScaffolder extends ModuleScaffolder {
        override async validate(request: ScaffoldRequest): Promise<ModuleSpec> {
          return { moduleName: request.moduleName, description: 'Core', version: 'v1', entityName: 'Core' };
        }
      }
      await writeFile(join(root, 'proto/core/core.proto'), 'syntax = "proto3";\n');
      const clashing = mergeConfig({
        templates: {
          files: [
            { source: 'README.md.template', target: '{{MODULE_NAME}}/docs' },
            { source: 'README.md.template', target: '{{MODULE_NAME}}/docs/README.md' },
          ],
        },
      });

      await expect(
        new UncheckedScaffolder(root, clashing, () => NOW).scaffold({ moduleName: 'core' })
      ).rejects.toMatchObject({ code: ErrorCodes.SCAFFOLD_WRITE_ERROR });
      expect(await readFile(join(root, 'proto/core/core.proto'), 'utf-8')).toBe('syntax = "proto3";\n');
    });

    function scaffold(cfg: Config) {
      return scaffolder(cfg).scaffold({ moduleName: 'billing' });
    }
  });
});
