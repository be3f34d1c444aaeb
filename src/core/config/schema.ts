import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Manifest formats with a dedicated adapter. */
export const ManifestFormatSchema = z.enum(['toml', 'xml', 'json', 'go-work']);

/** Placeholder substituted with a module id in member templates. */
export const MODULE_PLACEHOLDER = '{module}';

/** One packaging ecosystem: its workspace manifest and client tree. */
export const EcosystemSchema = z.object({
  enabled: z.boolean().default(true),
  format: ManifestFormatSchema,
  /** Manifest path, relative to the project root */
  manifest: z.string().min(1),
  /**
   * Dotted path of the members section inside the manifest.
   * toml: `<table>.<key>`; json: `<key>[.<key>]`; xml: `<container>.<item>`; go-work: `use`.
   */
  section: z.string().min(1),
  /** How a module id becomes a member entry */
  member_template: z
    .string()
    .refine((t) => t.includes(MODULE_PLACEHOLDER), {
      message: `member_template must contain ${MODULE_PLACEHOLDER}`,
    })
    .default(MODULE_PLACEHOLDER),
  /** Entries kept in fixed leading positions */
  special_entries: z.array(z.string()).default([]),
  /** Directory holding one client package per module */
  client_root: z.string().min(1),
  /** File each client package must contain; null to only check the directory */
  metadata_file: z.string().nullable().default(null),
  /** Extra housekeeping directories ignored by orphan detection */
  ignore: z.array(z.string()).default([]),
});

/**
 * Built-in ecosystems. User entries with these names are merged over
 * the defaults field by field.
 */
export const DEFAULT_ECOSYSTEMS: Record<string, z.input<typeof EcosystemSchema>> = {
  rust: {
    format: 'toml',
    manifest: 'clients/rust/Cargo.toml',
    section: 'workspace.members',
    member_template: '{module}',
    client_root: 'clients/rust',
    metadata_file: 'Cargo.toml',
  },
  go: {
    format: 'go-work',
    manifest: 'clients/go/go.work',
    section: 'use',
    member_template: './{module}',
    client_root: 'clients/go',
    metadata_file: 'go.mod',
  },
  python: {
    format: 'toml',
    manifest: 'clients/python/pyproject.toml',
    section: 'tool.uv.workspace.members',
    member_template: '{module}',
    client_root: 'clients/python',
    metadata_file: 'pyproject.toml',
  },
  typescript: {
    format: 'json',
    manifest: 'clients/typescript/package.json',
    section: 'workspaces',
    member_template: 'packages/{module}',
    special_entries: ['packages/validate', 'packages/google'],
    client_root: 'clients/typescript/packages',
    metadata_file: 'package.json',
  },
  java: {
    format: 'xml',
    manifest: 'clients/java/pom.xml',
    section: 'modules.module',
    member_template: '{module}',
    client_root: 'clients/java',
    metadata_file: 'pom.xml',
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge user-provided ecosystems over the built-in ones.
 * Unknown input is passed through untouched so validation can report it.
 */
function mergeEcosystems(value: unknown): unknown {
  if (value === undefined || value === null) {
    return { ...DEFAULT_ECOSYSTEMS };
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const merged: Record<string, unknown> = {};
  for (const [name, defaults] of Object.entries(DEFAULT_ECOSYSTEMS)) {
    const override = value[name];
    merged[name] = isPlainObject(override) ? { ...defaults, ...override } : override ?? defaults;
  }
  for (const [name, entry] of Object.entries(value)) {
    if (!(name in merged)) {
      merged[name] = entry;
    }
  }
  return merged;
}

/** Module discovery settings. */
export const DiscoverySettingsSchema = z.object({
  /** Entries starting with this prefix are hidden */
  hidden_prefix: z.string().default('.'),
  /** Infrastructure directories under the schema root that are not modules */
  exclude: z.array(z.string()).default(['proto']),
  /** Sort module ids lexicographically (otherwise filesystem order) */
  sort: z.boolean().default(true),
});

/** Structure validation settings. */
export const StructureSettingsSchema = z.object({
  /** Housekeeping directories never reported as orphaned */
  ignore: z
    .array(z.string())
    .default(['proto', 'target', 'node_modules', '.venv', 'packages', 'com', 'google', 'validate']),
});

/** One file of the template set. */
export const TemplateFileSchema = z.object({
  /** File name inside the template directory */
  source: z.string().min(1),
  /** Output path relative to the schema root; placeholders allowed */
  target: z.string().min(1),
});

/** Template set settings. */
export const TemplateSettingsSchema = z.object({
  dir: z.string().default('templates/module'),
  files: z.array(TemplateFileSchema).min(1).default([
    { source: 'README.md.template', target: '{{MODULE_NAME}}/README.md' },
    {
      source: 'module.proto.template',
      target: '{{MODULE_NAME}}/{{VERSION}}/{{MODULE_FILE}}.proto',
    },
  ]),
});

/** Root configuration schema. */
export const ConfigSchema = z.object({
  /** Directory holding one subdirectory per schema module */
  schema_root: z.string().default('proto'),
  discovery: withDefaults(DiscoverySettingsSchema),
  /** Names the scaffolder refuses to create */
  reserved_names: z.array(z.string()).default(['core', 'common', 'google', 'grpc', 'validate']),
  ecosystems: z.preprocess(mergeEcosystems, z.record(z.string(), EcosystemSchema)),
  structure: withDefaults(StructureSettingsSchema),
  templates: withDefaults(TemplateSettingsSchema),
});

export type ManifestFormat = z.infer<typeof ManifestFormatSchema>;
export type EcosystemConfig = z.infer<typeof EcosystemSchema>;
export type DiscoverySettings = z.infer<typeof DiscoverySettingsSchema>;
export type StructureSettings = z.infer<typeof StructureSettingsSchema>;
export type TemplateFile = z.infer<typeof TemplateFileSchema>;
export type TemplateSettings = z.infer<typeof TemplateSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
