/**
 * Module discovery.
 * A module is an immediate subdirectory of the schema root whose name is a valid module id.
 */
import { directoryExists, listDirectories } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { DiscoveryOptions, DiscoveryResult, ModuleSet, SkippedEntry } from './types.js';

const log = logger.child('discovery');

/** Shape of a module id: lowercase, leading letter, letters/digits/hyphens. */
export const MODULE_ID_PATTERN = /^[a-z][a-z0-9-]*$/;

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
  hiddenPrefix: '.',
  exclude: ['proto'],
  sort: true,
};

/**
 * Check whether a name is a well-formed module id.
 */
export function isValidModuleId(name: string): boolean {
  return MODULE_ID_PATTERN.test(name);
}

/**
 * Scan the schema root and report both modules and skipped entries.
 * A missing schema root yields an empty result so a fresh repository can bootstrap.
 */
export async function scanSchemaRoot(
  schemaRoot: string,
  options: Partial<DiscoveryOptions> = {}
): Promise<DiscoveryResult> {
  const opts = { ...DEFAULT_DISCOVERY_OPTIONS, ...options };

  if (!(await directoryExists(schemaRoot))) {
    log.debug(`Schema root not found, no modules: ${schemaRoot}`);
    return { schemaRoot, modules: [], skipped: [] };
  }

  const excluded = new Set(opts.exclude);
  const seen = new Set<string>();
  const modules: string[] = [];
  const skipped: SkippedEntry[] = [];

  for (const name of await listDirectories(schemaRoot)) {
    if (opts.hiddenPrefix && name.startsWith(opts.hiddenPrefix)) {
      skipped.push({ name, reason: 'hidden' });
      continue;
    }
    if (excluded.has(name)) {
      skipped.push({ name, reason: 'excluded' });
      continue;
    }
    if (!isValidModuleId(name)) {
      log.debug(`Skipping "${name}": not a valid module id`);
      skipped.push({ name, reason: 'invalid' });
      continue;
    }
    if (!seen.has(name)) {
      seen.add(name);
      modules.push(name);
    }
  }

  if (opts.sort) {
    modules.sort();
  }

  return { schemaRoot, modules, skipped };
}

/**
 * Discover the current module set under the schema root.
 */
export async function discoverModules(
  schemaRoot: string,
  options: Partial<DiscoveryOptions> = {}
): Promise<ModuleSet> {
  const result = await scanSchemaRoot(schemaRoot, options);
  return result.modules;
}
