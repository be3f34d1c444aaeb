/**
 * Workspace manifest synchronization.
 *
 * Each ecosystem's manifest is an independent unit: a failure is reported
 * in that ecosystem's outcome and never stops the others. Writes only
 * happen when the members section actually differs.
 */
import * as path from 'node:path';
import { readFile, writeFileAtomic } from '../../utils/file-system.js';
import {
  DiscoveryError,
  ErrorCodes,
  ManifestParseError,
  ManifestWriteError,
  ModSyncError,
  getErrorMessage,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { MODULE_PLACEHOLDER, type Config, type EcosystemConfig } from '../config/schema.js';
import { resolveSchemaRoot } from '../config/loader.js';
import { discoverModules, discoveryOptionsFromConfig } from '../discovery/index.js';
import { withManifestAdapter } from './adapters/index.js';
import type {
  ManifestAdapter,
  MembersSection,
  SyncManifestOptions,
  SyncOutcome,
  SyncSummary,
  SyncWorkspacesOptions,
} from './types.js';

const log = logger.child('sync');

/**
 * Turn a module id into a member entry, e.g. `packages/{module}` -> `packages/billing`.
 */
export function renderMember(template: string, moduleId: string): string {
  return template.split(MODULE_PLACEHOLDER).join(moduleId);
}

/**
 * Special entries first, then one entry per module in module order.
 * Later duplicates are dropped.
 */
export function computeDesiredMembers(
  modules: readonly string[],
  memberTemplate: string,
  specialEntries: readonly string[] = []
): string[] {
  const all = [...specialEntries, ...modules.map((m) => renderMember(memberTemplate, m))];
  return [...new Set(all)];
}

/**
 * Synchronize one manifest's members section with `desired`.
 */
export async function syncManifest<TDocument, TSection extends MembersSection>(
  ecosystem: string,
  adapter: ManifestAdapter<TDocument, TSection>,
  manifestPath: string,
  desired: readonly string[],
  options: SyncManifestOptions = {}
): Promise<SyncOutcome> {
  const members = [...desired];
  const base = { ecosystem, manifestPath, members };

  try {
    const content = await readManifest(manifestPath);
    const document = adapter.parse(content, manifestPath);
    const section = adapter.locateMembersSection(document);
    const current = section.entries;

    const added = members.filter((m) => !current.includes(m));
    const removed = current.filter((m) => !members.includes(m));

    if (sameEntries(current, members)) {
      log.debug(`${ecosystem}: members already up to date`, { manifestPath });
      return { ...base, status: 'unchanged', added, removed, written: false };
    }

    const output = adapter.serialize(adapter.replaceMembersSection(document, section, members));
    if (output === content) {
      return { ...base, status: 'unchanged', added, removed, written: false };
    }

    if (!options.dryRun) {
      try {
        await writeFileAtomic(manifestPath, output);
      } catch (error) {
        throw new ManifestWriteError(
          ErrorCodes.MANIFEST_WRITE_ERROR,
          `Failed to write ${manifestPath}: ${getErrorMessage(error)}`,
          { ecosystem, filePath: manifestPath }
        );
      }
    }

    log.debug(`${ecosystem}: members ${options.dryRun ? 'would change' : 'updated'}`, {
      manifestPath,
      added,
      removed,
    });
    return { ...base, status: 'changed', added, removed, written: !options.dryRun };
  } catch (error) {
    return {
      ...base,
      status: 'error',
      added: [],
      removed: [],
      written: false,
      error: scopeError(error, ecosystem, manifestPath),
    };
  }
}

/**
 * Synchronize one configured ecosystem against a module set.
 */
export async function syncEcosystem(
  projectRoot: string,
  name: string,
  ecosystem: EcosystemConfig,
  modules: readonly string[],
  options: SyncManifestOptions = {}
): Promise<SyncOutcome> {
  const manifestPath = path.resolve(projectRoot, ecosystem.manifest);
  const desired = computeDesiredMembers(modules, ecosystem.member_template, ecosystem.special_entries);

  try {
    return await withManifestAdapter<Promise<SyncOutcome>>(ecosystem.format, ecosystem.section, (adapter) =>
      syncManifest(name, adapter, manifestPath, desired, options)
    );
  } catch (error) {
    // Adapter construction rejects a malformed section path
    return {
      ecosystem: name,
      manifestPath,
      members: desired,
      status: 'error',
      added: [],
      removed: [],
      written: false,
      error: scopeError(error, name, manifestPath),
    };
  }
}

/**
 * Discover modules and synchronize every enabled ecosystem.
 * Ecosystems touch disjoint files, so they run concurrently.
 */
export async function syncWorkspaces(
  projectRoot: string,
  config: Config,
  options: SyncWorkspacesOptions = {}
): Promise<SyncSummary> {
  const schemaRoot = resolveSchemaRoot(projectRoot, config);
  const modules = options.modules
    ? [...options.modules]
    : [...(await discoverModules(schemaRoot, discoveryOptionsFromConfig(config)))];

  if (modules.length === 0 && !options.allowEmpty) {
    throw new DiscoveryError(
      ErrorCodes.NO_MODULES,
      `No modules found in ${schemaRoot}; refusing to empty workspace manifests`,
      { schemaRoot }
    );
  }

  const enabled = Object.entries(config.ecosystems).filter(([, ecosystem]) => ecosystem.enabled);
  log.debug(`Synchronizing ${enabled.length} ecosystem(s)`, { modules });

  const outcomes = await Promise.all(
    enabled.map(([name, ecosystem]) =>
      syncEcosystem(projectRoot, name, ecosystem, modules, { dryRun: options.dryRun })
    )
  );

  return {
    modules,
    outcomes,
    changed: outcomes.some((o) => o.status === 'changed'),
    hasErrors: outcomes.some((o) => o.status === 'error'),
    dryRun: options.dryRun ?? false,
  };
}

async function readManifest(manifestPath: string): Promise<string> {
  try {
    return await readFile(manifestPath);
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new ManifestParseError(
      missing ? ErrorCodes.MANIFEST_NOT_FOUND : ErrorCodes.MANIFEST_PARSE_ERROR,
      missing
        ? `Manifest not found: ${manifestPath}`
        : `Failed to read ${manifestPath}: ${getErrorMessage(error)}`,
      { filePath: manifestPath }
    );
  }
}

function sameEntries(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((entry, i) => entry === b[i]);
}

/**
 * Normalize anything thrown during a sync step. Project errors already
 * name the manifest path; the outcome carries the ecosystem.
 */
function scopeError(error: unknown, ecosystem: string, manifestPath: string): ModSyncError {
  if (error instanceof ModSyncError) {
    return error;
  }
  return new ManifestParseError(ErrorCodes.MANIFEST_PARSE_ERROR, `${manifestPath}: ${getErrorMessage(error)}`, {
    ecosystem,
    filePath: manifestPath,
  });
}
