/**
 * Client tree structure validation.
 * Read-only: classifies client directories against the module set and reports.
 */
import * as path from 'node:path';
import { directoryExists, isFile, listDirectories } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { Config } from '../config/schema.js';
import { DEFAULT_DISCOVERY_OPTIONS, discoverModules } from '../discovery/index.js';
import type {
  ClientEntryCheck,
  ClientRoot,
  OrphanedEntry,
  StructureReport,
  StructureStatus,
  ValidateStructureOptions,
} from './types.js';

const log = logger.child('structure');

/**
 * Client roots for every enabled ecosystem, with the global housekeeping
 * list merged into each ecosystem's own.
 */
export function clientRootsFromConfig(projectRoot: string, config: Config): ClientRoot[] {
  return Object.entries(config.ecosystems)
    .filter(([, ecosystem]) => ecosystem.enabled)
    .map(([name, ecosystem]) => ({
      ecosystem: name,
      root: path.resolve(projectRoot, ecosystem.client_root),
      metadataFile: ecosystem.metadata_file,
      ignore: [...config.structure.ignore, ...ecosystem.ignore],
    }));
}

/**
 * Check one module's client entry.
 */
export async function checkClientEntry(clientRoot: ClientRoot, moduleId: string): Promise<ClientEntryCheck> {
  const clientDir = path.join(clientRoot.root, moduleId);
  const base = {
    ecosystem: clientRoot.ecosystem,
    module: moduleId,
    clientDir,
    metadataFile: clientRoot.metadataFile,
  };

  if (!(await directoryExists(clientDir))) {
    return { ...base, status: 'missing', reason: 'directory' };
  }
  if (clientRoot.metadataFile && !(await isFile(path.join(clientDir, clientRoot.metadataFile)))) {
    return { ...base, status: 'missing', reason: 'metadata' };
  }
  return { ...base, status: 'ok' };
}

/**
 * Directories in a client root that match no module.
 */
export async function findOrphans(
  clientRoot: ClientRoot,
  modules: readonly string[],
  hiddenPrefix: string
): Promise<OrphanedEntry[]> {
  if (!(await directoryExists(clientRoot.root))) {
    return [];
  }

  const known = new Set(modules);
  const ignored = new Set(clientRoot.ignore);
  const names = await listDirectories(clientRoot.root);

  return names
    .filter((name) => !(hiddenPrefix && name.startsWith(hiddenPrefix)))
    .filter((name) => !ignored.has(name) && !known.has(name))
    .sort()
    .map((name) => ({
      ecosystem: clientRoot.ecosystem,
      name,
      path: path.join(clientRoot.root, name),
    }));
}

export function structureStatus(missing: number, orphaned: number): StructureStatus {
  if (missing > 0) return 'fail';
  if (orphaned > 0) return 'warn';
  return 'pass';
}

/**
 * Cross-reference discovered modules against every client root.
 */
export async function validateStructure(
  schemaRoot: string,
  clientRoots: readonly ClientRoot[],
  options: ValidateStructureOptions = {}
): Promise<StructureReport> {
  const discovery = { ...DEFAULT_DISCOVERY_OPTIONS, ...options.discovery };
  const modules = options.modules
    ? [...options.modules]
    : [...(await discoverModules(schemaRoot, discovery))];

  const ok: ClientEntryCheck[] = [];
  const missing: ClientEntryCheck[] = [];
  const orphaned: OrphanedEntry[] = [];

  for (const clientRoot of clientRoots) {
    if (!(await directoryExists(clientRoot.root))) {
      log.debug(`${clientRoot.ecosystem}: client root not found: ${clientRoot.root}`);
    }

    for (const moduleId of modules) {
      const check = await checkClientEntry(clientRoot, moduleId);
      (check.status === 'ok' ? ok : missing).push(check);
    }

    orphaned.push(...(await findOrphans(clientRoot, modules, discovery.hiddenPrefix)));
  }

  return {
    schemaRoot,
    modules,
    ok,
    missing,
    orphaned,
    status: structureStatus(missing.length, orphaned.length),
  };
}
