/**
 * Shared results for formatter tests. Paths live under /repo.
 */
import type { SyncSummary } from '../../../../src/core/manifest/types.js';
import type { StructureReport } from '../../../../src/core/structure/types.js';
import { ErrorCodes, ManifestParseError } from '../../../../src/utils/errors.js';

export const ROOT = '/repo';

export function syncSummary(dryRun = false): SyncSummary {
  return {
    modules: ['billing', 'core'],
    dryRun,
    changed: true,
    hasErrors: true,
    outcomes: [
      {
        ecosystem: 'rust',
        manifestPath: '/repo/clients/rust/Cargo.toml',
        status: 'changed',
        members: ['billing', 'core'],
        added: ['billing'],
        removed: ['legacy'],
        written: !dryRun,
      },
      {
        ecosystem: 'go',
        manifestPath: '/repo/clients/go/go.work',
        status: 'unchanged',
        members: ['./billing', './core'],
        added: [],
        removed: [],
        written: false,
      },
      {
        ecosystem: 'java',
        manifestPath: '/repo/clients/java/pom.xml',
        status: 'error',
        members: ['billing', 'core'],
        added: [],
        removed: [],
        written: false,
        error: new ManifestParseError(
          ErrorCodes.MANIFEST_NOT_FOUND,
          'Manifest not found: /repo/clients/java/pom.xml',
          { filePath: '/repo/clients/java/pom.xml' }
        ),
      },
    ],
  };
}

export function structureReport(): StructureReport {
  return {
    schemaRoot: '/repo/proto',
    modules: ['billing', 'core'],
    ok: [
      {
        ecosystem: 'rust',
        module: 'core',
        clientDir: '/repo/clients/rust/core',
        metadataFile: 'Cargo.toml',
        status: 'ok',
      },
    ],
    missing: [
      {
        ecosystem: 'rust',
        module: 'billing',
        clientDir: '/repo/clients/rust/billing',
        metadataFile: 'Cargo.toml',
        status: 'missing',
        reason: 'directory',
      },
      {
        ecosystem: 'go',
        module: 'core',
        clientDir: '/repo/clients/go/core',
        metadataFile: 'go.mod',
        status: 'missing',
        reason: 'metadata',
      },
    ],
    orphaned: [{ ecosystem: 'python', name: 'legacy', path: '/repo/clients/python/legacy' }],
    status: 'fail',
  };
}
