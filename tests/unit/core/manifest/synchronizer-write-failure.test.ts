/**
 * Tests for syncWorkspaces when a manifest cannot be written.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';

vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/file-system.js')>();
  return {
    ...actual,
    writeFileAtomic: vi.fn(actual.writeFileAtomic),
  };
});

import { writeFileAtomic } from '../../../../src/utils/file-system.js';
import { syncWorkspaces } from '../../../../src/core/manifest/index.js';
import { mergeConfig } from '../../../../src/core/config/loader.js';
import { ErrorCodes, ManifestWriteError } from '../../../../src/utils/errors.js';
import {
  MANIFEST_PATHS,
  createModules,
  createTempDir,
  manifestsFor,
  writeManifests,
} from '../../../helpers/workspace.js';

const mockWriteFileAtomic = vi.mocked(writeFileAtomic);

describe('syncWorkspaces write failures', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('sync-write');
    await createModules(root, ['billing', 'core']);
    await writeManifests(root, ['core']);

    const actual = await vi.importActual<typeof import('../../../../src/utils/file-system.js')>(
      '../../../../src/utils/file-system.js'
    );
    mockWriteFileAtomic.mockImplementation(async (filePath, content) => {
      if (filePath.endsWith('pom.xml')) {
        throw new Error('EACCES: permission denied');
      }
      return actual.writeFileAtomic(filePath, content);
    });
  });

  afterEach(async () => {
    vi.clearAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('should report the failed write as that ecosystem\'s error', async () => {
    const summary = await syncWorkspaces(root, mergeConfig({}));
    const java = summary.outcomes[4];

    expect(summary.hasErrors).toBe(true);
    expect(java.ecosystem).toBe('java');
    expect(java.status).toBe('error');
    expect(java.written).toBe(false);
    expect(java.error).toBeInstanceOf(ManifestWriteError);
    expect(java.error).toMatchObject({
      code: ErrorCodes.MANIFEST_WRITE_ERROR,
      message: `Failed to write ${join(root, MANIFEST_PATHS.java)}: EACCES: permission denied`,
    });
  });

  it('should leave the failed manifest byte-identical', async () => {
    await syncWorkspaces(root, mergeConfig({}));

    expect(await readFile(join(root, MANIFEST_PATHS.java), 'utf-8')).toBe(manifestsFor(['core'])[MANIFEST_PATHS.java]);
    expect(await readdir(join(root, 'clients/java'))).toEqual(['pom.xml']);
  });

  it('should still write the other ecosystems', async () => {
    const summary = await syncWorkspaces(root, mergeConfig({}));

    expect(summary.outcomes.map((o) => [o.ecosystem, o.status, o.written])).toEqual([
      ['rust', 'changed', true],
      ['go', 'changed', true],
      ['python', 'changed', true],
      ['typescript', 'changed', true],
      ['java', 'error', false],
    ]);
    const expected = manifestsFor(['billing', 'core']);
    for (const ecosystem of ['rust', 'go', 'python', 'typescript'] as const) {
      const relative = MANIFEST_PATHS[ecosystem];
      expect(await readFile(join(root, relative), 'utf-8')).toBe(expected[relative]);
    }
  });
});
