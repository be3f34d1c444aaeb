/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  readFile,
  writeFile,
  writeFileAtomic,
  fileExists,
  isFile,
  isDirectory,
  directoryExists,
  ensureDir,
  removeDir,
  listDirectories,
  isWithin,
} from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, existsSync, readdirSync, symlinkSync, chmodSync, statSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `modsync-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile / writeFile', () => {
    it('should create parent directories when writing', async () => {
      const filePath = join(tempDir, 'a', 'b', 'file.txt');

      await writeFile(filePath, 'content');

      expect(await readFile(filePath)).toBe('content');
    });

    it('should throw for non-existent file', async () => {
      await expect(readFile(join(tempDir, 'missing.txt'))).rejects.toThrow();
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace the file and leave no staged file behind', async () => {
      const filePath = join(tempDir, 'Cargo.toml');
      writeFileSync(filePath, 'old');

      await writeFileAtomic(filePath, 'new');

      expect(await readFile(filePath)).toBe('new');
      expect(readdirSync(tempDir)).toEqual(['Cargo.toml']);
    });

    it('should keep the mode of the file it replaces', async () => {
      const filePath = join(tempDir, 'go.work');
      writeFileSync(filePath, 'go 1.22\n');
      chmodSync(filePath, 0o600);

      await writeFileAtomic(filePath, 'go 1.23\n');

      expect(statSync(filePath).mode & 0o777).toBe(0o600);
    });

    it('should clean up the staged file when the target directory is missing', async () => {
      const filePath = join(tempDir, 'missing', 'pom.xml');

      await expect(writeFileAtomic(filePath, '<project/>')).rejects.toThrow();
      expect(readdirSync(tempDir)).toEqual([]);
    });
  });

  describe('existence checks', () => {
    it('should tell files and directories apart', async () => {
      const filePath = join(tempDir, 'file.txt');
      writeFileSync(filePath, 'x');

      expect(await fileExists(filePath)).toBe(true);
      expect(await isFile(filePath)).toBe(true);
      expect(await isDirectory(filePath)).toBe(false);
      expect(await directoryExists(tempDir)).toBe(true);
      expect(await isFile(tempDir)).toBe(false);
    });

    it('should return false for non-existent paths', async () => {
      const missing = join(tempDir, 'nope');

      expect(await fileExists(missing)).toBe(false);
      expect(await isFile(missing)).toBe(false);
      expect(await directoryExists(missing)).toBe(false);
    });
  });

  describe('ensureDir / removeDir', () => {
    it('should create nested directories and remove them again', async () => {
      const dirPath = join(tempDir, 'a', 'b', 'c');

      await ensureDir(dirPath);
      expect(existsSync(dirPath)).toBe(true);

      await removeDir(join(tempDir, 'a'));
      expect(existsSync(join(tempDir, 'a'))).toBe(false);
    });

    it('should ignore a missing directory on removal', async () => {
      await expect(removeDir(join(tempDir, 'missing'))).resolves.toBeUndefined();
    });
  });

  describe('listDirectories', () => {
    it('should list subdirectories and symlinks to directories only', async () => {
      mkdirSync(join(tempDir, 'billing'));
      mkdirSync(join(tempDir, 'core'));
      writeFileSync(join(tempDir, 'README.md'), '# schemas');
      symlinkSync(join(tempDir, 'core'), join(tempDir, 'linked'));
      symlinkSync(join(tempDir, 'README.md'), join(tempDir, 'linked-file'));

      const names = await listDirectories(tempDir);

      expect([...names].sort()).toEqual(['billing', 'core', 'linked']);
    });
  });

  describe('isWithin', () => {
    it('should accept the parent itself and its descendants', () => {
      expect(isWithin('/repo/proto/billing', '/repo/proto/billing')).toBe(true);
      expect(isWithin('/repo/proto/billing', '/repo/proto/billing/v1/billing.proto')).toBe(true);
    });

    it('should reject siblings and traversal', () => {
      expect(isWithin('/repo/proto/billing', '/repo/proto/billing-extra/x')).toBe(false);
      expect(isWithin('/repo/proto/billing', '/repo/proto/billing/../core/x')).toBe(false);
    });
  });
});
