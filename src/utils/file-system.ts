/**
 * File system operations - reading, writing, and directory listing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Write content by staging it next to the target and renaming over it.
 * Readers see either the old file or the new one, never a partial write.
 * The staged file is removed if anything fails before the swap.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const stagedPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  );

  let mode: number | undefined;
  try {
    mode = (await fs.promises.stat(filePath)).mode;
  } catch { /* new file, default mode */ }

  try {
    await fs.promises.writeFile(stagedPath, content, { encoding: 'utf-8', mode });
    await fs.promises.rename(stagedPath, filePath);
  } catch (error) {
    await fs.promises.rm(stagedPath, { force: true });
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a regular file.
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a directory exists.
 * Alias for isDirectory with clearer intent.
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  return isDirectory(dirPath);
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Remove a directory tree. Missing paths are ignored.
 */
export async function removeDir(dirPath: string): Promise<void> {
  await fs.promises.rm(dirPath, { recursive: true, force: true });
}

/**
 * List the names of immediate subdirectories, in the order the
 * filesystem returns them. Symlinks to directories count as directories.
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink() && (await isDirectory(path.join(dirPath, entry.name)))) {
      names.push(entry.name);
    }
  }

  return names;
}

/**
 * Check whether `child` resolves to `parent` or somewhere below it.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
