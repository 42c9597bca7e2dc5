import { existsSync } from 'fs';
import { mkdir, readdir, rm, rmdir, stat } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Create a directory recursively. Returns the first directory that had to be
 * created, or undefined when it already existed.
 */
export async function ensureDir(dirPath: string): Promise<string | undefined> {
  return mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists
 */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when `dir` is missing or holds no entries.
 */
export async function isDirEmpty(dir: string): Promise<boolean> {
  try {
    const entries = await readdir(dir);
    return entries.length === 0;
  } catch {
    return true;
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Remove `dir` and then each ancestor up to (not including) `stopAt`, as long
 * as they are empty.
 */
export async function removeEmptyDirs(dir: string, stopAt: string): Promise<void> {
  let current = dir;
  while (current.startsWith(stopAt) && current !== stopAt) {
    if (!(await pathExists(current)) || !(await isDirEmpty(current))) return;
    await rmdir(current);
    current = dirname(current);
  }
}

/**
 * Walk up from a module URL until a directory containing package.json is
 * found. Works from both src/ and the compiled dist/ tree.
 */
export function findPackageRoot(moduleUrl: string): string {
  let dir = dirname(fileURLToPath(moduleUrl));
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) return dir;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${fileURLToPath(moduleUrl)}`);
    }
    dir = parent;
  }
}
