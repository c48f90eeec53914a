import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ArtifactNotFoundError } from './errors.js';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Create a directory tree; existing directories are fine. */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

/**
 * Throw ArtifactNotFoundError unless `path` exists.
 */
export async function assertExists(path: string, description: string): Promise<void> {
  if (!(await pathExists(path))) {
    throw new ArtifactNotFoundError(description, path);
  }
}

export async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}

/** Remove a file or directory tree. Returns false when nothing was there. */
export async function removePath(path: string): Promise<boolean> {
  if (!(await pathExists(path))) return false;
  await rm(path, { recursive: true, force: true });
  return true;
}
