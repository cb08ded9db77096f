import { writeFile, rename, mkdir, readFile, access, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { constants } from 'node:fs';

/**
 * Path for a sibling temp file that a later rename moves into place.
 */
export function tempPathFor(filePath: string, suffix = ''): string {
  return join(dirname(filePath), `.tmp-${randomUUID()}${suffix}`);
}

/**
 * Atomically write a file by writing to a temp location first, then renaming.
 * Readers see either the old content or the new, never a partial file.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = tempPathFor(filePath);
  await writeFile(tmpPath, data, 'utf-8');
  await rename(tmpPath, filePath);
}

/**
 * Atomically write a JSON file with pretty printing.
 */
export async function atomicWriteJSON(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Read a JSON file and parse it. Callers validate the shape.
 */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Check if a file or directory exists.
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Delete a file; a missing file is not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}
