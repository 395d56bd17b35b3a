/**
 * Postwatch — JSON state files
 *
 * Small persisted state (endpoint health, seen ids) lives in JSON files under
 * ARCHIVE_DIR. Writes go to a temp file first and are renamed into place.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  return JSON.parse(raw);
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  await rename(tempPath, filePath);
}
