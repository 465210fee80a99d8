/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * A reader of the target path sees either the previous complete file or
 * the new complete file, never a partially written one. A crash between
 * temp-file creation and rename leaves an orphaned `*.tmp.*` file next to
 * the target; it is never read back.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Suffix marker for in-flight temp files.
 */
export const TEMP_FILE_MARKER = '.tmp.';

/**
 * Atomically write JSON data to a file.
 *
 * The temp file is fsync'd before the rename so the renamed file is durable.
 *
 * @param filePath - Target file path
 * @param data - Data to write (will be JSON.stringify'd with 2-space indent)
 * @throws Error with the target path in the message; the original error is the cause
 *
 * @example
 * await atomicWriteJson('/runs/r1/run-state.json', { schemaVersion: 1, ... });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}${TEMP_FILE_MARKER}${process.pid}.${Date.now()}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(json, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    const cleanupError = await fs.rm(tempPath, { force: true }).then(
      () => null,
      (e: unknown) => e
    );
    const message = error instanceof Error ? error.message : String(error);
    const leftover = cleanupError ? ` (temp file left at ${tempPath})` : '';
    throw new Error(`Atomic write failed for ${filePath}: ${message}${leftover}`, {
      cause: error,
    });
  }
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data (unvalidated)
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Read and parse a JSON file, returning null when it does not exist.
 */
export async function readJsonIfExists(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  return readJson(filePath);
}

/**
 * Check if a file exists (not a directory)
 *
 * @param filePath - Path to check
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Narrow an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
