/**
 * Atomic Write Utilities
 *
 * Output artifacts are written to a temporary file and renamed into place,
 * so a crashed run never leaves a half-written chart, map or table behind.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Atomically write string data to file, creating parent directories
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space) + '\n');
}
