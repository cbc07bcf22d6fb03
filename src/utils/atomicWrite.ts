/**
 * Atomic Write Utilities
 *
 * Content is written to a temp file beside the target and renamed over it,
 * so readers only ever see the old file or the complete new one.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogger } from './logger.js';

let tempCounter = 0;

/**
 * Atomically write content to a file, creating parent directories.
 *
 * The temp name carries timestamp, PID and a counter so that concurrent
 * writers in one or several processes never share a temp file.
 *
 * @param targetPath - Absolute path to the target file
 *
 * @example
 * ```typescript
 * await atomicWrite('/path/to/file.txt', 'Hello, World!');
 * ```
 */
export async function atomicWrite(
  targetPath: string,
  content: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  tempCounter += 1;
  const tempPath = `${targetPath}.tmp.${Date.now()}.${process.pid}.${tempCounter}`;

  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.promises.writeFile(tempPath, content, encoding);
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      getLogger().debug('atomicWrite', 'Failed to remove temp file', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}

/**
 * Atomically write JSON, pretty-printed by default
 *
 * @example
 * ```typescript
 * await atomicWriteJson('/path/to/data.json', { key: 'value' });
 * ```
 */
export async function atomicWriteJson(
  targetPath: string,
  data: unknown,
  pretty: boolean = true
): Promise<void> {
  const content = pretty
    ? JSON.stringify(data, null, 2) + '\n'
    : JSON.stringify(data) + '\n';
  await atomicWrite(targetPath, content);
}
