/**
 * Hash Utilities Module
 *
 * SHA256 content fingerprints. Two documents with equal fingerprints are
 * treated as having equal content.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { getLogger } from './logger.js';
import { fromFsError, fileUnreadable } from '../errors/index.js';

/** Files above this size are hashed with a read stream */
const STREAMING_THRESHOLD = 10 * 1024 * 1024; // 10MB

/**
 * Fingerprint raw content
 *
 * @returns Full SHA256 hex digest (64 characters)
 *
 * @example
 * ```typescript
 * fingerprint(Buffer.from('hello world'))
 * // => 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
 * ```
 */
export function fingerprint(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

/**
 * Fingerprint a file's content
 *
 * Symlinks are rejected so that a document always belongs to the watched tree.
 *
 * @param filePath - Absolute path to the file
 * @throws IndexerError FILE_NOT_FOUND, PERMISSION_DENIED or FILE_UNREADABLE
 */
export async function hashFile(filePath: string): Promise<string> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.lstat(filePath);
  } catch (error) {
    throw fromFsError(filePath, error);
  }

  if (stats.isSymbolicLink()) {
    throw fileUnreadable(filePath, 'symbolic links are not followed');
  }

  try {
    if (stats.size > STREAMING_THRESHOLD) {
      getLogger().debug('hash', `Using streaming for large file: ${filePath}`, { size: stats.size });
      return await hashFileStream(filePath);
    }
    const content = await fs.promises.readFile(filePath);
    return fingerprint(content);
  } catch (error) {
    throw fromFsError(filePath, error);
  }
}

async function hashFileStream(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(hash.digest('hex'));
    });

    stream.on('error', (error) => {
      reject(error);
    });
  });
}
