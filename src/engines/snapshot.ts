/**
 * Directory Snapshotter
 *
 * Walks the watch root and fingerprints every recognized document. A file's
 * previous fingerprint is reused when its mtime and size are unchanged, so
 * an idle tree is stat-ed but not re-read.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { hashFile } from '../utils/hash.js';
import { getLogger } from '../utils/logger.js';
import { toRelativePath, getExtension, isInExcludedFolder } from '../utils/paths.js';
import {
  getErrnoCode,
  errorMessage,
  isNotFoundError,
  watchRootInaccessible,
} from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SnapshotEntry {
  /** SHA256 of the file content */
  fingerprint: string;
  mtimeMs: number;
  size: number;
}

/**
 * Immutable view of the watched tree at one tick, keyed by relative path
 */
export interface Snapshot {
  readonly entries: ReadonlyMap<string, SnapshotEntry>;
  /**
   * Files that were listed but could not be fingerprinted this tick.
   * They are neither created, updated nor deleted until they can be read.
   */
  readonly unreadable: ReadonlySet<string>;
  readonly takenAt: number;
}

export interface SnapshotOptions {
  /** Lowercase extensions with leading dot */
  extensions: readonly string[];
  /** Directory names skipped anywhere in the tree */
  excludeFolders?: readonly string[];
  /** Snapshot of the previous tick, used for the mtime/size pre-filter */
  previous?: Snapshot;
}

export function emptySnapshot(takenAt: number = Date.now()): Snapshot {
  return { entries: new Map(), unreadable: new Set(), takenAt };
}

/** Parallel fingerprint reads */
const HASH_BATCH_SIZE = 50;

// ============================================================================
// Watch Root
// ============================================================================

export type WatchRootStatus = 'ok' | 'missing';

/**
 * Startup check of the watch root
 *
 * @returns 'missing' when the directory does not exist (yet)
 * @throws IndexerError WATCH_ROOT_INACCESSIBLE when the path exists but is
 *   not a readable directory
 */
export async function checkWatchRoot(root: string): Promise<WatchRootStatus> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(root);
  } catch (error) {
    if (getErrnoCode(error) === 'ENOENT') {
      return 'missing';
    }
    throw watchRootInaccessible(root, errorMessage(error));
  }

  if (!stats.isDirectory()) {
    throw watchRootInaccessible(root, 'not a directory');
  }

  try {
    await fs.promises.access(root, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    throw watchRootInaccessible(root, errorMessage(error));
  }

  return 'ok';
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Recognized documents under `root`, as sorted relative paths
 */
export async function listDocuments(
  root: string,
  extensions: readonly string[],
  excludeFolders: readonly string[] = []
): Promise<string[]> {
  const files = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    follow: false,
    absolute: false,
    posix: true,
    ignore: excludeFolders.map((folder) => `**/${folder}/**`),
  });

  return files
    .map((file) => toRelativePath(path.join(root, file), root))
    .filter(
      (relative) =>
        extensions.includes(getExtension(relative)) &&
        !isInExcludedFolder(relative, excludeFolders)
    )
    .sort();
}

/**
 * Take a snapshot of the watch root
 *
 * A missing root yields an empty snapshot with a warning. Files that vanish
 * or cannot be read during the walk are logged and recorded as unreadable.
 */
export async function takeSnapshot(root: string, options: SnapshotOptions): Promise<Snapshot> {
  const logger = getLogger();
  const takenAt = Date.now();

  if ((await checkWatchRoot(root)) === 'missing') {
    logger.warn('snapshot', 'Watch directory does not exist, treating it as empty', { root });
    return emptySnapshot(takenAt);
  }

  const files = await listDocuments(root, options.extensions, options.excludeFolders);
  const entries = new Map<string, SnapshotEntry>();
  const unreadable = new Set<string>();
  let reused = 0;

  for (let i = 0; i < files.length; i += HASH_BATCH_SIZE) {
    const batch = files.slice(i, i + HASH_BATCH_SIZE);

    await Promise.all(
      batch.map(async (relativePath) => {
        const absolutePath = path.join(root, relativePath);
        try {
          const stats = await fs.promises.lstat(absolutePath);
          if (!stats.isFile()) {
            return;
          }

          const known = options.previous?.entries.get(relativePath);
          if (known && known.mtimeMs === stats.mtimeMs && known.size === stats.size) {
            entries.set(relativePath, known);
            reused++;
            return;
          }

          const fingerprint = await hashFile(absolutePath);
          entries.set(relativePath, { fingerprint, mtimeMs: stats.mtimeMs, size: stats.size });
        } catch (error) {
          if (isNotFoundError(error)) {
            // Removed between listing and stat: gone for this tick
            logger.debug('snapshot', `File vanished during walk: ${relativePath}`);
            return;
          }
          logger.warn('snapshot', `Skipping unreadable file: ${relativePath}`, {
            error: errorMessage(error),
          });
          unreadable.add(relativePath);
        }
      })
    );
  }

  logger.debug('snapshot', 'Snapshot taken', {
    files: entries.size,
    reused,
    unreadable: unreadable.size,
  });

  return { entries, unreadable, takenAt };
}
