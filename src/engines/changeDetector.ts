/**
 * Change Detector
 *
 * Pure diff of two snapshots. Paths are compared by key and, for keys present
 * in both, by fingerprint only: a touched file with identical content is
 * unchanged, whatever its mtime says.
 */

import type { Snapshot } from './snapshot.js';

export interface ChangeSet {
  /** In current, not in previous */
  created: string[];
  /** In both, fingerprints differ */
  updated: string[];
  /** In previous, not in current (and not merely unreadable) */
  deleted: string[];
}

export function isEmptyChangeSet(changes: ChangeSet): boolean {
  return changes.created.length === 0 && changes.updated.length === 0 && changes.deleted.length === 0;
}

export function countChanges(changes: ChangeSet): number {
  return changes.created.length + changes.updated.length + changes.deleted.length;
}

/**
 * Diff `previous` (persisted state) against `current` (this tick)
 *
 * A path listed as unreadable in `current` is excluded from every set: it
 * still exists, so it is not deleted, and its content is unknown, so it is
 * not updated. Output lists are sorted.
 *
 * @example
 * ```typescript
 * const changes = diff(state.toSnapshot(), await takeSnapshot(root, options));
 * // => { created: ['new.md'], updated: [], deleted: ['old.md'] }
 * ```
 */
export function diff(previous: Snapshot, current: Snapshot): ChangeSet {
  const created: string[] = [];
  const updated: string[] = [];
  const deleted: string[] = [];

  for (const [path, entry] of current.entries) {
    if (current.unreadable.has(path)) {
      continue;
    }
    const before = previous.entries.get(path);
    if (!before) {
      created.push(path);
    } else if (before.fingerprint !== entry.fingerprint) {
      updated.push(path);
    }
  }

  for (const path of previous.entries.keys()) {
    if (!current.entries.has(path) && !current.unreadable.has(path)) {
      deleted.push(path);
    }
  }

  created.sort();
  updated.sort();
  deleted.sort();

  return { created, updated, deleted };
}
