/**
 * Sync State Module
 *
 * Durable record of which documents have been written to the index, and with
 * what content. A record exists only after the remote write for that content
 * succeeded, which is what makes every tick safe to interrupt and replay.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { atomicWriteJson } from '../utils/atomicWrite.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import { normalizePath } from '../utils/paths.js';
import { stateCorrupt, getErrnoCode, errorMessage, isIndexerError } from '../errors/index.js';
import type { Snapshot, SnapshotEntry } from '../engines/snapshot.js';

// ============================================================================
// Types
// ============================================================================

export interface DocumentRecord {
  /** Relative path, forward-slash separated */
  path: string;
  /** SHA256 of the content last written to the index */
  fingerprint: string;
  mtimeMs: number;
  size: number;
  /** Remote primary key */
  documentId: string;
  /** ISO timestamp of the successful remote write */
  syncedAt: string;
}

const DocumentRecordSchema = z.object({
  path: z.string().min(1),
  fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  mtimeMs: z.number().nonnegative(),
  size: z.number().int().nonnegative(),
  documentId: z.string().min(1),
  syncedAt: z.string(),
});

const SyncStateFileSchema = z.object({
  version: z.string(),
  root: z.string(),
  updatedAt: z.string().nullable(),
  records: z.record(DocumentRecordSchema),
});

type SyncStateFile = z.infer<typeof SyncStateFileSchema>;

// ============================================================================
// Constants
// ============================================================================

export const SYNC_STATE_VERSION = '1.0.0';

/** Larger state files are treated as corrupt rather than parsed */
export const MAX_STATE_FILE_SIZE = 64 * 1024 * 1024; // 64MB

// ============================================================================
// SyncStateManager Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const state = new SyncStateManager('/data/state.json', '/data/docs');
 * await state.load();
 *
 * const changes = diff(state.toSnapshot(), current);
 * // ... after a successful upsert:
 * state.recordSynced(record);
 * await state.save();
 * ```
 */
export class SyncStateManager {
  private readonly statePath: string;
  private readonly root: string;
  private readonly saveMutex = new AsyncMutex('SyncState');
  private cachedRecords: Map<string, DocumentRecord> | null = null;
  private updatedAt: string | null = null;

  /**
   * @param statePath - Absolute path of the JSON state file
   * @param root - Absolute watch root the records are relative to
   */
  constructor(statePath: string, root: string) {
    this.statePath = statePath;
    this.root = normalizePath(root);
  }

  get path(): string {
    return this.statePath;
  }

  // ==========================================================================
  // I/O Methods
  // ==========================================================================

  /**
   * Read the state file. A missing file is an empty state; state recorded
   * for a different watch root is discarded with a warning.
   *
   * @throws IndexerError STATE_CORRUPT
   */
  async load(): Promise<void> {
    const logger = getLogger();
    const data = await this.readStateFile();

    if (!data) {
      logger.debug('SyncState', 'No state file found, starting empty', { statePath: this.statePath });
      this.cachedRecords = new Map();
      this.updatedAt = null;
      return;
    }

    if (normalizePath(data.root) !== this.root) {
      logger.warn('SyncState', 'State belongs to a different watch directory, discarding it', {
        stateRoot: data.root,
        watchRoot: this.root,
      });
      this.cachedRecords = new Map();
      this.updatedAt = null;
      return;
    }

    this.cachedRecords = new Map(
      Object.entries(data.records).map(([key, record]) => [key, { ...record, path: key }])
    );
    this.updatedAt = data.updatedAt;

    logger.debug('SyncState', 'State loaded', {
      statePath: this.statePath,
      count: this.cachedRecords.size,
    });
  }

  private async readStateFile(): Promise<SyncStateFile | null> {
    let raw: string;
    try {
      const stats = await fs.promises.stat(this.statePath);
      if (stats.size > MAX_STATE_FILE_SIZE) {
        throw stateCorrupt(
          this.statePath,
          `file is ${stats.size} bytes (limit ${MAX_STATE_FILE_SIZE})`
        );
      }
      raw = await fs.promises.readFile(this.statePath, 'utf-8');
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        return null;
      }
      if (isIndexerError(error)) {
        throw error;
      }
      throw stateCorrupt(
        this.statePath,
        `cannot read file: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw stateCorrupt(
        this.statePath,
        `invalid JSON: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    const result = SyncStateFileSchema.safeParse(parsed);
    if (!result.success) {
      const details = result.error.errors
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw stateCorrupt(this.statePath, details);
    }

    return result.data;
  }

  /**
   * Write the current records atomically. Saves are serialized and each one
   * writes the records as they are when it acquires the lock, so an older
   * save can never land after a newer one.
   */
  async save(): Promise<void> {
    await this.saveMutex.withLock(async () => {
      const records = this.ensureLoaded();
      const updatedAt = new Date().toISOString();

      const data: SyncStateFile = {
        version: SYNC_STATE_VERSION,
        root: this.root,
        updatedAt,
        records: Object.fromEntries(
          [...records.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        ),
      };

      try {
        await atomicWriteJson(this.statePath, data);
      } catch (error) {
        getLogger().error('SyncState', 'Failed to save state', {
          statePath: this.statePath,
          error: errorMessage(error),
        });
        throw error;
      }

      this.updatedAt = updatedAt;
      getLogger().debug('SyncState', 'State saved', { count: records.size });
    });
  }

  // ==========================================================================
  // Record Operations
  // ==========================================================================

  get(relativePath: string): DocumentRecord | undefined {
    return this.ensureLoaded().get(relativePath);
  }

  has(relativePath: string): boolean {
    return this.ensureLoaded().has(relativePath);
  }

  /**
   * Record a successful remote write. Call only after the index store
   * accepted the row.
   */
  recordSynced(record: DocumentRecord): void {
    this.ensureLoaded().set(record.path, { ...record });
  }

  /**
   * @returns false when no record existed
   */
  remove(relativePath: string): boolean {
    return this.ensureLoaded().delete(relativePath);
  }

  records(): DocumentRecord[] {
    return [...this.ensureLoaded().values()];
  }

  count(): number {
    return this.ensureLoaded().size;
  }

  clear(): void {
    this.ensureLoaded().clear();
  }

  /**
   * ISO timestamp of the last save, or null if never saved
   */
  lastUpdated(): string | null {
    return this.updatedAt;
  }

  /**
   * Records as the "previous" side of a diff
   */
  toSnapshot(): Snapshot {
    const entries = new Map<string, SnapshotEntry>();
    for (const record of this.ensureLoaded().values()) {
      entries.set(record.path, {
        fingerprint: record.fingerprint,
        mtimeMs: record.mtimeMs,
        size: record.size,
      });
    }
    return {
      entries,
      unreadable: new Set(),
      takenAt: this.updatedAt ? Date.parse(this.updatedAt) : 0,
    };
  }

  isLoaded(): boolean {
    return this.cachedRecords !== null;
  }

  private ensureLoaded(): Map<string, DocumentRecord> {
    if (this.cachedRecords === null) {
      throw new Error('Sync state not loaded. Call load() first.');
    }
    return this.cachedRecords;
  }
}
