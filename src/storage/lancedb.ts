/**
 * LanceDB Index Store
 *
 * {@link IndexStore} backed by a LanceDB table, local (directory path) or
 * LanceDB Cloud (`db://` URI). One row per document, keyed by `id`.
 *
 * Table columns: id, path, content, metadata (JSON text), fingerprint,
 * updated_at, vector.
 */

import * as lancedb from '@lancedb/lancedb';
import { DataType } from 'apache-arrow';
import * as fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { registerCleanup, unregisterCleanup, type CleanupHandler } from '../utils/cleanup.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import { inFilter } from '../utils/sql.js';
import { chunk } from '../utils/concurrency.js';
import {
  dimensionMismatch,
  indexStoreFailed,
  isIndexerError,
  errorMessage,
} from '../errors/index.js';
import {
  DocumentMetadataSchema,
  type DocumentMetadata,
  type IndexStore,
  type MatchResult,
  type RemoteRow,
} from './indexStore.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Row layout in the LanceDB table
 */
type LanceRow = {
  id: string;
  path: string;
  content: string;
  metadata: string;
  fingerprint: string;
  updated_at: string;
  vector: number[];
};

const IdRowSchema = z.object({ id: z.string() });

const MatchRowSchema = z.object({
  id: z.string(),
  path: z.string(),
  content: z.string(),
  metadata: z.string(),
  _distance: z.number(),
});

export interface LanceDBIndexStoreOptions {
  /** Local directory or `db://` URI */
  uri: string;
  /** LanceDB Cloud API key */
  apiKey?: string;
  tableName: string;
  dimension: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Rows per mergeInsert / delete call */
const WRITE_BATCH_SIZE = 500;

/** Upper bound for match() result counts */
const MAX_MATCH_LIMIT = 100;

// ============================================================================
// Helpers
// ============================================================================

function toLanceRow(row: RemoteRow): LanceRow {
  return {
    id: row.id,
    path: row.path,
    content: row.content,
    metadata: JSON.stringify(row.metadata),
    fingerprint: row.fingerprint,
    updated_at: row.updatedAt,
    vector: row.vector,
  };
}

function parseMetadata(raw: string): DocumentMetadata | null {
  try {
    const result = DocumentMetadataSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * Cosine distance to similarity: identical direction 1, orthogonal 0
 */
export function distanceToSimilarity(distance: number): number {
  return 1 - distance;
}

// ============================================================================
// LanceDBIndexStore Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const store = new LanceDBIndexStore({
 *   uri: '/data/lancedb',
 *   tableName: 'documents',
 *   dimension: 1536,
 * });
 * await store.open();
 * await store.upsert([row]);
 * const hits = await store.match(queryVector, 0.5, 5);
 * await store.close();
 * ```
 */
export class LanceDBIndexStore implements IndexStore {
  private readonly options: LanceDBIndexStoreOptions;
  private db: lancedb.Connection | null = null;
  private table: lancedb.Table | null = null;

  /** Serializes writes, and reads against them */
  private readonly mutex = new AsyncMutex('LanceDBIndexStore');

  private cleanupHandler: CleanupHandler | null = null;

  constructor(options: LanceDBIndexStoreOptions) {
    this.options = options;
  }

  get dimension(): number {
    return this.options.dimension;
  }

  private get isCloud(): boolean {
    return this.options.uri.startsWith('db://');
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Connect and open the table if it exists. A missing table is created by
   * the first upsert.
   *
   * @throws IndexerError DIMENSION_MISMATCH when the existing table stores
   *   vectors of another size
   */
  async open(): Promise<void> {
    const logger = getLogger();

    if (this.db) {
      logger.debug('lancedb', 'Database already open');
      return;
    }

    try {
      if (!this.isCloud) {
        await fs.promises.mkdir(this.options.uri, { recursive: true });
      }

      const db = await lancedb.connect(
        this.options.uri,
        this.options.apiKey ? { apiKey: this.options.apiKey } : {}
      );

      const tableNames = await db.tableNames();
      if (tableNames.includes(this.options.tableName)) {
        const table = await db.openTable(this.options.tableName);
        await this.checkTableDimension(table);
        this.table = table;
        logger.debug('lancedb', `Opened existing table: ${this.options.tableName}`);
      } else {
        this.table = null;
        logger.debug('lancedb', 'Table will be created on first upsert');
      }

      this.db = db;
    } catch (error) {
      this.table = null;
      if (isIndexerError(error)) {
        throw error;
      }
      throw indexStoreFailed('open', error instanceof Error ? error : new Error(String(error)));
    }

    this.cleanupHandler = async () => {
      await this.close();
    };
    registerCleanup(this.cleanupHandler, 'LanceDBIndexStore');

    logger.info('lancedb', 'Index store opened', {
      uri: this.options.uri,
      table: this.options.tableName,
    });
  }

  private async checkTableDimension(table: lancedb.Table): Promise<void> {
    const schema = await table.schema();
    const field = schema.fields.find((f) => f.name === 'vector');
    if (field && DataType.isFixedSizeList(field.type) && field.type.listSize !== this.dimension) {
      throw dimensionMismatch(this.dimension, field.type.listSize);
    }
  }

  /**
   * Safe to call more than once
   */
  async close(): Promise<void> {
    if (!this.db) {
      return;
    }

    if (this.cleanupHandler) {
      unregisterCleanup(this.cleanupHandler);
      this.cleanupHandler = null;
    }

    this.table?.close();
    this.db.close();
    this.table = null;
    this.db = null;

    getLogger().debug('lancedb', 'Index store closed');
  }

  private requireDb(): lancedb.Connection {
    if (!this.db) {
      throw new Error('Index store is not open. Call open() first.');
    }
    return this.db;
  }

  private checkDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw dimensionMismatch(this.dimension, vector.length);
    }
  }

  /**
   * Run a driver call, mapping driver failures to transient INDEX_STORE_FAILED
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isIndexerError(error)) {
        throw error;
      }
      throw indexStoreFailed(operation, error instanceof Error ? error : new Error(String(error)));
    }
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  async upsert(rows: RemoteRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    for (const row of rows) {
      this.checkDimension(row.vector);
    }

    const db = this.requireDb();
    const lanceRows = rows.map(toLanceRow);

    await this.mutex.withLock(() =>
      this.run('upsert', async () => {
        for (const batch of chunk(lanceRows, WRITE_BATCH_SIZE)) {
          if (!this.table) {
            this.table = await db.createTable(this.options.tableName, batch);
            getLogger().info('lancedb', `Created table: ${this.options.tableName}`);
            continue;
          }
          await this.table
            .mergeInsert('id')
            .whenMatchedUpdateAll()
            .whenNotMatchedInsertAll()
            .execute(batch);
        }
        getLogger().debug('lancedb', `Upserted ${rows.length} rows`);
      })
    );
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    this.requireDb();

    await this.mutex.withLock(() =>
      this.run('delete', async () => {
        const table = this.table;
        if (!table) {
          return;
        }
        for (const batch of chunk(ids, WRITE_BATCH_SIZE)) {
          await table.delete(inFilter('id', batch));
        }
        getLogger().debug('lancedb', `Deleted ${ids.length} ids`);
      })
    );
  }

  /**
   * Drop the table. The next upsert recreates it.
   */
  async clear(): Promise<void> {
    const db = this.requireDb();

    await this.mutex.withLock(() =>
      this.run('clear', async () => {
        const tableNames = await db.tableNames();
        this.table?.close();
        this.table = null;
        if (tableNames.includes(this.options.tableName)) {
          await db.dropTable(this.options.tableName);
          getLogger().info('lancedb', `Dropped table: ${this.options.tableName}`);
        }
      })
    );
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async listIds(): Promise<string[]> {
    this.requireDb();

    return this.mutex.withLock(() =>
      this.run('listIds', async () => {
        if (!this.table) {
          return [];
        }
        const rows: unknown[] = await this.table.query().select(['id']).toArray();
        return rows.map((row) => IdRowSchema.parse(row).id);
      })
    );
  }

  async count(): Promise<number> {
    this.requireDb();

    return this.mutex.withLock(() =>
      this.run('count', async () => (this.table ? this.table.countRows() : 0))
    );
  }

  async match(embedding: number[], threshold: number, limit: number): Promise<MatchResult[]> {
    this.checkDimension(embedding);
    this.requireDb();
    const safeLimit = Math.min(Math.max(1, Math.floor(limit)), MAX_MATCH_LIMIT);

    return this.mutex.withLock(() =>
      this.run('match', async () => {
        if (!this.table) {
          return [];
        }

        const rows: unknown[] = await this.table
          .vectorSearch(embedding)
          .distanceType('cosine')
          .select(['id', 'path', 'content', 'metadata'])
          .limit(safeLimit)
          .toArray();

        const results: MatchResult[] = [];
        for (const raw of rows) {
          const parsed = MatchRowSchema.safeParse(raw);
          if (!parsed.success) {
            getLogger().warn('lancedb', 'Skipping malformed row in match results', {
              error: errorMessage(parsed.error),
            });
            continue;
          }
          const similarity = distanceToSimilarity(parsed.data._distance);
          if (similarity > threshold) {
            results.push({
              id: parsed.data.id,
              path: parsed.data.path,
              content: parsed.data.content,
              metadata: parseMetadata(parsed.data.metadata),
              similarity,
            });
          }
        }

        results.sort((a, b) => b.similarity - a.similarity);
        return results;
      })
    );
  }
}
