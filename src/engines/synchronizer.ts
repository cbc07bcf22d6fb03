/**
 * Synchronizer
 *
 * Applies a {@link ChangeSet} to the index store and owns every transition of
 * the persisted sync state:
 *
 * - created/updated: read -> embed -> upsert -> record
 * - deleted: delete -> forget
 *
 * State changes only after the remote call for that document succeeded, so
 * a failure or a crash at any point leaves the document detected as changed
 * on the next tick. Remote writes are idempotent (upsert and delete by id),
 * which makes the replay harmless.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogger } from '../utils/logger.js';
import { fingerprint } from '../utils/hash.js';
import { getExtension } from '../utils/paths.js';
import { chunk, runWithConcurrency } from '../utils/concurrency.js';
import { retryWithBackoff, type RetryPolicy, type Sleeper } from '../utils/retry.js';
import {
  ErrorCode,
  emptyDocument,
  errorMessage,
  fileTooLarge,
  fileUnreadable,
  fromFsError,
  isIndexerError,
} from '../errors/index.js';
import type { SyncStateManager } from '../storage/syncState.js';
import type { IndexStore, RemoteRow } from '../storage/indexStore.js';
import type { EmbeddingClient } from './embedding.js';
import { diff, countChanges, type ChangeSet } from './changeDetector.js';
import { takeSnapshot } from './snapshot.js';
import { documentIdFor } from './documentId.js';

// ============================================================================
// Types
// ============================================================================

export interface SynchronizerOptions {
  /** Absolute watch root */
  root: string;
  extensions: readonly string[];
  excludeFolders: readonly string[];
  maxFileSize: number;
  embedder: EmbeddingClient;
  store: IndexStore;
  state: SyncStateManager;
  /** Documents per embedding/upsert call */
  batchSize: number;
  /** Batches in flight */
  concurrency: number;
  retryPolicy: RetryPolicy;
  sleep?: Sleeper;
  now?: () => Date;
}

export type SyncOperation = 'read' | 'embed' | 'upsert' | 'delete';

export interface SkippedDocument {
  path: string;
  code: ErrorCode;
  reason: string;
}

export interface FailedDocument {
  path: string;
  operation: SyncOperation;
  message: string;
}

export interface SyncReport {
  created: string[];
  updated: string[];
  deleted: string[];
  /** Unreadable, empty or oversize documents, retried next tick */
  skipped: SkippedDocument[];
  /** Documents whose remote call failed, retried next tick */
  failed: FailedDocument[];
  /** Changes not started because shutdown was requested */
  deferred: number;
  durationMs: number;
}

export type ProgressCallback = (done: number, total: number, path: string) => void;

export interface SyncRunOptions {
  /** Once aborted, no new batch is started; running batches finish */
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

type ChangeKind = 'created' | 'updated';

/**
 * A document read from disk, ready to embed
 */
interface PreparedDocument {
  path: string;
  kind: ChangeKind;
  content: string;
  fingerprint: string;
  mtimeMs: number;
  size: number;
  documentId: string;
}

interface EmbeddedDocument extends PreparedDocument {
  vector: number[];
}

/** Read-time conditions that skip a document for this tick */
const SKIP_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.FILE_NOT_FOUND,
  ErrorCode.PERMISSION_DENIED,
  ErrorCode.FILE_UNREADABLE,
  ErrorCode.EMPTY_DOCUMENT,
  ErrorCode.FILE_TOO_LARGE,
]);

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function emptyReport(): SyncReport {
  return {
    created: [],
    updated: [],
    deleted: [],
    skipped: [],
    failed: [],
    deferred: 0,
    durationMs: 0,
  };
}

// ============================================================================
// Synchronizer Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const synchronizer = new Synchronizer({ root, embedder, store, state, ... });
 * const report = await synchronizer.tick({ signal: controller.signal });
 * console.log(`${report.created.length} created, ${report.failed.length} failed`);
 * ```
 */
export class Synchronizer {
  private readonly options: SynchronizerOptions;
  private reconciled = false;
  private pendingSave = false;

  constructor(options: SynchronizerOptions) {
    this.options = options;
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  /**
   * One full pass: reconcile (first pass only), snapshot, diff, apply
   */
  async tick(runOptions: SyncRunOptions = {}): Promise<SyncReport> {
    const logger = getLogger();

    if (!this.reconciled) {
      try {
        await this.reconcile();
        this.reconciled = true;
      } catch (error) {
        logger.error('synchronizer', 'Startup reconciliation failed, retrying next tick', {
          error: errorMessage(error),
        });
      }
    }

    const changes = await this.detectChanges();
    return this.apply(changes, runOptions);
  }

  /**
   * Diff persisted state against the tree as it is now. No remote calls.
   */
  async detectChanges(): Promise<ChangeSet> {
    const previous = this.options.state.toSnapshot();
    const current = await takeSnapshot(this.options.root, {
      extensions: this.options.extensions,
      excludeFolders: this.options.excludeFolders,
      previous,
    });
    return diff(previous, current);
  }

  /**
   * Drop state records whose row is missing from the index store, so they
   * are uploaded again as created. Rows with no matching record are left
   * alone.
   *
   * @returns Number of records dropped
   */
  async reconcile(): Promise<number> {
    const logger = getLogger();
    const { state, store } = this.options;

    if (state.count() === 0) {
      return 0;
    }

    const remoteIds = new Set(
      await retryWithBackoff(() => store.listIds(), this.options.retryPolicy, {
        label: 'listIds',
        sleep: this.options.sleep,
      })
    );

    let dropped = 0;
    for (const record of state.records()) {
      if (!remoteIds.has(record.documentId)) {
        logger.warn('synchronizer', `Tracked document missing from index, will re-upload: ${record.path}`);
        state.remove(record.path);
        dropped++;
      }
    }

    if (dropped > 0) {
      await state.save();
    }

    logger.info('synchronizer', 'Reconciled state with index', {
      tracked: state.count(),
      dropped,
    });
    return dropped;
  }

  // ==========================================================================
  // Apply
  // ==========================================================================

  /**
   * Apply a change set: deletions first, then created and updated documents
   * in batches. Never throws for a single document's failure; those land in
   * the report.
   */
  async apply(changes: ChangeSet, runOptions: SyncRunOptions = {}): Promise<SyncReport> {
    const logger = getLogger();
    const startedAt = Date.now();
    const report = emptyReport();
    const total = countChanges(changes);
    const { signal } = runOptions;

    if (total === 0) {
      logger.debug('synchronizer', 'No changes');
      report.durationMs = Date.now() - startedAt;
      return report;
    }

    logger.info('synchronizer', 'Applying changes', {
      created: changes.created.length,
      updated: changes.updated.length,
      deleted: changes.deleted.length,
    });

    let done = 0;
    const progress = (relativePath: string): void => {
      done++;
      runOptions.onProgress?.(done, total, relativePath);
    };

    // Deletions
    const deleteBatches = chunk(changes.deleted, this.options.batchSize);
    for (const batch of deleteBatches) {
      if (signal?.aborted) {
        break;
      }
      await this.deleteBatch(batch, report, progress);
      await this.saveState();
    }

    // Creations and updates
    const upserts: Array<{ path: string; kind: ChangeKind }> = [
      ...changes.created.map((p) => ({ path: p, kind: 'created' as const })),
      ...changes.updated.map((p) => ({ path: p, kind: 'updated' as const })),
    ];

    await runWithConcurrency(
      chunk(upserts, this.options.batchSize),
      this.options.concurrency,
      async (batch) => {
        await this.upsertBatch(batch, report, progress);
        await this.saveState();
      },
      () => !signal?.aborted
    );

    if (this.pendingSave) {
      // An earlier save failed; the records are still in memory
      await this.options.state.save();
      this.pendingSave = false;
    }

    report.deferred = total - done;
    report.durationMs = Date.now() - startedAt;

    if (report.deferred > 0) {
      logger.info('synchronizer', `Shutdown requested, ${report.deferred} changes deferred`);
    }

    return report;
  }

  private async saveState(): Promise<void> {
    try {
      await this.options.state.save();
      this.pendingSave = false;
    } catch (error) {
      this.pendingSave = true;
      getLogger().error('synchronizer', 'Failed to save sync state, will retry', {
        error: errorMessage(error),
      });
    }
  }

  // ==========================================================================
  // Deletions
  // ==========================================================================

  private async deleteBatch(
    paths: string[],
    report: SyncReport,
    progress: (relativePath: string) => void
  ): Promise<void> {
    const { state } = this.options;
    const targets = paths.map((p) => ({
      path: p,
      id: state.get(p)?.documentId ?? documentIdFor(p),
    }));

    const succeeded = (target: { path: string }): void => {
      state.remove(target.path);
      report.deleted.push(target.path);
      getLogger().info('synchronizer', `Deleted document: ${target.path}`);
      progress(target.path);
    };

    try {
      await this.withRetry('delete', () => this.options.store.delete(targets.map((t) => t.id)));
      targets.forEach(succeeded);
      return;
    } catch (error) {
      if (targets.length === 1) {
        this.recordFailure(report, targets[0].path, 'delete', error);
        progress(targets[0].path);
        return;
      }
      getLogger().warn('synchronizer', 'Batch delete failed, retrying documents one by one', {
        count: targets.length,
        error: errorMessage(error),
      });
    }

    for (const target of targets) {
      try {
        await this.withRetry('delete', () => this.options.store.delete([target.id]));
        succeeded(target);
      } catch (error) {
        this.recordFailure(report, target.path, 'delete', error);
        progress(target.path);
      }
    }
  }

  // ==========================================================================
  // Creations and Updates
  // ==========================================================================

  private async upsertBatch(
    batch: Array<{ path: string; kind: ChangeKind }>,
    report: SyncReport,
    progress: (relativePath: string) => void
  ): Promise<void> {
    const prepared: PreparedDocument[] = [];
    for (const item of batch) {
      const document = await this.prepare(item.path, item.kind, report);
      if (document) {
        prepared.push(document);
      } else {
        progress(item.path);
      }
    }

    if (prepared.length === 0) {
      return;
    }

    const embedded = await this.embedDocuments(prepared, report);
    for (const document of prepared) {
      if (!embedded.some((e) => e.path === document.path)) {
        progress(document.path);
      }
    }

    if (embedded.length === 0) {
      return;
    }

    await this.upsertDocuments(embedded, report, progress);
  }

  /**
   * Read a document. Returns null (and records a skip) when it cannot be
   * indexed this tick.
   */
  private async prepare(
    relativePath: string,
    kind: ChangeKind,
    report: SyncReport
  ): Promise<PreparedDocument | null> {
    try {
      const { bytes, mtimeMs } = await this.readDocument(relativePath);

      let content: string;
      try {
        content = utf8.decode(bytes);
      } catch (error) {
        throw fileUnreadable(
          relativePath,
          'content is not valid UTF-8',
          error instanceof Error ? error : undefined
        );
      }

      if (content.trim().length === 0) {
        throw emptyDocument(relativePath);
      }

      return {
        path: relativePath,
        kind,
        content,
        fingerprint: fingerprint(bytes),
        mtimeMs,
        size: bytes.length,
        documentId: documentIdFor(relativePath),
      };
    } catch (error) {
      if (isIndexerError(error) && SKIP_CODES.has(error.code)) {
        getLogger().warn('synchronizer', `Skipping ${relativePath}: ${error.developerMessage}`, {
          code: error.code,
        });
        report.skipped.push({ path: relativePath, code: error.code, reason: error.userMessage });
        return null;
      }
      this.recordFailure(report, relativePath, 'read', error);
      return null;
    }
  }

  /**
   * Bytes and mtime from one open handle, so both describe the same file
   */
  private async readDocument(relativePath: string): Promise<{ bytes: Buffer; mtimeMs: number }> {
    const absolutePath = path.join(this.options.root, relativePath);

    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(absolutePath, 'r');
    } catch (error) {
      throw fromFsError(relativePath, error);
    }

    try {
      const stats = await handle.stat();
      if (stats.size > this.options.maxFileSize) {
        throw fileTooLarge(relativePath, stats.size, this.options.maxFileSize);
      }
      const bytes = await handle.readFile();
      if (bytes.length > this.options.maxFileSize) {
        throw fileTooLarge(relativePath, bytes.length, this.options.maxFileSize);
      }
      return { bytes, mtimeMs: stats.mtimeMs };
    } catch (error) {
      throw fromFsError(relativePath, error);
    } finally {
      await handle.close();
    }
  }

  /**
   * Embed a batch in one call, falling back to one call per document when
   * the batch call fails, so a failure is attributed to its document only
   */
  private async embedDocuments(
    documents: PreparedDocument[],
    report: SyncReport
  ): Promise<EmbeddedDocument[]> {
    const { embedder } = this.options;

    try {
      const vectors = await this.withRetry('embedBatch', () =>
        embedder.embedBatch(documents.map((d) => d.content))
      );
      return documents.map((document, i) => ({ ...document, vector: vectors[i] }));
    } catch (error) {
      if (documents.length === 1) {
        this.recordFailure(report, documents[0].path, 'embed', error);
        return [];
      }
      getLogger().warn('synchronizer', 'Batch embedding failed, retrying documents one by one', {
        count: documents.length,
        error: errorMessage(error),
      });
    }

    const embedded: EmbeddedDocument[] = [];
    for (const document of documents) {
      try {
        const vector = await this.withRetry('embed', () => embedder.embed(document.content));
        embedded.push({ ...document, vector });
      } catch (error) {
        this.recordFailure(report, document.path, 'embed', error);
      }
    }
    return embedded;
  }

  private async upsertDocuments(
    documents: EmbeddedDocument[],
    report: SyncReport,
    progress: (relativePath: string) => void
  ): Promise<void> {
    const { store } = this.options;
    const rows = documents.map((document) => this.toRow(document));

    try {
      await this.withRetry('upsert', () => store.upsert(rows));
      documents.forEach((document) => {
        this.recordSuccess(document, report);
        progress(document.path);
      });
      return;
    } catch (error) {
      if (documents.length === 1) {
        this.recordFailure(report, documents[0].path, 'upsert', error);
        progress(documents[0].path);
        return;
      }
      getLogger().warn('synchronizer', 'Batch upsert failed, retrying documents one by one', {
        count: documents.length,
        error: errorMessage(error),
      });
    }

    for (const [i, document] of documents.entries()) {
      try {
        await this.withRetry('upsert', () => store.upsert([rows[i]]));
        this.recordSuccess(document, report);
      } catch (error) {
        this.recordFailure(report, document.path, 'upsert', error);
      }
      progress(document.path);
    }
  }

  private toRow(document: EmbeddedDocument): RemoteRow {
    const now = (this.options.now?.() ?? new Date()).toISOString();
    return {
      id: document.documentId,
      path: document.path,
      content: document.content,
      fingerprint: document.fingerprint,
      updatedAt: now,
      vector: document.vector,
      metadata: {
        source: document.path,
        filename: path.posix.basename(document.path),
        fingerprint: document.fingerprint,
        size: document.size,
        lastModified: new Date(document.mtimeMs).toISOString(),
        indexedAt: now,
        extension: getExtension(document.path),
      },
    };
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private recordSuccess(document: EmbeddedDocument, report: SyncReport): void {
    this.options.state.recordSynced({
      path: document.path,
      fingerprint: document.fingerprint,
      mtimeMs: document.mtimeMs,
      size: document.size,
      documentId: document.documentId,
      syncedAt: (this.options.now?.() ?? new Date()).toISOString(),
    });

    if (document.kind === 'created') {
      report.created.push(document.path);
      getLogger().info('synchronizer', `Created document: ${document.path}`);
    } else {
      report.updated.push(document.path);
      getLogger().info('synchronizer', `Updated document: ${document.path}`);
    }
  }

  private recordFailure(
    report: SyncReport,
    relativePath: string,
    operation: SyncOperation,
    error: unknown
  ): void {
    const message = isIndexerError(error) ? error.developerMessage : errorMessage(error);
    report.failed.push({ path: relativePath, operation, message });
    getLogger().error('synchronizer', `Failed to ${operation} ${relativePath}, deferring to next tick`, {
      error: message,
    });
  }

  private withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return retryWithBackoff(operation, this.options.retryPolicy, {
      label,
      sleep: this.options.sleep,
    });
  }
}

/**
 * One-line summary of a report for logs and the CLI
 */
export function summarizeReport(report: SyncReport): string {
  return (
    `${report.created.length} created, ${report.updated.length} updated, ` +
    `${report.deleted.length} deleted, ${report.skipped.length} skipped, ` +
    `${report.failed.length} failed (${report.durationMs}ms)`
  );
}
