/**
 * Indexer Service
 *
 * Wires configuration, logging, the index store, sync state, embedding client
 * and synchronizer together, and runs the long-lived watch process.
 *
 * Startup order:
 * 1. Logger (file output when LOG_DIR is set)
 * 2. Watch root check (fatal only when the root exists but is unusable)
 * 3. Index store open (fatal on dimension mismatch)
 * 4. Sync state load (fatal when corrupt)
 */

import { createLogger, getLogger, flushLogger, parseLogLevel } from './utils/logger.js';
import { registerCleanup, runCleanup, isShutdownInProgress } from './utils/cleanup.js';
import { defaultRetryPolicy, type Sleeper } from './utils/retry.js';
import { describeConfig, type IndexerConfig } from './storage/config.js';
import { SyncStateManager } from './storage/syncState.js';
import { LanceDBIndexStore } from './storage/lancedb.js';
import type { IndexStore } from './storage/indexStore.js';
import { OpenAIEmbeddingClient, type EmbeddingClient } from './engines/embedding.js';
import { checkWatchRoot } from './engines/snapshot.js';
import { Synchronizer, summarizeReport, type SyncReport, type SyncRunOptions } from './engines/synchronizer.js';
import { PollLoop } from './engines/pollLoop.js';
import { FileWatcher } from './engines/fileWatcher.js';
import { errorMessage } from './errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface IndexerServices {
  config: IndexerConfig;
  state: SyncStateManager;
  store: IndexStore;
  embedder: EmbeddingClient;
  synchronizer: Synchronizer;
}

/**
 * Collaborator replacements, used by tests
 */
export interface ServiceOverrides {
  store?: IndexStore;
  embedder?: EmbeddingClient;
  sleep?: Sleeper;
}

// ============================================================================
// Setup
// ============================================================================

/**
 * Point the process-wide logger at the configured directory and level
 */
export function initLogging(config: IndexerConfig): void {
  const level = parseLogLevel(config.logLevel);
  if (config.logDir) {
    createLogger(config.logDir, { level });
  } else {
    getLogger().setLevel(level);
  }
}

/**
 * Open every collaborator. On failure, whatever was opened is closed again.
 *
 * @throws IndexerError WATCH_ROOT_INACCESSIBLE, DIMENSION_MISMATCH,
 *   STATE_CORRUPT, INDEX_STORE_FAILED
 */
export async function openServices(
  config: IndexerConfig,
  overrides: ServiceOverrides = {}
): Promise<IndexerServices> {
  const logger = getLogger();

  const rootStatus = await checkWatchRoot(config.watchDir);
  if (rootStatus === 'missing') {
    logger.warn('service', 'Watch directory does not exist yet, treating it as empty', {
      watchDir: config.watchDir,
    });
  }

  const store =
    overrides.store ??
    new LanceDBIndexStore({
      uri: config.index.uri,
      apiKey: config.index.apiKey,
      tableName: config.index.table,
      dimension: config.embedding.dimension,
    });
  await store.open();

  const state = new SyncStateManager(config.statePath, config.watchDir);
  try {
    await state.load();
  } catch (error) {
    await store.close();
    throw error;
  }

  const embedder =
    overrides.embedder ??
    new OpenAIEmbeddingClient({
      apiKey: config.embedding.apiKey,
      model: config.embedding.model,
      baseUrl: config.embedding.baseUrl,
      dimension: config.embedding.dimension,
      timeoutMs: config.embedding.timeoutMs,
    });

  const synchronizer = new Synchronizer({
    root: config.watchDir,
    extensions: config.fileExtensions,
    excludeFolders: config.excludeFolders,
    maxFileSize: config.maxFileSize,
    embedder,
    store,
    state,
    batchSize: config.sync.batchSize,
    concurrency: config.sync.concurrency,
    retryPolicy: defaultRetryPolicy(config.retry),
    sleep: overrides.sleep,
  });

  return { config, state, store, embedder, synchronizer };
}

export async function closeServices(services: IndexerServices): Promise<void> {
  await services.store.close();
}

// ============================================================================
// Ticks
// ============================================================================

/**
 * One pass with the outcome logged: a summary when anything happened, and
 * the deferred documents when some failed
 */
export async function runLoggedTick(
  synchronizer: Synchronizer,
  options: SyncRunOptions = {}
): Promise<SyncReport> {
  const logger = getLogger();
  const report = await synchronizer.tick(options);

  const touched =
    report.created.length +
    report.updated.length +
    report.deleted.length +
    report.skipped.length +
    report.failed.length;

  if (touched > 0) {
    logger.info('service', `Sync pass: ${summarizeReport(report)}`);
  } else {
    logger.debug('service', 'Sync pass: no changes');
  }

  if (report.failed.length > 0) {
    logger.warn('service', `${report.failed.length} documents deferred to the next tick`, {
      failed: report.failed.map((f) => `${f.operation} ${f.path}`),
    });
  }

  return report;
}

// ============================================================================
// Watch
// ============================================================================

export interface WatchHandle {
  loop: PollLoop;
  watcher: FileWatcher | null;
  /** Wait for the in-flight tick, then run every cleanup handler. Repeat calls share one shutdown. */
  shutdown(): Promise<void>;
}

/**
 * Start the poll loop (and the event trigger when enabled). Returns once the
 * first tick has been scheduled; the process stays alive on the loop's timer.
 */
export async function startWatching(services: IndexerServices): Promise<WatchHandle> {
  const logger = getLogger();
  const { config, synchronizer } = services;

  logger.info('service', 'Starting docs-vector-sync', describeConfig(config));

  const loop = new PollLoop(async (signal) => {
    await runLoggedTick(synchronizer, { signal });
  }, config.pollingIntervalMs);

  let watcher: FileWatcher | null = null;
  if (config.watchEvents) {
    watcher = new FileWatcher({
      root: config.watchDir,
      extensions: config.fileExtensions,
      excludeFolders: config.excludeFolders,
      onTrigger: () => loop.requestTick(),
    });
    try {
      await watcher.start();
    } catch (error) {
      logger.warn('service', 'Filesystem events unavailable, relying on polling', {
        error: errorMessage(error),
      });
      watcher = null;
    }
  }

  // Covers shutdown paths that only run the cleanup registry
  registerCleanup(async () => {
    await loop.stop();
  }, 'PollLoop');

  loop.start();

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = async (): Promise<void> => {
    // Outside the cleanup timeout: a tick with retries can run for minutes
    await loop.stop();
    await runCleanup();
    await flushLogger();
  };

  return {
    loop,
    watcher,
    shutdown: () => {
      if (!shutdownPromise) {
        shutdownPromise = shutdown();
      }
      return shutdownPromise;
    },
  };
}

/**
 * Stop on SIGINT/SIGTERM: finish the in-flight tick, close everything, exit 0
 */
export function installSignalHandlers(handle: WatchHandle): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (isShutdownInProgress()) {
      return;
    }
    getLogger().info('service', `Received ${signal}, shutting down`);
    handle
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
