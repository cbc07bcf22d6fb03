/**
 * File Watcher Engine
 *
 * Optional early-tick trigger using chokidar. Filesystem events only ask the
 * poll loop for a tick; the snapshot and the change detector still decide
 * what changed, so a missed or duplicated event costs at most one interval.
 *
 * Features:
 * - add/change/unlink detection for recognized extensions
 * - Debouncing for rapid saves
 * - Excluded folders are never watched
 * - Restart after watcher errors, bounded
 */

import chokidar from 'chokidar';
import { getExtension, isInExcludedFolder, normalizePath, toRelativePath } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import {
  registerCleanup,
  unregisterCleanup,
  isShutdownInProgress,
  type CleanupHandler,
} from '../utils/cleanup.js';
import { errorMessage } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type WatchEvent = 'add' | 'change' | 'unlink';

export interface FileWatcherOptions {
  /** Absolute watch root */
  root: string;
  extensions: readonly string[];
  excludeFolders: readonly string[];
  /** Called after the debounce window closes */
  onTrigger: () => void;
  debounceMs?: number;
}

export interface WatcherStats {
  eventsSeen: number;
  eventsIgnored: number;
  triggers: number;
  errors: number;
  startedAt: number | null;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_DEBOUNCE_DELAY = 500;

/** Stability threshold for awaitWriteFinish */
export const STABILITY_THRESHOLD = 500;

/** Poll interval for awaitWriteFinish */
export const POLL_INTERVAL = 100;

export const MAX_RESTART_ATTEMPTS = 3;

export const RESTART_DELAY_MS = 5000;

// ============================================================================
// FileWatcher Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const watcher = new FileWatcher({
 *   root: '/data/docs',
 *   extensions: ['.md'],
 *   excludeFolders: ['.git'],
 *   onTrigger: () => loop.requestTick(),
 * });
 * await watcher.start();
 * ```
 */
export class FileWatcher {
  private readonly root: string;
  private readonly extensions: ReadonlySet<string>;
  private readonly excludeFolders: readonly string[];
  private readonly onTrigger: () => void;
  private readonly debounceMs: number;

  private watcher: chokidar.FSWatcher | null = null;
  private isRunning = false;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private restartAttempts = 0;
  private cleanupHandler: CleanupHandler | null = null;
  private stats: WatcherStats = {
    eventsSeen: 0,
    eventsIgnored: 0,
    triggers: 0,
    errors: 0,
    startedAt: null,
  };

  constructor(options: FileWatcherOptions) {
    this.root = normalizePath(options.root);
    this.extensions = new Set(options.extensions);
    this.excludeFolders = options.excludeFolders;
    this.onTrigger = options.onTrigger;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_DELAY;
  }

  // ==========================================================================
  // Public Methods
  // ==========================================================================

  async start(): Promise<void> {
    const logger = getLogger();

    if (this.isRunning) {
      logger.warn('FileWatcher', 'Watcher already running, ignoring start request');
      return;
    }

    logger.info('FileWatcher', 'Starting file watcher', { root: this.root });

    const watcher = chokidar.watch(this.root, {
      ignored: this.excludeFolders.map((folder) => `**/${folder}/**`),
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: STABILITY_THRESHOLD,
        pollInterval: POLL_INTERVAL,
      },
      followSymlinks: false,
      usePolling: process.platform === 'win32',
      ignorePermissionErrors: true,
    });

    watcher.on('add', (filePath: string) => this.handleEvent('add', filePath));
    watcher.on('change', (filePath: string) => this.handleEvent('change', filePath));
    watcher.on('unlink', (filePath: string) => this.handleEvent('unlink', filePath));
    watcher.on('error', (error: unknown) => this.onError(error));

    await new Promise<void>((resolve) => {
      watcher.on('ready', () => {
        logger.info('FileWatcher', 'File watcher ready');
        resolve();
      });
    });

    this.watcher = watcher;
    this.isRunning = true;
    this.stats.startedAt = Date.now();

    if (!this.cleanupHandler) {
      this.cleanupHandler = async () => {
        await this.stop();
      };
      registerCleanup(this.cleanupHandler, 'FileWatcher');
    }
  }

  async stop(): Promise<void> {
    const logger = getLogger();

    if (this.cleanupHandler) {
      unregisterCleanup(this.cleanupHandler);
      this.cleanupHandler = null;
    }

    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }

    if (!this.isRunning || !this.watcher) {
      logger.debug('FileWatcher', 'Watcher not running, ignoring stop request');
      return;
    }

    logger.info('FileWatcher', 'Stopping file watcher');
    await this.closeWatcher();

    logger.info('FileWatcher', 'File watcher stopped', { stats: this.stats });
  }

  isWatching(): boolean {
    return this.isRunning;
  }

  getStats(): WatcherStats {
    return { ...this.stats };
  }

  // ==========================================================================
  // Event Handling
  // ==========================================================================

  /**
   * Whether an event on this path should trigger a tick
   */
  isRelevant(absolutePath: string): boolean {
    const relativePath = toRelativePath(absolutePath, this.root);
    if (relativePath.startsWith('..') || isInExcludedFolder(relativePath, this.excludeFolders)) {
      return false;
    }
    return this.extensions.has(getExtension(relativePath));
  }

  private handleEvent(type: WatchEvent, absolutePath: string): void {
    this.stats.eventsSeen++;

    if (!this.isRelevant(absolutePath)) {
      this.stats.eventsIgnored++;
      return;
    }

    getLogger().debug('FileWatcher', `File ${type}: ${absolutePath}`);

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.stats.triggers++;
      this.onTrigger();
    }, this.debounceMs);
  }

  private onError(error: unknown): void {
    const logger = getLogger();
    this.stats.errors++;

    logger.error('FileWatcher', 'Watcher error', {
      error: errorMessage(error),
      restartAttempts: this.restartAttempts,
    });

    if (isShutdownInProgress()) {
      return;
    }

    if (this.restartAttempts >= MAX_RESTART_ATTEMPTS) {
      logger.error('FileWatcher', 'Max restart attempts reached, relying on polling only', {
        maxAttempts: MAX_RESTART_ATTEMPTS,
      });
      return;
    }

    this.restartAttempts++;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.restart().catch((restartError: unknown) => {
        logger.error('FileWatcher', 'Restart failed', { error: errorMessage(restartError) });
      });
    }, RESTART_DELAY_MS);
  }

  private async restart(): Promise<void> {
    if (isShutdownInProgress()) {
      return;
    }
    getLogger().info('FileWatcher', 'Restarting file watcher', { attempt: this.restartAttempts });
    await this.closeWatcher();
    await this.start();
  }

  private async closeWatcher(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    const watcher = this.watcher;
    this.watcher = null;
    this.isRunning = false;
    if (watcher) {
      await watcher.close();
    }
  }
}
