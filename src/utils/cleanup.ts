/**
 * Cleanup Registry Module
 *
 * Resources (poll loop, file watcher, index store) register shutdown handlers
 * here. On SIGINT/SIGTERM they run in LIFO order, each with a timeout, and a
 * failing handler does not stop the others.
 */

import { getLogger } from './logger.js';

export type CleanupHandler = () => Promise<void>;

interface CleanupHandlerEntry {
  handler: CleanupHandler;
  name: string;
}

/**
 * Default timeout for each cleanup handler (30 seconds)
 */
export const DEFAULT_CLEANUP_TIMEOUT = 30000;

const cleanupHandlers: CleanupHandlerEntry[] = [];

let isShuttingDown = false;
let cleanupCompleted = false;

/**
 * Register a handler to run on shutdown
 *
 * @example
 * ```typescript
 * registerCleanup(async () => {
 *   await loop.stop();
 * }, 'PollLoop');
 * ```
 */
export function registerCleanup(handler: CleanupHandler, name: string = 'anonymous'): void {
  if (isShuttingDown || cleanupCompleted) {
    getLogger().warn('cleanup', 'Attempted to register handler during/after shutdown', { name });
    return;
  }

  cleanupHandlers.push({ handler, name });
  getLogger().debug('cleanup', `Registered cleanup handler: ${name}`, {
    totalHandlers: cleanupHandlers.length,
  });
}

/**
 * Remove a handler, for resources closed explicitly before shutdown
 */
export function unregisterCleanup(handler: CleanupHandler): void {
  const index = cleanupHandlers.findIndex((entry) => entry.handler === handler);
  if (index === -1) {
    return;
  }
  const [removed] = cleanupHandlers.splice(index, 1);
  getLogger().debug('cleanup', `Unregistered cleanup handler: ${removed.name}`, {
    totalHandlers: cleanupHandlers.length,
  });
}

/**
 * Run all handlers, most recently registered first. Runs at most once.
 */
export async function runCleanup(timeoutMs: number = DEFAULT_CLEANUP_TIMEOUT): Promise<void> {
  const logger = getLogger();

  if (isShuttingDown || cleanupCompleted) {
    logger.debug('cleanup', 'Cleanup already started, skipping');
    return;
  }

  isShuttingDown = true;
  logger.info('cleanup', `Running ${cleanupHandlers.length} cleanup handlers...`);

  const handlersToRun = [...cleanupHandlers].reverse();
  cleanupHandlers.length = 0;

  for (const entry of handlersToRun) {
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      logger.debug('cleanup', `Running cleanup handler: ${entry.name}`);

      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Cleanup handler '${entry.name}' timed out after ${timeoutMs}ms`)),
          timeoutMs
        );
      });

      await Promise.race([entry.handler(), timeoutPromise]);
      logger.debug('cleanup', `Cleanup handler completed: ${entry.name}`);
    } catch (error) {
      logger.error('cleanup', `Cleanup handler '${entry.name}' failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      clearTimeout(timer);
    }
  }

  cleanupCompleted = true;
  logger.info('cleanup', 'All cleanup handlers completed');
}

export function isShutdownInProgress(): boolean {
  return isShuttingDown;
}

export function getCleanupHandlerCount(): number {
  return cleanupHandlers.length;
}

/**
 * Reset the registry. Tests only.
 */
export function resetCleanupRegistry(): void {
  cleanupHandlers.length = 0;
  isShuttingDown = false;
  cleanupCompleted = false;
}
