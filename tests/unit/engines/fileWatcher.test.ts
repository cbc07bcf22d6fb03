/**
 * File Watcher Tests
 *
 * Relevance filtering is tested directly; one round trip through chokidar
 * covers the debounced trigger.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { FileWatcher } from '../../../src/engines/fileWatcher.js';
import { makeTempDir } from '../../helpers/fakes.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('FileWatcher', () => {
  let root: string;
  let watcher: FileWatcher;
  let onTrigger: Mock<() => void>;

  beforeEach(async () => {
    root = await makeTempDir('watcher');
    onTrigger = vi.fn<() => void>();
    watcher = new FileWatcher({
      root,
      extensions: ['.md', '.txt'],
      excludeFolders: ['.git', 'node_modules'],
      onTrigger,
      debounceMs: 50,
    });
  });

  afterEach(async () => {
    await watcher.stop();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('isRelevant', () => {
    it('should accept recognized extensions under the root', () => {
      expect(watcher.isRelevant(path.join(root, 'a.md'))).toBe(true);
      expect(watcher.isRelevant(path.join(root, 'guide', 'NOTES.TXT'))).toBe(true);
    });

    it('should reject other extensions', () => {
      expect(watcher.isRelevant(path.join(root, 'image.png'))).toBe(false);
      expect(watcher.isRelevant(path.join(root, 'Makefile'))).toBe(false);
    });

    it('should reject excluded folders at any depth', () => {
      expect(watcher.isRelevant(path.join(root, '.git', 'HEAD.md'))).toBe(false);
      expect(watcher.isRelevant(path.join(root, 'pkg', 'node_modules', 'x', 'README.md'))).toBe(
        false
      );
    });

    it('should reject paths outside the root', () => {
      expect(watcher.isRelevant(path.join(path.dirname(root), 'elsewhere.md'))).toBe(false);
    });
  });

  describe('lifecycle', () => {
    it('should report its state and stats', async () => {
      expect(watcher.isWatching()).toBe(false);
      expect(watcher.getStats().startedAt).toBeNull();

      await watcher.start();
      expect(watcher.isWatching()).toBe(true);
      expect(watcher.getStats().startedAt).not.toBeNull();

      await watcher.stop();
      expect(watcher.isWatching()).toBe(false);
    });

    it('should allow stop without start', async () => {
      await expect(watcher.stop()).resolves.toBeUndefined();
    });

    it('should trigger once for a burst of relevant events', async () => {
      // Wider than the awaitWriteFinish poll, so both adds land in one window
      watcher = new FileWatcher({
        root,
        extensions: ['.md'],
        excludeFolders: [],
        onTrigger,
        debounceMs: 400,
      });
      await watcher.start();

      await fs.promises.writeFile(path.join(root, 'a.md'), 'first');
      await fs.promises.writeFile(path.join(root, 'b.md'), 'second');

      await vi.waitFor(() => expect(onTrigger).toHaveBeenCalled(), { timeout: 5000, interval: 50 });
      await new Promise((resolve) => setTimeout(resolve, 300));

      expect(onTrigger).toHaveBeenCalledTimes(1);
      expect(watcher.getStats().triggers).toBe(1);
    });
  });
});
