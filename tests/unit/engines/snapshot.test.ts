/**
 * Directory Snapshot Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  checkWatchRoot,
  listDocuments,
  takeSnapshot,
  type Snapshot,
} from '../../../src/engines/snapshot.js';
import { fingerprint } from '../../../src/utils/hash.js';
import { ErrorCode } from '../../../src/errors/index.js';
import { makeTempDir, writeDoc } from '../../helpers/fakes.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

const EXTENSIONS = ['.md', '.txt'];

describe('Snapshot', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('snapshot');
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('checkWatchRoot', () => {
    it('should accept an existing directory', async () => {
      expect(await checkWatchRoot(root)).toBe('ok');
    });

    it('should report a missing directory', async () => {
      expect(await checkWatchRoot(path.join(root, 'nope'))).toBe('missing');
    });

    it('should reject a file', async () => {
      const file = await writeDoc(root, 'a.md', 'x');
      await expect(checkWatchRoot(file)).rejects.toMatchObject({
        code: ErrorCode.WATCH_ROOT_INACCESSIBLE,
        developerMessage: `Watch root ${file} is not usable: not a directory`,
      });
    });
  });

  describe('listDocuments', () => {
    it('should filter by extension and excluded folders', async () => {
      await writeDoc(root, 'a.md', 'a');
      await writeDoc(root, 'sub/b.TXT', 'b');
      await writeDoc(root, 'c.rst', 'c');
      await writeDoc(root, 'node_modules/pkg/README.md', 'd');
      await writeDoc(root, '.notes/d.md', 'e');

      expect(await listDocuments(root, EXTENSIONS, ['node_modules'])).toEqual([
        '.notes/d.md',
        'a.md',
        'sub/b.TXT',
      ]);
    });

    it('should exclude folders at any depth', async () => {
      await writeDoc(root, 'guide/drafts/wip.md', 'w');
      await writeDoc(root, 'guide/final.md', 'f');

      expect(await listDocuments(root, EXTENSIONS, ['drafts'])).toEqual(['guide/final.md']);
    });
  });

  describe('takeSnapshot', () => {
    it('should fingerprint every document', async () => {
      await writeDoc(root, 'a.md', 'alpha');
      await writeDoc(root, 'nested/b.txt', 'beta', 1_700_000_100);

      const snapshot = await takeSnapshot(root, { extensions: EXTENSIONS });

      expect([...snapshot.entries.keys()].sort()).toEqual(['a.md', 'nested/b.txt']);
      expect(snapshot.entries.get('a.md')).toEqual({
        fingerprint: fingerprint(Buffer.from('alpha')),
        mtimeMs: 1_700_000_000_000,
        size: 5,
      });
      expect(snapshot.entries.get('nested/b.txt')?.mtimeMs).toBe(1_700_000_100_000);
      expect(snapshot.unreadable.size).toBe(0);
    });

    it('should key a decomposed file name as it is on disk', async () => {
      const decomposed = 'cafe\u0301.md';
      await writeDoc(root, decomposed, 'alpha');

      const snapshot = await takeSnapshot(root, { extensions: EXTENSIONS });

      expect([...snapshot.entries.keys()]).toEqual([decomposed]);
      expect(snapshot.entries.get(decomposed)?.fingerprint).toBe(fingerprint(Buffer.from('alpha')));
      expect(snapshot.unreadable.size).toBe(0);
    });

    it('should treat a missing root as empty', async () => {
      const snapshot = await takeSnapshot(path.join(root, 'missing'), { extensions: EXTENSIONS });
      expect(snapshot.entries.size).toBe(0);
    });

    it('should reuse fingerprints when mtime and size match', async () => {
      await writeDoc(root, 'a.md', 'alpha');
      const stale = 'f'.repeat(64);
      const previous: Snapshot = {
        entries: new Map([['a.md', { fingerprint: stale, mtimeMs: 1_700_000_000_000, size: 5 }]]),
        unreadable: new Set(),
        takenAt: 0,
      };

      const snapshot = await takeSnapshot(root, { extensions: EXTENSIONS, previous });

      expect(snapshot.entries.get('a.md')?.fingerprint).toBe(stale);
    });

    it('should rehash when the mtime moved', async () => {
      await writeDoc(root, 'a.md', 'alpha', 1_700_000_500);
      const previous: Snapshot = {
        entries: new Map([
          ['a.md', { fingerprint: 'f'.repeat(64), mtimeMs: 1_700_000_000_000, size: 5 }],
        ]),
        unreadable: new Set(),
        takenAt: 0,
      };

      const snapshot = await takeSnapshot(root, { extensions: EXTENSIONS, previous });

      expect(snapshot.entries.get('a.md')).toEqual({
        fingerprint: fingerprint(Buffer.from('alpha')),
        mtimeMs: 1_700_000_500_000,
        size: 5,
      });
    });

    it('should leave symlinks out', async () => {
      const target = await writeDoc(root, 'real.md', 'content');
      await fs.promises.symlink(target, path.join(root, 'link.md'));

      const snapshot = await takeSnapshot(root, { extensions: EXTENSIONS });

      expect([...snapshot.entries.keys()]).toEqual(['real.md']);
      expect(snapshot.unreadable.size).toBe(0);
    });
  });
});
