/**
 * LanceDB Index Store Tests
 *
 * Runs against a real local LanceDB table in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { LanceDBIndexStore, distanceToSimilarity } from '../../../src/storage/lancedb.js';
import type { RemoteRow } from '../../../src/storage/indexStore.js';
import { ErrorCode } from '../../../src/errors/index.js';
import { makeTempDir, TEST_DIMENSION } from '../../helpers/fakes.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

function row(id: string, relativePath: string, vector: number[], content = `text of ${relativePath}`): RemoteRow {
  return {
    id,
    path: relativePath,
    content,
    metadata: {
      source: relativePath,
      filename: path.posix.basename(relativePath),
      fingerprint: 'a'.repeat(64),
      size: content.length,
      lastModified: '2023-11-14T22:13:20.000Z',
      indexedAt: '2024-01-01T00:00:00.000Z',
      extension: path.posix.extname(relativePath),
    },
    fingerprint: 'a'.repeat(64),
    updatedAt: '2024-01-01T00:00:00.000Z',
    vector,
  };
}

describe('LanceDBIndexStore', () => {
  let dir: string;
  let store: LanceDBIndexStore;

  beforeEach(async () => {
    dir = await makeTempDir('lancedb');
    store = new LanceDBIndexStore({
      uri: path.join(dir, 'db'),
      tableName: 'documents',
      dimension: TEST_DIMENSION,
    });
    await store.open();
  });

  afterEach(async () => {
    await store.close();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  describe('distanceToSimilarity', () => {
    it('should map cosine distance to similarity', () => {
      expect(distanceToSimilarity(0)).toBe(1);
      expect(distanceToSimilarity(1)).toBe(0);
      expect(distanceToSimilarity(0.25)).toBe(0.75);
    });
  });

  describe('lifecycle', () => {
    it('should create the database directory', () => {
      expect(fs.existsSync(path.join(dir, 'db'))).toBe(true);
    });

    it('should report an empty store before the first write', async () => {
      expect(await store.count()).toBe(0);
      expect(await store.listIds()).toEqual([]);
      expect(await store.match([1, 0, 0, 0], 0, 5)).toEqual([]);
    });

    it('should refuse calls after close', async () => {
      await store.close();
      await expect(store.count()).rejects.toThrow('Index store is not open. Call open() first.');
    });

    it('should allow close more than once', async () => {
      await store.close();
      await expect(store.close()).resolves.toBeUndefined();
    });
  });

  describe('writes', () => {
    it('should create the table on first upsert', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0]), row('id-b', 'b.md', [0, 1, 0, 0])]);

      expect(await store.count()).toBe(2);
      expect((await store.listIds()).sort()).toEqual(['id-a', 'id-b']);
    });

    it('should replace rows with the same id', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0], 'old')]);
      await store.upsert([row('id-a', 'a.md', [0, 0, 1, 0], 'new')]);

      expect(await store.count()).toBe(1);
      const [hit] = await store.match([0, 0, 1, 0], 0.5, 5);
      expect(hit.content).toBe('new');
    });

    it('should delete by id and ignore absent ids', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0]), row('id-b', 'b.md', [0, 1, 0, 0])]);

      await store.delete(['id-a', 'id-missing']);

      expect(await store.listIds()).toEqual(['id-b']);
    });

    it('should accept deletes before the table exists', async () => {
      await expect(store.delete(['id-a'])).resolves.toBeUndefined();
    });

    it('should reject vectors of the wrong dimension', async () => {
      await expect(store.upsert([row('id-a', 'a.md', [1, 0, 0])])).rejects.toMatchObject({
        code: ErrorCode.DIMENSION_MISMATCH,
      });
    });

    it('should drop everything on clear', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0])]);
      await store.clear();

      expect(await store.count()).toBe(0);

      await store.upsert([row('id-b', 'b.md', [0, 1, 0, 0])]);
      expect(await store.listIds()).toEqual(['id-b']);
    });
  });

  describe('match', () => {
    beforeEach(async () => {
      await store.upsert([
        row('id-a', 'guide/a.md', [1, 0, 0, 0]),
        row('id-b', 'b.md', [0, 1, 0, 0]),
        row('id-c', 'c.md', [1, 1, 0, 0]),
      ]);
    });

    it('should return rows above the threshold, closest first', async () => {
      const results = await store.match([1, 0, 0, 0], 0.5, 5);

      expect(results.map((r) => r.id)).toEqual(['id-a', 'id-c']);
      expect(results[0].similarity).toBeCloseTo(1, 5);
      expect(results[1].similarity).toBeCloseTo(Math.SQRT1_2, 5);
    });

    it('should return parsed metadata', async () => {
      const [hit] = await store.match([1, 0, 0, 0], 0.9, 1);

      expect(hit.path).toBe('guide/a.md');
      expect(hit.metadata).toEqual(row('id-a', 'guide/a.md', [1, 0, 0, 0]).metadata);
    });

    it('should honor the limit', async () => {
      const results = await store.match([1, 1, 0, 0], 0, 1);
      expect(results.map((r) => r.id)).toEqual(['id-c']);
    });

    it('should reject a query of the wrong dimension', async () => {
      await expect(store.match([1, 0], 0.5, 5)).rejects.toMatchObject({
        code: ErrorCode.DIMENSION_MISMATCH,
      });
    });
  });

  describe('reopen', () => {
    it('should keep rows across connections', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0])]);
      await store.close();

      const reopened = new LanceDBIndexStore({
        uri: path.join(dir, 'db'),
        tableName: 'documents',
        dimension: TEST_DIMENSION,
      });
      await reopened.open();
      expect(await reopened.listIds()).toEqual(['id-a']);
      await reopened.close();
    });

    it('should refuse a table of another dimension', async () => {
      await store.upsert([row('id-a', 'a.md', [1, 0, 0, 0])]);
      await store.close();

      const mismatched = new LanceDBIndexStore({
        uri: path.join(dir, 'db'),
        tableName: 'documents',
        dimension: 8,
      });
      await expect(mismatched.open()).rejects.toMatchObject({
        code: ErrorCode.DIMENSION_MISMATCH,
        developerMessage: 'Vector dimension mismatch. Expected 8, got 4',
      });
    });
  });
});
