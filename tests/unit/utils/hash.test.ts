/**
 * Hash Utilities Tests
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { fingerprint, hashFile } from '../../../src/utils/hash.js';
import { ErrorCode, IndexerError } from '../../../src/errors/index.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('Hash Utilities', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docs-vector-sync-hash-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('fingerprint', () => {
    it('should match known SHA256 outputs', () => {
      expect(fingerprint(new Uint8Array())).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(fingerprint(new TextEncoder().encode('abc'))).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });

    it('should differ when content differs', () => {
      expect(fingerprint(Buffer.from('X'))).not.toBe(fingerprint(Buffer.from('Y')));
    });
  });

  describe('hashFile', () => {
    it('should hash file content', async () => {
      const filePath = path.join(tempDir, 'a.md');
      fs.writeFileSync(filePath, 'hello world');

      expect(await hashFile(filePath)).toBe(
        'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
      );
    });

    it('should throw FILE_NOT_FOUND for a missing file', async () => {
      const error = await hashFile(path.join(tempDir, 'missing.md')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexerError);
      expect(error).toMatchObject({ code: ErrorCode.FILE_NOT_FOUND });
    });

    it('should refuse symbolic links', async () => {
      const target = path.join(tempDir, 'target.md');
      const link = path.join(tempDir, 'link.md');
      fs.writeFileSync(target, 'content');
      fs.symlinkSync(target, link);

      await expect(hashFile(link)).rejects.toMatchObject({ code: ErrorCode.FILE_UNREADABLE });
    });
  });
});
