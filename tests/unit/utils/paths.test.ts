/**
 * Path Utilities Tests
 */

import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  normalizePath,
  toRelativePath,
  expandTilde,
  getExtension,
  isInExcludedFolder,
} from '../../../src/utils/paths.js';

describe('Path Utilities', () => {
  const base = path.join(os.tmpdir(), 'docs-root');

  describe('normalizePath', () => {
    it('should resolve relative paths and drop a trailing separator', () => {
      expect(normalizePath(base + path.sep)).toBe(base);
      expect(path.isAbsolute(normalizePath('docs'))).toBe(true);
    });
  });

  describe('toRelativePath', () => {
    it('should use forward slashes', () => {
      expect(toRelativePath(path.join(base, 'guide', 'intro.md'), base)).toBe('guide/intro.md');
    });

    it('should keep decomposed names as they are on disk', () => {
      const decomposed = 'cafe\u0301.md';
      expect(toRelativePath(path.join(base, decomposed), base)).toBe(decomposed);
    });
  });

  describe('expandTilde', () => {
    it('should expand a leading tilde only', () => {
      expect(expandTilde('~/docs')).toBe(path.join(os.homedir(), 'docs'));
      expect(expandTilde('a/~/b')).toBe('a/~/b');
    });
  });

  describe('getExtension', () => {
    it('should lowercase and keep the dot', () => {
      expect(getExtension('Notes.MD')).toBe('.md');
      expect(getExtension('README')).toBe('');
    });
  });

  describe('isInExcludedFolder', () => {
    it('should match directory segments at any depth', () => {
      expect(isInExcludedFolder('node_modules/pkg/README.md', ['node_modules'])).toBe(true);
      expect(isInExcludedFolder('a/b/.git/HEAD.md', ['.git'])).toBe(true);
    });

    it('should not match the file name itself', () => {
      expect(isInExcludedFolder('venv', ['venv'])).toBe(false);
      expect(isInExcludedFolder('docs/venv.md', ['venv'])).toBe(false);
    });
  });
});
