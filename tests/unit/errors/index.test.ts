/**
 * Error Handling Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ErrorCode,
  IndexerError,
  configInvalid,
  missingCredentials,
  stateCorrupt,
  fileNotFound,
  fileTooLarge,
  embeddingFailed,
  embeddingRateLimited,
  indexStoreFailed,
  dimensionMismatch,
  isTransientError,
  isNotFoundError,
  getErrnoCode,
  fromFsError,
  errorMessage,
} from '../../../src/errors/index.js';

const mockLogger = vi.hoisted(() => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => mockLogger,
}));

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Error Handling', () => {
  beforeEach(() => {
    mockLogger.error.mockClear();
  });

  describe('IndexerError', () => {
    it('should carry both messages and the code', () => {
      const error = new IndexerError({
        code: ErrorCode.INDEX_STORE_FAILED,
        userMessage: 'Something went wrong',
        developerMessage: 'table.add threw',
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(IndexerError);
      expect(error.message).toBe('table.add threw');
      expect(error.name).toBe('IndexerError[INDEX_STORE_FAILED]');
      expect(error.transient).toBe(false);
      expect(error.toString()).toBe('IndexerError[INDEX_STORE_FAILED]: table.add threw');
    });

    it('should log non-file errors at construction', () => {
      missingCredentials('EMBEDDING_API_KEY');

      expect(mockLogger.error).toHaveBeenCalledWith(
        'IndexerError',
        'Missing required credential: EMBEDDING_API_KEY',
        { code: 'MISSING_CREDENTIALS', transient: false }
      );
    });

    it('should not log expected per-file conditions', () => {
      fileNotFound('/docs/gone.md');
      fileTooLarge('/docs/big.md', 2048, 1024);

      expect(mockLogger.error).not.toHaveBeenCalled();
    });

    it('should serialize the cause summary', () => {
      const error = indexStoreFailed('upsert', new TypeError('bad batch'));

      expect(error.toJSON()).toEqual({
        code: 'INDEX_STORE_FAILED',
        userMessage: 'The vector index could not be updated. Work will be retried.',
        developerMessage: 'Index store upsert failed: bad batch',
        transient: true,
        cause: { name: 'TypeError', message: 'bad batch' },
      });
    });
  });

  describe('factories', () => {
    it('should list each invalid variable', () => {
      const error = configInvalid(['POLLING_INTERVAL: must be positive', 'BATCH_SIZE: required']);

      expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(error.userMessage).toBe(
        'Invalid configuration:\n  POLLING_INTERVAL: must be positive\n  BATCH_SIZE: required'
      );
      expect(error.developerMessage).toBe(
        'Configuration validation failed: POLLING_INTERVAL: must be positive; BATCH_SIZE: required'
      );
    });

    it('should point at reset for corrupt state', () => {
      const error = stateCorrupt('/tmp/state.json', 'Unexpected token');
      expect(error.developerMessage).toBe('Invalid sync state at /tmp/state.json: Unexpected token');
      expect(error.transient).toBe(false);
    });

    it('should report both dimensions', () => {
      expect(dimensionMismatch(1536, 768).developerMessage).toBe(
        'Vector dimension mismatch. Expected 1536, got 768'
      );
    });

    it('should include size and limit', () => {
      expect(fileTooLarge('/docs/big.md', 2048, 1024).developerMessage).toBe(
        'File /docs/big.md is 2048 bytes (limit 1024)'
      );
    });
  });

  describe('isTransientError', () => {
    it('should follow the flag on IndexerErrors', () => {
      expect(isTransientError(embeddingRateLimited('HTTP 429'))).toBe(true);
      expect(isTransientError(embeddingFailed('HTTP 500', true))).toBe(true);
      expect(isTransientError(embeddingFailed('HTTP 401', false))).toBe(false);
      expect(isTransientError(dimensionMismatch(4, 3))).toBe(false);
    });

    it('should treat foreign errors as transient', () => {
      expect(isTransientError(new Error('socket hang up'))).toBe(true);
      expect(isTransientError('string rejection')).toBe(true);
    });
  });

  describe('filesystem errors', () => {
    it('should read errno codes from system errors only', () => {
      expect(getErrnoCode(systemError('ENOENT', 'missing'))).toBe('ENOENT');
      expect(getErrnoCode(new Error('plain'))).toBeUndefined();
      expect(getErrnoCode(fileNotFound('/x'))).toBeUndefined();
    });

    it('should recognise missing files in both forms', () => {
      expect(isNotFoundError(systemError('ENOENT', 'missing'))).toBe(true);
      expect(isNotFoundError(fileNotFound('/x'))).toBe(true);
      expect(isNotFoundError(systemError('EACCES', 'denied'))).toBe(false);
    });

    it('should map errno codes to per-file errors', () => {
      expect(fromFsError('/d/a.md', systemError('ENOENT', 'missing')).code).toBe(
        ErrorCode.FILE_NOT_FOUND
      );
      expect(fromFsError('/d/a.md', systemError('EACCES', 'denied')).code).toBe(
        ErrorCode.PERMISSION_DENIED
      );
      expect(fromFsError('/d/a.md', systemError('EPERM', 'denied')).code).toBe(
        ErrorCode.PERMISSION_DENIED
      );

      const other = fromFsError('/d/a.md', systemError('EIO', 'i/o error'));
      expect(other.code).toBe(ErrorCode.FILE_UNREADABLE);
      expect(other.developerMessage).toBe('Unreadable file /d/a.md: i/o error');
    });

    it('should pass IndexerErrors through', () => {
      const original = fileTooLarge('/d/a.md', 10, 5);
      expect(fromFsError('/d/a.md', original)).toBe(original);
    });
  });

  describe('errorMessage', () => {
    it('should read messages from errors and stringify the rest', () => {
      expect(errorMessage(new Error('oops'))).toBe('oops');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
