/**
 * Error Handling System
 *
 * Every failure the indexer reports carries two messages:
 * - userMessage: what an operator should read
 * - developerMessage: technical details for the log
 *
 * Errors also carry a `transient` flag. Transient errors (rate limits,
 * timeouts, network and store I/O) are retried with backoff and deferred to
 * the next tick; the rest are skipped for the tick or, for configuration
 * problems, end the process.
 */

import { getLogger } from '../utils/logger.js';

export enum ErrorCode {
  /** Configuration value failed validation */
  CONFIG_INVALID = 'CONFIG_INVALID',
  /** A required credential is missing */
  MISSING_CREDENTIALS = 'MISSING_CREDENTIALS',
  /** Watch root exists but cannot be used as a directory */
  WATCH_ROOT_INACCESSIBLE = 'WATCH_ROOT_INACCESSIBLE',
  /** Persisted sync state is unreadable */
  STATE_CORRUPT = 'STATE_CORRUPT',
  /** File vanished between listing and reading */
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  /** Insufficient permissions to read a path */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** File content is not valid UTF-8 or could not be read */
  FILE_UNREADABLE = 'FILE_UNREADABLE',
  /** File has no indexable content */
  EMPTY_DOCUMENT = 'EMPTY_DOCUMENT',
  /** File exceeds the configured size limit */
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  /** Embedding request failed */
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  /** Embedding API rejected the request with a rate limit */
  EMBEDDING_RATE_LIMITED = 'EMBEDDING_RATE_LIMITED',
  /** Index store operation failed */
  INDEX_STORE_FAILED = 'INDEX_STORE_FAILED',
  /** Vector length does not match the configured dimension */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
}

/**
 * Per-file conditions that are expected during normal operation. Callers log
 * these themselves at WARN, so construction does not log them at ERROR.
 */
const QUIET_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.FILE_NOT_FOUND,
  ErrorCode.PERMISSION_DENIED,
  ErrorCode.FILE_UNREADABLE,
  ErrorCode.EMPTY_DOCUMENT,
  ErrorCode.FILE_TOO_LARGE,
]);

export interface IndexerErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  /** Whether retrying the same operation later can succeed (default: false) */
  transient?: boolean;
  cause?: Error;
}

export class IndexerError extends Error {
  readonly code: ErrorCode;
  readonly userMessage: string;
  readonly developerMessage: string;
  readonly transient: boolean;
  readonly cause?: Error;

  constructor(options: IndexerErrorOptions) {
    super(options.developerMessage);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.transient = options.transient ?? false;
    this.cause = options.cause;

    Object.setPrototypeOf(this, IndexerError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IndexerError);
    }

    this.name = `IndexerError[${this.code}]`;

    if (!QUIET_CODES.has(this.code)) {
      this.logError();
    }
  }

  private logError(): void {
    const meta: Record<string, unknown> = {
      code: this.code,
      transient: this.transient,
    };

    if (this.cause) {
      meta.cause = {
        name: this.cause.name,
        message: this.cause.message,
      };
    }

    getLogger().error('IndexerError', this.developerMessage, meta);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      transient: this.transient,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * One or more configuration values failed validation
 *
 * @param details - One line per offending variable
 */
export function configInvalid(details: string[]): IndexerError {
  return new IndexerError({
    code: ErrorCode.CONFIG_INVALID,
    userMessage: `Invalid configuration:\n  ${details.join('\n  ')}`,
    developerMessage: `Configuration validation failed: ${details.join('; ')}`,
  });
}

export function missingCredentials(variable: string): IndexerError {
  return new IndexerError({
    code: ErrorCode.MISSING_CREDENTIALS,
    userMessage: `${variable} must be set (in the environment or a .env file).`,
    developerMessage: `Missing required credential: ${variable}`,
  });
}

export function watchRootInaccessible(rootPath: string, reason: string): IndexerError {
  return new IndexerError({
    code: ErrorCode.WATCH_ROOT_INACCESSIBLE,
    userMessage: `The watch directory cannot be used: ${reason}`,
    developerMessage: `Watch root ${rootPath} is not usable: ${reason}`,
  });
}

export function stateCorrupt(statePath: string, details: string, cause?: Error): IndexerError {
  return new IndexerError({
    code: ErrorCode.STATE_CORRUPT,
    userMessage:
      'The sync state file is corrupted. Delete it (or run `reset`) to rebuild the index.',
    developerMessage: `Invalid sync state at ${statePath}: ${details}`,
    cause,
  });
}

export function fileNotFound(filePath: string): IndexerError {
  return new IndexerError({
    code: ErrorCode.FILE_NOT_FOUND,
    userMessage: 'The file could not be found.',
    developerMessage: `File not found: ${filePath}`,
  });
}

export function permissionDenied(filePath: string, cause?: Error): IndexerError {
  return new IndexerError({
    code: ErrorCode.PERMISSION_DENIED,
    userMessage: 'Access denied. Check that the indexer can read this file.',
    developerMessage: `Permission denied reading: ${filePath}`,
    cause,
  });
}

export function fileUnreadable(filePath: string, reason: string, cause?: Error): IndexerError {
  return new IndexerError({
    code: ErrorCode.FILE_UNREADABLE,
    userMessage: 'The file could not be read as text.',
    developerMessage: `Unreadable file ${filePath}: ${reason}`,
    cause,
  });
}

export function emptyDocument(filePath: string): IndexerError {
  return new IndexerError({
    code: ErrorCode.EMPTY_DOCUMENT,
    userMessage: 'The file is empty and was not indexed.',
    developerMessage: `Empty document: ${filePath}`,
  });
}

export function fileTooLarge(filePath: string, size: number, limit: number): IndexerError {
  return new IndexerError({
    code: ErrorCode.FILE_TOO_LARGE,
    userMessage: 'The file is larger than the configured limit and was not indexed.',
    developerMessage: `File ${filePath} is ${size} bytes (limit ${limit})`,
  });
}

/**
 * Embedding request failed
 *
 * @param details - Technical description (status code, body excerpt)
 * @param transient - Whether a later retry may succeed
 */
export function embeddingFailed(details: string, transient: boolean, cause?: Error): IndexerError {
  return new IndexerError({
    code: ErrorCode.EMBEDDING_FAILED,
    userMessage: 'Failed to compute embeddings. Check the embedding API and credentials.',
    developerMessage: `Embedding request failed: ${details}`,
    transient,
    cause,
  });
}

export function embeddingRateLimited(details: string): IndexerError {
  return new IndexerError({
    code: ErrorCode.EMBEDDING_RATE_LIMITED,
    userMessage: 'The embedding API is rate limiting requests. Work will be retried.',
    developerMessage: `Embedding request rate limited: ${details}`,
    transient: true,
  });
}

export function indexStoreFailed(operation: string, cause: Error): IndexerError {
  return new IndexerError({
    code: ErrorCode.INDEX_STORE_FAILED,
    userMessage: 'The vector index could not be updated. Work will be retried.',
    developerMessage: `Index store ${operation} failed: ${cause.message}`,
    transient: true,
    cause,
  });
}

export function dimensionMismatch(expected: number, actual: number): IndexerError {
  return new IndexerError({
    code: ErrorCode.DIMENSION_MISMATCH,
    userMessage: 'The embedding size does not match the index. Check EMBEDDING_DIMENSION.',
    developerMessage: `Vector dimension mismatch. Expected ${expected}, got ${actual}`,
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

export function isIndexerError(error: unknown): error is IndexerError {
  return error instanceof IndexerError;
}

/**
 * Whether an error is worth retrying.
 * IndexerErrors answer through their flag; anything else (a rejected fetch,
 * a driver exception) is assumed to be a transient collaborator failure.
 */
export function isTransientError(error: unknown): boolean {
  if (isIndexerError(error)) {
    return error.transient;
  }
  return true;
}

/**
 * The `code` of a Node.js system error (ENOENT, EACCES, ...), if any
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (isIndexerError(error)) {
    return undefined;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a path disappeared, either as a raw ENOENT or as FILE_NOT_FOUND
 */
export function isNotFoundError(error: unknown): boolean {
  if (isIndexerError(error)) {
    return error.code === ErrorCode.FILE_NOT_FOUND;
  }
  return getErrnoCode(error) === 'ENOENT';
}

/**
 * Map a filesystem error on a document to the matching per-file error
 */
export function fromFsError(filePath: string, error: unknown): IndexerError {
  if (isIndexerError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  switch (getErrnoCode(error)) {
    case 'ENOENT':
      return fileNotFound(filePath);
    case 'EACCES':
    case 'EPERM':
      return permissionDenied(filePath, cause);
    default:
      return fileUnreadable(filePath, cause.message, cause);
  }
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
