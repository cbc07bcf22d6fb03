/**
 * Configuration Module
 *
 * Configuration is read once at process start from the environment (after
 * `.env` is loaded), validated with a Zod schema and resolved into an
 * immutable {@link IndexerConfig}.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { normalizePath, expandTilde } from '../utils/paths.js';
import { configInvalid, missingCredentials } from '../errors/index.js';

// ============================================================================
// File Size Parser
// ============================================================================

/**
 * Parse a file size string to bytes. KB and MB units only.
 *
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * parseFileSize('1MB')   // => 1048576
 * parseFileSize('500KB') // => 512000
 * ```
 */
export function parseFileSize(size: string): number {
  const match = size.trim().match(/^(\d+)\s*(KB|MB)$/i);
  if (!match) {
    throw new Error(
      `Invalid file size format: "${size}". Expected format like "1MB" or "500KB".`
    );
  }

  const value = parseInt(match[1], 10);
  return match[2].toUpperCase() === 'MB' ? value * 1024 * 1024 : value * 1024;
}

/**
 * Format bytes as "1MB" or "500KB"
 */
export function formatFileSize(bytes: number): string {
  if (bytes >= 1024 * 1024) {
    return `${Math.round(bytes / (1024 * 1024))}MB`;
  }
  return `${Math.round(bytes / 1024)}KB`;
}

/**
 * Mask a credential for log output
 *
 * @example
 * ```typescript
 * maskSecret('test-secret-value') // => 'tes...alue'
 * maskSecret('short')             // => '*****'
 * ```
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return `${secret.slice(0, 3)}...${secret.slice(-4)}`;
}

// ============================================================================
// Environment Schema
// ============================================================================

const FILE_SIZE_REGEX = /^\d+\s*(KB|MB)$/i;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

const booleanVar = (defaultValue: boolean) =>
  z
    .string()
    .default(String(defaultValue))
    .transform((value) => value.trim().toLowerCase())
    .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
      message: 'Must be true or false',
    })
    .transform((value) => TRUE_VALUES.includes(value));

/** Longest poll interval a timer can hold (2^31 - 1 ms) */
export const MAX_POLLING_INTERVAL_SECONDS = 2_147_483;

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const nonNegativeInt = (defaultValue: number) =>
  z.coerce.number().int().nonnegative().default(defaultValue);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Schema of the environment variables the indexer reads
 */
export const EnvSchema = z.object({
  WATCH_DIR: z.string().min(1).default('./docs'),
  /** Seconds between poll ticks */
  POLLING_INTERVAL: z.coerce
    .number()
    .positive()
    .max(MAX_POLLING_INTERVAL_SECONDS, `Must be at most ${MAX_POLLING_INTERVAL_SECONDS} seconds`)
    .default(300),
  FILE_EXTENSIONS: z
    .string()
    .default('.md,.txt')
    .transform((value) => splitList(value).map(normalizeExtension))
    .refine((list) => list.length > 0, { message: 'At least one extension is required' }),
  EXCLUDE_FOLDERS: z
    .string()
    .default('.git,node_modules,venv,__pycache__')
    .transform(splitList),
  MAX_FILE_SIZE: z
    .string()
    .regex(FILE_SIZE_REGEX, 'Must be a valid file size like "1MB" or "500KB"')
    .default('1MB')
    .transform(parseFileSize),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_API_URL: z
    .string()
    .url()
    .default('https://api.openai.com/v1')
    .transform((value) => value.replace(/\/+$/, '')),
  EMBEDDING_DIMENSION: positiveInt(1536),
  EMBEDDING_TIMEOUT_MS: positiveInt(30000),

  INDEX_URI: z.string().min(1).default('./.docs-vector-sync/lancedb'),
  INDEX_API_KEY: optionalString,
  DOCUMENTS_TABLE: z
    .string()
    .regex(/^[A-Za-z0-9_\-.]+$/, 'Letters, digits, "_", "-" and "." only')
    .default('documents'),
  STATE_PATH: z.string().min(1).default('./.docs-vector-sync/state.json'),

  SYNC_BATCH_SIZE: positiveInt(16),
  SYNC_CONCURRENCY: positiveInt(2),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(4000),
  RETRY_MAX_DELAY_MS: nonNegativeInt(10000),

  WATCH_EVENTS: booleanVar(false),
  LOG_DIR: optionalString,
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['error', 'warn', 'info', 'debug'])),
});

export type EnvVars = z.output<typeof EnvSchema>;

// ============================================================================
// Resolved Configuration
// ============================================================================

export interface EmbeddingConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  dimension: number;
  timeoutMs: number;
}

export interface IndexConfig {
  /** Local directory or `db://` cloud URI */
  uri: string;
  apiKey?: string;
  table: string;
}

export interface IndexerConfig {
  /** Absolute watch root */
  watchDir: string;
  pollingIntervalMs: number;
  /** Lowercase extensions with leading dot */
  fileExtensions: string[];
  excludeFolders: string[];
  maxFileSize: number;
  embedding: EmbeddingConfig;
  index: IndexConfig;
  /** Absolute path of the sync state file */
  statePath: string;
  sync: {
    batchSize: number;
    concurrency: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  watchEvents: boolean;
  logDir?: string;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

/**
 * Load `.env` into `process.env`. Variables already set win.
 *
 * @param envPath - Defaults to `.env` in the working directory
 */
export function loadDotEnv(envPath?: string): void {
  dotenv.config(envPath ? { path: envPath } : {});
}

export function isCloudUri(uri: string): boolean {
  return uri.startsWith('db://');
}

/**
 * Validate the environment and resolve it into an {@link IndexerConfig}
 *
 * @throws IndexerError CONFIG_INVALID listing every invalid variable
 * @throws IndexerError MISSING_CREDENTIALS when a required key is absent
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IndexerConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.errors.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw configInvalid(details);
  }

  const vars = result.data;

  if (vars.RETRY_MAX_DELAY_MS < vars.RETRY_BASE_DELAY_MS) {
    throw configInvalid([
      `RETRY_MAX_DELAY_MS: Must be at least RETRY_BASE_DELAY_MS (${vars.RETRY_BASE_DELAY_MS})`,
    ]);
  }

  if (!vars.OPENAI_API_KEY) {
    throw missingCredentials('OPENAI_API_KEY');
  }

  const cloud = isCloudUri(vars.INDEX_URI);
  if (cloud && !vars.INDEX_API_KEY) {
    throw missingCredentials('INDEX_API_KEY');
  }

  return {
    watchDir: normalizePath(expandTilde(vars.WATCH_DIR)),
    pollingIntervalMs: Math.round(vars.POLLING_INTERVAL * 1000),
    fileExtensions: vars.FILE_EXTENSIONS,
    excludeFolders: vars.EXCLUDE_FOLDERS,
    maxFileSize: vars.MAX_FILE_SIZE,
    embedding: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      baseUrl: vars.EMBEDDING_API_URL,
      dimension: vars.EMBEDDING_DIMENSION,
      timeoutMs: vars.EMBEDDING_TIMEOUT_MS,
    },
    index: {
      uri: cloud ? vars.INDEX_URI : normalizePath(expandTilde(vars.INDEX_URI)),
      apiKey: vars.INDEX_API_KEY,
      table: vars.DOCUMENTS_TABLE,
    },
    statePath: normalizePath(expandTilde(vars.STATE_PATH)),
    sync: {
      batchSize: vars.SYNC_BATCH_SIZE,
      concurrency: vars.SYNC_CONCURRENCY,
    },
    retry: {
      maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      baseDelayMs: vars.RETRY_BASE_DELAY_MS,
      maxDelayMs: vars.RETRY_MAX_DELAY_MS,
    },
    watchEvents: vars.WATCH_EVENTS,
    logDir: vars.LOG_DIR ? normalizePath(expandTilde(vars.LOG_DIR)) : undefined,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Effective configuration for the startup log line, secrets masked
 */
export function describeConfig(config: IndexerConfig): Record<string, unknown> {
  return {
    watchDir: config.watchDir,
    pollingInterval: `${config.pollingIntervalMs / 1000}s`,
    fileExtensions: config.fileExtensions.join(', '),
    excludeFolders: config.excludeFolders.join(', '),
    maxFileSize: formatFileSize(config.maxFileSize),
    embeddingModel: config.embedding.model,
    embeddingApiUrl: config.embedding.baseUrl,
    embeddingApiKey: maskSecret(config.embedding.apiKey),
    embeddingDimension: config.embedding.dimension,
    indexUri: config.index.uri,
    indexApiKey: config.index.apiKey ? maskSecret(config.index.apiKey) : undefined,
    table: config.index.table,
    statePath: config.statePath,
    batchSize: config.sync.batchSize,
    concurrency: config.sync.concurrency,
    watchEvents: config.watchEvents,
  };
}
