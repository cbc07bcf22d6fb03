/**
 * In-process stand-ins for the index store and the embedding API
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import type { IndexStore, MatchResult, RemoteRow } from '../../src/storage/indexStore.js';
import type { EmbeddingClient } from '../../src/engines/embedding.js';
import { embeddingFailed, indexStoreFailed, isTransientError } from '../../src/errors/index.js';
import type { RetryPolicy } from '../../src/utils/retry.js';

export const TEST_DIMENSION = 4;

/**
 * Deterministic vector for a text: [length, vowels, lines, 1]
 */
export function vectorFor(text: string): number[] {
  const vowels = (text.match(/[aeiou]/gi) ?? []).length;
  const lines = text.split('\n').length;
  return [text.length, vowels, lines, 1];
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly dimension = TEST_DIMENSION;
  readonly model = 'fake-embedding';

  /** Texts that make any call containing them fail */
  readonly failing = new Set<string>();
  /** Whether injected failures are transient */
  transientFailures = true;
  /** Fail every call this many times before succeeding */
  failNextCalls = 0;
  /** Milliseconds each batch call stays in flight */
  batchDelayMs = 0;

  batchCalls: string[][] = [];
  singleCalls: string[] = [];
  /** Most batch calls seen in flight at once */
  maxInFlight = 0;
  private inFlight = 0;

  get totalCalls(): number {
    return this.batchCalls.length + this.singleCalls.length;
  }

  async embed(text: string): Promise<number[]> {
    this.singleCalls.push(text);
    this.maybeFail([text]);
    return vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batchCalls.push([...texts]);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.batchDelayMs > 0) {
        await delay(this.batchDelayMs);
      }
      this.maybeFail(texts);
      return texts.map(vectorFor);
    } finally {
      this.inFlight--;
    }
  }

  private maybeFail(texts: string[]): void {
    if (this.failNextCalls > 0) {
      this.failNextCalls--;
      throw embeddingFailed('injected failure', true);
    }
    const bad = texts.find((text) => this.failing.has(text));
    if (bad !== undefined) {
      throw embeddingFailed(`rejected input: ${bad}`, this.transientFailures);
    }
  }
}

export class InMemoryIndexStore implements IndexStore {
  readonly rows = new Map<string, RemoteRow>();

  /** Paths whose rows make an upsert call fail */
  readonly failingUpsertPaths = new Set<string>();
  /** Ids that make a delete call fail */
  readonly failingDeleteIds = new Set<string>();

  upsertCalls: RemoteRow[][] = [];
  deleteCalls: string[][] = [];
  /** Call order across upsert and delete */
  operations: Array<'upsert' | 'delete'> = [];
  opened = false;

  get totalWrites(): number {
    return this.upsertCalls.length + this.deleteCalls.length;
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async upsert(rows: RemoteRow[]): Promise<void> {
    this.upsertCalls.push(rows.map((row) => ({ ...row })));
    this.operations.push('upsert');
    const bad = rows.find((row) => this.failingUpsertPaths.has(row.path));
    if (bad) {
      throw indexStoreFailed('upsert', new Error(`rejected row ${bad.path}`));
    }
    for (const row of rows) {
      this.rows.set(row.id, { ...row });
    }
  }

  async delete(ids: string[]): Promise<void> {
    this.deleteCalls.push([...ids]);
    this.operations.push('delete');
    const bad = ids.find((id) => this.failingDeleteIds.has(id));
    if (bad) {
      throw indexStoreFailed('delete', new Error(`rejected id ${bad}`));
    }
    for (const id of ids) {
      this.rows.delete(id);
    }
  }

  async listIds(): Promise<string[]> {
    return [...this.rows.keys()];
  }

  async count(): Promise<number> {
    return this.rows.size;
  }

  async match(embedding: number[], threshold: number, limit: number): Promise<MatchResult[]> {
    const norm = (v: number[]): number => Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));
    return [...this.rows.values()]
      .map((row) => {
        const dot = row.vector.reduce((sum, x, i) => sum + x * (embedding[i] ?? 0), 0);
        return {
          id: row.id,
          path: row.path,
          content: row.content,
          metadata: row.metadata,
          similarity: dot / (norm(row.vector) * norm(embedding)),
        };
      })
      .filter((result) => result.similarity > threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, limit);
  }

  async clear(): Promise<void> {
    this.rows.clear();
  }
}

/**
 * Two attempts, no waiting
 */
export function fastRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 2,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterRatio: 0,
    shouldRetry: isTransientError,
    ...overrides,
  };
}

export const noSleep = async (): Promise<void> => {};

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `docs-vector-sync-${prefix}-`));
}

/**
 * Write a file and pin its mtime, so consecutive writes always differ
 */
export async function writeDoc(
  root: string,
  relativePath: string,
  content: string | Uint8Array,
  mtimeSeconds: number = 1_700_000_000
): Promise<string> {
  const absolutePath = path.join(root, relativePath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, content);
  await fs.promises.utimes(absolutePath, mtimeSeconds, mtimeSeconds);
  return absolutePath;
}
