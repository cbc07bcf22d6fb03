/**
 * Index Store contract
 *
 * A table of documents keyed by identifier. Writes are idempotent: upserting
 * the same row twice leaves one row, deleting an absent identifier succeeds.
 */

import { z } from 'zod';

export const DocumentMetadataSchema = z.object({
  /** Relative path of the source document */
  source: z.string(),
  filename: z.string(),
  fingerprint: z.string(),
  size: z.number(),
  /** ISO mtime of the file when it was read */
  lastModified: z.string(),
  /** ISO time of the write */
  indexedAt: z.string(),
  extension: z.string(),
});

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

export interface RemoteRow {
  /** Primary key, derived from the path */
  id: string;
  path: string;
  content: string;
  metadata: DocumentMetadata;
  fingerprint: string;
  /** ISO timestamp */
  updatedAt: string;
  vector: number[];
}

export interface MatchResult {
  id: string;
  path: string;
  content: string;
  /** null when the stored metadata could not be parsed */
  metadata: DocumentMetadata | null;
  /** Cosine similarity, higher is closer */
  similarity: number;
}

export interface IndexStore {
  open(): Promise<void>;
  close(): Promise<void>;
  /** Insert or replace rows by `id` */
  upsert(rows: RemoteRow[]): Promise<void>;
  /** Remove rows by `id`; absent ids are not an error */
  delete(ids: string[]): Promise<void>;
  listIds(): Promise<string[]>;
  count(): Promise<number>;
  /**
   * Rows with similarity strictly above `threshold`, most similar first,
   * at most `limit` of them
   */
  match(embedding: number[], threshold: number, limit: number): Promise<MatchResult[]>;
  /** Remove every row */
  clear(): Promise<void>;
}
