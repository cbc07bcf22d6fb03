/**
 * Embedding Engine
 *
 * Client for an OpenAI-compatible `/embeddings` endpoint. One instance is
 * shared by the whole process; every call reuses Node's pooled HTTP agent.
 *
 * The client does not retry. It classifies failures (see {@link IndexerError}
 * `transient`) and leaves the retry policy to the caller.
 */

import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import {
  embeddingFailed,
  embeddingRateLimited,
  dimensionMismatch,
  errorMessage,
} from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface EmbeddingClient {
  /** Vector length every call returns */
  readonly dimension: number;
  /** Model identifier */
  readonly model: string;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbeddingClientOptions {
  apiKey: string;
  model: string;
  /** e.g. https://api.openai.com/v1 */
  baseUrl: string;
  dimension: number;
  timeoutMs: number;
  /** Replaces the global fetch (tests) */
  fetch?: typeof fetch;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/** Characters of an error body kept in log messages */
const ERROR_BODY_EXCERPT = 200;

// ============================================================================
// OpenAIEmbeddingClient
// ============================================================================

/**
 * @example
 * ```typescript
 * const client = new OpenAIEmbeddingClient({
 *   apiKey: process.env.OPENAI_API_KEY,
 *   model: 'text-embedding-3-small',
 *   baseUrl: 'https://api.openai.com/v1',
 *   dimension: 1536,
 *   timeoutMs: 30000,
 * });
 * const [a, b] = await client.embedBatch(['first document', 'second document']);
 * ```
 */
export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly dimension: number;
  readonly model: string;
  private readonly options: OpenAIEmbeddingClientOptions;

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.options = options;
    this.dimension = options.dimension;
    this.model = options.model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * @throws IndexerError EMBEDDING_RATE_LIMITED (transient) on HTTP 429
   * @throws IndexerError EMBEDDING_FAILED, transient for network errors,
   *   timeouts, 408 and 5xx, permanent for other 4xx
   * @throws IndexerError DIMENSION_MISMATCH when a vector has the wrong length
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const logger = getLogger();
    const url = `${this.options.baseUrl}/embeddings`;
    const doFetch = this.options.fetch ?? fetch;

    let response: Response;
    try {
      response = await doFetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw embeddingFailed(
        `request to ${url} failed: ${errorMessage(error)}`,
        true,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      const excerpt = await readErrorExcerpt(response);
      const details = `HTTP ${response.status}${excerpt ? `: ${excerpt}` : ''}`;
      if (response.status === 429) {
        throw embeddingRateLimited(details);
      }
      throw embeddingFailed(details, response.status === 408 || response.status >= 500);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw embeddingFailed(
        `invalid JSON response: ${errorMessage(error)}`,
        true,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw embeddingFailed(`unexpected response shape: ${parsed.error.message}`, false);
    }

    const data = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (data.length !== texts.length) {
      throw embeddingFailed(
        `expected ${texts.length} embeddings, received ${data.length}`,
        false
      );
    }

    // Sorted indices must be exactly 0..n-1 or a vector lands on the wrong input
    const misplaced = data.findIndex((item, position) => item.index !== position);
    if (misplaced !== -1) {
      throw embeddingFailed(
        `invalid embedding indices: [${data.map((item) => item.index).join(', ')}]`,
        false
      );
    }

    const vectors = data.map((item) => item.embedding);
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw dimensionMismatch(this.dimension, vector.length);
      }
    }

    logger.debug('embedding', `Embedded ${texts.length} inputs`, {
      model: this.model,
      tokens: parsed.data.usage?.total_tokens,
    });

    return vectors;
  }
}

async function readErrorExcerpt(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.replace(/\s+/g, ' ').trim().slice(0, ERROR_BODY_EXCERPT);
  } catch (error) {
    getLogger().debug('embedding', 'Could not read error body', { error: errorMessage(error) });
    return '';
  }
}
