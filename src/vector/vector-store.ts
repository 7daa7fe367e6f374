/**
 * Vector index: one embedding per article plus the display fields needed to
 * render a hit. Kept in its own SQLite file; queries are a flat cosine scan.
 */

import { StoreUnavailableError, errorMessage } from '../errors';
import type { VectorMatch, VectorMetadata, VectorRecord } from '../types';
import { MAX_IN_PARAMS, fromMillis, openDatabase, placeholders, toMillis, type SqliteDatabase } from '../db/database';
import { VECTOR_SCHEMA } from '../db/schema';
import { chunkArray } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';

export interface VectorQueryOptions {
  excludeIds?: readonly string[];
}

export interface VectorStore {
  upsert(articleId: string, embedding: readonly number[], metadata: VectorMetadata): Promise<void>;
  query(vector: readonly number[], k: number, options?: VectorQueryOptions): Promise<VectorMatch[]>;
  get(articleId: string): Promise<VectorRecord | null>;
  /** Returns how many records were removed */
  delete(articleIds: readonly string[]): Promise<number>;
  listIds(): Promise<string[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}

interface VectorRow {
  article_id: string;
  embedding: Buffer;
  dimensions: number;
  title: string;
  source: string;
  url: string;
  published_at: number | null;
  snippet: string;
  indexed_at: number;
}

export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

export function decodeEmbedding(buffer: Buffer): number[] {
  const values: number[] = [];
  for (let offset = 0; offset + 4 <= buffer.length; offset += 4) {
    values.push(buffer.readFloatLE(offset));
  }
  return values;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Cosine mapped onto the [0, 1] similarity scale reported to callers
 */
export function toSimilarity(cosine: number): number {
  const clamped = Math.min(1, Math.max(0, cosine));
  return Math.round(clamped * 10000) / 10000;
}

function toMetadata(row: VectorRow): VectorMetadata {
  return {
    title: row.title,
    source: row.source,
    url: row.url,
    publishedAt: fromMillis(row.published_at),
    snippet: row.snippet,
  };
}

export class SqliteVectorStore implements VectorStore {
  private readonly db: SqliteDatabase;

  constructor(filePath: string) {
    this.db = openDatabase(filePath, VECTOR_SCHEMA);
  }

  async upsert(articleId: string, embedding: readonly number[], metadata: VectorMetadata): Promise<void> {
    if (embedding.length === 0) {
      throw new Error(`Refusing to index empty embedding for article ${articleId}`);
    }

    this.db
      .prepare(
        `INSERT INTO vector_records (article_id, embedding, dimensions, title, source, url, published_at, snippet, indexed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (article_id) DO UPDATE SET
           embedding = excluded.embedding,
           dimensions = excluded.dimensions,
           title = excluded.title,
           source = excluded.source,
           url = excluded.url,
           published_at = excluded.published_at,
           snippet = excluded.snippet,
           indexed_at = excluded.indexed_at`
      )
      .run(
        articleId,
        encodeEmbedding(embedding),
        embedding.length,
        metadata.title,
        metadata.source,
        metadata.url,
        toMillis(metadata.publishedAt),
        metadata.snippet,
        Date.now()
      );
  }

  async query(vector: readonly number[], k: number, options: VectorQueryOptions = {}): Promise<VectorMatch[]> {
    if (k <= 0 || vector.length === 0) {
      return [];
    }

    const stepId = debugLogger.stepStart('VECTOR_STORE', `Cosine scan for top ${k}`, { dimensions: vector.length });
    const excluded = new Set(options.excludeIds ?? []);

    let rows: VectorRow[];
    try {
      rows = this.db
        .prepare<[number], VectorRow>('SELECT * FROM vector_records WHERE dimensions = ?')
        .all(vector.length);
    } catch (error) {
      debugLogger.stepError(stepId, 'VECTOR_STORE', 'Vector scan failed', error);
      throw new StoreUnavailableError(`Vector index unreachable: ${errorMessage(error)}`, { cause: error });
    }

    const matches = rows
      .filter((row) => !excluded.has(row.article_id))
      .map((row) => ({
        articleId: row.article_id,
        score: toSimilarity(cosineSimilarity(vector, decodeEmbedding(row.embedding))),
        metadata: toMetadata(row),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    debugLogger.stepFinish(stepId, { scanned: rows.length, returned: matches.length });
    return matches;
  }

  async get(articleId: string): Promise<VectorRecord | null> {
    const row = this.db
      .prepare<[string], VectorRow>('SELECT * FROM vector_records WHERE article_id = ?')
      .get(articleId);
    if (!row) {
      return null;
    }
    return {
      articleId: row.article_id,
      embedding: decodeEmbedding(row.embedding),
      metadata: toMetadata(row),
      indexedAt: new Date(row.indexed_at),
    };
  }

  async delete(articleIds: readonly string[]): Promise<number> {
    const remove = this.db.transaction((ids: string[]) => {
      let deleted = 0;
      for (const chunk of chunkArray(ids, MAX_IN_PARAMS)) {
        deleted += this.db
          .prepare(`DELETE FROM vector_records WHERE article_id IN (${placeholders(chunk.length)})`)
          .run(...chunk).changes;
      }
      return deleted;
    });
    return remove([...new Set(articleIds)]);
  }

  async listIds(): Promise<string[]> {
    return this.db
      .prepare<[], { article_id: string }>('SELECT article_id FROM vector_records')
      .all()
      .map((row) => row.article_id);
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM vector_records').get();
    return row?.total ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
