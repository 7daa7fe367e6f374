import type { EmbeddingClient } from '../agents/llm';
import type { ArticleStore } from '../db/store';
import { StoreUnavailableError, errorMessage } from '../errors';
import type { Article, IngestionErrorEntry, RawFeedEntry, VectorMetadata } from '../types';
import { raceAbort } from '../utils/concurrency';
import { excerpt } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';
import type { VectorStore } from '../vector/vector-store';
import { computeFingerprint } from './fingerprint';
import { enrichMetadata, validateEntry } from './quality';

export type EntryOutcome =
  | { outcome: 'new'; article: Article; indexError: IngestionErrorEntry | null }
  | { outcome: 'duplicate'; article: Article }
  | { outcome: 'rejected'; reasons: string[] };

/**
 * Thrown for an entry that could not be persisted. Store connectivity loss
 * is not wrapped: it propagates as StoreUnavailableError.
 */
export class PersistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistError';
  }
}

export function embeddingText(article: { title: string; content: string }): string {
  return `${article.title}\n\n${article.content}`;
}

export function vectorMetadata(article: Article): VectorMetadata {
  return {
    title: article.title,
    source: article.source,
    url: article.url,
    publishedAt: article.publishedAt,
    snippet: excerpt(article.content, 200),
  };
}

/**
 * Per-entry pipeline: quality gate, fingerprint, insert-if-absent in the
 * relational store (authoritative), then index the new article (derived).
 * An indexing failure leaves the article in place for a later
 * `indexPending` pass.
 */
export class ArticleProcessor {
  constructor(
    private readonly store: ArticleStore,
    private readonly vectors: VectorStore,
    private readonly embeddings: EmbeddingClient
  ) {}

  /**
   * @param signal - the run's deadline; once aborted, indexing stops waiting
   * and the entry reports a `timeout` error
   */
  async processEntry(entry: RawFeedEntry, signal?: AbortSignal): Promise<EntryOutcome> {
    const stepId = debugLogger.stepStart('PROCESS_ENTRY', `Processing: ${entry.title.substring(0, 60)}`, {
      source: entry.source,
    });

    const validation = validateEntry(entry);
    if (!validation.valid) {
      debugLogger.stepFinish(stepId, { outcome: 'rejected', reasons: validation.reasons });
      return { outcome: 'rejected', reasons: validation.reasons };
    }

    const fingerprint = computeFingerprint(entry);

    let inserted: { article: Article; created: boolean };
    try {
      inserted = await this.store.insertArticleIfAbsent({
        title: entry.title,
        content: entry.content,
        source: entry.source,
        publishedAt: entry.publishedAt,
        url: entry.url,
        fingerprint,
        metadata: {
          ...enrichMetadata(entry),
          ...(entry.author ? { author: entry.author } : {}),
          ...(entry.categories.length > 0 ? { categories: entry.categories } : {}),
        },
      });
    } catch (error) {
      debugLogger.stepError(stepId, 'PROCESS_ENTRY', 'Persist failed', error);
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new PersistError(`Could not store "${entry.title}": ${errorMessage(error)}`, { cause: error });
    }

    if (!inserted.created) {
      debugLogger.stepFinish(stepId, { outcome: 'duplicate', articleId: inserted.article.id });
      return { outcome: 'duplicate', article: inserted.article };
    }

    let indexError: IngestionErrorEntry | null = null;
    try {
      await this.indexArticle(inserted.article, signal);
    } catch (error) {
      indexError = {
        class: signal?.aborted ? 'timeout' : 'embedding',
        message: `Indexing "${inserted.article.title}" failed: ${errorMessage(error)}`,
      };
      debugLogger.warn('INDEXING', 'Article stored but not indexed', {
        articleId: inserted.article.id,
        error: errorMessage(error),
      });
    }

    debugLogger.stepFinish(stepId, { outcome: 'new', articleId: inserted.article.id, indexed: indexError === null });
    return { outcome: 'new', article: inserted.article, indexError };
  }

  async indexArticle(article: Article, signal?: AbortSignal): Promise<void> {
    const embedding = await raceAbort(
      this.embeddings.embed(embeddingText(article), { signal }),
      signal,
      'Ingestion run deadline reached during indexing'
    );
    await this.vectors.upsert(article.id, embedding, vectorMetadata(article));
  }

  /**
   * Embed and index several articles with one batched embedding request.
   * Returns the ids that were indexed.
   */
  async indexArticles(articles: readonly Article[]): Promise<string[]> {
    if (articles.length === 0) return [];

    const vectors = await this.embeddings.embedBatch(articles.map(embeddingText));
    const indexed: string[] = [];
    for (let i = 0; i < articles.length; i++) {
      await this.vectors.upsert(articles[i].id, vectors[i], vectorMetadata(articles[i]));
      indexed.push(articles[i].id);
    }
    return indexed;
  }
}
