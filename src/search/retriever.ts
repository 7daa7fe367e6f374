import type { EmbeddingClient, LlmClient } from '../agents/llm';
import type { ArticleStore } from '../db/store';
import { EmbeddingError, NotFoundError, ValidationError, errorMessage } from '../errors';
import { embeddingText } from '../ingestion/processor';
import { buildHighlightPrompt } from '../prompts/highlight-prompt';
import type { Article, SearchResult, VectorMatch } from '../types';
import { processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { excerpt } from '../utils/html';
import { sanitizeForLog } from '../utils/sanitize';
import type { VectorStore } from '../vector/vector-store';

export const MAX_RESULTS = 50;
const OVERFETCH = 10;
const SNIPPET_LENGTH = 200;
const HIGHLIGHT_CONCURRENCY = 4;
const HIGHLIGHT_MAX_TOKENS = 150;

export interface SearchOptions {
  limit?: number;
  useAi?: boolean;
  minSimilarity?: number;
}

export interface RetrievalSettings {
  defaultLimit: number;
  minSimilarity: number;
  highlightTimeoutMs: number;
}

export function clampLimit(limit: number | undefined, fallback: number): number {
  const value = limit === undefined || !Number.isFinite(limit) ? fallback : Math.floor(limit);
  return Math.min(MAX_RESULTS, Math.max(1, value));
}

/**
 * Similarity desc, then newest first with undated articles last
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (b.similarity !== a.similarity) {
    return b.similarity - a.similarity;
  }
  const aTime = a.publishedAt?.getTime() ?? null;
  const bTime = b.publishedAt?.getTime() ?? null;
  if (aTime === bTime) return 0;
  if (aTime === null) return 1;
  if (bTime === null) return -1;
  return bTime - aTime;
}

function toResult(article: Article, similarity: number): SearchResult {
  return {
    articleId: article.id,
    title: article.title,
    source: article.source,
    url: article.url,
    publishedAt: article.publishedAt,
    similarity,
    snippet: excerpt(article.content, SNIPPET_LENGTH),
    aiEnhanced: false,
  };
}

export class RetrievalEngine {
  constructor(
    private readonly store: ArticleStore,
    private readonly vectors: VectorStore,
    private readonly embeddings: EmbeddingClient,
    private readonly llm: LlmClient,
    private readonly settings: RetrievalSettings
  ) {}

  /**
   * Semantic search over the vector index. Hits whose article has been
   * deleted are dropped; display fields come from the relational store.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('Search query must not be empty');
    }

    const limit = clampLimit(options.limit, this.settings.defaultLimit);
    const minSimilarity = options.minSimilarity ?? this.settings.minSimilarity;
    const stepId = debugLogger.stepStart('SEARCH', 'Semantic search', {
      query: sanitizeForLog(trimmed).substring(0, 100),
      limit,
      useAi: options.useAi ?? false,
    });

    if ((await this.vectors.count()) === 0) {
      debugLogger.stepFinish(stepId, { results: 0, reason: 'empty index' });
      return [];
    }

    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embed(trimmed);
    } catch (error) {
      debugLogger.stepError(stepId, 'SEARCH', 'Query embedding failed', error);
      throw error instanceof EmbeddingError
        ? error
        : new EmbeddingError(`Query embedding failed: ${errorMessage(error)}`, { cause: error });
    }

    const matches = await this.vectors.query(queryVector, limit + OVERFETCH);
    let results = (await this.resolveMatches(matches))
      .filter((result) => result.similarity >= minSimilarity)
      .sort(compareResults)
      .slice(0, limit);

    if (options.useAi && results.length > 0) {
      results = await this.enhanceSnippets(trimmed, results);
    }

    debugLogger.stepFinish(stepId, { matches: matches.length, results: results.length });
    return results;
  }

  /**
   * Articles closest to the given one. The article's stored embedding is the
   * query; an article not yet indexed is embedded on the fly.
   */
  async similar(articleId: string, limit?: number): Promise<SearchResult[]> {
    const article = await this.store.getArticle(articleId);
    if (!article) {
      throw new NotFoundError(`Article ${articleId} not found`);
    }

    const cappedLimit = clampLimit(limit, this.settings.defaultLimit);
    const stepId = debugLogger.stepStart('SIMILAR', 'Similar articles', { articleId, limit: cappedLimit });

    const record = await this.vectors.get(articleId);
    let queryVector: number[];
    if (record) {
      queryVector = record.embedding;
    } else {
      debugLogger.info('SIMILAR', 'Article not indexed yet, embedding on the fly', { articleId });
      queryVector = await this.embeddings.embed(embeddingText(article));
    }

    const matches = await this.vectors.query(queryVector, cappedLimit + OVERFETCH, { excludeIds: [articleId] });
    const results = (await this.resolveMatches(matches))
      .filter((result) => result.articleId !== articleId)
      .sort(compareResults)
      .slice(0, cappedLimit);

    debugLogger.stepFinish(stepId, { results: results.length });
    return results;
  }

  /**
   * Case-insensitive substring match over title and content, newest first
   */
  async keywordSearch(query: string, limit?: number): Promise<SearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('Search query must not be empty');
    }

    const articles = await this.store.searchArticlesByKeyword(trimmed, clampLimit(limit, this.settings.defaultLimit));
    return articles.map((article) => toResult(article, 1));
  }

  private async resolveMatches(matches: VectorMatch[]): Promise<SearchResult[]> {
    if (matches.length === 0) return [];

    const articles = await this.store.getArticlesByIds(matches.map((match) => match.articleId));
    const byId = new Map(articles.map((article) => [article.id, article]));

    const dropped = matches.filter((match) => !byId.has(match.articleId));
    if (dropped.length > 0) {
      debugLogger.warn('SEARCH', 'Dropping hits for deleted articles', { count: dropped.length });
    }

    return matches.flatMap((match) => {
      const article = byId.get(match.articleId);
      return article ? [toResult(article, match.score)] : [];
    });
  }

  private async enhanceSnippets(query: string, results: SearchResult[]): Promise<SearchResult[]> {
    const articles = await this.store.getArticlesByIds(results.map((result) => result.articleId));
    const byId = new Map(articles.map((article) => [article.id, article]));

    const highlighted = await processConcurrently(
      results,
      async (result) => {
        const article = byId.get(result.articleId);
        if (!article) {
          throw new Error(`Article ${result.articleId} disappeared before highlighting`);
        }
        return this.llm.generate(buildHighlightPrompt(query, article), {
          maxTokens: HIGHLIGHT_MAX_TOKENS,
          timeoutMs: this.settings.highlightTimeoutMs,
          tags: ['search-highlight'],
        });
      },
      { concurrency: HIGHLIGHT_CONCURRENCY, label: 'Search highlights' }
    );

    const snippets = new Map(highlighted.successful.map(({ value, index }) => [index, value]));
    return results.map((result, index) => {
      const snippet = snippets.get(index);
      return snippet ? { ...result, snippet, aiEnhanced: true } : result;
    });
  }
}
