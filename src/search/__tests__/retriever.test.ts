import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteArticleStore } from '../../db/sqlite-store';
import { NotFoundError, ValidationError } from '../../errors';
import { ArticleProcessor, embeddingText } from '../../ingestion/processor';
import type { Article, SearchResult } from '../../types';
import { SqliteVectorStore } from '../../vector/vector-store';
import { MAX_RESULTS, RetrievalEngine, clampLimit, compareResults } from '../retriever';
import { FakeLlm, HashEmbeddings, seedArticle } from '../../__tests__/helpers/fakes';

const SETTINGS = { defaultLimit: 10, minSimilarity: 0, highlightTimeoutMs: 1000 };

describe('RetrievalEngine', () => {
  let store: SqliteArticleStore;
  let vectors: SqliteVectorStore;
  let embeddings: HashEmbeddings;
  let llm: FakeLlm;
  let engine: RetrievalEngine;
  let processor: ArticleProcessor;

  beforeEach(() => {
    store = new SqliteArticleStore(':memory:');
    vectors = new SqliteVectorStore(':memory:');
    embeddings = new HashEmbeddings();
    llm = new FakeLlm((prompt) => {
      if (prompt.includes('Title: Wheat harvest')) {
        throw new Error('highlight refused');
      }
      return 'Relevant because it covers the topic.';
    });
    engine = new RetrievalEngine(store, vectors, embeddings, llm, SETTINGS);
    processor = new ArticleProcessor(store, vectors, embeddings);
  });

  afterEach(async () => {
    await store.close();
    await vectors.close();
  });

  async function indexed(fields: { title: string; content: string; publishedAt?: Date }): Promise<Article> {
    const article = await seedArticle(store, fields);
    await processor.indexArticle(article);
    return article;
  }

  describe('search', () => {
    it('returns nothing from an empty index without embedding the query', async () => {
      await seedArticle(store, { title: 'Unindexed story' });

      expect(await engine.search('anything')).toEqual([]);
      expect(embeddings.inputs).toEqual([]);
    });

    it('rejects a blank query', async () => {
      await expect(engine.search('   ')).rejects.toBeInstanceOf(ValidationError);
    });

    it('ranks the closest article first', async () => {
      const solar = await indexed({ title: 'Solar farms expand', content: 'Solar panels cover new farmland in the valley.' });
      await indexed({ title: 'Wheat harvest', content: 'Farmers report a record wheat harvest this autumn.' });

      const results = await engine.search(embeddingText(solar));

      expect(results[0]).toMatchObject({
        articleId: solar.id,
        title: 'Solar farms expand',
        source: 'Test Wire',
        similarity: 1,
        snippet: 'Solar panels cover new farmland in the valley.',
        aiEnhanced: false,
      });
      expect(results).toHaveLength(2);
      expect(results[1].similarity).toBeLessThan(1);
    });

    it('drops hits whose article was deleted', async () => {
      const solar = await indexed({ title: 'Solar farms expand', content: 'Solar panels cover new farmland.' });
      const wheat = await indexed({ title: 'Wheat harvest', content: 'Farmers report a record wheat harvest.' });
      await store.deleteArticle(solar.id);

      const results = await engine.search(embeddingText(solar));

      expect(results.map((result) => result.articleId)).toEqual([wheat.id]);
    });

    it('applies the similarity floor', async () => {
      const solar = await indexed({ title: 'Solar farms expand', content: 'Solar panels cover new farmland.' });
      await indexed({ title: 'Wheat harvest', content: 'Farmers report a record wheat harvest.' });

      const results = await engine.search(embeddingText(solar), { minSimilarity: 0.99 });

      expect(results.map((result) => result.articleId)).toEqual([solar.id]);
    });

    it('honours the limit', async () => {
      await indexed({ title: 'Solar one', content: 'Solar report one.' });
      await indexed({ title: 'Solar two', content: 'Solar report two.' });
      await indexed({ title: 'Solar three', content: 'Solar report three.' });

      expect(await engine.search('solar report', { limit: 2 })).toHaveLength(2);
    });

    it('keeps the plain snippet when a highlight fails', async () => {
      const solar = await indexed({ title: 'Solar farms expand', content: 'Solar panels cover new farmland.' });
      const wheat = await indexed({ title: 'Wheat harvest', content: 'Farmers report a record wheat harvest.' });

      const results = await engine.search('solar farmland harvest', { useAi: true });
      const byId = new Map(results.map((result) => [result.articleId, result]));

      expect(byId.get(solar.id)).toMatchObject({ snippet: 'Relevant because it covers the topic.', aiEnhanced: true });
      expect(byId.get(wheat.id)).toMatchObject({ snippet: 'Farmers report a record wheat harvest.', aiEnhanced: false });
    });
  });

  describe('similar', () => {
    it('excludes the article itself', async () => {
      const solar = await indexed({ title: 'Solar farms expand', content: 'Solar panels cover new farmland.' });
      const wind = await indexed({ title: 'Solar and wind expand', content: 'Solar panels and wind turbines.' });

      const results = await engine.similar(solar.id);

      expect(results.map((result) => result.articleId)).toEqual([wind.id]);
    });

    it('embeds an article that is not indexed yet', async () => {
      const wind = await indexed({ title: 'Wind farms expand', content: 'Wind turbines cover new farmland.' });
      const pending = await seedArticle(store, { title: 'Wind farms grow', content: 'Wind turbines on farmland.' });
      const before = embeddings.inputs.length;

      const results = await engine.similar(pending.id);

      expect(embeddings.inputs.slice(before)).toEqual([embeddingText(pending)]);
      expect(results.map((result) => result.articleId)).toEqual([wind.id]);
    });

    it('rejects an unknown article', async () => {
      await expect(engine.similar('missing-id')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('keywordSearch', () => {
    it('treats LIKE wildcards in the query literally', async () => {
      const percent = await seedArticle(store, { title: 'Prices up 5% this year', content: 'Inflation figures.' });
      await seedArticle(store, { title: 'Prices up 50 points', content: 'Index figures.' });

      const results = await engine.keywordSearch('5%');

      expect(results.map((result) => result.articleId)).toEqual([percent.id]);
      expect(results[0].similarity).toBe(1);
    });

    it('matches content case-insensitively', async () => {
      const article = await seedArticle(store, { title: 'Budget vote', content: 'Parliament passed the BUDGET late.' });

      expect((await engine.keywordSearch('budget late')).map((result) => result.articleId)).toEqual([article.id]);
    });
  });
});

describe('clampLimit', () => {
  it('falls back, floors and clamps', () => {
    expect(clampLimit(undefined, 10)).toBe(10);
    expect(clampLimit(3.7, 10)).toBe(3);
    expect(clampLimit(0, 10)).toBe(1);
    expect(clampLimit(500, 10)).toBe(MAX_RESULTS);
  });
});

describe('compareResults', () => {
  function result(articleId: string, similarity: number, publishedAt: Date | null): SearchResult {
    return { articleId, title: articleId, source: 's', url: 'https://example.com', publishedAt, similarity, snippet: '', aiEnhanced: false };
  }

  it('orders by similarity, then newest first with undated last', () => {
    const ordered = [
      result('undated', 0.8, null),
      result('older', 0.8, new Date('2024-01-01T00:00:00Z')),
      result('best', 0.9, null),
      result('newer', 0.8, new Date('2024-02-01T00:00:00Z')),
    ].sort(compareResults);

    expect(ordered.map((r) => r.articleId)).toEqual(['best', 'newer', 'older', 'undated']);
  });
});
