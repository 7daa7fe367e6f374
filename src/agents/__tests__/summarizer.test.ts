import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteArticleStore } from '../../db/sqlite-store';
import { AnalysisError, NotFoundError, ValidationError } from '../../errors';
import type { Article } from '../../types';
import { SummarizationCache, analysisCacheKey, normalizeFocus } from '../summarizer';
import { FakeLlm, seedArticle } from '../../__tests__/helpers/fakes';

describe('SummarizationCache', () => {
  let store: SqliteArticleStore;
  let llm: FakeLlm;
  let cache: SummarizationCache;
  let article: Article;

  beforeEach(async () => {
    store = new SqliteArticleStore(':memory:');
    llm = new FakeLlm((_prompt, n) => `Summary number ${n} of the story`);
    cache = new SummarizationCache(store, llm, { timeoutMs: 1000, temperature: 0.1 });
    article = await seedArticle(store, { title: 'Harbor reopens', source: 'Coast News' });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('getOrCreateSummary', () => {
    it('generates once and serves the stored summary afterwards', async () => {
      const first = await cache.getOrCreateSummary(article.id, 'comprehensive');
      const second = await cache.getOrCreateSummary(article.id, 'comprehensive');

      expect(first).toMatchObject({
        articleId: article.id,
        kind: 'comprehensive',
        summaryText: 'Summary number 1 of the story',
        wordCount: 6,
        model: 'fake-llm',
        cached: false,
      });
      expect(second.cached).toBe(true);
      expect(second.summaryText).toBe(first.summaryText);
      expect(llm.callCount).toBe(1);
    });

    it('keeps one summary per kind', async () => {
      await cache.getOrCreateSummary(article.id, 'comprehensive');
      await cache.getOrCreateSummary(article.id, 'analytical');

      const kinds = (await cache.listSummaries(article.id)).map((summary) => summary.kind).sort();
      expect(kinds).toEqual(['analytical', 'comprehensive']);
      expect(llm.callCount).toBe(2);
    });

    it('regenerates when forced', async () => {
      await cache.getOrCreateSummary(article.id, 'comprehensive');
      const forced = await cache.getOrCreateSummary(article.id, 'comprehensive', { force: true });

      expect(forced.summaryText).toBe('Summary number 2 of the story');
      expect(forced.cached).toBe(false);
      expect(await store.listSummaries(article.id)).toHaveLength(1);
    });

    it('rejects an unknown kind before touching the model', async () => {
      await expect(cache.getOrCreateSummary(article.id, 'haiku')).rejects.toBeInstanceOf(ValidationError);
      expect(llm.callCount).toBe(0);
    });

    it('rejects an unknown article', async () => {
      await expect(cache.getOrCreateSummary('missing-id', 'brief')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('persists nothing when generation fails', async () => {
      llm.failure = new Error('upstream returned 500');

      await expect(cache.getOrCreateSummary(article.id, 'brief')).rejects.toBeInstanceOf(AnalysisError);
      expect(await store.listSummaries(article.id)).toEqual([]);

      llm.failure = null;
      const retried = await cache.getOrCreateSummary(article.id, 'brief');
      expect(retried.cached).toBe(false);
    });

    it('shares one generation between concurrent requests', async () => {
      llm.delayMs = 20;

      const [a, b] = await Promise.all([
        cache.getOrCreateSummary(article.id, 'analytical'),
        cache.getOrCreateSummary(article.id, 'analytical'),
      ]);

      expect(llm.callCount).toBe(1);
      expect(a.summaryText).toBe(b.summaryText);
    });

    it('copies a brief summary onto the article metadata', async () => {
      const brief = await cache.getOrCreateSummary(article.id, 'brief');

      const updated = await store.getArticle(article.id);
      expect(updated?.metadata.shortSummary).toBe(brief.summaryText);
    });
  });

  describe('purgeSummaries', () => {
    it('removes one kind or all kinds', async () => {
      await cache.getOrCreateSummary(article.id, 'brief');
      await cache.getOrCreateSummary(article.id, 'comprehensive');

      expect(await cache.purgeSummaries(article.id, 'brief')).toBe(1);
      expect(await cache.purgeSummaries(article.id)).toBe(1);
      expect(await store.listSummaries(article.id)).toEqual([]);
    });

    it('rejects an unknown kind', async () => {
      await expect(cache.purgeSummaries(article.id, 'poem')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getOrCreateMultiAnalysis', () => {
    let other: Article;

    beforeEach(async () => {
      other = await seedArticle(store, { title: 'Harbor traffic resumes', source: 'Port Gazette' });
    });

    it('needs at least two distinct articles', async () => {
      await expect(cache.getOrCreateMultiAnalysis([article.id, article.id])).rejects.toBeInstanceOf(ValidationError);
    });

    it('accepts at most ten articles', async () => {
      const ids = Array.from({ length: 11 }, (_, i) => `id-${i}`);
      await expect(cache.getOrCreateMultiAnalysis(ids)).rejects.toBeInstanceOf(ValidationError);
    });

    it('names the articles that do not exist', async () => {
      await expect(cache.getOrCreateMultiAnalysis([article.id, 'ghost-id'])).rejects.toThrow(
        'Articles not found: ghost-id'
      );
    });

    it('caches by article set and case-folded focus', async () => {
      const first = await cache.getOrCreateMultiAnalysis([article.id, other.id], 'Port   Economy');
      const second = await cache.getOrCreateMultiAnalysis([other.id, article.id], 'port economy');

      expect(first.cached).toBe(false);
      expect(first.focus).toBe('Port Economy');
      expect(first.articlesAnalyzed).toBe(2);
      expect([...first.sourceDiversity].sort()).toEqual(['Coast News', 'Port Gazette']);
      expect(second.cached).toBe(true);
      expect(second.cacheKey).toBe(first.cacheKey);
      expect(second.analysisText).toBe(first.analysisText);
      expect(second.articleDetails.map((detail) => detail.id)).toEqual([article.id, other.id].sort());
      expect(llm.callCount).toBe(1);
    });

    it('uses the default focus when none is given', async () => {
      const analysis = await cache.getOrCreateMultiAnalysis([article.id, other.id], '   ');

      expect(analysis.focus).toBe('the main topic');
      expect(llm.prompts[0]).toContain('on the topic: the main topic');
    });

    it('regenerates when forced', async () => {
      await cache.getOrCreateMultiAnalysis([article.id, other.id]);
      const forced = await cache.getOrCreateMultiAnalysis([article.id, other.id], null, { force: true });

      expect(forced.cached).toBe(false);
      expect(llm.callCount).toBe(2);
    });

    it('persists nothing when generation fails', async () => {
      llm.failure = new Error('model overloaded');

      await expect(cache.getOrCreateMultiAnalysis([article.id, other.id])).rejects.toBeInstanceOf(AnalysisError);

      const key = analysisCacheKey([article.id, other.id].sort(), 'the main topic');
      expect(await store.getAnalysis(key)).toBeNull();
    });
  });
});

describe('normalizeFocus', () => {
  it('collapses whitespace and falls back to the default', () => {
    expect(normalizeFocus('  energy\n policy ')).toBe('energy policy');
    expect(normalizeFocus(undefined)).toBe('the main topic');
  });
});

describe('analysisCacheKey', () => {
  it('ignores focus case', () => {
    expect(analysisCacheKey(['a', 'b'], 'Energy')).toBe(analysisCacheKey(['a', 'b'], 'energy'));
    expect(analysisCacheKey(['a', 'b'], 'energy')).not.toBe(analysisCacheKey(['a', 'c'], 'energy'));
  });
});
