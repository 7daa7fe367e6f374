import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SqliteArticleStore } from '../../db/sqlite-store';
import { ValidationError } from '../../errors';
import { ArticleProcessor } from '../../ingestion/processor';
import type { Article } from '../../types';
import { SqliteVectorStore } from '../../vector/vector-store';
import { CleanupCoordinator } from '../cleanup';
import { HashEmbeddings, seedArticle } from '../../__tests__/helpers/fakes';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('CleanupCoordinator', () => {
  let store: SqliteArticleStore;
  let vectors: SqliteVectorStore;
  let cleanup: CleanupCoordinator;
  let oldWire: Article;
  let oldDaily: Article;
  let recentWire: Article;
  let undated: Article;

  beforeEach(async () => {
    store = new SqliteArticleStore(':memory:');
    vectors = new SqliteVectorStore(':memory:');
    cleanup = new CleanupCoordinator(store, vectors, () => NOW);
    const processor = new ArticleProcessor(store, vectors, new HashEmbeddings());

    oldWire = await seedArticle(store, { title: 'Old wire story', source: 'Wire', publishedAt: new Date('2024-01-05T00:00:00Z') });
    oldDaily = await seedArticle(store, { title: 'Old daily story', source: 'Daily', publishedAt: new Date('2024-01-20T00:00:00Z') });
    recentWire = await seedArticle(store, { title: 'Recent wire story', source: 'Wire', publishedAt: new Date('2024-05-20T00:00:00Z') });
    undated = await seedArticle(store, { title: 'Undated story', source: 'Daily' });

    for (const article of [oldWire, oldDaily, recentWire, undated]) {
      await processor.indexArticle(article);
    }
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await store.close();
    await vectors.close();
  });

  describe('preview', () => {
    it('counts matches per source without deleting', async () => {
      const preview = await cleanup.preview({ beforeDate: new Date('2024-03-01T00:00:00Z') });

      expect(preview).toEqual({
        totalCount: 2,
        sourceBreakdown: { Wire: 1, Daily: 1 },
        filters: { beforeDate: '2024-03-01T00:00:00.000Z', sources: null },
        matchesEverything: false,
      });
      expect(await store.countArticles()).toBe(4);
    });

    it('never matches undated articles by date', async () => {
      const preview = await cleanup.preview({ beforeDate: NOW, sources: ['Daily'] });

      expect(preview.totalCount).toBe(1);
      expect(preview.sourceBreakdown).toEqual({ Daily: 1 });
    });

    it('flags a filterless preview as matching everything', async () => {
      const preview = await cleanup.preview({});

      expect(preview.totalCount).toBe(4);
      expect(preview.matchesEverything).toBe(true);
    });

    it('rejects a future cutoff', async () => {
      await expect(cleanup.preview({ beforeDate: new Date('2024-07-01T00:00:00Z') })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects a source list with no names in it', async () => {
      await expect(cleanup.preview({ sources: ['  ', ''] })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('delete', () => {
    it('deletes exactly what the preview counted, in both stores', async () => {
      const filters = { sources: [' Wire '] };
      const preview = await cleanup.preview(filters);

      const report = await cleanup.delete(filters);

      expect(report).toEqual({
        deletedCount: preview.totalCount,
        deletedSummariesCount: 0,
        deletedFromVectorStore: 2,
        remainingArticles: 2,
        filtersApplied: { beforeDate: null, sources: ['Wire'] },
        warnings: [],
      });
      expect(await store.getArticle(oldWire.id)).toBeNull();
      expect(await vectors.get(recentWire.id)).toBeNull();
      expect(await vectors.count()).toBe(2);
    });

    it('refuses to delete everything without confirmation', async () => {
      await expect(cleanup.delete({})).rejects.toBeInstanceOf(ValidationError);
      expect(await store.countArticles()).toBe(4);

      const report = await cleanup.delete({}, { confirmAll: true });
      expect(report.deletedCount).toBe(4);
      expect(report.remainingArticles).toBe(0);
    });

    it('removes summaries unless asked to keep them', async () => {
      const summary = {
        kind: 'brief' as const,
        summaryText: 'Short.',
        wordCount: 1,
        model: 'fake-llm',
        generatedAt: NOW,
      };
      await store.upsertSummary({ ...summary, articleId: oldWire.id });
      await store.upsertSummary({ ...summary, articleId: oldDaily.id });

      const kept = await cleanup.delete({ sources: ['Wire'] }, { deleteSummaries: false });
      expect(kept.deletedSummariesCount).toBe(0);
      expect(await store.listSummaries(oldWire.id)).toHaveLength(1);

      const removed = await cleanup.delete({ sources: ['Daily'] });
      expect(removed.deletedSummariesCount).toBe(1);
      expect(await store.listSummaries(oldDaily.id)).toEqual([]);
    });

    it('leaves the vector index alone when asked to', async () => {
      const report = await cleanup.delete({ sources: ['Wire'] }, { deleteFromVectorStore: false });

      expect(report.deletedFromVectorStore).toBe(0);
      expect(await vectors.count()).toBe(4);
      expect((await cleanup.findOrphanedVectorRecords()).sort()).toEqual([oldWire.id, recentWire.id].sort());
    });

    it('reports a vector-side failure as a warning after the relational delete', async () => {
      vi.spyOn(vectors, 'delete').mockRejectedValueOnce(new Error('vector file locked'));
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const report = await cleanup.delete({ sources: ['Daily'] });

      expect(report.deletedCount).toBe(2);
      expect(report.deletedFromVectorStore).toBe(0);
      expect(report.warnings).toHaveLength(1);
      expect(report.warnings[0]).toMatchObject({ kind: 'orphaned-vector-records', count: 2 });
      expect(await store.countArticles()).toBe(2);
    });
  });

  describe('orphaned vector records', () => {
    it('finds and purges records whose article is gone', async () => {
      await store.deleteArticles([oldDaily.id], { deleteSummaries: true });

      expect(await cleanup.findOrphanedVectorRecords()).toEqual([oldDaily.id]);
      expect(await cleanup.purgeOrphanedVectorRecords()).toEqual({ found: 1, purged: 1 });
      expect(await cleanup.findOrphanedVectorRecords()).toEqual([]);
      expect(await vectors.count()).toBe(3);
    });
  });

  it('lists distinct sources', async () => {
    expect(await cleanup.listSources()).toEqual(['Daily', 'Wire']);
  });
});
