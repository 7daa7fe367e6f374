import { afterEach, describe, it, expect } from 'vitest';
import type { EmbeddingClient } from '../../agents/llm';
import { SqliteArticleStore } from '../../db/sqlite-store';
import { StoreUnavailableError } from '../../errors';
import { SqliteVectorStore } from '../../vector/vector-store';
import { IngestionCoordinator, type IngestionSettings } from '../coordinator';
import { ArticleProcessor } from '../processor';
import { FeedFetcher } from '../rss-fetcher';
import { HashEmbeddings, fakeFetch, rssXml, storyItems, type FeedRoute } from '../../__tests__/helpers/fakes';

const FEED_A = { name: 'Alpha', url: 'https://alpha.example.com/rss' };
const FEED_B = { name: 'Bravo', url: 'https://bravo.example.com/rss' };
const FEED_C = { name: 'Charlie', url: 'https://charlie.example.com/rss' };

const DEFAULT_SETTINGS: IngestionSettings = {
  maxArticlesPerFeed: 50,
  maxArticlesPerRun: 500,
  runTimeoutMs: 5000,
  feedConcurrency: 4,
  articleConcurrency: 4,
};

const openStores: Array<{ close(): Promise<void> }> = [];

/** Embedding provider that never answers */
class StalledEmbeddings implements EmbeddingClient {
  readonly model = 'stalled-embedding';

  embed(): Promise<number[]> {
    return new Promise(() => undefined);
  }

  embedBatch(): Promise<number[][]> {
    return new Promise(() => undefined);
  }
}

function setup(
  routes: Record<string, FeedRoute>,
  settings: Partial<IngestionSettings> = {},
  embeddingClient?: EmbeddingClient
) {
  const store = new SqliteArticleStore(':memory:');
  const vectors = new SqliteVectorStore(':memory:');
  openStores.push(store, vectors);

  const embeddings = new HashEmbeddings();
  const fetcher = new FeedFetcher({ timeoutMs: 5000, fetchImpl: fakeFetch(routes) });
  const processor = new ArticleProcessor(store, vectors, embeddingClient ?? embeddings);
  const coordinator = new IngestionCoordinator(store, vectors, fetcher, processor, {
    ...DEFAULT_SETTINGS,
    ...settings,
  });
  return { store, vectors, embeddings, coordinator };
}

function feedBody(prefix: string, count: number): FeedRoute {
  return { status: 200, body: rssXml(prefix, storyItems(prefix, count)) };
}

afterEach(async () => {
  for (const store of openStores.splice(0)) {
    await store.close().catch(() => undefined);
  }
});

describe('IngestionCoordinator.run', () => {
  it('ingests healthy feeds and records a failing one without aborting the run', async () => {
    const { store, vectors, coordinator } = setup({
      [FEED_A.url]: feedBody('Alpha', 2),
      [FEED_B.url]: { status: 404, body: 'gone' },
      [FEED_C.url]: feedBody('Charlie', 3),
    });

    const report = await coordinator.run([FEED_A, FEED_B, FEED_C]);

    expect(report.status).toBe('partial');
    expect(report.totals).toEqual({ fetched: 5, new: 5, duplicate: 0, failed: 0, rejected: 0 });
    expect(report.feeds[FEED_A.url]).toMatchObject({ feedName: 'Alpha', fetched: 2, new: 2, errors: [] });
    expect(report.feeds[FEED_B.url].fetched).toBe(0);
    expect(report.feeds[FEED_B.url].errors).toHaveLength(1);
    expect(report.feeds[FEED_B.url].errors[0].class).toBe('http-status');
    expect(await store.countArticles()).toBe(5);
    expect(await vectors.count()).toBe(5);
  });

  it('stores nothing new when the same feeds are ingested twice', async () => {
    const { store, coordinator } = setup({
      [FEED_A.url]: feedBody('Alpha', 2),
      [FEED_C.url]: feedBody('Charlie', 3),
    });

    const first = await coordinator.run([FEED_A, FEED_C]);
    const second = await coordinator.run([FEED_A, FEED_C]);

    expect(first.status).toBe('completed');
    expect(second.status).toBe('completed');
    expect(second.totals).toEqual({ fetched: 5, new: 0, duplicate: 5, failed: 0, rejected: 0 });
    expect(await store.countArticles()).toBe(5);
  });

  it('collapses the same story served by two feed URLs under one source name', async () => {
    const mirror = { name: 'Alpha', url: 'https://mirror.example.com/alpha.xml' };
    const { store, coordinator } = setup({
      [FEED_A.url]: feedBody('Alpha', 2),
      [mirror.url]: feedBody('Alpha', 2),
    });

    const report = await coordinator.run([FEED_A, mirror]);

    expect(report.totals).toEqual({ fetched: 4, new: 2, duplicate: 2, failed: 0, rejected: 0 });
    expect(await store.countArticles()).toBe(2);
  });

  it('fetches a feed listed twice only once', async () => {
    const { coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 1) });

    const report = await coordinator.run([FEED_A, { ...FEED_A, name: 'Alpha again' }]);

    expect(Object.keys(report.feeds)).toEqual([FEED_A.url]);
    expect(report.totals.new).toBe(1);
  });

  it('caps entries per feed', async () => {
    const { coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 5) }, { maxArticlesPerFeed: 2 });

    const report = await coordinator.run([FEED_A]);

    expect(report.totals.new).toBe(2);
    expect(report.feeds[FEED_A.url].fetched).toBe(2);
  });

  it('caps entries across the whole run', async () => {
    const { store, coordinator } = setup({
      [FEED_A.url]: feedBody('Alpha', 3),
      [FEED_C.url]: feedBody('Charlie', 3),
    });

    const report = await coordinator.run([FEED_A, FEED_C], { maxArticles: 4 });

    expect(report.totals.new).toBe(4);
    expect(await store.countArticles()).toBe(4);
  });

  it('marks the run timed out when the deadline passes mid-fetch', async () => {
    const { coordinator } = setup({ [FEED_A.url]: { kind: 'hang' } }, { runTimeoutMs: 50 });

    const report = await coordinator.run([FEED_A]);

    expect(report.status).toBe('timed-out');
    expect(report.feeds[FEED_A.url].errors.map((error) => error.class)).toEqual(['timeout']);
  });

  it('bounds a run whose embedding provider never answers by the run deadline', async () => {
    const { store, vectors, coordinator } = setup(
      { [FEED_A.url]: feedBody('Alpha', 2) },
      { runTimeoutMs: 200 },
      new StalledEmbeddings()
    );

    const report = await coordinator.run([FEED_A]);

    expect(report.status).toBe('timed-out');
    expect(report.totals).toEqual({ fetched: 2, new: 2, duplicate: 0, failed: 0, rejected: 0 });
    expect(report.feeds[FEED_A.url].errors.map((error) => error.class)).toEqual(['timeout', 'timeout']);
    expect(await store.countArticles()).toBe(2);
    expect(await vectors.count()).toBe(0);
  });

  it('counts entries turned away by the quality gate as rejected', async () => {
    const items = [
      ...storyItems('Alpha', 1),
      {
        title: 'WIN BIG PRIZES TODAY',
        link: 'https://alpha.example.com/promo',
        description: 'Every reader qualifies for a reward this week, click here to claim yours before Friday.',
      },
      {
        title: 'Short',
        link: 'https://alpha.example.com/short',
        description: 'A body that is long enough to pass the fetcher but carries a tiny headline.',
      },
    ];
    const { store, coordinator } = setup({ [FEED_A.url]: { status: 200, body: rssXml('Alpha', items) } });

    const report = await coordinator.run([FEED_A]);

    expect(report.status).toBe('completed');
    expect(report.totals).toEqual({ fetched: 3, new: 1, duplicate: 0, failed: 0, rejected: 2 });
    expect(await store.countArticles()).toBe(1);
  });

  it('stores enrichment metadata on new articles', async () => {
    const { store, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 1) });

    await coordinator.run([FEED_A]);

    const { items } = await store.listArticles({ limit: 1, offset: 0 });
    const [article] = items;
    expect(article.metadata).toMatchObject({
      wordCount: 13,
      estimatedReadMinutes: 1,
      contentType: 'general',
    });
    expect(article.metadata.topicKeywords).toEqual([
      'alpha',
      'reports',
      'development',
      'number',
      'enough',
      'detail',
      'worth',
      'storing',
    ]);
  });

  it('reports every feed failing as a failed run', async () => {
    const { coordinator } = setup({});

    const report = await coordinator.run([FEED_A, FEED_B]);

    expect(report.status).toBe('failed');
    expect(report.totals.fetched).toBe(0);
  });

  it('keeps an article whose embedding failed and indexes it on the next pass', async () => {
    const { store, vectors, embeddings, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 3) });
    embeddings.shouldFail = (text) => text.startsWith('Alpha story 2');

    const report = await coordinator.run([FEED_A]);

    expect(report.status).toBe('partial');
    expect(report.totals).toEqual({ fetched: 3, new: 3, duplicate: 0, failed: 0, rejected: 0 });
    expect(report.feeds[FEED_A.url].errors.map((error) => error.class)).toEqual(['embedding']);
    expect(await store.countArticles()).toBe(3);
    expect(await vectors.count()).toBe(2);

    embeddings.shouldFail = () => false;
    expect(await coordinator.indexPending()).toEqual({ indexed: 1, failed: 0 });
    expect(await vectors.count()).toBe(3);
  });

  it('stamps the fetch time on registered feeds', async () => {
    const { store, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 1) });
    const feed = await store.createFeed({ name: FEED_A.name, url: FEED_A.url });

    await coordinator.run([{ id: feed.id, name: feed.name, url: feed.url }]);

    const updated = await store.getFeed(feed.id);
    expect(updated?.lastFetchedAt).toBeInstanceOf(Date);
  });

  it('rejects when the relational store is unreachable', async () => {
    const { store, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 1) });
    await store.close();

    await expect(coordinator.run([FEED_A])).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('IngestionCoordinator.indexPending', () => {
  it('honours the limit', async () => {
    const { vectors, embeddings, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 3) });
    embeddings.shouldFail = () => true;
    await coordinator.run([FEED_A]);
    expect(await vectors.count()).toBe(0);

    embeddings.shouldFail = () => false;
    expect(await coordinator.indexPending(2)).toEqual({ indexed: 2, failed: 0 });
    expect(await vectors.count()).toBe(2);
  });

  it('counts a failed batch as failed', async () => {
    const { embeddings, coordinator } = setup({ [FEED_A.url]: feedBody('Alpha', 2) });
    embeddings.shouldFail = () => true;
    await coordinator.run([FEED_A]);

    expect(await coordinator.indexPending()).toEqual({ indexed: 0, failed: 2 });
  });
});
