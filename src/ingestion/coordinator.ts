import { randomUUID } from 'crypto';
import type { AppConfig } from '../config';
import type { ArticleStore } from '../db/store';
import { StoreUnavailableError, errorMessage } from '../errors';
import type {
  FeedIngestionResult,
  IngestionReport,
  IngestionRunStatus,
  IngestionTotals,
  RawFeedEntry,
} from '../types';
import { chunkArray, processConcurrently } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import type { VectorStore } from '../vector/vector-store';
import type { ArticleProcessor } from './processor';
import type { FeedFetcher, FeedSource } from './rss-fetcher';

export type IngestionSettings = Pick<
  AppConfig['ingestion'],
  'maxArticlesPerFeed' | 'maxArticlesPerRun' | 'runTimeoutMs' | 'feedConcurrency' | 'articleConcurrency'
>;

export interface RunOptions {
  maxArticles?: number;
  maxArticlesPerFeed?: number;
  runId?: string;
  signal?: AbortSignal;
}

const INDEX_BATCH_SIZE = 50;

function emptyFeedResult(feedName: string): FeedIngestionResult {
  return { feedName, fetched: 0, new: 0, duplicate: 0, failed: 0, rejected: 0, errors: [] };
}

function totalsOf(results: FeedIngestionResult[]): IngestionTotals {
  return results.reduce<IngestionTotals>(
    (totals, result) => ({
      fetched: totals.fetched + result.fetched,
      new: totals.new + result.new,
      duplicate: totals.duplicate + result.duplicate,
      failed: totals.failed + result.failed,
      rejected: totals.rejected + result.rejected,
    }),
    { fetched: 0, new: 0, duplicate: 0, failed: 0, rejected: 0 }
  );
}

/**
 * Shared per-run entry budget. Taking is synchronous, so concurrent feeds
 * never overdraw it.
 */
class EntryBudget {
  constructor(private remaining: number) {}

  take(): boolean {
    if (this.remaining <= 0) return false;
    this.remaining--;
    return true;
  }
}

export class IngestionCoordinator {
  constructor(
    private readonly store: ArticleStore,
    private readonly vectors: VectorStore,
    private readonly fetcher: FeedFetcher,
    private readonly processor: ArticleProcessor,
    private readonly settings: IngestionSettings
  ) {}

  /**
   * Fetch every feed through a bounded pool, dedup each entry by fingerprint
   * and index what is new. Per-feed and per-entry failures land in the
   * report; only loss of the relational store rejects.
   */
  async run(feeds: readonly FeedSource[], options: RunOptions = {}): Promise<IngestionReport> {
    const runId = options.runId ?? randomUUID();
    const startedAt = new Date();
    const perFeedCap = options.maxArticlesPerFeed ?? this.settings.maxArticlesPerFeed;
    const budget = new EntryBudget(options.maxArticles ?? this.settings.maxArticlesPerRun);

    await this.store.ping();

    const uniqueFeeds = [...new Map(feeds.map((feed) => [feed.url, feed])).values()];
    const results = new Map<string, FeedIngestionResult>(
      uniqueFeeds.map((feed) => [feed.url, emptyFeedResult(feed.name)])
    );
    const failedFeeds = new Set<string>();

    const stepId = debugLogger.stepStart('INGESTION_RUN', `Ingestion run ${runId}`, {
      feeds: uniqueFeeds.length,
      perFeedCap,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.runTimeoutMs);
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    let fatal: StoreUnavailableError | null = null;

    const ingestFeed = async (feed: FeedSource): Promise<void> => {
      const result = results.get(feed.url) ?? emptyFeedResult(feed.name);
      const outcome = await this.fetcher.fetch(feed, controller.signal);

      if (!outcome.ok) {
        failedFeeds.add(feed.url);
        result.errors.push({ class: outcome.error.errorClass, message: outcome.error.message });
        return;
      }

      if (feed.id) {
        await this.store.markFeedFetched(feed.id, new Date());
      }

      const taken: RawFeedEntry[] = [];
      for (const entry of outcome.entries) {
        if (controller.signal.aborted || taken.length >= perFeedCap || !budget.take()) break;
        taken.push(entry);
      }

      const processed = await processConcurrently(taken, (entry) => this.processor.processEntry(entry, controller.signal), {
        concurrency: this.settings.articleConcurrency,
        label: `Entries of ${feed.name}`,
        signal: controller.signal,
      });

      for (const { value } of processed.successful) {
        result.fetched++;
        if (value.outcome === 'rejected') {
          result.rejected++;
          continue;
        }
        if (value.outcome === 'duplicate') {
          result.duplicate++;
          continue;
        }
        result.new++;
        if (value.indexError) {
          result.errors.push(value.indexError);
        }
      }

      for (const { error } of processed.failed) {
        if (error instanceof StoreUnavailableError) {
          fatal = fatal ?? error;
          continue;
        }
        result.fetched++;
        result.failed++;
        result.errors.push({ class: 'persist', message: error.message });
      }
    };

    try {
      const feedRuns = await processConcurrently(uniqueFeeds, ingestFeed, {
        concurrency: this.settings.feedConcurrency,
        label: 'Feed ingestion',
        signal: controller.signal,
      });

      for (const { error, index } of feedRuns.failed) {
        if (error instanceof StoreUnavailableError) {
          fatal = fatal ?? error;
          continue;
        }
        const feed = uniqueFeeds[index];
        failedFeeds.add(feed.url);
        results.get(feed.url)?.errors.push({ class: 'persist', message: errorMessage(error) });
      }

      for (const index of feedRuns.skipped) {
        const feed = uniqueFeeds[index];
        failedFeeds.add(feed.url);
        results.get(feed.url)?.errors.push({ class: 'timeout', message: 'Ingestion run deadline reached before fetch' });
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    if (fatal) {
      debugLogger.stepError(stepId, 'INGESTION_RUN', 'Relational store lost during run', fatal);
      throw fatal;
    }

    const feedResults = [...results.values()];
    const totals = totalsOf(feedResults);
    const status = this.statusOf(controller.signal.aborted, uniqueFeeds.length, failedFeeds.size, feedResults);
    const completedAt = new Date();

    const report: IngestionReport = {
      runId,
      status,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      feeds: Object.fromEntries(results),
      totals,
    };

    debugLogger.stepFinish(stepId, { status, ...totals });
    return report;
  }

  private statusOf(
    aborted: boolean,
    feedCount: number,
    failedFeedCount: number,
    results: FeedIngestionResult[]
  ): IngestionRunStatus {
    if (aborted) return 'timed-out';
    if (feedCount > 0 && failedFeedCount === feedCount) return 'failed';
    if (failedFeedCount > 0 || results.some((result) => result.errors.length > 0)) return 'partial';
    return 'completed';
  }

  /**
   * Index articles that have no vector record yet (embedding failed at
   * ingestion time, or the index was rebuilt).
   */
  async indexPending(limit?: number): Promise<{ indexed: number; failed: number }> {
    const stepId = debugLogger.stepStart('INDEXING', 'Indexing pending articles', { limit });

    const indexedIds = new Set(await this.vectors.listIds());
    const pendingIds = (await this.store.listArticleIds()).filter((id) => !indexedIds.has(id));
    const selected = limit === undefined ? pendingIds : pendingIds.slice(0, limit);

    let indexed = 0;
    let failed = 0;
    for (const batch of chunkArray(selected, INDEX_BATCH_SIZE)) {
      const articles = await this.store.getArticlesByIds(batch);
      try {
        indexed += (await this.processor.indexArticles(articles)).length;
      } catch (error) {
        failed += articles.length;
        debugLogger.warn('INDEXING', 'Batch indexing failed', { size: articles.length, error: errorMessage(error) });
      }
    }

    debugLogger.stepFinish(stepId, { pending: pendingIds.length, indexed, failed });
    return { indexed, failed };
  }
}
