import { CleanupCoordinator } from './admin/cleanup';
import { ResearchAgent } from './agents/research';
import { createEmbeddingClient, createLlmClient, type EmbeddingClient, type LlmClient } from './agents/llm';
import { SummarizationCache } from './agents/summarizer';
import type { AppConfig } from './config';
import { SqliteArticleStore } from './db/sqlite-store';
import type { ArticleStore } from './db/store';
import { IngestionCoordinator } from './ingestion/coordinator';
import { ArticleProcessor } from './ingestion/processor';
import { FeedFetcher } from './ingestion/rss-fetcher';
import { feedSeeds } from './ingestion/sources';
import { createIngestionJob } from './jobs/ingestion-job';
import { metricsTracker } from './jobs/metrics-tracker';
import { IngestionRunRegistry } from './jobs/run-registry';
import { RetrievalEngine } from './search';
import { createResearchTools } from './tools';
import { SqliteVectorStore, type VectorStore } from './vector/vector-store';

export interface AppContext {
  config: Readonly<AppConfig>;
  store: ArticleStore;
  vectors: VectorStore;
  llm: LlmClient;
  embeddings: EmbeddingClient;
  coordinator: IngestionCoordinator;
  registry: IngestionRunRegistry;
  summarizer: SummarizationCache;
  retrieval: RetrievalEngine;
  cleanup: CleanupCoordinator;
  research: ResearchAgent;
}

/**
 * Boundaries a caller may replace (tests pass in-memory stores and fakes)
 */
export interface ContextOverrides {
  store?: ArticleStore;
  vectors?: VectorStore;
  llm?: LlmClient;
  embeddings?: EmbeddingClient;
  fetchImpl?: typeof fetch;
}

export function createAppContext(config: Readonly<AppConfig>, overrides: ContextOverrides = {}): AppContext {
  const store = overrides.store ?? new SqliteArticleStore(config.storage.databasePath);
  const vectors = overrides.vectors ?? new SqliteVectorStore(config.storage.vectorDbPath);
  const llm = overrides.llm ?? createLlmClient(config);
  const embeddings = overrides.embeddings ?? createEmbeddingClient(config);

  const fetcher = new FeedFetcher({
    timeoutMs: config.ingestion.feedTimeoutMs,
    retries: config.ingestion.feedRetries,
    minContentLength: config.ingestion.minContentLength,
    fetchImpl: overrides.fetchImpl,
  });
  const processor = new ArticleProcessor(store, vectors, embeddings);
  const coordinator = new IngestionCoordinator(store, vectors, fetcher, processor, config.ingestion);
  const cleanup = new CleanupCoordinator(store, vectors);
  const registry = new IngestionRunRegistry(createIngestionJob({ store, coordinator, cleanup }), {
    metrics: metricsTracker,
  });

  const summarizer = new SummarizationCache(store, llm, {
    timeoutMs: config.llm.timeoutMs,
    temperature: config.llm.temperature,
  });
  const retrieval = new RetrievalEngine(store, vectors, embeddings, llm, {
    defaultLimit: config.search.defaultLimit,
    minSimilarity: config.search.minSimilarity,
    highlightTimeoutMs: Math.min(config.llm.timeoutMs, 20000),
  });

  const llmSettings = { timeoutMs: config.llm.timeoutMs, temperature: config.llm.temperature };
  const tools = createResearchTools({
    store,
    retrieval,
    summarizer,
    llm,
    settings: llmSettings,
    now: () => new Date(),
  });
  const research = new ResearchAgent(store, llm, tools, llmSettings);

  return { config, store, vectors, llm, embeddings, coordinator, registry, summarizer, retrieval, cleanup, research };
}

/**
 * Seed the feed table from configuration on first start
 */
export async function seedFeedsIfEmpty(ctx: AppContext): Promise<number> {
  const existing = await ctx.store.listFeeds();
  if (existing.length > 0) return 0;
  return ctx.store.seedFeeds(feedSeeds(ctx.config.ingestion.feeds));
}

export async function closeAppContext(ctx: AppContext): Promise<void> {
  await ctx.store.close();
  await ctx.vectors.close();
}
