import type { ConsistencyWarning, FeedErrorClass } from '../errors';

export type ArticleMetadata = Record<string, unknown>;

export interface Article {
  id: string;
  title: string;
  content: string;
  source: string;
  publishedAt: Date | null;
  url: string;
  metadata: ArticleMetadata;
  fingerprint: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewArticle {
  title: string;
  content: string;
  source: string;
  publishedAt: Date | null;
  url: string;
  metadata: ArticleMetadata;
  fingerprint: string;
}

export const SUMMARY_KINDS = ['brief', 'comprehensive', 'analytical'] as const;

export type SummaryKind = (typeof SUMMARY_KINDS)[number];

export interface ArticleSummary {
  id: string;
  articleId: string;
  kind: SummaryKind;
  summaryText: string;
  wordCount: number;
  model: string;
  generatedAt: Date;
  cached: boolean;
}

export interface ArticleDetail {
  id: string;
  title: string;
  source: string;
  url: string;
  publishedAt: Date | null;
}

export interface MultiAnalysis {
  cacheKey: string;
  analysisText: string;
  focus: string;
  articleIds: string[];
  articlesAnalyzed: number;
  articleDetails: ArticleDetail[];
  sourceDiversity: string[];
  model: string;
  generatedAt: Date;
  cached: boolean;
}

export interface Tag {
  id: string;
  name: string;
  color: string | null;
}

export interface RSSFeed {
  id: string;
  name: string;
  url: string;
  enabled: boolean;
  tags: Tag[];
  lastFetchedAt: Date | null;
  createdAt: Date;
}

export interface ReadingListItem {
  articleId: string;
  notes: string | null;
  addedAt: Date;
}

export interface ReadingListEntry extends ReadingListItem {
  article: ArticleDetail;
}

/**
 * Display fields denormalized into the vector index so hits can be shown
 * without a relational lookup.
 */
export interface VectorMetadata {
  title: string;
  source: string;
  url: string;
  publishedAt: Date | null;
  snippet: string;
}

export interface VectorRecord {
  articleId: string;
  embedding: number[];
  metadata: VectorMetadata;
  indexedAt: Date;
}

export interface VectorMatch {
  articleId: string;
  score: number;
  metadata: VectorMetadata;
}

export interface RawFeedEntry {
  title: string;
  content: string;
  url: string;
  publishedAt: Date | null;
  source: string;
  author: string | null;
  categories: string[];
}

export type IngestionErrorClass = FeedErrorClass | 'persist' | 'embedding';

export interface IngestionErrorEntry {
  class: IngestionErrorClass;
  message: string;
}

export interface FeedIngestionResult {
  feedName: string;
  fetched: number;
  new: number;
  duplicate: number;
  failed: number;
  /** Entries turned away by the quality gate */
  rejected: number;
  errors: IngestionErrorEntry[];
}

export type IngestionRunStatus = 'completed' | 'partial' | 'failed' | 'timed-out';

export interface IngestionTotals {
  fetched: number;
  new: number;
  duplicate: number;
  failed: number;
  rejected: number;
}

export interface IngestionReport {
  runId: string;
  status: IngestionRunStatus;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  feeds: Record<string, FeedIngestionResult>;
  totals: IngestionTotals;
}

export interface CleanupFilters {
  beforeDate?: Date;
  sources?: string[];
}

export interface CleanupPreview {
  totalCount: number;
  sourceBreakdown: Record<string, number>;
  filters: FiltersApplied;
  matchesEverything: boolean;
}

export interface FiltersApplied {
  beforeDate: string | null;
  sources: string[] | null;
}

export interface DeletionReport {
  deletedCount: number;
  deletedSummariesCount: number;
  deletedFromVectorStore: number;
  remainingArticles: number;
  filtersApplied: FiltersApplied;
  warnings: ConsistencyWarning[];
}

export interface SearchResult {
  articleId: string;
  title: string;
  source: string;
  url: string;
  publishedAt: Date | null;
  similarity: number;
  snippet: string;
  aiEnhanced: boolean;
}
