import type {
  Article,
  ArticleMetadata,
  ArticleSummary,
  CleanupFilters,
  NewArticle,
  ReadingListEntry,
  ReadingListItem,
  RSSFeed,
  SummaryKind,
  Tag,
} from '../types';

export interface ArticleListOptions {
  limit: number;
  offset: number;
  source?: string;
}

export interface StoredSummary {
  articleId: string;
  kind: SummaryKind;
  summaryText: string;
  wordCount: number;
  model: string;
  generatedAt: Date;
}

export interface StoredAnalysis {
  cacheKey: string;
  focus: string;
  articleIds: string[];
  analysisText: string;
  model: string;
  generatedAt: Date;
}

export interface FeedInput {
  name: string;
  url: string;
  enabled?: boolean;
}

export interface FeedUpdate {
  name?: string;
  url?: string;
  enabled?: boolean;
}

export interface SelectedArticle {
  id: string;
  source: string;
}

/**
 * Relational store boundary. The source of truth for article existence
 * and identity; every method may suspend.
 */
export interface ArticleStore {
  /** Throws StoreUnavailableError when the store cannot be reached */
  ping(): Promise<void>;

  /**
   * Insert unless an article with the same fingerprint exists. The
   * uniqueness check is enforced by the store, not by a prior read.
   */
  insertArticleIfAbsent(article: NewArticle): Promise<{ article: Article; created: boolean }>;
  getArticle(id: string): Promise<Article | null>;
  getArticlesByIds(ids: readonly string[]): Promise<Article[]>;
  findByFingerprint(fingerprint: string): Promise<Article | null>;
  listArticles(options: ArticleListOptions): Promise<{ items: Article[]; total: number }>;
  searchArticlesByKeyword(query: string, limit: number): Promise<Article[]>;
  /** Newest first by ingestion time */
  listArticlesCreatedSince(since: Date, limit: number): Promise<Article[]>;
  /** Published within [start, end], newest first; undated articles never match */
  listArticlesPublishedBetween(start: Date, end: Date, limit: number): Promise<Article[]>;
  listArticleIds(): Promise<string[]>;
  existingArticleIds(ids: readonly string[]): Promise<Set<string>>;
  countArticles(): Promise<number>;
  updateArticleMetadata(id: string, patch: ArticleMetadata): Promise<Article | null>;
  /** Removes the article together with its summaries */
  deleteArticle(id: string): Promise<boolean>;

  selectArticles(filters: CleanupFilters): Promise<SelectedArticle[]>;
  deleteArticles(
    ids: readonly string[],
    options: { deleteSummaries: boolean }
  ): Promise<{ deletedArticles: number; deletedSummaries: number }>;
  listSources(): Promise<string[]>;

  getSummary(articleId: string, kind: SummaryKind): Promise<ArticleSummary | null>;
  upsertSummary(summary: StoredSummary): Promise<ArticleSummary>;
  listSummaries(articleId: string): Promise<ArticleSummary[]>;
  deleteSummaries(articleId: string, kind?: SummaryKind): Promise<number>;

  getAnalysis(cacheKey: string): Promise<StoredAnalysis | null>;
  saveAnalysis(analysis: StoredAnalysis): Promise<void>;

  listFeeds(options?: { enabledOnly?: boolean }): Promise<RSSFeed[]>;
  getFeed(id: string): Promise<RSSFeed | null>;
  createFeed(input: FeedInput): Promise<RSSFeed>;
  updateFeed(id: string, update: FeedUpdate): Promise<RSSFeed | null>;
  deleteFeed(id: string): Promise<boolean>;
  markFeedFetched(id: string, fetchedAt: Date): Promise<void>;
  seedFeeds(feeds: readonly FeedInput[]): Promise<number>;

  listTags(): Promise<Tag[]>;
  createTag(name: string, color?: string | null): Promise<Tag>;
  deleteTag(id: string): Promise<boolean>;
  setFeedTags(feedId: string, tagIds: readonly string[]): Promise<RSSFeed | null>;

  listReadingList(): Promise<ReadingListEntry[]>;
  addToReadingList(articleId: string, notes?: string | null): Promise<{ item: ReadingListItem; created: boolean }>;
  updateReadingListNotes(articleId: string, notes: string | null): Promise<ReadingListItem | null>;
  removeFromReadingList(articleId: string): Promise<boolean>;
  getReadingListItem(articleId: string): Promise<ReadingListItem | null>;

  close(): Promise<void>;
}
