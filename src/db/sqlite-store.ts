/**
 * better-sqlite3 implementation of the relational article store
 */

import { randomUUID } from 'crypto';
import { ConflictError, NotFoundError, StoreUnavailableError, errorMessage } from '../errors';
import {
  SUMMARY_KINDS,
  type Article,
  type ArticleMetadata,
  type ArticleSummary,
  type CleanupFilters,
  type NewArticle,
  type ReadingListEntry,
  type ReadingListItem,
  type RSSFeed,
  type SummaryKind,
  type Tag,
} from '../types';
import { escapeLikePattern } from '../utils/sanitize';
import {
  MAX_IN_PARAMS,
  fromMillis,
  openDatabase,
  parseJsonObject,
  placeholders,
  toMillis,
  type SqliteDatabase,
} from './database';
import { RELATIONAL_SCHEMA } from './schema';
import type {
  ArticleListOptions,
  ArticleStore,
  FeedInput,
  FeedUpdate,
  SelectedArticle,
  StoredAnalysis,
  StoredSummary,
} from './store';
import { chunkArray } from '../utils/concurrency';

interface ArticleRow {
  id: string;
  title: string;
  content: string;
  source: string;
  published_at: number | null;
  url: string;
  metadata: string;
  fingerprint: string;
  created_at: number;
  updated_at: number;
}

interface SummaryRow {
  id: string;
  article_id: string;
  kind: string;
  summary_text: string;
  word_count: number;
  model: string;
  generated_at: number;
}

interface AnalysisRow {
  cache_key: string;
  focus: string;
  article_ids: string;
  analysis_text: string;
  model: string;
  generated_at: number;
}

interface FeedRow {
  id: string;
  name: string;
  url: string;
  enabled: number;
  last_fetched_at: number | null;
  created_at: number;
}

interface TagRow {
  id: string;
  name: string;
  color: string | null;
}

interface FeedTagRow extends TagRow {
  feed_id: string;
}

interface ReadingListRow {
  article_id: string;
  notes: string | null;
  added_at: number;
  title: string;
  source: string;
  url: string;
  published_at: number | null;
}

function isSummaryKind(value: string): value is SummaryKind {
  return SUMMARY_KINDS.some((kind) => kind === value);
}

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    source: row.source,
    publishedAt: fromMillis(row.published_at),
    url: row.url,
    metadata: parseJsonObject(row.metadata),
    fingerprint: row.fingerprint,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toSummary(row: SummaryRow): ArticleSummary {
  if (!isSummaryKind(row.kind)) {
    throw new Error(`Unknown summary kind stored for article ${row.article_id}: ${row.kind}`);
  }
  return {
    id: row.id,
    articleId: row.article_id,
    kind: row.kind,
    summaryText: row.summary_text,
    wordCount: row.word_count,
    model: row.model,
    generatedAt: new Date(row.generated_at),
    cached: true,
  };
}

function parseIdList(text: string): string[] {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter((id): id is string => typeof id === 'string') : [];
  } catch {
    return [];
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export class SqliteArticleStore implements ArticleStore {
  private readonly db: SqliteDatabase;

  constructor(filePath: string) {
    this.db = openDatabase(filePath, RELATIONAL_SCHEMA);
  }

  async ping(): Promise<void> {
    try {
      this.db.prepare('SELECT 1').get();
    } catch (error) {
      throw new StoreUnavailableError(`Relational store unreachable: ${errorMessage(error)}`, { cause: error });
    }
  }

  // ---------------------------------------------------------------------------
  // Articles
  // ---------------------------------------------------------------------------

  async insertArticleIfAbsent(article: NewArticle): Promise<{ article: Article; created: boolean }> {
    const now = Date.now();
    const id = randomUUID();

    const result = this.db
      .prepare(
        `INSERT INTO articles (id, title, content, source, published_at, url, metadata, fingerprint, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (fingerprint) DO NOTHING`
      )
      .run(
        id,
        article.title,
        article.content,
        article.source,
        toMillis(article.publishedAt),
        article.url,
        JSON.stringify(article.metadata),
        article.fingerprint,
        now,
        now
      );

    const stored = await this.findByFingerprint(article.fingerprint);
    if (!stored) {
      throw new Error(`Article with fingerprint ${article.fingerprint} vanished after insert`);
    }
    return { article: stored, created: result.changes === 1 };
  }

  async getArticle(id: string): Promise<Article | null> {
    const row = this.db.prepare<[string], ArticleRow>('SELECT * FROM articles WHERE id = ?').get(id);
    return row ? toArticle(row) : null;
  }

  async getArticlesByIds(ids: readonly string[]): Promise<Article[]> {
    const articles: Article[] = [];
    for (const chunk of chunkArray([...new Set(ids)], MAX_IN_PARAMS)) {
      const rows = this.db
        .prepare<string[], ArticleRow>(`SELECT * FROM articles WHERE id IN (${placeholders(chunk.length)})`)
        .all(...chunk);
      articles.push(...rows.map(toArticle));
    }
    return articles;
  }

  async findByFingerprint(fingerprint: string): Promise<Article | null> {
    const row = this.db
      .prepare<[string], ArticleRow>('SELECT * FROM articles WHERE fingerprint = ?')
      .get(fingerprint);
    return row ? toArticle(row) : null;
  }

  async listArticles(options: ArticleListOptions): Promise<{ items: Article[]; total: number }> {
    const where = options.source ? 'WHERE source = ?' : '';
    const params = options.source ? [options.source] : [];

    const totalRow = this.db
      .prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM articles ${where}`)
      .get(...params);
    const rows = this.db
      .prepare<Array<string | number>, ArticleRow>(
        `SELECT * FROM articles ${where}
         ORDER BY published_at IS NULL, published_at DESC, created_at DESC
         LIMIT ? OFFSET ?`
      )
      .all(...params, options.limit, options.offset);

    return { items: rows.map(toArticle), total: totalRow?.total ?? 0 };
  }

  async searchArticlesByKeyword(query: string, limit: number): Promise<Article[]> {
    const pattern = `%${escapeLikePattern(query.trim())}%`;
    const rows = this.db
      .prepare<[string, string, number], ArticleRow>(
        `SELECT * FROM articles
         WHERE title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\'
         ORDER BY published_at IS NULL, published_at DESC, created_at DESC
         LIMIT ?`
      )
      .all(pattern, pattern, limit);
    return rows.map(toArticle);
  }

  async listArticlesCreatedSince(since: Date, limit: number): Promise<Article[]> {
    const rows = this.db
      .prepare<[number, number], ArticleRow>(
        'SELECT * FROM articles WHERE created_at >= ? ORDER BY created_at DESC LIMIT ?'
      )
      .all(since.getTime(), limit);
    return rows.map(toArticle);
  }

  async listArticlesPublishedBetween(start: Date, end: Date, limit: number): Promise<Article[]> {
    const rows = this.db
      .prepare<[number, number, number], ArticleRow>(
        `SELECT * FROM articles
         WHERE published_at IS NOT NULL AND published_at >= ? AND published_at <= ?
         ORDER BY published_at DESC
         LIMIT ?`
      )
      .all(start.getTime(), end.getTime(), limit);
    return rows.map(toArticle);
  }

  async listArticleIds(): Promise<string[]> {
    return this.db
      .prepare<[], { id: string }>('SELECT id FROM articles ORDER BY created_at')
      .all()
      .map((row) => row.id);
  }

  async existingArticleIds(ids: readonly string[]): Promise<Set<string>> {
    const existing = new Set<string>();
    for (const chunk of chunkArray([...new Set(ids)], MAX_IN_PARAMS)) {
      const rows = this.db
        .prepare<string[], { id: string }>(`SELECT id FROM articles WHERE id IN (${placeholders(chunk.length)})`)
        .all(...chunk);
      rows.forEach((row) => existing.add(row.id));
    }
    return existing;
  }

  async countArticles(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM articles').get();
    return row?.total ?? 0;
  }

  async updateArticleMetadata(id: string, patch: ArticleMetadata): Promise<Article | null> {
    const update = this.db.transaction((): boolean => {
      const row = this.db.prepare<[string], ArticleRow>('SELECT * FROM articles WHERE id = ?').get(id);
      if (!row) {
        return false;
      }
      const merged = { ...parseJsonObject(row.metadata), ...patch };
      this.db
        .prepare('UPDATE articles SET metadata = ?, updated_at = ? WHERE id = ?')
        .run(JSON.stringify(merged), Date.now(), id);
      return true;
    });

    return update() ? this.getArticle(id) : null;
  }

  async deleteArticle(id: string): Promise<boolean> {
    const { deletedArticles } = await this.deleteArticles([id], { deleteSummaries: true });
    return deletedArticles === 1;
  }

  // ---------------------------------------------------------------------------
  // Bulk cleanup
  // ---------------------------------------------------------------------------

  async selectArticles(filters: CleanupFilters): Promise<SelectedArticle[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filters.beforeDate) {
      clauses.push('published_at IS NOT NULL AND published_at < ?');
      params.push(filters.beforeDate.getTime());
    }
    if (filters.sources && filters.sources.length > 0) {
      clauses.push(`source IN (${placeholders(filters.sources.length)})`);
      params.push(...filters.sources);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<Array<string | number>, SelectedArticle>(`SELECT id, source FROM articles ${where} ORDER BY id`)
      .all(...params);
  }

  async deleteArticles(
    ids: readonly string[],
    options: { deleteSummaries: boolean }
  ): Promise<{ deletedArticles: number; deletedSummaries: number }> {
    const remove = this.db.transaction(() => {
      let deletedArticles = 0;
      let deletedSummaries = 0;

      for (const chunk of chunkArray([...new Set(ids)], MAX_IN_PARAMS)) {
        const marks = placeholders(chunk.length);
        if (options.deleteSummaries) {
          deletedSummaries += this.db.prepare(`DELETE FROM summaries WHERE article_id IN (${marks})`).run(...chunk).changes;
        }
        deletedArticles += this.db.prepare(`DELETE FROM articles WHERE id IN (${marks})`).run(...chunk).changes;
      }

      return { deletedArticles, deletedSummaries };
    });

    return remove();
  }

  async listSources(): Promise<string[]> {
    return this.db
      .prepare<[], { source: string }>("SELECT DISTINCT source FROM articles WHERE source <> '' ORDER BY source")
      .all()
      .map((row) => row.source);
  }

  // ---------------------------------------------------------------------------
  // Summaries & analyses
  // ---------------------------------------------------------------------------

  async getSummary(articleId: string, kind: SummaryKind): Promise<ArticleSummary | null> {
    const row = this.db
      .prepare<[string, string], SummaryRow>('SELECT * FROM summaries WHERE article_id = ? AND kind = ?')
      .get(articleId, kind);
    return row ? toSummary(row) : null;
  }

  async upsertSummary(summary: StoredSummary): Promise<ArticleSummary> {
    this.db
      .prepare(
        `INSERT INTO summaries (id, article_id, kind, summary_text, word_count, model, generated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (article_id, kind) DO UPDATE SET
           summary_text = excluded.summary_text,
           word_count = excluded.word_count,
           model = excluded.model,
           generated_at = excluded.generated_at`
      )
      .run(
        randomUUID(),
        summary.articleId,
        summary.kind,
        summary.summaryText,
        summary.wordCount,
        summary.model,
        summary.generatedAt.getTime()
      );

    const stored = await this.getSummary(summary.articleId, summary.kind);
    if (!stored) {
      throw new Error(`Summary for article ${summary.articleId} (${summary.kind}) missing after upsert`);
    }
    return { ...stored, cached: false };
  }

  async listSummaries(articleId: string): Promise<ArticleSummary[]> {
    return this.db
      .prepare<[string], SummaryRow>('SELECT * FROM summaries WHERE article_id = ? ORDER BY generated_at DESC')
      .all(articleId)
      .map(toSummary);
  }

  async deleteSummaries(articleId: string, kind?: SummaryKind): Promise<number> {
    if (kind) {
      return this.db.prepare('DELETE FROM summaries WHERE article_id = ? AND kind = ?').run(articleId, kind).changes;
    }
    return this.db.prepare('DELETE FROM summaries WHERE article_id = ?').run(articleId).changes;
  }

  async getAnalysis(cacheKey: string): Promise<StoredAnalysis | null> {
    const row = this.db
      .prepare<[string], AnalysisRow>('SELECT * FROM multi_analyses WHERE cache_key = ?')
      .get(cacheKey);
    if (!row) {
      return null;
    }
    return {
      cacheKey: row.cache_key,
      focus: row.focus,
      articleIds: parseIdList(row.article_ids),
      analysisText: row.analysis_text,
      model: row.model,
      generatedAt: new Date(row.generated_at),
    };
  }

  async saveAnalysis(analysis: StoredAnalysis): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO multi_analyses (cache_key, focus, article_ids, analysis_text, model, generated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (cache_key) DO UPDATE SET
           analysis_text = excluded.analysis_text,
           model = excluded.model,
           generated_at = excluded.generated_at`
      )
      .run(
        analysis.cacheKey,
        analysis.focus,
        JSON.stringify(analysis.articleIds),
        analysis.analysisText,
        analysis.model,
        analysis.generatedAt.getTime()
      );
  }

  // ---------------------------------------------------------------------------
  // Feeds & tags
  // ---------------------------------------------------------------------------

  private tagsByFeed(feedIds: readonly string[]): Map<string, Tag[]> {
    const byFeed = new Map<string, Tag[]>();
    for (const chunk of chunkArray(feedIds, MAX_IN_PARAMS)) {
      const rows = this.db
        .prepare<string[], FeedTagRow>(
          `SELECT ft.feed_id, t.id, t.name, t.color FROM feed_tags ft
           JOIN tags t ON t.id = ft.tag_id
           WHERE ft.feed_id IN (${placeholders(chunk.length)})
           ORDER BY t.name`
        )
        .all(...chunk);
      for (const row of rows) {
        const tags = byFeed.get(row.feed_id) ?? [];
        tags.push({ id: row.id, name: row.name, color: row.color });
        byFeed.set(row.feed_id, tags);
      }
    }
    return byFeed;
  }

  private toFeeds(rows: FeedRow[]): RSSFeed[] {
    const tags = this.tagsByFeed(rows.map((row) => row.id));
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      url: row.url,
      enabled: row.enabled === 1,
      tags: tags.get(row.id) ?? [],
      lastFetchedAt: fromMillis(row.last_fetched_at),
      createdAt: new Date(row.created_at),
    }));
  }

  async listFeeds(options: { enabledOnly?: boolean } = {}): Promise<RSSFeed[]> {
    const where = options.enabledOnly ? 'WHERE enabled = 1' : '';
    const rows = this.db.prepare<[], FeedRow>(`SELECT * FROM feeds ${where} ORDER BY name`).all();
    return this.toFeeds(rows);
  }

  async getFeed(id: string): Promise<RSSFeed | null> {
    const row = this.db.prepare<[string], FeedRow>('SELECT * FROM feeds WHERE id = ?').get(id);
    return row ? this.toFeeds([row])[0] : null;
  }

  async createFeed(input: FeedInput): Promise<RSSFeed> {
    const id = randomUUID();
    try {
      this.db
        .prepare('INSERT INTO feeds (id, name, url, enabled, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(id, input.name, input.url, input.enabled === false ? 0 : 1, Date.now());
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A feed with URL ${input.url} already exists`);
      }
      throw error;
    }

    const feed = await this.getFeed(id);
    if (!feed) {
      throw new Error(`Feed ${id} missing after insert`);
    }
    return feed;
  }

  async updateFeed(id: string, update: FeedUpdate): Promise<RSSFeed | null> {
    const existing = await this.getFeed(id);
    if (!existing) {
      return null;
    }

    try {
      this.db
        .prepare('UPDATE feeds SET name = ?, url = ?, enabled = ? WHERE id = ?')
        .run(
          update.name ?? existing.name,
          update.url ?? existing.url,
          (update.enabled ?? existing.enabled) ? 1 : 0,
          id
        );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A feed with URL ${update.url} already exists`);
      }
      throw error;
    }

    return this.getFeed(id);
  }

  async deleteFeed(id: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM feeds WHERE id = ?').run(id).changes === 1;
  }

  async markFeedFetched(id: string, fetchedAt: Date): Promise<void> {
    this.db.prepare('UPDATE feeds SET last_fetched_at = ? WHERE id = ?').run(fetchedAt.getTime(), id);
  }

  async seedFeeds(feeds: readonly FeedInput[]): Promise<number> {
    const insert = this.db.prepare(
      `INSERT INTO feeds (id, name, url, enabled, created_at) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (url) DO NOTHING`
    );
    const seed = this.db.transaction((items: readonly FeedInput[]) => {
      let inserted = 0;
      for (const feed of items) {
        inserted += insert.run(randomUUID(), feed.name, feed.url, feed.enabled === false ? 0 : 1, Date.now()).changes;
      }
      return inserted;
    });
    return seed(feeds);
  }

  async listTags(): Promise<Tag[]> {
    return this.db.prepare<[], TagRow>('SELECT id, name, color FROM tags ORDER BY name').all();
  }

  async createTag(name: string, color: string | null = null): Promise<Tag> {
    const id = randomUUID();
    try {
      this.db.prepare('INSERT INTO tags (id, name, color, created_at) VALUES (?, ?, ?, ?)').run(id, name, color, Date.now());
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Tag "${name}" already exists`);
      }
      throw error;
    }
    return { id, name, color };
  }

  async deleteTag(id: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM tags WHERE id = ?').run(id).changes === 1;
  }

  async setFeedTags(feedId: string, tagIds: readonly string[]): Promise<RSSFeed | null> {
    const feed = await this.getFeed(feedId);
    if (!feed) {
      return null;
    }

    const uniqueTagIds = [...new Set(tagIds)];
    const known = new Set((await this.listTags()).map((tag) => tag.id));
    const unknown = uniqueTagIds.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new NotFoundError(`Tags not found: ${unknown.join(', ')}`);
    }

    const assign = this.db.transaction(() => {
      this.db.prepare('DELETE FROM feed_tags WHERE feed_id = ?').run(feedId);
      const insert = this.db.prepare('INSERT INTO feed_tags (feed_id, tag_id) VALUES (?, ?)');
      uniqueTagIds.forEach((tagId) => insert.run(feedId, tagId));
    });
    assign();

    return this.getFeed(feedId);
  }

  // ---------------------------------------------------------------------------
  // Reading list
  // ---------------------------------------------------------------------------

  async listReadingList(): Promise<ReadingListEntry[]> {
    const rows = this.db
      .prepare<[], ReadingListRow>(
        `SELECT r.article_id, r.notes, r.added_at, a.title, a.source, a.url, a.published_at
         FROM reading_list r JOIN articles a ON a.id = r.article_id
         ORDER BY r.added_at DESC`
      )
      .all();

    return rows.map((row) => ({
      articleId: row.article_id,
      notes: row.notes,
      addedAt: new Date(row.added_at),
      article: {
        id: row.article_id,
        title: row.title,
        source: row.source,
        url: row.url,
        publishedAt: fromMillis(row.published_at),
      },
    }));
  }

  async addToReadingList(
    articleId: string,
    notes?: string | null
  ): Promise<{ item: ReadingListItem; created: boolean }> {
    if (!(await this.getArticle(articleId))) {
      throw new NotFoundError(`Article ${articleId} not found`);
    }

    const created =
      this.db
        .prepare('INSERT INTO reading_list (article_id, notes, added_at) VALUES (?, ?, ?) ON CONFLICT (article_id) DO NOTHING')
        .run(articleId, notes ?? null, Date.now()).changes === 1;

    if (!created && notes !== undefined) {
      await this.updateReadingListNotes(articleId, notes);
    }

    const item = await this.getReadingListItem(articleId);
    if (!item) {
      throw new Error(`Reading list entry for ${articleId} missing after insert`);
    }
    return { item, created };
  }

  async updateReadingListNotes(articleId: string, notes: string | null): Promise<ReadingListItem | null> {
    this.db.prepare('UPDATE reading_list SET notes = ? WHERE article_id = ?').run(notes, articleId);
    return this.getReadingListItem(articleId);
  }

  async removeFromReadingList(articleId: string): Promise<boolean> {
    return this.db.prepare('DELETE FROM reading_list WHERE article_id = ?').run(articleId).changes === 1;
  }

  async getReadingListItem(articleId: string): Promise<ReadingListItem | null> {
    const row = this.db
      .prepare<[string], { article_id: string; notes: string | null; added_at: number }>(
        'SELECT article_id, notes, added_at FROM reading_list WHERE article_id = ?'
      )
      .get(articleId);
    return row ? { articleId: row.article_id, notes: row.notes, addedAt: new Date(row.added_at) } : null;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
