import { DynamicStructuredTool } from '@langchain/core/tools';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import { isStopWord } from '../ingestion/quality';
import type { Article } from '../types';
import { debugLogger } from '../utils/debug-logger';
import type { ResearchToolDeps } from './index';

const LISTED_TITLES = 10;
const MAX_TOPICS = 10;

const ArticleIdsSchema = z.array(z.string().min(1)).min(1).max(50);
const TopicKeywordsSchema = z.array(z.string());

function listTitles(heading: string, articles: ReadonlyArray<{ id: string; title: string }>): string {
  const lines = articles.slice(0, LISTED_TITLES).map((article) => `  - ${article.title} (ID: ${article.id})`);
  return [heading, ...lines].join('\n');
}

/**
 * Articles in the order their ids were given; unknown ids are skipped
 */
export async function articlesInOrder(deps: Pick<ResearchToolDeps, 'store'>, ids: readonly string[]): Promise<Article[]> {
  const found = await deps.store.getArticlesByIds(ids);
  const byId = new Map(found.map((article) => [article.id, article]));
  return [...new Set(ids)].flatMap((id) => byId.get(id) ?? []);
}

export function createSearchArticlesTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'search_articles',
    description: 'search_articles(query, limit) - Semantic search over stored articles',
    schema: z.object({
      query: z.string().trim().min(1).describe('What to search for'),
      limit: z.coerce.number().int().min(1).max(20).default(10).describe('Max results (1-20, default 10)'),
    }),
    func: async ({ query, limit }) => {
      const results = await deps.retrieval.search(query, { limit });
      debugLogger.info('RESEARCH_TOOL', 'search_articles', { results: results.length });

      return JSON.stringify({
        summary: listTitles(
          `Found ${results.length} relevant articles:`,
          results.map((r) => ({ id: r.articleId, title: r.title }))
        ),
        count: results.length,
        results: results.map((r) => ({
          articleId: r.articleId,
          title: r.title,
          source: r.source,
          url: r.url,
          publishedAt: r.publishedAt,
          similarity: r.similarity,
        })),
        articleIds: results.map((r) => r.articleId),
      });
    },
  });
}

export function createArticleDetailsTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'get_article_details',
    description: 'get_article_details(articleId) - Full content of one article',
    schema: z.object({
      articleId: z.string().min(1),
    }),
    func: async ({ articleId }) => {
      const article = await deps.store.getArticle(articleId);
      if (!article) {
        throw new NotFoundError(`Article ${articleId} not found`);
      }

      return JSON.stringify({
        summary: `Article "${article.title}" (${article.source}): ${article.content.substring(0, 500)}`,
        article: {
          id: article.id,
          title: article.title,
          content: article.content,
          source: article.source,
          url: article.url,
          publishedAt: article.publishedAt,
        },
      });
    },
  });
}

export function createFilterBySourceTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'filter_by_source',
    description: 'filter_by_source(articleIds, sourceTypes) - Keep articles whose source name contains one of sourceTypes',
    schema: z.object({
      articleIds: ArticleIdsSchema,
      sourceTypes: z.array(z.string().trim().min(1)).min(1),
    }),
    func: async ({ articleIds, sourceTypes }) => {
      const articles = await articlesInOrder(deps, articleIds);

      const categorized: Record<string, string[]> = {};
      const kept = new Set<string>();
      for (const article of articles) {
        const source = article.source.toLowerCase();
        for (const sourceType of sourceTypes) {
          if (source.includes(sourceType.toLowerCase())) {
            (categorized[sourceType] ??= []).push(article.id);
            kept.add(article.id);
          }
        }
      }

      return JSON.stringify({
        summary: `Filtered to ${kept.size} articles from ${sourceTypes.join(', ')}`,
        categorized,
        totalFiltered: kept.size,
        articleIds: [...kept],
      });
    },
  });
}

export function createTimeRangeTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'get_by_timerange',
    description: 'get_by_timerange(startDate, endDate, limit) - Articles published between two ISO-8601 dates',
    schema: z.object({
      startDate: z.coerce.date(),
      endDate: z.coerce.date(),
      limit: z.coerce.number().int().min(1).max(100).default(50),
    }),
    func: async ({ startDate, endDate, limit }) => {
      if (startDate.getTime() > endDate.getTime()) {
        throw new ValidationError('startDate must not be after endDate');
      }

      const articles = await deps.store.listArticlesPublishedBetween(startDate, endDate, limit);
      return JSON.stringify({
        summary: listTitles(`Found ${articles.length} articles in time range:`, articles),
        count: articles.length,
        articles: articles.map((article) => ({
          id: article.id,
          title: article.title,
          source: article.source,
          publishedAt: article.publishedAt,
        })),
        articleIds: articles.map((article) => article.id),
      });
    },
  });
}

/**
 * Title words that look like topics: capitalized words, or long ones
 */
function titleTopics(title: string): string[] {
  const topics: string[] = [];
  for (const raw of title.split(/\s+/)) {
    const word = raw.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
    if (!word || isStopWord(word)) continue;

    if (/^\p{Lu}/u.test(word)) {
      topics.push(word);
    } else if (word.length > 5) {
      topics.push(word.toLowerCase());
    }
  }
  return topics;
}

/**
 * Most frequent topics across the articles: stored topic keywords plus
 * title words, ties in order of first appearance.
 */
export function rankTopics(articles: readonly Article[], max = MAX_TOPICS): string[] {
  const counts = new Map<string, number>();
  const add = (topic: string) => counts.set(topic, (counts.get(topic) ?? 0) + 1);

  for (const article of articles) {
    const keywords = TopicKeywordsSchema.safeParse(article.metadata.topicKeywords);
    if (keywords.success) {
      keywords.data.forEach(add);
    }
    titleTopics(article.title).forEach(add);
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, max)
    .map(([topic]) => topic);
}

export function createExtractTopicsTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'extract_topics',
    description: 'extract_topics(articleIds) - Key topics across articles',
    schema: z.object({
      articleIds: ArticleIdsSchema,
    }),
    func: async ({ articleIds }) => {
      const articles = await articlesInOrder(deps, articleIds);
      if (articles.length === 0) {
        throw new NotFoundError('None of the requested articles exist');
      }

      const topics = rankTopics(articles);
      return JSON.stringify({
        summary: `Extracted topics: ${topics.join(', ')}`,
        topics,
        articleCount: articles.length,
        articles: articles.map((article) => ({ id: article.id, title: article.title, source: article.source })),
      });
    },
  });
}
