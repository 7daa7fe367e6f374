import { createHash } from 'crypto';
import type { ArticleStore } from '../db/store';
import { AnalysisError, NotFoundError, ValidationError, errorMessage } from '../errors';
import { DEFAULT_ANALYSIS_FOCUS, buildMultiPerspectivePrompt } from '../prompts/analysis-prompt';
import { SUMMARY_PROFILES, buildSummaryPrompt } from '../prompts/summary-prompt';
import {
  SUMMARY_KINDS,
  type Article,
  type ArticleDetail,
  type ArticleSummary,
  type MultiAnalysis,
  type SummaryKind,
} from '../types';
import { KeyedSingleFlight } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';
import { countWords } from '../utils/html';
import type { LlmClient } from './llm';

export const MIN_ANALYSIS_ARTICLES = 2;
export const MAX_ANALYSIS_ARTICLES = 10;
const ANALYSIS_MAX_TOKENS = 2000;

export interface SummarizerSettings {
  timeoutMs: number;
  temperature: number;
}

export function isSummaryKind(value: string): value is SummaryKind {
  return SUMMARY_KINDS.some((kind) => kind === value);
}

export function normalizeFocus(focus: string | undefined | null): string {
  const normalized = (focus ?? '').replace(/\s+/g, ' ').trim();
  return normalized.length > 0 ? normalized : DEFAULT_ANALYSIS_FOCUS;
}

/**
 * Cache key for a multi-article analysis: sorted distinct ids plus the
 * case-folded focus.
 */
export function analysisCacheKey(sortedIds: readonly string[], focus: string): string {
  return createHash('sha256')
    .update(`${sortedIds.join(',')}\n${focus.toLowerCase()}`, 'utf8')
    .digest('hex');
}

function toDetail(article: Article): ArticleDetail {
  return {
    id: article.id,
    title: article.title,
    source: article.source,
    url: article.url,
    publishedAt: article.publishedAt,
  };
}

function distinctSources(articles: readonly Article[]): string[] {
  return [...new Set(articles.map((article) => article.source))];
}

/**
 * Generated summaries and cross-article analyses, cached in the relational
 * store. One generation per key is in flight at a time; a failed generation
 * persists nothing.
 */
export class SummarizationCache {
  private readonly summaryFlights = new KeyedSingleFlight<ArticleSummary>();
  private readonly analysisFlights = new KeyedSingleFlight<MultiAnalysis>();

  constructor(
    private readonly store: ArticleStore,
    private readonly llm: LlmClient,
    private readonly settings: SummarizerSettings
  ) {}

  async getOrCreateSummary(
    articleId: string,
    kind: string,
    options: { force?: boolean } = {}
  ): Promise<ArticleSummary> {
    if (!isSummaryKind(kind)) {
      throw new ValidationError(`Unknown summary kind "${kind}". Expected one of: ${SUMMARY_KINDS.join(', ')}`);
    }

    const article = await this.store.getArticle(articleId);
    if (!article) {
      throw new NotFoundError(`Article ${articleId} not found`);
    }

    if (!options.force) {
      const existing = await this.store.getSummary(articleId, kind);
      if (existing) {
        debugLogger.info('SUMMARY', 'Cache hit', { articleId, kind });
        return existing;
      }
    }

    return this.summaryFlights.run(`${articleId}:${kind}`, () => this.generateSummary(article, kind));
  }

  private async generateSummary(article: Article, kind: SummaryKind): Promise<ArticleSummary> {
    const stepId = debugLogger.stepStart('SUMMARY', `Generating ${kind} summary`, { articleId: article.id });
    const profile = SUMMARY_PROFILES[kind];

    let text: string;
    try {
      text = await this.llm.generate(buildSummaryPrompt(article, kind), {
        temperature: this.settings.temperature,
        maxTokens: profile.maxTokens,
        timeoutMs: this.settings.timeoutMs,
        tags: ['summary', kind],
      });
    } catch (error) {
      debugLogger.stepError(stepId, 'SUMMARY', 'Generation failed', error);
      throw new AnalysisError('generation-failed', `Could not generate ${kind} summary: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const summary = await this.store.upsertSummary({
      articleId: article.id,
      kind,
      summaryText: text,
      wordCount: countWords(text),
      model: this.llm.model,
      generatedAt: new Date(),
    });

    if (kind === 'brief') {
      await this.store.updateArticleMetadata(article.id, { shortSummary: text });
    }

    debugLogger.stepFinish(stepId, { wordCount: summary.wordCount });
    return summary;
  }

  async listSummaries(articleId: string): Promise<ArticleSummary[]> {
    if (!(await this.store.getArticle(articleId))) {
      throw new NotFoundError(`Article ${articleId} not found`);
    }
    return this.store.listSummaries(articleId);
  }

  async purgeSummaries(articleId: string, kind?: string): Promise<number> {
    if (kind !== undefined && !isSummaryKind(kind)) {
      throw new ValidationError(`Unknown summary kind "${kind}". Expected one of: ${SUMMARY_KINDS.join(', ')}`);
    }
    return this.store.deleteSummaries(articleId, kind);
  }

  async getOrCreateMultiAnalysis(
    articleIds: readonly string[],
    focus?: string | null,
    options: { force?: boolean } = {}
  ): Promise<MultiAnalysis> {
    const ids = [...new Set(articleIds.map((id) => id.trim()).filter((id) => id.length > 0))].sort();
    if (ids.length < MIN_ANALYSIS_ARTICLES) {
      throw new ValidationError(`Multi-article analysis needs at least ${MIN_ANALYSIS_ARTICLES} distinct articles`);
    }
    if (ids.length > MAX_ANALYSIS_ARTICLES) {
      throw new ValidationError(`Multi-article analysis accepts at most ${MAX_ANALYSIS_ARTICLES} articles`);
    }

    const normalizedFocus = normalizeFocus(focus);
    const found = await this.store.getArticlesByIds(ids);
    const byId = new Map(found.map((article) => [article.id, article]));
    const missing = ids.filter((id) => !byId.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(`Articles not found: ${missing.join(', ')}`);
    }
    const articles = ids.flatMap((id) => byId.get(id) ?? []);

    const cacheKey = analysisCacheKey(ids, normalizedFocus);
    if (!options.force) {
      const cached = await this.store.getAnalysis(cacheKey);
      if (cached) {
        debugLogger.info('MULTI_ANALYSIS', 'Cache hit', { cacheKey, articles: ids.length });
        return {
          cacheKey,
          analysisText: cached.analysisText,
          focus: cached.focus,
          articleIds: ids,
          articlesAnalyzed: articles.length,
          articleDetails: articles.map(toDetail),
          sourceDiversity: distinctSources(articles),
          model: cached.model,
          generatedAt: cached.generatedAt,
          cached: true,
        };
      }
    }

    return this.analysisFlights.run(cacheKey, () => this.generateAnalysis(cacheKey, articles, normalizedFocus));
  }

  private async generateAnalysis(cacheKey: string, articles: Article[], focus: string): Promise<MultiAnalysis> {
    const stepId = debugLogger.stepStart('MULTI_ANALYSIS', `Analyzing ${articles.length} articles`, { focus });

    let text: string;
    try {
      text = await this.llm.generate(buildMultiPerspectivePrompt(articles, focus), {
        temperature: this.settings.temperature,
        maxTokens: ANALYSIS_MAX_TOKENS,
        timeoutMs: this.settings.timeoutMs,
        tags: ['multi-analysis'],
      });
    } catch (error) {
      debugLogger.stepError(stepId, 'MULTI_ANALYSIS', 'Generation failed', error);
      throw new AnalysisError('generation-failed', `Could not generate analysis: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const generatedAt = new Date();
    const articleIds = articles.map((article) => article.id);
    await this.store.saveAnalysis({
      cacheKey,
      focus,
      articleIds,
      analysisText: text,
      model: this.llm.model,
      generatedAt,
    });

    debugLogger.stepFinish(stepId, { length: text.length });
    return {
      cacheKey,
      analysisText: text,
      focus,
      articleIds,
      articlesAnalyzed: articles.length,
      articleDetails: articles.map(toDetail),
      sourceDiversity: distinctSources(articles),
      model: this.llm.model,
      generatedAt,
      cached: false,
    };
  }
}
