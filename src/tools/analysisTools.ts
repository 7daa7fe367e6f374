import { DynamicStructuredTool } from '@langchain/core/tools';
import { z } from 'zod';
import { GenerationError, NotFoundError, ValidationError, errorMessage } from '../errors';
import { buildBiasPrompt, buildComparisonPrompt, buildTrendingPrompt } from '../prompts/research-prompt';
import { debugLogger } from '../utils/debug-logger';
import { articlesInOrder } from './articleTools';
import type { ResearchToolDeps } from './index';

export const MIN_TRENDING_ARTICLES = 3;
const TRENDING_CANDIDATES = 50;
const TRENDING_PROMPT_ARTICLES = 10;
const HOUR_MS = 60 * 60 * 1000;

const LEANINGS = ['left', 'center', 'right', 'unknown'] as const;
type Leaning = (typeof LEANINGS)[number];

const LeaningMapSchema = z.record(z.string());

function isLeaning(value: string): value is Leaning {
  return LEANINGS.some((leaning) => leaning === value);
}

export function createGenerateSummaryTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'generate_summary',
    description: 'generate_summary(articleId, kind) - Cached AI summary; kind is brief, comprehensive or analytical',
    schema: z.object({
      articleId: z.string().min(1),
      kind: z.string().trim().min(1).default('comprehensive'),
    }),
    func: async ({ articleId, kind }) => {
      const summary = await deps.summarizer.getOrCreateSummary(articleId, kind);
      return JSON.stringify({
        summary: `Article summary: ${summary.summaryText}`,
        articleId,
        kind: summary.kind,
        summaryText: summary.summaryText,
        cached: summary.cached,
      });
    },
  });
}

export function createAnalyzePerspectivesTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'analyze_perspectives',
    description: 'analyze_perspectives(articleIds, focus) - Multi-perspective analysis of 2 to 10 articles',
    schema: z.object({
      articleIds: z.array(z.string().min(1)).min(2).max(10),
      focus: z.string().optional(),
    }),
    func: async ({ articleIds, focus }) => {
      const analysis = await deps.summarizer.getOrCreateMultiAnalysis(articleIds, focus);
      return JSON.stringify({
        summary: `Perspective analysis of ${analysis.articlesAnalyzed} articles (${analysis.sourceDiversity.join(', ')}): ${analysis.analysisText}`,
        analysis: analysis.analysisText,
        articlesAnalyzed: analysis.articlesAnalyzed,
        sources: analysis.sourceDiversity,
        cached: analysis.cached,
      });
    },
  });
}

export function createCompareArticlesTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'compare_articles',
    description: 'compare_articles(articleIds) - Side-by-side comparison of exactly two articles',
    schema: z.object({
      articleIds: z
        .array(z.string().min(1))
        .length(2)
        .refine(([first, second]) => first !== second, 'Compare two different articles'),
    }),
    func: async ({ articleIds }) => {
      const [first, second] = await articlesInOrder(deps, articleIds);
      if (!first || !second) {
        throw new NotFoundError(`Articles not found: ${articleIds.join(', ')}`);
      }

      const comparison = await deps.llm.generate(buildComparisonPrompt(first, second), {
        temperature: deps.settings.temperature,
        maxTokens: 1200,
        timeoutMs: deps.settings.timeoutMs,
        tags: ['research', 'compare'],
      });

      return JSON.stringify({
        summary: `Comparison of "${first.title}" and "${second.title}": ${comparison}`,
        comparison,
        articles: [first, second].map((article) => ({ id: article.id, title: article.title, source: article.source })),
      });
    },
  });
}

export function createTrendingTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'get_trending',
    description: 'get_trending(hoursBack) - Trending topics among articles ingested in the last hoursBack hours',
    schema: z.object({
      hoursBack: z.coerce.number().int().min(1).max(720).default(24),
    }),
    func: async ({ hoursBack }) => {
      const since = new Date(deps.now().getTime() - hoursBack * HOUR_MS);
      const articles = await deps.store.listArticlesCreatedSince(since, TRENDING_CANDIDATES);
      if (articles.length < MIN_TRENDING_ARTICLES) {
        throw new ValidationError(
          `Insufficient articles for trend analysis. Found ${articles.length}, need ${MIN_TRENDING_ARTICLES}`
        );
      }

      const analysis = await deps.llm.generate(buildTrendingPrompt(articles.slice(0, TRENDING_PROMPT_ARTICLES)), {
        temperature: deps.settings.temperature,
        maxTokens: 1200,
        timeoutMs: deps.settings.timeoutMs,
        tags: ['research', 'trending'],
      });

      return JSON.stringify({
        summary: `Trending analysis (${hoursBack} hours, ${articles.length} articles): ${analysis}`,
        analysis,
        articleCount: articles.length,
        period: `${hoursBack} hours`,
        articleIds: articles.map((article) => article.id),
      });
    },
  });
}

/**
 * Pull the first JSON object out of a model reply
 */
function parseLeanings(text: string): Record<string, string> | null {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const parsed = LeaningMapSchema.safeParse(JSON.parse(match[0]));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    debugLogger.warn('RESEARCH_TOOL', 'Leaning reply is not JSON', { error: errorMessage(error) });
    return null;
  }
}

export function createCategorizeBiasTool(deps: ResearchToolDeps) {
  return new DynamicStructuredTool({
    name: 'categorize_bias',
    description: 'categorize_bias(articleIds) - Sort articles into left, center, right or unknown leaning',
    schema: z.object({
      articleIds: z.array(z.string().min(1)).min(1).max(20),
    }),
    func: async ({ articleIds }) => {
      const articles = await articlesInOrder(deps, articleIds);
      if (articles.length === 0) {
        throw new NotFoundError('None of the requested articles exist');
      }

      let leanings: Record<string, string> | null = null;
      try {
        const reply = await deps.llm.generate(buildBiasPrompt(articles), {
          temperature: 0,
          maxTokens: 400,
          timeoutMs: deps.settings.timeoutMs,
          tags: ['research', 'bias'],
        });
        leanings = parseLeanings(reply);
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        debugLogger.warn('RESEARCH_TOOL', 'Leaning classification failed', { error: error.message });
      }

      const categorized: Record<Leaning, string[]> = { left: [], center: [], right: [], unknown: [] };
      for (const article of articles) {
        const label = leanings?.[article.id]?.trim().toLowerCase() ?? 'unknown';
        categorized[isLeaning(label) ? label : 'unknown'].push(article.id);
      }

      return JSON.stringify({
        summary: `Leaning: ${LEANINGS.map((leaning) => `${leaning} ${categorized[leaning].length}`).join(', ')}`,
        categorized,
        assessed: leanings !== null,
      });
    },
  });
}
