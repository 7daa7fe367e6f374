import type { Article } from '../types';
import { sanitizeForPrompt } from '../utils/sanitize';

export const COMPARISON_CONTENT_LIMIT = 800;
export const TRENDING_CONTENT_LIMIT = 500;
const BIAS_CONTENT_LIMIT = 300;

function clean(text: string): string {
  return sanitizeForPrompt(text).sanitized;
}

export interface PlannableTool {
  name: string;
  description: string;
}

export function buildPlanningPrompt(query: string, tools: readonly PlannableTool[], maxSteps: number): string {
  const toolList = tools.map((tool, i) => `${i + 1}. ${tool.name} - ${tool.description}`).join('\n');

  return `You are a news research planning assistant. Create a step-by-step plan to answer this query:

Query: ${clean(query)}

Available tools:
${toolList}

Steps run in order. A step that needs articleIds or articleId and does not name them receives the articles found by the most recent step that found articles, so leave those parameters out when they come from an earlier step.

Reply with a JSON object only:
{
  "steps": [{ "tool_name": "...", "description": "...", "parameters": { } }],
  "rationale": "why this plan answers the query"
}

Use at most ${maxSteps} steps. Be efficient.`;
}

export function buildSynthesisPrompt(query: string, findings: readonly string[]): string {
  return `Based on the research results below, provide a direct, concise answer to this question:

Question: ${clean(query)}

Research Results:
${findings.join('\n\n')}

Provide a clear, focused answer that directly addresses the question. If the question asks for a specific number of items (e.g., "top 3"), limit your answer to exactly that many items. Only use facts present in the research results.`;
}

function formatForComparison(article: Article): string {
  return `Title: ${clean(article.title)}
Source: ${article.source}
Content: ${clean(article.content.substring(0, COMPARISON_CONTENT_LIMIT))}...`;
}

export function buildComparisonPrompt(first: Article, second: Article): string {
  return `Compare these two news articles and provide analysis:

Article 1:
${formatForComparison(first)}

Article 2:
${formatForComparison(second)}

The comparison should include:
1. Similarities and differences in coverage
2. Different perspectives or viewpoints
3. Additional context in each article
4. Credibility and source quality
5. Recommendations for readers

Comparison Analysis:`;
}

export function buildTrendingPrompt(articles: readonly Article[]): string {
  const articlesContent = articles
    .map(
      (article) =>
        `Title: ${clean(article.title)}\nSource: ${article.source}\nContent: ${clean(
          article.content.substring(0, TRENDING_CONTENT_LIMIT)
        )}...`
    )
    .join('\n\n');

  return `Analyze the following news articles and identify:

Articles:
${articlesContent}

Please provide:
1. Main topics and themes
2. Trending subjects
3. Connections between stories
4. Overall narrative or pattern
5. Important developments to watch

Analysis:`;
}

/**
 * Asks for a JSON object mapping each article id to left, center, right
 * or unknown.
 */
export function buildBiasPrompt(articles: readonly Article[]): string {
  const listing = articles
    .map(
      (article) =>
        `[${article.id}]\nTitle: ${clean(article.title)}\nSource: ${article.source}\nExcerpt: ${clean(
          article.content.substring(0, BIAS_CONTENT_LIMIT)
        )}`
    )
    .join('\n\n');

  return `Classify the political leaning of each article below as "left", "center", "right" or "unknown". Judge the framing of the text, not the topic. Use "unknown" when the text gives too little to go on.

${listing}

Reply with a JSON object only, keyed by the id in brackets, for example {"<id>": "center"}.`;
}
