import type { Article } from '../types';
import { sanitizeForPrompt } from '../utils/sanitize';

export const ANALYSIS_CONTENT_LIMIT = 1000;
export const DEFAULT_ANALYSIS_FOCUS = 'the main topic';

function formatArticle(article: Article, position: number): string {
  const published = article.publishedAt ? article.publishedAt.toISOString() : 'unknown';
  const content = sanitizeForPrompt(article.content.substring(0, ANALYSIS_CONTENT_LIMIT)).sanitized;

  return `[ARTICLE ${position}]
Title: ${sanitizeForPrompt(article.title).sanitized}
Source: ${article.source}
Published: ${published}
Content: ${content}`;
}

/**
 * Cross-article perspective prompt. Every article is included, in the order given.
 */
export function buildMultiPerspectivePrompt(articles: readonly Article[], focus: string): string {
  const articlesContent = articles.map((article, i) => formatArticle(article, i + 1)).join('\n\n---\n\n');

  return `Analyze the following news articles from multiple perspectives on the topic: ${sanitizeForPrompt(focus).sanitized}

Articles:
${articlesContent}

Provide a multi-perspective analysis with these sections:

1. **Source Diversity**: the sources represented, their usual editorial angle and any gaps in coverage
2. **Perspective Breakdown**: economic, social, international and expert viewpoints present in the coverage
3. **Convergence**: facts and claims most sources agree on
4. **Divergence**: where sources disagree, emphasize different aspects or predict different outcomes
5. **Missing Perspectives**: stakeholders or viewpoints absent from these articles
6. **Synthesis**: a balanced reading of the issue and questions worth following up

Format the response with clear headers and bullet points.

Multi-Perspective Analysis:`;
}
