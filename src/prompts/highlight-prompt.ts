import { sanitizeForPrompt } from '../utils/sanitize';

const HIGHLIGHT_CONTENT_LIMIT = 1500;

export function buildHighlightPrompt(query: string, article: { title: string; content: string }): string {
  return `A reader searched for: "${sanitizeForPrompt(query).sanitized}"

Title: ${sanitizeForPrompt(article.title).sanitized}
Content: ${sanitizeForPrompt(article.content.substring(0, HIGHLIGHT_CONTENT_LIMIT)).sanitized}

In one or two sentences (at most 60 words), explain what this article says that is relevant to the search. Reply with those sentences only.`;
}
