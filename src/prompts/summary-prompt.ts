import type { SummaryKind } from '../types';
import { sanitizeForPrompt } from '../utils/sanitize';

export const SUMMARY_CONTENT_LIMIT = 4000;

interface SummaryProfile {
  targetWords: number;
  maxTokens: number;
  instructions: string;
}

export const SUMMARY_PROFILES: Record<SummaryKind, SummaryProfile> = {
  brief: {
    targetWords: 50,
    maxTokens: 200,
    instructions: 'Write a brief summary of about 50 words: the single most important development and who it affects.',
  },
  comprehensive: {
    targetWords: 150,
    maxTokens: 500,
    instructions: `Write a comprehensive summary of about 150 words that covers:
1. Main points and key information
2. Important context and background
3. Notable quotes or data points`,
  },
  analytical: {
    targetWords: 300,
    maxTokens: 900,
    instructions: `Write an analytical summary of about 300 words that covers:
1. Main points and key information
2. Important context and background
3. Significance and implications, including likely next developments
4. Open questions the article leaves unanswered`,
  },
};

export function buildSummaryPrompt(article: { title: string; content: string }, kind: SummaryKind): string {
  const profile = SUMMARY_PROFILES[kind];
  const title = sanitizeForPrompt(article.title).sanitized;
  const content = sanitizeForPrompt(article.content.substring(0, SUMMARY_CONTENT_LIMIT)).sanitized;

  return `Analyze and summarize the following news article.

Title: ${title}
Content: ${content}

${profile.instructions}

Keep the summary clear, objective and informative. Reply with the summary text only.

Summary:`;
}
