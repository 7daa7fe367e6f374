import { sanitizeHtml } from './sanitize';

/**
 * Strip HTML tags and decode entities from feed content
 */
export function stripHtml(html: string): string {
  return sanitizeHtml(html);
}

/**
 * Plain excerpt for result display, cut on a word boundary
 */
export function excerpt(text: string, maxLength = 200): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }

  const cut = normalized.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}...`;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
