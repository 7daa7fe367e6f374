import { createHash } from 'crypto';

/**
 * Lower-case, collapse whitespace runs to one space, trim.
 */
export function normalizeForFingerprint(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Content identity of an article: sha256 over normalized title, body and
 * source joined by a line feed. The URL is not part of it, so the same
 * story syndicated under a different link still collapses.
 */
export function computeFingerprint(article: { title: string; content: string; source: string }): string {
  const payload = [article.title, article.content, article.source].map(normalizeForFingerprint).join('\n');
  return createHash('sha256').update(payload, 'utf8').digest('hex');
}

/**
 * Strip tracking parameters so stored links stay stable across fetches
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const paramsToRemove = [
      'utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content',
      'timestamp', '_t', '_ts', '_dc', '_refresh', '_rnd', 'rand',
    ];

    for (const param of paramsToRemove) {
      parsed.searchParams.delete(param);
    }
    parsed.hash = '';

    if (parsed.searchParams.toString() === '') {
      return `${parsed.origin}${parsed.pathname}`;
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
