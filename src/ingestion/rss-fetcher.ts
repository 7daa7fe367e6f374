import Parser from 'rss-parser';
import { FeedFetchError, errorMessage, type FeedErrorClass } from '../errors';
import type { RawFeedEntry } from '../types';
import { stripHtml, sleep } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';
import { sanitizeForLog } from '../utils/sanitize';
import { normalizeUrl } from './fingerprint';

interface FeedItemExtras {
  contentEncoded?: string;
  creator?: string;
  description?: string;
}

type FeedItem = FeedItemExtras & Parser.Item;

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: [['content:encoded', 'contentEncoded'], ['dc:creator', 'creator'], 'description'],
  },
});

export interface FeedSource {
  /** Present when the feed is registered in the store */
  id?: string;
  name: string;
  url: string;
}

export type FeedFetchOutcome =
  | {
      ok: true;
      title: string | null;
      itemCount: number;
      /** Valid entries, produced on demand */
      entries: Generator<RawFeedEntry, void, undefined>;
    }
  | { ok: false; error: FeedFetchError };

export interface FeedFetcherOptions {
  timeoutMs: number;
  /** Extra attempts after a network error or a 5xx response */
  retries?: number;
  retryDelayMs?: number;
  minContentLength?: number;
  fetchImpl?: typeof fetch;
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

/**
 * Some publishers omit the version attribute on <rss>, which the parser rejects
 */
function repairFeedXml(xml: string): string {
  const rssTag = xml.match(/<rss[^>]*>/);
  if (rssTag && !rssTag[0].includes('version=')) {
    return xml.replace(/<rss(\s|>)/, '<rss version="2.0"$1');
  }
  return xml;
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? null : parsed;
}

function extractContent(item: FeedItem): string {
  const candidates = [item.contentEncoded, item.content, item.summary, item.contentSnippet, item.description];
  for (const candidate of candidates) {
    if (typeof candidate === 'string') {
      const text = stripHtml(candidate);
      if (text) return text;
    }
  }
  return '';
}

function extractLink(item: FeedItem): string | null {
  if (item.link) return item.link;
  if (item.guid && /^https?:\/\//i.test(item.guid)) return item.guid;
  return null;
}

function extractCategories(item: FeedItem): string[] {
  const raw: unknown = item.categories;
  if (!Array.isArray(raw)) return [];
  return raw.filter((category): category is string => typeof category === 'string').map((c) => c.trim());
}

/**
 * HTTP GET + rss-parser with a per-feed timeout. Every failure comes back
 * as a FeedFetchError value; nothing is thrown and nothing is persisted.
 */
export class FeedFetcher {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly minContentLength: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FeedFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.minContentLength = options.minContentLength ?? 50;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(feed: FeedSource, signal?: AbortSignal): Promise<FeedFetchOutcome> {
    const stepId = debugLogger.stepStart('RSS_FETCH', `Fetching ${feed.name}`, { url: feed.url });

    let lastError: FeedFetchError | null = null;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        const delay = Math.pow(2, attempt - 1) * this.retryDelayMs;
        debugLogger.info('RSS_FETCH', `Retrying ${feed.name} after ${delay}ms`, { attempt: attempt + 1 });
        await sleep(delay);
      }

      const outcome = await this.attempt(feed, signal);
      if (outcome.ok) {
        debugLogger.stepFinish(stepId, { itemCount: outcome.itemCount, attempts: attempt + 1 });
        return outcome;
      }

      lastError = outcome.error;
      if (!this.isRetryable(outcome.error) || signal?.aborted) {
        break;
      }
    }

    const error = lastError ?? new FeedFetchError(feed.url, 'network', `Failed to fetch ${feed.url}`);
    debugLogger.stepError(stepId, 'RSS_FETCH', `Failed to fetch ${feed.name}`, error);
    console.warn(`⚠️  Feed ${sanitizeForLog(feed.name)} failed (${error.errorClass}): ${sanitizeForLog(error.message)}`);
    return { ok: false, error };
  }

  private isRetryable(error: FeedFetchError): boolean {
    if (error.errorClass === 'network') return true;
    return error.errorClass === 'http-status' && error.httpStatus !== null && RETRYABLE_STATUS.has(error.httpStatus);
  }

  private async attempt(feed: FeedSource, signal?: AbortSignal): Promise<FeedFetchOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const fail = (errorClass: FeedErrorClass, message: string, options?: { cause?: unknown; httpStatus?: number }) =>
      ({ ok: false, error: new FeedFetchError(feed.url, errorClass, message, options) }) as const;

    try {
      if (signal?.aborted) {
        return fail('timeout', `Fetch of ${feed.url} cancelled before it started`);
      }

      let xml: string;
      try {
        const response = await this.fetchImpl(feed.url, {
          signal: controller.signal,
          headers: { Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8' },
        });
        if (!response.ok) {
          return fail('http-status', `HTTP ${response.status} ${response.statusText}`.trim(), {
            httpStatus: response.status,
          });
        }
        xml = await response.text();
      } catch (error) {
        if (timedOut || signal?.aborted) {
          const reason = timedOut ? `Timed out after ${this.timeoutMs}ms` : 'Ingestion run deadline reached';
          return fail('timeout', reason, { cause: error });
        }
        return fail('network', errorMessage(error), { cause: error });
      }

      let parsed: Parser.Output<FeedItemExtras>;
      try {
        parsed = await parser.parseString(repairFeedXml(xml));
      } catch (error) {
        return fail('parse', `Unparseable feed: ${errorMessage(error)}`, { cause: error });
      }

      const items = parsed.items ?? [];
      return {
        ok: true,
        title: parsed.title ?? null,
        itemCount: items.length,
        entries: this.entries(items, feed),
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private *entries(items: FeedItem[], feed: FeedSource): Generator<RawFeedEntry, void, undefined> {
    for (const item of items) {
      const title = item.title ? stripHtml(item.title) : '';
      const link = extractLink(item);
      if (!title || !link) {
        debugLogger.warn('RSS_PARSE', 'Skipping entry without title or link', { feed: feed.name });
        continue;
      }

      const content = extractContent(item);
      if (content.length < this.minContentLength) {
        debugLogger.warn('RSS_PARSE', 'Skipping entry with short body', {
          feed: feed.name,
          title: sanitizeForLog(title),
          length: content.length,
        });
        continue;
      }

      yield {
        title,
        content,
        url: normalizeUrl(link),
        publishedAt: parseDate(item.isoDate ?? item.pubDate),
        source: feed.name,
        author: item.creator ?? null,
        categories: extractCategories(item),
      };
    }
  }
}
