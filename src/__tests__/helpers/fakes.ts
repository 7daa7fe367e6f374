/**
 * In-process stand-ins for the network boundaries: feed hosts, the LLM and
 * the embedding provider.
 */

import type { EmbeddingClient, GenerateOptions, LlmClient } from '../../agents/llm';
import { loadConfig, type AppConfig } from '../../config';
import type { ArticleStore } from '../../db/store';
import { EmbeddingError, GenerationError } from '../../errors';
import { computeFingerprint } from '../../ingestion/fingerprint';
import type { Article, NewArticle } from '../../types';

export interface FeedItemFixture {
  title?: string;
  link?: string;
  description?: string;
  pubDate?: string;
}

export function rssXml(title: string, items: FeedItemFixture[]): string {
  const body = items
    .map(
      (item) => `    <item>
${item.title !== undefined ? `      <title>${item.title}</title>\n` : ''}${item.link !== undefined ? `      <link>${item.link}</link>\n` : ''}${item.description !== undefined ? `      <description>${item.description}</description>\n` : ''}${item.pubDate !== undefined ? `      <pubDate>${item.pubDate}</pubDate>\n` : ''}    </item>`
    )
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>${title}</title>
    <link>https://example.com</link>
    <description>${title} feed</description>
${body}
  </channel>
</rss>`;
}

/**
 * Items with bodies long enough to pass the minimum content length
 */
export function storyItems(prefix: string, count: number): FeedItemFixture[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `${prefix} story ${i + 1}`,
    link: `https://${prefix.toLowerCase()}.example.com/story-${i + 1}`,
    description: `${prefix} reports on development number ${i + 1} with enough detail to be worth storing.`,
    pubDate: new Date(Date.UTC(2024, 0, 10 + i)).toUTCString(),
  }));
}

export type FeedRoute =
  | { status: number; body: string }
  | { kind: 'network-error' }
  | { kind: 'hang' };

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * fetch replacement serving canned responses per URL. Unknown URLs fail
 * like an unreachable host; 'hang' never answers until aborted.
 */
export function fakeFetch(routes: Record<string, FeedRoute>): typeof fetch & { calls: string[] } {
  const calls: string[] = [];

  const impl = (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = urlOf(input);
    calls.push(url);
    const route = routes[url];

    if (!route || ('kind' in route && route.kind === 'network-error')) {
      return Promise.reject(new TypeError(`fetch failed: getaddrinfo ENOTFOUND ${url}`));
    }

    if ('kind' in route) {
      return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        const abort = () => reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        if (signal.aborted) {
          abort();
          return;
        }
        signal.addEventListener('abort', abort, { once: true });
      });
    }

    return Promise.resolve(
      new Response(route.body, { status: route.status, headers: { 'Content-Type': 'application/rss+xml' } })
    );
  };

  return Object.assign(impl, { calls });
}

export class FakeLlm implements LlmClient {
  readonly model = 'fake-llm';
  readonly prompts: string[] = [];
  failure: Error | null = null;
  delayMs = 0;

  constructor(private readonly respond: (prompt: string, callNumber: number) => string = (_p, n) => `Generated text ${n}`) {}

  async generate(prompt: string, _options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    const callNumber = this.prompts.length;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failure) {
      throw new GenerationError(`LLM generation failed: ${this.failure.message}`, { cause: this.failure });
    }
    return this.respond(prompt, callNumber);
  }

  get callCount(): number {
    return this.prompts.length;
  }
}

export const EMBEDDING_DIMENSIONS = 64;

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return (hash >>> 0) % EMBEDDING_DIMENSIONS;
}

/**
 * Deterministic bag-of-words embedding: identical texts map to identical
 * vectors, texts sharing words land close together.
 */
export function hashEmbedding(text: string): number[] {
  const vector = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);
  const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  for (const token of tokens) {
    vector[hashToken(token)] += 1;
  }
  if (tokens.length === 0) {
    vector[0] = 1;
  }
  return vector;
}

export class HashEmbeddings implements EmbeddingClient {
  readonly model = 'fake-embedding';
  readonly inputs: string[] = [];
  shouldFail: (text: string) => boolean = () => false;

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.inputs.push(...texts);
    const failing = texts.find((text) => this.shouldFail(text));
    if (failing !== undefined) {
      throw new EmbeddingError(`Embedding failed: provider rejected "${failing.substring(0, 30)}"`);
    }
    return texts.map(hashEmbedding);
  }
}

export function testConfig(env: Record<string, string> = {}): Readonly<AppConfig> {
  return loadConfig({
    NODE_ENV: 'test',
    DATABASE_PATH: ':memory:',
    VECTOR_DB_PATH: ':memory:',
    OPENROUTER_API_KEY: 'test-secret',
    ...env,
  });
}

export async function seedArticle(
  store: ArticleStore,
  fields: Partial<NewArticle> & { title: string }
): Promise<Article> {
  const content = fields.content ?? `${fields.title} body text.`;
  const source = fields.source ?? 'Test Wire';
  const slug = fields.title.toLowerCase().replace(/[^a-z0-9]+/g, '-');
  const { article } = await store.insertArticleIfAbsent({
    title: fields.title,
    content,
    source,
    publishedAt: fields.publishedAt ?? null,
    url: fields.url ?? `https://news.example.com/${slug}`,
    metadata: fields.metadata ?? {},
    fingerprint: fields.fingerprint ?? computeFingerprint({ title: fields.title, content, source }),
  });
  return article;
}
