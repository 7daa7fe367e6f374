import { describe, it, expect } from 'vitest';
import { loadConfig, parseFeedList } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.server.port).toBe(3001);
    expect(config.server.apiKey).toBeNull();
    expect(config.ingestion).toMatchObject({
      feeds: [],
      maxArticlesPerFeed: 50,
      feedRetries: 1,
      cron: '0 * * * *',
      schedulerEnabled: true,
    });
    expect(config.search).toEqual({ defaultLimit: 10, minSimilarity: 0 });
    expect(config.tracing.publicKey).toBeNull();
    expect(config.llm.embeddingTimeoutMs).toBe(30000);
  });

  it('coerces numbers and booleans from strings', () => {
    const config = loadConfig({
      PORT: '8080',
      INGESTION_SCHEDULER_ENABLED: '0',
      DEBUG: 'true',
      SEARCH_MIN_SIMILARITY: '0.25',
      CORS_ORIGINS: 'https://a.example.com, https://b.example.com',
      API_KEY: 'test-secret',
      EMBEDDING_TIMEOUT_MS: '1500',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.corsOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
    expect(config.server.apiKey).toBe('test-secret');
    expect(config.ingestion.schedulerEnabled).toBe(false);
    expect(config.debug).toBe(true);
    expect(config.search.minSimilarity).toBe(0.25);
    expect(config.llm.embeddingTimeoutMs).toBe(1500);
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', SEARCH_MIN_SIMILARITY: '2' })).toThrow(
      /Invalid configuration: PORT: .*; SEARCH_MIN_SIMILARITY: /
    );
  });

  it('returns a frozen object', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.ingestion.feeds)).toBe(true);
  });
});

describe('parseFeedList', () => {
  it('accepts bare URLs and named entries', () => {
    expect(parseFeedList('https://a.example.com/rss, Bravo Daily|https://b.example.com/feed ,')).toEqual([
      { name: 'a.example.com', url: 'https://a.example.com/rss' },
      { name: 'Bravo Daily', url: 'https://b.example.com/feed' },
    ]);
  });

  it('falls back to the host name when the name is blank', () => {
    expect(parseFeedList(' |https://c.example.com/rss')).toEqual([{ name: 'c.example.com', url: 'https://c.example.com/rss' }]);
  });
});
