import { z } from 'zod';

/**
 * A feed as configured through RSS_FEEDS. Entries are either a bare URL
 * or `Display Name|https://example.com/feed.xml`.
 */
export interface FeedSeed {
  name: string;
  url: string;
}

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: intFromEnv(3001, 1),
  DATABASE_PATH: z.string().default('./data/articles.db'),
  VECTOR_DB_PATH: z.string().default('./data/vectors.db'),

  OPENROUTER_API_KEY: z.string().default(''),
  LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LLM_MODEL: z.string().default('google/gemini-2.5-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_TIMEOUT_MS: intFromEnv(60000, 1000),
  EMBEDDING_MODEL: z.string().default('qwen/qwen3-embedding-8b'),
  EMBEDDING_TIMEOUT_MS: intFromEnv(30000, 100),
  APP_URL: z.string().default('http://localhost:3001'),

  RSS_FEEDS: z.string().default(''),
  MAX_ARTICLES_PER_FEED: intFromEnv(50, 1),
  MAX_ARTICLES_PER_RUN: intFromEnv(500, 1),
  FEED_TIMEOUT_MS: intFromEnv(30000, 100),
  FEED_RETRIES: intFromEnv(1),
  RUN_TIMEOUT_MS: intFromEnv(600000, 1000),
  FEED_CONCURRENCY: intFromEnv(4, 1),
  ARTICLE_CONCURRENCY: intFromEnv(8, 1),
  MIN_CONTENT_LENGTH: intFromEnv(50),
  INGESTION_CRON: z.string().default('0 * * * *'),
  INGESTION_SCHEDULER_ENABLED: booleanFromEnv(true),

  SEARCH_RESULTS_LIMIT: intFromEnv(10, 1),
  SEARCH_MIN_SIMILARITY: z.coerce.number().min(0).max(1).default(0),

  RATE_LIMIT_PER_MINUTE: intFromEnv(60, 1),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),
  API_KEY: z.string().optional(),
  DEBUG: booleanFromEnv(false),

  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_HOST: z.string().default('https://us.cloud.langfuse.com'),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  server: {
    host: string;
    port: number;
    corsOrigins: string[];
    rateLimitPerMinute: number;
    apiKey: string | null;
  };
  storage: {
    databasePath: string;
    vectorDbPath: string;
  };
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    temperature: number;
    timeoutMs: number;
    embeddingModel: string;
    embeddingTimeoutMs: number;
    appUrl: string;
  };
  ingestion: {
    feeds: FeedSeed[];
    maxArticlesPerFeed: number;
    maxArticlesPerRun: number;
    feedTimeoutMs: number;
    feedRetries: number;
    runTimeoutMs: number;
    feedConcurrency: number;
    articleConcurrency: number;
    minContentLength: number;
    cron: string;
    schedulerEnabled: boolean;
  };
  search: {
    defaultLimit: number;
    minSimilarity: number;
  };
  tracing: {
    publicKey: string | null;
    secretKey: string | null;
    host: string;
  };
  debug: boolean;
}

export function parseFeedList(raw: string): FeedSeed[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('|');
      if (separator === -1) {
        return { name: hostnameOf(entry), url: entry };
      }
      const name = entry.slice(0, separator).trim();
      const url = entry.slice(separator + 1).trim();
      return { name: name || hostnameOf(url), url };
    });
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable application configuration from environment variables.
 * Throws with every invalid variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  const config: AppConfig = {
    env: e.NODE_ENV,
    server: {
      host: e.HOST,
      port: e.PORT,
      corsOrigins: splitList(e.CORS_ORIGINS),
      rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
      apiKey: e.API_KEY || null,
    },
    storage: {
      databasePath: e.DATABASE_PATH,
      vectorDbPath: e.VECTOR_DB_PATH,
    },
    llm: {
      apiKey: e.OPENROUTER_API_KEY,
      baseUrl: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      embeddingModel: e.EMBEDDING_MODEL,
      embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
      appUrl: e.APP_URL,
    },
    ingestion: {
      feeds: parseFeedList(e.RSS_FEEDS),
      maxArticlesPerFeed: e.MAX_ARTICLES_PER_FEED,
      maxArticlesPerRun: e.MAX_ARTICLES_PER_RUN,
      feedTimeoutMs: e.FEED_TIMEOUT_MS,
      feedRetries: e.FEED_RETRIES,
      runTimeoutMs: e.RUN_TIMEOUT_MS,
      feedConcurrency: e.FEED_CONCURRENCY,
      articleConcurrency: e.ARTICLE_CONCURRENCY,
      minContentLength: e.MIN_CONTENT_LENGTH,
      cron: e.INGESTION_CRON,
      schedulerEnabled: e.INGESTION_SCHEDULER_ENABLED,
    },
    search: {
      defaultLimit: e.SEARCH_RESULTS_LIMIT,
      minSimilarity: e.SEARCH_MIN_SIMILARITY,
    },
    tracing: {
      publicKey: e.LANGFUSE_PUBLIC_KEY || null,
      secretKey: e.LANGFUSE_SECRET_KEY || null,
      host: e.LANGFUSE_HOST,
    },
    debug: e.DEBUG,
  };

  return deepFreeze(config);
}
