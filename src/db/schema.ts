/**
 * Relational schema. Timestamps are stored as epoch milliseconds.
 *
 * `summaries` has no foreign key to `articles`; bulk cleanup can leave the
 * summaries of deleted articles in place.
 */
export const RELATIONAL_SCHEMA = `
  CREATE TABLE IF NOT EXISTS articles (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    source TEXT NOT NULL,
    published_at INTEGER,
    url TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    fingerprint TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_articles_fingerprint ON articles(fingerprint);
  CREATE INDEX IF NOT EXISTS idx_articles_published_at ON articles(published_at);
  CREATE INDEX IF NOT EXISTS idx_articles_source ON articles(source);
  CREATE INDEX IF NOT EXISTS idx_articles_url ON articles(url);

  CREATE TABLE IF NOT EXISTS summaries (
    id TEXT PRIMARY KEY,
    article_id TEXT NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('brief', 'comprehensive', 'analytical')),
    summary_text TEXT NOT NULL,
    word_count INTEGER NOT NULL,
    model TEXT NOT NULL,
    generated_at INTEGER NOT NULL,
    UNIQUE (article_id, kind)
  );
  CREATE INDEX IF NOT EXISTS idx_summaries_article_id ON summaries(article_id);

  CREATE TABLE IF NOT EXISTS multi_analyses (
    cache_key TEXT PRIMARY KEY,
    focus TEXT NOT NULL,
    article_ids TEXT NOT NULL,
    analysis_text TEXT NOT NULL,
    model TEXT NOT NULL,
    generated_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS feeds (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE,
    enabled INTEGER NOT NULL DEFAULT 1,
    last_fetched_at INTEGER,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tags (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL UNIQUE COLLATE NOCASE,
    color TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS feed_tags (
    feed_id TEXT NOT NULL REFERENCES feeds(id) ON DELETE CASCADE,
    tag_id TEXT NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
    PRIMARY KEY (feed_id, tag_id)
  );

  CREATE TABLE IF NOT EXISTS reading_list (
    article_id TEXT PRIMARY KEY REFERENCES articles(id) ON DELETE CASCADE,
    notes TEXT,
    added_at INTEGER NOT NULL
  );
`;

export const VECTOR_SCHEMA = `
  CREATE TABLE IF NOT EXISTS vector_records (
    article_id TEXT PRIMARY KEY,
    embedding BLOB NOT NULL,
    dimensions INTEGER NOT NULL,
    title TEXT NOT NULL,
    source TEXT NOT NULL,
    url TEXT NOT NULL,
    published_at INTEGER,
    snippet TEXT NOT NULL,
    indexed_at INTEGER NOT NULL
  );
`;
