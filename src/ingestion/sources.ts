import type { FeedSeed } from '../config';

/**
 * Feeds seeded into an empty feed table when RSS_FEEDS is not set
 */
export const DEFAULT_FEEDS: FeedSeed[] = [
  { name: 'BBC News', url: 'https://feeds.bbci.co.uk/news/rss.xml' },
  { name: 'NPR News', url: 'https://feeds.npr.org/1001/rss.xml' },
  { name: 'The Guardian World', url: 'https://www.theguardian.com/world/rss' },
];

export function feedSeeds(configured: readonly FeedSeed[]): FeedSeed[] {
  return configured.length > 0 ? [...configured] : DEFAULT_FEEDS;
}
