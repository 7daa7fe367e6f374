/**
 * Rebuild vector records for articles that are missing one, then drop
 * records whose article is gone.
 *
 * Usage: npm run reindex [-- --limit 500]
 */

import '../instrumentation';
import { closeAppContext, createAppContext } from '../app-context';
import { loadConfig } from '../config';

function parseLimit(argv: string[]): number | undefined {
  const index = argv.indexOf('--limit');
  if (index === -1) return undefined;
  const value = Number(argv[index + 1]);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--limit expects a positive integer, got "${argv[index + 1] ?? ''}"`);
  }
  return value;
}

async function main() {
  const limit = parseLimit(process.argv.slice(2));
  const ctx = createAppContext(loadConfig());

  try {
    console.log('Starting vector index repair...\n');
    const startTime = Date.now();

    const [articles, indexed] = await Promise.all([ctx.store.countArticles(), ctx.vectors.count()]);
    console.log(`Articles: ${articles}, vector records: ${indexed}`);

    const { indexed: added, failed } = await ctx.coordinator.indexPending(limit);
    const { purged } = await ctx.cleanup.purgeOrphanedVectorRecords();

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\n✅ Indexed ${added} articles (${failed} failed), purged ${purged} orphaned records in ${duration}s`);
    if (failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    await closeAppContext(ctx);
  }
}

main().catch((error) => {
  console.error('Reindex failed:', error);
  process.exit(1);
});
