/**
 * Run one ingestion cycle from the command line and print the report
 *
 * Usage: npm run ingest
 */

import '../instrumentation';
import { closeAppContext, createAppContext, seedFeedsIfEmpty } from '../app-context';
import { loadConfig } from '../config';
import { debugLogger } from '../utils/debug-logger';

async function main() {
  const config = loadConfig();
  debugLogger.configure({ enabled: config.debug });

  const ctx = createAppContext(config);
  try {
    await seedFeedsIfEmpty(ctx);
    const run = await ctx.registry.runNow('cli');

    if (run.status === 'failed' || !run.report) {
      console.error(`Ingestion failed: ${run.error ?? 'no report produced'}`);
      process.exitCode = 1;
      return;
    }

    console.log(JSON.stringify({ report: run.report, maintenance: run.maintenance }, null, 2));
  } finally {
    await closeAppContext(ctx);
  }
}

main().catch((error) => {
  console.error('Ingestion script failed:', error);
  process.exit(1);
});
