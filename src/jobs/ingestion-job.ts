/**
 * One ingestion cycle: fetch enabled feeds, index anything left pending,
 * then purge vector records of deleted articles.
 */

import type { CleanupCoordinator } from '../admin/cleanup';
import type { ArticleStore } from '../db/store';
import { errorMessage } from '../errors';
import type { IngestionCoordinator } from '../ingestion/coordinator';
import { debugLogger } from '../utils/debug-logger';
import type { JobOutcome, MaintenanceResult, RunExecutor, RunTrigger } from './run-registry';

export interface IngestionJobDeps {
  store: ArticleStore;
  coordinator: IngestionCoordinator;
  cleanup: CleanupCoordinator;
}

async function runMaintenance(deps: IngestionJobDeps): Promise<MaintenanceResult | null> {
  try {
    const pending = await deps.coordinator.indexPending();
    const purge = await deps.cleanup.purgeOrphanedVectorRecords();
    return { indexed: pending.indexed, indexFailed: pending.failed, orphansPurged: purge.purged };
  } catch (error) {
    console.warn(`⚠️  Post-ingestion maintenance failed: ${errorMessage(error)}`);
    return null;
  }
}

export function createIngestionJob(deps: IngestionJobDeps): RunExecutor {
  return async (runId: string, trigger: RunTrigger): Promise<JobOutcome> => {
    const feeds = await deps.store.listFeeds({ enabledOnly: true });
    debugLogger.info('JOB', 'Starting ingestion cycle', { runId, trigger, feeds: feeds.length });

    const report = await deps.coordinator.run(feeds, { runId });
    const maintenance = await runMaintenance(deps);

    const { totals } = report;
    if (totals.new > 0) {
      console.log(
        `🎉 Ingestion ${report.status}: ${totals.new} new, ${totals.duplicate} duplicate, ` +
          `${totals.rejected} rejected, ${totals.failed} failed of ${totals.fetched} fetched (${report.durationMs}ms)`
      );
    } else {
      console.log(`😴 Ingestion ${report.status}: no new articles (checked ${totals.fetched} in ${report.durationMs}ms)`);
    }

    for (const [url, feed] of Object.entries(report.feeds)) {
      for (const error of feed.errors) {
        console.warn(`⚠️  ${feed.feedName} (${url}) ${error.class}: ${error.message}`);
      }
    }

    if (maintenance && (maintenance.indexed > 0 || maintenance.orphansPurged > 0)) {
      console.log(
        `🔧 Maintenance: indexed ${maintenance.indexed} pending articles, purged ${maintenance.orphansPurged} orphaned vectors`
      );
    }

    return { report, maintenance };
  };
}
