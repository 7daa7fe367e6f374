/**
 * API endpoint for background ingestion status and metrics
 */

import { Router } from 'express';
import type { AppContext } from '../app-context';
import { getSchedulerStatus } from '../jobs/scheduler';

export function createJobStatusRouter(ctx: Pick<AppContext, 'registry'>): Router {
  const router = Router();

  /**
   * GET /api/job-status
   */
  router.get('/', (_req, res) => {
    const schedulerStatus = getSchedulerStatus(ctx.registry);
    const metrics = ctx.registry.getMetrics();
    const stats = metrics.getStats();
    const recentRuns = ctx.registry.list(10);
    const lastRun = recentRuns[0] ?? null;

    const isHealthy =
      schedulerStatus.isRunning && !metrics.isCriticalFailureState() && (lastRun === null || lastRun.status !== 'failed');

    res.json({
      healthy: isHealthy,
      scheduler: {
        running: schedulerStatus.isRunning,
        cronExpression: schedulerStatus.cronExpression,
        currentlyExecuting: schedulerStatus.isJobCurrentlyExecuting,
        queuedRuns: schedulerStatus.queuedRuns,
      },
      stats,
      lastRun: lastRun
        ? {
            ...lastRun,
            timeSinceLastRunMs: lastRun.startedAt ? Date.now() - lastRun.startedAt.getTime() : null,
          }
        : null,
      recentRuns: recentRuns.map((run) => ({
        id: run.id,
        trigger: run.trigger,
        status: run.status,
        startedAt: run.startedAt,
        completedAt: run.completedAt,
        reportStatus: run.report?.status ?? null,
        totals: run.report?.totals ?? null,
        error: run.error,
      })),
    });
  });

  return router;
}
