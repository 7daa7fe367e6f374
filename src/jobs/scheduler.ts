/**
 * Background job scheduler using node-cron
 */

import * as cron from 'node-cron';
import { errorMessage } from '../errors';
import { debugLogger } from '../utils/debug-logger';
import type { IngestionRunRegistry } from './run-registry';

let scheduledTask: cron.ScheduledTask | null = null;
let scheduledExpression: string | null = null;

/**
 * Submit a scheduled run unless one is already queued or running
 */
export function scheduledTick(registry: IngestionRunRegistry): boolean {
  if (registry.isBusy()) {
    debugLogger.info('JOB', 'Ingestion already running, skipping this tick');
    return false;
  }

  try {
    registry.submit('scheduled');
    return true;
  } catch (error) {
    console.error(`❌ Could not queue scheduled ingestion: ${errorMessage(error)}`);
    return false;
  }
}

export function startJobScheduler(
  registry: IngestionRunRegistry,
  cronExpression: string,
  options: { runOnStart?: boolean } = {}
): void {
  if (scheduledTask) {
    console.warn('Job scheduler is already running');
    return;
  }

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  scheduledTask = cron.schedule(cronExpression, () => {
    scheduledTick(registry);
  });
  scheduledExpression = cronExpression;

  console.log(`🤖 Background job scheduler started (${cronExpression})`);

  // Don't wait for the first cron tick
  if (options.runOnStart) {
    registry.submit('startup');
  }
}

export function stopJobScheduler(): void {
  if (!scheduledTask) {
    return;
  }

  scheduledTask.stop();
  scheduledTask = null;
  console.log('Background job scheduler stopped');
}

/**
 * Stop scheduling and wait for the current run to finish
 */
export async function gracefulShutdown(registry: IngestionRunRegistry, maxWaitMs = 30000): Promise<void> {
  console.log('Stopping background job scheduler...');
  stopJobScheduler();

  if (await registry.waitForIdle(maxWaitMs)) {
    console.log('Background job scheduler shut down gracefully');
  } else {
    console.warn('Ingestion run did not finish within timeout period');
    for (const step of debugLogger.getActiveSteps()) {
      console.warn(`  still running: ${step.category} ${step.description} (${step.duration}ms)`);
    }
  }
}

export function getSchedulerStatus(registry: IngestionRunRegistry): {
  isRunning: boolean;
  cronExpression: string | null;
  isJobCurrentlyExecuting: boolean;
  queuedRuns: number;
} {
  return {
    isRunning: scheduledTask !== null,
    cronExpression: scheduledExpression,
    isJobCurrentlyExecuting: registry.activeRuns > 0,
    queuedRuns: registry.queuedRuns,
  };
}
