import { afterEach, describe, it, expect, vi } from 'vitest';
import { ValidationError } from '../../errors';
import { MetricsTracker } from '../metrics-tracker';
import { IngestionRunRegistry, type JobOutcome, type RunExecutor } from '../run-registry';
import { scheduledTick } from '../scheduler';

function outcome(runId: string): JobOutcome {
  const at = new Date('2024-05-01T00:00:00Z');
  return {
    report: {
      runId,
      status: 'completed',
      startedAt: at,
      completedAt: at,
      durationMs: 40,
      feeds: {},
      totals: { fetched: 3, new: 2, duplicate: 1, failed: 0, rejected: 0 },
    },
    maintenance: { indexed: 0, indexFailed: 0, orphansPurged: 0 },
  };
}

/**
 * Executor whose runs finish only when the test releases them
 */
function gatedExecutor() {
  const gates: Array<() => void> = [];
  const executor: RunExecutor = (runId) =>
    new Promise<JobOutcome>((resolve) => {
      gates.push(() => resolve(outcome(runId)));
    });
  return { gates, executor };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('IngestionRunRegistry', () => {
  it('runs a job to completion and records its metrics', async () => {
    const metrics = new MetricsTracker();
    const registry = new IngestionRunRegistry(async (runId) => outcome(runId), { metrics });

    const record = await registry.runNow('manual');

    expect(record.status).toBe('completed');
    expect(record.trigger).toBe('manual');
    expect(record.report?.runId).toBe(record.id);
    expect(record.maintenance).toEqual({ indexed: 0, indexFailed: 0, orphansPurged: 0 });
    expect(record.completedAt).toBeInstanceOf(Date);
    expect(metrics.getStats()).toMatchObject({
      totalRuns: 1,
      successfulRuns: 1,
      totalArticlesFetched: 3,
      totalArticlesNew: 2,
      totalDuplicates: 1,
      averageDurationMs: 40,
    });
    expect(registry.get(record.id)?.status).toBe('completed');
  });

  it('runs one job at a time and queues the rest', async () => {
    const { gates, executor } = gatedExecutor();
    const registry = new IngestionRunRegistry(executor);

    const first = registry.submit('manual');
    const second = registry.submit('scheduled');

    expect(first.status).toBe('running');
    expect(second.status).toBe('queued');
    expect(registry.activeRuns).toBe(1);
    expect(registry.queuedRuns).toBe(1);
    expect(gates).toHaveLength(1);

    gates[0]();
    await vi.waitFor(() => expect(gates).toHaveLength(2));
    expect(registry.get(first.id)?.status).toBe('completed');
    expect(registry.get(second.id)?.status).toBe('running');

    gates[1]();
    expect(await registry.waitForIdle(1000, 5)).toBe(true);
    expect(registry.get(second.id)?.status).toBe('completed');
  });

  it('refuses new runs once the queue is full', async () => {
    const { gates, executor } = gatedExecutor();
    const registry = new IngestionRunRegistry(executor, { maxQueuedRuns: 2 });

    registry.submit('manual');
    registry.submit('manual');
    registry.submit('manual');

    expect(() => registry.submit('manual')).toThrow(ValidationError);

    gates[0]();
    await vi.waitFor(() => expect(gates).toHaveLength(2));
    gates[1]();
    await vi.waitFor(() => expect(gates).toHaveLength(3));
    gates[2]();
    expect(await registry.waitForIdle(1000, 5)).toBe(true);
  });

  it('records a failed run with its error', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const metrics = new MetricsTracker();
    const registry = new IngestionRunRegistry(async () => Promise.reject(new Error('store offline')), { metrics });

    const record = await registry.runNow('cli');

    expect(record.status).toBe('failed');
    expect(record.error).toBe('store offline');
    expect(record.report).toBeNull();
    expect(metrics.getStats()).toMatchObject({ failedRuns: 1, consecutiveFailures: 1, lastError: 'store offline' });
  });

  it('keeps a bounded history, most recent first', async () => {
    const registry = new IngestionRunRegistry(async (runId) => outcome(runId), { historyLimit: 2 });

    await registry.runNow('manual');
    const second = await registry.runNow('manual');
    const third = await registry.runNow('manual');

    expect(registry.list().map((record) => record.id)).toEqual([third.id, second.id]);
    expect(registry.list(1).map((record) => record.id)).toEqual([third.id]);
  });
});

describe('scheduledTick', () => {
  it('skips the tick while a run is in progress', async () => {
    const { gates, executor } = gatedExecutor();
    const registry = new IngestionRunRegistry(executor);

    expect(scheduledTick(registry)).toBe(true);
    expect(scheduledTick(registry)).toBe(false);
    expect(registry.list()).toHaveLength(1);
    expect(registry.list()[0].trigger).toBe('scheduled');

    gates[0]();
    expect(await registry.waitForIdle(1000, 5)).toBe(true);
  });
});

describe('MetricsTracker', () => {
  it('enters the critical state after three consecutive failures', () => {
    const metrics = new MetricsTracker();
    metrics.recordJobFailure('one');
    metrics.recordJobFailure('two');
    expect(metrics.isCriticalFailureState()).toBe(false);

    metrics.recordJobFailure('three');
    expect(metrics.isCriticalFailureState()).toBe(true);

    metrics.recordJobSuccess({ articlesFetched: 0, articlesNew: 0, duplicates: 0, feedErrors: 0, durationMs: 10 });
    expect(metrics.isCriticalFailureState()).toBe(false);
  });
});
