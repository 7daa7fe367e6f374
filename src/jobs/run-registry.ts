/**
 * Ingestion runs executed on a bounded pool with a bounded queue. Keeps a
 * short history so background runs can be polled by id.
 */

import { randomUUID } from 'crypto';
import { ValidationError, errorMessage } from '../errors';
import type { IngestionReport } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { MetricsTracker } from './metrics-tracker';

export type RunTrigger = 'manual' | 'scheduled' | 'startup' | 'cli';

export type RunState = 'queued' | 'running' | 'completed' | 'failed';

export interface MaintenanceResult {
  indexed: number;
  indexFailed: number;
  orphansPurged: number;
}

export interface JobOutcome {
  report: IngestionReport;
  maintenance: MaintenanceResult | null;
}

export interface RunRecord {
  id: string;
  trigger: RunTrigger;
  status: RunState;
  submittedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  report: IngestionReport | null;
  maintenance: MaintenanceResult | null;
  error: string | null;
}

export type RunExecutor = (runId: string, trigger: RunTrigger) => Promise<JobOutcome>;

export interface RunRegistryOptions {
  maxConcurrentRuns?: number;
  maxQueuedRuns?: number;
  historyLimit?: number;
  metrics?: MetricsTracker;
}

interface QueuedRun {
  record: RunRecord;
  settle: (record: RunRecord) => void;
}

export class IngestionRunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly completions = new Map<string, Promise<RunRecord>>();
  private readonly queue: QueuedRun[] = [];
  private running = 0;

  private readonly maxConcurrentRuns: number;
  private readonly maxQueuedRuns: number;
  private readonly historyLimit: number;
  private readonly metrics: MetricsTracker;

  constructor(
    private readonly executor: RunExecutor,
    options: RunRegistryOptions = {}
  ) {
    this.maxConcurrentRuns = options.maxConcurrentRuns ?? 1;
    this.maxQueuedRuns = options.maxQueuedRuns ?? 5;
    this.historyLimit = options.historyLimit ?? 50;
    this.metrics = options.metrics ?? new MetricsTracker();
  }

  /**
   * Queue a run and return its record immediately
   */
  submit(trigger: RunTrigger): RunRecord {
    if (this.queue.length >= this.maxQueuedRuns) {
      throw new ValidationError(
        `Ingestion queue is full (${this.maxQueuedRuns} runs waiting); try again once the current run finishes`
      );
    }

    const record: RunRecord = {
      id: randomUUID(),
      trigger,
      status: 'queued',
      submittedAt: new Date(),
      startedAt: null,
      completedAt: null,
      report: null,
      maintenance: null,
      error: null,
    };

    const completion = new Promise<RunRecord>((resolve) => {
      this.queue.push({ record, settle: resolve });
    });

    this.runs.set(record.id, record);
    this.completions.set(record.id, completion);
    debugLogger.info('JOB', 'Ingestion run queued', { runId: record.id, trigger, queued: this.queue.length });

    this.pump();
    return { ...record };
  }

  /**
   * Queue a run through the same pool and wait for it to finish
   */
  async runNow(trigger: RunTrigger): Promise<RunRecord> {
    const { id } = this.submit(trigger);
    const completion = this.completions.get(id);
    if (!completion) {
      throw new Error(`Run ${id} lost before completion`);
    }
    return completion;
  }

  get(runId: string): RunRecord | null {
    const record = this.runs.get(runId);
    return record ? { ...record } : null;
  }

  /**
   * Most recent first
   */
  list(limit = this.historyLimit): RunRecord[] {
    return [...this.runs.values()]
      .reverse()
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  isBusy(): boolean {
    return this.running > 0 || this.queue.length > 0;
  }

  get activeRuns(): number {
    return this.running;
  }

  get queuedRuns(): number {
    return this.queue.length;
  }

  getMetrics(): MetricsTracker {
    return this.metrics;
  }

  /**
   * Resolves true once nothing is queued or running, false on timeout
   */
  async waitForIdle(timeoutMs: number, pollMs = 100): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.isBusy() && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, pollMs));
    }
    return !this.isBusy();
  }

  private pump(): void {
    while (this.running < this.maxConcurrentRuns && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.running++;
      this.execute(next)
        .catch((error) => {
          console.error('❌ Ingestion run bookkeeping failed:', error);
        })
        .finally(() => {
          this.running--;
          this.pump();
        });
    }
  }

  private async execute({ record, settle }: QueuedRun): Promise<void> {
    record.status = 'running';
    record.startedAt = new Date();
    this.metrics.recordJobStart();

    try {
      const outcome = await this.executor(record.id, record.trigger);
      record.status = 'completed';
      record.report = outcome.report;
      record.maintenance = outcome.maintenance;

      this.metrics.recordJobSuccess({
        articlesFetched: outcome.report.totals.fetched,
        articlesNew: outcome.report.totals.new,
        duplicates: outcome.report.totals.duplicate,
        feedErrors: Object.values(outcome.report.feeds).reduce((sum, feed) => sum + feed.errors.length, 0),
        durationMs: outcome.report.durationMs,
      });
    } catch (error) {
      record.status = 'failed';
      record.error = errorMessage(error);
      this.metrics.recordJobFailure(record.error);
      console.error(`❌ Ingestion run ${record.id} failed: ${record.error}`);

      if (this.metrics.isCriticalFailureState()) {
        console.error(`🚨 CRITICAL: ${this.metrics.getStats().consecutiveFailures} consecutive ingestion failures`);
      }
    } finally {
      record.completedAt = new Date();
      this.completions.delete(record.id);
      this.trimHistory();
      settle({ ...record });
    }
  }

  private trimHistory(): void {
    for (const [id, record] of this.runs) {
      if (this.runs.size <= this.historyLimit) break;
      if (record.status === 'completed' || record.status === 'failed') {
        this.runs.delete(id);
      }
    }
  }
}
