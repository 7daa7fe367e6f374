/**
 * Tracks metrics for ingestion runs
 */

export interface JobMetrics {
  articlesFetched: number;
  articlesNew: number;
  duplicates: number;
  feedErrors: number;
  durationMs: number;
}

export interface JobStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalArticlesFetched: number;
  totalArticlesNew: number;
  totalDuplicates: number;
}

export class MetricsTracker {
  private stats: JobStats = MetricsTracker.emptyStats();

  private static emptyStats(): JobStats {
    return {
      totalRuns: 0,
      successfulRuns: 0,
      failedRuns: 0,
      lastRunAt: null,
      lastSuccessAt: null,
      lastError: null,
      consecutiveFailures: 0,
      averageDurationMs: 0,
      totalArticlesFetched: 0,
      totalArticlesNew: 0,
      totalDuplicates: 0,
    };
  }

  recordJobStart(): void {
    this.stats.lastRunAt = new Date();
    this.stats.totalRuns++;
  }

  /**
   * A run that produced a report counts as a success, even when some feeds failed
   */
  recordJobSuccess(metrics: JobMetrics): void {
    this.stats.successfulRuns++;
    this.stats.consecutiveFailures = 0;
    this.stats.lastSuccessAt = new Date();
    this.stats.lastError = null;

    this.stats.totalArticlesFetched += metrics.articlesFetched;
    this.stats.totalArticlesNew += metrics.articlesNew;
    this.stats.totalDuplicates += metrics.duplicates;

    const totalDuration = this.stats.averageDurationMs * (this.stats.successfulRuns - 1);
    this.stats.averageDurationMs = Math.round((totalDuration + metrics.durationMs) / this.stats.successfulRuns);
  }

  recordJobFailure(error: string): void {
    this.stats.failedRuns++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = error;
  }

  getStats(): JobStats {
    return { ...this.stats };
  }

  /**
   * Critical after 3+ consecutive failures
   */
  isCriticalFailureState(): boolean {
    return this.stats.consecutiveFailures >= 3;
  }
}

// Singleton instance
export const metricsTracker = new MetricsTracker();
