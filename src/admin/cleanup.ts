import type { ArticleStore, SelectedArticle } from '../db/store';
import { ValidationError, errorMessage, type ConsistencyWarning } from '../errors';
import type { CleanupFilters, CleanupPreview, DeletionReport, FiltersApplied } from '../types';
import { debugLogger } from '../utils/debug-logger';
import type { VectorStore } from '../vector/vector-store';

export interface DeleteOptions {
  deleteSummaries?: boolean;
  deleteFromVectorStore?: boolean;
  /** Required when no filter is given, since that matches every article */
  confirmAll?: boolean;
}

function matchesEverything(filters: CleanupFilters): boolean {
  return !filters.beforeDate && filters.sources === undefined;
}

function filtersApplied(filters: CleanupFilters): FiltersApplied {
  return {
    beforeDate: filters.beforeDate ? filters.beforeDate.toISOString() : null,
    sources: filters.sources ? [...filters.sources] : null,
  };
}

function breakdown(selected: readonly SelectedArticle[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const { source } of selected) {
    counts[source] = (counts[source] ?? 0) + 1;
  }
  return counts;
}

/**
 * Bulk deletion across both stores. The id set is selected once and drives
 * every later step; the relational store is authoritative, so a vector-side
 * failure after the relational commit is reported, not raised.
 */
export class CleanupCoordinator {
  constructor(
    private readonly store: ArticleStore,
    private readonly vectors: VectorStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  validateFilters(filters: CleanupFilters): void {
    if (filters.beforeDate) {
      if (isNaN(filters.beforeDate.getTime())) {
        throw new ValidationError('beforeDate is not a valid date');
      }
      if (filters.beforeDate.getTime() > this.now().getTime()) {
        throw new ValidationError('beforeDate cannot be in the future');
      }
    }
    if (filters.sources !== undefined) {
      const sources = filters.sources.map((source) => source.trim()).filter((source) => source.length > 0);
      if (sources.length === 0) {
        throw new ValidationError('sources must contain at least one source name when given');
      }
    }
  }

  private normalize(filters: CleanupFilters): CleanupFilters {
    return {
      beforeDate: filters.beforeDate,
      sources: filters.sources?.map((source) => source.trim()).filter((source) => source.length > 0),
    };
  }

  async preview(filters: CleanupFilters): Promise<CleanupPreview> {
    this.validateFilters(filters);
    const normalized = this.normalize(filters);
    const selected = await this.store.selectArticles(normalized);

    return {
      totalCount: selected.length,
      sourceBreakdown: breakdown(selected),
      filters: filtersApplied(normalized),
      matchesEverything: matchesEverything(normalized),
    };
  }

  async delete(filters: CleanupFilters, options: DeleteOptions = {}): Promise<DeletionReport> {
    const { deleteSummaries = true, deleteFromVectorStore = true, confirmAll = false } = options;

    this.validateFilters(filters);
    const normalized = this.normalize(filters);
    if (matchesEverything(normalized) && !confirmAll) {
      throw new ValidationError('No filters given: this would delete every article. Pass confirmAll to proceed.');
    }

    const stepId = debugLogger.stepStart('CLEANUP', 'Deleting articles', {
      ...filtersApplied(normalized),
      deleteSummaries,
      deleteFromVectorStore,
    });

    const selected = await this.store.selectArticles(normalized);
    const ids = selected.map((article) => article.id);

    const { deletedArticles, deletedSummaries } = await this.store.deleteArticles(ids, { deleteSummaries });

    const warnings: ConsistencyWarning[] = [];
    let deletedFromVectorStore = 0;
    if (deleteFromVectorStore && ids.length > 0) {
      try {
        deletedFromVectorStore = await this.vectors.delete(ids);
      } catch (error) {
        const warning: ConsistencyWarning = {
          kind: 'orphaned-vector-records',
          count: ids.length,
          articleIds: ids,
          message: `Articles were deleted but their vector records were not: ${errorMessage(error)}`,
        };
        warnings.push(warning);
        console.warn(`⚠️  ${warning.message} (${warning.count} orphaned records)`);
      }
    }

    const report: DeletionReport = {
      deletedCount: deletedArticles,
      deletedSummariesCount: deletedSummaries,
      deletedFromVectorStore,
      remainingArticles: await this.store.countArticles(),
      filtersApplied: filtersApplied(normalized),
      warnings,
    };

    debugLogger.stepFinish(stepId, {
      deleted: report.deletedCount,
      summaries: report.deletedSummariesCount,
      vectors: report.deletedFromVectorStore,
      warnings: warnings.length,
    });
    return report;
  }

  /**
   * Vector records whose article no longer exists
   */
  async findOrphanedVectorRecords(): Promise<string[]> {
    const vectorIds = await this.vectors.listIds();
    if (vectorIds.length === 0) return [];

    const existing = await this.store.existingArticleIds(vectorIds);
    return vectorIds.filter((id) => !existing.has(id));
  }

  async purgeOrphanedVectorRecords(): Promise<{ found: number; purged: number }> {
    const stepId = debugLogger.stepStart('RECONCILE', 'Purging orphaned vector records');
    const orphans = await this.findOrphanedVectorRecords();
    const purged = orphans.length > 0 ? await this.vectors.delete(orphans) : 0;
    debugLogger.stepFinish(stepId, { found: orphans.length, purged });
    return { found: orphans.length, purged };
  }

  async listSources(): Promise<string[]> {
    return this.store.listSources();
  }
}
