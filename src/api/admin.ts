import { Router } from 'express';
import type { AppContext } from '../app-context';
import { CleanupFiltersSchema, DeleteArticlesBodySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/admin - bulk cleanup and store reconciliation
 */
export function createAdminRouter(ctx: Pick<AppContext, 'cleanup'>): Router {
  const router = Router();

  router.get(
    '/sources',
    asyncHandler(async (_req, res) => {
      res.json({ sources: await ctx.cleanup.listSources() });
    })
  );

  router.post(
    '/articles/preview',
    asyncHandler(async (req, res) => {
      const filters = parseInput(CleanupFiltersSchema, req.body ?? {});
      res.json(await ctx.cleanup.preview(filters));
    })
  );

  router.post(
    '/articles/delete',
    asyncHandler(async (req, res) => {
      const { beforeDate, sources, ...options } = parseInput(DeleteArticlesBodySchema, req.body ?? {});
      res.json(await ctx.cleanup.delete({ beforeDate, sources }, options));
    })
  );

  router.get(
    '/vectors/orphans',
    asyncHandler(async (_req, res) => {
      const articleIds = await ctx.cleanup.findOrphanedVectorRecords();
      res.json({ count: articleIds.length, articleIds });
    })
  );

  router.post(
    '/vectors/purge-orphans',
    asyncHandler(async (_req, res) => {
      res.json(await ctx.cleanup.purgeOrphanedVectorRecords());
    })
  );

  return router;
}
