import { Router } from 'express';
import type { AppContext } from '../app-context';
import { SummaryRequestSchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/summaries/:articleId
 */
export function createSummariesRouter(ctx: Pick<AppContext, 'summarizer'>): Router {
  const router = Router();

  router.get(
    '/:articleId',
    asyncHandler(async (req, res) => {
      res.json({ summaries: await ctx.summarizer.listSummaries(req.params.articleId) });
    })
  );

  // POST /:articleId { kind, force } - cached unless force is set
  router.post(
    '/:articleId',
    asyncHandler(async (req, res) => {
      const { kind, force } = parseInput(SummaryRequestSchema, req.body ?? {});
      const summary = await ctx.summarizer.getOrCreateSummary(req.params.articleId, kind, { force });
      res.status(summary.cached ? 200 : 201).json(summary);
    })
  );

  router.delete(
    '/:articleId',
    asyncHandler(async (req, res) => {
      const kind = typeof req.query.kind === 'string' ? req.query.kind : undefined;
      const deleted = await ctx.summarizer.purgeSummaries(req.params.articleId, kind);
      res.json({ deleted });
    })
  );

  return router;
}
