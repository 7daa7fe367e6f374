import { Router } from 'express';
import type { AppContext } from '../app-context';
import { MultiAnalysisBodySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/analysis
 */
export function createAnalysisRouter(ctx: Pick<AppContext, 'summarizer'>): Router {
  const router = Router();

  router.post(
    '/multi',
    asyncHandler(async (req, res) => {
      const { articleIds, focus, force } = parseInput(MultiAnalysisBodySchema, req.body ?? {});
      res.json(await ctx.summarizer.getOrCreateMultiAnalysis(articleIds, focus, { force }));
    })
  );

  return router;
}
