import { Router } from 'express';
import type { AppContext } from '../app-context';
import { KeywordQuerySchema, LimitQuerySchema, SearchQuerySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/search
 */
export function createSearchRouter(ctx: Pick<AppContext, 'retrieval'>): Router {
  const router = Router();

  // GET /?q=&limit=&useAi=&minSimilarity=
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { q, limit, useAi, minSimilarity } = parseInput(SearchQuerySchema, req.query);
      const results = await ctx.retrieval.search(q, { limit, useAi, minSimilarity });
      res.json({ query: q, count: results.length, results });
    })
  );

  router.get(
    '/keyword',
    asyncHandler(async (req, res) => {
      const { q, limit } = parseInput(KeywordQuerySchema, req.query);
      const results = await ctx.retrieval.keywordSearch(q, limit);
      res.json({ query: q, count: results.length, results });
    })
  );

  router.get(
    '/similar/:articleId',
    asyncHandler(async (req, res) => {
      const { limit } = parseInput(LimitQuerySchema, req.query);
      const results = await ctx.retrieval.similar(req.params.articleId, limit);
      res.json({ articleId: req.params.articleId, count: results.length, results });
    })
  );

  return router;
}
