import { Router } from 'express';
import type { AppContext } from '../app-context';
import { NotFoundError, errorMessage, type ConsistencyWarning } from '../errors';
import { ArticleListQuerySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/articles
 */
export function createArticlesRouter(ctx: Pick<AppContext, 'store' | 'vectors'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { limit, offset, source } = parseInput(ArticleListQuerySchema, req.query);
      const { items, total } = await ctx.store.listArticles({ limit, offset, source });
      res.json({ items, total, limit, offset });
    })
  );

  router.get(
    '/sources',
    asyncHandler(async (_req, res) => {
      res.json({ sources: await ctx.store.listSources() });
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const article = await ctx.store.getArticle(req.params.id);
      if (!article) {
        throw new NotFoundError(`Article ${req.params.id} not found`);
      }
      res.json(article);
    })
  );

  // Removes the article, its summaries and its vector record. The article
  // row is authoritative: once it is gone, a vector failure is a warning.
  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = req.params.id;
      if (!(await ctx.store.deleteArticle(id))) {
        throw new NotFoundError(`Article ${id} not found`);
      }

      try {
        await ctx.vectors.delete([id]);
      } catch (error) {
        const warning: ConsistencyWarning = {
          kind: 'orphaned-vector-records',
          count: 1,
          articleIds: [id],
          message: `Article was deleted but its vector record was not: ${errorMessage(error)}`,
        };
        console.warn(`⚠️  ${warning.message}`);
        res.json({ deleted: true, warnings: [warning] });
        return;
      }

      res.status(204).end();
    })
  );

  return router;
}
