import { Router } from 'express';
import type { AppContext } from '../app-context';
import { NotFoundError } from '../errors';
import { FeedCreateSchema, FeedTagsSchema, FeedUpdateSchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/feeds
 */
export function createFeedsRouter(ctx: Pick<AppContext, 'store'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const enabledOnly = req.query.enabled === 'true';
      res.json({ feeds: await ctx.store.listFeeds({ enabledOnly }) });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const input = parseInput(FeedCreateSchema, req.body ?? {});
      res.status(201).json(await ctx.store.createFeed(input));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const feed = await ctx.store.getFeed(req.params.id);
      if (!feed) throw new NotFoundError(`Feed ${req.params.id} not found`);
      res.json(feed);
    })
  );

  router.patch(
    '/:id',
    asyncHandler(async (req, res) => {
      const update = parseInput(FeedUpdateSchema, req.body ?? {});
      const feed = await ctx.store.updateFeed(req.params.id, update);
      if (!feed) throw new NotFoundError(`Feed ${req.params.id} not found`);
      res.json(feed);
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      if (!(await ctx.store.deleteFeed(req.params.id))) {
        throw new NotFoundError(`Feed ${req.params.id} not found`);
      }
      res.status(204).end();
    })
  );

  router.put(
    '/:id/tags',
    asyncHandler(async (req, res) => {
      const { tagIds } = parseInput(FeedTagsSchema, req.body ?? {});
      const feed = await ctx.store.setFeedTags(req.params.id, tagIds);
      if (!feed) throw new NotFoundError(`Feed ${req.params.id} not found`);
      res.json(feed);
    })
  );

  return router;
}
