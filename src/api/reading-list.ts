import { Router } from 'express';
import type { AppContext } from '../app-context';
import { NotFoundError } from '../errors';
import { ReadingListAddSchema, ReadingListNotesSchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/reading-list
 */
export function createReadingListRouter(ctx: Pick<AppContext, 'store'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json({ items: await ctx.store.listReadingList() });
    })
  );

  // Adding an article already on the list is not an error
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { articleId, notes } = parseInput(ReadingListAddSchema, req.body ?? {});
      const { item, created } = await ctx.store.addToReadingList(articleId, notes);
      res.status(created ? 201 : 200).json(item);
    })
  );

  router.get(
    '/:articleId',
    asyncHandler(async (req, res) => {
      const item = await ctx.store.getReadingListItem(req.params.articleId);
      res.json({ articleId: req.params.articleId, inReadingList: item !== null, item });
    })
  );

  router.patch(
    '/:articleId',
    asyncHandler(async (req, res) => {
      const { notes } = parseInput(ReadingListNotesSchema, req.body ?? {});
      const item = await ctx.store.updateReadingListNotes(req.params.articleId, notes);
      if (!item) throw new NotFoundError(`Article ${req.params.articleId} is not in the reading list`);
      res.json(item);
    })
  );

  router.delete(
    '/:articleId',
    asyncHandler(async (req, res) => {
      if (!(await ctx.store.removeFromReadingList(req.params.articleId))) {
        throw new NotFoundError(`Article ${req.params.articleId} is not in the reading list`);
      }
      res.status(204).end();
    })
  );

  return router;
}
