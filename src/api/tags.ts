import { Router } from 'express';
import type { AppContext } from '../app-context';
import { NotFoundError } from '../errors';
import { TagCreateSchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/tags
 */
export function createTagsRouter(ctx: Pick<AppContext, 'store'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json({ tags: await ctx.store.listTags() });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { name, color } = parseInput(TagCreateSchema, req.body ?? {});
      res.status(201).json(await ctx.store.createTag(name, color ?? null));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      if (!(await ctx.store.deleteTag(req.params.id))) {
        throw new NotFoundError(`Tag ${req.params.id} not found`);
      }
      res.status(204).end();
    })
  );

  return router;
}
