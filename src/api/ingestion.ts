import { Router } from 'express';
import type { AppContext } from '../app-context';
import { NotFoundError } from '../errors';
import { IngestionRunBodySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/ingestion
 */
export function createIngestionRouter(ctx: Pick<AppContext, 'registry' | 'coordinator'>): Router {
  const router = Router();

  // POST /run { wait?: boolean } - queue a run, or wait for its report
  router.post(
    '/run',
    asyncHandler(async (req, res) => {
      const { wait } = parseInput(IngestionRunBodySchema, req.body ?? {});
      if (wait) {
        res.json(await ctx.registry.runNow('manual'));
        return;
      }
      res.status(202).json(ctx.registry.submit('manual'));
    })
  );

  router.get('/runs', (_req, res) => {
    res.json({ runs: ctx.registry.list() });
  });

  router.get('/runs/:id', (req, res, next) => {
    const run = ctx.registry.get(req.params.id);
    if (!run) {
      next(new NotFoundError(`Ingestion run ${req.params.id} not found`));
      return;
    }
    res.json(run);
  });

  // POST /index-pending - embed articles that have no vector record yet
  router.post(
    '/index-pending',
    asyncHandler(async (_req, res) => {
      res.json(await ctx.coordinator.indexPending());
    })
  );

  return router;
}
