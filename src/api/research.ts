import { Router } from 'express';
import type { AppContext } from '../app-context';
import { ExecutePlanBodySchema, ResearchQueryBodySchema } from '../schemas';
import { asyncHandler, parseInput } from './middleware';

/**
 * /api/research
 */
export function createResearchRouter(ctx: Pick<AppContext, 'research'>): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { query } = parseInput(ResearchQueryBodySchema, req.body ?? {});
      res.json(await ctx.research.research(query));
    })
  );

  router.post(
    '/plan',
    asyncHandler(async (req, res) => {
      const { query } = parseInput(ResearchQueryBodySchema, req.body ?? {});
      res.json(await ctx.research.createPlan(query));
    })
  );

  // Runs a plan as given, e.g. one returned by /plan and edited by the caller
  router.post(
    '/execute-plan',
    asyncHandler(async (req, res) => {
      const body = parseInput(ExecutePlanBodySchema, req.body ?? {});
      const steps = body.steps.map((step, i) => ({ ...step, step: step.step ?? i + 1 }));
      const execution = await ctx.research.executePlan({ steps });

      if (!body.query) {
        res.json({ execution });
        return;
      }
      const synthesis = await ctx.research.synthesize(body.query, execution);
      res.json({ execution, ...synthesis });
    })
  );

  return router;
}
