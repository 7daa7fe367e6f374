import type { Request, Response } from 'express';
import type { AppContext } from '../app-context';

export function createHealthCheck(ctx: Pick<AppContext, 'store' | 'vectors'>) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      await ctx.store.ping();

      const [totalArticles, indexedArticles] = await Promise.all([ctx.store.countArticles(), ctx.vectors.count()]);
      const latest = await ctx.store.listArticles({ limit: 1, offset: 0 });

      res.json({
        status: 'healthy',
        database: 'connected',
        totalArticles,
        indexedArticles,
        latestArticle: latest.items[0]?.publishedAt?.toISOString() ?? null,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString(),
      });
    }
  };
}
