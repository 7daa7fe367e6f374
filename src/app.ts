import express, { type Express } from 'express';
import type { AppContext } from './app-context';
import { createAdminRouter } from './api/admin';
import { createAnalysisRouter } from './api/analysis';
import { createArticlesRouter } from './api/articles';
import { createFeedsRouter } from './api/feeds';
import { createHealthCheck } from './api/health';
import { createIngestionRouter } from './api/ingestion';
import { createJobStatusRouter } from './api/job-status';
import {
  createApiKeyAuth,
  createCorsMiddleware,
  createRateLimiter,
  errorHandler,
  requestLogger,
  securityHeaders,
} from './api/middleware';
import { createReadingListRouter } from './api/reading-list';
import { createResearchRouter } from './api/research';
import { createSearchRouter } from './api/search';
import { createSummariesRouter } from './api/summaries';
import { createTagsRouter } from './api/tags';

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { server } = ctx.config;

  // Trust only the first proxy so rate limiting sees the client address
  if (ctx.config.env === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '1mb' }));
  app.use(createCorsMiddleware(server.corsOrigins));
  app.use(requestLogger);

  const requireApiKey = createApiKeyAuth(server.apiKey);
  const rateLimiter = createRateLimiter(server.rateLimitPerMinute);

  app.get('/health', createHealthCheck(ctx));
  app.use('/api/job-status', createJobStatusRouter(ctx));

  app.use('/api/articles', createArticlesRouter(ctx));
  app.use('/api/search', rateLimiter, createSearchRouter(ctx));
  app.use('/api/summaries', rateLimiter, createSummariesRouter(ctx));
  app.use('/api/analysis', rateLimiter, createAnalysisRouter(ctx));
  app.use('/api/research', rateLimiter, createResearchRouter(ctx));
  app.use('/api/reading-list', createReadingListRouter(ctx));
  app.use('/api/tags', createTagsRouter(ctx));
  app.use('/api/feeds', requireApiKey, createFeedsRouter(ctx));
  app.use('/api/ingestion', requireApiKey, createIngestionRouter(ctx));
  app.use('/api/admin', requireApiKey, createAdminRouter(ctx));

  app.use(errorHandler);
  return app;
}
