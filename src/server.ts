import { flushTraces } from './instrumentation'; // Must be first - loads .env and initializes LangFuse
import { closeAppContext, createAppContext, seedFeedsIfEmpty } from './app-context';
import { createApp } from './app';
import { loadConfig } from './config';
import { gracefulShutdown, startJobScheduler } from './jobs/scheduler';
import { debugLogger } from './utils/debug-logger';

async function main(): Promise<void> {
  const config = loadConfig();
  debugLogger.configure({ enabled: config.debug });

  const ctx = createAppContext(config);
  const seeded = await seedFeedsIfEmpty(ctx);
  if (seeded > 0) {
    console.log(`🌱 Seeded ${seeded} feeds`);
  }

  const app = createApp(ctx);
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`🚀 Server running on ${config.server.host}:${config.server.port}`);
    console.log(`📊 Health check: http://localhost:${config.server.port}/health`);
    console.log(`📈 Job status: http://localhost:${config.server.port}/api/job-status`);

    if (config.ingestion.schedulerEnabled) {
      startJobScheduler(ctx.registry, config.ingestion.cron, { runOnStart: true });
    }
  });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close();
    await gracefulShutdown(ctx.registry);
    await flushTraces();
    await closeAppContext(ctx);
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
