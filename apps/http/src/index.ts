// apps/http/src/index.ts
import { EventTracer, LoggingEventHandler, RecordingEventHandler, createLogger } from '@kgq/core';
import { KnowledgeGraphQueryEngine } from '@kgq/engine';
import { loadConfig } from './config';
import { buildServer } from './server';
import { createBackend, createCompletionModel } from './wiring';

async function main() {
  const config = loadConfig();

  const recorder = new RecordingEventHandler();
  const tracer = new EventTracer({ handlers: [recorder, new LoggingEventHandler(createLogger('trace'))] });

  const backend = await createBackend(config);
  const llm = createCompletionModel(config, tracer);
  const engine = new KnowledgeGraphQueryEngine({
    backend,
    llm,
    tracer,
    refreshSchema: config.REFRESH_SCHEMA,
    verbose: config.VERBOSE,
  });

  const app = await buildServer({
    engine,
    backend,
    recorder,
    corsOrigin: config.CORS_ORIGIN,
    rateLimitMax: config.RATE_LIMIT_MAX,
    logger: { level: config.LOG_LEVEL },
  });

  app.log.info(
    {
      backend: config.GRAPH_BACKEND,
      llm: llm.name,
      refreshSchema: config.REFRESH_SCHEMA,
      verbose: config.VERBOSE,
    },
    'backend-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([backend.close?.(), app.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
