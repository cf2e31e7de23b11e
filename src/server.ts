import { pino } from 'pino';
import { buildApp } from './app.js';
import { isCompletionConfigured, readConfigFromEnvironment } from './config.js';

async function bootstrap() {
  const config = readConfigFromEnvironment();
  const app = await buildApp({ config });

  if (!isCompletionConfigured(config)) {
    app.log.warn('OPENAI_API_KEY is not set; completion endpoints will answer 500 until it is configured');
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Failed to close server');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info({ port: config.port, model: config.llmModel }, 'assistant api listening');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  // Configuration errors surface here, before the app logger exists.
  pino().fatal({ err: error }, 'Failed to bootstrap');
  process.exit(1);
});
