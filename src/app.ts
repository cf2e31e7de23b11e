import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import { buildLoggerOptions } from './logger.js';
import { registerAssistantRoutes } from './routes/assistant.js';
import { registerHealthRoute } from './routes/health.js';
import { registerStaticRoutes } from './routes/static.js';
import { createCompletionClient, type CompletionClient } from './services/completionClient.js';
import { AppError, sendAppError, sendError } from './utils/errors.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Overrides the OpenAI-backed client; `null` behaves as if no credential were set. */
  completionClient?: CompletionClient | null;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const completionClient =
    options.completionClient !== undefined ? options.completionClient : createCompletionClient(config);

  const app = Fastify({ logger: buildLoggerOptions(config) });
  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['x-request-id'],
  });

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  app.setErrorHandler(async (error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      return sendAppError(reply, error);
    }
    // Fastify's own 4xx errors, e.g. an unparseable JSON body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return sendError(reply, error.statusCode, 'request.invalid', error.message);
    }
    request.log.error({ err: error }, 'Unhandled error while processing request');
    return sendError(reply, 500, 'internal', 'Internal server error');
  });

  app.setNotFoundHandler(async (_request, reply) => sendError(reply, 404, 'route.not_found', 'Not found'));

  await registerHealthRoute(app, { config });
  await registerAssistantRoutes(app, { config, completionClient });
  await registerStaticRoutes(app, { config });

  return app;
}
