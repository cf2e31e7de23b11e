import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import { readStaticAsset } from '../static/files.js';
import { sendError } from '../utils/errors.js';

interface RegisterStaticRoutesOptions {
  config: AppConfig;
}

export async function registerStaticRoutes(app: FastifyInstance, options: RegisterStaticRoutesOptions) {
  const { staticDir } = options.config;

  app.get('/', async (_request, reply) => {
    const asset = await readStaticAsset(staticDir, 'index.html');
    if (!asset) return sendError(reply, 404, 'static.not_found', 'Not found');
    return reply.type(asset.contentType).send(asset.body);
  });

  // Registered routes (/health, /api/...) are matched before this wildcard.
  app.get<{ Params: { '*': string } }>('/*', async (request, reply) => {
    const asset = await readStaticAsset(staticDir, request.params['*']);
    if (!asset) return sendError(reply, 404, 'static.not_found', 'Not found');
    return reply.type(asset.contentType).send(asset.body);
  });
}
