import type { FastifyInstance } from 'fastify';
import { isCompletionConfigured, type AppConfig } from '../config.js';

export type HealthResponse =
  | { status: 'healthy'; openai_configured: true }
  | { status: 'degraded'; openai_configured: false; message: string };

interface RegisterHealthRouteOptions {
  config: AppConfig;
}

export async function registerHealthRoute(app: FastifyInstance, options: RegisterHealthRouteOptions) {
  const { config } = options;

  // Reports readiness only; a missing key is not probed against the API and never fails the check.
  const health = async (): Promise<HealthResponse> =>
    isCompletionConfigured(config)
      ? { status: 'healthy', openai_configured: true }
      : { status: 'degraded', openai_configured: false, message: 'OpenAI API key not configured' };

  app.get('/health', health);
  app.get('/api/health', health);
}
