import { config as loadEnv } from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Unset and blank variables both fall through to the schema default.
function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

const ConfigSchema = z.object({
  nodeEnv: fromEnv(z.string().default('development')),
  port: fromEnv(z.coerce.number().int().positive().max(65535).default(5000)),
  host: fromEnv(z.string().default('0.0.0.0')),
  logLevel: fromEnv(z.enum(LOG_LEVELS).default('info')),
  // Optional on purpose: without a key the service runs degraded and reports it on /health.
  openAiApiKey: fromEnv(z.string().optional()),
  llmModel: fromEnv(z.string().default('gpt-3.5-turbo')),
  staticDir: fromEnv(z.string().default(path.resolve('static'))),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = ConfigSchema.parse({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    openAiApiKey: env.OPENAI_API_KEY,
    llmModel: env.LLM_MODEL,
    staticDir: env.STATIC_DIR,
  });
  return Object.freeze({ ...parsed, staticDir: path.resolve(parsed.staticDir) });
}

/** Reads `.env` (when present) into the process environment, then validates it. */
export function readConfigFromEnvironment(): AppConfig {
  loadEnv();
  return loadConfig(process.env);
}

export function isCompletionConfigured(config: AppConfig): boolean {
  return typeof config.openAiApiKey === 'string' && config.openAiApiKey.length > 0;
}
