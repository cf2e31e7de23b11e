import type { LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';

export function buildLoggerOptions(config: Pick<AppConfig, 'nodeEnv' | 'logLevel'>): LoggerOptions {
  const isProd = config.nodeEnv === 'production';
  const quiet = config.logLevel === 'silent';

  return {
    level: config.logLevel,
    redact: ['req.headers.authorization'],
    transport:
      isProd || quiet
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              singleLine: true,
            },
          },
  };
}
