/**
 * Logger
 *
 * Pino structured logging shared by the packages and apps. The root logger
 * is named after the project; apps and components add their own context as
 * child bindings.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export interface RootLoggerOptions {
  /** Running application, e.g. "telegram-bot" or "cli" */
  app?: string;
  level?: string;
  env?: string;
}

export function createRootLogger(options: RootLoggerOptions = {}): Logger {
  const env = options.env ?? process.env['NODE_ENV'] ?? 'development';
  const level = env === 'test' ? 'silent' : options.level ?? process.env['LOG_LEVEL'] ?? 'info';

  return pino({
    name: 'mediapeek',
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: options.app ? { app: options.app, env, pid: process.pid } : { env, pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Bot tokens end up in Telegram file URLs
    redact: { paths: ['token', '*.token', 'botToken'], censor: '[redacted]' },
    transport: env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,env',
      },
    } : undefined,
  });
}

export const logger = createRootLogger();

/**
 * Child of the shared root logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
