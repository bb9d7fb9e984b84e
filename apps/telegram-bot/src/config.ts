/**
 * Telegram Bot Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { logger } from '@mediapeek/utils';

const monorepoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_API_ROOT: z.string().url().default('https://api.telegram.org'),

  // Redis
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),

  // Media info
  MEDIA_INFO_ENABLED: booleanFlag.default('true'),
  MEDIA_INFO_HEAD_BYTES: z.coerce.number().int().min(1024).default(2 * 1024 * 1024),
  MEDIA_INFO_CACHE_TTL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // ffprobe
  FFPROBE_PATH: z.string().optional(),
  FFPROBE_INSTALL_DIR: z.string().default('./bin'),
  FFPROBE_AUTO_INSTALL: booleanFlag.default('true'),
});

export type Env = z.infer<typeof envSchema>;

export function parseConfig(source: NodeJS.ProcessEnv) {
  const env = envSchema.parse(source);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    botToken: env.TELEGRAM_BOT_TOKEN,
    apiRoot: env.TELEGRAM_API_ROOT.replace(/\/+$/, ''),

    redis: {
      url: env.REDIS_URL,
    },

    mediaInfo: {
      enabled: env.MEDIA_INFO_ENABLED,
      headBytes: env.MEDIA_INFO_HEAD_BYTES,
      cacheTtlMs: env.MEDIA_INFO_CACHE_TTL_MS,
      probeTimeoutMs: env.PROBE_TIMEOUT_MS,
    },

    ffprobe: {
      path: env.FFPROBE_PATH?.trim() || undefined,
      installDir: resolvePath(env.FFPROBE_INSTALL_DIR),
      autoInstall: env.FFPROBE_AUTO_INSTALL,
    },
  } as const;
}

export type BotConfig = ReturnType<typeof parseConfig>;

/**
 * Load .env from the monorepo root and validate it; exits on bad config
 */
export function loadConfig(): BotConfig {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });

  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.fatal({ issues: error.format() }, 'Invalid environment configuration');
      process.exit(1);
    }
    throw error;
  }
}
