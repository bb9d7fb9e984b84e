/**
 * Telegram Bot Entry Point
 *
 * Stores every file it sees and answers "Media Info" presses with the
 * extracted container and stream details.
 */

import { Bot, GrammyError, HttpError } from 'grammy';
import {
  FFprobeProvisioner,
  MediaInfoService,
  PartialContentFetcher,
  TtlCache,
  type MediaInfoResult,
} from '@mediapeek/media';
import { createRootLogger } from '@mediapeek/utils';
import { loadConfig } from './config.js';
import { registerCommands } from './commands/index.js';
import { TelegramFileSource } from './mediaInfo/telegramSource.js';
import { RedisFileRecordStore } from './store/fileRecordStore.js';

const logger = createRootLogger({ app: 'telegram-bot' });

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  logger.info('Starting Telegram bot...');

  const bot = new Bot(config.botToken, {
    client: { apiRoot: config.apiRoot },
  });

  const records = RedisFileRecordStore.connect(config.redis.url);

  const provisioner = new FFprobeProvisioner({
    overridePath: config.ffprobe.path,
    installDir: config.ffprobe.installDir,
    autoInstall: config.ffprobe.autoInstall,
    logger: logger.child({ component: 'ffprobe-provisioner' }),
  });

  const fetcher = new PartialContentFetcher({
    maxBytes: config.mediaInfo.headBytes,
    logger: logger.child({ component: 'partial-fetcher' }),
  });
  fetcher.register(new TelegramFileSource(bot.api, {
    token: config.botToken,
    apiRoot: config.apiRoot,
    logger: logger.child({ component: 'telegram-source' }),
  }));

  const service = new MediaInfoService({
    records,
    provisioner,
    fetcher,
    cache: new TtlCache<MediaInfoResult>({ ttlMs: config.mediaInfo.cacheTtlMs }),
    headBytes: config.mediaInfo.headBytes,
    probeTimeoutMs: config.mediaInfo.probeTimeoutMs,
    logger: logger.child({ component: 'media-info' }),
  });

  registerCommands(bot, {
    service,
    provisioner,
    records,
    mediaInfoEnabled: config.mediaInfo.enabled,
    logger,
  });

  // Error handling
  bot.catch((err) => {
    const ctx = err.ctx;
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e, updateId: ctx.update.update_id }, 'Unknown error');
    }
  });

  // Provision in the background; requests before it finishes use heuristics
  if (config.mediaInfo.enabled) {
    void provisioner.ensure().then((state) => {
      logger.info({ state, command: provisioner.commandPath() }, 'ffprobe provisioning finished');
    });
  }

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down bot...');
      bot.stop()
        .then(() => records.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        username: botInfo.username,
        mediaInfoEnabled: config.mediaInfo.enabled,
      }, 'Bot started');
    },
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
