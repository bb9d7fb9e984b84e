/**
 * Telegram Bot Commands
 *
 * Command handlers and the media info button flow.
 */

import type { Bot } from 'grammy';
import { formatPlatformKey } from '@mediapeek/core';
import { escapeHtml, isMediaFile, type FFprobeProvisioner, type MediaInfoService } from '@mediapeek/media';
import { formatBytes, type Logger } from '@mediapeek/utils';
import { scheduleDeletion } from '../mediaInfo/autoDelete.js';
import { toFileRecord } from '../mediaInfo/files.js';
import {
  CLOSE_MEDIA_INFO_CALLBACK,
  MEDIA_INFO_CALLBACK_PATTERN,
  buildMediaInfoReply,
  closeKeyboard,
  mediaInfoKeyboard,
} from '../mediaInfo/reply.js';
import type { RedisFileRecordStore } from '../store/fileRecordStore.js';

export interface CommandDeps {
  service: MediaInfoService;
  provisioner: FFprobeProvisioner;
  records: Pick<RedisFileRecordStore, 'save'>;
  mediaInfoEnabled: boolean;
  logger: Logger;
}

const HELP_TEXT =
  `<b>mediapeek</b>\n\n` +
  `Send or forward a video, audio file or document and press ` +
  `<b>📋 Media Info</b> to see its container, duration, codecs, ` +
  `audio and subtitle tracks and chapters.\n\n` +
  `<b>Commands</b>\n` +
  `/start - Welcome message\n` +
  `/help - This help\n` +
  `/ffprobe - Show ffprobe status`;

export function registerCommands(bot: Bot, deps: CommandDeps): void {
  const { service, provisioner, records, mediaInfoEnabled, logger } = deps;

  // /start - Welcome message
  bot.command('start', async (ctx) => {
    await ctx.reply(
      `👋 <b>Welcome!</b>\n\nSend me a media file and I will tell you what is inside it.\n\n/help - Show all commands`,
      { parse_mode: 'HTML' }
    );
  });

  // /help - Command list
  bot.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
  });

  // /ffprobe - Provisioning status
  bot.command('ffprobe', async (ctx) => {
    const state = await provisioner.ensure();
    const command = provisioner.commandPath();
    const lines = [
      `🔧 <b>ffprobe:</b> ${state}`,
      `🖥 <b>Platform:</b> ${formatPlatformKey(provisioner.getPlatform())}`,
      command
        ? `📍 <b>Command:</b> <code>${escapeHtml(command)}</code>`
        : `ℹ️ <i>Media info falls back to file name heuristics.</i>`,
      `📋 <b>Media info:</b> ${mediaInfoEnabled ? 'enabled' : 'disabled'}`,
    ];
    await ctx.reply(lines.join('\n'), { parse_mode: 'HTML' });
  });

  // Incoming files: remember them and offer the button
  bot.on(['message:video', 'message:audio', 'message:document'], async (ctx) => {
    const record = toFileRecord(ctx.message);
    if (!record) {
      return;
    }

    await records.save(record);
    logger.debug({ key: record.key, fileName: record.fileName }, 'File record stored');

    if (!mediaInfoEnabled || !isMediaFile(record.fileName, record.mimeType)) {
      return;
    }

    const keyboard = mediaInfoKeyboard(record.key);
    if (!keyboard) {
      logger.warn({ key: record.key }, 'File key too long for callback data');
      return;
    }

    await ctx.reply(
      `📁 <code>${escapeHtml(record.fileName)}</code>\n📏 ${formatBytes(record.sizeBytes)}`,
      {
        parse_mode: 'HTML',
        reply_markup: keyboard,
        reply_parameters: { message_id: ctx.message.message_id },
      }
    );
  });

  // Media info button
  bot.callbackQuery(MEDIA_INFO_CALLBACK_PATTERN, async (ctx) => {
    if (!mediaInfoEnabled) {
      await ctx.answerCallbackQuery({ text: 'Media info is disabled.' });
      return;
    }

    const fileKey = ctx.match[1] ?? '';
    await ctx.answerCallbackQuery({ text: 'Extracting media info...' });

    const chatId = ctx.chat?.id;
    if (chatId === undefined) {
      return;
    }

    const processing = await ctx.reply('🔍 Extracting media information...');
    const reply = await buildMediaInfoReply(service, fileKey, logger);

    await ctx.api.editMessageText(chatId, processing.message_id, reply.text, {
      parse_mode: 'HTML',
      reply_markup: closeKeyboard(),
    });
    scheduleDeletion(ctx.api, chatId, processing.message_id, reply.deleteAfterMs, logger);
  });

  // Close button
  bot.callbackQuery(CLOSE_MEDIA_INFO_CALLBACK, async (ctx) => {
    await ctx.answerCallbackQuery();
    try {
      await ctx.deleteMessage();
    } catch (error) {
      logger.debug({ err: error }, 'Media info message already gone');
    }
  });
}
