/**
 * Media info replies
 *
 * Callback data, keyboards and the text shown for a "Media Info" press.
 */

import { InlineKeyboard } from 'grammy';
import {
  renderExtractionFailed,
  renderMediaInfo,
  renderNotFound,
  type MediaInfoService,
} from '@mediapeek/media';
import type { Logger } from '@mediapeek/utils';

export const MEDIA_INFO_CALLBACK_PREFIX = 'mediainfo#';
export const CLOSE_MEDIA_INFO_CALLBACK = 'close_mediainfo';
export const MEDIA_INFO_CALLBACK_PATTERN = /^mediainfo#(.+)$/;

/** Reports stay up this long before they are removed */
export const SUCCESS_DELETE_DELAY_MS = 120_000;
export const FAILURE_DELETE_DELAY_MS = 30_000;

// Telegram rejects callback data over 64 bytes
const MAX_CALLBACK_DATA_BYTES = 64;

export function mediaInfoCallbackData(fileKey: string): string | null {
  const data = `${MEDIA_INFO_CALLBACK_PREFIX}${fileKey}`;
  return Buffer.byteLength(data, 'utf8') <= MAX_CALLBACK_DATA_BYTES ? data : null;
}

export function mediaInfoKeyboard(fileKey: string): InlineKeyboard | null {
  const data = mediaInfoCallbackData(fileKey);
  return data ? new InlineKeyboard().text('📋 Media Info', data) : null;
}

export function closeKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text('❌ Close Info', CLOSE_MEDIA_INFO_CALLBACK);
}

export interface MediaInfoReply {
  text: string;
  success: boolean;
  deleteAfterMs: number;
}

/**
 * Run the pipeline for a file key and render what the user should see.
 * Never rejects.
 */
export async function buildMediaInfoReply(
  service: Pick<MediaInfoService, 'getMediaInfo'>,
  fileKey: string,
  logger: Logger
): Promise<MediaInfoReply> {
  try {
    const result = await service.getMediaInfo(fileKey);
    if (!result.ok) {
      return { text: renderNotFound(fileKey), success: false, deleteAfterMs: FAILURE_DELETE_DELAY_MS };
    }
    const { record, info } = result.value;
    return {
      text: renderMediaInfo(info, record.fileName),
      success: true,
      deleteAfterMs: SUCCESS_DELETE_DELAY_MS,
    };
  } catch (error) {
    logger.error({ fileKey, err: error }, 'Media info extraction failed');
    return { text: renderExtractionFailed(fileKey), success: false, deleteAfterMs: FAILURE_DELETE_DELAY_MS };
  }
}
