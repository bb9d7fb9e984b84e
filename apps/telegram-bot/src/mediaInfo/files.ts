/**
 * Incoming files
 *
 * Turns a Telegram message carrying a file into the record the media info
 * pipeline reads later.
 */

import type { Message } from 'grammy/types';
import type { FileRecord } from '@mediapeek/core';
import { telegramReference } from './telegramSource.js';

export type FileMessage = Pick<Message, 'video' | 'audio' | 'document'>;

interface TelegramFile {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  file_size?: number;
  mime_type?: string;
}

function pickFile(message: FileMessage): { kind: string; file: TelegramFile } | null {
  if (message.video) return { kind: 'video', file: message.video };
  if (message.audio) return { kind: 'audio', file: message.audio };
  if (message.document) return { kind: 'document', file: message.document };
  return null;
}

/**
 * Build the record for a file message. The unique id doubles as the record
 * key; it is short enough for callback data and stable across forwards.
 */
export function toFileRecord(message: FileMessage): FileRecord | null {
  const picked = pickFile(message);
  if (!picked) {
    return null;
  }

  const { kind, file } = picked;
  return {
    key: file.file_unique_id,
    fileName: file.file_name?.trim() || `${kind}_${file.file_unique_id}`,
    sizeBytes: file.file_size ?? 0,
    mimeType: file.mime_type,
    storageReference: telegramReference(file.file_id),
  };
}
