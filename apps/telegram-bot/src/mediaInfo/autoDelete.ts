/**
 * Auto-delete
 *
 * Removes bot messages after a delay. Timers do not keep the process alive.
 */

import type { Api } from 'grammy';
import type { Logger } from '@mediapeek/utils';

export type MessageDeleter = Pick<Api, 'deleteMessage'>;

export function scheduleDeletion(
  api: MessageDeleter,
  chatId: number,
  messageId: number,
  delayMs: number,
  logger: Logger
): NodeJS.Timeout {
  const timer = setTimeout(() => {
    api.deleteMessage(chatId, messageId).catch((error: unknown) => {
      // Already deleted by the user or too old to delete
      logger.debug({ chatId, messageId, err: error }, 'Auto-delete failed');
    });
  }, delayMs);
  timer.unref();
  return timer;
}
