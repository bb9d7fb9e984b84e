/**
 * Telegram content source
 *
 * Resolves `telegram:<file_id>` references through the Bot API and reads the
 * head of the file from the file endpoint. A local Bot API server
 * (TELEGRAM_API_ROOT) hands back absolute paths on its own disk instead; those
 * are read directly.
 */

import { isAbsolute } from 'node:path';
import { GrammyError, type Api } from 'grammy';
import {
  HttpRangeSource,
  LocalFileSource,
  type ContentSource,
  type HttpRangeSourceOptions,
} from '@mediapeek/media';
import { createLogger, type Logger } from '@mediapeek/utils';

export const TELEGRAM_REFERENCE_PREFIX = 'telegram:';

/** Download limit of the hosted Bot API */
export const BOT_API_DOWNLOAD_LIMIT_BYTES = 20 * 1024 * 1024;

export function telegramReference(fileId: string): string {
  return `${TELEGRAM_REFERENCE_PREFIX}${fileId}`;
}

export function isFileTooBigError(error: unknown): error is GrammyError {
  return error instanceof GrammyError && /file is too big/i.test(error.description);
}

export interface TelegramFileSourceOptions extends HttpRangeSourceOptions {
  token: string;
  apiRoot?: string;
  logger?: Logger;
}

export class TelegramFileSource implements ContentSource {
  readonly name = 'telegram';
  private readonly http: HttpRangeSource;
  private readonly local = new LocalFileSource();
  private readonly token: string;
  private readonly apiRoot: string;
  private readonly logger: Logger;

  constructor(
    private readonly api: Pick<Api, 'getFile'>,
    options: TelegramFileSourceOptions
  ) {
    const { token, apiRoot, logger, ...httpOptions } = options;
    this.token = token;
    this.apiRoot = apiRoot ?? 'https://api.telegram.org';
    this.logger = logger ?? createLogger({ component: 'telegram-source' });
    this.http = new HttpRangeSource(httpOptions);
  }

  canHandle(reference: string): boolean {
    return reference.startsWith(TELEGRAM_REFERENCE_PREFIX)
      && reference.length > TELEGRAM_REFERENCE_PREFIX.length;
  }

  async readHead(reference: string, destination: string, maxBytes: number): Promise<number> {
    const fileId = reference.slice(TELEGRAM_REFERENCE_PREFIX.length);

    let filePath: string | undefined;
    try {
      filePath = (await this.api.getFile(fileId)).file_path;
    } catch (error) {
      if (isFileTooBigError(error)) {
        this.logger.info(
          { fileId, limitBytes: BOT_API_DOWNLOAD_LIMIT_BYTES, apiRoot: this.apiRoot },
          'File exceeds the Bot API download limit; point TELEGRAM_API_ROOT at a local Bot API server to probe it'
        );
        throw new Error('file is larger than the Bot API download limit', { cause: error });
      }
      throw error;
    }

    if (!filePath) {
      throw new Error('Telegram returned no file path');
    }

    if (isAbsolute(filePath)) {
      return this.local.readHead(filePath, destination, maxBytes);
    }

    const url = `${this.apiRoot}/file/bot${this.token}/${filePath}`;
    return this.http.readHead(url, destination, maxBytes);
  }
}
