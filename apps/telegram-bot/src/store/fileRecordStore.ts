/**
 * File Record Store
 *
 * Keeps one record per file the bot has seen, so a later button press can
 * be resolved back to the file. Records expire after a week.
 */

import { Redis } from 'ioredis';
import { z } from 'zod';
import type { FileRecord, FileRecordSource } from '@mediapeek/core';
import { createLogger, type Logger } from '@mediapeek/utils';

export const FILE_RECORD_TTL_SECONDS = 7 * 24 * 60 * 60;

/** The subset of ioredis the store talks to */
export interface RecordRedis {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

const fileRecordSchema = z.object({
  key: z.string().min(1),
  fileName: z.string(),
  sizeBytes: z.number().nonnegative(),
  mimeType: z.string().optional(),
  storageReference: z.string().min(1),
});

export class RedisFileRecordStore implements FileRecordSource {
  private readonly keyPrefix = 'mediapeek:file:';
  private readonly logger: Logger;

  constructor(
    private readonly redis: RecordRedis,
    logger: Logger = createLogger({ component: 'file-records' })
  ) {
    this.logger = logger;
  }

  static connect(redisUrl: string): RedisFileRecordStore {
    return new RedisFileRecordStore(new Redis(redisUrl, { maxRetriesPerRequest: 3 }));
  }

  async save(record: FileRecord): Promise<void> {
    await this.redis.set(
      `${this.keyPrefix}${record.key}`,
      JSON.stringify(record),
      'EX',
      FILE_RECORD_TTL_SECONDS
    );
  }

  async findByKey(key: string): Promise<FileRecord | null> {
    const data = await this.redis.get(`${this.keyPrefix}${key}`);
    if (!data) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      this.logger.warn({ key }, 'Stored file record is not JSON');
      return null;
    }

    const parsed = fileRecordSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ key, issues: parsed.error.issues.length }, 'Stored file record is invalid');
      return null;
    }
    return parsed.data;
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(`${this.keyPrefix}${key}`);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
