import { describe, expect, it } from 'vitest';
import { FILE_RECORD_TTL_SECONDS, RedisFileRecordStore, type RecordRedis } from './fileRecordStore.js';

class MemoryRedis implements RecordRedis {
  readonly data = new Map<string, { value: string; ttl: number }>();
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    return this.data.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
    this.data.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.data.delete(key) ? 1 : 0;
  }

  async quit(): Promise<'OK'> {
    this.quitCalled = true;
    return 'OK';
  }
}

const record = {
  key: 'AgADBQADr6cxGw',
  fileName: 'The.Avengers.2012.720p.Hindi.English.mkv',
  sizeBytes: 1_400_000_000,
  mimeType: 'video/x-matroska',
  storageReference: 'telegram:BAACAgUAAxkBAAIB',
};

describe('RedisFileRecordStore', () => {
  it('stores records as JSON under a prefixed key with a one week expiry', async () => {
    const redis = new MemoryRedis();
    await new RedisFileRecordStore(redis).save(record);

    const stored = redis.data.get('mediapeek:file:AgADBQADr6cxGw');
    expect(stored?.ttl).toBe(FILE_RECORD_TTL_SECONDS);
    expect(stored?.ttl).toBe(604800);
    expect(JSON.parse(stored?.value ?? '')).toEqual(record);
  });

  it('reads back what it stored', async () => {
    const store = new RedisFileRecordStore(new MemoryRedis());
    await store.save(record);

    await expect(store.findByKey(record.key)).resolves.toEqual(record);
    await expect(store.findByKey('other')).resolves.toBeNull();
  });

  it('treats corrupt entries as missing', async () => {
    const redis = new MemoryRedis();
    const store = new RedisFileRecordStore(redis);
    await redis.set('mediapeek:file:broken', '{not json', 'EX', 10);
    await redis.set('mediapeek:file:partial', JSON.stringify({ key: 'partial' }), 'EX', 10);

    await expect(store.findByKey('broken')).resolves.toBeNull();
    await expect(store.findByKey('partial')).resolves.toBeNull();
  });

  it('deletes records and closes the connection', async () => {
    const redis = new MemoryRedis();
    const store = new RedisFileRecordStore(redis);
    await store.save(record);

    await store.delete(record.key);
    await store.close();

    expect(redis.data.size).toBe(0);
    expect(redis.quitCalled).toBe(true);
  });
});
