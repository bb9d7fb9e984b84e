import { describe, expect, it, vi } from 'vitest';
import { NotFoundError, ok, err } from '@mediapeek/core';
import { inferMediaInfo, type MediaInfoResult } from '@mediapeek/media';
import { createLogger } from '@mediapeek/utils';
import {
  FAILURE_DELETE_DELAY_MS,
  SUCCESS_DELETE_DELAY_MS,
  buildMediaInfoReply,
  closeKeyboard,
  mediaInfoCallbackData,
  mediaInfoKeyboard,
  MEDIA_INFO_CALLBACK_PATTERN,
} from './reply.js';

const logger = createLogger({ test: 'reply' });

function serviceReturning(result: Promise<MediaInfoResult>) {
  return { getMediaInfo: vi.fn(() => result) };
}

describe('callback data', () => {
  it('round-trips a file key through the callback pattern', () => {
    const data = mediaInfoCallbackData('AgADBQADr6cxGw');

    expect(data).toBe('mediainfo#AgADBQADr6cxGw');
    expect(data?.match(MEDIA_INFO_CALLBACK_PATTERN)?.[1]).toBe('AgADBQADr6cxGw');
  });

  it('refuses keys that would exceed the callback data limit', () => {
    expect(mediaInfoCallbackData('k'.repeat(54))).toBe(`mediainfo#${'k'.repeat(54)}`);
    expect(mediaInfoCallbackData('k'.repeat(55))).toBeNull();
    expect(mediaInfoKeyboard('k'.repeat(55))).toBeNull();
  });

  it('builds the two buttons', () => {
    expect(mediaInfoKeyboard('abc')?.inline_keyboard).toEqual([
      [{ text: '📋 Media Info', callback_data: 'mediainfo#abc' }],
    ]);
    expect(closeKeyboard().inline_keyboard).toEqual([
      [{ text: '❌ Close Info', callback_data: 'close_mediainfo' }],
    ]);
  });
});

describe('buildMediaInfoReply', () => {
  it('renders the report and keeps it for two minutes', async () => {
    const record = {
      key: 'abc',
      fileName: 'The.Avengers.2012.720p.Hindi.English.mkv',
      sizeBytes: 1024,
      storageReference: 'telegram:xyz',
    };
    const info = inferMediaInfo(record);
    const service = serviceReturning(Promise.resolve(ok({ record, info })));

    const reply = await buildMediaInfoReply(service, 'abc', logger);

    expect(service.getMediaInfo).toHaveBeenCalledWith('abc');
    expect(reply.success).toBe(true);
    expect(reply.deleteAfterMs).toBe(SUCCESS_DELETE_DELAY_MS);
    expect(reply.text.split('\n')).toContain(
      '📁 <b>File:</b> <code>The.Avengers.2012.720p.Hindi.English.mkv</code>'
    );
  });

  it('reports a missing file', async () => {
    const service = serviceReturning(Promise.resolve(err(new NotFoundError('File', 'gone'))));

    const reply = await buildMediaInfoReply(service, 'gone', logger);

    expect(reply).toEqual({
      text: '❌ <b>File not found</b>\n\nNo file is stored under <code>gone</code>. It may have expired.',
      success: false,
      deleteAfterMs: FAILURE_DELETE_DELAY_MS,
    });
  });

  it('reports an extraction failure when the pipeline rejects', async () => {
    const service = serviceReturning(Promise.reject(new Error('redis down')));

    const reply = await buildMediaInfoReply(service, 'abc', logger);

    expect(reply.success).toBe(false);
    expect(reply.deleteAfterMs).toBe(30_000);
    expect(reply.text.split('\n')[0]).toBe('❌ <b>Could not extract media information</b>');
  });
});
