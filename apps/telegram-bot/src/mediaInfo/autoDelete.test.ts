import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '@mediapeek/utils';
import { scheduleDeletion } from './autoDelete.js';

const logger = createLogger({ test: 'auto-delete' });

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('scheduleDeletion', () => {
  it('deletes the message once the delay has passed', async () => {
    const api = { deleteMessage: vi.fn(async () => true as const) };

    scheduleDeletion(api, 42, 7, 120_000, logger);
    await vi.advanceTimersByTimeAsync(119_999);
    expect(api.deleteMessage).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(api.deleteMessage).toHaveBeenCalledWith(42, 7);
  });

  it('absorbs failures from messages that are already gone', async () => {
    const api = {
      deleteMessage: vi.fn(async (): Promise<true> => {
        throw new Error('message to delete not found');
      }),
    };

    scheduleDeletion(api, 42, 7, 30_000, logger);
    await vi.advanceTimersByTimeAsync(30_000);

    expect(api.deleteMessage).toHaveBeenCalledTimes(1);
  });

  it('can be cancelled', async () => {
    const api = { deleteMessage: vi.fn(async () => true as const) };

    clearTimeout(scheduleDeletion(api, 1, 2, 1000, logger));
    await vi.advanceTimersByTimeAsync(5000);

    expect(api.deleteMessage).not.toHaveBeenCalled();
  });
});
