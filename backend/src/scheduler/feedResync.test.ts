import { afterEach, describe, expect, it, vi } from 'vitest';
import cron from 'node-cron';
import { startFeedResyncScheduler } from './feedResync';
import { createFeedStore } from '../services/feedStore';
import type { FeedStore } from '../services/feedStore';

vi.mock('node-cron', () => ({
  default: { schedule: vi.fn(() => ({ stop: vi.fn() })) },
}));

const fakeStore = (publishAll: () => void): FeedStore => ({
  ...createFeedStore({ users: [], posts: [], columns: [] }, { author: 'Tester', publish: () => {} }),
  publishAll,
});

/** The callback handed to cron.schedule by the last start call. */
const lastTick = () => {
  const call = vi.mocked(cron.schedule).mock.lastCall;
  const tick = call?.[1];
  if (typeof tick !== 'function') throw new Error('no scheduled callback');
  return tick;
};

afterEach(() => {
  vi.restoreAllMocks();
  vi.mocked(cron.schedule).mockClear();
});

describe('startFeedResyncScheduler', () => {
  it('re-broadcasts every feed on each tick', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const publishAll = vi.fn();

    startFeedResyncScheduler(fakeStore(publishAll), '*/5 * * * * *');

    expect(cron.schedule).toHaveBeenCalledWith('*/5 * * * * *', expect.any(Function));
    lastTick()(new Date());
    expect(publishAll).toHaveBeenCalledTimes(1);
  });

  it('logs a failed broadcast instead of throwing', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('socket closed');

    startFeedResyncScheduler(
      fakeStore(() => {
        throw failure;
      }),
      '*/5 * * * * *',
    );

    expect(() => lastTick()(new Date())).not.toThrow();
    expect(errorSpy).toHaveBeenCalledWith('[Scheduler] Error re-broadcasting feeds:', failure);
  });
});
