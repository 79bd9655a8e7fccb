import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { FeedStore } from '../services/feedStore';

/**
 * Periodically re-broadcasts every feed so clients that missed a push
 * converge on the current snapshot.
 */
export function startFeedResyncScheduler(store: FeedStore, expression: string): ScheduledTask {
  const task = cron.schedule(expression, () => {
    try {
      store.publishAll();
    } catch (err) {
      console.error('[Scheduler] Error re-broadcasting feeds:', err);
    }
  });

  console.log(`[Scheduler] Feed resync scheduler started (${expression})`);
  return task;
}
