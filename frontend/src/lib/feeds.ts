import { decodeFeed } from './decoders';
import type { Dispatch, FeedName } from '../types';

export const FEED_NAMES: readonly FeedName[] = ['users', 'posts', 'columns'];

type FeedListener = (payload: unknown) => void;

/** Anything the host can push raw feed payloads through (a socket, an emitter). */
export interface FeedSource {
  on(feed: FeedName, listener: FeedListener): unknown;
  off(feed: FeedName, listener: FeedListener): unknown;
}

/**
 * Route every feed through its decoder into the event stream. Each feed
 * gets its own listener, so a bad payload on one never touches the others.
 * Returns a function that removes the listeners again.
 */
export function subscribeFeeds(source: FeedSource, dispatch: Dispatch): () => void {
  const listeners = FEED_NAMES.map((feed) => {
    const listener: FeedListener = (payload) => dispatch(decodeFeed(feed, payload));
    source.on(feed, listener);
    return [feed, listener] as const;
  });

  return () => {
    listeners.forEach(([feed, listener]) => source.off(feed, listener));
  };
}
