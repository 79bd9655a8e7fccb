import { useEffect, useRef, useState } from 'react';
import { io } from 'socket.io-client';
import { API_URL } from '../config';
import { subscribeFeeds } from '../lib/feeds';
import type { FeedSource } from '../lib/feeds';
import type { Dispatch } from '../types';

/**
 * Opens the live feed connection and pipes the three feeds into `dispatch`.
 * The host pushes a full snapshot of each feed on connect and on every change.
 */
export const useSocket = (dispatch: Dispatch) => {
  const [isConnected, setIsConnected] = useState(false);

  // use a ref to always have the latest dispatch without re-connecting
  const dispatchRef = useRef(dispatch);
  dispatchRef.current = dispatch;

  useEffect(() => {
    const socket = io(API_URL, { transports: ['websocket'] });

    socket.on('connect', () => setIsConnected(true));
    socket.on('disconnect', () => setIsConnected(false));

    const source: FeedSource = {
      on: (feed, listener) => socket.on(feed, listener),
      off: (feed, listener) => socket.off(feed, listener),
    };
    const unsubscribe = subscribeFeeds(source, (msg) => dispatchRef.current(msg));

    // Sync initial connection state (socket may already be connected)
    if (socket.connected) setIsConnected(true);

    return () => {
      unsubscribe();
      socket.disconnect();
    };
  }, []);

  return { isConnected };
};
