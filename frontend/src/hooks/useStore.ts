import { useSyncExternalStore } from 'react';
import type { Store } from '../lib/store';

export const useStore = <M, E>(store: Store<M, E>): M =>
  useSyncExternalStore(store.subscribe, store.getModel);
