export interface Store<M, E> {
  getModel: () => M;
  dispatch: (event: E) => void;
  subscribe: (listener: () => void) => () => void;
}

interface StoreOptions<M, E, F> {
  init: M;
  update: (event: E, model: M) => [M, F[]];
  runEffect: (effect: F, dispatch: (event: E) => void) => Promise<void>;
  /** Called when an effect promise rejects; the loop keeps going either way */
  onEffectError?: (err: unknown) => void;
}

/**
 * The one event loop of the app. Events are applied strictly in arrival
 * order, each to completion; dispatches made while an event is being
 * handled wait in the queue behind it.
 */
export function createStore<M, E, F>({
  init,
  update,
  runEffect,
  onEffectError = (err) => console.error('[Store] Effect failed:', err),
}: StoreOptions<M, E, F>): Store<M, E> {
  let model = init;
  const listeners = new Set<() => void>();
  const queue: E[] = [];
  let draining = false;

  const dispatch = (event: E) => {
    queue.push(event);
    if (draining) return;
    draining = true;
    try {
      let next = queue.shift();
      while (next !== undefined) {
        const [nextModel, effects] = update(next, model);
        if (nextModel !== model) {
          model = nextModel;
          listeners.forEach((l) => l());
        }
        for (const effect of effects) {
          runEffect(effect, dispatch).catch(onEffectError);
        }
        next = queue.shift();
      }
    } finally {
      draining = false;
    }
  };

  return {
    getModel: () => model,
    dispatch,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
