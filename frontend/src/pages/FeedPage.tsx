import type { Store } from '../lib/store';
import { useSocket } from '../hooks/useSocket';
import { useStore } from '../hooks/useStore';
import { ConnectionBanner } from '../components/ConnectionBanner';
import { FeedView } from '../components/FeedView';
import type { Model, Msg } from '../types';

interface FeedPageProps {
  store: Store<Model, Msg>;
}

export const FeedPage = ({ store }: FeedPageProps) => {
  const model = useStore(store);
  const { isConnected } = useSocket(store.dispatch);

  return (
    <>
      <ConnectionBanner isConnected={isConnected} />
      <div className="feed-page">
        <header className="feed-header">
          <h1>Live Feed Board</h1>
        </header>
        <FeedView model={model} dispatch={store.dispatch} />
      </div>
    </>
  );
};
