import type { Store } from './lib/store';
import { FeedPage } from './pages/FeedPage';
import type { Model, Msg } from './types';
import './App.css';

export default function App({ store }: { store: Store<Model, Msg> }) {
  return <FeedPage store={store} />;
}
