import type { Dispatch, Model } from '../types';
import { UserList } from './UserList';
import { PostForm } from './PostForm';
import { PostList } from './PostList';
import { ColumnForm } from './ColumnForm';
import { ColumnList } from './ColumnList';

interface FeedViewProps {
  model: Model;
  dispatch: Dispatch;
}

/** Whole page as a function of the model; holds no state of its own. */
export const FeedView = ({ model, dispatch }: FeedViewProps) => (
  <div className="feed-view">
    <UserList users={model.users} />
    <div className="feed-view__main">
      <PostForm draftPost={model.draftPost} dispatch={dispatch} />
      <PostList posts={model.posts} />
    </div>
    <div className="feed-view__side">
      <ColumnForm />
      <ColumnList columns={model.columns} />
    </div>
  </div>
);
