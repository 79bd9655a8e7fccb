import type { ColumnRecord, FeedName, FeedPayloads, PostRecord, TStatus, UserRecord } from '../schemas';

export type FeedPublisher = (feed: FeedName, payload: FeedPayloads[FeedName]) => void;

export interface FeedStoreOptions {
  /** Author name stamped on submitted posts (there is no login) */
  author: string;
  publish: FeedPublisher;
  now?: () => Date;
}

export interface FeedStore {
  snapshot: <F extends FeedName>(feed: F) => FeedPayloads[F];
  snapshots: () => [FeedName, FeedPayloads[FeedName]][];
  addPost: (content: string) => PostRecord;
  addColumn: (columnName: string) => ColumnRecord;
  setUserStatus: (rowId: number, status: TStatus) => UserRecord | null;
  publishAll: () => void;
}

/**
 * In-memory feed state. Lists are never mutated in place: every change
 * swaps in a new array and publishes the whole feed, so a snapshot handed
 * out earlier stays as it was.
 */
export function createFeedStore(seed: FeedPayloads, { author, publish, now = () => new Date() }: FeedStoreOptions): FeedStore {
  let feeds: FeedPayloads = { users: [...seed.users], posts: [...seed.posts], columns: [...seed.columns] };

  const snapshot = <F extends FeedName>(feed: F): FeedPayloads[F] => feeds[feed];

  const snapshots = (): [FeedName, FeedPayloads[FeedName]][] => [
    ['users', feeds.users],
    ['posts', feeds.posts],
    ['columns', feeds.columns],
  ];

  const addPost = (content: string): PostRecord => {
    const post: PostRecord = { author_name: author, content, date: now().toISOString() };
    feeds = { ...feeds, posts: [...feeds.posts, post] };
    publish('posts', feeds.posts);
    return post;
  };

  const addColumn = (columnName: string): ColumnRecord => {
    const column: ColumnRecord = { columnName, date: now().toISOString() };
    feeds = { ...feeds, columns: [...feeds.columns, column] };
    publish('columns', feeds.columns);
    return column;
  };

  const setUserStatus = (rowId: number, status: TStatus): UserRecord | null => {
    const existing = feeds.users.find((u) => u.rowid === rowId);
    if (!existing) return null;

    const updated: UserRecord = { ...existing, status };
    feeds = { ...feeds, users: feeds.users.map((u) => (u.rowid === rowId ? updated : u)) };
    publish('users', feeds.users);
    return updated;
  };

  const publishAll = () => {
    for (const [feed, payload] of snapshots()) publish(feed, payload);
  };

  return { snapshot, snapshots, addPost, addColumn, setUserStatus, publishAll };
}
