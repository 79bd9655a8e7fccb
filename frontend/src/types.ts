export type TStatus = 'AVAILABLE' | 'DISCONNECTED';

export type FeedName = 'users' | 'posts' | 'columns';

export interface User {
  firstName: string;
  lastName: string;
  status: TStatus;
  /** Unique within one users snapshot */
  rowId: number;
}

export interface Post {
  authorName: string;
  content: string;
  date: string;
}

export interface Column {
  name: string;
  date: string;
}

export interface Model {
  users: User[];
  posts: Post[];
  columns: Column[];
  /** The only field changed by local interaction */
  draftPost: string;
}

export interface DecodeError {
  feed: FeedName;
  message: string;
}

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: DecodeError };

export type SubmitResult = { ok: true } | { ok: false; error: string };

// ── Events ───────────────────────────────────────────────────────────────────

export type Msg =
  | { type: 'USERS_RECEIVED'; users: User[] }
  | { type: 'POSTS_RECEIVED'; posts: Post[] }
  | { type: 'COLUMNS_RECEIVED'; columns: Column[] }
  | { type: 'DRAFT_CHANGED'; text: string }
  | { type: 'SUBMIT_REQUESTED' }
  | { type: 'DECODE_FAILED'; error: DecodeError }
  | { type: 'SUBMIT_COMPLETED'; result: SubmitResult };

// ── Effects ──────────────────────────────────────────────────────────────────

export type Effect =
  | { type: 'SEND_POST'; content: string }
  | { type: 'LOG_ERROR'; message: string };

export type Dispatch = (msg: Msg) => void;
