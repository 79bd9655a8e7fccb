import { z } from 'zod';
import type { ZodError } from 'zod';
import type { Column, DecodeResult, FeedName, Msg, Post, TStatus, User } from '../types';

// ── Wire shapes ──────────────────────────────────────────────────────────────

export interface RawUser {
  first_name: string;
  last_name: string;
  status: TStatus;
  rowid: number;
}

export interface RawPost {
  author_name: string;
  content: string;
  date: string;
}

export interface RawColumn {
  columnName: string;
  date: string;
}

// Case-sensitive: 'available' is not a status.
const StatusSchema = z.string().refine(
  (s): s is TStatus => s === 'AVAILABLE' || s === 'DISCONNECTED',
  (s) => ({ message: `Unknown user status "${s}"` }),
);

const UserSchema = z
  .object({
    first_name: z.string(),
    last_name: z.string(),
    status: StatusSchema,
    rowid: z.number().int(),
  })
  .transform((raw): User => ({
    firstName: raw.first_name,
    lastName: raw.last_name,
    status: raw.status,
    rowId: raw.rowid,
  }));

const PostSchema = z
  .object({
    author_name: z.string(),
    content: z.string(),
    date: z.string(),
  })
  .transform((raw): Post => ({ authorName: raw.author_name, content: raw.content, date: raw.date }));

const ColumnSchema = z
  .object({
    columnName: z.string(),
    date: z.string(),
  })
  .transform((raw): Column => ({ name: raw.columnName, date: raw.date }));

// ── Error formatting ─────────────────────────────────────────────────────────

const formatPath = (feed: FeedName, path: (string | number)[]): string =>
  path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    feed,
  );

/** One `<feed><path>: <reason>` entry per issue, e.g. `users[0].first_name: Required`. */
export const formatDecodeIssues = (feed: FeedName, error: ZodError): string =>
  error.issues.map((issue) => `${formatPath(feed, issue.path)}: ${issue.message}`).join('; ');

// A list is accepted only when every element decodes.
const decodeList = <T>(feed: FeedName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): DecodeResult<T[]> => {
  const parsed = z.array(schema).safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: { feed, message: formatDecodeIssues(feed, parsed.error) } };
  }
  return { success: true, data: parsed.data };
};

// ── Public API ───────────────────────────────────────────────────────────────

const findDuplicateRowId = (users: User[]): number | undefined => {
  const seen = new Set<number>();
  for (const user of users) {
    if (seen.has(user.rowId)) return user.rowId;
    seen.add(user.rowId);
  }
  return undefined;
};

/** Also rejects a snapshot in which two users share a rowid. */
export const decodeUsers = (raw: unknown): DecodeResult<User[]> => {
  const result = decodeList('users', UserSchema, raw);
  if (!result.success) return result;

  const duplicate = findDuplicateRowId(result.data);
  if (duplicate !== undefined) {
    return { success: false, error: { feed: 'users', message: `users: Duplicate rowid ${duplicate}` } };
  }
  return result;
};

export const decodePosts = (raw: unknown): DecodeResult<Post[]> => decodeList('posts', PostSchema, raw);

export const decodeColumns = (raw: unknown): DecodeResult<Column[]> => decodeList('columns', ColumnSchema, raw);

/** Decode a payload from the named feed straight into the event it produces. */
export const decodeFeed = (feed: FeedName, raw: unknown): Msg => {
  switch (feed) {
    case 'users': {
      const result = decodeUsers(raw);
      return result.success ? { type: 'USERS_RECEIVED', users: result.data } : { type: 'DECODE_FAILED', error: result.error };
    }
    case 'posts': {
      const result = decodePosts(raw);
      return result.success ? { type: 'POSTS_RECEIVED', posts: result.data } : { type: 'DECODE_FAILED', error: result.error };
    }
    case 'columns': {
      const result = decodeColumns(raw);
      return result.success
        ? { type: 'COLUMNS_RECEIVED', columns: result.data }
        : { type: 'DECODE_FAILED', error: result.error };
    }
  }
};

export const encodeUser = (user: User): RawUser => ({
  first_name: user.firstName,
  last_name: user.lastName,
  status: user.status,
  rowid: user.rowId,
});

export const encodePost = (post: Post): RawPost => ({
  author_name: post.authorName,
  content: post.content,
  date: post.date,
});

export const encodeColumn = (column: Column): RawColumn => ({ columnName: column.name, date: column.date });
