import { z } from 'zod';

export const StatusSchema = z.enum(['AVAILABLE', 'DISCONNECTED']);

export const UserRecordSchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  status: StatusSchema,
  rowid: z.number().int(),
});

export const PostRecordSchema = z.object({
  author_name: z.string(),
  content: z.string(),
  date: z.string(),
});

export const ColumnRecordSchema = z.object({
  columnName: z.string(),
  date: z.string(),
});

export const FeedPayloadsSchema = z.object({
  users: z
    .array(UserRecordSchema)
    .refine((users) => new Set(users.map((u) => u.rowid)).size === users.length, {
      message: 'Duplicate rowid in users',
    }),
  posts: z.array(PostRecordSchema),
  columns: z.array(ColumnRecordSchema),
});

export type TStatus = z.infer<typeof StatusSchema>;
export type UserRecord = z.infer<typeof UserRecordSchema>;
export type PostRecord = z.infer<typeof PostRecordSchema>;
export type ColumnRecord = z.infer<typeof ColumnRecordSchema>;
/** Full snapshot of every feed, in the wire shape the client decodes */
export type FeedPayloads = z.infer<typeof FeedPayloadsSchema>;
export type FeedName = keyof FeedPayloads;
