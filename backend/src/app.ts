import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { createPostsRouter } from './routes/posts';
import { createColumnsRouter } from './routes/columns';
import { createUsersRouter } from './routes/users';
import type { FeedStore } from './services/feedStore';

export function createApp(store: FeedStore, frontendUrl: string): Express {
  const app = express();

  app.use(cors({ origin: frontendUrl }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use('/posts', createPostsRouter(store));
  app.use('/api/users', createUsersRouter(store));
  app.use(createColumnsRouter(store, frontendUrl));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}
