import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { FeedStore } from '../services/feedStore';

const CreatePostSchema = z.object({
  content: z.string().min(1),
});

export function createPostsRouter(store: FeedStore): Router {
  const router = Router();

  // ─── POST create post ───────────────────────────────────────────────────────
  router.post('/', (req: Request, res: Response) => {
    const parsed = CreatePostSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const post = store.addPost(parsed.data.content);
      res.status(201).json(post);
    } catch (err) {
      console.error('[Posts]', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
