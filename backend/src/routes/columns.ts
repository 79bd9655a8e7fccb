import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { FeedStore } from '../services/feedStore';

const AddColumnSchema = z.object({
  columnName: z.string().trim().min(1),
});

/** Handles the plain HTML form on the board, so success is a redirect back. */
export function createColumnsRouter(store: FeedStore, redirectTo: string): Router {
  const router = Router();

  router.post('/add-column', (req: Request, res: Response) => {
    const parsed = AddColumnSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      store.addColumn(parsed.data.columnName);
      res.redirect(303, redirectTo);
    } catch (err) {
      console.error('[Columns]', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
