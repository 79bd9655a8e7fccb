import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { StatusSchema } from '../schemas';
import type { FeedStore } from '../services/feedStore';

const RowIdSchema = z.coerce.number().int();

const UpdateStatusSchema = z.object({
  status: StatusSchema,
});

export function createUsersRouter(store: FeedStore): Router {
  const router = Router();

  // ─── PATCH user presence ────────────────────────────────────────────────────
  router.patch('/:rowId/status', (req: Request, res: Response) => {
    const rowId = RowIdSchema.safeParse(req.params.rowId);
    const parsed = UpdateStatusSchema.safeParse(req.body);
    if (!rowId.success) {
      res.status(400).json({ error: rowId.error.flatten() });
      return;
    }
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const user = store.setUserStatus(rowId.data, parsed.data.status);
      if (!user) {
        res.status(404).json({ error: 'User not found' });
        return;
      }
      res.json(user);
    } catch (err) {
      console.error('[Users]', err);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
