import cron from 'node-cron';
import { z } from 'zod';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  POST_AUTHOR: z.string().min(1).default('Anonymous'),
  // node-cron takes an optional seconds field: every 30 seconds
  RESYNC_CRON: z
    .string()
    .default('*/30 * * * * *')
    .refine((expr) => cron.validate(expr), (expr) => ({ message: `Invalid cron expression "${expr}"` })),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Call after dotenv has populated process.env. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration – ${detail}`);
  }
  return parsed.data;
}
