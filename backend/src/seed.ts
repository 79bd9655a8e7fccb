import { readFileSync } from 'fs';
import { FeedPayloadsSchema } from './schemas';
import type { FeedPayloads } from './schemas';

const DEFAULT_SEED = new URL('../data/seed.json', import.meta.url);

/** Initial feed contents for the in-memory store. Throws if the file is malformed. */
export function loadSeed(file: URL | string = DEFAULT_SEED): FeedPayloads {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return FeedPayloadsSchema.parse(raw);
}
