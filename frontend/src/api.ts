import axios from 'axios';
import { API_URL } from './config';

const api = axios.create({ baseURL: API_URL });

/** Response body is ignored; only settlement matters to the caller. */
export const submitPost = (content: string): Promise<void> =>
  api.post('/posts/', { content }).then(() => undefined);
