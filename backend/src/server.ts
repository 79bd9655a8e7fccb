import { createServer } from 'http';
import { Server } from 'socket.io';
import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { loadSeed } from './seed';
import { createFeedStore } from './services/feedStore';
import { startFeedResyncScheduler } from './scheduler/feedResync';

dotenv.config();

const config = loadConfig();

const store = createFeedStore(loadSeed(), {
  author: config.POST_AUTHOR,
  publish: (feed, payload) => {
    io.emit(feed, payload);
  },
});

const app = createApp(store, config.FRONTEND_URL);
const httpServer = createServer(app);

const io = new Server(httpServer, {
  cors: {
    origin: config.FRONTEND_URL,
    methods: ['GET', 'POST', 'PATCH'],
  },
});

io.on('connection', (socket) => {
  console.log(`[Socket] connected: ${socket.id}`);
  // every feed is a full snapshot, so a fresh client is current immediately
  for (const [feed, payload] of store.snapshots()) socket.emit(feed, payload);

  socket.on('disconnect', () => {
    console.log(`[Socket] disconnected: ${socket.id}`);
  });
});

startFeedResyncScheduler(store, config.RESYNC_CRON);

httpServer.listen(config.PORT, () => {
  console.log(`[Server] running on http://localhost:${config.PORT}`);
});
