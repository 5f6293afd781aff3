import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import { Server } from 'socket.io';
import cors from 'cors';
import type { ClientEvents, ServerEvents } from '@maze/shared';
import { AnalyticsIngest, createAnalyticsRouter, registerIngestHandlers } from './analytics/ingest.js';
import type { LevelStore } from './levels/level-store.js';
import { createLevelRouter } from './routes/levels.js';

export interface MazeServerOptions {
  levels: LevelStore;
  maxStage?: number;
  maxRetainedEvents?: number;
}

export interface MazeServer {
  app: Express;
  httpServer: HttpServer;
  io: Server<ClientEvents, ServerEvents>;
  ingest: AnalyticsIngest;
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}

const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
  const status = err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 500;
  if (status >= 500) {
    console.error('[Server] Request failed:', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
    return;
  }
  res.status(status).json({ success: false, error: 'Invalid request body' });
};

/** Level service and analytics ingestion on one HTTP server; call `listen` to bind. */
export function createMazeServer(options: MazeServerOptions): MazeServer {
  const maxStage = options.maxStage ?? options.levels.maxStage;
  const ingest = new AnalyticsIngest(options.maxRetainedEvents);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', stages: options.levels.size, connections: io.engine.clientsCount });
  });
  app.use(createLevelRouter(options.levels, maxStage));
  app.use(createAnalyticsRouter(ingest));
  app.use(handleError);

  const httpServer = createServer(app);

  const io = new Server<ClientEvents, ServerEvents>(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
  });
  registerIngestHandlers(io, ingest);

  return {
    app,
    httpServer,
    io,
    ingest,
    listen: (port) =>
      new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          resolve(address !== null && typeof address === 'object' ? address.port : port);
        });
      }),
    close: () =>
      new Promise((resolve, reject) => {
        // Also closes the underlying HTTP server
        io.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export { AnalyticsIngest } from './analytics/ingest.js';
export type { IngestStats } from './analytics/ingest.js';
export { LevelStore } from './levels/level-store.js';
export { loadServerConfig, DEFAULT_LEVELS_FILE } from './config.js';
export type { ServerConfig } from './config.js';
