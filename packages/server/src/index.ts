import { createMazeServer } from './app.js';
import { loadServerConfig } from './config.js';
import { LevelStore } from './levels/level-store.js';

async function main() {
  const config = loadServerConfig(process.env);
  const levels = await LevelStore.fromFile(config.levelsFile);
  const server = createMazeServer({ levels, maxStage: config.maxStage });

  const port = await server.listen(config.port);
  console.log(`[Server] Maze level server running on port ${port}`);
  console.log(`[Server] Serving stages 1-${config.maxStage ?? levels.maxStage}, analytics on /analytics and socket.io`);

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});
