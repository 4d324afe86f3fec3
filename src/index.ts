import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { closeDb } from './db/client.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer();
  const port = Number(process.env.PORT || 3000);
  const host = process.env.HOST || '0.0.0.0';
  await server.listen({ port, host });
  getLogger().info({ port, host, db: cfg.database.url }, 'Server started');

  const shutdown = (signal: string) => {
    getLogger().info({ signal }, 'Shutting down');
    server
      .close()
      .then(() => {
        closeDb();
        process.exit(0);
      })
      .catch((err: unknown) => {
        getLogger().error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  getLogger().fatal({ err }, 'Server failed to start');
  process.exit(1);
});
