// API entry point

import { files } from '@policyminer/repositories';
import { createConsoleLogger } from '@policyminer/runtime';
import { loadConfig } from './config.js';
import { closeDb, getRepositoryContext } from './db.js';
import { createApiServer } from './server.js';

const config = loadConfig(process.env);
const logger = createConsoleLogger(config.logLevel);
const repos = getRepositoryContext(config);

const { server, listen } = createApiServer({
  repos,
  logger,
  config,
  files: {
    reader: files.createFilesystemReader(),
    writer: files.createFilesystemWriter(),
  },
});
listen(config.port);

logger.info('Policy miner API listening', {
  port: config.port,
  storage: config.databaseUrl ? 'postgres' : 'memory',
  dataDir: config.dataDir,
});

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await closeDb();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
  });
}
