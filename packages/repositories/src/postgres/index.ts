// Postgres implementation of the repositories (drizzle-orm over postgres.js)

export { createDatabase, type Database, type DatabaseConfig, type DatabaseExecutor } from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
