// @policyminer/api
// tRPC API over the policy miner runtime

export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createContext, type Context, type CreateContextOptions } from './trpc/context.js';
export { loadConfig, type ApiConfig } from './config.js';
export { getRepositoryContext, closeDb } from './db.js';
export { createApiServer } from './server.js';
