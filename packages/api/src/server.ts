// Standalone HTTP server for the tRPC API

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { appRouter } from './trpc/routers/index.js';
import { createContext, type CreateContextOptions } from './trpc/context.js';

/**
 * Create an HTTP server serving the API router.
 * Every request gets a context built from the given dependencies.
 */
export function createApiServer(deps: CreateContextOptions) {
  return createHTTPServer({
    router: appRouter,
    createContext: () => createContext(deps),
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        deps.logger.error(`tRPC error on ${path ?? '<unknown>'}`, { error: error.message });
      }
    },
  });
}
