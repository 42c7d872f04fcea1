// Root router - combines all domain routers
//
// This is the main entry point for the tRPC API.

import { router } from '../index.js';
import { behaviorLogsRouter } from './behavior-logs.js';
import { policySetsRouter } from './policy-sets.js';

/**
 * The root router that combines all domain routers.
 *
 * Usage from client:
 * ```ts
 * await trpc.behaviorLogs.ingest.mutate({ content: ndjson });
 * const stored = await trpc.policySets.extract.mutate({ minConfidence: 0.8 });
 * const report = await trpc.policySets.render.query({ id: stored.id, format: 'markdown' });
 * ```
 */
export const appRouter = router({
  behaviorLogs: behaviorLogsRouter,
  policySets: policySetsRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
