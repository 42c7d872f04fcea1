// tRPC initialization
//
// Sets up tRPC with superjson transformer for proper Date/Map/Set serialization.
// This is the foundation for type-safe API routes.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { ValidationError } from '@policyminer/runtime';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Include the error code for client-side handling
        code: error.code,
        // Which input field a validation failure refers to
        field: error.cause instanceof ValidationError ? (error.cause.field ?? null) : null,
      },
    };
  },
});

/**
 * Export router factory.
 */
export const router = t.router;

/**
 * Base procedure without error mapping. Use publicProcedure from
 * ./middleware.js in routers.
 */
export const baseProcedure = t.procedure;

/**
 * Export middleware factory.
 */
export const middleware = t.middleware;

/**
 * Re-export TRPCError for use in routers.
 */
export { TRPCError };
