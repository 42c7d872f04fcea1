// tRPC middleware translating runtime errors into tRPC error codes

import { PolicySetNotFoundError, ValidationError } from '@policyminer/runtime';
import { baseProcedure, middleware, TRPCError } from './index.js';

/**
 * Map errors thrown by the runtime to client-facing codes:
 * validation failures become BAD_REQUEST, missing policy sets NOT_FOUND.
 * Anything else stays an INTERNAL_SERVER_ERROR.
 */
const mapRuntimeErrors = middleware(async ({ next }) => {
  const result = await next();
  if (result.ok) {
    return result;
  }

  const cause = result.error.cause;
  if (cause instanceof PolicySetNotFoundError) {
    throw new TRPCError({ code: 'NOT_FOUND', message: cause.message, cause });
  }
  if (cause instanceof ValidationError) {
    throw new TRPCError({ code: 'BAD_REQUEST', message: cause.message, cause });
  }
  return result;
});

/**
 * Logs procedure failures that are not the caller's fault.
 */
const logFailures = middleware(async ({ ctx, path, type, next }) => {
  const result = await next();
  if (!result.ok && result.error.code === 'INTERNAL_SERVER_ERROR') {
    ctx.logger.error('Procedure failed', { path, type, error: result.error.message });
  }
  return result;
});

/**
 * Public procedure - no auth; runtime errors are mapped to tRPC codes.
 */
export const publicProcedure = baseProcedure.use(logFailures).use(mapRuntimeErrors);
