// tRPC request context
//
// Creates the context available to all tRPC procedures.

import type { TransactionalRepositoryContext, files } from '@policyminer/repositories';
import type { MinerLogger } from '@policyminer/runtime';
import type { ApiConfig } from '../config.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Repository context for data access */
  repos: TransactionalRepositoryContext;

  logger: MinerLogger;

  /** File access for imports and exports under config.dataDir */
  files: {
    reader: files.FileReader;
    writer: files.FileWriter;
  };

  /** Defaults for requests that leave settings out */
  config: ApiConfig;
};

export type CreateContextOptions = Context;

/**
 * Create the tRPC context for a request.
 * Every request shares the process-wide repositories, logger, files and config.
 */
export function createContext(opts: CreateContextOptions): Context {
  return {
    repos: opts.repos,
    logger: opts.logger,
    files: opts.files,
    config: opts.config,
  };
}
