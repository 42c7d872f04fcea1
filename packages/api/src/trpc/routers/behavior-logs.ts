// Behavior logs router - ingest and inspect recorded agent actions

import { z } from 'zod';
import { ingestBehaviorLogFile, ingestBehaviorLogs } from '@policyminer/runtime';
import { resolveDataPath } from '../../data-path.js';
import { router, TRPCError } from '../index.js';
import { publicProcedure } from '../middleware.js';

const FilterSchema = z.object({
  agentId: z.string().optional(),
  action: z.string().optional(),
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional(),
});

export const behaviorLogsRouter = router({
  /**
   * Ingest NDJSON content. Invalid lines are skipped and reported.
   */
  ingest: publicProcedure
    .input(z.object({ content: z.string() }))
    .mutation(async ({ ctx, input }) => {
      return ingestBehaviorLogs(ctx.repos, input.content, { logger: ctx.logger });
    }),

  /**
   * Ingest an NDJSON file from the data directory.
   */
  ingestFile: publicProcedure
    .input(z.object({ path: z.string().min(1) }))
    .mutation(async ({ ctx, input }) => {
      const filePath = resolveDataPath(ctx.config.dataDir, input.path);
      if (!(await ctx.files.reader.exists(filePath))) {
        throw new TRPCError({ code: 'NOT_FOUND', message: `File not found: ${input.path}` });
      }
      return ingestBehaviorLogFile(ctx.repos, ctx.files.reader, filePath, { logger: ctx.logger });
    }),

  /**
   * List stored logs in insertion order.
   */
  list: publicProcedure
    .input(
      FilterSchema.extend({
        limit: z.number().int().min(1).max(1000).default(100),
        offset: z.number().int().min(0).default(0),
      })
    )
    .query(async ({ ctx, input }) => {
      return ctx.repos.behaviorLogs.list(input);
    }),

  /**
   * Count stored logs matching a filter.
   */
  count: publicProcedure.input(FilterSchema).query(async ({ ctx, input }) => {
    return ctx.repos.behaviorLogs.count(input);
  }),
});
