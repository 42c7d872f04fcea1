// Policy sets router - run extractions and read their results

import { z } from 'zod';
import type { StoredPolicySet } from '@policyminer/protocol';
import {
  DEFAULT_MAX_POLICIES,
  DEFAULT_TOP_COUNT,
  PolicySetNotFoundError,
  formatPolicySetMarkdown,
  formatPolicySetText,
  minePolicies,
  serializePolicySet,
  topPolicies,
} from '@policyminer/runtime';
import { files } from '@policyminer/repositories';
import { resolveDataPath } from '../../data-path.js';
import type { Context } from '../context.js';
import { router } from '../index.js';
import { publicProcedure } from '../middleware.js';

const threshold = z.number().finite().optional();

async function getStoredPolicySet(ctx: Context, id: string): Promise<StoredPolicySet> {
  const stored = await ctx.repos.policySets.get(id);
  if (!stored) {
    throw new PolicySetNotFoundError(id);
  }
  return stored;
}

export const policySetsRouter = router({
  /**
   * Mine the stored behavior logs and save the resulting policy set.
   * Thresholds left out come from configuration.
   */
  extract: publicProcedure
    .input(
      z.object({
        name: z.string().min(1).optional(),
        minSupport: threshold,
        minConfidence: threshold,
        minLift: threshold,
        agentId: z.string().optional(),
        action: z.string().optional(),
        since: z.string().datetime({ offset: true }).optional(),
        until: z.string().datetime({ offset: true }).optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const defaults = ctx.config.thresholds;

      return ctx.repos.transaction((repos) =>
        minePolicies(repos, {
          name: input.name,
          minSupport: input.minSupport ?? defaults.minSupport,
          minConfidence: input.minConfidence ?? defaults.minConfidence,
          minLift: input.minLift ?? defaults.minLift,
          filter: {
            agentId: input.agentId,
            action: input.action,
            since: input.since,
            until: input.until,
          },
          logger: ctx.logger,
        })
      );
    }),

  /**
   * Get a stored policy set by ID.
   */
  get: publicProcedure
    .input(z.object({ id: z.string() }))
    .query(async ({ ctx, input }) => {
      return getStoredPolicySet(ctx, input.id);
    }),

  /**
   * List stored policy sets, newest first.
   */
  list: publicProcedure
    .input(
      z.object({
        name: z.string().optional(),
        limit: z.number().int().min(1).max(100).default(50),
        offset: z.number().int().min(0).default(0),
      })
    )
    .query(async ({ ctx, input }) => {
      return ctx.repos.policySets.list(input);
    }),

  /**
   * The highest-confidence policies of a stored set.
   */
  top: publicProcedure
    .input(
      z.object({
        id: z.string(),
        n: z.number().int().default(DEFAULT_TOP_COUNT),
      })
    )
    .query(async ({ ctx, input }) => {
      const stored = await getStoredPolicySet(ctx, input.id);
      return topPolicies(stored.policySet, input.n);
    }),

  /**
   * Render a stored set as text, Markdown or the JSON document.
   */
  render: publicProcedure
    .input(
      z.object({
        id: z.string(),
        format: z.enum(['text', 'markdown', 'json']).default('text'),
        maxPolicies: z.number().int().min(0).default(DEFAULT_MAX_POLICIES),
      })
    )
    .query(async ({ ctx, input }) => {
      const { policySet } = await getStoredPolicySet(ctx, input.id);

      switch (input.format) {
        case 'text':
          return formatPolicySetText(policySet, { maxPolicies: input.maxPolicies });
        case 'markdown':
          return formatPolicySetMarkdown(policySet, { maxPolicies: input.maxPolicies });
        case 'json':
          return serializePolicySet(policySet);
      }
    }),

  /**
   * Write a stored set as a JSON document into the data directory.
   */
  exportFile: publicProcedure
    .input(z.object({ id: z.string(), path: z.string().min(1) }))
    .mutation(async ({ ctx, input }) => {
      const filePath = resolveDataPath(ctx.config.dataDir, input.path);
      const { policySet } = await getStoredPolicySet(ctx, input.id);
      await files.writePolicySetFile(ctx.files.writer, filePath, policySet);
      return { id: input.id, path: input.path };
    }),

  /**
   * Delete a stored policy set.
   */
  delete: publicProcedure
    .input(z.object({ id: z.string() }))
    .mutation(async ({ ctx, input }) => {
      const deleted = await ctx.repos.policySets.delete(input.id);
      if (!deleted) {
        throw new PolicySetNotFoundError(input.id);
      }
      return { id: input.id, deleted };
    }),
});
