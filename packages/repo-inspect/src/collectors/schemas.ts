/**
 * Wire schemas for the GitHub REST responses the collectors read.
 *
 * Only the fields that are mapped onto governance facets are declared;
 * everything else in a response is stripped during parsing.
 */

import { z } from 'zod';

const featureStatusSchema = z.object({ status: z.string() }).nullish();

export const repositoryResponseSchema = z.object({
  private: z.boolean(),
  archived: z.boolean().optional(),
  disabled: z.boolean().optional(),
  default_branch: z.string(),
  allow_merge_commit: z.boolean().optional(),
  allow_squash_merge: z.boolean().optional(),
  allow_rebase_merge: z.boolean().optional(),
  allow_auto_merge: z.boolean().optional(),
  delete_branch_on_merge: z.boolean().optional(),
  has_issues: z.boolean().optional(),
  has_projects: z.boolean().optional(),
  has_wiki: z.boolean().optional(),
  has_downloads: z.boolean().optional(),
  security_and_analysis: z
    .object({
      secret_scanning: featureStatusSchema,
      secret_scanning_push_protection: featureStatusSchema,
    })
    .nullish(),
});

export type RepositoryResponse = z.infer<typeof repositoryResponseSchema>;

export const rulesetSummaryListSchema = z.array(
  z.object({
    id: z.number(),
    name: z.string(),
    target: z.string().optional(),
  })
);

export const rulesetRuleSchema = z.object({
  type: z.string(),
  parameters: z.unknown().optional(),
});

export const rulesetResponseSchema = z.object({
  id: z.number(),
  name: z.string(),
  target: z.string().optional(),
  conditions: z
    .object({
      ref_name: z
        .object({
          include: z.array(z.string()).default([]),
          exclude: z.array(z.string()).default([]),
        })
        .optional(),
    })
    .nullish(),
  // Only returned to callers with admin access to the ruleset
  bypass_actors: z.array(z.object({ actor_type: z.string() })).optional(),
  rules: z.array(rulesetRuleSchema).default([]),
});

export type RulesetResponse = z.infer<typeof rulesetResponseSchema>;

export const pullRequestParametersSchema = z.object({
  required_approving_review_count: z.number().int().nonnegative(),
  dismiss_stale_reviews_on_push: z.boolean(),
  require_code_owner_review: z.boolean(),
  required_review_thread_resolution: z.boolean(),
});

export const statusCheckParametersSchema = z.object({
  required_status_checks: z.array(z.object({ context: z.string() })),
});

export const collaboratorListSchema = z.array(
  z.object({
    login: z.string(),
    type: z.string(),
    role_name: z.string().optional(),
    permissions: z
      .object({
        admin: z.boolean(),
        maintain: z.boolean().optional(),
        push: z.boolean(),
        triage: z.boolean().optional(),
        pull: z.boolean(),
      })
      .optional(),
  })
);

export type CollaboratorResponse = z.infer<typeof collaboratorListSchema>[number];

export const teamListSchema = z.array(
  z.object({
    name: z.string(),
    slug: z.string(),
    permission: z.string(),
  })
);

export const automatedSecurityFixesSchema = z.object({
  enabled: z.boolean(),
});

export const labelListSchema = z.array(
  z.object({
    name: z.string(),
    color: z.string(),
    description: z.string().nullish(),
  })
);

export const milestoneListSchema = z.array(
  z.object({
    title: z.string(),
    description: z.string().nullish(),
    state: z.enum(['open', 'closed']),
    due_on: z.string().nullish(),
  })
);
