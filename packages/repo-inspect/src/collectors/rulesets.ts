/**
 * Rulesets collector
 *
 * Lists the repository's branch rulesets and fetches each one in full, since
 * the list endpoint omits conditions, bypass actors and rules. The facet is
 * all-or-nothing: one failed detail request fails the whole collector.
 */

import type { Ruleset } from '../types.js';
import {
  pullRequestParametersSchema,
  rulesetResponseSchema,
  rulesetSummaryListSchema,
  statusCheckParametersSchema,
  type RulesetResponse,
} from './schemas.js';
import { repositoryPath, type Collector } from './types.js';

function describePattern(response: RulesetResponse): string {
  const include = response.conditions?.ref_name?.include ?? [];
  return include.length > 0 ? include.join(', ') : '*';
}

export function mapRuleset(response: RulesetResponse): Ruleset {
  const ruleset: Ruleset = {
    name: response.name,
    pattern: describePattern(response),
    // Without the bypass list there is nothing to confirm enforcement against
    enforceAdmins: response.bypass_actors !== undefined && response.bypass_actors.length === 0,
    requiredStatusChecks: [],
    requiredPullRequestReviews: false,
    requiredApprovingReviewCount: 0,
    dismissStaleReviews: false,
    requireCodeOwnerReviews: false,
    requiredLinearHistory: false,
    allowForcePushes: true,
    allowDeletions: true,
    requiredConversationResolution: false,
  };

  for (const rule of response.rules) {
    switch (rule.type) {
      case 'pull_request': {
        const params = pullRequestParametersSchema.parse(rule.parameters);
        ruleset.requiredPullRequestReviews = true;
        ruleset.requiredApprovingReviewCount = params.required_approving_review_count;
        ruleset.dismissStaleReviews = params.dismiss_stale_reviews_on_push;
        ruleset.requireCodeOwnerReviews = params.require_code_owner_review;
        ruleset.requiredConversationResolution = params.required_review_thread_resolution;
        break;
      }
      case 'required_status_checks': {
        const params = statusCheckParametersSchema.parse(rule.parameters);
        ruleset.requiredStatusChecks = params.required_status_checks.map((check) => check.context);
        break;
      }
      case 'required_linear_history':
        ruleset.requiredLinearHistory = true;
        break;
      case 'non_fast_forward':
        ruleset.allowForcePushes = false;
        break;
      case 'deletion':
        ruleset.allowDeletions = false;
        break;
      default:
        break;
    }
  }

  return ruleset;
}

export const collectRulesets: Collector<'rulesets'> = async (client, repository) => {
  const base = repositoryPath(repository);
  const summaries = rulesetSummaryListSchema.parse(await client.get(`${base}/rulesets?per_page=100`));

  const rulesets: Ruleset[] = [];
  for (const summary of summaries) {
    if (summary.target !== undefined && summary.target !== 'branch') {
      continue;
    }
    const detail = rulesetResponseSchema.parse(await client.get(`${base}/rulesets/${summary.id}`));
    rulesets.push(mapRuleset(detail));
  }
  return rulesets;
};
