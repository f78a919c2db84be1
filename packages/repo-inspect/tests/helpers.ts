/**
 * Shared test fixtures: an in-process hosting client and canned GitHub responses.
 */

import { HostingApiError } from '../src/errors.js';
import type { TextSink } from '../src/logger.js';
import type { HostingClient } from '../src/providers/github.js';
import type { GovernanceRecord } from '../src/types.js';

export const BASE = 'repos/octo-org/widgets';

export class FakeHostingClient implements HostingClient {
  readonly requests: string[] = [];

  constructor(
    private responses: Record<string, unknown>,
    private probes: Record<string, boolean | Error> = {}
  ) {}

  async get(endpoint: string): Promise<unknown> {
    this.requests.push(endpoint);
    const response = this.responses[endpoint];
    if (response instanceof Error) {
      throw response;
    }
    if (response === undefined) {
      throw new HostingApiError(endpoint, 404, 'Not Found');
    }
    return response;
  }

  async probe(endpoint: string): Promise<boolean> {
    this.requests.push(endpoint);
    const answer = this.probes[endpoint];
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? false;
  }
}

export class StringSink implements TextSink {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }

  lines(): string[] {
    return this.text.split('\n').filter((line) => line.length > 0);
  }
}

export function githubResponses(): Record<string, unknown> {
  return {
    [BASE]: {
      full_name: 'octo-org/widgets',
      private: false,
      archived: false,
      disabled: false,
      default_branch: 'main',
      allow_merge_commit: true,
      allow_squash_merge: true,
      allow_rebase_merge: false,
      allow_auto_merge: false,
      delete_branch_on_merge: true,
      has_issues: true,
      has_projects: false,
      has_wiki: false,
      has_downloads: true,
      security_and_analysis: {
        secret_scanning: { status: 'enabled' },
        secret_scanning_push_protection: { status: 'disabled' },
      },
    },
    [`${BASE}/rulesets?per_page=100`]: [
      { id: 1, name: 'main protection', target: 'branch' },
      { id: 2, name: 'release tags', target: 'tag' },
      { id: 3, name: 'feature branches', target: 'branch' },
    ],
    [`${BASE}/rulesets/1`]: {
      id: 1,
      name: 'main protection',
      target: 'branch',
      enforcement: 'active',
      conditions: { ref_name: { include: ['~DEFAULT_BRANCH'], exclude: [] } },
      bypass_actors: [],
      rules: [
        { type: 'deletion' },
        { type: 'non_fast_forward' },
        { type: 'required_linear_history' },
        {
          type: 'pull_request',
          parameters: {
            required_approving_review_count: 2,
            dismiss_stale_reviews_on_push: true,
            require_code_owner_review: true,
            require_last_push_approval: false,
            required_review_thread_resolution: true,
          },
        },
        {
          type: 'required_status_checks',
          parameters: {
            strict_required_status_checks_policy: true,
            required_status_checks: [{ context: 'ci/build' }, { context: 'ci/test', integration_id: 42 }],
          },
        },
      ],
    },
    [`${BASE}/rulesets/3`]: {
      id: 3,
      name: 'feature branches',
      target: 'branch',
      enforcement: 'active',
      conditions: { ref_name: { include: ['refs/heads/feature/*'], exclude: [] } },
      bypass_actors: [{ actor_id: 5, actor_type: 'RepositoryRole', bypass_mode: 'always' }],
      rules: [{ type: 'creation' }],
    },
    [`${BASE}/collaborators?per_page=100`]: [
      {
        login: 'maintainer1',
        type: 'User',
        role_name: 'admin',
        permissions: { admin: true, maintain: true, push: true, triage: true, pull: true },
      },
      {
        login: 'deploy-bot',
        type: 'Bot',
        permissions: { admin: false, push: true, pull: true },
      },
    ],
    [`${BASE}/teams?per_page=100`]: [
      { name: 'Core Team', slug: 'core-team', permission: 'admin' },
      { name: 'Contributors', slug: 'contributors', permission: 'push' },
      { name: 'Reviewers', slug: 'reviewers', permission: 'triage' },
    ],
    [`${BASE}/automated-security-fixes`]: { enabled: true, paused: false },
    [`${BASE}/labels?per_page=100`]: [
      { id: 1, name: 'bug', color: 'd73a4a', description: "Something isn't working", default: true },
      { id: 2, name: 'chore', color: 'cfd3d7', description: null, default: false },
    ],
    [`${BASE}/milestones?state=all&per_page=100`]: [
      { number: 1, title: 'v1.0', description: 'First stable release', state: 'open', due_on: '2025-06-30T07:00:00Z' },
      { number: 2, title: 'v0.9', description: null, state: 'closed', due_on: null },
    ],
  };
}

export function githubProbes(): Record<string, boolean | Error> {
  return {
    [`${BASE}/vulnerability-alerts`]: true,
    [`${BASE}/dependency-graph/sbom`]: true,
  };
}

/** The record the canned responses above map to */
export function expectedRecord(): GovernanceRecord {
  return {
    repository: { owner: 'octo-org', name: 'widgets' },
    settings: {
      private: false,
      archived: false,
      disabled: false,
      defaultBranch: 'main',
      allowMergeCommit: true,
      allowSquashMerge: true,
      allowRebaseMerge: false,
      allowAutoMerge: false,
      deleteBranchOnMerge: true,
      hasIssues: true,
      hasProjects: false,
      hasWiki: false,
      hasDownloads: true,
    },
    security: {
      vulnerabilityAlerts: true,
      automatedSecurityFixes: true,
      secretScanning: true,
      secretScanningPushProtection: false,
      dependencyGraphEnabled: true,
    },
    rulesets: [
      {
        name: 'main protection',
        pattern: '~DEFAULT_BRANCH',
        enforceAdmins: true,
        requiredStatusChecks: ['ci/build', 'ci/test'],
        requiredPullRequestReviews: true,
        requiredApprovingReviewCount: 2,
        dismissStaleReviews: true,
        requireCodeOwnerReviews: true,
        requiredLinearHistory: true,
        allowForcePushes: false,
        allowDeletions: false,
        requiredConversationResolution: true,
      },
      {
        name: 'feature branches',
        pattern: 'refs/heads/feature/*',
        enforceAdmins: false,
        requiredStatusChecks: [],
        requiredPullRequestReviews: false,
        requiredApprovingReviewCount: 0,
        dismissStaleReviews: false,
        requireCodeOwnerReviews: false,
        requiredLinearHistory: false,
        allowForcePushes: true,
        allowDeletions: true,
        requiredConversationResolution: false,
      },
    ],
    collaborators: [
      { login: 'maintainer1', permission: 'admin', type: 'User' },
      { login: 'deploy-bot', permission: 'write', type: 'Bot' },
    ],
    teams: [
      { name: 'Core Team', slug: 'core-team', permission: 'admin' },
      { name: 'Contributors', slug: 'contributors', permission: 'write' },
      { name: 'Reviewers', slug: 'reviewers', permission: 'triage' },
    ],
    labels: [
      { name: 'bug', color: 'd73a4a', description: "Something isn't working" },
      { name: 'chore', color: 'cfd3d7' },
    ],
    milestones: [
      { title: 'v1.0', description: 'First stable release', state: 'open', dueOn: '2025-06-30T07:00:00Z' },
      { title: 'v0.9', state: 'closed' },
    ],
  };
}
