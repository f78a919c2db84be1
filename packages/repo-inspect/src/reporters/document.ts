/**
 * Serialized governance document.
 *
 * Field names and key order are part of the output contract shared by the
 * JSON and YAML reporters. Empty sequences and empty optional strings are
 * left out rather than written as [] or "".
 */

import type {
  Collaborator,
  GovernanceRecord,
  Label,
  Milestone,
  MilestoneState,
  RepositorySettings,
  Ruleset,
  SecuritySettings,
  Team,
} from '../types.js';

export interface RulesetDocument {
  name: string;
  pattern: string;
  enforce_admins: boolean;
  required_status_checks?: string[];
  required_pull_request_reviews: boolean;
  required_approving_review_count: number;
  dismiss_stale_reviews: boolean;
  require_code_owner_reviews: boolean;
  required_linear_history: boolean;
  allow_force_pushes: boolean;
  allow_deletions: boolean;
  required_conversation_resolution: boolean;
}

export interface SecuritySettingsDocument {
  vulnerability_alerts: boolean;
  automated_security_fixes: boolean;
  secret_scanning: boolean;
  secret_scanning_push_protection: boolean;
  dependency_graph_enabled: boolean;
}

export interface RepositorySettingsDocument {
  private: boolean;
  archived: boolean;
  disabled: boolean;
  default_branch: string;
  allow_merge_commit: boolean;
  allow_squash_merge: boolean;
  allow_rebase_merge: boolean;
  allow_auto_merge: boolean;
  delete_branch_on_merge: boolean;
  has_issues: boolean;
  has_projects: boolean;
  has_wiki: boolean;
  has_downloads: boolean;
}

export interface LabelDocument {
  name: string;
  color: string;
  description?: string;
}

export interface MilestoneDocument {
  title: string;
  description?: string;
  state: MilestoneState;
  due_on?: string;
}

export interface GovernanceDocument {
  repository: { owner: string; name: string };
  rulesets?: RulesetDocument[];
  collaborators?: Collaborator[];
  teams?: Team[];
  security_settings: SecuritySettingsDocument;
  repository_settings: RepositorySettingsDocument;
  issue_labels?: LabelDocument[];
  milestones?: MilestoneDocument[];
}

function rulesetDocument(ruleset: Ruleset): RulesetDocument {
  return {
    name: ruleset.name,
    pattern: ruleset.pattern,
    enforce_admins: ruleset.enforceAdmins,
    ...(ruleset.requiredStatusChecks.length > 0 ? { required_status_checks: [...ruleset.requiredStatusChecks] } : {}),
    required_pull_request_reviews: ruleset.requiredPullRequestReviews,
    required_approving_review_count: ruleset.requiredApprovingReviewCount,
    dismiss_stale_reviews: ruleset.dismissStaleReviews,
    require_code_owner_reviews: ruleset.requireCodeOwnerReviews,
    required_linear_history: ruleset.requiredLinearHistory,
    allow_force_pushes: ruleset.allowForcePushes,
    allow_deletions: ruleset.allowDeletions,
    required_conversation_resolution: ruleset.requiredConversationResolution,
  };
}

function securityDocument(security: SecuritySettings): SecuritySettingsDocument {
  return {
    vulnerability_alerts: security.vulnerabilityAlerts,
    automated_security_fixes: security.automatedSecurityFixes,
    secret_scanning: security.secretScanning,
    secret_scanning_push_protection: security.secretScanningPushProtection,
    dependency_graph_enabled: security.dependencyGraphEnabled,
  };
}

function settingsDocument(settings: RepositorySettings): RepositorySettingsDocument {
  return {
    private: settings.private,
    archived: settings.archived,
    disabled: settings.disabled,
    default_branch: settings.defaultBranch,
    allow_merge_commit: settings.allowMergeCommit,
    allow_squash_merge: settings.allowSquashMerge,
    allow_rebase_merge: settings.allowRebaseMerge,
    allow_auto_merge: settings.allowAutoMerge,
    delete_branch_on_merge: settings.deleteBranchOnMerge,
    has_issues: settings.hasIssues,
    has_projects: settings.hasProjects,
    has_wiki: settings.hasWiki,
    has_downloads: settings.hasDownloads,
  };
}

function labelDocument(label: Label): LabelDocument {
  return {
    name: label.name,
    color: label.color,
    ...(label.description ? { description: label.description } : {}),
  };
}

function milestoneDocument(milestone: Milestone): MilestoneDocument {
  return {
    title: milestone.title,
    ...(milestone.description ? { description: milestone.description } : {}),
    state: milestone.state,
    ...(milestone.dueOn ? { due_on: milestone.dueOn } : {}),
  };
}

export function toGovernanceDocument(record: GovernanceRecord): GovernanceDocument {
  return {
    repository: { owner: record.repository.owner, name: record.repository.name },
    ...(record.rulesets.length > 0 ? { rulesets: record.rulesets.map(rulesetDocument) } : {}),
    ...(record.collaborators.length > 0
      ? { collaborators: record.collaborators.map((c) => ({ login: c.login, permission: c.permission, type: c.type })) }
      : {}),
    ...(record.teams.length > 0
      ? { teams: record.teams.map((t) => ({ name: t.name, slug: t.slug, permission: t.permission })) }
      : {}),
    security_settings: securityDocument(record.security),
    repository_settings: settingsDocument(record.settings),
    ...(record.labels.length > 0 ? { issue_labels: record.labels.map(labelDocument) } : {}),
    ...(record.milestones.length > 0 ? { milestones: record.milestones.map(milestoneDocument) } : {}),
  };
}
