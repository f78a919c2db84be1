/**
 * repo-inspect Types
 *
 * Governance facts collected for a single repository, plus the
 * configuration and outcome types shared by the inspector and reporters.
 */

// =============================================================================
// SECTIONS
// =============================================================================

export const SECTION_NAMES = [
  'settings',
  'security',
  'rulesets',
  'collaborators',
  'teams',
  'labels',
  'milestones',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

// =============================================================================
// GOVERNANCE FACETS
// =============================================================================

export interface RepositoryIdentity {
  owner: string;
  name: string;
}

export interface RepositorySettings {
  private: boolean;
  archived: boolean;
  disabled: boolean;
  defaultBranch: string;
  allowMergeCommit: boolean;
  allowSquashMerge: boolean;
  allowRebaseMerge: boolean;
  allowAutoMerge: boolean;
  deleteBranchOnMerge: boolean;
  hasIssues: boolean;
  hasProjects: boolean;
  hasWiki: boolean;
  hasDownloads: boolean;
}

export interface SecuritySettings {
  vulnerabilityAlerts: boolean;
  automatedSecurityFixes: boolean;
  secretScanning: boolean;
  secretScanningPushProtection: boolean;
  dependencyGraphEnabled: boolean;
}

export interface Ruleset {
  name: string;
  /** Branch-name pattern(s) the ruleset targets */
  pattern: string;
  enforceAdmins: boolean;
  requiredStatusChecks: string[];
  requiredPullRequestReviews: boolean;
  /** The three review fields below only mean something when reviews are required */
  requiredApprovingReviewCount: number;
  dismissStaleReviews: boolean;
  requireCodeOwnerReviews: boolean;
  requiredLinearHistory: boolean;
  allowForcePushes: boolean;
  allowDeletions: boolean;
  requiredConversationResolution: boolean;
}

export type PermissionLevel = 'admin' | 'maintain' | 'write' | 'triage' | 'read';

export interface Collaborator {
  login: string;
  /** Usually a PermissionLevel; custom repository roles pass through unchanged */
  permission: string;
  type: string;
}

export interface Team {
  name: string;
  slug: string;
  permission: string;
}

export interface Label {
  name: string;
  /** Hex colour without the leading '#' */
  color: string;
  description?: string;
}

export type MilestoneState = 'open' | 'closed';

export interface Milestone {
  title: string;
  description?: string;
  state: MilestoneState;
  dueOn?: string;
}

/**
 * Every facet of one repository. Facets whose collector was skipped or
 * failed keep their zero value.
 */
export interface GovernanceRecord {
  repository: RepositoryIdentity;
  settings: RepositorySettings;
  security: SecuritySettings;
  rulesets: Ruleset[];
  collaborators: Collaborator[];
  teams: Team[];
  labels: Label[];
  milestones: Milestone[];
}

// =============================================================================
// COLLECTION OUTCOMES
// =============================================================================

export type CollectorStatus = 'collected' | 'failed' | 'skipped';

export interface CollectorOutcome {
  section: SectionName;
  status: CollectorStatus;
  error?: Error;
}

export interface InspectionResult {
  record: GovernanceRecord;
  /** One entry per section, in collection order */
  outcomes: CollectorOutcome[];
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export const OUTPUT_FORMATS = ['json', 'yaml', 'table'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface InspectConfig {
  format: OutputFormat;
  verbose: boolean;
  /** Allow-list of sections; empty means every section */
  sections: readonly string[];
  color: boolean;
  token?: string;
  apiUrl: string;
}

export const DEFAULT_API_URL = 'https://api.github.com';

// =============================================================================
// FACTORIES
// =============================================================================

export function emptyRepositorySettings(): RepositorySettings {
  return {
    private: false,
    archived: false,
    disabled: false,
    defaultBranch: '',
    allowMergeCommit: false,
    allowSquashMerge: false,
    allowRebaseMerge: false,
    allowAutoMerge: false,
    deleteBranchOnMerge: false,
    hasIssues: false,
    hasProjects: false,
    hasWiki: false,
    hasDownloads: false,
  };
}

export function emptySecuritySettings(): SecuritySettings {
  return {
    vulnerabilityAlerts: false,
    automatedSecurityFixes: false,
    secretScanning: false,
    secretScanningPushProtection: false,
    dependencyGraphEnabled: false,
  };
}

export function createGovernanceRecord(repository: RepositoryIdentity): GovernanceRecord {
  return {
    repository: { ...repository },
    settings: emptyRepositorySettings(),
    security: emptySecuritySettings(),
    rulesets: [],
    collaborators: [],
    teams: [],
    labels: [],
    milestones: [],
  };
}
