/**
 * Tree Reporter - human-readable governance report
 *
 * Each section is a tree drawn with ├─ / └─ connectors. Sections are
 * written in a fixed order and respect the section filter; list sections
 * are left out entirely when they have no entries.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { isSectionIncluded } from '../sections.js';
import type { GovernanceRecord, MilestoneState, Ruleset } from '../types.js';
import type { Reporter } from './types.js';

const TITLE = 'Repository Governance Report';

const BRANCH = '├─';
const LAST_BRANCH = '└─';
const PIPE = '│  ';
const SPACE = '   ';

/**
 * Permission icons by level name
 */
const PERMISSION_ICONS: Record<string, string> = {
  admin: '👑',
  maintain: '🔧',
  write: '✏️',
  triage: '🏷️',
  read: '👀',
};

const UNKNOWN_PERMISSION_ICON = '❔';

const MILESTONE_STATE_ICONS: Record<MilestoneState, string> = {
  open: '🟢',
  closed: '🔴',
};

export function formatBoolean(value: boolean): string {
  return value ? '✅' : '❌';
}

export function formatPermission(permission: string): string {
  return `${PERMISSION_ICONS[permission] ?? UNKNOWN_PERMISSION_ICON} ${permission}`;
}

function connector(index: number, count: number): string {
  return index === count - 1 ? LAST_BRANCH : BRANCH;
}

/** Indent for the children of an entry, continuing the parent's line when it has siblings below */
function childIndent(index: number, count: number): string {
  return index === count - 1 ? SPACE : PIPE;
}

export interface TreeReporterOptions {
  /** Bold section headings */
  color?: boolean;
}

export class TreeReporter implements Reporter {
  private paint: ChalkInstance;

  constructor(options: TreeReporterOptions = {}) {
    this.paint = new Chalk({ level: options.color ? 1 : 0 });
  }

  generate(record: GovernanceRecord, sections: readonly string[]): string {
    const lines: string[] = [];
    const heading = (text: string): void => {
      lines.push(this.paint.bold(text));
    };

    heading(TITLE);
    lines.push('═'.repeat(TITLE.length));
    lines.push('');
    lines.push(`📁 Repository: ${record.repository.owner}/${record.repository.name}`);
    lines.push('');

    if (isSectionIncluded(sections, 'settings')) {
      const s = record.settings;
      heading('⚙️  Repository Settings');
      lines.push(`${BRANCH} Private: ${formatBoolean(s.private)}`);
      lines.push(`${BRANCH} Archived: ${formatBoolean(s.archived)}`);
      lines.push(`${BRANCH} Default Branch: ${s.defaultBranch}`);
      lines.push(`${BRANCH} Issues: ${formatBoolean(s.hasIssues)}`);
      lines.push(`${BRANCH} Projects: ${formatBoolean(s.hasProjects)}`);
      lines.push(`${BRANCH} Wiki: ${formatBoolean(s.hasWiki)}`);
      lines.push(`${BRANCH} Allow Merge Commit: ${formatBoolean(s.allowMergeCommit)}`);
      lines.push(`${BRANCH} Allow Squash Merge: ${formatBoolean(s.allowSquashMerge)}`);
      lines.push(`${BRANCH} Allow Rebase Merge: ${formatBoolean(s.allowRebaseMerge)}`);
      lines.push(`${BRANCH} Allow Auto Merge: ${formatBoolean(s.allowAutoMerge)}`);
      lines.push(`${LAST_BRANCH} Delete Branch on Merge: ${formatBoolean(s.deleteBranchOnMerge)}`);
      lines.push('');
    }

    if (isSectionIncluded(sections, 'security')) {
      const s = record.security;
      heading('🔒 Security Settings');
      lines.push(`${BRANCH} Vulnerability Alerts: ${formatBoolean(s.vulnerabilityAlerts)}`);
      lines.push(`${BRANCH} Automated Security Fixes: ${formatBoolean(s.automatedSecurityFixes)}`);
      lines.push(`${BRANCH} Secret Scanning: ${formatBoolean(s.secretScanning)}`);
      lines.push(`${BRANCH} Secret Scanning Push Protection: ${formatBoolean(s.secretScanningPushProtection)}`);
      lines.push(`${LAST_BRANCH} Dependency Graph: ${formatBoolean(s.dependencyGraphEnabled)}`);
      lines.push('');
    }

    if (record.rulesets.length > 0 && isSectionIncluded(sections, 'rulesets')) {
      heading('📜 Repository Rulesets');
      record.rulesets.forEach((ruleset, i) => {
        const count = record.rulesets.length;
        lines.push(`${connector(i, count)} ${ruleset.name} (Pattern: ${ruleset.pattern})`);
        lines.push(...this.rulesetLines(ruleset, childIndent(i, count)));
        if (i < count - 1) {
          lines.push('│');
        }
      });
      lines.push('');
    }

    if (record.collaborators.length > 0 && isSectionIncluded(sections, 'collaborators')) {
      const count = record.collaborators.length;
      heading(`👥 Collaborators (${count})`);
      record.collaborators.forEach((collaborator, i) => {
        lines.push(
          `${connector(i, count)} ${collaborator.login} (${collaborator.type}) - ${formatPermission(collaborator.permission)}`
        );
      });
      lines.push('');
    }

    if (record.teams.length > 0 && isSectionIncluded(sections, 'teams')) {
      const count = record.teams.length;
      heading(`🏢 Teams (${count})`);
      record.teams.forEach((team, i) => {
        lines.push(`${connector(i, count)} ${team.name} (@${team.slug}) - ${formatPermission(team.permission)}`);
      });
      lines.push('');
    }

    if (record.labels.length > 0 && isSectionIncluded(sections, 'labels')) {
      const count = record.labels.length;
      heading(`🏷️  Labels (${count})`);
      record.labels.forEach((label, i) => {
        const description = label.description ? ` (${label.description})` : '';
        lines.push(`${connector(i, count)} ${label.name} #${label.color}${description}`);
      });
      lines.push('');
    }

    if (record.milestones.length > 0 && isSectionIncluded(sections, 'milestones')) {
      const count = record.milestones.length;
      heading(`🎯 Milestones (${count})`);
      record.milestones.forEach((milestone, i) => {
        const due = milestone.dueOn ? ` (Due: ${milestone.dueOn})` : '';
        lines.push(`${connector(i, count)} ${MILESTONE_STATE_ICONS[milestone.state]} ${milestone.title}${due}`);
        if (milestone.description) {
          lines.push(`${childIndent(i, count)}${milestone.description}`);
        }
      });
      lines.push('');
    }

    return `${lines.join('\n')}\n`;
  }

  private rulesetLines(ruleset: Ruleset, indent: string): string[] {
    const lines = [
      `${indent}${BRANCH} Enforce Admins: ${formatBoolean(ruleset.enforceAdmins)}`,
      `${indent}${BRANCH} Require PR Reviews: ${formatBoolean(ruleset.requiredPullRequestReviews)}`,
    ];

    if (ruleset.requiredPullRequestReviews) {
      const nested = `${indent}${PIPE}`;
      lines.push(`${nested}${BRANCH} Required Approving Reviews: ${ruleset.requiredApprovingReviewCount}`);
      lines.push(`${nested}${BRANCH} Dismiss Stale Reviews: ${formatBoolean(ruleset.dismissStaleReviews)}`);
      lines.push(`${nested}${LAST_BRANCH} Require Code Owner Reviews: ${formatBoolean(ruleset.requireCodeOwnerReviews)}`);
    }

    lines.push(`${indent}${BRANCH} Required Linear History: ${formatBoolean(ruleset.requiredLinearHistory)}`);
    lines.push(`${indent}${BRANCH} Allow Force Pushes: ${formatBoolean(ruleset.allowForcePushes)}`);
    lines.push(`${indent}${BRANCH} Allow Deletions: ${formatBoolean(ruleset.allowDeletions)}`);
    lines.push(
      `${indent}${BRANCH} Require Conversation Resolution: ${formatBoolean(ruleset.requiredConversationResolution)}`
    );

    const checks = ruleset.requiredStatusChecks;
    if (checks.length === 0) {
      lines.push(`${indent}${LAST_BRANCH} Required Status Checks: None`);
    } else {
      lines.push(`${indent}${LAST_BRANCH} Required Status Checks:`);
      checks.forEach((check, j) => {
        lines.push(`${indent}${SPACE}${connector(j, checks.length)} ${check}`);
      });
    }

    return lines;
  }
}
