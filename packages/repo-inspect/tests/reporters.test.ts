/**
 * Reporter tests - JSON, YAML and tree output
 */

import { describe, it, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { EncodingError, UnsupportedFormatError } from '../src/errors.js';
import {
  JsonReporter,
  TreeReporter,
  YamlReporter,
  formatBoolean,
  formatPermission,
  parseOutputFormat,
  render,
} from '../src/reporters/index.js';
import { createGovernanceRecord, type GovernanceRecord, type RepositoryIdentity } from '../src/types.js';
import { expectedRecord } from './helpers.js';

const identity = { owner: 'octo-org', name: 'widgets' };

const TITLE_LINES = ['Repository Governance Report', '═'.repeat(28), '', '📁 Repository: octo-org/widgets', ''];

const expectedDocument = {
  repository: { owner: 'octo-org', name: 'widgets' },
  rulesets: [
    {
      name: 'main protection',
      pattern: '~DEFAULT_BRANCH',
      enforce_admins: true,
      required_status_checks: ['ci/build', 'ci/test'],
      required_pull_request_reviews: true,
      required_approving_review_count: 2,
      dismiss_stale_reviews: true,
      require_code_owner_reviews: true,
      required_linear_history: true,
      allow_force_pushes: false,
      allow_deletions: false,
      required_conversation_resolution: true,
    },
    {
      name: 'feature branches',
      pattern: 'refs/heads/feature/*',
      enforce_admins: false,
      required_pull_request_reviews: false,
      required_approving_review_count: 0,
      dismiss_stale_reviews: false,
      require_code_owner_reviews: false,
      required_linear_history: false,
      allow_force_pushes: true,
      allow_deletions: true,
      required_conversation_resolution: false,
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
  security_settings: {
    vulnerability_alerts: true,
    automated_security_fixes: true,
    secret_scanning: true,
    secret_scanning_push_protection: false,
    dependency_graph_enabled: true,
  },
  repository_settings: {
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
  },
  issue_labels: [
    { name: 'bug', color: 'd73a4a', description: "Something isn't working" },
    { name: 'chore', color: 'cfd3d7' },
  ],
  milestones: [
    { title: 'v1.0', description: 'First stable release', state: 'open', due_on: '2025-06-30T07:00:00Z' },
    { title: 'v0.9', state: 'closed' },
  ],
};

describe('JSON Reporter', () => {
  it('should serialize every populated field', () => {
    const output = new JsonReporter().generate(expectedRecord());
    expect(JSON.parse(output)).toEqual(expectedDocument);
  });

  it('should keep a stable key order', () => {
    const parsed: unknown = JSON.parse(new JsonReporter().generate(expectedRecord()));
    expect(Object.keys(parsed ?? {})).toEqual([
      'repository',
      'rulesets',
      'collaborators',
      'teams',
      'security_settings',
      'repository_settings',
      'issue_labels',
      'milestones',
    ]);
  });

  it('should indent with two spaces and end with a newline', () => {
    const output = new JsonReporter().generate(createGovernanceRecord(identity));
    expect(output.startsWith('{\n  "repository": {\n    "owner": "octo-org",\n    "name": "widgets"\n  },\n')).toBe(
      true
    );
    expect(output.endsWith('}\n')).toBe(true);
  });

  it('should leave out empty sequences instead of writing [] or null', () => {
    const parsed: unknown = JSON.parse(new JsonReporter().generate(createGovernanceRecord(identity)));
    expect(Object.keys(parsed ?? {})).toEqual(['repository', 'security_settings', 'repository_settings']);
  });

  it('should leave out an empty status check list inside a ruleset', () => {
    const output = new JsonReporter().generate(expectedRecord());
    const document = JSON.parse(output);
    expect(document.rulesets[1]).not.toHaveProperty('required_status_checks');
  });
});

describe('YAML Reporter', () => {
  it('should encode the same document as JSON', () => {
    const output = new YamlReporter().generate(expectedRecord());
    expect(parseYaml(output)).toEqual(expectedDocument);
  });

  it('should leave out empty sequences', () => {
    const output = new YamlReporter().generate(createGovernanceRecord(identity));
    expect(Object.keys(parseYaml(output))).toEqual(['repository', 'security_settings', 'repository_settings']);
    expect(output).not.toContain('rulesets');
    expect(output).not.toContain('[]');
  });

  it('should start with the repository identity', () => {
    const output = new YamlReporter().generate(createGovernanceRecord(identity));
    expect(output.startsWith('repository:\n  owner: octo-org\n  name: widgets\n')).toBe(true);
  });
});

describe('Tree Reporter', () => {
  const tree = new TreeReporter();

  it('should draw rulesets with nested review fields and status checks', () => {
    const output = tree.generate(expectedRecord(), ['rulesets']);
    expect(output).toBe(
      [
        ...TITLE_LINES,
        '📜 Repository Rulesets',
        '├─ main protection (Pattern: ~DEFAULT_BRANCH)',
        '│  ├─ Enforce Admins: ✅',
        '│  ├─ Require PR Reviews: ✅',
        '│  │  ├─ Required Approving Reviews: 2',
        '│  │  ├─ Dismiss Stale Reviews: ✅',
        '│  │  └─ Require Code Owner Reviews: ✅',
        '│  ├─ Required Linear History: ✅',
        '│  ├─ Allow Force Pushes: ❌',
        '│  ├─ Allow Deletions: ❌',
        '│  ├─ Require Conversation Resolution: ✅',
        '│  └─ Required Status Checks:',
        '│     ├─ ci/build',
        '│     └─ ci/test',
        '│',
        '└─ feature branches (Pattern: refs/heads/feature/*)',
        '   ├─ Enforce Admins: ❌',
        '   ├─ Require PR Reviews: ❌',
        '   ├─ Required Linear History: ❌',
        '   ├─ Allow Force Pushes: ✅',
        '   ├─ Allow Deletions: ✅',
        '   ├─ Require Conversation Resolution: ❌',
        '   └─ Required Status Checks: None',
        '',
      ].join('\n') + '\n'
    );
  });

  it('should not expand review fields when reviews are not required', () => {
    const record: GovernanceRecord = {
      ...createGovernanceRecord(identity),
      rulesets: expectedRecord().rulesets.filter((ruleset) => !ruleset.requiredPullRequestReviews),
    };
    const lines = tree.generate(record, []).split('\n');
    expect(lines).toContain('   ├─ Require PR Reviews: ❌');
    expect(lines.some((line) => line.includes('Required Approving Reviews'))).toBe(false);
    expect(lines.some((line) => line.includes('Dismiss Stale Reviews'))).toBe(false);
    expect(lines.some((line) => line.includes('Require Code Owner Reviews'))).toBe(false);
  });

  it('should render only the header and the filtered fixed sections for an empty record', () => {
    const output = tree.generate(createGovernanceRecord(identity), ['security']);
    expect(output).toBe(
      [
        ...TITLE_LINES,
        '🔒 Security Settings',
        '├─ Vulnerability Alerts: ❌',
        '├─ Automated Security Fixes: ❌',
        '├─ Secret Scanning: ❌',
        '├─ Secret Scanning Push Protection: ❌',
        '└─ Dependency Graph: ❌',
        '',
      ].join('\n') + '\n'
    );
  });

  it('should skip list sections that have no entries', () => {
    const output = tree.generate(createGovernanceRecord(identity), []);
    expect(output).toContain('⚙️  Repository Settings');
    expect(output).toContain('🔒 Security Settings');
    expect(output).not.toContain('📜 Repository Rulesets');
    expect(output).not.toContain('👥 Collaborators');
    expect(output).not.toContain('🏢 Teams');
    expect(output).not.toContain('🏷️  Labels');
    expect(output).not.toContain('🎯 Milestones');
  });

  it('should render settings values', () => {
    const lines = tree.generate(expectedRecord(), ['settings']).split('\n');
    expect(lines.slice(5, 17)).toEqual([
      '⚙️  Repository Settings',
      '├─ Private: ❌',
      '├─ Archived: ❌',
      '├─ Default Branch: main',
      '├─ Issues: ✅',
      '├─ Projects: ❌',
      '├─ Wiki: ❌',
      '├─ Allow Merge Commit: ✅',
      '├─ Allow Squash Merge: ✅',
      '├─ Allow Rebase Merge: ❌',
      '├─ Allow Auto Merge: ❌',
      '└─ Delete Branch on Merge: ✅',
    ]);
  });

  it('should render collaborators and teams with permission icons', () => {
    const output = tree.generate(expectedRecord(), ['collaborators', 'teams']);
    expect(output).toContain(
      [
        '👥 Collaborators (2)',
        '├─ maintainer1 (User) - 👑 admin',
        '└─ deploy-bot (Bot) - ✏️ write',
        '',
        '🏢 Teams (3)',
        '├─ Core Team (@core-team) - 👑 admin',
        '├─ Contributors (@contributors) - ✏️ write',
        '└─ Reviewers (@reviewers) - 🏷️ triage',
      ].join('\n')
    );
  });

  it('should append label descriptions in parentheses', () => {
    const lines = tree.generate(expectedRecord(), ['labels']).split('\n');
    expect(lines).toContain('🏷️  Labels (2)');
    expect(lines).toContain("├─ bug #d73a4a (Something isn't working)");
    expect(lines).toContain('└─ chore #cfd3d7');
  });

  it('should render milestone state, due date and description', () => {
    const lines = tree.generate(expectedRecord(), ['milestones']).split('\n');
    const start = lines.indexOf('🎯 Milestones (2)');
    expect(lines.slice(start, start + 4)).toEqual([
      '🎯 Milestones (2)',
      '├─ 🟢 v1.0 (Due: 2025-06-30T07:00:00Z)',
      '│  First stable release',
      '└─ 🔴 v0.9',
    ]);
  });

  it('should omit the due suffix for a closed milestone without a due date', () => {
    const record: GovernanceRecord = {
      ...createGovernanceRecord(identity),
      milestones: [{ title: 'Legacy cleanup', state: 'closed' }],
    };
    const lines = tree.generate(record, []).split('\n');
    expect(lines).toContain('└─ 🔴 Legacy cleanup');
    expect(lines.some((line) => line.includes('(Due:'))).toBe(false);
  });

  it('should bold headings when colour is on', () => {
    const output = new TreeReporter({ color: true }).generate(createGovernanceRecord(identity), ['security']);
    expect(output).toContain('\u001b[1mRepository Governance Report\u001b[22m');
    expect(output).toContain('\u001b[1m🔒 Security Settings\u001b[22m');
  });
});

describe('Formatting helpers', () => {
  it('should render booleans as fixed glyphs', () => {
    expect(formatBoolean(true)).toBe('✅');
    expect(formatBoolean(false)).toBe('❌');
  });

  it('should render known permissions through the icon table', () => {
    expect(formatPermission('admin')).toBe('👑 admin');
    expect(formatPermission('maintain')).toBe('🔧 maintain');
    expect(formatPermission('write')).toBe('✏️ write');
    expect(formatPermission('triage')).toBe('🏷️ triage');
    expect(formatPermission('read')).toBe('👀 read');
  });

  it('should use the default icon for unknown permissions', () => {
    expect(formatPermission('security-manager')).toBe('❔ security-manager');
  });
});

describe('render', () => {
  it('should match format names case-insensitively', () => {
    expect(parseOutputFormat('JSON')).toBe('json');
    expect(parseOutputFormat('Yml')).toBe('yaml');
    expect(parseOutputFormat('yaml')).toBe('yaml');
    expect(parseOutputFormat('TABLE')).toBe('table');
  });

  it('should reject unsupported formats, naming the value', () => {
    expect(() => render(expectedRecord(), 'xml', [])).toThrow(UnsupportedFormatError);
    expect(() => render(expectedRecord(), 'xml', [])).toThrow('"xml"');
  });

  it('should pass the section filter to the tree only', () => {
    const table = render(expectedRecord(), 'table', ['labels']);
    expect(table).not.toContain('Repository Settings');

    const json = JSON.parse(render(expectedRecord(), 'json', ['labels']));
    expect(json).toEqual(expectedDocument);
  });

  it('should wrap encoder failures', () => {
    const broken: GovernanceRecord = {
      ...createGovernanceRecord(identity),
      get repository(): RepositoryIdentity {
        throw new Error('boom');
      },
    };
    expect(() => render(broken, 'json', [])).toThrow(EncodingError);
    expect(() => render(broken, 'json', [])).toThrow('failed to encode json output: boom');
  });
});
