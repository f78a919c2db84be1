import { collectCollaborators, collectTeams } from './access.js';
import { collectLabels, collectMilestones } from './issues.js';
import { collectRulesets } from './rulesets.js';
import { collectSecurity } from './security.js';
import { collectSettings } from './settings.js';
import type { CollectorRegistry } from './types.js';

export type { Collector, CollectorRegistry } from './types.js';
export { repositoryPath } from './types.js';
export { mapRepositorySettings } from './settings.js';
export { mapRuleset } from './rulesets.js';
export { mapCollaborator, normalizePermission } from './access.js';

export const defaultCollectors: CollectorRegistry = {
  settings: collectSettings,
  security: collectSecurity,
  rulesets: collectRulesets,
  collaborators: collectCollaborators,
  teams: collectTeams,
  labels: collectLabels,
  milestones: collectMilestones,
};
