/**
 * Governance Inspector - runs the facet collectors for one repository
 *
 * Collectors run one after another in a fixed order. A failing collector
 * never aborts the inspection: its facet keeps the zero value, the failure
 * is logged as a warning and recorded in the outcome list.
 */

import { defaultCollectors, type CollectorRegistry } from '../collectors/index.js';
import { toError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { HostingClient } from '../providers/github.js';
import { isSectionIncluded } from '../sections.js';
import {
  createGovernanceRecord,
  type CollectorOutcome,
  type GovernanceRecord,
  type InspectionResult,
  type RepositoryIdentity,
  type SectionName,
} from '../types.js';

/** Settings come first and ignore the filter: they are baseline repository information */
export const COLLECTION_ORDER: readonly SectionName[] = [
  'settings',
  'rulesets',
  'collaborators',
  'teams',
  'security',
  'labels',
  'milestones',
];

const UNFILTERED_SECTIONS: ReadonlySet<SectionName> = new Set<SectionName>(['settings']);

const FACET_LABELS: Record<SectionName, string> = {
  settings: 'repository settings',
  rulesets: 'rulesets',
  collaborators: 'collaborators',
  teams: 'teams',
  security: 'security settings',
  labels: 'labels',
  milestones: 'milestones',
};

export interface GovernanceInspectorOptions {
  client: HostingClient;
  logger?: Logger;
  collectors?: Partial<CollectorRegistry>;
}

export class GovernanceInspector {
  private client: HostingClient;
  private logger: Logger;
  private collectors: CollectorRegistry;

  constructor(options: GovernanceInspectorOptions) {
    this.client = options.client;
    this.logger = options.logger ?? silentLogger;
    this.collectors = { ...defaultCollectors, ...options.collectors };
  }

  async inspect(repository: RepositoryIdentity, sections: readonly string[]): Promise<InspectionResult> {
    const record = createGovernanceRecord(repository);
    const outcomes: CollectorOutcome[] = [];

    for (const section of COLLECTION_ORDER) {
      if (!UNFILTERED_SECTIONS.has(section) && !isSectionIncluded(sections, section)) {
        outcomes.push({ section, status: 'skipped' });
        continue;
      }
      outcomes.push(await this.runCollector(section, record));
    }

    const collected = outcomes.filter((outcome) => outcome.status === 'collected').length;
    const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
    this.logger.debug(`Collected ${collected} of ${outcomes.length} sections, ${failed} failed`);

    return { record, outcomes };
  }

  private async runCollector<K extends SectionName>(section: K, record: GovernanceRecord): Promise<CollectorOutcome> {
    const collect = this.collectors[section];
    try {
      // Assigned only once the facet is complete, so a failure leaves the zero value
      await collect(this.client, record.repository).then((value) => {
        record[section] = value;
      });
      return { section, status: 'collected' };
    } catch (err) {
      const error = toError(err);
      this.logger.warn(`failed to get ${FACET_LABELS[section]}: ${error.message}`);
      return { section, status: 'failed', error };
    }
  }
}

export function createGovernanceInspector(options: GovernanceInspectorOptions): GovernanceInspector {
  return new GovernanceInspector(options);
}
