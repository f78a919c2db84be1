/**
 * Collector contract
 */

import type { HostingClient } from '../providers/github.js';
import type { GovernanceRecord, RepositoryIdentity, SectionName } from '../types.js';

/**
 * Fetches one facet. Resolves with the complete facet value or rejects;
 * the inspector only writes the value into the record on success.
 */
export type Collector<K extends SectionName> = (
  client: HostingClient,
  repository: RepositoryIdentity
) => Promise<GovernanceRecord[K]>;

export type CollectorRegistry = { [K in SectionName]: Collector<K> };

export function repositoryPath(repository: RepositoryIdentity): string {
  return `repos/${encodeURIComponent(repository.owner)}/${encodeURIComponent(repository.name)}`;
}
