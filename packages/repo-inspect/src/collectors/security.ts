/**
 * Security collector
 *
 * Combines the repository's security_and_analysis block with the
 * vulnerability-alert, automated-fix and dependency-graph endpoints.
 */

import type { SecuritySettings } from '../types.js';
import { automatedSecurityFixesSchema, repositoryResponseSchema } from './schemas.js';
import { repositoryPath, type Collector } from './types.js';

function isEnabled(feature: { status: string } | null | undefined): boolean {
  return feature?.status === 'enabled';
}

export const collectSecurity: Collector<'security'> = async (client, repository) => {
  const base = repositoryPath(repository);

  const response = repositoryResponseSchema.parse(await client.get(base));
  const analysis = response.security_and_analysis;

  const vulnerabilityAlerts = await client.probe(`${base}/vulnerability-alerts`);

  // Automated fixes cannot be on without alerts, and the endpoint 404s then
  let automatedSecurityFixes = false;
  if (vulnerabilityAlerts) {
    const fixes = automatedSecurityFixesSchema.parse(await client.get(`${base}/automated-security-fixes`));
    automatedSecurityFixes = fixes.enabled;
  }

  const dependencyGraphEnabled = await client.probe(`${base}/dependency-graph/sbom`);

  const settings: SecuritySettings = {
    vulnerabilityAlerts,
    automatedSecurityFixes,
    secretScanning: isEnabled(analysis?.secret_scanning),
    secretScanningPushProtection: isEnabled(analysis?.secret_scanning_push_protection),
    dependencyGraphEnabled,
  };
  return settings;
};
