/**
 * Access collectors - direct collaborators and teams
 */

import type { Collaborator, PermissionLevel, Team } from '../types.js';
import { collaboratorListSchema, teamListSchema, type CollaboratorResponse } from './schemas.js';
import { repositoryPath, type Collector } from './types.js';

/** Team permissions use the legacy pull/push names */
const LEGACY_PERMISSIONS: Record<string, PermissionLevel> = {
  pull: 'read',
  push: 'write',
};

export function normalizePermission(permission: string): string {
  return LEGACY_PERMISSIONS[permission] ?? permission;
}

function highestPermission(permissions: CollaboratorResponse['permissions']): string {
  if (!permissions) return 'read';
  if (permissions.admin) return 'admin';
  if (permissions.maintain) return 'maintain';
  if (permissions.push) return 'write';
  if (permissions.triage) return 'triage';
  return 'read';
}

export function mapCollaborator(response: CollaboratorResponse): Collaborator {
  return {
    login: response.login,
    permission: response.role_name ?? highestPermission(response.permissions),
    type: response.type,
  };
}

export const collectCollaborators: Collector<'collaborators'> = async (client, repository) => {
  const response = collaboratorListSchema.parse(
    await client.get(`${repositoryPath(repository)}/collaborators?per_page=100`)
  );
  return response.map(mapCollaborator);
};

export const collectTeams: Collector<'teams'> = async (client, repository) => {
  const response = teamListSchema.parse(await client.get(`${repositoryPath(repository)}/teams?per_page=100`));
  return response.map(
    (team): Team => ({
      name: team.name,
      slug: team.slug,
      permission: normalizePermission(team.permission),
    })
  );
};
