/**
 * Settings collector - repository-level configuration flags
 */

import type { RepositorySettings } from '../types.js';
import { repositoryResponseSchema, type RepositoryResponse } from './schemas.js';
import { repositoryPath, type Collector } from './types.js';

export function mapRepositorySettings(response: RepositoryResponse): RepositorySettings {
  return {
    private: response.private,
    archived: response.archived ?? false,
    disabled: response.disabled ?? false,
    defaultBranch: response.default_branch,
    allowMergeCommit: response.allow_merge_commit ?? false,
    allowSquashMerge: response.allow_squash_merge ?? false,
    allowRebaseMerge: response.allow_rebase_merge ?? false,
    allowAutoMerge: response.allow_auto_merge ?? false,
    deleteBranchOnMerge: response.delete_branch_on_merge ?? false,
    hasIssues: response.has_issues ?? false,
    hasProjects: response.has_projects ?? false,
    hasWiki: response.has_wiki ?? false,
    hasDownloads: response.has_downloads ?? false,
  };
}

export const collectSettings: Collector<'settings'> = async (client, repository) => {
  const response = repositoryResponseSchema.parse(await client.get(repositoryPath(repository)));
  return mapRepositorySettings(response);
};
