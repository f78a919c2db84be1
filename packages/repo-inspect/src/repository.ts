/**
 * Repository identity resolution
 *
 * Either from the owner/repo argument, or - when it is omitted - from
 * GH_REPO or the git remotes of the working directory.
 */

import { simpleGit } from 'simple-git';
import { RepositoryArgumentError, RepositoryResolutionError, toError } from './errors.js';
import type { RepositoryIdentity } from './types.js';

export interface GitRemote {
  name: string;
  url: string;
}

/** Lists the remotes of the repository at cwd */
export type RemoteLister = (cwd: string) => Promise<GitRemote[]>;

export interface ResolveRepositoryOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  listRemotes?: RemoteLister;
}

/**
 * Parse "owner/repo". Exactly one slash, both halves non-empty.
 */
export function parseRepositoryArgument(value: string): RepositoryIdentity {
  const parts = value.split('/');
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name) {
    throw new RepositoryArgumentError(value);
  }
  return { owner, name };
}

/** GH_REPO may carry a leading host: [HOST/]OWNER/REPO */
function stripHost(value: string): string {
  const parts = value.split('/');
  return parts.length === 3 && parts[0] ? parts.slice(1).join('/') : value;
}

const REMOTE_PATTERNS: RegExp[] = [
  // https://github.com/owner/repo.git, ssh://git@github.com/owner/repo.git
  /^(?:https?|ssh|git):\/\/(?:[^@/]+@)?[^/]+\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/,
  // git@github.com:owner/repo.git
  /^[^@/]+@[^:/]+:([^/]+)\/([^/]+?)(?:\.git)?\/?$/,
];

/**
 * Extract owner/repo from a remote URL, or null when it has another shape.
 */
export function parseRemoteUrl(url: string): RepositoryIdentity | null {
  const trimmed = url.trim();
  for (const pattern of REMOTE_PATTERNS) {
    const match = pattern.exec(trimmed);
    const owner = match?.[1];
    const name = match?.[2];
    if (owner && name) {
      return { owner, name };
    }
  }
  return null;
}

export const listGitRemotes: RemoteLister = async (cwd) => {
  const git = simpleGit(cwd);
  const remotes = await git.getRemotes(true);
  return remotes.map((remote) => ({ name: remote.name, url: remote.refs.fetch || remote.refs.push }));
};

export async function resolveCurrentRepository(options: ResolveRepositoryOptions = {}): Promise<RepositoryIdentity> {
  const env = options.env ?? process.env;

  const fromEnv = env['GH_REPO'];
  if (fromEnv) {
    try {
      return parseRepositoryArgument(stripHost(fromEnv));
    } catch (error) {
      throw new RepositoryResolutionError(`GH_REPO is not in format '[host/]owner/repo': ${fromEnv}`, toError(error));
    }
  }

  const cwd = options.cwd ?? process.cwd();
  const listRemotes = options.listRemotes ?? listGitRemotes;

  let remotes: GitRemote[];
  try {
    remotes = await listRemotes(cwd);
  } catch (error) {
    throw new RepositoryResolutionError(`could not read git remotes in ${cwd}`, toError(error));
  }

  const ordered = [
    ...remotes.filter((remote) => remote.name === 'origin'),
    ...remotes.filter((remote) => remote.name !== 'origin'),
  ];
  for (const remote of ordered) {
    const identity = parseRemoteUrl(remote.url);
    if (identity) {
      return identity;
    }
  }

  throw new RepositoryResolutionError(
    remotes.length === 0 ? `no git remotes configured in ${cwd}` : 'no git remote points at a hosted repository'
  );
}
