/**
 * GitHub Provider - Read-only REST access for the collectors
 */

import { Octokit } from '@octokit/rest';
import { HostingApiError, toError } from '../errors.js';
import { DEFAULT_API_URL } from '../types.js';

/**
 * The only capability collectors need from the hosting service: fetch the
 * JSON at an endpoint, or check whether an endpoint answers at all.
 */
export interface HostingClient {
  /** GET the endpoint (relative to the API root) and return the decoded body */
  get(endpoint: string): Promise<unknown>;
  /** true on a 2xx answer, false on 404; every other failure is thrown */
  probe(endpoint: string): Promise<boolean>;
}

export interface GitHubClientConfig {
  token?: string | undefined;
  apiUrl?: string | undefined;
  userAgent?: string | undefined;
}

const API_VERSION = '2022-11-28';

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class GitHubClient implements HostingClient {
  private octokit: Octokit;

  constructor(config: GitHubClientConfig = {}) {
    this.octokit = new Octokit({
      auth: config.token,
      baseUrl: config.apiUrl ?? DEFAULT_API_URL,
      userAgent: config.userAgent ?? 'repo-inspect',
    });
  }

  async get(endpoint: string): Promise<unknown> {
    try {
      const { data } = await this.octokit.request(`GET /${endpoint}`, {
        headers: { 'x-github-api-version': API_VERSION },
      });
      return data;
    } catch (error) {
      throw new HostingApiError(endpoint, statusOf(error), toError(error).message);
    }
  }

  async probe(endpoint: string): Promise<boolean> {
    try {
      await this.octokit.request(`GET /${endpoint}`, {
        headers: { 'x-github-api-version': API_VERSION },
      });
      return true;
    } catch (error) {
      const status = statusOf(error);
      if (status === 404) {
        return false;
      }
      throw new HostingApiError(endpoint, status, toError(error).message);
    }
  }
}

export function createGitHubClient(config: GitHubClientConfig): GitHubClient {
  return new GitHubClient(config);
}
