/**
 * GitHub Operations
 *
 * Wrapper around Octokit for the repository calls onboarding needs
 */

import { Octokit } from '@octokit/rest';
import { errorMessage, errorStatus, logger } from '../utils';

export interface HostedRepository {
  name: string;
  owner: string;
  cloneUrl: string;
  htmlUrl: string;
  defaultBranch: string;
}

export interface CreateRepositoryParams {
  owner: string;
  name: string;
  description: string;
  private: boolean;
  /** Create under an organization instead of the authenticated user. */
  organization: boolean;
}

export type CreateRepositoryOutcome =
  | { status: 'created'; repository: HostedRepository }
  | { status: 'exists' };

/**
 * The repository calls the provisioner and cleanup depend on.
 */
export interface RepositoryHost {
  /** Resolves null when the repository does not exist. */
  getRepository(owner: string, name: string): Promise<HostedRepository | null>;
  createRepository(params: CreateRepositoryParams): Promise<CreateRepositoryOutcome>;
  /** Login of the account the token belongs to. */
  authenticatedLogin(): Promise<string>;
  /** Resolves false when there was nothing to delete. */
  deleteRepository(owner: string, name: string): Promise<boolean>;
}

export interface GitHubOperationsOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
}

interface RepositoryData {
  name: string;
  owner: { login: string };
  clone_url: string;
  html_url: string;
  default_branch?: string;
}

function toHostedRepository(data: RepositoryData): HostedRepository {
  return {
    name: data.name,
    owner: data.owner.login,
    cloneUrl: data.clone_url,
    htmlUrl: data.html_url,
    defaultBranch: data.default_branch || 'main',
  };
}

/**
 * A 422 from repository creation whose body says the name is taken.
 */
export function isNameTakenError(error: unknown): boolean {
  if (errorStatus(error) !== 422) {
    return false;
  }
  let body = errorMessage(error);
  if (typeof error === 'object' && error !== null && 'response' in error) {
    body += JSON.stringify(error.response ?? {});
  }
  return /already exists/i.test(body);
}

export class GitHubOperations implements RepositoryHost {
  private octokit: Octokit;
  private timeoutMs: number;

  constructor(options: GitHubOperationsOptions) {
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: 'gitops-onboard',
    });
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private requestOptions() {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }

  async authenticatedLogin(): Promise<string> {
    const { data } = await this.octokit.rest.users.getAuthenticated({ request: this.requestOptions() });
    return data.login;
  }

  /**
   * Get repository information
   */
  async getRepository(owner: string, name: string): Promise<HostedRepository | null> {
    logger.debug(`Getting repository ${owner}/${name}`);

    try {
      const { data } = await this.octokit.rest.repos.get({
        owner,
        repo: name,
        request: this.requestOptions(),
      });
      return toHostedRepository(data);
    } catch (error) {
      if (errorStatus(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Create a repository seeded with an initial commit on the default branch
   */
  async createRepository(params: CreateRepositoryParams): Promise<CreateRepositoryOutcome> {
    logger.info(`Creating repository ${params.owner}/${params.name}`, {
      private: params.private,
      organization: params.organization,
    });

    try {
      const body = {
        name: params.name,
        description: params.description,
        private: params.private,
        auto_init: true,
        request: this.requestOptions(),
      };
      const { data } = params.organization
        ? await this.octokit.rest.repos.createInOrg({ org: params.owner, ...body })
        : await this.octokit.rest.repos.createForAuthenticatedUser(body);
      return { status: 'created', repository: toHostedRepository(data) };
    } catch (error) {
      if (isNameTakenError(error)) {
        return { status: 'exists' };
      }
      throw error;
    }
  }

  /**
   * Delete a repository
   */
  async deleteRepository(owner: string, name: string): Promise<boolean> {
    logger.info(`Deleting repository ${owner}/${name}`);

    try {
      await this.octokit.rest.repos.delete({ owner, repo: name, request: this.requestOptions() });
      return true;
    } catch (error) {
      if (errorStatus(error) === 404) {
        return false;
      }
      throw error;
    }
  }
}
