/**
 * Repository Provisioner
 *
 * Ensures the `{id}-source` and `{id}-config` repositories exist, creating
 * them when missing and reusing them when they are already there.
 */

import {
  ProvisionError,
  err,
  errorMessage,
  logger,
  ok,
  type ResolvedRepositorySummary,
  type Result,
} from '../utils';
import type { HostedRepository, RepositoryHost } from '../tools/github-ops';
import type { AppIdentifier } from '../generator/name-extractor';

export interface RepositoryRef extends HostedRepository {
  /** The repository was there before this run. */
  existed: boolean;
  /**
   * Existence was inferred from a "name already exists" creation failure;
   * the clone URL was built, not read back from the provider.
   */
  inferred: boolean;
}

export interface RepositoryPair {
  source: RepositoryRef;
  config: RepositoryRef;
}

export interface ProvisionerOptions {
  owner: string;
  ownerType: 'user' | 'org';
  privateRepos: boolean;
  /** Web root used to build inferred clone URLs. */
  webUrl: string;
}

export function repositoryNames(appId: AppIdentifier): { source: string; config: string } {
  return { source: `${appId}-source`, config: `${appId}-config` };
}

function summary(ref: RepositoryRef): ResolvedRepositorySummary {
  return { name: ref.name, cloneUrl: ref.cloneUrl };
}

export class RepositoryProvisioner {
  constructor(
    private host: RepositoryHost,
    private options: ProvisionerOptions
  ) {}

  /**
   * Resolve both repositories. Fails only when one of them can be neither
   * found nor created; the error lists whichever one did resolve.
   */
  async provision(appId: AppIdentifier): Promise<Result<RepositoryPair, ProvisionError>> {
    const names = repositoryNames(appId);
    const resolved: RepositoryRef[] = [];

    const ownerProblem = await this.checkUserOwner();
    if (ownerProblem) {
      logger.error(ownerProblem, { appId, repository: names.source });
      return err(new ProvisionError(ownerProblem, appId, names.source, []));
    }

    const plan: Array<{ name: string; description: string }> = [
      { name: names.source, description: `Source code for ${appId}` },
      { name: names.config, description: `GitOps configuration for ${appId}` },
    ];

    for (const { name, description } of plan) {
      try {
        resolved.push(await this.resolve(name, description));
      } catch (error) {
        const message =
          resolved.length > 0
            ? `Repository ${name} could not be provisioned (${errorMessage(error)}); ${resolved
                .map(ref => ref.name)
                .join(', ')} already resolved`
            : `Repository ${name} could not be provisioned: ${errorMessage(error)}`;
        logger.error(message, { appId, repository: name });
        return err(new ProvisionError(message, appId, name, resolved.map(summary), error));
      }
    }

    const [source, config] = resolved;
    return ok({ source, config });
  }

  /**
   * User repositories are created under the token's account, so lookups
   * by the configured owner only find them when the two are the same.
   */
  private async checkUserOwner(): Promise<string | undefined> {
    if (this.options.ownerType !== 'user') {
      return undefined;
    }
    let login: string;
    try {
      login = await this.host.authenticatedLogin();
    } catch (error) {
      return `Could not resolve the account behind the GitHub token: ${errorMessage(error)}`;
    }
    if (login.toLowerCase() !== this.options.owner.toLowerCase()) {
      return `GitHub token belongs to ${login}, not the configured owner ${this.options.owner}; set GITHUB_OWNER to ${login} or use an organization owner`;
    }
    return undefined;
  }

  /**
   * Existence check, then create, then the name-taken fallback.
   */
  private async resolve(name: string, description: string): Promise<RepositoryRef> {
    const { owner } = this.options;

    const existing = await this.host.getRepository(owner, name);
    if (existing) {
      logger.info(`Reusing existing repository ${owner}/${name}`);
      return { ...existing, existed: true, inferred: false };
    }

    const outcome = await this.host.createRepository({
      owner,
      name,
      description,
      private: this.options.privateRepos,
      organization: this.options.ownerType === 'org',
    });

    if (outcome.status === 'created') {
      logger.info(`Created repository ${outcome.repository.htmlUrl}`);
      return { ...outcome.repository, existed: false, inferred: false };
    }

    // Another creator won between the check and the create. The reference
    // is built from naming conventions and not read back.
    const htmlUrl = `${this.options.webUrl.replace(/\/+$/, '')}/${owner}/${name}`;
    logger.warn(`Repository ${owner}/${name} already exists; using inferred clone URL`, { repository: name });
    return {
      name,
      owner,
      cloneUrl: `${htmlUrl}.git`,
      htmlUrl,
      defaultBranch: 'main',
      existed: true,
      inferred: true,
    };
  }
}
