/**
 * Removes what a run left behind: the Argo CD Application and both
 * repositories. Each artifact is handled independently so one failure
 * does not stop the rest.
 */

import { errorMessage, logger } from '../utils';
import type { AppIdentifier } from '../generator/name-extractor';
import { repositoryNames } from '../provisioner/repository-provisioner';
import type { RepositoryHost } from '../tools/github-ops';
import type { ClusterClient } from '../tools/k8s-ops';

export type ArtifactKind = 'application' | 'repository';

export type ArtifactOutcome = 'planned' | 'deleted' | 'absent' | 'failed';

export interface ArtifactResult {
  kind: ArtifactKind;
  name: string;
  outcome: ArtifactOutcome;
  error?: string;
}

export interface CleanupReport {
  appIdentifier: AppIdentifier;
  dryRun: boolean;
  artifacts: ArtifactResult[];
}

export interface CleanupOptions {
  owner: string;
  argocdNamespace: string;
}

export class OnboardingCleanup {
  constructor(
    private host: Pick<RepositoryHost, 'deleteRepository'>,
    private cluster: Pick<ClusterClient, 'delete'>,
    private options: CleanupOptions
  ) {}

  /** What `cleanup` would delete, without touching anything. */
  plan(appId: AppIdentifier): CleanupReport {
    const names = repositoryNames(appId);
    return {
      appIdentifier: appId,
      dryRun: true,
      artifacts: [
        { kind: 'application', name: `${this.options.argocdNamespace}/${appId}`, outcome: 'planned' },
        { kind: 'repository', name: `${this.options.owner}/${names.source}`, outcome: 'planned' },
        { kind: 'repository', name: `${this.options.owner}/${names.config}`, outcome: 'planned' },
      ],
    };
  }

  async cleanup(appId: AppIdentifier): Promise<CleanupReport> {
    const names = repositoryNames(appId);
    // Application first so the controller stops syncing from the config repo
    const artifacts: ArtifactResult[] = [
      await this.deleteApplication(appId),
      await this.deleteRepository(names.source),
      await this.deleteRepository(names.config),
    ];

    const failed = artifacts.filter(artifact => artifact.outcome === 'failed').length;
    if (failed > 0) {
      logger.warn(`Cleanup of ${appId} left ${failed} artifact(s) in place`, { appId });
    } else {
      logger.info(`Cleanup of ${appId} finished`, { appId });
    }

    return { appIdentifier: appId, dryRun: false, artifacts };
  }

  private async deleteApplication(appId: AppIdentifier): Promise<ArtifactResult> {
    const name = `${this.options.argocdNamespace}/${appId}`;
    const result = await this.cluster.delete({
      resource: 'application',
      name: appId,
      namespace: this.options.argocdNamespace,
      ignoreNotFound: true,
    });

    if (!result.success) {
      return { kind: 'application', name, outcome: 'failed', error: result.error || `exit code ${result.exitCode}` };
    }
    // --ignore-not-found prints nothing when there was nothing to delete
    return { kind: 'application', name, outcome: result.output === '' ? 'absent' : 'deleted' };
  }

  private async deleteRepository(repo: string): Promise<ArtifactResult> {
    const name = `${this.options.owner}/${repo}`;
    try {
      const deleted = await this.host.deleteRepository(this.options.owner, repo);
      return { kind: 'repository', name, outcome: deleted ? 'deleted' : 'absent' };
    } catch (error) {
      logger.error(`Deleting repository ${name} failed`, { error: errorMessage(error) });
      return { kind: 'repository', name, outcome: 'failed', error: errorMessage(error) };
    }
  }
}
