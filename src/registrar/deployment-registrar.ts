/**
 * Deployment Registrar
 *
 * Applies the Argo CD Application that points the cluster at the config
 * repository. One attempt; the controller retries syncs on its own.
 */

import { RegistrationError, err, logger, ok, type Result } from '../utils';
import type { ArgoCDConfig } from '../config/schema';
import type { AppIdentifier } from '../generator/name-extractor';
import type { RepositoryRef } from '../provisioner/repository-provisioner';
import type { ClusterClient } from '../tools/k8s-ops';
import { buildDescriptor, serializeDescriptor, type DeploymentDescriptor } from './descriptor';

export class DeploymentRegistrar {
  constructor(
    private cluster: ClusterClient,
    private argocd: ArgoCDConfig
  ) {}

  async register(
    appId: AppIdentifier,
    configRepo: Pick<RepositoryRef, 'cloneUrl'>
  ): Promise<Result<DeploymentDescriptor, RegistrationError>> {
    const descriptor = buildDescriptor(appId, configRepo.cloneUrl, this.argocd);
    const manifest = serializeDescriptor(descriptor);

    logger.debug(`Applying Application ${descriptor.name}`, { namespace: descriptor.namespace });
    const result = await this.cluster.apply({ manifest });

    if (!result.success) {
      const stderr = result.error || `kubectl exited with code ${result.exitCode}`;
      return err(
        new RegistrationError(`Applying Application ${descriptor.name} failed: ${stderr}`, descriptor.name, {
          namespace: descriptor.namespace,
          exitCode: result.exitCode,
          stderr,
        })
      );
    }

    logger.info(`Registered Application ${descriptor.name} in namespace ${descriptor.namespace}`);
    return ok(descriptor);
  }
}
