/**
 * Argo CD Application descriptor
 */

import yaml from 'js-yaml';
import type { ArgoCDConfig } from '../config/schema';
import type { AppIdentifier } from '../generator/name-extractor';

export const MANAGED_BY = 'gitops-onboard';

export interface SyncRetry {
  limit: number;
  backoff: {
    duration: string;
    factor: number;
    maxDuration: string;
  };
}

/** A field Argo CD leaves out of the diff, e.g. replicas set by an autoscaler. */
export interface IgnoredDifference {
  group: string;
  kind: string;
  jsonPointers: string[];
}

export interface DeploymentDescriptor {
  name: string;
  namespace: string;
  project: string;
  labels: Record<string, string>;
  source: {
    repoURL: string;
    targetRevision: string;
    path: string;
  };
  destination: {
    server: string;
    namespace: string;
  };
  syncPolicy: {
    automated: { prune: boolean; selfHeal: boolean };
    syncOptions: string[];
    retry: SyncRetry;
  };
  ignoreDifferences: IgnoredDifference[];
}

export const DEFAULT_SYNC_RETRY: SyncRetry = {
  limit: 5,
  backoff: { duration: '5s', factor: 2, maxDuration: '3m' },
};

export function buildDescriptor(
  appId: AppIdentifier,
  configRepoUrl: string,
  argocd: ArgoCDConfig
): DeploymentDescriptor {
  return {
    name: appId,
    namespace: argocd.namespace,
    project: argocd.project,
    labels: {
      app: appId,
      'app.kubernetes.io/managed-by': MANAGED_BY,
    },
    source: {
      repoURL: configRepoUrl,
      targetRevision: argocd.targetRevision,
      path: argocd.path,
    },
    destination: {
      server: argocd.destinationServer,
      namespace: argocd.destinationNamespace ?? appId,
    },
    syncPolicy: {
      automated: { prune: true, selfHeal: true },
      syncOptions: ['CreateNamespace=true', 'PrunePropagationPolicy=foreground', 'PruneLast=true'],
      retry: {
        limit: DEFAULT_SYNC_RETRY.limit,
        backoff: { ...DEFAULT_SYNC_RETRY.backoff },
      },
    },
    ignoreDifferences: [{ group: 'apps', kind: 'Deployment', jsonPointers: ['/spec/replicas'] }],
  };
}

/**
 * The `argoproj.io/v1alpha1` Application manifest for a descriptor.
 */
export function toApplicationManifest(descriptor: DeploymentDescriptor) {
  return {
    apiVersion: 'argoproj.io/v1alpha1',
    kind: 'Application',
    metadata: {
      name: descriptor.name,
      namespace: descriptor.namespace,
      labels: { ...descriptor.labels },
    },
    spec: {
      project: descriptor.project,
      source: { ...descriptor.source },
      destination: { ...descriptor.destination },
      syncPolicy: {
        automated: { ...descriptor.syncPolicy.automated },
        syncOptions: [...descriptor.syncPolicy.syncOptions],
        retry: {
          limit: descriptor.syncPolicy.retry.limit,
          backoff: { ...descriptor.syncPolicy.retry.backoff },
        },
      },
      ignoreDifferences: descriptor.ignoreDifferences.map(entry => ({
        ...entry,
        jsonPointers: [...entry.jsonPointers],
      })),
    },
  };
}

export function serializeDescriptor(descriptor: DeploymentDescriptor): string {
  return yaml.dump(toApplicationManifest(descriptor), { lineWidth: -1, noRefs: true });
}
