/**
 * App wiring
 *
 * Builds the production components from a validated configuration. Tests
 * construct the orchestrator directly with fakes instead.
 */

import type { OnboardConfig } from './config/schema';
import { OnboardingOrchestrator } from './engine/orchestrator';
import { OnboardingCleanup } from './engine/cleanup';
import { NameExtractor } from './generator/name-extractor';
import { OpenRouterProvider } from './llm/providers/openrouter';
import { RepositoryProvisioner } from './provisioner/repository-provisioner';
import { RepositoryPublisher } from './publisher/repository-publisher';
import { DeploymentRegistrar } from './registrar/deployment-registrar';
import { GitHubOperations } from './tools/github-ops';
import { GitOperations } from './tools/git-ops';
import { KubernetesOperations } from './tools/k8s-ops';
import type { EventBus } from './utils';

export interface AppContext {
  readonly config: OnboardConfig;
  readonly orchestrator: Pick<OnboardingOrchestrator, 'run'>;
  readonly cleanup: Pick<OnboardingCleanup, 'plan' | 'cleanup'>;
}

export function createApp(config: OnboardConfig, events?: EventBus): AppContext {
  const github = new GitHubOperations({
    token: config.github.token,
    baseUrl: config.github.baseUrl,
    timeoutMs: config.github.timeoutMs,
  });
  const cluster = new KubernetesOperations({
    kubeconfig: config.kubernetes.kubeconfig,
    context: config.kubernetes.context,
    timeoutMs: config.kubernetes.timeoutMs,
  });

  const provider =
    config.llm.enabled && config.llm.apiKey
      ? new OpenRouterProvider({
          apiKey: config.llm.apiKey,
          model: config.llm.model,
          baseUrl: config.llm.baseUrl,
          timeoutMs: config.llm.timeoutMs,
        })
      : null;

  const extractor = new NameExtractor(provider, {
    model: config.llm.model,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeoutMs,
  });

  const provisioner = new RepositoryProvisioner(github, {
    owner: config.github.owner,
    ownerType: config.github.ownerType,
    privateRepos: config.github.privateRepos,
    webUrl: config.github.webUrl,
  });

  const publisher = new RepositoryPublisher(options => GitOperations.clone(options, config.git.timeoutMs), {
    token: config.github.token,
    authorName: config.git.authorName,
    authorEmail: config.git.authorEmail,
  });

  const registrar = new DeploymentRegistrar(cluster, config.argocd);

  const orchestrator = new OnboardingOrchestrator({
    extractor,
    provisioner,
    publisher,
    registrar,
    templates: config.templates,
    defaults: {
      owner: config.github.owner,
      imageRegistry: config.app.imageRegistry,
      imageTag: config.app.imageTag,
      ingressDomain: config.app.ingressDomain,
      namespace: config.argocd.destinationNamespace,
    },
    events,
  });

  const cleanup = new OnboardingCleanup(github, cluster, {
    owner: config.github.owner,
    argocdNamespace: config.argocd.namespace,
  });

  return { config, orchestrator, cleanup };
}
