/**
 * Onboarding Orchestrator
 *
 * Runs one request through the pipeline as an explicit state machine:
 *
 *   Start -> Extracting -> Provisioning -> RenderingSource
 *         -> RenderingConfig -> Registering -> Done
 *
 * Any stage may move the run to Failed. Stages are strictly sequential
 * and nothing is rolled back; the report lists the artifacts that exist
 * so a separate cleanup can remove them.
 */

import {
  OnboardError,
  ProvisionError,
  RegistrationError,
  RenderError,
  errorMessage,
  eventBus as defaultEventBus,
  logger,
  type EventBus,
  type OnboardingStage,
  type Result,
  type SerializedError,
} from '../utils';
import {
  DEFAULT_APP_IDENTIFIER,
  isValidIdentifier,
  type AppIdentifier,
  type IdentifierExtractor,
} from '../generator/name-extractor';
import { render as renderTemplate, type RenderedTree, type VariableBinding } from '../templates/tree';
import {
  repositoryNames,
  type RepositoryPair,
  type RepositoryProvisioner,
  type RepositoryRef,
} from '../provisioner/repository-provisioner';
import type { PublishOutcome, RepositoryPublisher } from '../publisher/repository-publisher';
import type { DeploymentRegistrar } from '../registrar/deployment-registrar';
import type { DeploymentDescriptor } from '../registrar/descriptor';

export type RunState = OnboardingStage;

export interface KnownRepository {
  name: string;
  cloneUrl?: string;
  htmlUrl?: string;
  existed?: boolean;
  inferred?: boolean;
}

export interface RunArtifacts {
  repositories: KnownRepository[];
  descriptorName?: string;
}

export interface RunFailure {
  stage: OnboardingStage;
  error: SerializedError;
  artifacts: RunArtifacts;
}

export interface StageRecord {
  stage: OnboardingStage;
  outcome: 'completed' | 'failed';
  durationMs: number;
}

export interface RunReport {
  state: 'Done' | 'Failed';
  appIdentifier: AppIdentifier;
  repositories: KnownRepository[];
  published: PublishOutcome[];
  descriptor?: DeploymentDescriptor;
  failure?: RunFailure;
  stages: StageRecord[];
}

/** Values the bindings need besides the identifier and repository URLs. */
export interface BindingDefaults {
  owner: string;
  imageRegistry?: string;
  imageTag: string;
  ingressDomain: string;
  /** Target namespace; the identifier when unset. */
  namespace?: string;
}

export type TreeRenderer = (templateRoot: string, bindings: VariableBinding) => Result<RenderedTree, RenderError>;

export interface OrchestratorDependencies {
  extractor: IdentifierExtractor;
  provisioner: Pick<RepositoryProvisioner, 'provision'>;
  publisher: Pick<RepositoryPublisher, 'publish'>;
  registrar: Pick<DeploymentRegistrar, 'register'>;
  templates: { source: string; config: string };
  defaults: BindingDefaults;
  events?: EventBus;
  render?: TreeRenderer;
}

/**
 * Bindings shared by the source and config templates.
 */
export function buildBindings(
  appId: AppIdentifier,
  repositories: RepositoryPair,
  defaults: BindingDefaults,
  description: string
): VariableBinding {
  const imagePrefix = (defaults.imageRegistry ?? defaults.owner).replace(/\/+$/, '');
  return {
    appName: appId,
    description,
    owner: defaults.owner,
    sourceRepoUrl: repositories.source.cloneUrl,
    configRepoUrl: repositories.config.cloneUrl,
    imageName: `${imagePrefix}/${appId}`,
    imageTag: defaults.imageTag,
    ingressHost: `${appId}.${defaults.ingressDomain}`,
    namespace: defaults.namespace ?? appId,
  };
}

function toKnownRepository(ref: RepositoryRef): KnownRepository {
  return {
    name: ref.name,
    cloneUrl: ref.cloneUrl,
    htmlUrl: ref.htmlUrl,
    existed: ref.existed,
    inferred: ref.inferred,
  };
}

class StageFailure extends Error {
  constructor(
    readonly stage: OnboardingStage,
    readonly error: OnboardError
  ) {
    super(error.message);
    this.name = 'StageFailure';
  }
}

/**
 * One run of the pipeline. Holds the state and known artifacts so a
 * failure at any point can report them.
 */
class OnboardingRun {
  state: RunState = 'Start';
  /** Empty until extraction completes. */
  appId: AppIdentifier = '';
  repositories: KnownRepository[] = [];
  published: PublishOutcome[] = [];
  descriptor?: DeploymentDescriptor;
  descriptorName?: string;
  stages: StageRecord[] = [];
  readonly runId = `run_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`;

  artifacts(): RunArtifacts {
    return {
      repositories: this.repositories.map(repo => ({ ...repo })),
      descriptorName: this.descriptorName,
    };
  }
}

export class OnboardingOrchestrator {
  private events: EventBus;
  private renderTree: TreeRenderer;

  constructor(private deps: OrchestratorDependencies) {
    this.events = deps.events ?? defaultEventBus;
    this.renderTree = deps.render ?? renderTemplate;
  }

  /**
   * Run a request to Done or Failed. Never rejects.
   */
  async run(request: string): Promise<RunReport> {
    const run = new OnboardingRun();
    this.emit(run, 'run.started', { request });

    try {
      await this.stage(run, 'Extracting', async () => {
        run.appId = await this.extract(request);
      });

      const repositories = await this.stage(run, 'Provisioning', () => this.provision(run));

      const bindings = buildBindings(
        run.appId,
        repositories,
        this.deps.defaults,
        `NodeJS application for ${run.appId}`
      );

      await this.stage(run, 'RenderingSource', () =>
        this.renderAndPublish(run, repositories.source, this.deps.templates.source, bindings)
      );

      await this.stage(run, 'RenderingConfig', () =>
        this.renderAndPublish(run, repositories.config, this.deps.templates.config, {
          ...bindings,
          description: `GitOps configuration for ${run.appId}`,
        })
      );

      run.descriptor = await this.stage(run, 'Registering', () => this.register(run, repositories.config));

      run.state = 'Done';
      logger.info(`Onboarding of ${run.appId} completed`, { stage: 'Done', appId: run.appId, outcome: 'completed' });
      const report = this.report(run);
      this.emit(run, 'run.completed', { state: report.state, appId: run.appId });
      return report;
    } catch (error) {
      const failure =
        error instanceof StageFailure
          ? error
          : new StageFailure(run.state, new OnboardError(errorMessage(error), 'UNEXPECTED_ERROR', run.state));
      return this.fail(run, failure);
    }
  }

  /**
   * Enter a stage, run it, and record the transition. A thrown error that
   * is not already a typed stage failure is wrapped as one.
   */
  private async stage<T>(run: OnboardingRun, stage: OnboardingStage, body: () => Promise<T>): Promise<T> {
    run.state = stage;
    const startedAt = Date.now();
    logger.info(`Entering ${stage}`, { stage, appId: run.appId, outcome: 'started' });
    this.emit(run, 'stage.started', { stage });

    try {
      const value = await body();
      const durationMs = Date.now() - startedAt;
      run.stages.push({ stage, outcome: 'completed', durationMs });
      logger.info(`Completed ${stage}`, { stage, appId: run.appId, outcome: 'completed', durationMs });
      this.emit(run, 'stage.completed', { stage, durationMs });
      return value;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      run.stages.push({ stage, outcome: 'failed', durationMs });
      if (error instanceof StageFailure) {
        throw error;
      }
      throw new StageFailure(stage, this.wrapUnexpected(run, stage, error));
    }
  }

  private async extract(request: string): Promise<AppIdentifier> {
    let appId: AppIdentifier;
    try {
      appId = await this.deps.extractor.extract(request);
    } catch (error) {
      logger.warn(`Name extraction failed, using ${DEFAULT_APP_IDENTIFIER}: ${errorMessage(error)}`);
      return DEFAULT_APP_IDENTIFIER;
    }
    if (!isValidIdentifier(appId)) {
      logger.warn(`Extractor returned invalid identifier "${appId}", using ${DEFAULT_APP_IDENTIFIER}`);
      return DEFAULT_APP_IDENTIFIER;
    }
    return appId;
  }

  private async provision(run: OnboardingRun): Promise<RepositoryPair> {
    const result = await this.deps.provisioner.provision(run.appId);
    if (!result.ok) {
      run.repositories = result.error.resolved.map(repo => ({ ...repo }));
      throw new StageFailure('Provisioning', result.error);
    }
    run.repositories = [toKnownRepository(result.value.source), toKnownRepository(result.value.config)];
    return result.value;
  }

  private async renderAndPublish(
    run: OnboardingRun,
    repository: RepositoryRef,
    templateRoot: string,
    bindings: VariableBinding
  ): Promise<void> {
    // Render fully in memory before anything touches the repository
    const rendered = this.renderTree(templateRoot, bindings);
    if (!rendered.ok) {
      throw new StageFailure(run.state, rendered.error);
    }

    const message = `Initial commit for ${run.appId}\n\n${bindings.description}`;
    const published = await this.deps.publisher.publish(repository, rendered.value, message);
    if (!published.ok) {
      throw new StageFailure(run.state, published.error);
    }
    run.published.push(published.value);
  }

  private async register(run: OnboardingRun, configRepo: RepositoryRef): Promise<DeploymentDescriptor> {
    run.descriptorName = run.appId;
    const result = await this.deps.registrar.register(run.appId, configRepo);
    if (!result.ok) {
      throw new StageFailure('Registering', result.error);
    }
    return result.value;
  }

  private wrapUnexpected(run: OnboardingRun, stage: OnboardingStage, error: unknown): OnboardError {
    const message = `Unexpected error in ${stage}: ${errorMessage(error)}`;
    switch (stage) {
      case 'Provisioning':
        return new ProvisionError(message, run.appId, repositoryNames(run.appId).source, [], error);
      case 'RenderingSource':
      case 'RenderingConfig':
        return new RenderError('PublishFailed', message, { cause: error });
      case 'Registering':
        return new RegistrationError(message, run.appId, { cause: errorMessage(error) });
      default:
        return new OnboardError(message, 'UNEXPECTED_ERROR', stage, { cause: errorMessage(error) });
    }
  }

  private fail(run: OnboardingRun, failure: StageFailure): RunReport {
    const { stage, error } = failure;
    run.state = 'Failed';
    const artifacts = run.artifacts();

    logger.error(`Onboarding of ${run.appId} failed in ${stage}: ${error.message}`, {
      stage,
      appId: run.appId,
      outcome: 'failed',
      code: error.code,
      repositories: artifacts.repositories.map(repo => repo.name),
      descriptorName: artifacts.descriptorName,
    });
    this.emit(run, 'stage.failed', { stage, code: error.code, message: error.message });

    const report: RunReport = {
      ...this.report(run),
      failure: { stage, error: { ...error.toJSON(), stage }, artifacts },
    };
    this.emit(run, 'run.completed', { state: report.state, appId: run.appId, failedStage: stage });
    return report;
  }

  private report(run: OnboardingRun): RunReport {
    return {
      state: run.state === 'Done' ? 'Done' : 'Failed',
      appIdentifier: run.appId,
      repositories: run.artifacts().repositories,
      published: [...run.published],
      descriptor: run.descriptor,
      stages: [...run.stages],
    };
  }

  private emit(run: OnboardingRun, type: string, data: Record<string, unknown>): void {
    try {
      this.events.publish({
        type,
        source: 'orchestrator',
        timestamp: new Date().toISOString(),
        data: { runId: run.runId, appId: run.appId, ...data },
      });
    } catch (error) {
      logger.warn(`Event subscriber for ${type} threw: ${errorMessage(error)}`);
    }
  }
}
