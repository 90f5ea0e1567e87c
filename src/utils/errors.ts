export type OnboardingStage =
  | 'Start'
  | 'Extracting'
  | 'Provisioning'
  | 'RenderingSource'
  | 'RenderingConfig'
  | 'Registering'
  | 'Done'
  | 'Failed';

export interface SerializedError {
  code: string;
  message: string;
  stage?: OnboardingStage;
  timestamp: string;
  details?: unknown;
}

/**
 * Base onboarding error
 */
export class OnboardError extends Error {
  code: string;
  stage?: OnboardingStage;
  timestamp: string;
  details?: unknown;

  constructor(message: string, code: string, stage?: OnboardingStage, details?: unknown) {
    super(message);
    this.name = 'OnboardError';
    this.code = code;
    this.stage = stage;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      stage: this.stage,
      timestamp: this.timestamp,
      details: this.details,
    };
  }
}

export class ConfigurationError extends OnboardError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 'Start', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised before any stage runs; lists every missing credential or path at once.
 */
export class PreconditionError extends OnboardError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Preconditions not met: ${problems.join('; ')}`, 'PRECONDITION_FAILED', 'Start', {
      problems,
    });
    this.name = 'PreconditionError';
    this.problems = problems;
  }
}

export class UsageError extends OnboardError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR', 'Start');
    this.name = 'UsageError';
  }
}

export interface ResolvedRepositorySummary {
  name: string;
  cloneUrl: string;
}

export class ProvisionError extends OnboardError {
  readonly appId: string;
  readonly failedRepository: string;
  /** Repositories that did resolve, for cleanup. */
  readonly resolved: ResolvedRepositorySummary[];

  constructor(
    message: string,
    appId: string,
    failedRepository: string,
    resolved: ResolvedRepositorySummary[] = [],
    cause?: unknown
  ) {
    super(message, 'PROVISION_FAILED', 'Provisioning', {
      appId,
      failedRepository,
      resolved,
      cause: describeCause(cause),
    });
    this.name = 'ProvisionError';
    this.appId = appId;
    this.failedRepository = failedRepository;
    this.resolved = resolved;
  }
}

export type RenderErrorKind = 'TemplateMissing' | 'UnresolvedPlaceholder' | 'PublishFailed';

export class RenderError extends OnboardError {
  readonly kind: RenderErrorKind;
  readonly file?: string;
  readonly placeholder?: string;

  constructor(
    kind: RenderErrorKind,
    message: string,
    details: { file?: string; placeholder?: string; templateRoot?: string; repository?: string; cause?: unknown } = {}
  ) {
    super(message, 'RENDER_FAILED', undefined, { kind, ...details, cause: describeCause(details.cause) });
    this.name = 'RenderError';
    this.kind = kind;
    this.file = details.file;
    this.placeholder = details.placeholder;
  }
}

export class RegistrationError extends OnboardError {
  readonly descriptorName: string;

  constructor(message: string, descriptorName: string, details?: Record<string, unknown>) {
    super(message, 'REGISTRATION_FAILED', 'Registering', { descriptorName, ...details });
    this.name = 'RegistrationError';
    this.descriptorName = descriptorName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string | undefined {
  return cause === undefined || cause === null ? undefined : errorMessage(cause);
}

/**
 * HTTP status carried by Octokit request errors, if any.
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}
