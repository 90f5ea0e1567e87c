/**
 * `onboard run`
 *
 * Usage:
 *   onboard run "I need a new NodeJS service called inventory-api"
 *   onboard run "deploy my billing app" --json
 *   onboard run "create orders-api" --no-llm --source-template ./templates/custom-app
 */

import { UsageError } from '../utils';
import type { OnboardingOrchestrator, RunReport } from '../engine/orchestrator';

/** Options parsed from command-line arguments */
export interface RunOptions {
  /** The deployment request */
  request: string;
  /** Output format */
  format: 'text' | 'json';
  sourceTemplate?: string;
  configTemplate?: string;
  /** Skip the model and extract with patterns only */
  noLlm: boolean;
  configPath?: string;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse `onboard run` arguments. Positional words are joined into the
 * request, so quoting is optional.
 */
export function parseRunArgs(args: string[]): RunOptions {
  const options: RunOptions = { request: '', format: 'text', noLlm: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        options.format = 'json';
        break;
      case '--no-llm':
        options.noLlm = true;
        break;
      case '--source-template':
        options.sourceTemplate = takeValue(args, ++i, arg);
        break;
      case '--config-template':
        options.configTemplate = takeValue(args, ++i, arg);
        break;
      case '--config':
        options.configPath = takeValue(args, ++i, arg);
        break;
      case '--':
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option for run: ${arg}`);
        }
        positional.push(arg);
        break;
    }
  }

  options.request = positional.join(' ');
  return options;
}

/**
 * Config tree overrides carried by the run flags.
 */
export function runOverrides(options: RunOptions): Record<string, unknown> {
  return {
    templates: {
      source: options.sourceTemplate,
      config: options.configTemplate,
    },
    llm: options.noLlm ? { enabled: false } : undefined,
  };
}

export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];

  if (report.state === 'Done') {
    lines.push(`Onboarded ${report.appIdentifier}`);
  } else {
    const stage = report.failure?.stage ?? 'unknown stage';
    lines.push(`Onboarding ${report.appIdentifier || '(no identifier)'} failed in ${stage}`);
    if (report.failure) {
      lines.push(`  Error: ${report.failure.error.message}`);
    }
  }

  const repositories = report.failure?.artifacts.repositories ?? report.repositories;
  for (const repo of repositories) {
    const status =
      repo.existed === undefined ? 'resolved' : repo.inferred ? 'existing, inferred' : repo.existed ? 'existing' : 'created';
    const location = repo.htmlUrl ?? repo.cloneUrl ?? '';
    lines.push(`  Repository: ${repo.name} (${status}) ${location}`.trimEnd());
  }

  for (const outcome of report.published) {
    lines.push(
      outcome.changed
        ? `  Published: ${outcome.repository} @ ${outcome.commit ?? 'unknown'}`
        : `  Published: ${outcome.repository} (no changes)`
    );
  }

  if (report.descriptor) {
    lines.push(`  Application: ${report.descriptor.namespace}/${report.descriptor.name}`);
    lines.push(`  Destination namespace: ${report.descriptor.destination.namespace}`);
  } else if (report.failure?.artifacts.descriptorName) {
    lines.push(`  Application: ${report.failure.artifacts.descriptorName} (not applied)`);
  }

  if (report.state === 'Failed') {
    lines.push(`  Remove partial artifacts with: onboard cleanup ${report.appIdentifier || '<app-id>'}`);
  }

  return lines.join('\n');
}

/**
 * Execute a run and print its report. Resolves to the process exit code.
 */
export async function executeRun(
  orchestrator: Pick<OnboardingOrchestrator, 'run'>,
  options: RunOptions,
  write: (text: string) => void
): Promise<number> {
  const report = await orchestrator.run(options.request);

  if (options.format === 'json') {
    write(JSON.stringify(report, null, 2));
  } else {
    write(formatRunReport(report));
  }

  return report.state === 'Done' ? 0 : 1;
}
