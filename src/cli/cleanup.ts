/**
 * `onboard cleanup <app-id>`: lists, or with --yes deletes, the
 * Application and repositories created for an identifier.
 */

import { UsageError } from '../utils';
import { isValidIdentifier } from '../generator/name-extractor';
import type { CleanupReport, OnboardingCleanup } from '../engine/cleanup';

export interface CleanupCommandOptions {
  appId: string;
  yes: boolean;
  format: 'text' | 'json';
  configPath?: string;
}

export function parseCleanupArgs(args: string[]): CleanupCommandOptions {
  let appId: string | undefined;
  let yes = false;
  let format: 'text' | 'json' = 'text';
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--yes':
      case '-y':
        yes = true;
        break;
      case '--json':
        format = 'json';
        break;
      case '--config': {
        const value = args[++i];
        if (value === undefined || value.startsWith('--')) {
          throw new UsageError('--config requires a value');
        }
        configPath = value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option for cleanup: ${arg}`);
        }
        if (appId !== undefined) {
          throw new UsageError(`cleanup takes one app identifier, got "${appId}" and "${arg}"`);
        }
        appId = arg;
    }
  }

  if (appId === undefined) {
    throw new UsageError('cleanup requires an app identifier');
  }
  if (!isValidIdentifier(appId)) {
    throw new UsageError(`Invalid app identifier: "${appId}"`);
  }

  return { appId, yes, format, configPath };
}

export function formatCleanupReport(report: CleanupReport): string {
  const lines = [
    report.dryRun
      ? `Would delete for ${report.appIdentifier} (re-run with --yes to delete):`
      : `Cleanup of ${report.appIdentifier}:`,
  ];
  for (const artifact of report.artifacts) {
    const label = report.dryRun ? '' : ` ${artifact.outcome}`;
    const detail = artifact.error ? ` (${artifact.error})` : '';
    lines.push(`  ${artifact.kind} ${artifact.name}${label}${detail}`);
  }
  return lines.join('\n');
}

/**
 * Resolves to 1 when any artifact could not be deleted.
 */
export async function executeCleanup(
  cleanup: Pick<OnboardingCleanup, 'plan' | 'cleanup'>,
  options: CleanupCommandOptions,
  write: (text: string) => void
): Promise<number> {
  const report = options.yes ? await cleanup.cleanup(options.appId) : cleanup.plan(options.appId);

  write(options.format === 'json' ? JSON.stringify(report, null, 2) : formatCleanupReport(report));

  return report.artifacts.some(artifact => artifact.outcome === 'failed') ? 1 : 0;
}
