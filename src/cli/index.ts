/**
 * CLI command router
 */

import { createApp, type AppContext } from '../app';
import { loadConfig } from '../config/loader';
import type { OnboardConfig } from '../config/schema';
import { VERSION } from '../version';
import { OnboardError, PreconditionError, errorMessage, logger, type Env } from '../utils';
import { executeRun, parseRunArgs, runOverrides } from './run';
import { executeCleanup, parseCleanupArgs } from './cleanup';

export { parseRunArgs, executeRun, formatRunReport, runOverrides, type RunOptions } from './run';
export { parseCleanupArgs, executeCleanup, formatCleanupReport, type CleanupCommandOptions } from './cleanup';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `onboard ${VERSION}

Turn a plain-language deployment request into two GitHub repositories
and an Argo CD Application.

Usage:
  onboard run "<request>" [--json] [--source-template DIR] [--config-template DIR] [--no-llm] [--config FILE]
  onboard cleanup <app-id> [--yes] [--json] [--config FILE]
  onboard --help | --version

A bare \`onboard "<request>"\` is the same as \`onboard run "<request>"\`.

Exit codes:
  0  onboarding finished
  1  a stage failed after the run started
  2  missing configuration or bad usage`;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CommandContext {
  io: CliIO;
  env: Env;
  cwd: string;
  createApp: (config: OnboardConfig) => AppContext;
}

const consoleIO: CliIO = {
  out: text => console.log(text),
  err: text => console.error(text),
};

function configure(
  context: CommandContext,
  configPath: string | undefined,
  overrides: Record<string, unknown>,
  format: 'text' | 'json'
): AppContext {
  const config = loadConfig({ env: context.env, cwd: context.cwd, configPath, overrides });
  logger.setLevel(config.logging.level);
  logger.setFormat(config.logging.format);
  if (format === 'json') {
    // keep stdout a single JSON document
    logger.setSink((_level, line) => context.io.err(line));
  }
  return context.createApp(config);
}

/**
 * Run one CLI invocation. Resolves to the process exit code; never rejects.
 */
export async function runCommand(argv: string[], overrides: Partial<CommandContext> = {}): Promise<number> {
  const context: CommandContext = {
    io: overrides.io ?? consoleIO,
    env: overrides.env ?? process.env,
    cwd: overrides.cwd ?? process.cwd(),
    createApp: overrides.createApp ?? (config => createApp(config)),
  };
  const { io } = context;

  if (argv[0] === '--version' || argv[0] === '-v') {
    io.out(`onboard ${VERSION}`);
    return EXIT_OK;
  }
  if (argv.length === 0) {
    io.err(HELP_TEXT);
    return EXIT_USAGE;
  }
  if (argv.includes('--help') || argv.includes('-h') || argv[0] === 'help') {
    io.out(HELP_TEXT);
    return EXIT_OK;
  }

  const [first, ...rest] = argv;

  try {
    if (first === 'cleanup') {
      const options = parseCleanupArgs(rest);
      const app = configure(context, options.configPath, { llm: { enabled: false } }, options.format);
      return await executeCleanup(app.cleanup, options, io.out);
    }

    const options = parseRunArgs(first === 'run' ? rest : argv);
    const app = configure(context, options.configPath, runOverrides(options), options.format);
    return await executeRun(app.orchestrator, options, io.out);
  } catch (error) {
    if (error instanceof PreconditionError) {
      io.err('Cannot start onboarding:');
      for (const problem of error.problems) {
        io.err(`  - ${problem}`);
      }
      return EXIT_USAGE;
    }
    if (error instanceof OnboardError) {
      io.err(`Error: ${error.message}`);
      if (error.code === 'USAGE_ERROR') {
        io.err('Run `onboard --help` for usage.');
      }
      return EXIT_USAGE;
    }
    io.err(`Error: ${errorMessage(error)}`);
    return EXIT_FAILED;
  }
}
