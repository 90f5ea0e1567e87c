/**
 * CLI Tests
 *
 * Argument parsing for `onboard run` and `onboard cleanup`, report
 * formatting, and the command router's exit codes.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  EXIT_FAILED,
  EXIT_OK,
  EXIT_USAGE,
  formatRunReport,
  parseCleanupArgs,
  parseRunArgs,
  runCommand,
  runOverrides,
  type CliIO,
} from '../cli';
import type { AppContext } from '../app';
import type { OnboardConfig } from '../config/schema';
import type { RunReport } from '../engine/orchestrator';
import { OnboardingCleanup } from '../engine/cleanup';
import { UsageError, logger } from '../utils';
import { FakeCluster, FakeRepositoryHost } from './fakes';

const doneReport: RunReport = {
  state: 'Done',
  appIdentifier: 'orders',
  repositories: [
    { name: 'orders-source', htmlUrl: 'https://github.com/acme/orders-source', existed: false, inferred: false },
    { name: 'orders-config', htmlUrl: 'https://github.com/acme/orders-config', existed: true, inferred: false },
  ],
  published: [
    { repository: 'orders-source', changed: true, commit: 'abc123' },
    { repository: 'orders-config', changed: false },
  ],
  stages: [],
};

const failedReport: RunReport = {
  state: 'Failed',
  appIdentifier: 'orders',
  repositories: [],
  published: [],
  stages: [],
  failure: {
    stage: 'Provisioning',
    error: {
      code: 'PROVISION_FAILED',
      message: 'Repository orders-config could not be provisioned: Forbidden',
      timestamp: '2026-01-01T00:00:00.000Z',
    },
    artifacts: {
      repositories: [{ name: 'orders-source', cloneUrl: 'https://github.com/acme/orders-source.git' }],
    },
  },
};

// ===========================================================================
// parseRunArgs
// ===========================================================================

describe('parseRunArgs', () => {
  test('joins positional words into the request', () => {
    const result = parseRunArgs(['deploy', 'my', 'billing', 'app']);
    expect(result.request).toBe('deploy my billing app');
  });

  test('handles empty args', () => {
    expect(parseRunArgs([])).toEqual({ request: '', format: 'text', noLlm: false });
  });

  test('parses --json and --no-llm', () => {
    const result = parseRunArgs(['--json', 'create orders', '--no-llm']);
    expect(result.format).toBe('json');
    expect(result.noLlm).toBe(true);
    expect(result.request).toBe('create orders');
  });

  test('parses template and config paths', () => {
    const result = parseRunArgs([
      '--source-template',
      './a',
      '--config-template',
      './b',
      '--config',
      'onboard.yaml',
      'create orders',
    ]);
    expect(result.sourceTemplate).toBe('./a');
    expect(result.configTemplate).toBe('./b');
    expect(result.configPath).toBe('onboard.yaml');
  });

  test('treats everything after -- as the request', () => {
    expect(parseRunArgs(['--', '--json', 'words']).request).toBe('--json words');
  });

  test('rejects unknown options', () => {
    expect(() => parseRunArgs(['--bogus'])).toThrow(UsageError);
  });

  test('rejects a flag missing its value', () => {
    expect(() => parseRunArgs(['--config'])).toThrow('--config requires a value');
  });
});

describe('runOverrides', () => {
  test('maps flags onto the config tree', () => {
    expect(runOverrides({ request: '', format: 'text', noLlm: true, sourceTemplate: './a' })).toEqual({
      templates: { source: './a', config: undefined },
      llm: { enabled: false },
    });
  });
});

// ===========================================================================
// parseCleanupArgs
// ===========================================================================

describe('parseCleanupArgs', () => {
  test('parses the identifier and flags', () => {
    expect(parseCleanupArgs(['orders', '--yes', '--json'])).toEqual({
      appId: 'orders',
      yes: true,
      format: 'json',
      configPath: undefined,
    });
  });

  test('requires a valid identifier', () => {
    expect(() => parseCleanupArgs([])).toThrow('cleanup requires an app identifier');
    expect(() => parseCleanupArgs(['Bad_Name'])).toThrow('Invalid app identifier: "Bad_Name"');
  });
});

// ===========================================================================
// formatRunReport
// ===========================================================================

describe('formatRunReport', () => {
  test('summarizes a finished run', () => {
    expect(formatRunReport(doneReport)).toBe(
      [
        'Onboarded orders',
        '  Repository: orders-source (created) https://github.com/acme/orders-source',
        '  Repository: orders-config (existing) https://github.com/acme/orders-config',
        '  Published: orders-source @ abc123',
        '  Published: orders-config (no changes)',
      ].join('\n')
    );
  });

  test('names the failing stage and the known artifacts', () => {
    expect(formatRunReport(failedReport)).toBe(
      [
        'Onboarding orders failed in Provisioning',
        '  Error: Repository orders-config could not be provisioned: Forbidden',
        '  Repository: orders-source (resolved) https://github.com/acme/orders-source.git',
        '  Remove partial artifacts with: onboard cleanup orders',
      ].join('\n')
    );
  });
});

// ===========================================================================
// runCommand
// ===========================================================================

describe('runCommand', () => {
  let workDir: string;
  let out: string[];
  let err: string[];
  let io: CliIO;
  let requests: string[];
  let nextReport: RunReport;

  function createApp(config: OnboardConfig): AppContext {
    return {
      config,
      orchestrator: {
        run: async request => {
          requests.push(request);
          return nextReport;
        },
      },
      cleanup: new OnboardingCleanup(new FakeRepositoryHost(), new FakeCluster(), {
        owner: config.github.owner,
        argocdNamespace: config.argocd.namespace,
      }),
    };
  }

  function env(): Record<string, string> {
    const kubeconfig = path.join(workDir, 'kubeconfig');
    fs.writeFileSync(kubeconfig, 'apiVersion: v1\n');
    return { GITHUB_TOKEN: 'test-secret', GITHUB_OWNER: 'acme', KUBECONFIG: kubeconfig };
  }

  function run(argv: string[], environment: Record<string, string> = env()): Promise<number> {
    return runCommand(argv, { io, env: environment, cwd: workDir, createApp });
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'onboard-cli-'));
    out = [];
    err = [];
    io = { out: text => out.push(text), err: text => err.push(text) };
    requests = [];
    nextReport = doneReport;
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    logger.setFormat('text');
    logger.setLevel('debug');
    logger.setSink(() => {});
  });

  test('prints the version', async () => {
    expect(await run(['--version'])).toBe(EXIT_OK);
    expect(out).toEqual(['onboard 0.1.0']);
  });

  test('prints help', async () => {
    expect(await run(['--help'])).toBe(EXIT_OK);
    expect(out[0]).toContain('onboard run "<request>"');
  });

  test('exits 2 with no arguments', async () => {
    expect(await run([])).toBe(EXIT_USAGE);
  });

  test('exits 2 on a usage error', async () => {
    expect(await run(['run', '--bogus'])).toBe(EXIT_USAGE);
    expect(err).toEqual(['Error: Unknown option for run: --bogus', 'Run `onboard --help` for usage.']);
  });

  test('exits 2 and lists every missing precondition', async () => {
    expect(await run(['run', '--no-llm', 'create orders'], {})).toBe(EXIT_USAGE);
    expect(err[0]).toBe('Cannot start onboarding:');
    expect(err).toContain('  - GITHUB_TOKEN is required');
    expect(err).toContain('  - GITHUB_OWNER is required');
    expect(requests).toEqual([]);
  });

  test('runs a bare request and exits 0 when the run is Done', async () => {
    expect(await run(['--no-llm', 'create', 'orders'])).toBe(EXIT_OK);
    expect(requests).toEqual(['create orders']);
    expect(out[0]).toBe(formatRunReport(doneReport));
  });

  test('exits 1 when the run fails mid-pipeline', async () => {
    nextReport = failedReport;
    expect(await run(['run', '--no-llm', 'create orders'])).toBe(EXIT_FAILED);
  });

  test('prints the report as JSON with --json', async () => {
    expect(await run(['run', '--json', '--no-llm', 'create orders'])).toBe(EXIT_OK);
    expect(JSON.parse(out[0])).toEqual(doneReport);
  });

  test('cleanup without --yes only lists what it would delete', async () => {
    expect(await run(['cleanup', 'orders'])).toBe(EXIT_OK);
    expect(out[0]).toBe(
      [
        'Would delete for orders (re-run with --yes to delete):',
        '  application argocd/orders',
        '  repository acme/orders-source',
        '  repository acme/orders-config',
      ].join('\n')
    );
  });

  test('cleanup with --yes reports each artifact', async () => {
    expect(await run(['cleanup', 'orders', '--yes'])).toBe(EXIT_OK);
    expect(out[0]).toBe(
      [
        'Cleanup of orders:',
        '  application argocd/orders deleted',
        '  repository acme/orders-source absent',
        '  repository acme/orders-config absent',
      ].join('\n')
    );
  });
});
