/**
 * Tests for src/config/loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_SOURCE_TEMPLATE, deepMerge, loadConfig, resolveEnvVars } from '../config/loader';
import { ConfigurationError, PreconditionError, type Env } from '../utils';

let workDir: string;
let kubeconfig: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'onboard-config-'));
  kubeconfig = path.join(workDir, 'kubeconfig');
  fs.writeFileSync(kubeconfig, 'apiVersion: v1\nkind: Config\n');
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

function baseEnv(extra: Env = {}): Env {
  return {
    GITHUB_TOKEN: 'test-secret',
    GITHUB_OWNER: 'acme',
    OPENROUTER_API_KEY: 'test-key',
    KUBECONFIG: kubeconfig,
    ...extra,
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('loadConfig', () => {
  it('loads from the environment with defaults', () => {
    const config = loadConfig({ env: baseEnv(), cwd: workDir, homeDir: workDir });

    expect(config.github).toMatchObject({ token: 'test-secret', owner: 'acme', ownerType: 'user', privateRepos: false });
    expect(config.llm).toMatchObject({ enabled: true, model: 'openai/gpt-3.5-turbo', maxTokens: 50, temperature: 0.1 });
    expect(config.templates.source).toBe(DEFAULT_SOURCE_TEMPLATE);
    expect(config.kubernetes.kubeconfig).toBe(kubeconfig);
    expect(config.argocd).toMatchObject({ namespace: 'argocd', project: 'default' });
    expect(config.argocd.destinationNamespace).toBeUndefined();
    expect(config.logging).toEqual({ level: 'info', format: 'text' });
  });

  it('accepts GITHUB_USERNAME for the owner', () => {
    const env = baseEnv({ GITHUB_OWNER: undefined, GITHUB_USERNAME: 'octo-user' });
    expect(loadConfig({ env, cwd: workDir }).github.owner).toBe('octo-user');
  });

  it('does not require a model key when the model is disabled', () => {
    const env = baseEnv({ OPENROUTER_API_KEY: undefined, ONBOARD_DISABLE_LLM: 'true' });
    expect(loadConfig({ env, cwd: workDir }).llm.enabled).toBe(false);
  });

  it('layers file, environment and overrides in that order', () => {
    fs.writeFileSync(
      path.join(workDir, 'onboard.yaml'),
      [
        'github:',
        '  token: ${FILE_TOKEN}',
        '  owner: file-owner',
        'argocd:',
        '  namespace: gitops',
        '  project: file-project',
        'app:',
        '  ingressDomain: ${INGRESS:-apps.example.com}',
        '',
      ].join('\n')
    );
    const env: Env = { FILE_TOKEN: 'test-secret', GITHUB_OWNER: 'env-owner', KUBECONFIG: kubeconfig };

    const config = loadConfig({
      env,
      cwd: workDir,
      overrides: { argocd: { project: 'cli-project' }, llm: { enabled: false } },
    });

    expect(config.github.token).toBe('test-secret');
    expect(config.github.owner).toBe('env-owner');
    expect(config.argocd.namespace).toBe('gitops');
    expect(config.argocd.project).toBe('cli-project');
    expect(config.app.ingressDomain).toBe('apps.example.com');
  });

  it('lists every missing precondition at once', () => {
    const error = catchError(() => loadConfig({ env: {}, cwd: workDir, homeDir: workDir }));

    expect(error).toBeInstanceOf(PreconditionError);
    if (!(error instanceof PreconditionError)) return;
    expect(error.problems).toEqual([
      'GITHUB_TOKEN is required',
      'GITHUB_OWNER is required',
      'OPENROUTER_API_KEY is required unless the model is disabled',
      `kubeconfig does not exist: ${path.join(workDir, '.kube', 'config')}`,
    ]);
  });

  it('reports a missing template root', () => {
    const error = catchError(() =>
      loadConfig({ env: baseEnv({ SOURCE_TEMPLATE_PATH: 'missing-template' }), cwd: workDir })
    );

    expect(error).toBeInstanceOf(PreconditionError);
    if (!(error instanceof PreconditionError)) return;
    expect(error.problems).toEqual([`source template root does not exist: ${path.join(workDir, 'missing-template')}`]);
  });

  it('rejects an explicit config file that does not exist', () => {
    const error = catchError(() => loadConfig({ env: baseEnv(), cwd: workDir, configPath: 'custom.yaml' }));

    expect(error).toBeInstanceOf(PreconditionError);
    if (!(error instanceof PreconditionError)) return;
    expect(error.problems).toEqual([`config file does not exist: ${path.join(workDir, 'custom.yaml')}`]);
  });

  it('rejects a config file that is not valid YAML', () => {
    fs.writeFileSync(path.join(workDir, 'onboard.yaml'), 'github: [unclosed\n');
    expect(() => loadConfig({ env: baseEnv(), cwd: workDir })).toThrow(ConfigurationError);
  });
});

describe('resolveEnvVars', () => {
  it('substitutes variables and defaults in nested values', () => {
    expect(resolveEnvVars({ a: '${X}', b: ['${MISSING:-fallback}'] }, { X: 'one' })).toEqual({
      a: 'one',
      b: ['fallback'],
    });
  });

  it('uses the default when the variable is set but empty', () => {
    expect(resolveEnvVars('${KUBE_CONTEXT:-kind-gitops}', { KUBE_CONTEXT: '' })).toBe('kind-gitops');
    expect(resolveEnvVars('${KUBE_CONTEXT}', { KUBE_CONTEXT: '' })).toBe('');
  });
});

describe('deepMerge', () => {
  it('ignores undefined values and prototype keys', () => {
    const merged = deepMerge({ a: { b: 1, c: 2 } }, JSON.parse('{"a":{"c":3},"__proto__":{"polluted":true}}'));
    expect(merged).toEqual({ a: { b: 1, c: 3 } });
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});
