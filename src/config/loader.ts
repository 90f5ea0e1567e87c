/**
 * Config Loader
 *
 * Builds the onboarding configuration from, in increasing precedence:
 * schema defaults, an optional YAML file, environment variables and CLI
 * overrides. Every missing credential or path is reported in a single
 * PreconditionError before the pipeline starts.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { OnboardConfigSchema, type OnboardConfig } from './schema';
import {
  ConfigurationError,
  errorMessage,
  PreconditionError,
  getEnvBoolean,
  getEnvNumber,
  getEnvOptional,
  type Env,
} from '../utils';

export const DEFAULT_CONFIG_FILE = 'onboard.yaml';

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

export const DEFAULT_SOURCE_TEMPLATE = path.join(TEMPLATES_DIR, 'nodejs-app');
export const DEFAULT_CONFIG_TEMPLATE = path.join(TEMPLATES_DIR, 'nodejs-gitops');

type ConfigTree = Record<string, unknown>;

export interface LoadConfigOptions {
  env?: Env;
  /** Explicit YAML file; it must exist when given. */
  configPath?: string;
  cwd?: string;
  /** Applied last, e.g. from CLI flags. */
  overrides?: ConfigTree;
  /** Used to locate `~/.kube/config` when KUBECONFIG is unset. */
  homeDir?: string;
}

const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge, with source values taking precedence. Undefined source
 * values never overwrite.
 */
export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (FORBIDDEN_KEYS.has(key) || value === undefined) {
      continue;
    }
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Resolve ${VAR} and ${VAR:-default} references in string values.
 */
export function resolveEnvVars(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
      const defaultSep = expr.indexOf(':-');
      if (defaultSep !== -1) {
        const varName = expr.slice(0, defaultSep);
        const defaultValue = expr.slice(defaultSep + 2);
        // `:-` treats an empty value as unset
        return env[varName] || defaultValue;
      }
      return env[expr] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const result: ConfigTree = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveEnvVars(entry, env);
    }
    return result;
  }
  return value;
}

function readConfigFile(filePath: string, env: Env): ConfigTree {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`, { filePath });
  }
  const resolved = resolveEnvVars(parsed, env);
  return isPlainObject(resolved) ? resolved : {};
}

/**
 * Map environment variables onto the config tree. Unset keys stay
 * undefined so they do not shadow file values.
 */
export function configFromEnv(env: Env): ConfigTree {
  const disableLlm = getEnvBoolean(env, 'ONBOARD_DISABLE_LLM');
  const format = getEnvOptional(env, 'LOG_FORMAT');
  return {
    github: {
      token: getEnvOptional(env, 'GITHUB_TOKEN'),
      owner: getEnvOptional(env, 'GITHUB_OWNER', 'GITHUB_USERNAME'),
      ownerType: getEnvOptional(env, 'GITHUB_OWNER_TYPE'),
      privateRepos: getEnvBoolean(env, 'GITHUB_PRIVATE_REPOS'),
      baseUrl: getEnvOptional(env, 'GITHUB_API_URL'),
    },
    llm: {
      enabled: disableLlm === undefined ? undefined : !disableLlm,
      apiKey: getEnvOptional(env, 'OPENROUTER_API_KEY'),
      model: getEnvOptional(env, 'OPENROUTER_MODEL'),
      timeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS'),
    },
    templates: {
      source: getEnvOptional(env, 'SOURCE_TEMPLATE_PATH', 'NODEJS_TEMPLATE_PATH'),
      config: getEnvOptional(env, 'CONFIG_TEMPLATE_PATH', 'GITOPS_TEMPLATE_PATH'),
    },
    kubernetes: {
      kubeconfig: getEnvOptional(env, 'KUBECONFIG'),
      context: getEnvOptional(env, 'KUBE_CONTEXT'),
    },
    argocd: {
      namespace: getEnvOptional(env, 'ARGOCD_NAMESPACE'),
      project: getEnvOptional(env, 'ARGOCD_PROJECT'),
      destinationServer: getEnvOptional(env, 'DEST_SERVER'),
      destinationNamespace: getEnvOptional(env, 'DEST_NAMESPACE'),
    },
    app: {
      imageRegistry: getEnvOptional(env, 'IMAGE_REGISTRY'),
      ingressDomain: getEnvOptional(env, 'INGRESS_DOMAIN'),
    },
    logging: {
      level: getEnvOptional(env, 'LOG_LEVEL'),
      format,
    },
  };
}

function formatIssue(issue: ZodIssue): string {
  if (issue.code === 'custom' || issue.message.includes('is required')) {
    return issue.message;
  }
  return `${issue.path.join('.')}: ${issue.message}`;
}

function checkDirectory(label: string, dir: string, problems: string[]): void {
  if (!fs.existsSync(dir)) {
    problems.push(`${label} does not exist: ${dir}`);
  } else if (!fs.statSync(dir).isDirectory()) {
    problems.push(`${label} is not a directory: ${dir}`);
  }
}

/**
 * Load and validate configuration. Throws PreconditionError listing every
 * missing credential, template root or kubeconfig.
 */
export function loadConfig(options: LoadConfigOptions = {}): OnboardConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  let fileConfig: ConfigTree = {};
  if (options.configPath) {
    const filePath = path.resolve(cwd, options.configPath);
    if (!fs.existsSync(filePath)) {
      throw new PreconditionError([`config file does not exist: ${filePath}`]);
    }
    fileConfig = readConfigFile(filePath, env);
  } else {
    const implicit = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(implicit)) {
      fileConfig = readConfigFile(implicit, env);
    }
  }

  const defaults: ConfigTree = {
    templates: { source: DEFAULT_SOURCE_TEMPLATE, config: DEFAULT_CONFIG_TEMPLATE },
    kubernetes: { kubeconfig: path.join(homeDir, '.kube', 'config') },
  };

  const merged = deepMerge(
    deepMerge(deepMerge(defaults, fileConfig), configFromEnv(env)),
    options.overrides ?? {}
  );

  const parsed = OnboardConfigSchema.safeParse(merged);
  const problems: string[] = parsed.success ? [] : parsed.error.issues.map(formatIssue);

  const templates = isPlainObject(merged.templates) ? merged.templates : {};
  const kubernetes = isPlainObject(merged.kubernetes) ? merged.kubernetes : {};
  const sourceRoot = typeof templates.source === 'string' ? path.resolve(cwd, templates.source) : undefined;
  const configRoot = typeof templates.config === 'string' ? path.resolve(cwd, templates.config) : undefined;
  const kubeconfig = typeof kubernetes.kubeconfig === 'string' ? path.resolve(cwd, kubernetes.kubeconfig) : undefined;

  if (sourceRoot) checkDirectory('source template root', sourceRoot, problems);
  if (configRoot) checkDirectory('config template root', configRoot, problems);
  if (kubeconfig && !fs.existsSync(kubeconfig)) {
    problems.push(`kubeconfig does not exist: ${kubeconfig}`);
  }

  if (!parsed.success || problems.length > 0) {
    throw new PreconditionError(problems);
  }

  const config = parsed.data;
  config.templates.source = path.resolve(cwd, config.templates.source);
  config.templates.config = path.resolve(cwd, config.templates.config);
  config.kubernetes.kubeconfig = path.resolve(cwd, config.kubernetes.kubeconfig);
  return config;
}
