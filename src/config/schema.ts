/**
 * Zod Config Schema
 *
 * Validates the merged onboarding configuration (defaults, YAML file,
 * environment, CLI flags) once, before any stage runs.
 */

import { z } from 'zod';

export const GitHubConfigSchema = z.object({
  token: z.string({ required_error: 'GITHUB_TOKEN is required' }).min(1, 'GITHUB_TOKEN is required'),
  owner: z
    .string({ required_error: 'GITHUB_OWNER is required' })
    .min(1, 'GITHUB_OWNER is required'),
  ownerType: z.enum(['user', 'org']).default('user'),
  privateRepos: z.boolean().default(false),
  baseUrl: z.string().url().default('https://api.github.com'),
  webUrl: z.string().url().default('https://github.com'),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const LLMConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    apiKey: z.string().optional(),
    model: z.string().min(1).default('openai/gpt-3.5-turbo'),
    baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
    maxTokens: z.number().int().positive().default(50),
    temperature: z.number().min(0).max(1).default(0.1),
    timeoutMs: z.number().int().positive().default(10_000),
  })
  .superRefine((llm, ctx) => {
    if (llm.enabled && !llm.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKey'],
        message: 'OPENROUTER_API_KEY is required unless the model is disabled',
      });
    }
  });

export const TemplatesConfigSchema = z.object({
  source: z.string().min(1),
  config: z.string().min(1),
});

export const GitConfigSchema = z.object({
  authorName: z.string().min(1).default('GitOps Onboarding Agent'),
  authorEmail: z.string().email().default('onboard@example.com'),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const KubernetesConfigSchema = z.object({
  kubeconfig: z.string().min(1),
  context: z.string().optional(),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const ArgoCDConfigSchema = z.object({
  namespace: z.string().min(1).default('argocd'),
  project: z.string().min(1).default('default'),
  destinationServer: z.string().url().default('https://kubernetes.default.svc'),
  /** Defaults to the app identifier when unset. */
  destinationNamespace: z.string().min(1).optional(),
  targetRevision: z.string().min(1).default('HEAD'),
  path: z.string().min(1).default('.'),
});

export const AppDefaultsSchema = z.object({
  /** Prefix for image names; defaults to the GitHub owner. */
  imageRegistry: z.string().min(1).optional(),
  imageTag: z.string().min(1).default('latest'),
  ingressDomain: z.string().min(1).default('local'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['text', 'json']).default('text'),
});

export const OnboardConfigSchema = z.object({
  github: GitHubConfigSchema,
  llm: LLMConfigSchema.default({}),
  templates: TemplatesConfigSchema,
  git: GitConfigSchema.default({}),
  kubernetes: KubernetesConfigSchema,
  argocd: ArgoCDConfigSchema.default({}),
  app: AppDefaultsSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type OnboardConfig = z.output<typeof OnboardConfigSchema>;
export type OnboardConfigInput = z.input<typeof OnboardConfigSchema>;
export type GitHubConfig = OnboardConfig['github'];
export type LLMConfig = OnboardConfig['llm'];
export type GitConfig = OnboardConfig['git'];
export type KubernetesConfig = OnboardConfig['kubernetes'];
export type ArgoCDConfig = OnboardConfig['argocd'];
export type AppDefaults = OnboardConfig['app'];
