/**
 * Name Extractor
 *
 * Turns a free-text deployment request into an app identifier. Asks the
 * hosted model first, falls back to a fixed list of phrase patterns, and
 * finally to a default name. Never rejects.
 */

import { errorMessage, logger } from '../utils';
import type { CompletionProvider } from '../llm/types';

/** Lowercase letters, digits and single hyphens; 1-63 characters. */
export type AppIdentifier = string;

export const DEFAULT_APP_IDENTIFIER: AppIdentifier = 'my-app';

export const MAX_IDENTIFIER_LENGTH = 63;

export type ExtractionSource = 'model' | 'pattern' | 'default';

export interface ExtractionResult {
  identifier: AppIdentifier;
  source: ExtractionSource;
  /** Pattern label when `source` is 'pattern'. */
  pattern?: string;
}

/**
 * Anything that can turn a request into an identifier. The orchestrator
 * depends on this, so tests can swap the whole extractor for a stub.
 */
export interface IdentifierExtractor {
  extract(request: string): Promise<AppIdentifier>;
}

export interface NameExtractorOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

interface NamePattern {
  label: string;
  pattern: RegExp;
}

const FILLER_WORDS = new Set(['a', 'an', 'the', 'my', 'our', 'new']);

const SKIP_FILLERS = '(?:(?:a|an|the|my|our|new)\\s+)*';

/** Checked in order; the first pattern with a usable capture wins. */
const NAME_PATTERNS: NamePattern[] = [
  { label: 'called', pattern: /\bcalled\s+["']?([a-z0-9_-]+)/i },
  { label: 'named', pattern: /\bnamed\s+["']?([a-z0-9_-]+)/i },
  { label: 'service', pattern: /\b([a-z0-9_-]+)\s+service\b/i },
  { label: 'app', pattern: /\b([a-z0-9_-]+)\s+app\b/i },
  { label: 'deploy', pattern: new RegExp(`\\bdeploy\\s+${SKIP_FILLERS}([a-z0-9_-]+)`, 'i') },
  { label: 'create', pattern: new RegExp(`\\bcreate\\s+${SKIP_FILLERS}([a-z0-9_-]+)`, 'i') },
];

const EXTRACTION_PROMPT = [
  'Extract the application name from the developer request below.',
  'Return only the application name in lowercase with hyphens, no other text.',
  'Examples:',
  '- "I need a new NodeJS service called inventory-api" -> inventory-api',
  '- "Deploy my user-management service" -> user-management',
  '- "Create a payment-processor app" -> payment-processor',
].join('\n');

/**
 * Lowercase, keep only [a-z0-9-], collapse hyphen runs, trim hyphens and
 * cap at 63 characters.
 */
export function normalizeIdentifier(raw: string): string {
  const collapsed = raw
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
  return collapsed.slice(0, MAX_IDENTIFIER_LENGTH).replace(/-+$/, '');
}

export function isValidIdentifier(value: string): boolean {
  return (
    value.length >= 1 &&
    value.length <= MAX_IDENTIFIER_LENGTH &&
    /^[a-z0-9]+(?:-[a-z0-9]+)*$/.test(value)
  );
}

/**
 * Pattern fallback. Returns null when no pattern yields a usable name.
 */
export function matchNamePatterns(request: string): { identifier: AppIdentifier; pattern: string } | null {
  for (const { label, pattern } of NAME_PATTERNS) {
    const match = request.match(pattern);
    if (!match?.[1]) {
      continue;
    }
    const identifier = normalizeIdentifier(match[1].replace(/_/g, '-'));
    if (identifier && !FILLER_WORDS.has(identifier)) {
      return { identifier, pattern: label };
    }
  }
  return null;
}

export class NameExtractor implements IdentifierExtractor {
  private provider: CompletionProvider | null;
  private options: Required<Omit<NameExtractorOptions, 'model'>> & { model?: string };

  constructor(provider?: CompletionProvider | null, options: NameExtractorOptions = {}) {
    this.provider = provider ?? null;
    this.options = {
      model: options.model,
      maxTokens: options.maxTokens ?? 50,
      temperature: options.temperature ?? 0.1,
      timeoutMs: options.timeoutMs ?? 10_000,
    };
  }

  async extract(request: string): Promise<AppIdentifier> {
    return (await this.extractWithSource(request)).identifier;
  }

  /**
   * Same as extract, but reports which path produced the name.
   */
  async extractWithSource(request: string): Promise<ExtractionResult> {
    if (!request.trim()) {
      logger.info('Empty request, using default app identifier', { identifier: DEFAULT_APP_IDENTIFIER });
      return { identifier: DEFAULT_APP_IDENTIFIER, source: 'default' };
    }

    if (this.provider) {
      try {
        const identifier = await this.extractWithModel(request);
        if (identifier) {
          logger.debug(`Model extracted app identifier: ${identifier}`);
          return { identifier, source: 'model' };
        }
        logger.warn('Model returned no usable app identifier, falling back to patterns');
      } catch (error) {
        logger.warn(`Model extraction failed, falling back to patterns: ${errorMessage(error)}`);
      }
    }

    const matched = matchNamePatterns(request);
    if (matched) {
      logger.info('Extracted app identifier from request pattern', matched);
      return { identifier: matched.identifier, source: 'pattern', pattern: matched.pattern };
    }

    logger.warn('No app identifier found in request, using default', { identifier: DEFAULT_APP_IDENTIFIER });
    return { identifier: DEFAULT_APP_IDENTIFIER, source: 'default' };
  }

  private async extractWithModel(request: string): Promise<AppIdentifier> {
    if (!this.provider) {
      return '';
    }

    const timeoutMs = this.options.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`model call timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.provider.complete({
          messages: [
            { role: 'system', content: EXTRACTION_PROMPT },
            { role: 'user', content: request },
          ],
          model: this.options.model,
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
        }),
        timeoutPromise,
      ]);
      return normalizeIdentifier(response.content.trim());
    } finally {
      clearTimeout(timer);
    }
  }
}
