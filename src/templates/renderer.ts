import Handlebars from 'handlebars';
import { RenderError, errorMessage, logger } from '../utils';

export interface RenderOptions {
  /** Template path, reported in errors. */
  file?: string;
}

/** `{{ name }}` or `{{{ name }}}` left behind after substitution. */
const PLACEHOLDER_TOKEN = /\{\{\{?\s*([A-Za-z_@][\w.@-]*)\s*\}?\}\}/g;

/**
 * Strict Handlebars renderer: an unbound placeholder is an error, never an
 * empty string, and output is not HTML-escaped.
 */
export class TemplateRenderer {
  private handlebars: typeof Handlebars;

  constructor() {
    this.handlebars = Handlebars.create();
  }

  /**
   * Render a template with variables
   */
  render(template: string, variables: Record<string, string>, options: RenderOptions = {}): string {
    let result: string;
    try {
      const compiled = this.handlebars.compile(template, {
        strict: true,
        noEscape: true,
      });
      result = compiled(variables);
    } catch (error) {
      const message = errorMessage(error);
      const missing = /"([^"]+)" not defined/.exec(message);
      logger.debug('Template rendering failed', { file: options.file, message });
      throw new RenderError(
        'UnresolvedPlaceholder',
        missing
          ? `Unbound placeholder "${missing[1]}" in ${options.file ?? 'template'}`
          : `Template ${options.file ?? 'template'} could not be rendered: ${message}`,
        { file: options.file, placeholder: missing?.[1], cause: error }
      );
    }

    const leftover = this.findPlaceholders(result);
    if (leftover.length > 0) {
      throw new RenderError(
        'UnresolvedPlaceholder',
        `Unresolved placeholder "${leftover[0]}" remains in ${options.file ?? 'template'}`,
        { file: options.file, placeholder: leftover[0] }
      );
    }

    return result;
  }

  /**
   * Placeholder names present in a string, sorted and de-duplicated.
   */
  findPlaceholders(text: string): string[] {
    const names = new Set<string>();
    for (const match of text.matchAll(PLACEHOLDER_TOKEN)) {
      names.add(match[1]);
    }
    return Array.from(names).sort();
  }
}
