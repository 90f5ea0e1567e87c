/**
 * Template trees
 *
 * Loads a directory of parameterized files, renders every text file with
 * the same bindings and writes the result to a destination directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { RenderError, err, errorMessage, logger, ok, type Result } from '../utils';
import { TemplateRenderer } from './renderer';

export type VariableBinding = Record<string, string>;

export interface TreeEntry {
  /** Relative path with '/' separators. */
  path: string;
  content: Buffer;
  /** Permission bits of the source file. */
  mode: number;
  binary: boolean;
}

export type TemplateTree = TreeEntry[];
export type RenderedTree = TreeEntry[];

const BINARY_EXTENSIONS = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.ico',
  '.webp',
  '.woff',
  '.woff2',
  '.ttf',
  '.eot',
  '.pdf',
  '.zip',
  '.gz',
  '.tgz',
  '.jar',
]);

const SKIPPED_DIRECTORIES = new Set(['.git']);

function isBinaryFile(filename: string, content: Buffer): boolean {
  if (BINARY_EXTENSIONS.has(path.extname(filename).toLowerCase())) {
    return true;
  }
  return content.includes(0);
}

/**
 * Read a template root into an ordered list of entries.
 */
export function loadTemplateTree(root: string): TemplateTree {
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new RenderError('TemplateMissing', `Template root does not exist: ${root}`, { templateRoot: root });
  }

  const entries: TemplateTree = [];

  const scanDirectory = (dir: string, segments: string[]): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          scanDirectory(fullPath, [...segments, entry.name]);
        }
      } else if (entry.isFile()) {
        const content = fs.readFileSync(fullPath);
        entries.push({
          path: [...segments, entry.name].join('/'),
          content,
          mode: fs.statSync(fullPath).mode & 0o777,
          binary: isBinaryFile(entry.name, content),
        });
      }
    }
  };

  scanDirectory(root, []);
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return entries;
}

/**
 * Substitute every placeholder in a loaded tree. Binary files pass through.
 */
export function renderTemplateTree(
  tree: TemplateTree,
  bindings: VariableBinding,
  renderer: TemplateRenderer = new TemplateRenderer()
): RenderedTree {
  return tree.map(entry => {
    if (entry.binary) {
      return entry;
    }
    const rendered = renderer.render(entry.content.toString('utf-8'), bindings, { file: entry.path });
    return { ...entry, content: Buffer.from(rendered, 'utf-8') };
  });
}

/**
 * Load and render a template root.
 */
export function render(templateRoot: string, bindings: VariableBinding): Result<RenderedTree, RenderError> {
  try {
    const tree = loadTemplateTree(templateRoot);
    const rendered = renderTemplateTree(tree, bindings);
    logger.debug(`Rendered ${rendered.length} files from ${templateRoot}`);
    return ok(rendered);
  } catch (error) {
    if (error instanceof RenderError) {
      return err(error);
    }
    return err(
      new RenderError('TemplateMissing', `Template root ${templateRoot} could not be read: ${errorMessage(error)}`, {
        templateRoot,
        cause: error,
      })
    );
  }
}

/**
 * Write a rendered tree under `destination`, creating it if needed.
 * Existing files at the same paths are overwritten; others are kept.
 */
export function writeTree(tree: RenderedTree, destination: string): void {
  fs.mkdirSync(destination, { recursive: true });
  const root = path.resolve(destination);

  for (const entry of tree) {
    const target = path.resolve(root, ...entry.path.split('/'));
    if (!target.startsWith(root + path.sep)) {
      throw new RenderError('TemplateMissing', `Template path escapes destination: ${entry.path}`, {
        file: entry.path,
      });
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, entry.content);
    fs.chmodSync(target, entry.mode);
  }
}
