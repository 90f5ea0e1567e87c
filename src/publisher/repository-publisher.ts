/**
 * Repository Publisher
 *
 * Clones a provisioned repository into a scratch directory, writes a
 * rendered tree over it, commits as the configured author and pushes to
 * the default branch.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { RenderError, err, errorMessage, logger, ok, sanitizeString, type Result } from '../utils';
import { writeTree, type RenderedTree } from '../templates/tree';
import type { GitCloner } from '../tools/git-ops';
import type { RepositoryRef } from '../provisioner/repository-provisioner';

export interface PublishOutcome {
  repository: string;
  /** False when the tree matched what the branch already held. */
  changed: boolean;
  commit?: string;
}

export interface RepositoryPublisherOptions {
  token: string;
  authorName: string;
  authorEmail: string;
  /** Parent of the scratch clones; the OS temp dir by default. */
  workRoot?: string;
}

/**
 * Embed the token in an https clone URL as `x-access-token`.
 */
export function authenticatedCloneUrl(cloneUrl: string, token: string): string {
  const url = new URL(cloneUrl);
  url.username = 'x-access-token';
  url.password = token;
  return url.toString();
}

export class RepositoryPublisher {
  constructor(
    private clone: GitCloner,
    private options: RepositoryPublisherOptions
  ) {}

  async publish(
    repo: RepositoryRef,
    tree: RenderedTree,
    commitMessage: string
  ): Promise<Result<PublishOutcome, RenderError>> {
    const workRoot = this.options.workRoot ?? os.tmpdir();
    let workDir: string | undefined;

    try {
      workDir = await fs.mkdtemp(path.join(workRoot, `onboard-${repo.name}-`));
      const checkout = path.join(workDir, repo.name);

      const workspace = await this.clone({
        url: authenticatedCloneUrl(repo.cloneUrl, this.options.token),
        path: checkout,
      });

      writeTree(tree, workspace.path);
      await workspace.stageAll();

      if (!(await workspace.hasStagedChanges())) {
        logger.info(`No changes to publish for ${repo.name}`, { repository: repo.name });
        return ok({ repository: repo.name, changed: false });
      }

      const { hash } = await workspace.commit({
        message: commitMessage,
        authorName: this.options.authorName,
        authorEmail: this.options.authorEmail,
      });
      await workspace.push({ branch: repo.defaultBranch });

      logger.info(`Published ${tree.length} files to ${repo.name}`, { repository: repo.name, commit: hash });
      return ok({ repository: repo.name, changed: true, commit: hash });
    } catch (error) {
      if (error instanceof RenderError) {
        return err(error);
      }
      // simple-git errors may echo the remote URL, token included
      const message = sanitizeString(`Publishing to ${repo.name} failed: ${errorMessage(error)}`);
      return err(
        new RenderError('PublishFailed', message, {
          repository: repo.name,
          cause: sanitizeString(errorMessage(error)),
        })
      );
    } finally {
      if (workDir) {
        await fs.rm(workDir, { recursive: true, force: true });
      }
    }
  }
}
