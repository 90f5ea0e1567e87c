/**
 * Git Operations
 *
 * simple-git wrapper for the clone, commit and push steps of publishing a
 * rendered tree.
 */

import simpleGit, { type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { logger } from '../utils';

export interface GitCloneOptions {
  url: string;
  path: string;
}

export interface GitCommitOptions {
  message: string;
  authorName: string;
  authorEmail: string;
}

export interface GitPushOptions {
  remote?: string;
  branch: string;
}

/**
 * A cloned working copy. GitOperations implements it over simple-git;
 * tests implement it in memory.
 */
export interface GitWorkspace {
  readonly path: string;
  stageAll(): Promise<void>;
  hasStagedChanges(): Promise<boolean>;
  commit(options: GitCommitOptions): Promise<{ hash: string }>;
  push(options: GitPushOptions): Promise<void>;
}

export type GitCloner = (options: GitCloneOptions) => Promise<GitWorkspace>;

function gitOptions(baseDir: string | undefined, timeoutMs: number): Partial<SimpleGitOptions> {
  return {
    ...(baseDir ? { baseDir } : {}),
    binary: 'git',
    maxConcurrentProcesses: 6,
    trimmed: true,
    timeout: { block: timeoutMs },
  };
}

export class GitOperations implements GitWorkspace {
  private git: SimpleGit;
  readonly path: string;

  constructor(repoPath: string, timeoutMs: number = 120_000) {
    this.path = repoPath;
    this.git = simpleGit(gitOptions(repoPath, timeoutMs));
  }

  /**
   * Clone a repository and return a workspace bound to the clone
   */
  static async clone(options: GitCloneOptions, timeoutMs: number = 120_000): Promise<GitOperations> {
    logger.info(`Cloning repository from ${options.url} to ${options.path}`);

    await simpleGit(gitOptions(undefined, timeoutMs)).clone(options.url, options.path);

    return new GitOperations(options.path, timeoutMs);
  }

  async stageAll(): Promise<void> {
    logger.debug(`Staging all changes in ${this.path}`);
    await this.git.add(['--all', '.']);
  }

  async hasStagedChanges(): Promise<boolean> {
    const status = await this.git.status();
    return !status.isClean();
  }

  /**
   * Commit staged changes as the given author
   */
  async commit(options: GitCommitOptions): Promise<{ hash: string }> {
    logger.info(`Committing with message: ${options.message.split('\n')[0]}`);

    await this.git.addConfig('user.name', options.authorName);
    await this.git.addConfig('user.email', options.authorEmail);
    const result = await this.git.commit(options.message);

    return { hash: result.commit };
  }

  /**
   * Push to remote
   */
  async push(options: GitPushOptions): Promise<void> {
    const remote = options.remote || 'origin';
    logger.info(`Pushing to ${remote}/${options.branch}`);

    await this.git.push(remote, options.branch);
  }
}
