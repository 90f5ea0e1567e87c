/**
 * Kubernetes Operations
 *
 * kubectl wrapper for applying and deleting the Argo CD descriptor.
 * Manifests are passed on stdin, never through a shell.
 */

import { spawn } from 'node:child_process';
import { errorMessage, logger } from '../utils';

export interface KubernetesClientConfig {
  kubeconfig?: string;
  context?: string;
  timeoutMs?: number;
}

export interface ApplyOptions {
  manifest: string;
}

export interface DeleteOptions {
  resource: string;
  name: string;
  namespace?: string;
  ignoreNotFound?: boolean;
}

export interface CommandResult {
  success: boolean;
  output: string;
  error?: string;
  exitCode: number;
}

/**
 * The cluster calls the registrar and cleanup depend on.
 */
export interface ClusterClient {
  apply(options: ApplyOptions): Promise<CommandResult>;
  delete(options: DeleteOptions): Promise<CommandResult>;
}

/**
 * Kubernetes operations class wrapping kubectl CLI
 */
export class KubernetesOperations implements ClusterClient {
  private kubectlPath: string;
  private kubeconfig?: string;
  private context?: string;
  private timeoutMs: number;

  constructor(config: KubernetesClientConfig = {}, kubectlPath: string = 'kubectl') {
    this.kubectlPath = kubectlPath;
    this.kubeconfig = config.kubeconfig;
    this.context = config.context;
    this.timeoutMs = config.timeoutMs ?? 120_000;
  }

  /**
   * Build base kubectl command with common flags
   */
  private buildBaseArgs(): string[] {
    const args: string[] = [];
    if (this.kubeconfig) {
      args.push('--kubeconfig', this.kubeconfig);
    }
    if (this.context) {
      args.push('--context', this.context);
    }
    return args;
  }

  /**
   * Run kubectl, optionally feeding stdin
   */
  private execute(args: string[], stdin?: string): Promise<CommandResult> {
    const fullArgs = [...this.buildBaseArgs(), ...args];
    const command = `${this.kubectlPath} ${fullArgs.join(' ')}`;
    logger.debug(`Executing kubectl command: ${command}`);

    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const child = spawn(this.kubectlPath, fullArgs, { stdio: ['pipe', 'pipe', 'pipe'] });
      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, this.timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', error => {
        clearTimeout(timer);
        logger.error(`kubectl could not be started: ${command}`, { error: errorMessage(error) });
        resolve({ success: false, output: '', error: errorMessage(error), exitCode: 127 });
      });

      child.on('close', code => {
        clearTimeout(timer);
        const exitCode = code ?? 1;
        if (timedOut) {
          resolve({
            success: false,
            output: stdout.trim(),
            error: `kubectl timed out after ${this.timeoutMs}ms`,
            exitCode,
          });
          return;
        }
        if (exitCode !== 0) {
          logger.error(`kubectl command failed: ${command}`, { exitCode, stderr: stderr.trim() });
          resolve({ success: false, output: stdout.trim(), error: stderr.trim(), exitCode });
          return;
        }
        resolve({ success: true, output: stdout.trim(), exitCode: 0 });
      });

      // kubectl may exit before reading stdin; 'close' reports the failure
      child.stdin.on('error', error => {
        logger.debug(`kubectl stdin closed early: ${errorMessage(error)}`);
      });
      child.stdin.end(stdin ?? '');
    });
  }

  /**
   * Apply a manifest to the cluster
   */
  async apply(options: ApplyOptions): Promise<CommandResult> {
    return this.execute(['apply', '-f', '-'], options.manifest);
  }

  /**
   * Delete a named resource
   */
  async delete(options: DeleteOptions): Promise<CommandResult> {
    const args = ['delete', options.resource, options.name];

    if (options.namespace) {
      args.push('-n', options.namespace);
    }
    if (options.ignoreNotFound) {
      args.push('--ignore-not-found');
    }

    return this.execute(args);
  }
}
