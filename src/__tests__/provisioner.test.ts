/**
 * Tests for src/provisioner/repository-provisioner.ts
 */

import { describe, it, expect } from 'vitest';
import { RepositoryProvisioner, repositoryNames } from '../provisioner/repository-provisioner';
import { ProvisionError } from '../utils';
import { FakeRepositoryHost, HttpError } from './fakes';

const OWNER = 'acme';

function makeProvisioner(host: FakeRepositoryHost, ownerType: 'user' | 'org' = 'user'): RepositoryProvisioner {
  return new RepositoryProvisioner(host, {
    owner: OWNER,
    ownerType,
    privateRepos: true,
    webUrl: 'https://github.com/',
  });
}

describe('repositoryNames', () => {
  it('derives both names from the identifier', () => {
    expect(repositoryNames('inventory-api')).toEqual({
      source: 'inventory-api-source',
      config: 'inventory-api-config',
    });
  });
});

describe('RepositoryProvisioner', () => {
  it('creates both repositories when neither exists', async () => {
    const host = new FakeRepositoryHost();
    const result = await makeProvisioner(host, 'org').provision('inventory-api');
    if (!result.ok) throw result.error;

    expect(result.value.source).toMatchObject({
      name: 'inventory-api-source',
      cloneUrl: 'https://github.com/acme/inventory-api-source.git',
      existed: false,
      inferred: false,
    });
    expect(result.value.config.name).toBe('inventory-api-config');
    expect(host.created).toEqual([
      {
        owner: OWNER,
        name: 'inventory-api-source',
        description: 'Source code for inventory-api',
        private: true,
        organization: true,
      },
      {
        owner: OWNER,
        name: 'inventory-api-config',
        description: 'GitOps configuration for inventory-api',
        private: true,
        organization: true,
      },
    ]);
  });

  it('reuses repositories that already exist', async () => {
    const host = new FakeRepositoryHost();
    host.seed(OWNER, 'orders-source');
    const result = await makeProvisioner(host).provision('orders');
    if (!result.ok) throw result.error;

    expect(result.value.source.existed).toBe(true);
    expect(result.value.source.inferred).toBe(false);
    expect(result.value.config.existed).toBe(false);
    expect(host.created.map(params => params.name)).toEqual(['orders-config']);
  });

  it('is idempotent for the same identifier', async () => {
    const host = new FakeRepositoryHost();
    const provisioner = makeProvisioner(host);
    const first = await provisioner.provision('orders');
    const second = await provisioner.provision('orders');
    if (!first.ok || !second.ok) throw new Error('provisioning failed');

    expect(second.value.source.cloneUrl).toBe(first.value.source.cloneUrl);
    expect(second.value.config.cloneUrl).toBe(first.value.config.cloneUrl);
    expect(second.value.source.existed).toBe(true);
    expect(host.created).toHaveLength(2);
  });

  it('infers the clone URL when creation reports the name is taken', async () => {
    const host = new FakeRepositoryHost();
    host.racedNames.add('orders-config');
    const result = await makeProvisioner(host).provision('orders');
    if (!result.ok) throw result.error;

    expect(result.value.config).toEqual({
      name: 'orders-config',
      owner: OWNER,
      cloneUrl: 'https://github.com/acme/orders-config.git',
      htmlUrl: 'https://github.com/acme/orders-config',
      defaultBranch: 'main',
      existed: true,
      inferred: true,
    });
  });

  it('reports a permission failure instead of assuming the repository exists', async () => {
    const host = new FakeRepositoryHost();
    host.createFailures.set('orders-source', new HttpError(403, 'Resource not accessible by integration'));
    const result = await makeProvisioner(host).provision('orders');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ProvisionError);
    expect(result.error.failedRepository).toBe('orders-source');
    expect(result.error.resolved).toEqual([]);
    expect(result.error.stage).toBe('Provisioning');
    expect(result.error.code).toBe('PROVISION_FAILED');
    expect(result.error.details).toMatchObject({ cause: 'Resource not accessible by integration' });
  });

  it('names the repository that did resolve when the second one fails', async () => {
    const host = new FakeRepositoryHost();
    host.createFailures.set('orders-config', new HttpError(500, 'Server Error'));
    const result = await makeProvisioner(host).provision('orders');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failedRepository).toBe('orders-config');
    expect(result.error.resolved).toEqual([
      { name: 'orders-source', cloneUrl: 'https://github.com/acme/orders-source.git' },
    ]);
    expect(result.error.message).toBe(
      'Repository orders-config could not be provisioned (Server Error); orders-source already resolved'
    );
  });

  it('refuses a user owner that is not the account behind the token', async () => {
    const host = new FakeRepositoryHost();
    host.login = 'someone-else';
    const result = await makeProvisioner(host).provision('orders');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'GitHub token belongs to someone-else, not the configured owner acme; set GITHUB_OWNER to someone-else or use an organization owner'
    );
    expect(result.error.resolved).toEqual([]);
    expect(host.created).toEqual([]);
  });

  it('matches the token account without regard to case', async () => {
    const host = new FakeRepositoryHost();
    host.login = 'ACME';
    const result = await makeProvisioner(host).provision('orders');
    expect(result.ok).toBe(true);
  });

  it('does not look up the token account for an organization owner', async () => {
    const host = new FakeRepositoryHost();
    host.loginError = new HttpError(403, 'Resource not accessible by integration');
    const result = await makeProvisioner(host, 'org').provision('orders');
    expect(result.ok).toBe(true);
  });
});
