import { describe, expect, it, vi } from 'vitest';
import type { RestClient } from '../lib/contract.ts';
import { ClientProviderChain, makeClientProviderChain } from '../transports/mod.ts';
import { FakeRestClient, jsonResponse } from './helpers/fake-client.ts';

function apiServer() {
  return new FakeRestClient(() => jsonResponse(200, { kind: 'APIVersions', versions: ['v1'] }));
}

describe('ClientProviderChain', () => {
  it('returns the first client that answers like an API server', async () => {
    const good = apiServer();
    const chain = new ClientProviderChain([
      ['Broken', () => Promise.reject(new Error('no service account'))],
      ['Good', () => Promise.resolve(good)],
    ]);

    expect(await chain.getClient()).toBe(good);
    expect(good.requests.map(req => [req.method, req.path])).toEqual([['GET', '/api?healthcheck']]);
  });

  it('lists every failure when nothing works', async () => {
    const chain = new ClientProviderChain([
      ['InCluster', () => Promise.reject(new Error('no service account'))],
      ['Proxy', () => Promise.resolve(new FakeRestClient(() => jsonResponse(200, { kind: 'Status' })))],
    ]);

    await expect(chain.getClient()).rejects.toThrow([
      'Failed to load any possible Kubernetes clients:',
      '  - InCluster Error: no service account',
      `  - Proxy Error: Didn't see a Kubernetes API surface at /api`,
    ].join('\n'));
  });
});

describe('makeClientProviderChain', () => {
  it('tries in-cluster, then kubeconfig, then kubectl proxy', async () => {
    const fromKubeConfig = apiServer();
    const factory = {
      forInCluster: vi.fn((): Promise<RestClient> => Promise.reject(new Error('not in a pod'))),
      readKubeConfig: vi.fn((): Promise<RestClient> => Promise.resolve(fromKubeConfig)),
      forKubectlProxy: vi.fn((): Promise<RestClient> => Promise.resolve(apiServer())),
    };

    expect(await makeClientProviderChain(factory).getClient()).toBe(fromKubeConfig);
    expect(factory.forInCluster).toHaveBeenCalledTimes(1);
    expect(factory.readKubeConfig).toHaveBeenCalledTimes(1);
    expect(factory.forKubectlProxy).not.toHaveBeenCalled();
  });
});
