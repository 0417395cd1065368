import { z } from 'zod';
import type { RestClient } from '../lib/contract.ts';
import { KubernetesClientError } from '../lib/errors.ts';
import { ResourceGateway } from '../lib/gateway.ts';
import { resourceTypeFromSchema } from '../lib/resource-types.ts';
import { KubeConfigRestClient } from './via-kubeconfig.ts';

export { KubeConfigRestClient };

const ApiVersionsType = resourceTypeFromSchema('APIVersions', z.object({
  kind: z.string().optional(),
  versions: z.array(z.string()).optional(),
}));

export type ClientProvider = () => Promise<RestClient>;

/** Tries each way of reaching an API server in order; the first one that answers like one wins. */
export class ClientProviderChain {
  constructor(
    public readonly providers: ReadonlyArray<readonly [label: string, provider: ClientProvider]>,
  ) {}

  async getClient(): Promise<RestClient> {
    const failures = new Array<string>();
    for (const [label, provider] of this.providers) {
      try {
        const client = await provider();
        await expectApiSurface(client);
        return client;
      } catch (err) {
        failures.push(`  - ${label} ${describeFailure(err)}`);
      }
    }
    throw new KubernetesClientError([
      `Failed to load any possible Kubernetes clients:`,
      ...failures,
    ].join('\n'));
  }
}

async function expectApiSurface(client: RestClient) {
  const versions = await new ResourceGateway(client).getOne(ApiVersionsType, {
    path: '/api?healthcheck',
  });
  if (versions?.kind !== 'APIVersions') {
    throw new Error(`Didn't see a Kubernetes API surface at /api`);
  }
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/** The static side of KubeConfigRestClient that the chain calls. */
export interface KubeConfigClientFactory {
  forInCluster(): Promise<RestClient>;
  readKubeConfig(path?: string, contextName?: string): Promise<RestClient>;
  forKubectlProxy(): Promise<RestClient>;
}

/** In-cluster service account, then the user's kubeconfig, then `kubectl proxy`. */
export function makeClientProviderChain(factory: KubeConfigClientFactory): ClientProviderChain {
  return new ClientProviderChain([
    ['InCluster', () => factory.forInCluster()],
    ['KubeConfig', () => factory.readKubeConfig()],
    ['KubectlProxy', () => factory.forKubectlProxy()],
  ]);
}

export const DefaultClientProvider = makeClientProviderChain(KubeConfigRestClient);

export async function autoDetectClient(): Promise<RestClient> {
  return await DefaultClientProvider.getClient();
}
