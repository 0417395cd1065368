import { Agent, fetch } from 'undici';
import type { Dispatcher } from 'undici';
import type { RequestOptions, RestClient, RestResponse } from '../lib/contract.ts';
import { KubeConfigError } from '../lib/errors.ts';
import { KubeConfig } from '../lib/kubeconfig.ts';
import type { KubeConfigContext } from '../lib/kubeconfig.ts';

const isVerbose = process.argv.includes('--verbose');

/**
 * A RestClient that talks straight to the server named by one kubeconfig context.
 *
 * The cluster CA and any client certificate go into an undici Agent owned by
 * this client, so they never leak into other requests made by the process.
 * Credentials are static (token, token file or basic auth); credential
 * plugins are refused rather than run.
 */
export class KubeConfigRestClient implements RestClient {
  constructor(
    public readonly context: KubeConfigContext,
    private readonly dispatcher?: Dispatcher,
  ) {}

  static async forInCluster(): Promise<KubeConfigRestClient> {
    return await this.forKubeConfig(await KubeConfig.getInClusterConfig());
  }

  static async forKubectlProxy(): Promise<KubeConfigRestClient> {
    return await this.forKubeConfig(KubeConfig.getSimpleUrlConfig({
      baseUrl: 'http://localhost:8001',
    }));
  }

  static async readKubeConfig(path?: string, contextName?: string): Promise<KubeConfigRestClient> {
    const config = path
      ? await KubeConfig.readFromPath(path)
      : await KubeConfig.getDefaultConfig();
    return await this.forKubeConfig(config, contextName);
  }

  static async forKubeConfig(config: KubeConfig, contextName?: string): Promise<KubeConfigRestClient> {
    const context = config.fetchContext(contextName);
    const [ca, client] = await Promise.all([
      context.serverCa(),
      context.clientCertificate(),
    ]);

    const dispatcher = ca || client
      ? new Agent({ connect: { ca: ca ?? undefined, cert: client?.cert, key: client?.key } })
      : undefined;
    return new KubeConfigRestClient(context, dispatcher);
  }

  async performRequest(opts: RequestOptions): Promise<RestResponse> {
    const server = this.context.server;
    if (!server) throw new KubeConfigError(`kubeconfig context has no server URL`);

    const url = new URL(opts.path, server);
    const query = opts.querystring?.toString();
    if (query) url.search = query;

    // the provider chain's health check would otherwise show up in every run
    if (isVerbose && !url.searchParams.has('healthcheck')) {
      console.error(opts.method, url.pathname + url.search);
    }

    const headers: Record<string, string> = {};
    const authorization = await this.context.authorization();
    if (authorization) headers['Authorization'] = authorization;
    if (opts.accept) headers['Accept'] = opts.accept;
    if (opts.contentType) headers['Content-Type'] = opts.contentType;

    return await fetch(url, {
      method: opts.method,
      body: opts.bodyRaw,
      redirect: 'error',
      signal: opts.abortSignal,
      dispatcher: this.dispatcher,
      headers,
    });
  }
}
