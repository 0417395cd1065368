export * from './lib/contract.ts';
export * from './lib/errors.ts';
export * from './lib/gateway.ts';
export * from './lib/json-patch.ts';
export { KubeConfig, KubeConfigContext, kubeConfigSchema, mergeKubeConfigs } from './lib/kubeconfig.ts';
export type { ClusterConfig, ContextConfig, RawKubeConfig, UserConfig } from './lib/kubeconfig.ts';
export { LineDecoder, charsetFromContentType } from './lib/line-decoder.ts';
export * from './lib/resource-types.ts';
export * from './lib/stream-transformers.ts';

/**
 * The KubeConfig-based client covers in-cluster service accounts,
 * kubeconfig files and `kubectl proxy`.
 * autoDetectClient() tries each of those in turn.
 */
export {
  KubeConfigRestClient,
  ClientProviderChain,
  makeClientProviderChain,
  DefaultClientProvider,
  autoDetectClient,
} from './transports/mod.ts';
export type { ClientProvider, KubeConfigClientFactory } from './transports/mod.ts';


/** Paginates through an API request, yielding each successive page as a whole */
export async function* readAllPages<T, U extends {continue?: string | null}>(pageFunc: (token?: string) => Promise<{metadata: U, items: T[]}>) {
  let pageToken: string | undefined;
  do {
    const page = await pageFunc(pageToken ?? undefined);
    yield page;
    pageToken = page.metadata.continue ?? undefined;
  } while (pageToken);
}

/** Paginates through an API request, yielding every individual item returned */
export async function* readAllItems<T>(pageFunc: (token?: string) => Promise<{metadata: {continue?: string | null}, items: T[]}>) {
  for await (const page of readAllPages(pageFunc)) {
    yield* page.items;
  }
}
