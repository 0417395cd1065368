import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { KubeConfigError } from './errors.ts';

// Only the fields this client acts on; anything else in the file is ignored.

const contextSchema = z.object({
  cluster: z.string().optional(),
  user: z.string().optional(),
  namespace: z.string().optional(),
});

const clusterSchema = z.object({
  server: z.string().optional(),
  'certificate-authority': z.string().optional(),
  'certificate-authority-data': z.string().optional(),
});

const userSchema = z.object({
  token: z.string().optional(),
  tokenFile: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  'client-certificate': z.string().optional(),
  'client-certificate-data': z.string().optional(),
  'client-key': z.string().optional(),
  'client-key-data': z.string().optional(),
  // recognised so they can be refused, never run
  exec: z.unknown().optional(),
  'auth-provider': z.unknown().optional(),
});

export const kubeConfigSchema = z.object({
  apiVersion: z.literal('v1'),
  kind: z.literal('Config'),
  'current-context': z.string().optional(),
  contexts: z.array(z.object({ name: z.string(), context: contextSchema })).nullish(),
  clusters: z.array(z.object({ name: z.string(), cluster: clusterSchema })).nullish(),
  users: z.array(z.object({ name: z.string(), user: userSchema })).nullish(),
});

export type RawKubeConfig = z.infer<typeof kubeConfigSchema>;
export type ContextConfig = z.infer<typeof contextSchema>;
export type ClusterConfig = z.infer<typeof clusterSchema>;
export type UserConfig = z.infer<typeof userSchema>;

/** A parsed kubeconfig; `fetchContext` picks the cluster and user to talk as. */
export class KubeConfig {
  constructor(
    public readonly data: RawKubeConfig,
  ) {}

  static parse(raw: unknown, source: string): KubeConfig {
    const result = kubeConfigSchema.safeParse(raw);
    if (result.success) return new KubeConfig(result.data);
    const [issue] = result.error.issues;
    throw new KubeConfigError(
      `${source} is not a kubeconfig: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`,
      { cause: result.error });
  }

  static async readFromPath(path: string): Promise<KubeConfig> {
    const text = await readFile(path, 'utf-8');
    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (err) {
      throw new KubeConfigError(`${path} is not valid YAML`, { cause: err });
    }
    return KubeConfig.parse(raw, path);
  }

  /**
   * Every file named in $KUBECONFIG, merged with the first definition winning;
   * otherwise ~/.kube/config. Missing files contribute nothing.
   */
  static async getDefaultConfig(): Promise<KubeConfig> {
    const listed = (process.env.KUBECONFIG ?? '').split(delimiter).filter(path => path);
    const paths = listed.length > 0 ? listed : [join(homedir(), '.kube', 'config')];

    const found = await Promise.all(paths.map(readIfPresent));
    return new KubeConfig(mergeKubeConfigs(found.flatMap(config => config ? [config.data] : [])));
  }

  /** Service-account credentials mounted into a pod. The token file is re-read per request. */
  static async getInClusterConfig({
    baseUrl = 'https://kubernetes.default.svc.cluster.local',
    secretsPath = '/var/run/secrets/kubernetes.io/serviceaccount',
  }={}): Promise<KubeConfig> {
    const namespace = (await readFile(join(secretsPath, 'namespace'), 'utf-8')).trim();
    return new KubeConfig({
      apiVersion: 'v1',
      kind: 'Config',
      'current-context': 'in-cluster',
      contexts: [{ name: 'in-cluster', context: { cluster: 'in-cluster', user: 'in-cluster', namespace } }],
      clusters: [{ name: 'in-cluster', cluster: {
        server: baseUrl,
        'certificate-authority': join(secretsPath, 'ca.crt'),
      } }],
      users: [{ name: 'in-cluster', user: { tokenFile: join(secretsPath, 'token') } }],
    });
  }

  /** No credentials at all, as for `kubectl proxy`. */
  static getSimpleUrlConfig({
    baseUrl = 'http://localhost:8080',
  }={}): KubeConfig {
    return new KubeConfig({
      apiVersion: 'v1',
      kind: 'Config',
      'current-context': 'simple-url',
      contexts: [{ name: 'simple-url', context: { cluster: 'simple-url' } }],
      clusters: [{ name: 'simple-url', cluster: { server: baseUrl } }],
    });
  }

  /** Unknown names resolve to empty sections, the way kubectl tolerates them. */
  fetchContext(contextName = this.data['current-context']): KubeConfigContext {
    const context = findNamed(this.data.contexts, contextName)?.context ?? {};
    return new KubeConfigContext(
      context,
      findNamed(this.data.clusters, context.cluster)?.cluster ?? {},
      findNamed(this.data.users, context.user)?.user ?? {});
  }
}

export class KubeConfigContext {
  constructor(
    public readonly context: ContextConfig,
    public readonly cluster: ClusterConfig,
    public readonly user: UserConfig,
  ) {}

  get server(): string | null {
    return this.cluster.server || null;
  }

  get defaultNamespace(): string | null {
    return this.context.namespace || null;
  }

  /** PEM text of the cluster's CA, when the kubeconfig names one. */
  async serverCa(): Promise<string | null> {
    return await readPem(this.cluster['certificate-authority-data'], this.cluster['certificate-authority']);
  }

  async clientCertificate(): Promise<{ cert: string; key: string } | null> {
    const [cert, key] = await Promise.all([
      readPem(this.user['client-certificate-data'], this.user['client-certificate']),
      readPem(this.user['client-key-data'], this.user['client-key']),
    ]);
    if (cert && key) return { cert, key };
    if (cert || key) throw new KubeConfigError(
      `kubeconfig user has a client ${cert ? 'certificate without a key' : 'key without a certificate'}`);
    return null;
  }

  /** Value for the Authorization header, or null to send none. */
  async authorization(): Promise<string | null> {
    const { username, password, token, tokenFile } = this.user;
    if (username || password) {
      return `Basic ${Buffer.from(`${username ?? ''}:${password ?? ''}`).toString('base64')}`;
    }
    if (token) return `Bearer ${token}`;
    if (tokenFile) return `Bearer ${(await readFile(tokenFile, 'utf-8')).trim()}`;

    if (this.user.exec !== undefined || this.user['auth-provider'] !== undefined) {
      throw new KubeConfigError(
        `kubeconfig user relies on a credential plugin, which this client doesn't run; supply a token instead`);
    }
    return null;
  }
}

/** First definition of each name wins, as kubectl merges $KUBECONFIG. */
export function mergeKubeConfigs(configs: readonly RawKubeConfig[]): RawKubeConfig {
  return {
    apiVersion: 'v1',
    kind: 'Config',
    'current-context': configs.find(config => config['current-context'])?.['current-context'] ?? '',
    contexts: firstOfEachName(configs.map(config => config.contexts)),
    clusters: firstOfEachName(configs.map(config => config.clusters)),
    users: firstOfEachName(configs.map(config => config.users)),
  };
}

function firstOfEachName<T extends { name: string }>(lists: Array<T[] | null | undefined>): T[] {
  const byName = new Map<string, T>();
  for (const entry of lists.flatMap(list => list ?? [])) {
    if (!byName.has(entry.name)) byName.set(entry.name, entry);
  }
  return Array.from(byName.values());
}

function findNamed<T extends { name: string }>(list: T[] | null | undefined, name: string | undefined): T | undefined {
  return name ? list?.find(entry => entry.name === name) : undefined;
}

async function readPem(inline: string | undefined, path: string | undefined): Promise<string | null> {
  if (inline) return Buffer.from(inline, 'base64').toString('utf-8');
  if (path) return await readFile(path, 'utf-8');
  return null;
}

async function readIfPresent(path: string): Promise<KubeConfig | null> {
  try {
    return await KubeConfig.readFromPath(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}
