import * as k8s from '@kubernetes/client-node';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { delimiter, join } from 'path';
import { ContextLoadError, UnknownContextError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';

const SERVICE_ACCOUNT_TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

export interface ContextDescriptor {
  readonly name: string;
  readonly cluster: string;
  readonly server: string;
  readonly user: string;
  readonly namespace?: string;
  readonly inCluster: boolean;
}

export interface ContextResolver {
  resolve(contextName?: string): ContextDescriptor;
}

export interface LoadedKubeConfig {
  kubeConfig: k8s.KubeConfig;
  inCluster: boolean;
  source: string;
}

export interface LoadKubeConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

function uniqueByName<T extends { name: string }>(entries: T[]): T[] {
  const seen = new Map<string, T>();
  for (const entry of entries) {
    if (!seen.has(entry.name)) {
      seen.set(entry.name, entry);
    }
  }
  return [...seen.values()];
}

/**
 * Merges the files of a KUBECONFIG list. The first file to define a name
 * wins, and the first current-context set is kept.
 */
export function loadKubeConfigFiles(paths: readonly string[]): k8s.KubeConfig {
  const configs = paths.map((path) => {
    const kc = new k8s.KubeConfig();
    kc.loadFromFile(path);
    return kc;
  });
  const merged = new k8s.KubeConfig();
  merged.loadFromOptions({
    clusters: uniqueByName(configs.flatMap((kc) => kc.clusters)),
    users: uniqueByName(configs.flatMap((kc) => kc.users)),
    contexts: uniqueByName(configs.flatMap((kc) => kc.contexts)),
    currentContext: configs.map((kc) => kc.getCurrentContext()).find((name) => name) ?? '',
  });
  return merged;
}

/**
 * Reads the credential source once. An explicit path wins, then KUBECONFIG,
 * then ~/.kube/config, then the in-cluster service account mount.
 */
export function loadKubeConfig(options: LoadKubeConfigOptions = {}): LoadedKubeConfig {
  const env = options.env ?? process.env;
  let kc = new k8s.KubeConfig();
  const defaultPath = join(options.home ?? homedir(), '.kube', 'config');

  let source: string;
  let inCluster = false;
  try {
    if (options.path) {
      source = options.path;
      kc.loadFromFile(options.path);
    } else if (env.KUBECONFIG && env.KUBECONFIG.split(delimiter).some(Boolean)) {
      source = env.KUBECONFIG;
      kc = loadKubeConfigFiles(env.KUBECONFIG.split(delimiter).filter(Boolean));
    } else if (existsSync(defaultPath)) {
      source = defaultPath;
      kc.loadFromFile(defaultPath);
    } else if (env.KUBERNETES_SERVICE_HOST && existsSync(SERVICE_ACCOUNT_TOKEN_PATH)) {
      source = 'in-cluster service account';
      kc.loadFromCluster();
      inCluster = true;
    } else {
      throw new ContextLoadError(
        `No kubeconfig found at ${defaultPath} and not running inside a cluster`,
      );
    }
  } catch (err) {
    if (err instanceof ContextLoadError) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ContextLoadError(`Failed to load cluster credentials: ${message}`, { cause: err });
  }

  return { kubeConfig: kc, inCluster, source };
}

export class ContextRegistry implements ContextResolver {
  private readonly contexts: ReadonlyMap<string, ContextDescriptor>;
  readonly defaultContext: ContextDescriptor;

  constructor(descriptors: readonly ContextDescriptor[], defaultContextName?: string) {
    if (descriptors.length === 0) {
      throw new ContextLoadError('No usable kube contexts were loaded');
    }

    const contexts = new Map<string, ContextDescriptor>();
    for (const descriptor of descriptors) {
      if (contexts.has(descriptor.name)) {
        throw new ContextLoadError(`Duplicate kube context '${descriptor.name}'`);
      }
      contexts.set(descriptor.name, Object.freeze({ ...descriptor }));
    }
    this.contexts = contexts;

    const fallback = contexts.get(descriptors[0].name);
    const selected = defaultContextName === undefined ? fallback : contexts.get(defaultContextName);
    if (!selected) {
      throw new ContextLoadError(`Default context '${defaultContextName}' is not configured`);
    }
    this.defaultContext = selected;
  }

  /**
   * Builds descriptors from a loaded kubeconfig. `defaultContext` must name a
   * loaded context; without it the kubeconfig's current-context is used when
   * it is loadable, else the first context.
   */
  static fromKubeConfig(
    loaded: LoadedKubeConfig,
    options: { defaultContext?: string; logger?: Logger } = {},
  ): ContextRegistry {
    const { kubeConfig, inCluster } = loaded;
    const descriptors: ContextDescriptor[] = [];

    for (const ctx of kubeConfig.getContexts()) {
      const cluster = kubeConfig.getCluster(ctx.cluster);
      if (!cluster) {
        options.logger?.warn(
          { context: ctx.name, cluster: ctx.cluster },
          'skipping context whose cluster is not defined',
        );
        continue;
      }
      descriptors.push({
        name: ctx.name,
        cluster: cluster.name,
        server: cluster.server,
        user: ctx.user,
        ...(ctx.namespace ? { namespace: ctx.namespace } : {}),
        inCluster,
      });
    }

    const current = kubeConfig.getCurrentContext();
    const defaultName =
      options.defaultContext ??
      (descriptors.some((d) => d.name === current) ? current : undefined);

    return new ContextRegistry(descriptors, defaultName);
  }

  resolve(contextName?: string): ContextDescriptor {
    if (contextName === undefined) {
      return this.defaultContext;
    }
    const descriptor = this.contexts.get(contextName);
    if (!descriptor) {
      throw new UnknownContextError(contextName);
    }
    return descriptor;
  }

  list(): ContextDescriptor[] {
    return [...this.contexts.values()];
  }
}
