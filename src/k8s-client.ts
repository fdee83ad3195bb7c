import * as k8s from '@kubernetes/client-node';
import type { ClientFactory } from './client-cache.js';
import type { ContextDescriptor } from './context-registry.js';
import { withTimeout } from './utils/async.js';

/** API groups the resource operations call, all bound to one context. */
export interface KubeClient {
  readonly context: string;
  readonly core: k8s.CoreV1Api;
  readonly apps: k8s.AppsV1Api;
  readonly rbac: k8s.RbacAuthorizationV1Api;
  readonly networking: k8s.NetworkingV1Api;
}

export const MERGE_PATCH = k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.MergePatch);

/**
 * Copies the loaded kubeconfig with its current context pinned to
 * `contextName`, so each client owns its own configuration.
 */
export function scopedKubeConfig(source: k8s.KubeConfig, contextName: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  kc.loadFromOptions({
    clusters: source.clusters,
    users: source.users,
    contexts: source.contexts,
    currentContext: contextName,
  });
  return kc;
}

export function makeKubeClient(kc: k8s.KubeConfig, contextName: string): KubeClient {
  return Object.freeze({
    context: contextName,
    core: kc.makeApiClient(k8s.CoreV1Api),
    apps: kc.makeApiClient(k8s.AppsV1Api),
    rbac: kc.makeApiClient(k8s.RbacAuthorizationV1Api),
    networking: kc.makeApiClient(k8s.NetworkingV1Api),
  });
}

/**
 * Client factory for the cache. Construction probes the API server's version
 * endpoint so unreachable endpoints and rejected credentials surface here
 * rather than on the first resource call.
 */
export function createKubeClientFactory(
  source: k8s.KubeConfig,
  options: { connectTimeoutMs: number },
): ClientFactory<KubeClient> {
  return async (context: ContextDescriptor) => {
    const kc = scopedKubeConfig(source, context.name);
    const version = kc.makeApiClient(k8s.VersionApi);
    await withTimeout(() => version.getCode(), options.connectTimeoutMs);
    return makeKubeClient(kc, context.name);
  };
}
