import * as k8s from '@kubernetes/client-node';
import type { ContextDescriptor } from '../context-registry.js';
import { makeKubeClient, scopedKubeConfig, type KubeClient } from '../k8s-client.js';

export const TEST_KUBECONFIG = `
apiVersion: v1
kind: Config
current-context: dev
clusters:
  - name: prod-cluster
    cluster:
      server: https://prod.example.test:6443
  - name: dev-cluster
    cluster:
      server: https://dev.example.test:6443
users:
  - name: prod-admin
    user:
      token: test-secret
  - name: dev-admin
    user:
      token: test-secret
contexts:
  - name: prod
    context:
      cluster: prod-cluster
      user: prod-admin
      namespace: payments
  - name: dev
    context:
      cluster: dev-cluster
      user: dev-admin
`;

export function loadTestKubeConfig(yaml: string = TEST_KUBECONFIG): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  kc.loadFromString(yaml);
  return kc;
}

export function contextDescriptor(
  name: string,
  overrides: Partial<ContextDescriptor> = {},
): ContextDescriptor {
  return {
    name,
    cluster: `${name}-cluster`,
    server: `https://${name}.example.test:6443`,
    user: `${name}-admin`,
    inCluster: false,
    ...overrides,
  };
}

/** A real client bundle for a test context; tests spy on its API methods. */
export function testKubeClient(contextName = 'prod'): KubeClient {
  return makeKubeClient(scopedKubeConfig(loadTestKubeConfig(), contextName), contextName);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
