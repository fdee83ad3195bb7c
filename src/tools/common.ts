import { z } from 'zod';
import type { KubeClient } from '../k8s-client.js';
import { operationBuilder } from '../operations.js';

export const defineOperation = operationBuilder<KubeClient>();

export const namespaceArg = z.string().min(1).describe('Kubernetes namespace');

export const labelsArg = z.record(z.string()).describe('Labels as key/value pairs');

export function nameArg(kind: string) {
  return z.string().min(1).describe(`${kind} name`);
}

export function created(name: string | undefined) {
  return { name, status: 'Created' };
}

export function updated(name: string | undefined) {
  return { name, status: 'Updated' };
}

export function deleted(name: string) {
  return { name, status: 'Deleted' };
}

/** Single-container pod template shared by the workload create operations. */
export function podTemplate(name: string, image: string, labels: Record<string, string>) {
  return {
    metadata: { labels },
    spec: { containers: [{ name, image }] },
  };
}
