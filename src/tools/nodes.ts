import { z } from 'zod';
import type * as k8s from '@kubernetes/client-node';
import { MERGE_PATCH, type KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { defineOperation, nameArg } from './common.js';

const ROLE_LABEL_PREFIX = 'node-role.kubernetes.io/';

export const TAINT_EFFECTS = ['NoSchedule', 'PreferNoSchedule', 'NoExecute'] as const;

export type TaintEffect = (typeof TAINT_EFFECTS)[number];

export interface TaintView {
  key: string;
  value?: string;
  effect: string;
}

const nodeNameArg = nameArg('Node');

export function nodeRoles(labels: Record<string, string> | undefined): string[] {
  const roles = Object.keys(labels ?? {})
    .filter((k) => k.startsWith(ROLE_LABEL_PREFIX))
    .map((k) => k.slice(ROLE_LABEL_PREFIX.length));
  return roles.length > 0 ? roles : ['worker'];
}

export function nodeReady(node: k8s.V1Node): 'Ready' | 'NotReady' {
  const ready = node.status?.conditions?.find((c) => c.type === 'Ready');
  return ready?.status === 'True' ? 'Ready' : 'NotReady';
}

export function taintViews(taints: k8s.V1Taint[] | undefined): TaintView[] {
  return (taints ?? []).map((t) => ({
    key: t.key,
    ...(t.value !== undefined ? { value: t.value } : {}),
    effect: t.effect,
  }));
}

/** Adds the taint, replacing any existing taint with the same key in place. */
export function upsertTaint(taints: readonly TaintView[], taint: TaintView): TaintView[] {
  const index = taints.findIndex((t) => t.key === taint.key);
  if (index === -1) {
    return [...taints, taint];
  }
  return taints.map((t, i) => (i === index ? taint : t));
}

export function removeTaint(taints: readonly TaintView[], key: string): TaintView[] {
  return taints.filter((t) => t.key !== key);
}

async function patchNode(client: KubeClient, name: string, body: object): Promise<k8s.V1Node> {
  return client.core.patchNode({ name, body }, MERGE_PATCH);
}

export const nodeOperations: OperationDescriptor<KubeClient>[] = [
  // node_list
  defineOperation({
    name: 'node_list',
    kind: 'node',
    verb: 'list',
    mutation: 'read',
    scope: 'cluster',
    description: 'List all nodes in the cluster with status, roles, and version info',
    input: z.object({}),
    handler: async (client) => {
      const res = await client.core.listNode({});
      return res.items.map((node) => ({
        name: node.metadata?.name,
        status: nodeReady(node),
        roles: nodeRoles(node.metadata?.labels),
        kubeletVersion: node.status?.nodeInfo?.kubeletVersion,
        unschedulable: node.spec?.unschedulable ?? false,
        createdAt: node.metadata?.creationTimestamp,
      }));
    },
  }),

  // node_get
  defineOperation({
    name: 'node_get',
    kind: 'node',
    verb: 'get',
    mutation: 'read',
    scope: 'cluster',
    description: 'Get details of a specific node: system info, capacity, labels, and taints',
    input: z.object({ name: nodeNameArg }),
    handler: async (client, { name }) => {
      const node = await client.core.readNode({ name });
      const info = node.status?.nodeInfo;
      return {
        name: node.metadata?.name,
        status: nodeReady(node),
        roles: nodeRoles(node.metadata?.labels),
        info: info && {
          architecture: info.architecture,
          containerRuntimeVersion: info.containerRuntimeVersion,
          kernelVersion: info.kernelVersion,
          kubeletVersion: info.kubeletVersion,
          operatingSystem: info.operatingSystem,
          osImage: info.osImage,
        },
        conditions: Object.fromEntries(
          (node.status?.conditions ?? []).map((c) => [c.type, c.status]),
        ),
        capacity: node.status?.capacity ?? {},
        allocatable: node.status?.allocatable ?? {},
        labels: node.metadata?.labels ?? {},
        taints: taintViews(node.spec?.taints),
        addresses: (node.status?.addresses ?? []).map((a) => ({ type: a.type, address: a.address })),
        unschedulable: node.spec?.unschedulable ?? false,
        createdAt: node.metadata?.creationTimestamp,
      };
    },
  }),

  // node_pods
  defineOperation({
    name: 'node_pods',
    kind: 'node',
    verb: 'list',
    mutation: 'read',
    scope: 'cluster',
    description: 'List the pods scheduled on a specific node across all namespaces',
    input: z.object({ name: nodeNameArg }),
    handler: async (client, { name }) => {
      const res = await client.core.listPodForAllNamespaces({ fieldSelector: `spec.nodeName=${name}` });
      const pods = res.items.map((pod) => ({
        name: pod.metadata?.name,
        namespace: pod.metadata?.namespace,
        phase: pod.status?.phase,
        podIP: pod.status?.podIP,
      }));
      return { node: name, pods, podCount: pods.length };
    },
  }),

  // node_label
  defineOperation({
    name: 'node_label',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Add or overwrite a label on a node',
    input: z.object({
      name: nodeNameArg,
      key: z.string().min(1).describe('Label key'),
      value: z.string().describe('Label value'),
    }),
    handler: async (client, { name, key, value }) => {
      const node = await patchNode(client, name, { metadata: { labels: { [key]: value } } });
      return { name: node.metadata?.name, labels: node.metadata?.labels ?? {} };
    },
  }),

  // node_unlabel
  defineOperation({
    name: 'node_unlabel',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Remove a label from a node',
    input: z.object({ name: nodeNameArg, key: z.string().min(1).describe('Label key') }),
    handler: async (client, { name, key }, { signal }) => {
      const current = await client.core.readNode({ name });
      const labels = current.metadata?.labels ?? {};
      if (!(key in labels)) {
        return { name, labels, message: `Label '${key}' not found on node` };
      }
      signal.throwIfAborted();
      // null deletes the key under JSON merge-patch
      const node = await patchNode(client, name, { metadata: { labels: { [key]: null } } });
      return { name: node.metadata?.name, labels: node.metadata?.labels ?? {} };
    },
  }),

  // node_taint
  defineOperation({
    name: 'node_taint',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Add a taint to a node, replacing any taint with the same key',
    input: z.object({
      name: nodeNameArg,
      key: z.string().min(1).describe('Taint key'),
      value: z.string().optional().describe('Taint value'),
      effect: z.enum(TAINT_EFFECTS).describe('Taint effect'),
    }),
    handler: async (client, { name, key, value, effect }, { signal }) => {
      const current = await client.core.readNode({ name });
      signal.throwIfAborted();
      const taints = upsertTaint(taintViews(current.spec?.taints), {
        key,
        ...(value !== undefined ? { value } : {}),
        effect,
      });
      const node = await patchNode(client, name, { spec: { taints } });
      return { name: node.metadata?.name, taints: taintViews(node.spec?.taints) };
    },
  }),

  // node_untaint
  defineOperation({
    name: 'node_untaint',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Remove the taint with the given key from a node',
    input: z.object({ name: nodeNameArg, key: z.string().min(1).describe('Taint key') }),
    handler: async (client, { name, key }, { signal }) => {
      const current = await client.core.readNode({ name });
      const existing = taintViews(current.spec?.taints);
      const remaining = removeTaint(existing, key);
      if (remaining.length === existing.length) {
        return { name, taints: existing, message: `Taint with key '${key}' not found` };
      }
      signal.throwIfAborted();
      const node = await patchNode(client, name, { spec: { taints: remaining } });
      return { name: node.metadata?.name, taints: taintViews(node.spec?.taints) };
    },
  }),

  // node_cordon
  defineOperation({
    name: 'node_cordon',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Cordon a node to prevent new pods from being scheduled on it',
    input: z.object({ name: nodeNameArg }),
    handler: async (client, { name }, { signal }) => {
      const current = await client.core.readNode({ name });
      if (current.spec?.unschedulable) {
        return { name, status: 'already cordoned', unschedulable: true };
      }
      signal.throwIfAborted();
      const node = await patchNode(client, name, { spec: { unschedulable: true } });
      return { name: node.metadata?.name, status: 'cordoned', unschedulable: node.spec?.unschedulable ?? false };
    },
  }),

  // node_uncordon
  defineOperation({
    name: 'node_uncordon',
    kind: 'node',
    verb: 'patch',
    mutation: 'write',
    scope: 'cluster',
    description: 'Uncordon a node to allow pods to be scheduled on it again',
    input: z.object({ name: nodeNameArg }),
    handler: async (client, { name }, { signal }) => {
      const current = await client.core.readNode({ name });
      if (!current.spec?.unschedulable) {
        return { name, status: 'already schedulable', unschedulable: false };
      }
      signal.throwIfAborted();
      // null removes the field, matching kubectl uncordon
      const node = await patchNode(client, name, { spec: { unschedulable: null } });
      return { name: node.metadata?.name, status: 'uncordoned', unschedulable: node.spec?.unschedulable ?? false };
    },
  }),
];
