import { z } from 'zod';
import { MERGE_PATCH, type KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import {
  created,
  defineOperation,
  deleted,
  labelsArg,
  nameArg,
  namespaceArg,
} from './common.js';

export const namespaceOperations: OperationDescriptor<KubeClient>[] = [
  // namespace_list
  defineOperation({
    name: 'namespace_list',
    kind: 'namespace',
    verb: 'list',
    mutation: 'read',
    scope: 'cluster',
    description: 'List all namespaces in the cluster',
    input: z.object({}),
    handler: async (client) => {
      const res = await client.core.listNamespace({});
      return res.items.map((ns) => ({
        name: ns.metadata?.name,
        status: ns.status?.phase,
        createdAt: ns.metadata?.creationTimestamp,
      }));
    },
  }),

  // namespace_get
  defineOperation({
    name: 'namespace_get',
    kind: 'namespace',
    verb: 'get',
    mutation: 'read',
    scope: 'cluster',
    description: 'Get details of a specific namespace',
    input: z.object({ name: nameArg('Namespace') }),
    handler: async (client, { name }) => {
      const ns = await client.core.readNamespace({ name });
      return {
        name: ns.metadata?.name,
        status: ns.status?.phase,
        labels: ns.metadata?.labels ?? {},
        createdAt: ns.metadata?.creationTimestamp,
      };
    },
  }),

  // namespace_create
  defineOperation({
    name: 'namespace_create',
    kind: 'namespace',
    verb: 'create',
    mutation: 'write',
    scope: 'cluster',
    description: 'Create a namespace',
    input: z.object({ name: nameArg('Namespace'), labels: labelsArg.optional() }),
    handler: async (client, { name, labels }) => {
      const res = await client.core.createNamespace({ body: { metadata: { name, labels } } });
      return created(res.metadata?.name);
    },
  }),

  // namespace_delete
  defineOperation({
    name: 'namespace_delete',
    kind: 'namespace',
    verb: 'delete',
    mutation: 'write',
    scope: 'cluster',
    description: 'Delete a namespace and everything in it',
    input: z.object({ name: nameArg('Namespace') }),
    handler: async (client, { name }) => {
      await client.core.deleteNamespace({ name });
      return deleted(name);
    },
  }),
];

export const podOperations: OperationDescriptor<KubeClient>[] = [
  // pod_list
  defineOperation({
    name: 'pod_list',
    kind: 'pod',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List pods in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter (e.g. app=nginx)'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.core.listNamespacedPod({ namespace, labelSelector });
      return res.items.map((pod) => ({
        name: pod.metadata?.name,
        namespace: pod.metadata?.namespace,
        phase: pod.status?.phase,
        podIP: pod.status?.podIP,
        nodeName: pod.spec?.nodeName,
        createdAt: pod.metadata?.creationTimestamp,
      }));
    },
  }),

  // pod_get
  defineOperation({
    name: 'pod_get',
    kind: 'pod',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific pod',
    input: z.object({ namespace: namespaceArg, name: nameArg('Pod') }),
    handler: async (client, { namespace, name }) => {
      const pod = await client.core.readNamespacedPod({ name, namespace });
      return {
        name: pod.metadata?.name,
        namespace: pod.metadata?.namespace,
        phase: pod.status?.phase,
        conditions: pod.status?.conditions?.map((c) => ({ type: c.type, status: c.status })),
        containers: pod.spec?.containers.map((c) => ({ name: c.name, image: c.image })),
        podIP: pod.status?.podIP,
        nodeName: pod.spec?.nodeName,
        labels: pod.metadata?.labels ?? {},
        createdAt: pod.metadata?.creationTimestamp,
      };
    },
  }),

  // pod_delete
  defineOperation({
    name: 'pod_delete',
    kind: 'pod',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a pod',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Pod'),
      gracePeriodSeconds: z.number().int().min(0).optional().describe('Grace period before the pod is killed'),
    }),
    handler: async (client, { namespace, name, gracePeriodSeconds }) => {
      await client.core.deleteNamespacedPod({ name, namespace, gracePeriodSeconds });
      return deleted(name);
    },
  }),
];

const servicePortArg = z.object({
  port: z.number().int().min(1).max(65535).describe('Port exposed by the service'),
  targetPort: z
    .union([z.number().int().min(1).max(65535), z.string().min(1)])
    .optional()
    .describe('Container port number or name; defaults to port'),
  protocol: z.enum(['TCP', 'UDP', 'SCTP']).optional(),
  name: z.string().optional(),
});

export const serviceOperations: OperationDescriptor<KubeClient>[] = [
  // service_list
  defineOperation({
    name: 'service_list',
    kind: 'service',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List services in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.core.listNamespacedService({ namespace, labelSelector });
      return res.items.map((svc) => ({
        name: svc.metadata?.name,
        type: svc.spec?.type,
        clusterIP: svc.spec?.clusterIP,
      }));
    },
  }),

  // service_get
  defineOperation({
    name: 'service_get',
    kind: 'service',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific service',
    input: z.object({ namespace: namespaceArg, name: nameArg('Service') }),
    handler: async (client, { namespace, name }) => {
      const svc = await client.core.readNamespacedService({ name, namespace });
      return {
        name: svc.metadata?.name,
        type: svc.spec?.type,
        clusterIP: svc.spec?.clusterIP,
        ports: svc.spec?.ports?.map((p) => ({ port: p.port, targetPort: p.targetPort, protocol: p.protocol })),
        selector: svc.spec?.selector ?? {},
        labels: svc.metadata?.labels ?? {},
      };
    },
  }),

  // service_create
  defineOperation({
    name: 'service_create',
    kind: 'service',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a service selecting pods by label',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Service'),
      selector: labelsArg.describe('Labels selecting the target pods'),
      ports: z.array(servicePortArg).min(1),
      type: z.enum(['ClusterIP', 'NodePort', 'LoadBalancer']).default('ClusterIP'),
    }),
    handler: async (client, { namespace, name, selector, ports, type }) => {
      const res = await client.core.createNamespacedService({
        namespace,
        body: {
          metadata: { name },
          spec: {
            selector,
            type,
            ports: ports.map((p) => ({
              name: p.name,
              port: p.port,
              targetPort: p.targetPort ?? p.port,
              protocol: p.protocol,
            })),
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // service_update
  defineOperation({
    name: 'service_update',
    kind: 'service',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Add or overwrite labels on a service',
    input: z.object({ namespace: namespaceArg, name: nameArg('Service'), labels: labelsArg }),
    handler: async (client, { namespace, name, labels }) => {
      const res = await client.core.patchNamespacedService(
        { name, namespace, body: { metadata: { labels } } },
        MERGE_PATCH,
      );
      return { name: res.metadata?.name, status: 'Updated', labels: res.metadata?.labels ?? {} };
    },
  }),

  // service_delete
  defineOperation({
    name: 'service_delete',
    kind: 'service',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a service',
    input: z.object({ namespace: namespaceArg, name: nameArg('Service') }),
    handler: async (client, { namespace, name }) => {
      await client.core.deleteNamespacedService({ name, namespace });
      return deleted(name);
    },
  }),
];
