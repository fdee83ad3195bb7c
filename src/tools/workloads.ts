import { z } from 'zod';
import type * as k8s from '@kubernetes/client-node';
import { MERGE_PATCH, type KubeClient } from '../k8s-client.js';
import { UnexpectedResourceError } from '../utils/errors.js';
import type { OperationDescriptor } from '../operations.js';
import {
  created,
  defineOperation,
  deleted,
  labelsArg,
  nameArg,
  namespaceArg,
  podTemplate,
  updated,
} from './common.js';

const imageArg = z.string().min(1).describe('Container image');
const replicasArg = z.number().int().min(0).describe('Desired number of replicas');
const workloadLabelsArg = labelsArg.describe('Labels used for the selector and pod template');

/** Points the first container of a pod template at a new image. */
export function withImage(template: k8s.V1PodTemplateSpec | undefined, image: string): k8s.V1PodTemplateSpec {
  const containers = template?.spec?.containers ?? [];
  if (containers.length === 0) {
    throw new UnexpectedResourceError('Pod template returned by the API has no containers to update');
  }
  const [first, ...rest] = containers;
  return {
    ...template,
    spec: { ...template?.spec, containers: [{ ...first, image }, ...rest] },
  };
}

function requireSpec<T>(spec: T | undefined, kind: string, name: string): T {
  if (!spec) {
    throw new UnexpectedResourceError(`${kind} '${name}' returned by the API has no spec`);
  }
  return spec;
}

function containerImages(template: k8s.V1PodTemplateSpec | undefined): string[] {
  return (template?.spec?.containers ?? []).flatMap((c) => (c.image ? [c.image] : []));
}

export const deploymentOperations: OperationDescriptor<KubeClient>[] = [
  // deployment_list
  defineOperation({
    name: 'deployment_list',
    kind: 'deployment',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List deployments in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.apps.listNamespacedDeployment({ namespace, labelSelector });
      return res.items.map((d) => ({
        name: d.metadata?.name,
        replicas: d.spec?.replicas,
        readyReplicas: d.status?.readyReplicas,
        availableReplicas: d.status?.availableReplicas,
        createdAt: d.metadata?.creationTimestamp,
      }));
    },
  }),

  // deployment_get
  defineOperation({
    name: 'deployment_get',
    kind: 'deployment',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific deployment',
    input: z.object({ namespace: namespaceArg, name: nameArg('Deployment') }),
    handler: async (client, { namespace, name }) => {
      const d = await client.apps.readNamespacedDeployment({ name, namespace });
      return {
        name: d.metadata?.name,
        replicas: d.spec?.replicas,
        readyReplicas: d.status?.readyReplicas,
        labels: d.metadata?.labels ?? {},
        containers: containerImages(d.spec?.template),
      };
    },
  }),

  // deployment_create
  defineOperation({
    name: 'deployment_create',
    kind: 'deployment',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a single-container deployment',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Deployment'),
      image: imageArg,
      replicas: replicasArg.default(1),
      labels: workloadLabelsArg,
    }),
    handler: async (client, { namespace, name, image, replicas, labels }) => {
      const res = await client.apps.createNamespacedDeployment({
        namespace,
        body: {
          metadata: { name, labels },
          spec: {
            replicas,
            selector: { matchLabels: labels },
            template: podTemplate(name, image, labels),
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // deployment_update
  defineOperation({
    name: 'deployment_update',
    kind: 'deployment',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: "Set a deployment's image and replica count",
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Deployment'),
      image: imageArg,
      replicas: replicasArg,
    }),
    handler: async (client, { namespace, name, image, replicas }, { signal }) => {
      const current = await client.apps.readNamespacedDeployment({ name, namespace });
      const spec = requireSpec(current.spec, 'Deployment', name);
      signal.throwIfAborted();
      const res = await client.apps.replaceNamespacedDeployment({
        name,
        namespace,
        body: { ...current, spec: { ...spec, replicas, template: withImage(spec.template, image) } },
      });
      return updated(res.metadata?.name);
    },
  }),

  // deployment_scale
  defineOperation({
    name: 'deployment_scale',
    kind: 'deployment',
    verb: 'patch',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Scale a deployment to a specific number of replicas',
    input: z.object({ namespace: namespaceArg, name: nameArg('Deployment'), replicas: replicasArg }),
    handler: async (client, { namespace, name, replicas }) => {
      const res = await client.apps.patchNamespacedDeployment(
        { name, namespace, body: { spec: { replicas } } },
        MERGE_PATCH,
      );
      return { name: res.metadata?.name, status: 'Scaled', replicas: res.spec?.replicas };
    },
  }),

  // deployment_delete
  defineOperation({
    name: 'deployment_delete',
    kind: 'deployment',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a deployment',
    input: z.object({ namespace: namespaceArg, name: nameArg('Deployment') }),
    handler: async (client, { namespace, name }) => {
      await client.apps.deleteNamespacedDeployment({ name, namespace });
      return deleted(name);
    },
  }),
];

export const statefulSetOperations: OperationDescriptor<KubeClient>[] = [
  // statefulset_list
  defineOperation({
    name: 'statefulset_list',
    kind: 'statefulset',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List StatefulSets in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.apps.listNamespacedStatefulSet({ namespace, labelSelector });
      return res.items.map((ss) => ({
        name: ss.metadata?.name,
        replicas: ss.spec?.replicas,
        readyReplicas: ss.status?.readyReplicas,
        currentReplicas: ss.status?.currentReplicas,
        createdAt: ss.metadata?.creationTimestamp,
      }));
    },
  }),

  // statefulset_get
  defineOperation({
    name: 'statefulset_get',
    kind: 'statefulset',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific StatefulSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('StatefulSet') }),
    handler: async (client, { namespace, name }) => {
      const ss = await client.apps.readNamespacedStatefulSet({ name, namespace });
      return {
        name: ss.metadata?.name,
        replicas: ss.spec?.replicas,
        serviceName: ss.spec?.serviceName,
        labels: ss.metadata?.labels ?? {},
        containers: containerImages(ss.spec?.template),
      };
    },
  }),

  // statefulset_create
  defineOperation({
    name: 'statefulset_create',
    kind: 'statefulset',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a single-container StatefulSet governed by a service of the same name',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('StatefulSet'),
      image: imageArg,
      replicas: replicasArg.default(1),
      labels: workloadLabelsArg,
      serviceName: z.string().optional().describe('Governing service; defaults to the StatefulSet name'),
    }),
    handler: async (client, { namespace, name, image, replicas, labels, serviceName }) => {
      const res = await client.apps.createNamespacedStatefulSet({
        namespace,
        body: {
          metadata: { name, labels },
          spec: {
            replicas,
            serviceName: serviceName ?? name,
            selector: { matchLabels: labels },
            template: podTemplate(name, image, labels),
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // statefulset_update
  defineOperation({
    name: 'statefulset_update',
    kind: 'statefulset',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: "Set a StatefulSet's image and replica count",
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('StatefulSet'),
      image: imageArg,
      replicas: replicasArg,
    }),
    handler: async (client, { namespace, name, image, replicas }, { signal }) => {
      const current = await client.apps.readNamespacedStatefulSet({ name, namespace });
      const spec = requireSpec(current.spec, 'StatefulSet', name);
      signal.throwIfAborted();
      const res = await client.apps.replaceNamespacedStatefulSet({
        name,
        namespace,
        body: { ...current, spec: { ...spec, replicas, template: withImage(spec.template, image) } },
      });
      return updated(res.metadata?.name);
    },
  }),

  // statefulset_delete
  defineOperation({
    name: 'statefulset_delete',
    kind: 'statefulset',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a StatefulSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('StatefulSet') }),
    handler: async (client, { namespace, name }) => {
      await client.apps.deleteNamespacedStatefulSet({ name, namespace });
      return deleted(name);
    },
  }),
];

export const daemonSetOperations: OperationDescriptor<KubeClient>[] = [
  // daemonset_list
  defineOperation({
    name: 'daemonset_list',
    kind: 'daemonset',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List DaemonSets in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.apps.listNamespacedDaemonSet({ namespace, labelSelector });
      return res.items.map((ds) => ({
        name: ds.metadata?.name,
        desiredNumberScheduled: ds.status?.desiredNumberScheduled,
        numberReady: ds.status?.numberReady,
        numberAvailable: ds.status?.numberAvailable,
        createdAt: ds.metadata?.creationTimestamp,
      }));
    },
  }),

  // daemonset_get
  defineOperation({
    name: 'daemonset_get',
    kind: 'daemonset',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific DaemonSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('DaemonSet') }),
    handler: async (client, { namespace, name }) => {
      const ds = await client.apps.readNamespacedDaemonSet({ name, namespace });
      return {
        name: ds.metadata?.name,
        labels: ds.metadata?.labels ?? {},
        containers: containerImages(ds.spec?.template),
      };
    },
  }),

  // daemonset_create
  defineOperation({
    name: 'daemonset_create',
    kind: 'daemonset',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a single-container DaemonSet',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('DaemonSet'),
      image: imageArg,
      labels: workloadLabelsArg,
    }),
    handler: async (client, { namespace, name, image, labels }) => {
      const res = await client.apps.createNamespacedDaemonSet({
        namespace,
        body: {
          metadata: { name, labels },
          spec: {
            selector: { matchLabels: labels },
            template: podTemplate(name, image, labels),
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // daemonset_update
  defineOperation({
    name: 'daemonset_update',
    kind: 'daemonset',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: "Set a DaemonSet's image",
    input: z.object({ namespace: namespaceArg, name: nameArg('DaemonSet'), image: imageArg }),
    handler: async (client, { namespace, name, image }, { signal }) => {
      const current = await client.apps.readNamespacedDaemonSet({ name, namespace });
      const spec = requireSpec(current.spec, 'DaemonSet', name);
      signal.throwIfAborted();
      const res = await client.apps.replaceNamespacedDaemonSet({
        name,
        namespace,
        body: { ...current, spec: { ...spec, template: withImage(spec.template, image) } },
      });
      return updated(res.metadata?.name);
    },
  }),

  // daemonset_delete
  defineOperation({
    name: 'daemonset_delete',
    kind: 'daemonset',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a DaemonSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('DaemonSet') }),
    handler: async (client, { namespace, name }) => {
      await client.apps.deleteNamespacedDaemonSet({ name, namespace });
      return deleted(name);
    },
  }),
];

export const replicaSetOperations: OperationDescriptor<KubeClient>[] = [
  // replicaset_list
  defineOperation({
    name: 'replicaset_list',
    kind: 'replicaset',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List ReplicaSets in a namespace',
    input: z.object({
      namespace: namespaceArg,
      labelSelector: z.string().optional().describe('Label selector filter'),
    }),
    handler: async (client, { namespace, labelSelector }) => {
      const res = await client.apps.listNamespacedReplicaSet({ namespace, labelSelector });
      return res.items.map((rs) => ({
        name: rs.metadata?.name,
        replicas: rs.spec?.replicas,
        readyReplicas: rs.status?.readyReplicas,
        owner: rs.metadata?.ownerReferences?.[0]?.name,
      }));
    },
  }),

  // replicaset_get
  defineOperation({
    name: 'replicaset_get',
    kind: 'replicaset',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific ReplicaSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('ReplicaSet') }),
    handler: async (client, { namespace, name }) => {
      const rs = await client.apps.readNamespacedReplicaSet({ name, namespace });
      return {
        name: rs.metadata?.name,
        replicas: rs.spec?.replicas,
        labels: rs.metadata?.labels ?? {},
        containers: containerImages(rs.spec?.template),
      };
    },
  }),

  // replicaset_create
  defineOperation({
    name: 'replicaset_create',
    kind: 'replicaset',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a single-container ReplicaSet',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('ReplicaSet'),
      image: imageArg,
      replicas: replicasArg.default(1),
      labels: workloadLabelsArg,
    }),
    handler: async (client, { namespace, name, image, replicas, labels }) => {
      const res = await client.apps.createNamespacedReplicaSet({
        namespace,
        body: {
          metadata: { name, labels },
          spec: {
            replicas,
            selector: { matchLabels: labels },
            template: podTemplate(name, image, labels),
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // replicaset_update
  defineOperation({
    name: 'replicaset_update',
    kind: 'replicaset',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: "Set a ReplicaSet's image and replica count",
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('ReplicaSet'),
      image: imageArg,
      replicas: replicasArg,
    }),
    handler: async (client, { namespace, name, image, replicas }, { signal }) => {
      const current = await client.apps.readNamespacedReplicaSet({ name, namespace });
      const spec = requireSpec(current.spec, 'ReplicaSet', name);
      signal.throwIfAborted();
      const res = await client.apps.replaceNamespacedReplicaSet({
        name,
        namespace,
        body: { ...current, spec: { ...spec, replicas, template: withImage(spec.template, image) } },
      });
      return updated(res.metadata?.name);
    },
  }),

  // replicaset_delete
  defineOperation({
    name: 'replicaset_delete',
    kind: 'replicaset',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a ReplicaSet',
    input: z.object({ namespace: namespaceArg, name: nameArg('ReplicaSet') }),
    handler: async (client, { namespace, name }) => {
      await client.apps.deleteNamespacedReplicaSet({ name, namespace });
      return deleted(name);
    },
  }),
];
