import { z } from 'zod';
import { MERGE_PATCH, type KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { created, defineOperation, deleted, labelsArg, nameArg, namespaceArg } from './common.js';

const accessModesArg = z
  .array(z.enum(['ReadWriteOnce', 'ReadOnlyMany', 'ReadWriteMany', 'ReadWriteOncePod']))
  .min(1)
  .describe('Access modes');

const quantityArg = z.string().min(1).describe('Storage quantity (e.g. 10Gi)');

export const persistentVolumeOperations: OperationDescriptor<KubeClient>[] = [
  // pv_list
  defineOperation({
    name: 'pv_list',
    kind: 'pv',
    verb: 'list',
    mutation: 'read',
    scope: 'cluster',
    description: 'List all PersistentVolumes in the cluster',
    input: z.object({}),
    handler: async (client) => {
      const res = await client.core.listPersistentVolume({});
      return res.items.map((pv) => ({
        name: pv.metadata?.name,
        capacity: pv.spec?.capacity?.storage,
        accessModes: pv.spec?.accessModes,
        storageClass: pv.spec?.storageClassName,
        status: pv.status?.phase,
        claim: pv.spec?.claimRef
          ? `${pv.spec.claimRef.namespace}/${pv.spec.claimRef.name}`
          : undefined,
      }));
    },
  }),

  // pv_get
  defineOperation({
    name: 'pv_get',
    kind: 'pv',
    verb: 'get',
    mutation: 'read',
    scope: 'cluster',
    description: 'Get details of a specific PersistentVolume',
    input: z.object({ name: nameArg('PersistentVolume') }),
    handler: async (client, { name }) => {
      const pv = await client.core.readPersistentVolume({ name });
      return {
        name: pv.metadata?.name,
        capacity: pv.spec?.capacity?.storage,
        accessModes: pv.spec?.accessModes,
        storageClass: pv.spec?.storageClassName,
        hostPath: pv.spec?.hostPath?.path,
        reclaimPolicy: pv.spec?.persistentVolumeReclaimPolicy,
        status: pv.status?.phase,
        labels: pv.metadata?.labels ?? {},
      };
    },
  }),

  // pv_create
  defineOperation({
    name: 'pv_create',
    kind: 'pv',
    verb: 'create',
    mutation: 'write',
    scope: 'cluster',
    description: 'Create a hostPath PersistentVolume',
    input: z.object({
      name: nameArg('PersistentVolume'),
      capacity: quantityArg,
      accessModes: accessModesArg,
      storageClass: z.string().optional().describe('Storage class name'),
      hostPath: z.string().min(1).describe('Path on the node backing the volume'),
    }),
    handler: async (client, { name, capacity, accessModes, storageClass, hostPath }) => {
      const res = await client.core.createPersistentVolume({
        body: {
          metadata: { name },
          spec: {
            capacity: { storage: capacity },
            accessModes,
            storageClassName: storageClass,
            hostPath: { path: hostPath },
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // pv_update
  defineOperation({
    name: 'pv_update',
    kind: 'pv',
    verb: 'update',
    mutation: 'write',
    scope: 'cluster',
    description: 'Add or overwrite labels on a PersistentVolume',
    input: z.object({ name: nameArg('PersistentVolume'), labels: labelsArg }),
    handler: async (client, { name, labels }) => {
      const res = await client.core.patchPersistentVolume(
        { name, body: { metadata: { labels } } },
        MERGE_PATCH,
      );
      return { name: res.metadata?.name, status: 'Updated', labels: res.metadata?.labels ?? {} };
    },
  }),

  // pv_delete
  defineOperation({
    name: 'pv_delete',
    kind: 'pv',
    verb: 'delete',
    mutation: 'write',
    scope: 'cluster',
    description: 'Delete a PersistentVolume',
    input: z.object({ name: nameArg('PersistentVolume') }),
    handler: async (client, { name }) => {
      await client.core.deletePersistentVolume({ name });
      return deleted(name);
    },
  }),
];

export const persistentVolumeClaimOperations: OperationDescriptor<KubeClient>[] = [
  // pvc_list
  defineOperation({
    name: 'pvc_list',
    kind: 'pvc',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List PersistentVolumeClaims in a namespace',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.core.listNamespacedPersistentVolumeClaim({ namespace });
      return res.items.map((pvc) => ({
        name: pvc.metadata?.name,
        status: pvc.status?.phase,
        storage: pvc.spec?.resources?.requests?.storage,
        volume: pvc.spec?.volumeName,
      }));
    },
  }),

  // pvc_get
  defineOperation({
    name: 'pvc_get',
    kind: 'pvc',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific PersistentVolumeClaim',
    input: z.object({ namespace: namespaceArg, name: nameArg('PersistentVolumeClaim') }),
    handler: async (client, { namespace, name }) => {
      const pvc = await client.core.readNamespacedPersistentVolumeClaim({ name, namespace });
      return {
        name: pvc.metadata?.name,
        status: pvc.status?.phase,
        storage: pvc.spec?.resources?.requests?.storage,
        accessModes: pvc.spec?.accessModes,
        storageClass: pvc.spec?.storageClassName,
        labels: pvc.metadata?.labels ?? {},
      };
    },
  }),

  // pvc_create
  defineOperation({
    name: 'pvc_create',
    kind: 'pvc',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a PersistentVolumeClaim',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('PersistentVolumeClaim'),
      storage: quantityArg,
      accessModes: accessModesArg,
      storageClass: z.string().optional().describe('Storage class name'),
    }),
    handler: async (client, { namespace, name, storage, accessModes, storageClass }) => {
      const res = await client.core.createNamespacedPersistentVolumeClaim({
        namespace,
        body: {
          metadata: { name },
          spec: {
            accessModes,
            resources: { requests: { storage } },
            storageClassName: storageClass,
          },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // pvc_update
  defineOperation({
    name: 'pvc_update',
    kind: 'pvc',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Add or overwrite labels on a PersistentVolumeClaim',
    input: z.object({ namespace: namespaceArg, name: nameArg('PersistentVolumeClaim'), labels: labelsArg }),
    handler: async (client, { namespace, name, labels }) => {
      const res = await client.core.patchNamespacedPersistentVolumeClaim(
        { name, namespace, body: { metadata: { labels } } },
        MERGE_PATCH,
      );
      return { name: res.metadata?.name, status: 'Updated', labels: res.metadata?.labels ?? {} };
    },
  }),

  // pvc_delete
  defineOperation({
    name: 'pvc_delete',
    kind: 'pvc',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a PersistentVolumeClaim',
    input: z.object({ namespace: namespaceArg, name: nameArg('PersistentVolumeClaim') }),
    handler: async (client, { namespace, name }) => {
      await client.core.deleteNamespacedPersistentVolumeClaim({ name, namespace });
      return deleted(name);
    },
  }),
];
