import { z } from 'zod';
import type { KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { created, defineOperation, deleted, nameArg, namespaceArg, updated } from './common.js';

const dataArg = z.record(z.string()).describe('Key/value data');

export function encodeSecretData(data: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, Buffer.from(value, 'utf-8').toString('base64')]),
  );
}

export function decodeSecretData(data: Record<string, string> | undefined): Record<string, string> {
  return Object.fromEntries(
    Object.entries(data ?? {}).map(([key, value]) => [key, Buffer.from(value, 'base64').toString('utf-8')]),
  );
}

export const configMapOperations: OperationDescriptor<KubeClient>[] = [
  // configmap_list
  defineOperation({
    name: 'configmap_list',
    kind: 'configmap',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List ConfigMaps in a namespace',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.core.listNamespacedConfigMap({ namespace });
      return res.items.map((cm) => ({
        name: cm.metadata?.name,
        keys: Object.keys(cm.data ?? {}),
        createdAt: cm.metadata?.creationTimestamp,
      }));
    },
  }),

  // configmap_get
  defineOperation({
    name: 'configmap_get',
    kind: 'configmap',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get the data of a specific ConfigMap',
    input: z.object({ namespace: namespaceArg, name: nameArg('ConfigMap') }),
    handler: async (client, { namespace, name }) => {
      const cm = await client.core.readNamespacedConfigMap({ name, namespace });
      return { name: cm.metadata?.name, data: cm.data ?? {} };
    },
  }),

  // configmap_create
  defineOperation({
    name: 'configmap_create',
    kind: 'configmap',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a ConfigMap',
    input: z.object({ namespace: namespaceArg, name: nameArg('ConfigMap'), data: dataArg }),
    handler: async (client, { namespace, name, data }) => {
      const res = await client.core.createNamespacedConfigMap({
        namespace,
        body: { metadata: { name }, data },
      });
      return created(res.metadata?.name);
    },
  }),

  // configmap_update
  defineOperation({
    name: 'configmap_update',
    kind: 'configmap',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Replace the data of a ConfigMap',
    input: z.object({ namespace: namespaceArg, name: nameArg('ConfigMap'), data: dataArg }),
    handler: async (client, { namespace, name, data }, { signal }) => {
      const cm = await client.core.readNamespacedConfigMap({ name, namespace });
      signal.throwIfAborted();
      const res = await client.core.replaceNamespacedConfigMap({
        name,
        namespace,
        body: { ...cm, data },
      });
      return updated(res.metadata?.name);
    },
  }),

  // configmap_delete
  defineOperation({
    name: 'configmap_delete',
    kind: 'configmap',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a ConfigMap',
    input: z.object({ namespace: namespaceArg, name: nameArg('ConfigMap') }),
    handler: async (client, { namespace, name }) => {
      await client.core.deleteNamespacedConfigMap({ name, namespace });
      return deleted(name);
    },
  }),
];

export const secretOperations: OperationDescriptor<KubeClient>[] = [
  // secret_list
  defineOperation({
    name: 'secret_list',
    kind: 'secret',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List Secrets in a namespace (names and types only)',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.core.listNamespacedSecret({ namespace });
      return res.items.map((secret) => ({
        name: secret.metadata?.name,
        type: secret.type,
        keys: Object.keys(secret.data ?? {}),
      }));
    },
  }),

  // secret_get
  defineOperation({
    name: 'secret_get',
    kind: 'secret',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get a Secret with its values decoded',
    input: z.object({ namespace: namespaceArg, name: nameArg('Secret') }),
    handler: async (client, { namespace, name }) => {
      const secret = await client.core.readNamespacedSecret({ name, namespace });
      return {
        name: secret.metadata?.name,
        type: secret.type,
        data: decodeSecretData(secret.data),
      };
    },
  }),

  // secret_create
  defineOperation({
    name: 'secret_create',
    kind: 'secret',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a Secret; values are given in plain text and encoded',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Secret'),
      data: dataArg,
      type: z.string().default('Opaque').describe('Secret type'),
    }),
    handler: async (client, { namespace, name, data, type }) => {
      const res = await client.core.createNamespacedSecret({
        namespace,
        body: { metadata: { name }, type, data: encodeSecretData(data) },
      });
      return created(res.metadata?.name);
    },
  }),

  // secret_update
  defineOperation({
    name: 'secret_update',
    kind: 'secret',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Set keys on an existing Secret; other keys are kept',
    input: z.object({ namespace: namespaceArg, name: nameArg('Secret'), data: dataArg }),
    handler: async (client, { namespace, name, data }, { signal }) => {
      const secret = await client.core.readNamespacedSecret({ name, namespace });
      signal.throwIfAborted();
      const res = await client.core.replaceNamespacedSecret({
        name,
        namespace,
        body: { ...secret, data: { ...secret.data, ...encodeSecretData(data) } },
      });
      return updated(res.metadata?.name);
    },
  }),

  // secret_delete
  defineOperation({
    name: 'secret_delete',
    kind: 'secret',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a Secret',
    input: z.object({ namespace: namespaceArg, name: nameArg('Secret') }),
    handler: async (client, { namespace, name }) => {
      await client.core.deleteNamespacedSecret({ name, namespace });
      return deleted(name);
    },
  }),
];
