import { z } from 'zod';
import type { KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { created, defineOperation, deleted, labelsArg, nameArg, namespaceArg } from './common.js';

export const serviceAccountOperations: OperationDescriptor<KubeClient>[] = [
  // serviceaccount_list
  defineOperation({
    name: 'serviceaccount_list',
    kind: 'serviceaccount',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List ServiceAccounts in a namespace',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.core.listNamespacedServiceAccount({ namespace });
      return res.items.map((sa) => ({
        name: sa.metadata?.name,
        secrets: sa.secrets?.length ?? 0,
        createdAt: sa.metadata?.creationTimestamp,
      }));
    },
  }),

  // serviceaccount_get
  defineOperation({
    name: 'serviceaccount_get',
    kind: 'serviceaccount',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get details of a specific ServiceAccount',
    input: z.object({ namespace: namespaceArg, name: nameArg('ServiceAccount') }),
    handler: async (client, { namespace, name }) => {
      const sa = await client.core.readNamespacedServiceAccount({ name, namespace });
      return {
        name: sa.metadata?.name,
        labels: sa.metadata?.labels ?? {},
        secrets: (sa.secrets ?? []).map((s) => s.name),
        imagePullSecrets: (sa.imagePullSecrets ?? []).map((s) => s.name),
      };
    },
  }),

  // serviceaccount_create
  defineOperation({
    name: 'serviceaccount_create',
    kind: 'serviceaccount',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a ServiceAccount',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('ServiceAccount'),
      labels: labelsArg.optional(),
    }),
    handler: async (client, { namespace, name, labels }) => {
      const res = await client.core.createNamespacedServiceAccount({
        namespace,
        body: { metadata: { name, labels } },
      });
      return created(res.metadata?.name);
    },
  }),

  // serviceaccount_delete
  defineOperation({
    name: 'serviceaccount_delete',
    kind: 'serviceaccount',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a ServiceAccount',
    input: z.object({ namespace: namespaceArg, name: nameArg('ServiceAccount') }),
    handler: async (client, { namespace, name }) => {
      await client.core.deleteNamespacedServiceAccount({ name, namespace });
      return deleted(name);
    },
  }),
];
