import { z } from 'zod';
import type * as k8s from '@kubernetes/client-node';
import type { KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { created, defineOperation, deleted, nameArg, namespaceArg } from './common.js';

const policyRuleArg = z.object({
  apiGroups: z.array(z.string()).default(['']).describe('API groups; "" is the core group'),
  resources: z.array(z.string()).min(1).describe('Resource names (e.g. pods)'),
  verbs: z.array(z.string()).min(1).describe('Verbs (e.g. get, list, watch)'),
  resourceNames: z.array(z.string()).optional(),
});

const rulesArg = z.array(policyRuleArg).min(1).describe('Policy rules');

function describeRules(rules: k8s.V1PolicyRule[] | undefined) {
  return (rules ?? []).map((rule) => ({
    apiGroups: rule.apiGroups,
    resources: rule.resources,
    verbs: rule.verbs,
    ...(rule.resourceNames ? { resourceNames: rule.resourceNames } : {}),
  }));
}

export const roleOperations: OperationDescriptor<KubeClient>[] = [
  // role_list
  defineOperation({
    name: 'role_list',
    kind: 'role',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List Roles in a namespace',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.rbac.listNamespacedRole({ namespace });
      return res.items.map((role) => ({
        name: role.metadata?.name,
        rulesCount: role.rules?.length ?? 0,
        createdAt: role.metadata?.creationTimestamp,
      }));
    },
  }),

  // role_get
  defineOperation({
    name: 'role_get',
    kind: 'role',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get the rules of a specific Role',
    input: z.object({ namespace: namespaceArg, name: nameArg('Role') }),
    handler: async (client, { namespace, name }) => {
      const role = await client.rbac.readNamespacedRole({ name, namespace });
      return { name: role.metadata?.name, rules: describeRules(role.rules) };
    },
  }),

  // role_create
  defineOperation({
    name: 'role_create',
    kind: 'role',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create a Role',
    input: z.object({ namespace: namespaceArg, name: nameArg('Role'), rules: rulesArg }),
    handler: async (client, { namespace, name, rules }) => {
      const res = await client.rbac.createNamespacedRole({
        namespace,
        body: { metadata: { name }, rules },
      });
      return created(res.metadata?.name);
    },
  }),

  // role_delete
  defineOperation({
    name: 'role_delete',
    kind: 'role',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete a Role',
    input: z.object({ namespace: namespaceArg, name: nameArg('Role') }),
    handler: async (client, { namespace, name }) => {
      await client.rbac.deleteNamespacedRole({ name, namespace });
      return deleted(name);
    },
  }),
];

export const clusterRoleOperations: OperationDescriptor<KubeClient>[] = [
  // clusterrole_list
  defineOperation({
    name: 'clusterrole_list',
    kind: 'clusterrole',
    verb: 'list',
    mutation: 'read',
    scope: 'cluster',
    description: 'List all ClusterRoles in the cluster',
    input: z.object({}),
    handler: async (client) => {
      const res = await client.rbac.listClusterRole({});
      return res.items.map((cr) => ({
        name: cr.metadata?.name,
        rulesCount: cr.rules?.length ?? 0,
        createdAt: cr.metadata?.creationTimestamp,
      }));
    },
  }),

  // clusterrole_get
  defineOperation({
    name: 'clusterrole_get',
    kind: 'clusterrole',
    verb: 'get',
    mutation: 'read',
    scope: 'cluster',
    description: 'Get the rules of a specific ClusterRole',
    input: z.object({ name: nameArg('ClusterRole') }),
    handler: async (client, { name }) => {
      const cr = await client.rbac.readClusterRole({ name });
      return { name: cr.metadata?.name, rules: describeRules(cr.rules) };
    },
  }),

  // clusterrole_create
  defineOperation({
    name: 'clusterrole_create',
    kind: 'clusterrole',
    verb: 'create',
    mutation: 'write',
    scope: 'cluster',
    description: 'Create a ClusterRole',
    input: z.object({ name: nameArg('ClusterRole'), rules: rulesArg }),
    handler: async (client, { name, rules }) => {
      const res = await client.rbac.createClusterRole({ body: { metadata: { name }, rules } });
      return created(res.metadata?.name);
    },
  }),

  // clusterrole_delete
  defineOperation({
    name: 'clusterrole_delete',
    kind: 'clusterrole',
    verb: 'delete',
    mutation: 'write',
    scope: 'cluster',
    description: 'Delete a ClusterRole',
    input: z.object({ name: nameArg('ClusterRole') }),
    handler: async (client, { name }) => {
      await client.rbac.deleteClusterRole({ name });
      return deleted(name);
    },
  }),
];
