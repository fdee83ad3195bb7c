import { z } from 'zod';
import type * as k8s from '@kubernetes/client-node';
import type { KubeClient } from '../k8s-client.js';
import type { OperationDescriptor } from '../operations.js';
import { created, defineOperation, deleted, nameArg, namespaceArg, updated } from './common.js';

const backendArgs = {
  host: z.string().min(1).describe('Host the rule matches'),
  serviceName: z.string().min(1).describe('Backend service name'),
  servicePort: z.number().int().min(1).max(65535).describe('Backend service port'),
  path: z.string().default('/').describe('Path prefix routed to the backend'),
};

export function ingressRule(host: string, serviceName: string, servicePort: number, path: string): k8s.V1IngressRule {
  return {
    host,
    http: {
      paths: [
        {
          path,
          pathType: 'Prefix',
          backend: { service: { name: serviceName, port: { number: servicePort } } },
        },
      ],
    },
  };
}

function describeRules(rules: k8s.V1IngressRule[] | undefined) {
  return (rules ?? []).map((rule) => ({
    host: rule.host,
    paths: (rule.http?.paths ?? []).map((p) => ({
      path: p.path,
      serviceName: p.backend.service?.name,
      servicePort: p.backend.service?.port?.number ?? p.backend.service?.port?.name,
    })),
  }));
}

export const ingressOperations: OperationDescriptor<KubeClient>[] = [
  // ingress_list
  defineOperation({
    name: 'ingress_list',
    kind: 'ingress',
    verb: 'list',
    mutation: 'read',
    scope: 'namespaced',
    description: 'List Ingresses in a namespace',
    input: z.object({ namespace: namespaceArg }),
    handler: async (client, { namespace }) => {
      const res = await client.networking.listNamespacedIngress({ namespace });
      return res.items.map((ing) => ({
        name: ing.metadata?.name,
        ingressClassName: ing.spec?.ingressClassName,
        hosts: (ing.spec?.rules ?? []).flatMap((r) => (r.host ? [r.host] : [])),
      }));
    },
  }),

  // ingress_get
  defineOperation({
    name: 'ingress_get',
    kind: 'ingress',
    verb: 'get',
    mutation: 'read',
    scope: 'namespaced',
    description: 'Get the rules of a specific Ingress',
    input: z.object({ namespace: namespaceArg, name: nameArg('Ingress') }),
    handler: async (client, { namespace, name }) => {
      const ing = await client.networking.readNamespacedIngress({ name, namespace });
      return {
        name: ing.metadata?.name,
        ingressClassName: ing.spec?.ingressClassName,
        rules: describeRules(ing.spec?.rules),
        loadBalancer: ing.status?.loadBalancer?.ingress?.map((lb) => lb.ip ?? lb.hostname),
      };
    },
  }),

  // ingress_create
  defineOperation({
    name: 'ingress_create',
    kind: 'ingress',
    verb: 'create',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Create an Ingress routing one host to one service',
    input: z.object({
      namespace: namespaceArg,
      name: nameArg('Ingress'),
      ...backendArgs,
      ingressClassName: z.string().optional().describe('Ingress class'),
    }),
    handler: async (client, { namespace, name, host, serviceName, servicePort, path, ingressClassName }) => {
      const res = await client.networking.createNamespacedIngress({
        namespace,
        body: {
          metadata: { name },
          spec: { ingressClassName, rules: [ingressRule(host, serviceName, servicePort, path)] },
        },
      });
      return created(res.metadata?.name);
    },
  }),

  // ingress_update
  defineOperation({
    name: 'ingress_update',
    kind: 'ingress',
    verb: 'update',
    mutation: 'write',
    scope: 'namespaced',
    description: "Replace an Ingress's first rule with a new host and backend",
    input: z.object({ namespace: namespaceArg, name: nameArg('Ingress'), ...backendArgs }),
    handler: async (client, { namespace, name, host, serviceName, servicePort, path }, { signal }) => {
      const current = await client.networking.readNamespacedIngress({ name, namespace });
      signal.throwIfAborted();
      const [, ...otherRules] = current.spec?.rules ?? [];
      const res = await client.networking.replaceNamespacedIngress({
        name,
        namespace,
        body: {
          ...current,
          spec: {
            ...current.spec,
            rules: [ingressRule(host, serviceName, servicePort, path), ...otherRules],
          },
        },
      });
      return updated(res.metadata?.name);
    },
  }),

  // ingress_delete
  defineOperation({
    name: 'ingress_delete',
    kind: 'ingress',
    verb: 'delete',
    mutation: 'write',
    scope: 'namespaced',
    description: 'Delete an Ingress',
    input: z.object({ namespace: namespaceArg, name: nameArg('Ingress') }),
    handler: async (client, { namespace, name }) => {
      await client.networking.deleteNamespacedIngress({ name, namespace });
      return deleted(name);
    },
  }),
];
