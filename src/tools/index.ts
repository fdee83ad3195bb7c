import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { Dispatcher, DispatchResult } from '../dispatcher.js';
import type { KubeClient } from '../k8s-client.js';
import { OperationTable, type OperationDescriptor } from '../operations.js';
import { namespaceArg } from './common.js';
import { configMapOperations, secretOperations } from './config-data.js';
import { ingressOperations } from './ingress.js';
import { namespaceOperations, podOperations, serviceOperations } from './kubernetes.js';
import { nodeOperations } from './nodes.js';
import { clusterRoleOperations, roleOperations } from './rbac.js';
import { serviceAccountOperations } from './serviceaccounts.js';
import { persistentVolumeClaimOperations, persistentVolumeOperations } from './storage.js';
import {
  daemonSetOperations,
  deploymentOperations,
  replicaSetOperations,
  statefulSetOperations,
} from './workloads.js';

export const kubeOperations: readonly OperationDescriptor<KubeClient>[] = [
  ...namespaceOperations,
  ...podOperations,
  ...deploymentOperations,
  ...statefulSetOperations,
  ...daemonSetOperations,
  ...replicaSetOperations,
  ...serviceOperations,
  ...configMapOperations,
  ...secretOperations,
  ...serviceAccountOperations,
  ...roleOperations,
  ...clusterRoleOperations,
  ...ingressOperations,
  ...persistentVolumeOperations,
  ...persistentVolumeClaimOperations,
  ...nodeOperations,
];

export function createOperationTable(): OperationTable<KubeClient> {
  return new OperationTable(kubeOperations);
}

const contextArg = z
  .string()
  .min(1)
  .optional()
  .describe('Kubernetes context to run against; the default context when omitted');

/**
 * Published argument shape of an operation. Namespace is optional on the wire
 * because the dispatcher fills it from the target context.
 */
export function toolShape(
  operation: Pick<OperationDescriptor<unknown>, 'input' | 'scope'>,
): z.ZodRawShape {
  return {
    ...operation.input.shape,
    ...(operation.scope === 'namespaced'
      ? { namespace: namespaceArg.optional().describe("Kubernetes namespace; the context's namespace when omitted") }
      : {}),
    context: contextArg,
  };
}

export function toToolResult(result: DispatchResult) {
  if (result.ok) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(result.data, null, 2) }] };
  }
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(result.error, null, 2) }],
    isError: true,
  };
}

/** One MCP tool per operation, each routed through the dispatcher. */
export function registerOperationTools<TClient>(
  server: McpServer,
  operations: OperationTable<TClient>,
  dispatcher: Dispatcher<TClient>,
): void {
  for (const operation of operations.list()) {
    server.tool(
      operation.name,
      operation.description,
      toolShape(operation),
      {
        readOnlyHint: operation.mutation === 'read',
        destructiveHint: operation.verb === 'delete',
      },
      async (args, extra) => {
        const { context, ...rest } = args;
        const contextName = typeof context === 'string' ? context : undefined;
        const result = await dispatcher.dispatch(operation.name, contextName, rest, {
          signal: extra.signal,
        });
        return toToolResult(result);
      },
    );
  }
}
