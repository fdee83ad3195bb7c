import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContextRegistry } from '../context-registry.js';
import type { PolicyGate } from '../policy.js';

export const CONTEXTS_RESOURCE_URI = 'k8s://contexts';

export function describeContexts(contexts: ContextRegistry, policy: PolicyGate) {
  const defaultName = contexts.defaultContext.name;
  return {
    policyMode: policy.mode,
    defaultContext: defaultName,
    contexts: contexts.list().map((ctx) => ({
      name: ctx.name,
      cluster: ctx.cluster,
      server: ctx.server,
      user: ctx.user,
      namespace: ctx.namespace ?? null,
      inCluster: ctx.inCluster,
      isDefault: ctx.name === defaultName,
    })),
  };
}

export function registerContextTools(
  server: McpServer,
  contexts: ContextRegistry,
  policy: PolicyGate,
): void {
  // context_list
  server.tool(
    'context_list',
    'List every configured Kubernetes context, which one is the default, and whether the server is readonly',
    {},
    { readOnlyHint: true },
    async () => ({
      content: [{ type: 'text', text: JSON.stringify(describeContexts(contexts, policy), null, 2) }],
    }),
  );

  // context_current
  server.tool(
    'context_current',
    'Show the context used when a tool call names none',
    {},
    { readOnlyHint: true },
    async () => {
      const ctx = contexts.defaultContext;
      const current = {
        name: ctx.name,
        cluster: ctx.cluster,
        server: ctx.server,
        namespace: ctx.namespace ?? null,
      };
      return { content: [{ type: 'text', text: JSON.stringify(current, null, 2) }] };
    },
  );

  server.resource(
    'contexts',
    CONTEXTS_RESOURCE_URI,
    { mimeType: 'application/json', description: 'Configured Kubernetes contexts' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(describeContexts(contexts, policy), null, 2),
        },
      ],
    }),
  );
}
