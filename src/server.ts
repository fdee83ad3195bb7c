import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ContextRegistry } from './context-registry.js';
import type { Dispatcher } from './dispatcher.js';
import type { OperationTable } from './operations.js';
import type { PolicyGate } from './policy.js';
import { registerContextTools } from './tools/contexts.js';
import { registerOperationTools } from './tools/index.js';

export const SERVER_NAME = 'kubeconduit';
export const SERVER_VERSION = '0.1.0';

export interface ServerDeps<TClient> {
  operations: OperationTable<TClient>;
  dispatcher: Dispatcher<TClient>;
  contexts: ContextRegistry;
  policy: PolicyGate;
}

export function createServer<TClient>(deps: ServerDeps<TClient>): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerContextTools(server, deps.contexts, deps.policy);
  registerOperationTools(server, deps.operations, deps.dispatcher);

  return server;
}
