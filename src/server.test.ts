import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ContextRegistry } from './context-registry.js';
import { Dispatcher } from './dispatcher.js';
import type { KubeClient } from './k8s-client.js';
import { PolicyGate, type PolicyMode } from './policy.js';
import { createServer } from './server.js';
import { contextDescriptor, testKubeClient } from './test-support/fixtures.js';
import { createOperationTable } from './tools/index.js';
import { createSilentLogger } from './utils/logger.js';

interface Harness {
  client: Client;
  server: McpServer;
  kube: KubeClient;
}

let harness: Harness | undefined;

async function connect(mode: PolicyMode = 'normal'): Promise<Harness> {
  const contexts = new ContextRegistry(
    [contextDescriptor('prod', { namespace: 'payments' }), contextDescriptor('dev')],
    'dev',
  );
  const policy = new PolicyGate(mode);
  const operations = createOperationTable();
  const kube = testKubeClient('prod');
  const dispatcher = new Dispatcher({
    operations,
    contexts,
    policy,
    clients: { get: async () => kube },
    timeoutMs: 1000,
    logger: createSilentLogger(),
  });
  const server = createServer({ operations, dispatcher, contexts, policy });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: 'test-client', version: '0.0.0' });
  await client.connect(clientTransport);

  harness = { client, server, kube };
  return harness;
}

async function callTool(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error('expected text content');
  }
  const body: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, body };
}

afterEach(async () => {
  if (harness) {
    await harness.client.close();
    await harness.server.close();
    harness = undefined;
  }
});

describe('MCP server', () => {
  it('publishes one tool per operation plus the context tools', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    const names = tools.map((t) => t.name);

    expect(names).toHaveLength(createOperationTable().size + 2);
    expect(names).toContain('context_list');
    expect(names).toContain('namespace_list');
    expect(names).toContain('node_cordon');
  });

  it('annotates reads and deletes', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    const byName = new Map(tools.map((t) => [t.name, t]));

    expect(byName.get('pod_list')?.annotations).toEqual({ readOnlyHint: true, destructiveHint: false });
    expect(byName.get('pod_delete')?.annotations).toEqual({ readOnlyHint: false, destructiveHint: true });
  });

  it('makes namespace and context optional on namespaced tools', async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    const podDelete = tools.find((t) => t.name === 'pod_delete');

    expect(Object.keys(podDelete?.inputSchema.properties ?? {})).toEqual(
      expect.arrayContaining(['namespace', 'name', 'context']),
    );
    expect(podDelete?.inputSchema.required).toEqual(['name']);
  });

  it('routes namespace_list to the named context', async () => {
    const { client, kube } = await connect();
    vi.spyOn(kube.core, 'listNamespace').mockResolvedValue({
      items: [
        {
          metadata: { name: 'payments', creationTimestamp: new Date('2024-01-02T03:04:05Z') },
          status: { phase: 'Active' },
        },
      ],
    });

    const { isError, body } = await callTool(client, 'namespace_list', { context: 'prod' });

    expect(isError).toBe(false);
    expect(body).toEqual([{ name: 'payments', status: 'Active', createdAt: '2024-01-02T03:04:05.000Z' }]);
  });

  it('fills the namespace from the context', async () => {
    const { client, kube } = await connect();
    const list = vi.spyOn(kube.core, 'listNamespacedPod').mockResolvedValue({ items: [] });

    await callTool(client, 'pod_list', { context: 'prod' });

    expect(list).toHaveBeenCalledWith({ namespace: 'payments', labelSelector: undefined });
  });

  it('returns policy refusals as tool errors', async () => {
    const { client, kube } = await connect('readonly');
    const del = vi.spyOn(kube.core, 'deleteNamespacedPod');

    const { isError, body } = await callTool(client, 'pod_delete', {
      context: 'prod',
      namespace: 'default',
      name: 'web-1',
    });

    expect(isError).toBe(true);
    expect(body).toEqual({
      code: 'ReadonlyViolation',
      message: "Operation 'pod_delete' is not allowed in readonly mode",
      operation: 'pod_delete',
    });
    expect(del).not.toHaveBeenCalled();
  });

  it('returns unknown contexts as tool errors', async () => {
    const { client } = await connect();
    const { isError, body } = await callTool(client, 'namespace_list', { context: 'staging' });
    expect(isError).toBe(true);
    expect(body).toEqual({ code: 'UnknownContext', message: "Unknown context 'staging'", context: 'staging' });
  });

  it('lists contexts with the default and policy mode', async () => {
    const { client } = await connect('readonly');
    const { body } = await callTool(client, 'context_list', {});
    expect(body).toEqual({
      policyMode: 'readonly',
      defaultContext: 'dev',
      contexts: [
        {
          name: 'prod',
          cluster: 'prod-cluster',
          server: 'https://prod.example.test:6443',
          user: 'prod-admin',
          namespace: 'payments',
          inCluster: false,
          isDefault: false,
        },
        {
          name: 'dev',
          cluster: 'dev-cluster',
          server: 'https://dev.example.test:6443',
          user: 'dev-admin',
          namespace: null,
          inCluster: false,
          isDefault: true,
        },
      ],
    });
  });

  it('serves the context list as a resource', async () => {
    const { client } = await connect();
    const { contents } = await client.readResource({ uri: 'k8s://contexts' });
    const [first] = contents;
    expect(first?.mimeType).toBe('application/json');
    const text = first && 'text' in first ? first.text : '';
    const parsed: unknown = JSON.parse(typeof text === 'string' ? text : '');
    expect(parsed).toMatchObject({ defaultContext: 'dev', policyMode: 'normal' });
  });
});
