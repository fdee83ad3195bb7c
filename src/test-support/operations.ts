import type { KubeClient } from '../k8s-client.js';
import { createOperationTable } from '../tools/index.js';
import { contextDescriptor } from './fixtures.js';

const table = createOperationTable();

/** Calls one operation's handler directly, bypassing the dispatcher. */
export function runOperation(
  client: KubeClient,
  name: string,
  args: Record<string, unknown>,
  signal: AbortSignal = new AbortController().signal,
): Promise<unknown> {
  const operation = table.get(name);
  if (!operation) {
    throw new Error(`No operation named '${name}'`);
  }
  return operation.handler(client, args, { context: contextDescriptor(client.context), signal });
}
