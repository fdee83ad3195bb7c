import type { z } from 'zod';
import type { ContextDescriptor } from './context-registry.js';

export type MutationClass = 'read' | 'write';

export type ResourceScope = 'namespaced' | 'cluster';

export type ResourceKind =
  | 'namespace'
  | 'pod'
  | 'deployment'
  | 'statefulset'
  | 'daemonset'
  | 'replicaset'
  | 'service'
  | 'configmap'
  | 'secret'
  | 'serviceaccount'
  | 'role'
  | 'clusterrole'
  | 'ingress'
  | 'pv'
  | 'pvc'
  | 'node';

export type OperationVerb = 'list' | 'get' | 'create' | 'update' | 'patch' | 'delete';

/** The mutation class each verb implies; descriptors must agree with it. */
export const VERB_MUTATION: Readonly<Record<OperationVerb, MutationClass>> = Object.freeze({
  list: 'read',
  get: 'read',
  create: 'write',
  update: 'write',
  patch: 'write',
  delete: 'write',
});

export interface HandlerContext {
  readonly context: ContextDescriptor;
  readonly signal: AbortSignal;
}

/** Argument schema of an operation: a zod object, so its shape can be published. */
export type OperationInput<A = unknown> = z.ZodType<A, z.ZodTypeDef, unknown> & {
  readonly shape: z.ZodRawShape;
};

export interface OperationDescriptor<TClient> {
  readonly name: string;
  readonly kind: ResourceKind;
  readonly verb: OperationVerb;
  readonly mutation: MutationClass;
  readonly scope: ResourceScope;
  readonly description: string;
  readonly input: OperationInput;
  readonly handler: (client: TClient, args: unknown, ctx: HandlerContext) => Promise<unknown>;
}

export interface OperationSpec<TClient, A> {
  name: string;
  kind: ResourceKind;
  verb: OperationVerb;
  mutation: MutationClass;
  scope: ResourceScope;
  description: string;
  input: OperationInput<A>;
  handler: (client: TClient, args: A, ctx: HandlerContext) => Promise<unknown>;
}

/**
 * Returns a `define` function bound to one client type, so handlers get their
 * arguments typed from the operation's schema.
 */
export function operationBuilder<TClient>() {
  return function define<A>(spec: OperationSpec<TClient, A>): OperationDescriptor<TClient> {
    return Object.freeze({
      ...spec,
      handler: async (client: TClient, args: unknown, ctx: HandlerContext) =>
        spec.handler(client, spec.input.parse(args), ctx),
    });
  };
}

/**
 * Closed registry of every operation the server exposes. Built once at
 * startup and never mutated.
 */
export class OperationTable<TClient> {
  private readonly operations: ReadonlyMap<string, OperationDescriptor<TClient>>;

  constructor(descriptors: readonly OperationDescriptor<TClient>[]) {
    const operations = new Map<string, OperationDescriptor<TClient>>();
    for (const descriptor of descriptors) {
      if (operations.has(descriptor.name)) {
        throw new Error(`Duplicate operation '${descriptor.name}'`);
      }
      const implied = VERB_MUTATION[descriptor.verb];
      if (descriptor.mutation !== implied) {
        throw new Error(
          `Operation '${descriptor.name}' is declared '${descriptor.mutation}' but verb '${descriptor.verb}' is '${implied}'`,
        );
      }
      operations.set(descriptor.name, descriptor);
    }
    this.operations = operations;
    Object.freeze(this);
  }

  get(name: string): OperationDescriptor<TClient> | undefined {
    return this.operations.get(name);
  }

  list(): OperationDescriptor<TClient>[] {
    return [...this.operations.values()];
  }

  get size(): number {
    return this.operations.size;
  }
}
