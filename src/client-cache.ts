import type { ContextDescriptor } from './context-registry.js';
import { ClientConstructionError } from './utils/errors.js';
import type { Logger } from './utils/logger.js';

export type ClientFactory<TClient> = (context: ContextDescriptor) => Promise<TClient>;

export interface ClientProvider<TClient> {
  get(context: ContextDescriptor): Promise<TClient>;
}

/**
 * One client per context name. The construction promise is stored before the
 * first await, so concurrent misses for a context share one construction.
 * Rejected constructions are evicted and retried by the next caller.
 */
export class ClientCache<TClient> implements ClientProvider<TClient> {
  private readonly clients = new Map<string, Promise<TClient>>();

  constructor(
    private readonly factory: ClientFactory<TClient>,
    private readonly logger: Logger,
  ) {}

  get(context: ContextDescriptor): Promise<TClient> {
    const cached = this.clients.get(context.name);
    if (cached) {
      return cached;
    }

    const pending = this.construct(context);
    this.clients.set(context.name, pending);
    void pending.catch(() => {
      if (this.clients.get(context.name) === pending) {
        this.clients.delete(context.name);
      }
    });
    return pending;
  }

  has(contextName: string): boolean {
    return this.clients.has(contextName);
  }

  get size(): number {
    return this.clients.size;
  }

  private async construct(context: ContextDescriptor): Promise<TClient> {
    const started = Date.now();
    this.logger.debug({ context: context.name, server: context.server }, 'building kube client');
    try {
      const client = await this.factory(context);
      this.logger.info(
        { context: context.name, durationMs: Date.now() - started },
        'kube client ready',
      );
      return client;
    } catch (err) {
      const error = new ClientConstructionError(context.name, err);
      this.logger.warn({ context: context.name, err: error.message }, 'kube client construction failed');
      throw error;
    }
  }
}
