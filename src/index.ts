#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command } from 'commander';
import { ClientCache } from './client-cache.js';
import { resolveConfig, type CliOptions, type ServerConfig } from './config.js';
import { ContextRegistry, loadKubeConfig } from './context-registry.js';
import { Dispatcher } from './dispatcher.js';
import { createKubeClientFactory } from './k8s-client.js';
import { PolicyGate, policyModeFromFlag } from './policy.js';
import { SERVER_VERSION, createServer } from './server.js';
import { createOperationTable } from './tools/index.js';
import { createLogger, type Logger } from './utils/logger.js';

async function main(config: ServerConfig, logger: Logger): Promise<void> {
  const loaded = loadKubeConfig({ path: config.kubeconfig });
  const contexts = ContextRegistry.fromKubeConfig(loaded, {
    defaultContext: config.defaultContext,
    logger,
  });
  const policy = new PolicyGate(policyModeFromFlag(config.readonly));
  const operations = createOperationTable();
  const clients = new ClientCache(
    createKubeClientFactory(loaded.kubeConfig, { connectTimeoutMs: config.requestTimeoutMs }),
    logger,
  );
  const dispatcher = new Dispatcher({
    operations,
    contexts,
    policy,
    clients,
    timeoutMs: config.requestTimeoutMs,
    logger,
  });

  const server = createServer({ operations, dispatcher, contexts, policy });

  const shutdown = () => {
    logger.info('shutting down');
    void server
      .close()
      .catch((err: unknown) => logger.error({ err }, 'error while closing server'))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      source: loaded.source,
      contexts: contexts.list().length,
      defaultContext: contexts.defaultContext.name,
      policy: policy.mode,
      operations: operations.size,
    },
    'kubeconduit server started',
  );
}

const program = new Command();

program
  .name('kubeconduit')
  .description('MCP server routing Kubernetes operations across kube contexts')
  .version(SERVER_VERSION)
  .option('--readonly', 'reject every operation that would modify cluster state')
  .option('--context <name>', 'context used when a call names none')
  .option('--kubeconfig <path>', 'kubeconfig file to load instead of the default search')
  .option('--timeout <ms>', 'per-request timeout in milliseconds')
  .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent')
  .action(async (opts: CliOptions) => {
    let logger = createLogger();
    try {
      const config = resolveConfig(opts);
      logger = createLogger(config.logLevel);
      await main(config, logger);
    } catch (err) {
      logger.fatal({ err }, err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
