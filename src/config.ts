import { z } from 'zod';
import { LOG_LEVELS } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
// Largest delay setTimeout honours; longer ones fire after 1ms.
export const MAX_REQUEST_TIMEOUT_MS = 2_147_483_647;

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => (typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value)));

const ServerConfigSchema = z.object({
  readonly: booleanFlag.default(false),
  defaultContext: z.string().min(1).optional(),
  kubeconfig: z.string().min(1).optional(),
  requestTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_REQUEST_TIMEOUT_MS)
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type ServerConfig = Readonly<z.infer<typeof ServerConfigSchema>>;

/** Options as commander hands them over. */
export interface CliOptions {
  readonly?: boolean;
  context?: string;
  kubeconfig?: string;
  timeout?: string;
  logLevel?: string;
}

/**
 * Builds the immutable server configuration. Command line options win over
 * KUBECONDUIT_* environment variables.
 */
export function resolveConfig(cli: CliOptions, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse({
    readonly: cli.readonly || env.KUBECONDUIT_READONLY || undefined,
    defaultContext: cli.context ?? (env.KUBECONDUIT_CONTEXT || undefined),
    kubeconfig: cli.kubeconfig,
    requestTimeoutMs: cli.timeout ?? (env.KUBECONDUIT_TIMEOUT_MS || undefined),
    logLevel: cli.logLevel ?? (env.KUBECONDUIT_LOG_LEVEL || undefined),
  });

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return Object.freeze(parsed.data);
}
