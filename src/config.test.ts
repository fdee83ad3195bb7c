import { describe, expect, it } from 'vitest';
import { DEFAULT_REQUEST_TIMEOUT_MS, MAX_REQUEST_TIMEOUT_MS, resolveConfig } from './config.js';
import { ConfigError } from './utils/errors.js';

describe('resolveConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = resolveConfig({}, {});
    expect(config).toEqual({
      readonly: false,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads KUBECONDUIT_* environment variables', () => {
    const config = resolveConfig(
      {},
      {
        KUBECONDUIT_READONLY: 'true',
        KUBECONDUIT_CONTEXT: 'prod',
        KUBECONDUIT_TIMEOUT_MS: '5000',
        KUBECONDUIT_LOG_LEVEL: 'debug',
      },
    );
    expect(config.readonly).toBe(true);
    expect(config.defaultContext).toBe('prod');
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.logLevel).toBe('debug');
  });

  it('lets command line options win over the environment', () => {
    const config = resolveConfig(
      { context: 'dev', timeout: '1500', logLevel: 'warn' },
      { KUBECONDUIT_CONTEXT: 'prod', KUBECONDUIT_TIMEOUT_MS: '5000', KUBECONDUIT_LOG_LEVEL: 'debug' },
    );
    expect(config.defaultContext).toBe('dev');
    expect(config.requestTimeoutMs).toBe(1500);
    expect(config.logLevel).toBe('warn');
  });

  it('accepts 1 and no as readonly values', () => {
    expect(resolveConfig({}, { KUBECONDUIT_READONLY: '1' }).readonly).toBe(true);
    expect(resolveConfig({}, { KUBECONDUIT_READONLY: 'no' }).readonly).toBe(false);
    expect(resolveConfig({ readonly: true }, {}).readonly).toBe(true);
  });

  it('treats empty environment values as unset', () => {
    const config = resolveConfig({}, { KUBECONDUIT_CONTEXT: '', KUBECONDUIT_TIMEOUT_MS: '' });
    expect(config.defaultContext).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(DEFAULT_REQUEST_TIMEOUT_MS);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => resolveConfig({ timeout: 'soon' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({ timeout: 'soon' }, {})).toThrow(/requestTimeoutMs/);
  });

  it('rejects a zero timeout', () => {
    expect(() => resolveConfig({ timeout: '0' }, {})).toThrow(/requestTimeoutMs/);
  });

  it('rejects a timeout longer than a timer can hold', () => {
    expect(() => resolveConfig({ timeout: '3000000000' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({}, { KUBECONDUIT_TIMEOUT_MS: '3000000000' })).toThrow(/requestTimeoutMs/);
    const config = resolveConfig({ timeout: String(MAX_REQUEST_TIMEOUT_MS) }, {});
    expect(config.requestTimeoutMs).toBe(MAX_REQUEST_TIMEOUT_MS);
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveConfig({ logLevel: 'loud' }, {})).toThrow(/logLevel/);
  });

  it('rejects an unrecognised readonly value', () => {
    expect(() => resolveConfig({}, { KUBECONDUIT_READONLY: 'maybe' })).toThrow(/readonly/);
  });
});
