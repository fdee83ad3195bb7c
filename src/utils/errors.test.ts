import * as k8s from '@kubernetes/client-node';
import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  ClientConstructionError,
  ConfigError,
  InvalidArgumentsError,
  TimeoutError,
  UnexpectedResourceError,
  UnknownContextError,
  UpstreamError,
  formatK8sError,
  toUpstreamError,
} from './errors.js';

const notFoundBody = JSON.stringify({
  kind: 'Status',
  status: 'Failure',
  message: 'pods "web-1" not found',
  reason: 'NotFound',
  code: 404,
});

function notFound(): k8s.ApiException<string> {
  return new k8s.ApiException(404, 'HTTP-Code: 404', notFoundBody, {});
}

describe('formatK8sError', () => {
  it('uses the status message of an API error', () => {
    expect(formatK8sError(notFound())).toBe('Kubernetes API error (404): pods "web-1" not found');
  });

  it('falls back to the raw body when it carries no message', () => {
    const err = new k8s.ApiException(500, 'HTTP-Code: 500', 'upstream exploded', {});
    expect(formatK8sError(err)).toBe('Kubernetes API error (500): upstream exploded');
  });

  it('formats plain errors and non-errors', () => {
    expect(formatK8sError(new Error('connect ECONNREFUSED'))).toBe('connect ECONNREFUSED');
    expect(formatK8sError('odd')).toBe('odd');
  });
});

describe('toUpstreamError', () => {
  it('classifies API errors with status and reason', () => {
    const err = toUpstreamError(notFound(), 'pod_get', 'prod');
    expect(err.toJSON()).toEqual({
      code: 'UpstreamError',
      message: 'Kubernetes API error (404): pods "web-1" not found',
      operation: 'pod_get',
      context: 'prod',
      kind: 'api',
      status: 404,
      reason: 'NotFound',
    });
  });

  it('classifies timeouts and cancellations', () => {
    expect(toUpstreamError(new TimeoutError(50), 'pod_list', 'dev').kind).toBe('timeout');
    expect(toUpstreamError(new CancelledError(), 'pod_list', 'dev').kind).toBe('cancelled');
  });

  it('classifies unusable API objects as resource failures', () => {
    const err = toUpstreamError(
      new UnexpectedResourceError("Deployment 'web' returned by the API has no spec"),
      'deployment_update',
      'prod',
    );
    expect(err.toJSON()).toEqual({
      code: 'UpstreamError',
      message: "Deployment 'web' returned by the API has no spec",
      operation: 'deployment_update',
      context: 'prod',
      kind: 'resource',
    });
  });

  it('treats anything else as a transport failure', () => {
    const err = toUpstreamError(new Error('socket hang up'), 'pod_list', 'dev');
    expect(err.kind).toBe('transport');
    expect(err.message).toBe('socket hang up');
    expect(err.toJSON()).not.toHaveProperty('status');
  });

  it('returns an existing UpstreamError unchanged', () => {
    const original = new UpstreamError('x', { operation: 'a', context: 'b', kind: 'api' });
    expect(toUpstreamError(original, 'c', 'd')).toBe(original);
  });
});

describe('error payloads', () => {
  it('carries the context for unknown contexts', () => {
    expect(new UnknownContextError('staging').toJSON()).toEqual({
      code: 'UnknownContext',
      message: "Unknown context 'staging'",
      context: 'staging',
    });
  });

  it('lists the issues of invalid arguments', () => {
    const err = new InvalidArgumentsError('pod_get', ['name: Required']);
    expect(err.message).toBe("Invalid arguments for 'pod_get': name: Required");
    expect(err.toJSON().issues).toEqual(['name: Required']);
  });

  it('describes the cause of a failed client construction', () => {
    const err = new ClientConstructionError('prod', notFound());
    expect(err.message).toBe(
      "Failed to connect to context 'prod': Kubernetes API error (404): pods \"web-1\" not found",
    );
    expect(err.code).toBe('ClientConstructionError');
  });

  it('joins config issues into the message', () => {
    expect(new ConfigError('Invalid configuration', ['a: bad', 'b: worse']).message).toBe(
      'Invalid configuration: a: bad; b: worse',
    );
  });
});
