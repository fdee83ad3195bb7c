import { describe, expect, it, vi } from 'vitest';
import { testKubeClient } from '../test-support/fixtures.js';
import { runOperation } from '../test-support/operations.js';
import { decodeSecretData, encodeSecretData } from './config-data.js';

describe('secret data encoding', () => {
  it('encodes values as base64', () => {
    expect(encodeSecretData({ user: 'admin', password: 'test-secret' })).toEqual({
      user: 'YWRtaW4=',
      password: 'dGVzdC1zZWNyZXQ=',
    });
  });

  it('decodes base64 values', () => {
    expect(decodeSecretData({ user: 'YWRtaW4=' })).toEqual({ user: 'admin' });
    expect(decodeSecretData(undefined)).toEqual({});
  });
});

describe('secret operations', () => {
  it('returns decoded values from secret_get', async () => {
    const client = testKubeClient();
    vi.spyOn(client.core, 'readNamespacedSecret').mockResolvedValue({
      metadata: { name: 'db' },
      type: 'Opaque',
      data: { user: 'YWRtaW4=', password: 'dGVzdC1zZWNyZXQ=' },
    });

    const result = await runOperation(client, 'secret_get', { namespace: 'shop', name: 'db' });

    expect(result).toEqual({
      name: 'db',
      type: 'Opaque',
      data: { user: 'admin', password: 'test-secret' },
    });
  });

  it('encodes values on create and defaults the type', async () => {
    const client = testKubeClient();
    const create = vi
      .spyOn(client.core, 'createNamespacedSecret')
      .mockResolvedValue({ metadata: { name: 'db' } });

    await runOperation(client, 'secret_create', { namespace: 'shop', name: 'db', data: { user: 'admin' } });

    expect(create).toHaveBeenCalledWith({
      namespace: 'shop',
      body: { metadata: { name: 'db' }, type: 'Opaque', data: { user: 'YWRtaW4=' } },
    });
  });

  it('merges new keys into the existing secret on update', async () => {
    const client = testKubeClient();
    vi.spyOn(client.core, 'readNamespacedSecret').mockResolvedValue({
      metadata: { name: 'db', resourceVersion: '12' },
      data: { user: 'YWRtaW4=', password: 'b2xkLXZhbHVl' },
    });
    const replace = vi
      .spyOn(client.core, 'replaceNamespacedSecret')
      .mockResolvedValue({ metadata: { name: 'db' } });

    const result = await runOperation(client, 'secret_update', {
      namespace: 'shop',
      name: 'db',
      data: { password: 'test-secret' },
    });

    expect(replace).toHaveBeenCalledWith({
      name: 'db',
      namespace: 'shop',
      body: {
        metadata: { name: 'db', resourceVersion: '12' },
        data: { user: 'YWRtaW4=', password: 'dGVzdC1zZWNyZXQ=' },
      },
    });
    expect(result).toEqual({ name: 'db', status: 'Updated' });
  });
});

describe('configmap operations', () => {
  it('lists keys without values', async () => {
    const client = testKubeClient();
    vi.spyOn(client.core, 'listNamespacedConfigMap').mockResolvedValue({
      items: [{ metadata: { name: 'settings' }, data: { LOG_LEVEL: 'debug', REGION: 'eu' } }],
    });

    const result = await runOperation(client, 'configmap_list', { namespace: 'shop' });

    expect(result).toEqual([{ name: 'settings', keys: ['LOG_LEVEL', 'REGION'], createdAt: undefined }]);
  });
});
