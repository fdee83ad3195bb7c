import type * as k8s from '@kubernetes/client-node';
import { describe, expect, it, vi } from 'vitest';
import { MERGE_PATCH } from '../k8s-client.js';
import { testKubeClient } from '../test-support/fixtures.js';
import { runOperation } from '../test-support/operations.js';
import { UnexpectedResourceError } from '../utils/errors.js';
import { withImage } from './workloads.js';

function webDeployment(): k8s.V1Deployment {
  return {
    metadata: { name: 'web', namespace: 'shop', resourceVersion: '7' },
    spec: {
      replicas: 1,
      selector: { matchLabels: { app: 'web' } },
      template: {
        metadata: { labels: { app: 'web' } },
        spec: {
          containers: [
            { name: 'web', image: 'nginx:1.25' },
            { name: 'proxy', image: 'envoy:1.30' },
          ],
        },
      },
    },
  };
}

describe('withImage', () => {
  it('changes only the first container image', () => {
    const template = webDeployment().spec?.template;
    expect(withImage(template, 'nginx:1.27').spec?.containers).toEqual([
      { name: 'web', image: 'nginx:1.27' },
      { name: 'proxy', image: 'envoy:1.30' },
    ]);
  });

  it('keeps the template metadata', () => {
    const template = webDeployment().spec?.template;
    expect(withImage(template, 'nginx:1.27').metadata).toEqual({ labels: { app: 'web' } });
  });

  it('refuses a template without containers', () => {
    expect(() => withImage({ spec: { containers: [] } }, 'nginx')).toThrow(UnexpectedResourceError);
    expect(() => withImage(undefined, 'nginx')).toThrow(
      'Pod template returned by the API has no containers to update',
    );
  });
});

describe('deployment operations', () => {
  it('creates a deployment whose selector matches its pod labels', async () => {
    const client = testKubeClient();
    const create = vi
      .spyOn(client.apps, 'createNamespacedDeployment')
      .mockResolvedValue({ metadata: { name: 'web' } });

    const result = await runOperation(client, 'deployment_create', {
      namespace: 'shop',
      name: 'web',
      image: 'nginx:1.25',
      labels: { app: 'web' },
    });

    expect(create).toHaveBeenCalledWith({
      namespace: 'shop',
      body: {
        metadata: { name: 'web', labels: { app: 'web' } },
        spec: {
          replicas: 1,
          selector: { matchLabels: { app: 'web' } },
          template: {
            metadata: { labels: { app: 'web' } },
            spec: { containers: [{ name: 'web', image: 'nginx:1.25' }] },
          },
        },
      },
    });
    expect(result).toEqual({ name: 'web', status: 'Created' });
  });

  it('updates image and replicas on the object it read', async () => {
    const client = testKubeClient();
    vi.spyOn(client.apps, 'readNamespacedDeployment').mockResolvedValue(webDeployment());
    const replace = vi
      .spyOn(client.apps, 'replaceNamespacedDeployment')
      .mockResolvedValue({ metadata: { name: 'web' } });

    const result = await runOperation(client, 'deployment_update', {
      namespace: 'shop',
      name: 'web',
      image: 'nginx:1.27',
      replicas: 3,
    });

    const expected = webDeployment();
    expect(replace).toHaveBeenCalledWith({
      name: 'web',
      namespace: 'shop',
      body: {
        ...expected,
        spec: {
          ...expected.spec,
          replicas: 3,
          template: {
            metadata: { labels: { app: 'web' } },
            spec: {
              containers: [
                { name: 'web', image: 'nginx:1.27' },
                { name: 'proxy', image: 'envoy:1.30' },
              ],
            },
          },
        },
      },
    });
    expect(result).toEqual({ name: 'web', status: 'Updated' });
  });

  it('scales with a merge patch of spec.replicas', async () => {
    const client = testKubeClient();
    const patch = vi.spyOn(client.apps, 'patchNamespacedDeployment').mockResolvedValue({
      metadata: { name: 'web' },
      spec: { replicas: 5, selector: {}, template: {} },
    });

    const result = await runOperation(client, 'deployment_scale', { namespace: 'shop', name: 'web', replicas: 5 });

    expect(patch).toHaveBeenCalledWith(
      { name: 'web', namespace: 'shop', body: { spec: { replicas: 5 } } },
      MERGE_PATCH,
    );
    expect(result).toEqual({ name: 'web', status: 'Scaled', replicas: 5 });
  });

  it('refuses to update a deployment read back without a spec', async () => {
    const client = testKubeClient();
    vi.spyOn(client.apps, 'readNamespacedDeployment').mockResolvedValue({ metadata: { name: 'web' } });
    const replace = vi.spyOn(client.apps, 'replaceNamespacedDeployment');

    await expect(
      runOperation(client, 'deployment_update', {
        namespace: 'shop',
        name: 'web',
        image: 'nginx:1.27',
        replicas: 2,
      }),
    ).rejects.toThrow(UnexpectedResourceError);
    expect(replace).not.toHaveBeenCalled();
  });

  it('rejects negative replica counts', async () => {
    const client = testKubeClient();
    const patch = vi.spyOn(client.apps, 'patchNamespacedDeployment');
    await expect(
      runOperation(client, 'deployment_scale', { namespace: 'shop', name: 'web', replicas: -1 }),
    ).rejects.toThrow();
    expect(patch).not.toHaveBeenCalled();
  });
});
