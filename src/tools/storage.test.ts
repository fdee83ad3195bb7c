import { describe, expect, it, vi } from 'vitest';
import { MERGE_PATCH } from '../k8s-client.js';
import { testKubeClient } from '../test-support/fixtures.js';
import { runOperation } from '../test-support/operations.js';
import { createOperationTable } from './index.js';

describe('label updates', () => {
  it('merges new labels into a claim without replacing the others', async () => {
    const client = testKubeClient();
    const patch = vi.spyOn(client.core, 'patchNamespacedPersistentVolumeClaim').mockResolvedValue({
      metadata: { name: 'data', labels: { app: 'db', tier: 'gold' } },
    });

    const result = await runOperation(client, 'pvc_update', {
      namespace: 'shop',
      name: 'data',
      labels: { tier: 'gold' },
    });

    expect(patch).toHaveBeenCalledWith(
      { name: 'data', namespace: 'shop', body: { metadata: { labels: { tier: 'gold' } } } },
      MERGE_PATCH,
    );
    expect(result).toEqual({ name: 'data', status: 'Updated', labels: { app: 'db', tier: 'gold' } });
  });

  it('describes label updates as additive', () => {
    const table = createOperationTable();
    for (const name of ['service_update', 'pv_update', 'pvc_update']) {
      expect(table.get(name)?.description).toMatch(/^Add or overwrite labels on /);
    }
  });
});
