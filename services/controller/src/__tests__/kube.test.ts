import { describe, it, expect, vi } from 'vitest';
import { detectOpenShift } from '../kube.js';

vi.mock('@rollwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@rollwatch/shared')>()),
  logger: { child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }) },
}));

describe('detectOpenShift', () => {
  it('finds the OpenShift apps group', async () => {
    const apis = {
      getAPIVersions: vi.fn().mockResolvedValue({
        groups: [{ name: 'apps', versions: [] }, { name: 'apps.openshift.io', versions: [] }],
      }),
    };
    await expect(detectOpenShift(apis)).resolves.toBe(true);
  });

  it('is false on plain Kubernetes', async () => {
    const apis = { getAPIVersions: vi.fn().mockResolvedValue({ groups: [{ name: 'apps', versions: [] }] }) };
    await expect(detectOpenShift(apis)).resolves.toBe(false);
  });

  it('is false when discovery fails', async () => {
    const apis = { getAPIVersions: vi.fn().mockRejectedValue(new Error('unauthorized')) };
    await expect(detectOpenShift(apis)).resolves.toBe(false);
  });
});
