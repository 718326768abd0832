import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { deploymentAdapter, statefulSetAdapter } from '../adapters/apps.js';
import { DelayedUpgradeCoalescer, workloadId, type BatchSnapshot } from '../coalescer.js';
import { createEnvVarStrategy } from '../strategies.js';
import { change, deployment } from './fixtures.js';

const { log } = vi.hoisted(() => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock('@rollwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@rollwatch/shared')>()),
  logger: { child: () => log },
}));

const strategy = createEnvVarStrategy();

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('DelayedUpgradeCoalescer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    log.warn.mockClear();
    log.error.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('keys workloads by kind, namespace and name', () => {
    expect(workloadId('Deployment', 'default', 'api')).toBe('Deployment/default/api');
  });

  it('merges changes that arrive inside the window into one flush', async () => {
    const flushed: BatchSnapshot[] = [];
    const coalescer = new DelayedUpgradeCoalescer({
      flush: async (batch) => {
        flushed.push(batch);
      },
    });
    const item = deployment('api');

    expect(coalescer.enqueue(deploymentAdapter, item, change('db-secret', { kind: 'secret' }), strategy)).toBe(
      'created',
    );
    await vi.advanceTimersByTimeAsync(3_000);
    expect(coalescer.enqueue(deploymentAdapter, item, change('tls-secret', { kind: 'secret' }), strategy)).toBe(
      'merged',
    );

    await vi.advanceTimersByTimeAsync(6_999);
    expect(flushed).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    await coalescer.idle();

    expect(flushed).toHaveLength(1);
    expect(flushed[0]?.itemId).toBe('Deployment/default/api');
    expect(flushed[0]?.configs.map((c) => c.resourceName)).toEqual(['db-secret', 'tls-secret']);
    expect(coalescer.size).toBe(0);
  });

  it('keeps the latest hash when the same resource changes twice', async () => {
    const flushed: BatchSnapshot[] = [];
    const coalescer = new DelayedUpgradeCoalescer({
      windowMs: 1_000,
      flush: async (batch) => {
        flushed.push(batch);
      },
    });
    const item = deployment('api');

    coalescer.enqueue(deploymentAdapter, item, change('cfg', { hash: 'h1' }), strategy);
    expect(coalescer.enqueue(deploymentAdapter, item, change('cfg', { hash: 'h2' }), strategy)).toBe('replaced');

    await vi.advanceTimersByTimeAsync(1_000);
    await coalescer.idle();

    expect(flushed[0]?.configs.map((c) => c.contentHash)).toEqual(['h2']);
  });

  it('keeps separate batches for different workloads and kinds', async () => {
    const flush = vi.fn(async (_batch: BatchSnapshot) => {});
    const coalescer = new DelayedUpgradeCoalescer({ windowMs: 1_000, flush });

    coalescer.enqueue(deploymentAdapter, deployment('api'), change('cfg'), strategy);
    coalescer.enqueue(deploymentAdapter, deployment('web'), change('cfg'), strategy);
    coalescer.enqueue(statefulSetAdapter, { metadata: { name: 'api', namespace: 'default' } }, change('cfg'), strategy);
    expect(coalescer.size).toBe(3);

    await vi.advanceTimersByTimeAsync(1_000);
    await coalescer.idle();

    expect(flush.mock.calls.map(([batch]) => batch.itemId).sort()).toEqual([
      'Deployment/default/api',
      'Deployment/default/web',
      'StatefulSet/default/api',
    ]);
  });

  it('drops a change that arrives while the batch is firing, without deadlock', async () => {
    const gate = deferred();
    const flush = vi.fn(async (_batch: BatchSnapshot) => {
      await gate.promise;
    });
    const coalescer = new DelayedUpgradeCoalescer({ windowMs: 1_000, flush });
    const item = deployment('api');

    coalescer.enqueue(deploymentAdapter, item, change('a'), strategy);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(coalescer.get('Deployment/default/api')?.state).toBe('firing');

    expect(coalescer.enqueue(deploymentAdapter, item, change('b'), strategy)).toBe('dropped');
    expect(log.warn).toHaveBeenCalledWith(
      { itemId: 'Deployment/default/api', resource: 'b' },
      'delayed upgrade already firing, dropping change',
    );

    gate.resolve();
    await coalescer.idle();

    expect(flush).toHaveBeenCalledTimes(1);
    expect(flush.mock.calls[0]?.[0].configs.map((c) => c.resourceName)).toEqual(['a']);
    expect(coalescer.size).toBe(0);

    // The workload is free again for the next window.
    expect(coalescer.enqueue(deploymentAdapter, item, change('b'), strategy)).toBe('created');
  });

  it('removes the batch when the flush fails', async () => {
    const coalescer = new DelayedUpgradeCoalescer({
      windowMs: 1_000,
      flush: async () => {
        throw new Error('boom');
      },
    });

    coalescer.enqueue(deploymentAdapter, deployment('api'), change('cfg'), strategy);
    await vi.advanceTimersByTimeAsync(1_000);
    await coalescer.idle();

    expect(coalescer.size).toBe(0);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ itemId: 'Deployment/default/api' }),
      'delayed upgrade failed',
    );
  });

  it('discards pending batches on shutdown', async () => {
    const flush = vi.fn(async (_batch: BatchSnapshot) => {});
    const coalescer = new DelayedUpgradeCoalescer({ windowMs: 1_000, flush });

    coalescer.enqueue(deploymentAdapter, deployment('api'), change('cfg'), strategy);
    coalescer.shutdown();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(flush).not.toHaveBeenCalled();
    expect(coalescer.size).toBe(0);
  });
});
