import type * as k8s from '@kubernetes/client-node';
import { logger, type ChangeConfig } from '@rollwatch/shared';
import type { ResourceAdapter } from './adapters/types.js';
import { itemName } from './adapters/types.js';
import type { UpdateStrategy } from './strategies.js';

const log = logger.child({ module: 'coalescer' });

export const DEFAULT_DELAY_WINDOW_MS = 10_000;

export type BatchState = 'pending' | 'firing' | 'done';

export interface DelayedBatch {
  readonly itemId: string;
  readonly itemName: string;
  readonly namespace: string;
  /** Keyed by resource name. */
  readonly pendingConfigs: Map<string, ChangeConfig>;
  readonly fireAt: number;
  state: BatchState;
  readonly adapter: ResourceAdapter;
  readonly strategy: UpdateStrategy;
}

/** What the flush handler receives: the batch with its configs frozen at fire time. */
export interface BatchSnapshot {
  itemId: string;
  itemName: string;
  namespace: string;
  configs: ChangeConfig[];
  adapter: ResourceAdapter;
  strategy: UpdateStrategy;
}

export type EnqueueOutcome = 'created' | 'merged' | 'replaced' | 'dropped';

export interface CoalescerOptions {
  windowMs?: number;
  flush: (batch: BatchSnapshot) => Promise<void>;
}

/** Workload identity for batching: kind, namespace and name. */
export function workloadId(kind: string, namespace: string, name: string): string {
  return `${kind}/${namespace}/${name}`;
}

/**
 * Per-workload debounce. The first delayed change for a workload opens a batch
 * and starts its one timer; later changes merge into it until the timer fires.
 *
 * Every read-modify-write of the registry runs synchronously on the event loop,
 * so a batch is created, merged or claimed for firing by exactly one caller.
 * The only await is the flush itself, which runs on a snapshot taken after the
 * batch has left `pending`.
 */
export class DelayedUpgradeCoalescer {
  private readonly batches = new Map<string, DelayedBatch>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly windowMs: number;
  private readonly flush: (batch: BatchSnapshot) => Promise<void>;

  constructor(opts: CoalescerOptions) {
    this.windowMs = opts.windowMs ?? DEFAULT_DELAY_WINDOW_MS;
    this.flush = opts.flush;
  }

  enqueue<T extends k8s.KubernetesObject>(
    adapter: ResourceAdapter<T>,
    item: T,
    change: ChangeConfig,
    strategy: UpdateStrategy,
  ): EnqueueOutcome {
    const name = itemName(item);
    const itemId = workloadId(adapter.kind, change.namespace, name);
    const existing = this.batches.get(itemId);

    if (existing) {
      if (existing.state !== 'pending') {
        log.warn({ itemId, resource: change.resourceName }, 'delayed upgrade already firing, dropping change');
        return 'dropped';
      }
      const queued = existing.pendingConfigs.has(change.resourceName);
      existing.pendingConfigs.set(change.resourceName, change);
      if (queued) {
        log.info({ itemId, resource: change.resourceName }, 'config already part of delayed upgrade, keeping latest hash');
        return 'replaced';
      }
      log.info({ itemId, resource: change.resourceName }, 'added config to delayed upgrade');
      return 'merged';
    }

    const batch: DelayedBatch = {
      itemId,
      itemName: name,
      namespace: change.namespace,
      pendingConfigs: new Map([[change.resourceName, change]]),
      fireAt: Date.now() + this.windowMs,
      state: 'pending',
      adapter,
      strategy,
    };
    this.batches.set(itemId, batch);
    this.timers.set(
      itemId,
      setTimeout(() => this.fire(itemId), this.windowMs),
    );
    log.info({ itemId, resource: change.resourceName, windowMs: this.windowMs }, 'created delayed upgrade');
    return 'created';
  }

  get(itemId: string): Readonly<DelayedBatch> | undefined {
    return this.batches.get(itemId);
  }

  get size(): number {
    return this.batches.size;
  }

  /** Resolves once every flush started so far has finished. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  /** Drop pending batches and stop their timers. Flushes already running are left to finish. */
  shutdown(): void {
    for (const [itemId, timer] of this.timers) {
      clearTimeout(timer);
      const batch = this.batches.get(itemId);
      if (batch?.state === 'pending') {
        log.warn({ itemId, configs: [...batch.pendingConfigs.keys()] }, 'discarding pending delayed upgrade on shutdown');
        this.batches.delete(itemId);
      }
    }
    this.timers.clear();
  }

  private fire(itemId: string): void {
    this.timers.delete(itemId);
    const batch = this.batches.get(itemId);
    if (!batch) {
      log.error({ itemId }, 'delayed upgrade not found when its timer fired');
      return;
    }
    if (batch.state !== 'pending') return;

    batch.state = 'firing';
    const snapshot: BatchSnapshot = {
      itemId,
      itemName: batch.itemName,
      namespace: batch.namespace,
      configs: [...batch.pendingConfigs.values()],
      adapter: batch.adapter,
      strategy: batch.strategy,
    };
    log.info({ itemId, configs: snapshot.configs.map((c) => c.resourceName) }, 'performing delayed upgrade');

    const run = this.flush(snapshot)
      .then(
        () => log.info({ itemId }, 'delayed upgrade finished'),
        (err: unknown) => log.error({ err, itemId }, 'delayed upgrade failed'),
      )
      .finally(() => {
        batch.state = 'done';
        this.batches.delete(itemId);
        this.inflight.delete(run);
      });
    this.inflight.add(run);
  }
}
