import type * as k8s from '@kubernetes/client-node';
import {
  excludeAnnotationFor,
  logger,
  type AnnotationKeys,
  type ChangeConfig,
  type EvaluationResult,
} from '@rollwatch/shared';
import type { ResourceAdapter } from './adapters/types.js';
import { itemName } from './adapters/types.js';
import { DelayedUpgradeCoalescer, type BatchSnapshot } from './coalescer.js';
import type { WorkloadClients } from './kube.js';
import type { OutcomeReporter } from './reporter.js';
import type { UpdateStrategy } from './strategies.js';

const log = logger.child({ module: 'evaluator' });

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);

/** Boolean annotation value; anything unrecognised reads as false. */
export function parseBool(value: string | undefined): boolean {
  return value !== undefined && TRUE_VALUES.has(value);
}

/** Exact, trimmed match of the resource name against a comma-separated list. */
export function isResourceExcluded(resourceName: string, excludeList: string | undefined): boolean {
  if (!excludeList) return false;
  return excludeList.split(',').some((entry) => entry.trim() === resourceName);
}

/** Manual reload tokens are whole-string patterns: `foo` matches `foo`, not `foobar`. */
export function matchesManualToken(token: string, resourceName: string): boolean {
  try {
    return new RegExp(`^${token}$`).test(resourceName);
  } catch (err) {
    log.warn({ err, token }, 'invalid reload annotation pattern, skipping');
    return false;
  }
}

/** The reload-related annotation values that drive one config's evaluation. */
export interface ReloadAnnotations {
  manual?: string;
  auto?: string;
  typedAuto?: string;
  search?: string;
  /** Read from the workload only, never from the pod template. */
  exclude?: string;
  delayed: boolean;
}

/**
 * Reload annotations come from the workload; when it carries none of the
 * manual/auto/typed-auto/search keys they are read from the pod template instead.
 */
export function readReloadAnnotations<T extends k8s.KubernetesObject>(
  adapter: ResourceAdapter<T>,
  item: T,
  change: ChangeConfig,
  keys: AnnotationKeys,
): ReloadAnnotations {
  const workload = adapter.getAnnotations(item);
  const exclude = workload[excludeAnnotationFor(change.kind, keys)];
  const delayed = keys.delayedUpgrade in workload;

  const relevant = [change.annotationKey, keys.auto, change.typedAutoAnnotationKey, keys.search];
  const source = relevant.some((key) => key in workload) ? workload : (adapter.getPodAnnotations(item) ?? {});

  return {
    manual: source[change.annotationKey],
    auto: source[keys.auto],
    typedAuto: source[change.typedAutoAnnotationKey],
    search: source[keys.search],
    exclude,
    delayed,
  };
}

export interface EvaluationPass {
  /** Set by the delayed-upgrade flush so its configs are evaluated, not queued again. */
  fromBatch?: boolean;
  /** Strategy bound to a delayed batch; defaults to the evaluator's. */
  strategy?: UpdateStrategy;
}

export interface TriggerEvaluatorOptions {
  clients: WorkloadClients;
  strategy: UpdateStrategy;
  reporter: OutcomeReporter;
  annotations: AnnotationKeys;
  autoReloadAll: boolean;
  delayWindowMs?: number;
}

/**
 * Decides, per workload, whether a change (or a batch of changes) reloads it,
 * mutates it through the configured strategy, and applies it once.
 */
export class TriggerEvaluator {
  readonly coalescer: DelayedUpgradeCoalescer;
  private readonly opts: TriggerEvaluatorOptions;

  constructor(opts: TriggerEvaluatorOptions) {
    this.opts = opts;
    this.coalescer = new DelayedUpgradeCoalescer({
      windowMs: opts.delayWindowMs,
      flush: (batch) => this.flushBatch(batch),
    });
  }

  /** Evaluate one change against every workload of one kind in the change's namespace. */
  async performAction(adapter: ResourceAdapter, change: ChangeConfig): Promise<void> {
    const items = await adapter.listItems(this.opts.clients, change.namespace);
    for (const item of items) {
      await this.performOnItem(adapter, item, [change]);
    }
  }

  /**
   * Evaluate pending changes against one workload. Rejects with the update error
   * when applying the workload fails.
   */
  async performOnItem<T extends k8s.KubernetesObject>(
    adapter: ResourceAdapter<T>,
    item: T,
    changes: ChangeConfig[],
    pass: EvaluationPass = {},
  ): Promise<EvaluationResult> {
    const keys = this.opts.annotations;
    const strategy = pass.strategy ?? this.opts.strategy;
    let aggregate: EvaluationResult = 'not-updated';
    let updatedBy: ChangeConfig | undefined;

    for (const change of changes) {
      const read = readReloadAnnotations(adapter, item, change, keys);

      if (isResourceExcluded(change.resourceName, read.exclude)) {
        log.debug({ resource: change.resourceName, workload: itemName(item) }, 'resource excluded by annotation');
        continue;
      }

      if (read.delayed && !pass.fromBatch) {
        this.coalescer.enqueue(adapter, item, change, strategy);
        continue;
      }

      const result = this.evaluateChange(adapter, item, change, read, strategy);
      log.debug(
        { resource: change.resourceName, workload: itemName(item), kind: adapter.kind, result },
        'evaluated change',
      );
      if (result === 'updated') {
        aggregate = 'updated';
        updatedBy = change;
      }
    }

    if (aggregate !== 'updated' || !updatedBy) return aggregate;

    const namespace = updatedBy.namespace;
    const outcome = { kind: adapter.kind, apiVersion: adapter.apiVersion, item, namespace, change: updatedBy };
    try {
      await adapter.applyUpdate(this.opts.clients, namespace, item);
    } catch (err) {
      this.opts.reporter.failed(outcome, err);
      throw err;
    }
    this.opts.reporter.reloaded(outcome);
    return aggregate;
  }

  /**
   * Auto-reload, then manual match, then search match; the first `updated` wins.
   */
  private evaluateChange<T extends k8s.KubernetesObject>(
    adapter: ResourceAdapter<T>,
    item: T,
    change: ChangeConfig,
    read: ReloadAnnotations,
    strategy: UpdateStrategy,
  ): EvaluationResult {
    const { autoReloadAll, annotations: keys } = this.opts;
    let result: EvaluationResult = 'not-updated';

    const autoUnset = !read.auto && !read.typedAuto;
    if (parseBool(read.auto) || parseBool(read.typedAuto) || (autoUnset && autoReloadAll)) {
      result = strategy.apply(adapter, item, change, true);
    }

    if (result !== 'updated' && read.manual) {
      for (const token of read.manual.split(',').map((t) => t.trim())) {
        if (!matchesManualToken(token, change.resourceName)) continue;
        result = strategy.apply(adapter, item, change, false);
        if (result === 'updated') break;
      }
    }

    if (result !== 'updated' && read.search === 'true' && change.resourceAnnotations[keys.match] === 'true') {
      result = strategy.apply(adapter, item, change, true);
    }

    return result;
  }

  /** Re-resolve the live workload by name and evaluate the whole batch against it. */
  private async flushBatch(batch: BatchSnapshot): Promise<void> {
    const items = await batch.adapter.listItems(this.opts.clients, batch.namespace);
    const item = items.find((i) => itemName(i) === batch.itemName);
    if (!item) {
      log.error({ itemId: batch.itemId }, 'workload for delayed upgrade no longer exists, discarding batch');
      return;
    }
    await this.performOnItem(batch.adapter, item, batch.configs, { fromBatch: true, strategy: batch.strategy });
  }
}
