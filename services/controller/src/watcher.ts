import * as k8s from '@kubernetes/client-node';
import {
  createChangeConfig,
  logger,
  withSpan,
  type AnnotationKeys,
  type ChangeConfig,
  type ConfigKind,
} from '@rollwatch/shared';
import type { ResourceAdapter } from './adapters/types.js';
import { sendUpgradeWebhook } from './alerts.js';
import type { ControllerConfig, IgnorableResource } from './config.js';
import type { TriggerEvaluator } from './evaluator.js';
import { configMapHash, secretHash } from './hash.js';

const log = logger.child({ module: 'watcher' });

const INFORMER_RESTART_DELAY_MS = 5_000;

const IGNORE_NAME: Record<ConfigKind, IgnorableResource> = {
  configmap: 'configMaps',
  secret: 'secrets',
};

export type ConfigResource = k8s.V1ConfigMap | k8s.V1Secret;

export interface ChangeDetectorOptions {
  config: Pick<ControllerConfig, 'namespacesToIgnore' | 'resourcesToIgnore' | 'webhookUrl'> & {
    annotations: AnnotationKeys;
  };
  reloadOnCreate: boolean;
  adapters: ResourceAdapter[];
  evaluator: Pick<TriggerEvaluator, 'performAction'>;
}

export function hashOf(kind: ConfigKind, obj: ConfigResource): string {
  return kind === 'configmap' ? configMapHash(obj) : secretHash(obj);
}

function cacheKey(kind: ConfigKind, namespace: string, name: string): string {
  return `${kind}/${namespace}/${name}`;
}

/**
 * Turns informer events into ChangeConfigs. A change is emitted only when the
 * content hash moves away from the last one seen for that resource; changes are
 * handled one at a time, in arrival order.
 */
export class ChangeDetector {
  private readonly hashes = new Map<string, string>();
  private readonly syncedKinds = new Set<ConfigKind>();
  private queue: Promise<void> = Promise.resolve();
  private readonly opts: ChangeDetectorOptions;

  constructor(opts: ChangeDetectorOptions) {
    this.opts = opts;
  }

  /** Kinds this detector watches, after RESOURCES_TO_IGNORE. */
  watchedKinds(): ConfigKind[] {
    const ignored = this.opts.config.resourcesToIgnore;
    return (['configmap', 'secret'] as const).filter((kind) => !ignored.includes(IGNORE_NAME[kind]));
  }

  /** True once every watched kind has finished its initial list. */
  get synced(): boolean {
    return this.watchedKinds().every((kind) => this.syncedKinds.has(kind));
  }

  markSynced(kind: ConfigKind): void {
    this.syncedKinds.add(kind);
    log.info({ kind, cached: this.hashes.size }, 'initial list synced');
  }

  onAdd(kind: ConfigKind, obj: ConfigResource): void {
    const target = this.accept(kind, obj);
    if (!target) return;
    const known = this.hashes.has(target.key);
    const previous = this.hashes.get(target.key);
    this.hashes.set(target.key, target.hash);

    if (!this.syncedKinds.has(kind)) return;
    if (known) {
      // Re-listed after a watch restart: only a real content change counts.
      if (previous !== target.hash) this.emit(kind, obj, target.hash);
      return;
    }
    if (this.opts.reloadOnCreate) {
      this.emit(kind, obj, target.hash);
    }
  }

  onUpdate(kind: ConfigKind, obj: ConfigResource): void {
    const target = this.accept(kind, obj);
    if (!target) return;
    const previous = this.hashes.get(target.key);
    this.hashes.set(target.key, target.hash);
    if (previous === undefined || previous === target.hash) return;
    this.emit(kind, obj, target.hash);
  }

  onDelete(kind: ConfigKind, obj: ConfigResource): void {
    const namespace = obj.metadata?.namespace ?? '';
    const name = obj.metadata?.name ?? '';
    this.hashes.delete(cacheKey(kind, namespace, name));
  }

  /** Resolves once every change queued so far has been handled. */
  async idle(): Promise<void> {
    await this.queue;
  }

  /**
   * Run one change against every adapter in order. An update failure stops the
   * remaining adapters for this change and rejects.
   */
  async handleChange(change: ChangeConfig): Promise<void> {
    const { webhookUrl } = this.opts.config;
    if (webhookUrl) {
      await sendUpgradeWebhook(webhookUrl, {
        resource: change.resourceName,
        kind: change.kind,
        namespace: change.namespace,
      });
      return;
    }

    await withSpan(
      'config.change',
      { 'config.kind': change.kind, 'config.name': change.resourceName, 'config.namespace': change.namespace },
      async () => {
        for (const adapter of this.opts.adapters) {
          await this.opts.evaluator.performAction(adapter, change);
        }
      },
    );
  }

  private accept(kind: ConfigKind, obj: ConfigResource): { key: string; hash: string } | undefined {
    const namespace = obj.metadata?.namespace ?? '';
    const name = obj.metadata?.name ?? '';
    if (!this.watchedKinds().includes(kind)) return undefined;
    if (this.opts.config.namespacesToIgnore.includes(namespace)) return undefined;
    if (obj.metadata?.annotations?.[this.opts.config.annotations.ignore] === 'true') {
      log.debug({ kind, namespace, name }, 'resource carries the ignore annotation, skipping');
      return undefined;
    }
    return { key: cacheKey(kind, namespace, name), hash: hashOf(kind, obj) };
  }

  private emit(kind: ConfigKind, obj: ConfigResource, hash: string): void {
    const change = createChangeConfig(
      {
        kind,
        name: obj.metadata?.name ?? '',
        namespace: obj.metadata?.namespace ?? '',
        contentHash: hash,
        annotations: obj.metadata?.annotations,
      },
      this.opts.config.annotations,
    );
    log.info({ kind, name: change.resourceName, namespace: change.namespace }, 'change detected');
    this.queue = this.queue.then(() =>
      this.handleChange(change).catch((err: unknown) => {
        log.error({ err, kind, name: change.resourceName, namespace: change.namespace }, 'failed to process change');
      }),
    );
  }
}

/** The informer wiring: which API path and list call feed each kind. */
export interface ConfigInformers {
  start(): Promise<void>;
  stop(): Promise<void>;
}

function configMapInformer(kc: k8s.KubeConfig, core: k8s.CoreV1Api, namespace: string): k8s.Informer<k8s.V1ConfigMap> {
  if (namespace) {
    return k8s.makeInformer(kc, `/api/v1/namespaces/${namespace}/configmaps`, () =>
      core.listNamespacedConfigMap({ namespace }),
    );
  }
  return k8s.makeInformer(kc, '/api/v1/configmaps', () => core.listConfigMapForAllNamespaces());
}

function secretInformer(kc: k8s.KubeConfig, core: k8s.CoreV1Api, namespace: string): k8s.Informer<k8s.V1Secret> {
  if (namespace) {
    return k8s.makeInformer(kc, `/api/v1/namespaces/${namespace}/secrets`, () =>
      core.listNamespacedSecret({ namespace }),
    );
  }
  return k8s.makeInformer(kc, '/api/v1/secrets', () => core.listSecretForAllNamespaces());
}

/**
 * Start one informer per watched kind and feed its events into the detector.
 * A failed watch is restarted after a short delay.
 */
export function createConfigInformers(
  kc: k8s.KubeConfig,
  detector: ChangeDetector,
  watchNamespace: string,
): ConfigInformers {
  const core = kc.makeApiClient(k8s.CoreV1Api);
  const informers: Array<{ kind: ConfigKind; informer: k8s.Informer<ConfigResource> }> = [];
  let stopping = false;

  for (const kind of detector.watchedKinds()) {
    const informer: k8s.Informer<ConfigResource> =
      kind === 'configmap' ? configMapInformer(kc, core, watchNamespace) : secretInformer(kc, core, watchNamespace);
    informer.on('add', (obj) => detector.onAdd(kind, obj));
    informer.on('update', (obj) => detector.onUpdate(kind, obj));
    informer.on('delete', (obj) => detector.onDelete(kind, obj));
    informer.on('error', (err: unknown) => {
      if (stopping) return;
      log.error({ err, kind }, 'informer watch failed, restarting');
      setTimeout(() => {
        informer.start().catch((restartErr: unknown) => log.error({ err: restartErr, kind }, 'informer restart failed'));
      }, INFORMER_RESTART_DELAY_MS);
    });
    informers.push({ kind, informer });
  }

  return {
    async start() {
      await Promise.all(
        informers.map(async ({ kind, informer }) => {
          await informer.start();
          detector.markSynced(kind);
        }),
      );
      log.info({ kinds: informers.map((i) => i.kind), namespace: watchNamespace || 'all' }, 'watching config resources');
    },
    async stop() {
      stopping = true;
      await Promise.all(informers.map(({ informer }) => informer.stop()));
    },
  };
}
