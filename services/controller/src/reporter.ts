import type * as k8s from '@kubernetes/client-node';
import { metrics, type Counter } from '@opentelemetry/api';
import { logger, type ChangeConfig } from '@rollwatch/shared';
import type { WorkloadKind } from './adapters/types.js';
import { sendWebhookAlert, type AlertConfig } from './alerts.js';

const log = logger.child({ module: 'reporter' });

const EVENT_SOURCE = 'rollwatch';

export interface ReloadCounters {
  reloaded: Pick<Counter, 'add'>;
  reloadedByNamespace: Pick<Counter, 'add'>;
}

export function createReloadCounters(): ReloadCounters {
  const meter = metrics.getMeter('rollwatch');
  return {
    reloaded: meter.createCounter('reloaded_total', {
      description: 'Workload reloads, by success',
    }),
    reloadedByNamespace: meter.createCounter('reloaded_by_namespace_total', {
      description: 'Workload reloads, by success and namespace',
    }),
  };
}

export interface ReloadOutcome {
  kind: WorkloadKind;
  apiVersion: string;
  item: k8s.KubernetesObject;
  namespace: string;
  change: ChangeConfig;
}

export interface OutcomeReporter {
  reloaded(outcome: ReloadOutcome): void;
  failed(outcome: ReloadOutcome, err: unknown): void;
}

export interface ReporterOptions {
  counters: ReloadCounters;
  /** Omit to skip Kubernetes Events. */
  events?: Pick<k8s.CoreV1Api, 'createNamespacedEvent'>;
  /** Set when alerting on reload is enabled. */
  alert?: AlertConfig;
}

function configKindLabel(change: ChangeConfig): string {
  return change.kind === 'configmap' ? 'ConfigMap' : 'Secret';
}

export function successMessage({ kind, item, namespace, change }: ReloadOutcome): string {
  return (
    `Changes detected in '${change.resourceName}' of type '${configKindLabel(change)}' in namespace '${namespace}', ` +
    `Updated '${item.metadata?.name ?? ''}' of type '${kind}' in namespace '${namespace}'`
  );
}

export function alertMessage({ kind, item, namespace, change }: ReloadOutcome): string {
  return (
    `Detected changes in *${change.resourceName}* of type *${configKindLabel(change)}* in namespace *${namespace}*. ` +
    `Hence reloaded *${item.metadata?.name ?? ''}* of type *${kind}* in namespace *${namespace}*`
  );
}

export function buildEvent(
  outcome: ReloadOutcome,
  type: 'Normal' | 'Warning',
  reason: 'Reloaded' | 'ReloadFail',
  message: string,
  now: Date = new Date(),
): k8s.CoreV1Event {
  const name = outcome.item.metadata?.name ?? '';
  return {
    metadata: { generateName: `${name}.`, namespace: outcome.namespace },
    involvedObject: {
      apiVersion: outcome.apiVersion,
      kind: outcome.kind,
      name,
      namespace: outcome.namespace,
      uid: outcome.item.metadata?.uid,
      resourceVersion: outcome.item.metadata?.resourceVersion,
    },
    reason,
    message,
    type,
    source: { component: EVENT_SOURCE },
    firstTimestamp: now,
    lastTimestamp: now,
    count: 1,
  };
}

/**
 * Records the result of each applied update: counters, a Kubernetes Event on the
 * workload, and an optional alert. Event and alert delivery never block or fail the caller.
 */
export function createOutcomeReporter(opts: ReporterOptions): OutcomeReporter {
  function emitEvent(outcome: ReloadOutcome, event: k8s.CoreV1Event): void {
    if (!opts.events) return;
    opts.events
      .createNamespacedEvent({ namespace: outcome.namespace, body: event })
      .catch((err: unknown) => log.warn({ err, reason: event.reason }, 'failed to record event'));
  }

  return {
    reloaded(outcome) {
      opts.counters.reloaded.add(1, { success: 'true' });
      opts.counters.reloadedByNamespace.add(1, { success: 'true', namespace: outcome.namespace });

      const message = successMessage(outcome);
      log.info(
        {
          resource: outcome.change.resourceName,
          workload: outcome.item.metadata?.name,
          kind: outcome.kind,
          namespace: outcome.namespace,
        },
        'workload reloaded',
      );
      emitEvent(outcome, buildEvent(outcome, 'Normal', 'Reloaded', message));

      if (opts.alert) {
        void sendWebhookAlert(opts.alert, alertMessage(outcome));
      }
    },

    failed(outcome, err) {
      opts.counters.reloaded.add(1, { success: 'false' });
      opts.counters.reloadedByNamespace.add(1, { success: 'false', namespace: outcome.namespace });

      const detail = err instanceof Error ? err.message : String(err);
      const message =
        `Update for '${outcome.item.metadata?.name ?? ''}' of type '${outcome.kind}' ` +
        `in namespace '${outcome.namespace}' failed with error ${detail}`;
      log.error({ err, kind: outcome.kind, namespace: outcome.namespace }, 'workload update failed');
      emitEvent(outcome, buildEvent(outcome, 'Warning', 'ReloadFail', message));
    },
  };
}
