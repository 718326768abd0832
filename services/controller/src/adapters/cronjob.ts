import type * as k8s from '@kubernetes/client-node';
import { definePodTemplateAdapter } from './pod-template.js';
import { itemName } from './types.js';

const INSTANTIATE_ANNOTATION = 'cronjob.kubernetes.io/instantiate';

/**
 * Build the Job `kubectl create job --from=cronjob/<name>` would create.
 * The CronJob itself stays untouched; only the next manual run picks up the change.
 */
export function jobFromCronJob(cronJob: k8s.V1CronJob, namespace: string): k8s.V1Job {
  const name = itemName(cronJob);
  const jobTemplate = cronJob.spec?.jobTemplate;
  const uid = cronJob.metadata?.uid;

  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: {
      generateName: `${name}-`,
      namespace,
      annotations: {
        ...(jobTemplate?.metadata?.annotations ?? {}),
        [INSTANTIATE_ANNOTATION]: 'manual',
      },
      labels: jobTemplate?.metadata?.labels,
      ownerReferences: uid
        ? [{ apiVersion: 'batch/v1', kind: 'CronJob', name, uid, controller: true }]
        : undefined,
    },
    spec: jobTemplate?.spec,
  };
}

export const cronJobAdapter = definePodTemplateAdapter<k8s.V1CronJob>({
  kind: 'CronJob',
  apiVersion: 'batch/v1',
  template: (item) => item.spec?.jobTemplate.spec?.template,
  list: async (clients, namespace) => (await clients.batch.listNamespacedCronJob({ namespace })).items,
  update: (clients, namespace, item) =>
    clients.batch.createNamespacedJob({ namespace, body: jobFromCronJob(item, namespace) }),
});
