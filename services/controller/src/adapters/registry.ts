import type { AnnotationKeys } from '@rollwatch/shared';
import { daemonSetAdapter, deploymentAdapter, statefulSetAdapter } from './apps.js';
import { cronJobAdapter } from './cronjob.js';
import { createRolloutAdapter, deploymentConfigAdapter } from './custom.js';
import type { ResourceAdapter } from './types.js';

export interface AdapterFlags {
  openshift: boolean;
  argoRollouts: boolean;
}

/**
 * Adapters to run for every change, in evaluation order.
 * An update failure on one kind stops the kinds after it for that change.
 */
export function buildAdapterRegistry(
  flags: AdapterFlags,
  keys: Pick<AnnotationKeys, 'rolloutStrategy'>,
): ResourceAdapter[] {
  const adapters: ResourceAdapter[] = [deploymentAdapter, cronJobAdapter, daemonSetAdapter, statefulSetAdapter];
  if (flags.openshift) adapters.push(deploymentConfigAdapter);
  if (flags.argoRollouts) adapters.push(createRolloutAdapter(keys));
  return adapters;
}
